import { describe, it, expect, vi } from 'vitest';
import {
  ProfileLifecycleCoordinator,
  buildCreatePayload,
  deepMerge,
} from '../../src/core/profile-lifecycle.js';
import {
  CancelledError,
  ClientError,
  NetworkError,
  RateLimitedError,
  SchemaError,
} from '../../src/types/errors.js';
import type { ProfileHandle, ResolvedEndpoint } from '../../src/types/endpoint.js';
import {
  FakeTransport,
  clientError,
  deferred,
  fail,
  networkError,
  ok,
  recordingSleep,
} from '../helpers/fake-transport.js';

const CREATE = '/api/v2/automation/profiles';
const START = '/api/profiles/start';

function fakeProbe() {
  return {
    discoverWebSocketUrl: vi.fn(async (port: number, _signal?: AbortSignal): Promise<string | null> =>
      `ws://127.0.0.1:${port}/devtools/browser/found`
    ),
    liveWebSocketUrl: vi.fn(
      async (_port: number, _signal?: AbortSignal, _timeoutMs?: number): Promise<string | null> => null
    ),
    scanRange: vi.fn(
      async (
        _handle: ProfileHandle,
        _ports?: readonly number[],
        _perPortTimeoutMs?: number,
        _signal?: AbortSignal
      ): Promise<ResolvedEndpoint | null> => null
    ),
  };
}

function setup() {
  const transport = new FakeTransport();
  const { sleep, waits } = recordingSleep();
  const probe = fakeProbe();
  const coordinator = new ProfileLifecycleCoordinator({ transport, probe, sleep });
  return { transport, coordinator, probe, waits };
}

const SPEC = { title: 'scan-1', os: 'android', osVersion: '13' };

describe('buildCreatePayload', () => {
  it('should nest OS details under fingerprint', () => {
    expect(buildCreatePayload(SPEC)).toEqual({
      title: 'scan-1',
      fingerprint: { os: 'android', os_version: '13' },
    });
  });

  it('should include optional fields and merge overrides last', () => {
    const payload = buildCreatePayload({
      ...SPEC,
      userAgent: 'Mozilla/5.0 (Linux; Android 13)',
      tags: ['batch-7'],
      overrides: { fingerprint: { screen: '1080x2400' }, title: 'renamed' },
    });

    expect(payload).toEqual({
      title: 'renamed',
      fingerprint: { os: 'android', os_version: '13', screen: '1080x2400' },
      userAgent: 'Mozilla/5.0 (Linux; Android 13)',
      tags: ['batch-7'],
    });
  });
});

describe('deepMerge', () => {
  it('should merge objects recursively and replace everything else', () => {
    const base = { a: { b: 1, c: [1, 2] }, d: 'x' };
    const merged = deepMerge(base, { a: { c: [3] }, d: { e: true } });

    expect(merged).toEqual({ a: { b: 1, c: [3] }, d: { e: true } });
    expect(base).toEqual({ a: { b: 1, c: [1, 2] }, d: 'x' });
  });
});

describe('ProfileLifecycleCoordinator', () => {
  describe('create', () => {
    it('should use the local agent when it accepts the profile', async () => {
      const { transport, coordinator } = setup();
      transport.on('POST', 'local', CREATE, ok({ uuid: 'p-local' }));

      expect(await coordinator.create(SPEC)).toBe('p-local');
      expect(transport.routes()).toEqual([`POST local ${CREATE}`]);
    });

    it('should fall back to the cloud API', async () => {
      const { transport, coordinator, waits } = setup();
      transport
        .on('POST', 'local', CREATE, networkError())
        .on('POST', 'cloud', CREATE, ok({ success: true, data: { uuid: 'p-cloud' } }));

      expect(await coordinator.create(SPEC)).toBe('p-cloud');
      expect(transport.routes()).toEqual([`POST local ${CREATE}`, `POST cloud ${CREATE}`]);
      expect(waits).toEqual([]);
    });

    it('should drop a field the cloud rejects as extra_forbidden', async () => {
      const { transport, coordinator, waits } = setup();
      transport.on(
        'POST',
        'cloud',
        CREATE,
        clientError(422, '{"detail":[{"type":"extra_forbidden","loc":["body","userAgent"]}]}'),
        ok({ uuid: 'p-2' })
      );

      const id = await coordinator.create({ ...SPEC, userAgent: 'Mozilla/5.0', tags: ['batch-7'] });

      const cloudCalls = transport.callsTo('POST', 'cloud', CREATE);
      expect(id).toBe('p-2');
      expect(cloudCalls).toHaveLength(2);
      expect(cloudCalls[0].body).toHaveProperty('userAgent', 'Mozilla/5.0');
      expect(cloudCalls[1].body).not.toHaveProperty('userAgent');
      expect(cloudCalls[1].body).toHaveProperty('tags', ['batch-7']);
      expect(waits).toEqual([3000]);
    });

    it('should wait out profile limits with growing delays', async () => {
      const { transport, coordinator, waits } = setup();
      transport.on(
        'POST',
        'cloud',
        CREATE,
        clientError(400, '{"error":"limit_reached"}'),
        fail(new RateLimitedError('rate limited (429)', 1000, '')),
        clientError(400, 'Maximum profiles reached'),
        ok({ uuid: 'p-3' })
      );

      expect(await coordinator.create(SPEC)).toBe('p-3');
      expect(waits).toEqual([3000, 6000, 10000]);
    });

    it('should throw the last error when every cloud attempt is throttled', async () => {
      const { transport, coordinator } = setup();
      transport.on('POST', 'cloud', CREATE, clientError(400, 'limit_reached'));

      await expect(coordinator.create(SPEC)).rejects.toBeInstanceOf(ClientError);
      expect(transport.callsTo('POST', 'cloud', CREATE)).toHaveLength(4);
    });

    it('should throw a non-retryable cloud rejection at once', async () => {
      const { transport, coordinator } = setup();
      transport.on('POST', 'cloud', CREATE, clientError(401, 'invalid token'));

      await expect(coordinator.create(SPEC)).rejects.toThrow('request returned 401');
      expect(transport.callsTo('POST', 'cloud', CREATE)).toHaveLength(1);
    });

    it('should not mistake digits in a rejection for rate limiting', async () => {
      const { transport, coordinator } = setup();
      transport.on('POST', 'cloud', CREATE, clientError(400, '{"error":"invalid proxy port 4291"}'));

      await expect(coordinator.create(SPEC)).rejects.toThrow('request returned 400');
      expect(transport.callsTo('POST', 'cloud', CREATE)).toHaveLength(1);
    });

    it('should reject a success body without an identifier', async () => {
      const { transport, coordinator } = setup();
      transport.on('POST', 'local', CREATE, ok({ success: true }));

      await expect(coordinator.create(SPEC)).rejects.toBeInstanceOf(SchemaError);
    });
  });

  describe('createProxy', () => {
    it('should post the proxy and return its identifier', async () => {
      const { transport, coordinator } = setup();
      transport.on('POST', 'cloud', '/api/v2/automation/proxies', ok({ data: { id: 'px-1' } }));

      const id = await coordinator.createProxy({
        host: '10.0.0.5',
        port: 8080,
        type: 'socks5',
        login: 'user',
        password: 'test-secret',
      });

      expect(id).toBe('px-1');
      expect(transport.calls[0].body).toEqual({
        title: 'Proxy_10.0.0.5_8080',
        host: '10.0.0.5',
        port: 8080,
        type: 'socks5',
        login: 'user',
        password: 'test-secret',
      });
    });
  });

  describe('createOneTimeProfile', () => {
    it('should try one-time routes in order and use the endpoint they return', async () => {
      const { transport, coordinator } = setup();
      transport.on(
        'POST',
        'cloud',
        '/api/v2/automation/one-time-profile',
        ok({ uuid: 'ot-1', debug_port: 52100, ws_endpoint: 'ws://127.0.0.1:52100/devtools/browser/o' })
      );

      const endpoint = await coordinator.createOneTimeProfile(SPEC, { headless: true });

      expect(endpoint).toEqual({
        profileId: 'ot-1',
        port: 52100,
        webSocketUrl: 'ws://127.0.0.1:52100/devtools/browser/o',
      });
      expect(transport.routes()).toEqual([
        'POST cloud /api/v2/automation/profiles/one-time',
        'POST cloud /api/v2/automation/one-time-profile',
      ]);
      expect(transport.calls[1].body).toMatchObject({ title: 'scan-1', headless: true });
    });

    it('should fall back to create and start when no one-time route exists', async () => {
      const { transport, coordinator } = setup();
      transport
        .on('POST', 'local', CREATE, ok({ uuid: 'p-9' }))
        .on('POST', 'local', START, ok({ debug_port: 52200, ws_endpoint: 'ws://127.0.0.1:52200/devtools/browser/c' }));

      const endpoint = await coordinator.createOneTimeProfile(SPEC);

      expect(endpoint.profileId).toBe('p-9');
      expect(endpoint.port).toBe(52200);
      expect(transport.callsTo('POST', 'local', START)[0].body).toMatchObject({ uuid: 'p-9' });
    });

    it('should surface errors other than a missing route', async () => {
      const { transport, coordinator } = setup();
      transport.on('POST', 'cloud', '/api/v2/automation/profiles/one-time', clientError(400, 'bad os'));

      await expect(coordinator.createOneTimeProfile(SPEC)).rejects.toBeInstanceOf(ClientError);
    });
  });

  describe('start', () => {
    it('should resolve the endpoint reported by the local agent', async () => {
      const { transport, coordinator, probe } = setup();
      transport.on('POST', 'local', START, ok({ debug_port: 52300 }));

      const endpoint = await coordinator.start('p-1', { flags: ['--lang=en'] });

      expect(endpoint).toEqual({
        profileId: 'p-1',
        port: 52300,
        webSocketUrl: 'ws://127.0.0.1:52300/devtools/browser/found',
      });
      expect(probe.discoverWebSocketUrl).toHaveBeenCalledWith(52300, undefined);
      expect(transport.calls[0].body).toEqual({
        uuid: 'p-1',
        headless: false,
        debug_port: true,
        timeout: 120,
        only_local: true,
        flags: ['--lang=en'],
      });
    });

    it('should find the port through the polling sources', async () => {
      const { transport, coordinator } = setup();
      transport
        .on('POST', 'local', START, ok({}))
        .on('GET', 'local', '/api/v2/profiles', ok({ data: [{ uuid: 'p-1', debug_port: 52301 }] }));

      const endpoint = await coordinator.start('p-1');

      expect(endpoint.port).toBe(52301);
      expect(transport.routes()).toEqual([
        `POST local ${START}`,
        `POST local ${START}`,
        'GET cloud /api/v2/automation/profiles/p-1',
        'GET local /api/v2/automation/profiles/p-1',
        'GET local /api/v2/profiles/p-1',
        'GET local /api/v2/automation/profiles/p-1/status',
        'GET local /api/v2/profiles/p-1/status',
        'GET local /api/v2/automation/profiles',
        'GET local /api/v2/profiles',
      ]);
    });

    it('should recover a zombie through force-stop', async () => {
      const { transport, coordinator, waits } = setup();
      transport
        .on(
          'POST',
          'local',
          START,
          clientError(400, 'Profile already running, debug_port not available'),
          ok({ debug_port: 52302, ws_endpoint: 'ws://127.0.0.1:52302/devtools/browser/z' })
        )
        .on('POST', 'local', '/api/profiles/force_stop', ok({}));

      const endpoint = await coordinator.start('p-1');

      expect(endpoint.port).toBe(52302);
      expect(transport.callsTo('POST', 'local', '/api/profiles/force_stop')[0].body).toEqual({ uuid: 'p-1' });
      expect(waits).toEqual([12000]);
    });
  });

  describe('stop', () => {
    it('should return true on the first route that succeeds', async () => {
      const { transport, coordinator } = setup();
      transport.on('POST', 'local', '/api/profiles/force_stop', ok({}));

      expect(await coordinator.stop('p-1')).toBe(true);
      expect(transport.routes()).toEqual([
        'POST local /api/profiles/stop',
        'POST local /api/profiles/force_stop',
      ]);
    });

    it('should return false without throwing when nothing answers', async () => {
      const { transport, coordinator } = setup();

      expect(await coordinator.stop('p-1')).toBe(false);
      expect(await coordinator.stop('p-1')).toBe(false);
      expect(transport.calls).toHaveLength(8);
    });
  });

  describe('forceStop', () => {
    it('should retry with doubling waits and ask the cloud last', async () => {
      const { transport, coordinator, waits } = setup();

      expect(await coordinator.forceStop('p-1', 3, 2000)).toBe(false);
      expect(waits).toEqual([2000, 4000]);
      expect(transport.calls).toHaveLength(10);
      expect(transport.callsTo('POST', 'cloud', '/api/v2/automation/profiles/p-1/stop')).toHaveLength(1);
    });

    it('should stop at the first confirmation', async () => {
      const { transport, coordinator, waits } = setup();
      transport.on('POST', 'local', '/api/profiles/stop', ok({}));

      expect(await coordinator.forceStop('p-1')).toBe(true);
      expect(waits).toEqual([]);
      expect(transport.calls).toHaveLength(2);
    });
  });

  describe('delete', () => {
    it('should make no call for an empty list', async () => {
      const { transport, coordinator } = setup();

      expect(await coordinator.delete([])).toBe(true);
      expect(transport.calls).toHaveLength(0);
    });

    it('should delete all handles in one call', async () => {
      const { transport, coordinator } = setup();
      transport.on('DELETE', 'cloud', CREATE, ok({}));

      expect(await coordinator.delete(['a', 'b'])).toBe(true);
      expect(transport.calls[0].body).toEqual({ uuid: ['a', 'b'] });
    });

    it('should return false when the cloud refuses', async () => {
      const { coordinator } = setup();

      expect(await coordinator.delete(['a'])).toBe(false);
    });
  });

  describe('listRunning and stopAll', () => {
    it('should list unique running identifiers', async () => {
      const { transport, coordinator } = setup();
      transport.on('GET', 'local', '/api/profiles/active', ok([{ uuid: 'a' }, { uuid: 'b' }, { uuid: 'a' }]));

      expect(await coordinator.listRunning()).toEqual(['a', 'b']);
    });

    it('should fall back to the full listing', async () => {
      const { transport, coordinator } = setup();
      transport.on('GET', 'local', '/api/profiles', ok({ data: [{ id: 7 }, { title: 'no id' }] }));

      expect(await coordinator.listRunning()).toEqual(['7']);
    });

    it('should throw when no listing answers', async () => {
      const { coordinator } = setup();

      await expect(coordinator.listRunning()).rejects.toBeInstanceOf(ClientError);
    });

    it('should report which profiles stopped', async () => {
      const { transport, coordinator, waits } = setup();
      transport
        .on('GET', 'local', '/api/profiles/active', ok([{ uuid: 'a' }, { uuid: 'b' }]))
        .on('POST', 'local', '/api/profiles/force_stop', (body) =>
          body?.uuid === 'a' ? ok({}) : fail(new NetworkError('connect ECONNREFUSED'))
        );

      expect(await coordinator.stopAll()).toEqual({ stopped: ['a'], failed: ['b'] });
      expect(waits).toEqual([2000, 4000]);
    });
  });

  describe('per-profile serialization', () => {
    it('should hold a stop until the start of the same profile finishes', async () => {
      const { transport, coordinator } = setup();
      const gate = deferred();
      transport
        .on('POST', 'local', START, async () => {
          await gate.promise;
          return ok({ debug_port: 52001, ws_endpoint: 'ws://127.0.0.1:52001/devtools/browser/a' });
        })
        .on('POST', 'local', '/api/profiles/stop', ok({}));

      const starting = coordinator.start('p-1');
      const stopping = coordinator.stop('p-1');
      await new Promise((resolve) => setTimeout(resolve, 0));

      expect(transport.routes()).toEqual([`POST local ${START}`]);

      gate.resolve();
      await starting;
      expect(await stopping).toBe(true);
      expect(transport.routes()).toEqual([`POST local ${START}`, 'POST local /api/profiles/stop']);
    });

    it('should cancel a start still waiting behind another start', async () => {
      const { transport, coordinator } = setup();
      const gate = deferred();
      transport.on('POST', 'local', START, async () => {
        await gate.promise;
        return ok({ debug_port: 52001, ws_endpoint: 'ws://127.0.0.1:52001/devtools/browser/a' });
      });
      const controller = new AbortController();

      const first = coordinator.start('p-1');
      const second = coordinator.start('p-1', { signal: controller.signal });
      controller.abort();

      await expect(second).rejects.toBeInstanceOf(CancelledError);
      expect(transport.routes()).toEqual([`POST local ${START}`]);

      gate.resolve();
      expect((await first).port).toBe(52001);
      expect(transport.routes()).toEqual([`POST local ${START}`]);
    });

    it('should not hold operations on other profiles', async () => {
      const { transport, coordinator } = setup();
      const gate = deferred();
      transport
        .on('POST', 'local', START, async () => {
          await gate.promise;
          return ok({ debug_port: 52001, ws_endpoint: 'ws://127.0.0.1:52001/devtools/browser/a' });
        })
        .on('POST', 'local', '/api/profiles/stop', ok({}));

      const starting = coordinator.start('p-1');
      expect(await coordinator.stop('p-2')).toBe(true);

      gate.resolve();
      await starting;
      expect(transport.routes()).toEqual([`POST local ${START}`, 'POST local /api/profiles/stop']);
    });
  });
});
