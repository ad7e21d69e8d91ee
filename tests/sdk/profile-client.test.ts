import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ProfileClient, createProfileClient } from '../../src/sdk.js';
import { clearConfigCache, parseAppConfig } from '../../src/utils/env-parser.js';

function config(env: Record<string, string> = {}) {
  return parseAppConfig({ LOG_LEVEL: 'silent', ...env });
}

describe('ProfileClient', () => {
  let originalEnv: NodeJS.ProcessEnv;

  beforeEach(() => {
    originalEnv = { ...process.env };
    clearConfigCache();
  });

  afterEach(() => {
    process.env = originalEnv;
    clearConfigCache();
  });

  it('should read the environment once when no configuration is given', () => {
    process.env.PROFILE_API_LOCAL_URL = 'http://10.0.0.3:58888';
    const first = new ProfileClient();
    process.env.PROFILE_API_LOCAL_URL = 'http://10.0.0.4:58888';
    const second = new ProfileClient();

    expect(first.transport.baseUrl('local')).toBe('http://10.0.0.3:58888');
    expect(second.config).toBe(first.config);
  });

  it('should wire both bases from configuration', () => {
    const client = new ProfileClient({
      config: config({
        PROFILE_API_LOCAL_URL: 'http://10.0.0.2:58888',
        PROFILE_API_CLOUD_URL: 'https://cloud.test/',
      }),
    });

    expect(client.transport.baseUrl('local')).toBe('http://10.0.0.2:58888');
    expect(client.transport.baseUrl('cloud')).toBe('https://cloud.test');
  });

  it('should fill start options from the resolution settings', () => {
    const client = new ProfileClient({
      config: config({ PROFILE_ALLOW_PORT_SCAN: 'true', PROFILE_DEBUG_PORT: '9333' }),
    });

    expect(client.startOptions({ headless: true })).toEqual({
      headless: true,
      allowPortScan: true,
      manualPort: 9333,
    });
    expect(client.startOptions({ allowPortScan: false, manualPort: 9400 })).toMatchObject({
      allowPortScan: false,
      manualPort: 9400,
    });
  });

  it('should send the configured token on every call', async () => {
    const fetch = vi.fn(async (_url: string, _init: RequestInit) => new Response('[]', { status: 200 }));
    const client = createProfileClient({
      config: config({ PROFILE_API_TOKEN: 'test-secret' }),
      fetch,
      connector: async () => false,
    });

    const diagnosis = await client.diagnose();

    expect(diagnosis.verdict).toBe('ready');
    expect(diagnosis.livePorts).toEqual([]);
    expect(fetch.mock.calls.map(([url]) => url)).toEqual([
      'http://127.0.0.1:58888/api/profiles',
      'https://app.octobrowser.net/api/v2/automation/profiles',
    ]);
    for (const [, init] of fetch.mock.calls) {
      expect(new Headers(init.headers).get('X-Octo-Api-Token')).toBe('test-secret');
    }
  });
});
