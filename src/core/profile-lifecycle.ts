/**
 * Profile Lifecycle Coordinator
 *
 * Create, start, stop, force-stop and delete profiles on the control service.
 * Mutations of one profile are serialized; different profiles run
 * concurrently.
 */

import {
  CancelledError,
  ClientError,
  RateLimitedError,
  SchemaError,
  isControlApiError,
  type ControlApiError,
} from '../types/errors.js';
import {
  createResolvedEndpoint,
  isJsonObject,
  type JsonObject,
  type JsonValue,
  type ProfileCreateSpec,
  type ProfileHandle,
  type ProxyCreateSpec,
  type RequestOutcome,
  type ResolvedEndpoint,
  type StartOptions,
} from '../types/endpoint.js';
import { KeyedMutex } from '../utils/keyed-mutex.js';
import { logger } from '../utils/logger.js';
import { sleep as timerSleep, withRetry, type SleepFn } from '../utils/retry.js';
import { TIMEOUTS } from '../utils/timeouts.js';
import {
  CREATE_PATH,
  DELETE_ROUTE,
  ONE_TIME_ROUTES,
  PROXY_ROUTE,
  RUNNING_LIST_ROUTES,
  START_ROUTE,
  createPollingSources,
  createRunningSources,
  forceStopRoutes,
  stopRoutes,
  type EndpointSource,
} from './endpoint-catalog.js';
import {
  EndpointResolver,
  type EndpointProbe,
  type ResolutionPolicy,
  type StartController,
} from './endpoint-resolver.js';
import { PortProbe } from './port-probe.js';
import { extractEndpointFields, extractIdentifier, listRecords } from './response-shape.js';
import type { ControlApiTransport } from './transport.js';

const log = logger.lifecycle;

/**
 * Waits before each cloud create attempt.
 */
export const CLOUD_CREATE_WAITS_MS: readonly number[] = [0, 3000, 6000, 10000];

/**
 * Optional payload fields the cloud may reject with `extra_forbidden`.
 */
const DROPPABLE_FIELDS = ['userAgent', 'tags'] as const;

const RETRYABLE_CREATE_SIGNATURES = ['limit_reached', 'Maximum profiles', 'rate_limited'];

export interface StopAllResult {
  stopped: ProfileHandle[];
  failed: ProfileHandle[];
}

export interface ProfileLifecycleOptions {
  transport: ControlApiTransport;
  probe?: EndpointProbe;
  sleep?: SleepFn;
  policy?: Partial<ResolutionPolicy>;
  pollingSources?: readonly EndpointSource[];
  runningSources?: readonly EndpointSource[];
}

/**
 * Merge `overrides` into `base`: objects merge recursively, everything else
 * replaces. Neither input is modified.
 */
export function deepMerge(base: JsonObject, overrides: JsonObject): JsonObject {
  const merged: JsonObject = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    const current = merged[key];
    merged[key] =
      isJsonObject(current) && isJsonObject(value) ? deepMerge(current, value) : value;
  }
  return merged;
}

/**
 * Creation payload for a profile.
 */
export function buildCreatePayload(spec: ProfileCreateSpec): JsonObject {
  const fingerprint: JsonObject = { os: spec.os };
  if (spec.osVersion) {
    fingerprint.os_version = spec.osVersion;
  }
  const payload: JsonObject = { title: spec.title, fingerprint };
  if (spec.userAgent) {
    payload.userAgent = spec.userAgent;
  }
  if (spec.tags && spec.tags.length > 0) {
    payload.tags = [...spec.tags];
  }
  return spec.overrides ? deepMerge(payload, spec.overrides) : payload;
}

function withoutField(payload: JsonObject, field: string): JsonObject {
  const copy: JsonObject = { ...payload };
  delete copy[field];
  return copy;
}

function isRetryableCreateFailure(error: ControlApiError): boolean {
  if (error instanceof RateLimitedError) {
    return true;
  }
  const text = error.detail;
  return RETRYABLE_CREATE_SIGNATURES.some((signature) => text.includes(signature));
}

/**
 * Field named by an `extra_forbidden` rejection that can be dropped.
 */
function forbiddenField(error: ControlApiError, payload: JsonObject): string | null {
  const text = error.detail;
  if (!text.includes('extra_forbidden')) {
    return null;
  }
  return DROPPABLE_FIELDS.find((field) => field in payload && text.includes(field)) ?? null;
}

function identifierOrThrow(body: JsonObject | JsonValue[], what: string): ProfileHandle {
  const id = extractIdentifier(body);
  if (id === null) {
    throw new SchemaError(`${what} response carries no identifier`, JSON.stringify(body));
  }
  return id;
}

export class ProfileLifecycleCoordinator {
  private readonly transport: ControlApiTransport;
  private readonly probe: EndpointProbe;
  private readonly sleep: SleepFn;
  private readonly mutex = new KeyedMutex<ProfileHandle>();
  private readonly resolver: EndpointResolver;

  constructor(options: ProfileLifecycleOptions) {
    this.transport = options.transport;
    this.probe = options.probe ?? new PortProbe();
    this.sleep = options.sleep ?? timerSleep;

    const controller: StartController = {
      requestStart: (payload, signal) => this.requestStart(payload, signal),
      forceStop: (handle, retries, initialWaitMs, signal) =>
        this.forceStopUnlocked(handle, retries, initialWaitMs, signal),
    };
    this.resolver = new EndpointResolver({
      controller,
      probe: this.probe,
      pollingSources: options.pollingSources ?? createPollingSources(this.transport),
      runningSources: options.runningSources ?? createRunningSources(this.transport),
      sleep: this.sleep,
      policy: options.policy,
    });
  }

  // ============================================
  // CREATION
  // ============================================

  /**
   * Create a profile, local agent first, then the cloud API.
   */
  async create(spec: ProfileCreateSpec, signal?: AbortSignal): Promise<ProfileHandle> {
    let payload = buildCreatePayload(spec);
    log.debug('Creating profile', { title: spec.title, os: spec.os, payload });

    const local = await this.transport.send('POST', 'local', CREATE_PATH, payload, { signal });
    if (local.ok) {
      const id = identifierOrThrow(local.body, 'Create');
      log.info('Profile created', { profileId: id, base: 'local' });
      return id;
    }
    if (local.error instanceof CancelledError) {
      throw local.error;
    }
    log.debug('Local create failed, using cloud', { error: local.error.message });

    let lastError: ControlApiError = local.error;
    for (const [index, waitMs] of CLOUD_CREATE_WAITS_MS.entries()) {
      if (waitMs > 0) {
        await this.sleep(waitMs, signal);
      }
      const outcome = await this.transport.send('POST', 'cloud', CREATE_PATH, payload, { signal });
      if (outcome.ok) {
        const id = identifierOrThrow(outcome.body, 'Create');
        log.info('Profile created', { profileId: id, base: 'cloud', attempt: index + 1 });
        return id;
      }
      const error = outcome.error;
      if (error instanceof CancelledError) {
        throw error;
      }
      lastError = error;

      const field = forbiddenField(error, payload);
      if (field !== null) {
        log.warn('Cloud rejected an optional field, retrying without it', { field, attempt: index + 1 });
        payload = withoutField(payload, field);
        continue;
      }
      if (isRetryableCreateFailure(error)) {
        log.warn('Cloud create throttled or at profile limit, retrying', {
          attempt: index + 1,
          maxAttempts: CLOUD_CREATE_WAITS_MS.length,
        });
        continue;
      }
      throw error;
    }
    throw lastError;
  }

  /**
   * Register a proxy on the cloud API and return its identifier.
   */
  async createProxy(spec: ProxyCreateSpec, signal?: AbortSignal): Promise<string> {
    const payload: JsonObject = {
      title: `Proxy_${spec.host}_${spec.port}`,
      host: spec.host,
      port: spec.port,
      type: (spec.type ?? 'http').toLowerCase(),
    };
    if (spec.login) payload.login = spec.login;
    if (spec.password) payload.password = spec.password;

    const outcome = await this.transport.send('POST', PROXY_ROUTE.base, PROXY_ROUTE.path, payload, { signal });
    if (!outcome.ok) {
      throw outcome.error;
    }
    const id = identifierOrThrow(outcome.body, 'Proxy create');
    log.info('Proxy created', { proxyId: id, host: spec.host, port: spec.port });
    return id;
  }

  /**
   * Create and start a profile that the service discards when it stops.
   * Falls back to create + start when no one-time route exists.
   */
  async createOneTimeProfile(
    spec: ProfileCreateSpec,
    options: StartOptions = {}
  ): Promise<ResolvedEndpoint> {
    const { signal } = options;
    const payload: JsonObject = { ...buildCreatePayload(spec), headless: options.headless ?? false };
    if (options.flags && options.flags.length > 0) {
      payload.flags = [...options.flags];
    }

    for (const route of ONE_TIME_ROUTES) {
      const outcome = await this.transport.send('POST', route.base, route.path, payload, { signal });
      if (!outcome.ok) {
        const error = outcome.error;
        if (error instanceof ClientError && (error.httpStatus === 404 || error.httpStatus === 405)) {
          log.debug('One-time route absent', { path: route.path, status: error.httpStatus });
          continue;
        }
        throw error;
      }

      const id = identifierOrThrow(outcome.body, 'One-time create');
      const fields = extractEndpointFields(outcome.body);
      if (fields === null) {
        log.info('One-time profile created without a debug port, starting it', { profileId: id });
        return this.start(id, options);
      }
      const webSocketUrl =
        fields.webSocketUrl ?? (await this.probe.discoverWebSocketUrl(fields.port, signal));
      log.info('One-time profile started', { profileId: id, port: fields.port });
      return createResolvedEndpoint(id, fields.port, webSocketUrl);
    }

    log.debug('No one-time route available, using create + start');
    const id = await this.create(spec, signal);
    return this.start(id, options);
  }

  // ============================================
  // START / STOP
  // ============================================

  /**
   * Start a profile and resolve its CDP endpoint.
   */
  async start(handle: ProfileHandle, options: StartOptions = {}): Promise<ResolvedEndpoint> {
    return this.mutex.runExclusive(
      handle,
      () => this.resolver.resolve(handle, options),
      options.signal
    );
  }

  /**
   * Best-effort stop. Returns false when every stop route failed.
   */
  async stop(handle: ProfileHandle, signal?: AbortSignal): Promise<boolean> {
    return this.mutex.runExclusive(handle, async () => {
      let lastError: ControlApiError | null = null;
      for (const route of stopRoutes(handle)) {
        const outcome = await this.transport.send('POST', route.base, route.path, { uuid: handle }, { signal });
        if (outcome.ok) {
          log.info('Profile stopped', { profileId: handle, path: route.path });
          return true;
        }
        if (outcome.error instanceof CancelledError) {
          throw outcome.error;
        }
        lastError = outcome.error;
        log.debug('Stop route failed', { profileId: handle, path: route.path, error: outcome.error.message });
      }
      log.warn('Could not stop profile', { profileId: handle, error: lastError?.message });
      return false;
    }, signal);
  }

  /**
   * Stop a profile that a normal stop leaves running.
   */
  async forceStop(
    handle: ProfileHandle,
    retries: number = 3,
    initialWaitMs: number = TIMEOUTS.FORCE_STOP_INITIAL,
    signal?: AbortSignal
  ): Promise<boolean> {
    return this.mutex.runExclusive(
      handle,
      () => this.forceStopUnlocked(handle, retries, initialWaitMs, signal),
      signal
    );
  }

  /**
   * Delete profiles on the cloud API. An empty list makes no call.
   */
  async delete(handles: readonly ProfileHandle[], signal?: AbortSignal): Promise<boolean> {
    if (handles.length === 0) {
      return true;
    }
    const outcome = await this.transport.send(
      'DELETE',
      DELETE_ROUTE.base,
      DELETE_ROUTE.path,
      { uuid: [...handles] },
      { signal }
    );
    if (outcome.ok) {
      log.info('Profiles deleted', { count: handles.length });
      return true;
    }
    if (outcome.error instanceof CancelledError) {
      throw outcome.error;
    }
    log.warn('Could not delete profiles', { count: handles.length, error: outcome.error.message });
    return false;
  }

  // ============================================
  // BULK OPERATIONS
  // ============================================

  /**
   * Identifiers of the profiles the local agent reports as running.
   * Throws the last error when no listing route answers.
   */
  async listRunning(signal?: AbortSignal): Promise<ProfileHandle[]> {
    let lastError: ControlApiError | null = null;
    for (const route of RUNNING_LIST_ROUTES) {
      const outcome = await this.transport.send('GET', route.base, route.path, undefined, {
        signal,
        allowList: true,
      });
      if (!outcome.ok) {
        if (outcome.error instanceof CancelledError) throw outcome.error;
        lastError = outcome.error;
        continue;
      }
      const ids = (listRecords(outcome.body) ?? [])
        .map((record) => extractIdentifier(record))
        .filter((id): id is string => id !== null);
      return [...new Set(ids)];
    }
    throw lastError ?? new SchemaError('No running-profile listing route configured');
  }

  /**
   * Force-stop every running profile.
   */
  async stopAll(signal?: AbortSignal): Promise<StopAllResult> {
    const running = await this.listRunning(signal);
    const result: StopAllResult = { stopped: [], failed: [] };
    log.info('Stopping running profiles', { count: running.length });

    for (const handle of running) {
      const stopped = await this.forceStop(handle, 3, TIMEOUTS.FORCE_STOP_INITIAL, signal);
      (stopped ? result.stopped : result.failed).push(handle);
    }
    return result;
  }

  // ============================================
  // UNLOCKED PRIMITIVES
  // ============================================

  private requestStart(payload: JsonObject, signal?: AbortSignal): Promise<RequestOutcome> {
    return this.transport.send('POST', START_ROUTE.base, START_ROUTE.path, payload, { signal });
  }

  private async forceStopUnlocked(
    handle: ProfileHandle,
    retries: number,
    initialWaitMs: number,
    signal?: AbortSignal
  ): Promise<boolean> {
    const maxAttempts = Math.max(1, retries);
    try {
      return await withRetry(
        async (attempt) => {
          let lastError: ControlApiError = new SchemaError('No force-stop route configured');
          for (const route of forceStopRoutes(handle, attempt === maxAttempts)) {
            const outcome = await this.transport.send('POST', route.base, route.path, { uuid: handle }, { signal });
            if (outcome.ok) {
              log.info('Profile force-stopped', { profileId: handle, base: route.base, path: route.path, attempt });
              return true;
            }
            if (outcome.error instanceof CancelledError) {
              throw outcome.error;
            }
            lastError = outcome.error;
            log.debug('Force-stop route failed', { profileId: handle, path: route.path, attempt });
          }
          throw lastError;
        },
        {
          maxAttempts,
          initialDelayMs: initialWaitMs,
          retryOn: () => true,
          signal,
          sleep: this.sleep,
        }
      );
    } catch (error) {
      if (error instanceof CancelledError || !isControlApiError(error)) {
        throw error;
      }
      log.warn('Force-stop failed', { profileId: handle, attempts: maxAttempts, error: error.message });
      return false;
    }
  }
}
