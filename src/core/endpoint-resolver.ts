/**
 * Endpoint Resolution State Machine
 *
 * Turns "start this profile" into a confirmed CDP endpoint:
 *
 *   Starting ─┬─ port in body ───────────────────────────────▶ Resolved
 *             ├─ 2xx without port ─▶ Polling ─┬─ port ───────▶ Resolved
 *             │                               └─ exhausted ──▶ Probing ─▶ Resolved | NoEndpoint
 *             ├─ already running ─┬─ found in running list ──▶ Resolved
 *             │                   └─ zombie ─▶ force-stop, settle ─▶ Starting
 *             ├─ 404 (sync lag) ─▶ Starting
 *             └─ anything else ──────────────────────────────▶ Failed
 *
 * Every wait and network call honours the caller's AbortSignal.
 */

import {
  CancelledError,
  ClientError,
  NoEndpointFoundError,
  ResolutionFailedError,
  SchemaError,
  ZombieProfileUnrecoverableError,
  isAlreadyRunningSignal,
  isControlApiError,
  isZombieSignal,
  type ControlApiError,
} from '../types/errors.js';
import {
  ResolutionAttempt,
  createResolvedEndpoint,
  isValidPort,
  type JsonObject,
  type ProfileHandle,
  type RequestOutcome,
  type ResolvedEndpoint,
  type StartOptions,
} from '../types/endpoint.js';
import { logger, type Logger } from '../utils/logger.js';
import { sleep as timerSleep, type SleepFn } from '../utils/retry.js';
import { TIMEOUTS } from '../utils/timeouts.js';
import { START_ROUTE, findFirst, type EndpointSource } from './endpoint-catalog.js';
import type { PortProbe } from './port-probe.js';
import {
  bodyText,
  extractEndpointFields,
  isExplicitFailure,
  type EndpointFields,
} from './response-shape.js';

const START_PATH_NAME = `${START_ROUTE.base} POST ${START_ROUTE.path}`;

/**
 * Lifecycle calls the resolver needs. Implementations must not take the
 * per-profile lock: resolution already runs under it.
 */
export interface StartController {
  requestStart(payload: JsonObject, signal?: AbortSignal): Promise<RequestOutcome>;
  forceStop(
    handle: ProfileHandle,
    retries: number,
    initialWaitMs: number,
    signal?: AbortSignal
  ): Promise<boolean>;
}

export type EndpointProbe = Pick<PortProbe, 'discoverWebSocketUrl' | 'liveWebSocketUrl' | 'scanRange'>;

/**
 * Counts and delays of the state machine, in milliseconds.
 */
export interface ResolutionPolicy {
  /** Start calls allowed across zombie recoveries; the last one is not followed by a force-stop */
  maxStartAttempts: number;
  pollAttempts: number;
  /** Wait before polling round `round` (1-based) */
  pollDelayMs: (round: number) => number;
  /** Settle time after the force-stop of start attempt `attempt` (1-based) */
  zombieSettleMs: (attempt: number) => number;
  /** Extra starts allowed while a new profile is still unknown locally */
  syncLagRetries: number;
  syncLagDelayMs: number;
  forceStopRetries: number;
  forceStopInitialWaitMs: number;
  scanPerPortTimeoutMs: number;
}

export const DEFAULT_RESOLUTION_POLICY: ResolutionPolicy = {
  maxStartAttempts: 3,
  pollAttempts: 5,
  pollDelayMs: (round) => TIMEOUTS.POLL_STEP * round,
  zombieSettleMs: (attempt) => TIMEOUTS.ZOMBIE_SETTLE_BASE + TIMEOUTS.ZOMBIE_SETTLE_STEP * (attempt - 1),
  syncLagRetries: 5,
  syncLagDelayMs: TIMEOUTS.SYNC_LAG,
  forceStopRetries: 3,
  forceStopInitialWaitMs: TIMEOUTS.ZOMBIE_FORCE_STOP_INITIAL,
  scanPerPortTimeoutMs: TIMEOUTS.SCAN_PER_PORT,
};

export interface EndpointResolverOptions {
  controller: StartController;
  probe: EndpointProbe;
  pollingSources: readonly EndpointSource[];
  runningSources: readonly EndpointSource[];
  sleep?: SleepFn;
  policy?: Partial<ResolutionPolicy>;
}

/**
 * Body of `POST /api/profiles/start`.
 */
export function buildStartPayload(handle: ProfileHandle, options: StartOptions = {}): JsonObject {
  return {
    uuid: handle,
    headless: options.headless ?? false,
    debug_port:
      options.manualPort !== undefined && isValidPort(options.manualPort) ? options.manualPort : true,
    timeout: TIMEOUTS.SERVICE_START_SECONDS,
    only_local: true,
    flags: [...(options.flags ?? [])],
  };
}

function isTerminal(error: unknown): boolean {
  return (
    error instanceof CancelledError ||
    error instanceof NoEndpointFoundError ||
    error instanceof ZombieProfileUnrecoverableError ||
    error instanceof ResolutionFailedError
  );
}

/**
 * Resolves started profiles to CDP endpoints.
 *
 * One instance serves any number of concurrent `resolve()` calls; all state
 * of a call lives in its own ResolutionAttempt.
 */
export class EndpointResolver {
  private readonly controller: StartController;
  private readonly probe: EndpointProbe;
  private readonly pollingSources: readonly EndpointSource[];
  private readonly runningSources: readonly EndpointSource[];
  private readonly sleep: SleepFn;
  private readonly policy: ResolutionPolicy;

  constructor(options: EndpointResolverOptions) {
    this.controller = options.controller;
    this.probe = options.probe;
    this.pollingSources = options.pollingSources;
    this.runningSources = options.runningSources;
    this.sleep = options.sleep ?? timerSleep;
    this.policy = { ...DEFAULT_RESOLUTION_POLICY, ...options.policy };
  }

  async resolve(handle: ProfileHandle, options: StartOptions = {}): Promise<ResolvedEndpoint> {
    const attempt = new ResolutionAttempt(handle);
    const log = logger.resolver.child({ profileId: handle });
    const startTime = Date.now();

    try {
      const endpoint = await this.run(handle, options, attempt, log);
      log.timed('Endpoint resolved', startTime, {
        port: endpoint.port,
        startAttempts: attempt.startAttempts,
        pollRounds: attempt.pollRounds,
      });
      return endpoint;
    } catch (error) {
      if (error instanceof CancelledError) {
        log.info('Endpoint resolution cancelled', { waitedMs: attempt.waitedMs });
        throw error;
      }
      if (isTerminal(error)) {
        throw error;
      }
      if (isControlApiError(error)) {
        attempt.recordFailure(error);
        throw new ResolutionFailedError(
          `Could not resolve an endpoint for profile ${handle}: ${error.message}`,
          handle,
          error,
          attempt.snapshot()
        );
      }
      throw error;
    }
  }

  private async run(
    handle: ProfileHandle,
    options: StartOptions,
    attempt: ResolutionAttempt,
    log: Logger
  ): Promise<ResolvedEndpoint> {
    const { signal } = options;
    const payload = buildStartPayload(handle, options);

    for (;;) {
      attempt.startAttempts++;
      const outcome = await this.startWithSyncLag(payload, attempt, signal, log);

      let failure: ControlApiError;
      if (outcome.ok) {
        if (!isExplicitFailure(outcome.body)) {
          const fields = extractEndpointFields(outcome.body);
          if (fields !== null) {
            return this.finish(handle, fields, 'start response', signal, log);
          }
          log.info('Start succeeded without a debug port, polling', { attempt: attempt.startAttempts });
          return this.pollAfterAmbiguousStart(handle, payload, options, attempt, log);
        }
        failure = new SchemaError('Start response reported success: false', bodyText(outcome.body));
      } else {
        failure = outcome.error;
      }

      if (failure instanceof CancelledError) {
        throw failure;
      }
      attempt.recordFailure(failure);

      if (!isAlreadyRunningSignal(failure.detail)) {
        log.warn('Profile start failed', { error: failure.message, code: failure.code });
        throw new ResolutionFailedError(
          `Could not start profile ${handle}: ${failure.message}`,
          handle,
          failure,
          attempt.snapshot()
        );
      }

      if (!isZombieSignal(failure.detail)) {
        log.info('Profile already running, reading running listings');
        const hit = await findFirst(this.runningSources, handle, signal, (name) => attempt.recordPath(name));
        if (hit !== null) {
          return this.finish(handle, hit.fields, hit.source, signal, log);
        }
      }

      attempt.zombieDetected = true;
      if (attempt.startAttempts >= this.policy.maxStartAttempts) {
        throw new ZombieProfileUnrecoverableError(
          `Profile ${handle} stayed running without a debug port after ${attempt.startAttempts} start attempts`,
          handle,
          attempt.snapshot()
        );
      }

      attempt.forceStops++;
      log.warn('Profile running without a debug interface, force-stopping', {
        attempt: attempt.startAttempts,
      });
      const stopped = await this.controller.forceStop(
        handle,
        this.policy.forceStopRetries,
        this.policy.forceStopInitialWaitMs,
        signal
      );
      if (!stopped) {
        log.warn('Force-stop did not confirm', { attempt: attempt.startAttempts });
      }
      await this.wait(this.policy.zombieSettleMs(attempt.startAttempts), attempt, signal);
    }
  }

  /**
   * Start call that tolerates the profile not yet being known locally.
   */
  private async startWithSyncLag(
    payload: JsonObject,
    attempt: ResolutionAttempt,
    signal: AbortSignal | undefined,
    log: Logger
  ): Promise<RequestOutcome> {
    for (let lag = 0; ; lag++) {
      attempt.recordPath(START_PATH_NAME);
      const outcome = await this.controller.requestStart(payload, signal);
      const notFound =
        !outcome.ok && outcome.error instanceof ClientError && outcome.error.httpStatus === 404;
      if (!notFound || lag >= this.policy.syncLagRetries) {
        return outcome;
      }
      attempt.recordFailure(outcome.error);
      log.debug('Profile not yet visible locally, retrying start', { attempt: lag + 1 });
      await this.wait(this.policy.syncLagDelayMs, attempt, signal);
    }
  }

  private async pollAfterAmbiguousStart(
    handle: ProfileHandle,
    payload: JsonObject,
    options: StartOptions,
    attempt: ResolutionAttempt,
    log: Logger
  ): Promise<ResolvedEndpoint> {
    const { signal } = options;

    for (let round = 1; round <= this.policy.pollAttempts; round++) {
      attempt.pollRounds = round;
      await this.wait(this.policy.pollDelayMs(round), attempt, signal);

      attempt.recordPath(START_PATH_NAME);
      const restart = await this.controller.requestStart(payload, signal);
      if (restart.ok) {
        const fields = isExplicitFailure(restart.body) ? null : extractEndpointFields(restart.body);
        if (fields !== null) {
          return this.finish(handle, fields, 'start response', signal, log);
        }
      } else if (restart.error instanceof CancelledError) {
        throw restart.error;
      } else {
        attempt.recordFailure(restart.error);
      }

      const hit = await findFirst(this.pollingSources, handle, signal, (name) => attempt.recordPath(name));
      if (hit !== null) {
        return this.finish(handle, hit.fields, hit.source, signal, log);
      }
      log.debug('No endpoint yet', { attempt: round });
    }

    return this.probeFallback(handle, options, attempt, log);
  }

  private async probeFallback(
    handle: ProfileHandle,
    options: StartOptions,
    attempt: ResolutionAttempt,
    log: Logger
  ): Promise<ResolvedEndpoint> {
    const { signal, manualPort } = options;

    if (manualPort !== undefined) {
      attempt.recordPath(`probe ${manualPort}`);
      const webSocketUrl = isValidPort(manualPort)
        ? await this.probe.liveWebSocketUrl(manualPort, signal)
        : null;
      if (webSocketUrl !== null) {
        log.info('Manual debug port confirmed', { port: manualPort });
        return createResolvedEndpoint(handle, manualPort, webSocketUrl);
      }
      throw new NoEndpointFoundError(
        `Manual debug port ${manualPort} is not a live CDP endpoint for profile ${handle}`,
        handle,
        'none',
        attempt.snapshot()
      );
    }

    if (options.allowPortScan) {
      attempt.recordPath('port scan');
      const found = await this.probe.scanRange(
        handle,
        undefined,
        this.policy.scanPerPortTimeoutMs,
        signal
      );
      if (found !== null) {
        return found;
      }
      throw new NoEndpointFoundError(
        `No live CDP port found for profile ${handle}`,
        handle,
        'none',
        attempt.snapshot()
      );
    }

    throw new NoEndpointFoundError(
      `Profile ${handle} started but the service never reported a debug port; ` +
        'supply a manual port or allow port scanning',
      handle,
      'manual-port-or-scan',
      attempt.snapshot()
    );
  }

  private async finish(
    handle: ProfileHandle,
    fields: EndpointFields,
    source: string,
    signal: AbortSignal | undefined,
    log: Logger
  ): Promise<ResolvedEndpoint> {
    const webSocketUrl =
      fields.webSocketUrl ?? (await this.probe.discoverWebSocketUrl(fields.port, signal));
    log.info('Debug port found', { port: fields.port, source });
    return createResolvedEndpoint(handle, fields.port, webSocketUrl);
  }

  private async wait(ms: number, attempt: ResolutionAttempt, signal?: AbortSignal): Promise<void> {
    await this.sleep(ms, signal);
    attempt.recordWait(ms);
  }
}
