/**
 * Control API Transport
 *
 * One HTTP call against either the local agent or the cloud API, with:
 * - explicit base selection per call
 * - per-call timeout merged with the caller's abort signal
 * - bounded retries with exponential backoff for network failures and 502/503/504
 * - Retry-After handling for 429
 * - classification of every failure into the error taxonomy
 *
 * The transport keeps no state between calls and is safe for concurrent use.
 */

import {
  CancelledError,
  ClientError,
  NetworkError,
  RateLimitedError,
  SchemaError,
  ServerError,
  truncatePreview,
  type TransportError,
} from '../types/errors.js';
import {
  isJsonObject,
  type HttpMethod,
  type JsonObject,
  type JsonValue,
  type RequestOutcome,
  type ServiceBase,
} from '../types/endpoint.js';
import {
  DEFAULT_CLOUD_BASE_URL,
  DEFAULT_LOCAL_BASE_URL,
  DEFAULT_TOKEN_HEADER,
} from '../utils/config-schemas.js';
import { logger } from '../utils/logger.js';
import {
  exponentialDelay,
  mergeAbortSignals,
  sleep as timerSleep,
  type SleepFn,
} from '../utils/retry.js';
import { TIMEOUTS } from '../utils/timeouts.js';

const log = logger.transport;

const RETRYABLE_STATUSES = new Set([502, 503, 504]);

/**
 * The subset of `fetch` the transport relies on.
 */
export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

/**
 * Per-call options
 */
export interface SendOptions {
  signal?: AbortSignal;
  /** Accept a top-level JSON array as a valid body */
  allowList?: boolean;
  /** Override the configured per-call timeout */
  timeoutMs?: number;
  /** Override the configured retry budget */
  maxRetries?: number;
}

/**
 * Single-request contract used by every higher layer.
 */
export interface ControlApiTransport {
  send(
    method: HttpMethod,
    base: ServiceBase,
    path: string,
    body?: JsonObject,
    options?: SendOptions
  ): Promise<RequestOutcome>;

  /** Absolute URL of a base, for reports */
  baseUrl(base: ServiceBase): string;
}

export interface HttpTransportOptions {
  localBaseUrl?: string;
  cloudBaseUrl?: string;
  apiToken?: string;
  tokenHeader?: string;
  requestTimeoutMs?: number;
  /** Retries beyond the first attempt */
  maxRetries?: number;
  fetch?: FetchFn;
  sleep?: SleepFn;
}

interface RawResponse {
  status: number;
  retryAfter: string | null;
  text: string;
}

/**
 * Wait before retrying a 429. Numeric Retry-After is in seconds.
 */
export function rateLimitDelayMs(retryAfter: string | null): number {
  if (retryAfter !== null && retryAfter.trim() !== '') {
    const seconds = Number(retryAfter);
    if (Number.isFinite(seconds)) {
      return Math.max(seconds * 1000, TIMEOUTS.RATE_LIMIT_MIN);
    }
  }
  return TIMEOUTS.RATE_LIMIT_DEFAULT;
}

/**
 * Backoff for network failures and 502/503/504: 1s, 2s, 4s, 8s, 8s...
 */
export function networkBackoffMs(retryIndex: number): number {
  return exponentialDelay(retryIndex, 1000, TIMEOUTS.REQUEST_BACKOFF_MAX);
}

/**
 * Parse a 2xx body. Empty bodies are `{}`.
 */
export function parseSuccessBody(
  text: string,
  allowList: boolean
): JsonObject | JsonValue[] | SchemaError {
  if (text.trim() === '') {
    return {};
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return new SchemaError('Response body is not JSON', text);
  }
  if (isJsonObject(parsed)) {
    return parsed;
  }
  if (allowList && Array.isArray(parsed)) {
    return parsed;
  }
  return new SchemaError(
    allowList ? 'Response body is neither a JSON object nor a list' : 'Response body is not a JSON object',
    text
  );
}

/**
 * fetch-based transport for the profile control service.
 *
 * @example
 * ```ts
 * const transport = new HttpControlApiTransport({ apiToken: 'test-secret' });
 * const outcome = await transport.send('GET', 'local', '/api/profiles/active');
 * if (outcome.ok) console.log(outcome.body);
 * ```
 */
export class HttpControlApiTransport implements ControlApiTransport {
  private readonly bases: Record<ServiceBase, string>;
  private readonly apiToken?: string;
  private readonly tokenHeader: string;
  private readonly requestTimeoutMs: number;
  private readonly maxRetries: number;
  private readonly fetchFn: FetchFn;
  private readonly sleep: SleepFn;

  constructor(options: HttpTransportOptions = {}) {
    this.bases = {
      local: (options.localBaseUrl ?? DEFAULT_LOCAL_BASE_URL).replace(/\/+$/, ''),
      cloud: (options.cloudBaseUrl ?? DEFAULT_CLOUD_BASE_URL).replace(/\/+$/, ''),
    };
    this.apiToken = options.apiToken;
    this.tokenHeader = options.tokenHeader ?? DEFAULT_TOKEN_HEADER;
    this.requestTimeoutMs = options.requestTimeoutMs ?? TIMEOUTS.REQUEST;
    this.maxRetries = options.maxRetries ?? 3;
    this.fetchFn = options.fetch ?? ((url, init) => fetch(url, init));
    this.sleep = options.sleep ?? timerSleep;
  }

  baseUrl(base: ServiceBase): string {
    return this.bases[base];
  }

  async send(
    method: HttpMethod,
    base: ServiceBase,
    path: string,
    body?: JsonObject,
    options: SendOptions = {}
  ): Promise<RequestOutcome> {
    const url = `${this.bases[base]}${path}`;
    const maxRetries = options.maxRetries ?? this.maxRetries;
    const timeoutMs = options.timeoutMs ?? this.requestTimeoutMs;
    const context = { base, method, path };

    for (let attempt = 0; ; attempt++) {
      if (options.signal?.aborted) {
        return this.fail(new CancelledError());
      }

      let raw: RawResponse;
      try {
        raw = await this.fetchOnce(url, method, body, timeoutMs, options.signal);
      } catch (error) {
        if (options.signal?.aborted) {
          return this.fail(new CancelledError());
        }
        const failure = new NetworkError(
          `${method} ${url} failed: ${error instanceof Error ? error.message : String(error)}`,
          { cause: error }
        );
        const delay = networkBackoffMs(attempt);
        if (attempt >= maxRetries) {
          log.warn('Network failure, retries exhausted', { ...context, attempt, error: failure.message });
          return this.fail(failure);
        }
        log.debug('Network failure, retrying', { ...context, attempt, retryDelayMs: delay });
        const cancelled = await this.wait(delay, options.signal);
        if (cancelled) return this.fail(cancelled);
        continue;
      }

      const { status, text } = raw;

      if (status >= 200 && status < 300) {
        const parsed = parseSuccessBody(text, options.allowList ?? false);
        if (parsed instanceof SchemaError) {
          log.debug('Unexpected response body', { ...context, status });
          return this.fail(parsed);
        }
        log.debug('Request succeeded', { ...context, status, attempt });
        return { ok: true, status, body: parsed };
      }

      if (status === 429) {
        const delay = rateLimitDelayMs(raw.retryAfter);
        if (attempt >= maxRetries) {
          log.warn('Rate limited, retries exhausted', { ...context, attempt });
          return this.fail(
            new RateLimitedError(`${method} ${path} rate limited (429)`, delay, text)
          );
        }
        log.info('Rate limited, waiting', { ...context, attempt, retryDelayMs: delay });
        const cancelled = await this.wait(delay, options.signal);
        if (cancelled) return this.fail(cancelled);
        continue;
      }

      if (RETRYABLE_STATUSES.has(status)) {
        const delay = networkBackoffMs(attempt);
        if (attempt >= maxRetries) {
          log.warn('Server unavailable, retries exhausted', { ...context, status, attempt });
          return this.fail(new ServerError(`${method} ${path} returned ${status}`, status, text));
        }
        log.debug('Server unavailable, retrying', { ...context, status, attempt, retryDelayMs: delay });
        const cancelled = await this.wait(delay, options.signal);
        if (cancelled) return this.fail(cancelled);
        continue;
      }

      const preview = truncatePreview(text);
      log.debug('Request rejected', { ...context, status });
      return this.fail(
        status >= 500
          ? new ServerError(`${method} ${path} returned ${status}`, status, preview)
          : new ClientError(`${method} ${path} returned ${status}`, status, preview)
      );
    }
  }

  private fail(error: TransportError): RequestOutcome {
    return { ok: false, error };
  }

  /**
   * Sleep, returning the CancelledError instead of throwing it.
   */
  private async wait(ms: number, signal?: AbortSignal): Promise<CancelledError | null> {
    try {
      await this.sleep(ms, signal);
      return null;
    } catch (error) {
      if (error instanceof CancelledError) {
        return error;
      }
      throw error;
    }
  }

  private async fetchOnce(
    url: string,
    method: HttpMethod,
    body: JsonObject | undefined,
    timeoutMs: number,
    signal?: AbortSignal
  ): Promise<RawResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    const headers: Record<string, string> = { Accept: 'application/json' };
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }
    if (this.apiToken) {
      headers[this.tokenHeader] = this.apiToken;
    }

    const merged = signal ? mergeAbortSignals(signal, controller.signal) : undefined;

    try {
      const response = await this.fetchFn(url, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: merged ? merged.signal : controller.signal,
      });
      const text = await response.text();
      return { status: response.status, retryAfter: response.headers.get('retry-after'), text };
    } catch (error) {
      if (controller.signal.aborted && !signal?.aborted) {
        throw new Error(`timed out after ${timeoutMs}ms`, { cause: error });
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
      merged?.dispose();
    }
  }
}
