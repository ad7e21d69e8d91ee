/**
 * Data model shared by the transport, the lifecycle coordinator and the
 * endpoint resolver.
 */

import { SchemaError, type ControlApiError, type TransportError } from './errors.js';

/**
 * Opaque identifier of a profile, issued by the control service on creation.
 */
export type ProfileHandle = string;

/**
 * The two service roots a request can target.
 */
export type ServiceBase = 'cloud' | 'local';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

// ============================================
// JSON VALUES
// ============================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonObject | JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ============================================
// REQUEST OUTCOME
// ============================================

export interface RequestSuccess {
  ok: true;
  status: number;
  body: JsonObject | JsonValue[];
}

export interface RequestFailure {
  ok: false;
  error: TransportError;
}

/**
 * Tagged result of one transport call.
 */
export type RequestOutcome = RequestSuccess | RequestFailure;

// ============================================
// RESOLVED ENDPOINT
// ============================================

/**
 * A confirmed remote-debugging endpoint for a started profile.
 * When present, `webSocketUrl` is authoritative.
 */
export interface ResolvedEndpoint {
  readonly profileId: ProfileHandle;
  readonly port: number;
  readonly webSocketUrl?: string;
}

export function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port > 0 && port <= 65535;
}

/**
 * The only way to build a ResolvedEndpoint. Rejects anything that is not a
 * usable TCP port instead of producing a partial value.
 */
export function createResolvedEndpoint(
  profileId: ProfileHandle,
  port: number,
  webSocketUrl?: string | null
): ResolvedEndpoint {
  if (!isValidPort(port)) {
    throw new SchemaError(`Refusing to build an endpoint for ${profileId} with port ${port}`);
  }
  const trimmed = webSocketUrl?.trim();
  return Object.freeze(
    trimmed ? { profileId, port, webSocketUrl: trimmed } : { profileId, port }
  );
}

// ============================================
// INPUTS FROM CALLERS
// ============================================

/**
 * Profile creation specification.
 * `overrides` are deep-merged into the creation payload last.
 */
export interface ProfileCreateSpec {
  title: string;
  os: string;
  osVersion?: string;
  userAgent?: string;
  tags?: string[];
  overrides?: JsonObject;
}

export interface ProxyCreateSpec {
  host: string;
  port: number;
  type?: 'http' | 'https' | 'socks5';
  login?: string;
  password?: string;
}

export interface StartOptions {
  headless?: boolean;
  /** Browser command-line flags passed through to the service */
  flags?: string[];
  /** Permit the port range scan when the API never reports a port */
  allowPortScan?: boolean;
  /** Operator-supplied debug port, requested from the service and validated */
  manualPort?: number;
  /** Aborts the resolution at the next network call or wait */
  signal?: AbortSignal;
}

// ============================================
// RESOLUTION ATTEMPT
// ============================================

/**
 * Read-only view of a resolution attempt, attached to terminal errors.
 */
export interface ResolutionAttemptSnapshot {
  startAttempts: number;
  pollRounds: number;
  waitedMs: number;
  zombieDetected: boolean;
  forceStops: number;
  pathsTried: string[];
  lastFailure?: string;
}

/**
 * Transient record of one pass through the resolver. Owned by a single
 * resolve() call and dropped when it returns.
 */
export class ResolutionAttempt {
  startAttempts = 0;
  pollRounds = 0;
  waitedMs = 0;
  zombieDetected = false;
  forceStops = 0;
  lastFailure: ControlApiError | null = null;
  private readonly paths: string[] = [];

  constructor(public readonly profileId: ProfileHandle) {}

  recordPath(name: string): void {
    this.paths.push(name);
  }

  recordFailure(error: ControlApiError): void {
    this.lastFailure = error;
  }

  recordWait(ms: number): void {
    this.waitedMs += ms;
  }

  snapshot(): ResolutionAttemptSnapshot {
    return {
      startAttempts: this.startAttempts,
      pollRounds: this.pollRounds,
      waitedMs: this.waitedMs,
      zombieDetected: this.zombieDetected,
      forceStops: this.forceStops,
      pathsTried: [...this.paths],
      lastFailure: this.lastFailure?.detail,
    };
  }
}
