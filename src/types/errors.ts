/**
 * Error Taxonomy for the control API client
 *
 * Every failure that leaves the transport or the resolver is one of the
 * classes below. Each carries:
 * - a high-level category for classification
 * - a machine-readable code for programmatic handling
 * - a retryability indicator
 */

import type { ResolutionAttemptSnapshot } from './endpoint.js';

/**
 * High-level error categories for classification
 */
export type ErrorCategory =
  | 'network'      // Connection failures, timeouts
  | 'rate_limit'   // HTTP 429 after the retry budget
  | 'http'         // Non-2xx responses that are not retried
  | 'schema'       // Body did not have the expected shape
  | 'endpoint'     // No debug endpoint could be confirmed
  | 'cancelled'    // Caller aborted the operation
  | 'internal';    // Anything thrown that is not classified

/**
 * Machine-readable error codes for programmatic handling
 */
export type ErrorCode =
  | 'NETWORK_FAILURE'
  | 'RATE_LIMIT_EXCEEDED'
  | 'HTTP_CLIENT_ERROR'
  | 'HTTP_SERVER_ERROR'
  | 'SCHEMA_UNEXPECTED_BODY'
  | 'ENDPOINT_OPERATOR_INPUT_REQUIRED'  // supply a manual port or allow scanning
  | 'ENDPOINT_NOT_FOUND'
  | 'ENDPOINT_ZOMBIE_PROFILE'
  | 'RESOLUTION_FAILED'
  | 'OPERATION_CANCELLED'
  | 'CDP_CONNECT_FAILED'
  | 'INTERNAL_ERROR';

/**
 * Structured form of an error, for logs and reports
 */
export interface StructuredError {
  error: string;
  name: string;
  category: ErrorCategory;
  code: ErrorCode;
  retryable: boolean;
  httpStatus?: number;
  bodyPreview?: string;
  diagnostics?: ResolutionAttemptSnapshot;
}

/** Body previews are cut to this many characters. */
export const BODY_PREVIEW_LIMIT = 2000;

export function truncatePreview(text: string, limit: number = BODY_PREVIEW_LIMIT): string {
  return text.length > limit ? text.slice(0, limit) : text;
}

/**
 * Base class of every classified failure.
 */
export abstract class ControlApiError extends Error {
  abstract readonly category: ErrorCategory;
  abstract readonly code: ErrorCode;
  readonly retryable: boolean = false;
  readonly httpStatus?: number;
  readonly bodyPreview?: string;

  /**
   * Message plus body preview, used to match service error signatures
   * such as "already running" or "limit_reached".
   */
  get detail(): string {
    return this.bodyPreview ? `${this.message} ${this.bodyPreview}` : this.message;
  }

  toJSON(): StructuredError {
    return {
      error: this.message,
      name: this.name,
      category: this.category,
      code: this.code,
      retryable: this.retryable,
      httpStatus: this.httpStatus,
      bodyPreview: this.bodyPreview,
    };
  }
}

// ============================================
// TRANSPORT ERRORS
// ============================================

export class NetworkError extends ControlApiError {
  readonly category = 'network';
  readonly code = 'NETWORK_FAILURE';
  override readonly retryable = true;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NetworkError';
  }
}

export class RateLimitedError extends ControlApiError {
  readonly category = 'rate_limit';
  readonly code = 'RATE_LIMIT_EXCEEDED';
  override readonly retryable = true;
  override readonly httpStatus = 429;
  override readonly bodyPreview: string;

  constructor(
    message: string,
    public readonly retryAfterMs: number | undefined,
    bodyPreview: string
  ) {
    super(message);
    this.name = 'RateLimitedError';
    this.bodyPreview = truncatePreview(bodyPreview);
  }
}

export class ClientError extends ControlApiError {
  readonly category = 'http';
  readonly code = 'HTTP_CLIENT_ERROR';
  override readonly httpStatus: number;
  override readonly bodyPreview: string;

  constructor(message: string, status: number, bodyPreview: string) {
    super(message);
    this.name = 'ClientError';
    this.httpStatus = status;
    this.bodyPreview = truncatePreview(bodyPreview);
  }
}

export class ServerError extends ControlApiError {
  readonly category = 'http';
  readonly code = 'HTTP_SERVER_ERROR';
  override readonly retryable = true;
  override readonly httpStatus: number;
  override readonly bodyPreview: string;

  constructor(message: string, status: number, bodyPreview: string) {
    super(message);
    this.name = 'ServerError';
    this.httpStatus = status;
    this.bodyPreview = truncatePreview(bodyPreview);
  }
}

export class SchemaError extends ControlApiError {
  readonly category = 'schema';
  readonly code = 'SCHEMA_UNEXPECTED_BODY';
  override readonly bodyPreview?: string;

  constructor(message: string, bodyPreview?: string) {
    super(message);
    this.name = 'SchemaError';
    this.bodyPreview = bodyPreview === undefined ? undefined : truncatePreview(bodyPreview);
  }
}

export class CancelledError extends ControlApiError {
  readonly category = 'cancelled';
  readonly code = 'OPERATION_CANCELLED';

  constructor(message: string = 'Operation cancelled') {
    super(message);
    this.name = 'CancelledError';
  }
}

/**
 * The hand-off to page automation failed: no WebSocket address, the CDP
 * connection was refused, or the browser exposed no context.
 */
export class CdpConnectionError extends ControlApiError {
  readonly category = 'network';
  readonly code = 'CDP_CONNECT_FAILED';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CdpConnectionError';
  }
}

/**
 * Failures a single transport call can produce.
 */
export type TransportError =
  | NetworkError
  | RateLimitedError
  | ClientError
  | ServerError
  | SchemaError
  | CancelledError;

// ============================================
// RESOLUTION ERRORS
// ============================================

/**
 * What an operator can do about a missing endpoint.
 * - manual-port-or-scan: retry with a manual port or with scanning allowed
 * - none: probing already ran and found nothing
 */
export type EndpointRemedy = 'manual-port-or-scan' | 'none';

abstract class ResolutionError extends ControlApiError {
  readonly category: ErrorCategory = 'endpoint';

  constructor(
    message: string,
    public readonly profileId: string,
    public readonly diagnostics: ResolutionAttemptSnapshot,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }

  override toJSON(): StructuredError {
    return { ...super.toJSON(), diagnostics: this.diagnostics };
  }
}

export class NoEndpointFoundError extends ResolutionError {
  readonly code: ErrorCode;

  constructor(
    message: string,
    profileId: string,
    public readonly remedy: EndpointRemedy,
    diagnostics: ResolutionAttemptSnapshot
  ) {
    super(message, profileId, diagnostics);
    this.name = 'NoEndpointFoundError';
    this.code = remedy === 'manual-port-or-scan'
      ? 'ENDPOINT_OPERATOR_INPUT_REQUIRED'
      : 'ENDPOINT_NOT_FOUND';
  }
}

export class ZombieProfileUnrecoverableError extends ResolutionError {
  readonly code = 'ENDPOINT_ZOMBIE_PROFILE';

  constructor(message: string, profileId: string, diagnostics: ResolutionAttemptSnapshot) {
    super(message, profileId, diagnostics);
    this.name = 'ZombieProfileUnrecoverableError';
  }
}

/**
 * Terminal failure caused by an unexpected transport error.
 * The classified error is kept as `cause`.
 */
export class ResolutionFailedError extends ResolutionError {
  readonly code = 'RESOLUTION_FAILED';
  override readonly cause: ControlApiError;

  constructor(
    message: string,
    profileId: string,
    cause: ControlApiError,
    diagnostics: ResolutionAttemptSnapshot
  ) {
    super(message, profileId, diagnostics, { cause });
    this.name = 'ResolutionFailedError';
    this.cause = cause;
  }

  override get detail(): string {
    return `${this.message} ${this.cause.detail}`;
  }
}

// ============================================
// SIGNATURE MATCHING
// ============================================

const ALREADY_RUNNING_MARKERS = ['already running', 'already started', 'already_started'];
const ZOMBIE_MARKERS = ['debug_port', 'ws_endpoint', 'no debug', 'not in get'];

/**
 * Whether the service reports the profile as already active.
 */
export function isAlreadyRunningSignal(text: string): boolean {
  const lower = text.toLowerCase();
  return ALREADY_RUNNING_MARKERS.some((marker) => lower.includes(marker));
}

/**
 * Whether an already-running report says the instance has no debug interface.
 */
export function isZombieSignal(text: string): boolean {
  if (!isAlreadyRunningSignal(text)) {
    return false;
  }
  const lower = text.toLowerCase();
  return ZOMBIE_MARKERS.some((marker) => lower.includes(marker));
}

export function isControlApiError(error: unknown): error is ControlApiError {
  return error instanceof ControlApiError;
}

/**
 * Convert anything thrown into a structured error for logs.
 */
export function toStructuredError(error: unknown): StructuredError {
  if (error instanceof ControlApiError) {
    return error.toJSON();
  }
  const message = error instanceof Error ? error.message : String(error);
  return {
    error: message,
    name: error instanceof Error ? error.name : 'Error',
    category: 'internal',
    code: 'INTERNAL_ERROR',
    retryable: false,
  };
}
