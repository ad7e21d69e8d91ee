/**
 * remote-profile-client
 *
 * Drives a remote browser-profile control service and resolves started
 * profiles to reachable Chrome DevTools Protocol endpoints.
 */

export { ProfileClient, createProfileClient, type ProfileClientOptions } from './sdk.js';

// Core
export {
  HttpControlApiTransport,
  parseSuccessBody,
  rateLimitDelayMs,
  networkBackoffMs,
  type ControlApiTransport,
  type FetchFn,
  type HttpTransportOptions,
  type SendOptions,
} from './core/transport.js';
export {
  bodyText,
  extractEndpointFields,
  extractIdentifier,
  findProfileRecord,
  isExplicitFailure,
  listRecords,
  parsePort,
  portFromWebSocketUrl,
  type EndpointFields,
} from './core/response-shape.js';
export {
  DEFAULT_SCAN_PORTS,
  DIAGNOSTIC_SCAN_PORTS,
  PortProbe,
  tcpConnect,
  type PortProbeOptions,
  type TcpConnector,
} from './core/port-probe.js';
export {
  createPollingSources,
  createRunningSources,
  findFirst,
  listingSource,
  recordSource,
  type EndpointSource,
  type Route,
  type SourceHit,
} from './core/endpoint-catalog.js';
export {
  CLOUD_CREATE_WAITS_MS,
  ProfileLifecycleCoordinator,
  buildCreatePayload,
  deepMerge,
  type ProfileLifecycleOptions,
  type StopAllResult,
} from './core/profile-lifecycle.js';
export {
  DEFAULT_RESOLUTION_POLICY,
  EndpointResolver,
  buildStartPayload,
  type EndpointProbe,
  type EndpointResolverOptions,
  type ResolutionPolicy,
  type StartController,
} from './core/endpoint-resolver.js';
export { connectToEndpoint, resolveWebSocketUrl, type CdpConnectOptions, type CdpSession } from './core/cdp-connector.js';
export {
  diagnoseService,
  verdictFor,
  type DiagnoseOptions,
  type EndpointCheck,
  type ServiceDiagnosis,
  type ServiceVerdict,
} from './core/service-diagnostics.js';

// Types
export * from './types/errors.js';
export * from './types/endpoint.js';

// Utilities
export { ConfigValidationError, type AppConfig } from './utils/config-schemas.js';
export { parseAppConfig, getAppConfig, clearConfigCache } from './utils/env-parser.js';
export { configureLogger, logger, Logger, type LogLevel } from './utils/logger.js';
export { KeyedMutex } from './utils/keyed-mutex.js';
export { sleep, withRetry, type RetryOptions, type SleepFn } from './utils/retry.js';
