/**
 * Remote Profile Client SDK
 *
 * Wires the transport, the port probe and the lifecycle coordinator from
 * validated configuration.
 *
 * Usage:
 * ```typescript
 * import { createProfileClient } from 'remote-profile-client';
 *
 * const client = createProfileClient();
 * const id = await client.profiles.create({ title: 'scan-1', os: 'android', osVersion: '13' });
 * const endpoint = await client.profiles.start(id, { allowPortScan: true });
 * const session = await client.connect(endpoint);
 * await session.disconnect();
 * await client.profiles.stop(id);
 * ```
 */

import { connectToEndpoint, type CdpSession } from './core/cdp-connector.js';
import { ProfileLifecycleCoordinator } from './core/profile-lifecycle.js';
import { PortProbe, type TcpConnector } from './core/port-probe.js';
import { diagnoseService, type DiagnoseOptions, type ServiceDiagnosis } from './core/service-diagnostics.js';
import { HttpControlApiTransport, type FetchFn } from './core/transport.js';
import type { ResolvedEndpoint, StartOptions } from './types/endpoint.js';
import type { ResolutionPolicy } from './core/endpoint-resolver.js';
import type { AppConfig } from './utils/config-schemas.js';
import { getAppConfig } from './utils/env-parser.js';
import { configureLogger } from './utils/logger.js';
import type { SleepFn } from './utils/retry.js';

// =============================================================================
// SDK CONFIGURATION
// =============================================================================

export interface ProfileClientOptions {
  /** Validated configuration (default: process.env, parsed once per process) */
  config?: AppConfig;
  /** Replaces global fetch for control API and discovery calls */
  fetch?: FetchFn;
  /** Replaces the TCP connector of the port probe */
  connector?: TcpConnector;
  sleep?: SleepFn;
  policy?: Partial<ResolutionPolicy>;
}

// =============================================================================
// SDK CLIENT
// =============================================================================

export class ProfileClient {
  readonly config: AppConfig;
  readonly transport: HttpControlApiTransport;
  readonly probe: PortProbe;
  readonly profiles: ProfileLifecycleCoordinator;

  constructor(options: ProfileClientOptions = {}) {
    this.config = options.config ?? getAppConfig();
    const { client, probe } = this.config;

    this.transport = new HttpControlApiTransport({
      localBaseUrl: client.localBaseUrl,
      cloudBaseUrl: client.cloudBaseUrl,
      apiToken: client.apiToken,
      tokenHeader: client.tokenHeader,
      requestTimeoutMs: client.requestTimeoutMs,
      maxRetries: client.maxRetries,
      fetch: options.fetch,
      sleep: options.sleep,
    });
    this.probe = new PortProbe({
      host: probe.host,
      connectTimeoutMs: probe.connectTimeoutMs,
      httpTimeoutMs: probe.httpTimeoutMs,
      connector: options.connector,
      fetch: options.fetch,
    });
    this.profiles = new ProfileLifecycleCoordinator({
      transport: this.transport,
      probe: this.probe,
      sleep: options.sleep,
      policy: options.policy,
    });
  }

  /**
   * Start options with the configured manual port and scan permission
   * applied where the caller left them unset.
   */
  startOptions(options: StartOptions = {}): StartOptions {
    const { resolution } = this.config;
    return {
      ...options,
      allowPortScan: options.allowPortScan ?? resolution.allowPortScan,
      manualPort: options.manualPort ?? resolution.manualPort,
    };
  }

  diagnose(options: DiagnoseOptions = {}): Promise<ServiceDiagnosis> {
    return diagnoseService(this.transport, this.probe, options);
  }

  connect(endpoint: ResolvedEndpoint): Promise<CdpSession> {
    return connectToEndpoint(endpoint, { probe: this.probe });
  }
}

/**
 * Create a client from configuration, applying its log settings.
 */
export function createProfileClient(options: ProfileClientOptions = {}): ProfileClient {
  const client = new ProfileClient(options);
  configureLogger({ level: client.config.log.level, prettyPrint: client.config.log.prettyPrint });
  return client;
}
