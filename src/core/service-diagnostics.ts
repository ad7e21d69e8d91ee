/**
 * Service Diagnostics
 *
 * Read-only health report of the control service: is the local agent
 * answering, is the cloud API accepting the token, and which CDP ports are
 * live right now.
 */

import { CancelledError } from '../types/errors.js';
import type { ServiceBase } from '../types/endpoint.js';
import { logger } from '../utils/logger.js';
import type { PortProbe } from './port-probe.js';
import type { ControlApiTransport } from './transport.js';

const log = logger.diagnostics;

export const LOCAL_CHECK_PATHS: readonly string[] = [
  '/api/profiles',
  '/api/v2/automation/profiles',
  '/api/profiles/active',
];

export const CLOUD_CHECK_PATH = '/api/v2/automation/profiles';

export interface EndpointCheck {
  base: ServiceBase;
  path: string;
  ok: boolean;
  status?: number;
  error?: string;
}

/**
 * - ready: local agent and cloud API both answer
 * - local-only: profiles can be started but not created
 * - unavailable: the local agent does not answer
 */
export type ServiceVerdict = 'ready' | 'local-only' | 'unavailable';

export interface ServiceDiagnosis {
  verdict: ServiceVerdict;
  localReachable: boolean;
  cloudReachable: boolean;
  checks: EndpointCheck[];
  livePorts: number[];
}

export interface DiagnoseOptions {
  ports?: readonly number[];
  perPortTimeoutMs?: number;
  signal?: AbortSignal;
}

async function check(
  transport: ControlApiTransport,
  base: ServiceBase,
  path: string,
  signal?: AbortSignal
): Promise<EndpointCheck> {
  const outcome = await transport.send('GET', base, path, undefined, {
    signal,
    allowList: true,
    maxRetries: 0,
  });
  if (outcome.ok) {
    return { base, path, ok: true, status: outcome.status };
  }
  if (outcome.error instanceof CancelledError) {
    throw outcome.error;
  }
  return {
    base,
    path,
    ok: false,
    status: outcome.error.httpStatus,
    error: outcome.error.message,
  };
}

export function verdictFor(localReachable: boolean, cloudReachable: boolean): ServiceVerdict {
  if (!localReachable) return 'unavailable';
  return cloudReachable ? 'ready' : 'local-only';
}

export async function diagnoseService(
  transport: ControlApiTransport,
  probe: Pick<PortProbe, 'collectLivePorts'>,
  options: DiagnoseOptions = {}
): Promise<ServiceDiagnosis> {
  const { signal } = options;
  const checks: EndpointCheck[] = [];

  let localReachable = false;
  for (const path of LOCAL_CHECK_PATHS) {
    const result = await check(transport, 'local', path, signal);
    checks.push(result);
    if (result.ok) {
      localReachable = true;
      break;
    }
  }

  const cloud = await check(transport, 'cloud', CLOUD_CHECK_PATH, signal);
  checks.push(cloud);

  const livePorts = await probe.collectLivePorts(options.ports, options.perPortTimeoutMs, signal);

  const verdict = verdictFor(localReachable, cloud.ok);
  log.info('Service diagnosis complete', {
    verdict,
    localReachable,
    cloudReachable: cloud.ok,
    livePorts: livePorts.length,
  });

  return { verdict, localReachable, cloudReachable: cloud.ok, checks, livePorts };
}
