/**
 * Endpoint Catalog
 *
 * Route tables of the control service and the ordered, named strategies used
 * to read a profile's debug endpoint. The service exposes the same data under
 * several paths whose availability differs between versions and bases, so
 * every lookup is a list tried in order with early exit.
 */

import { CancelledError } from '../types/errors.js';
import type { ProfileHandle, ServiceBase } from '../types/endpoint.js';
import { logger } from '../utils/logger.js';
import { throwIfAborted } from '../utils/retry.js';
import {
  extractEndpointFields,
  findProfileRecord,
  type EndpointFields,
} from './response-shape.js';
import type { ControlApiTransport } from './transport.js';

const log = logger.catalog;

export interface Route {
  base: ServiceBase;
  path: string;
}

// ============================================
// ROUTES
// ============================================

export const START_ROUTE: Route = { base: 'local', path: '/api/profiles/start' };

export const CREATE_PATH = '/api/v2/automation/profiles';
export const DELETE_ROUTE: Route = { base: 'cloud', path: '/api/v2/automation/profiles' };
export const PROXY_ROUTE: Route = { base: 'cloud', path: '/api/v2/automation/proxies' };

export const ONE_TIME_ROUTES: readonly Route[] = [
  { base: 'cloud', path: '/api/v2/automation/profiles/one-time' },
  { base: 'cloud', path: '/api/v2/automation/one-time-profile' },
  { base: 'cloud', path: '/api/v2/profiles/one-time' },
];

/**
 * Running-profile listings on the local agent.
 */
export const RUNNING_LIST_ROUTES: readonly Route[] = [
  { base: 'local', path: '/api/profiles/active' },
  { base: 'local', path: '/api/profiles' },
];

export function stopRoutes(handle: ProfileHandle): Route[] {
  return [
    { base: 'local', path: '/api/profiles/stop' },
    { base: 'local', path: '/api/profiles/force_stop' },
    { base: 'local', path: `/api/v2/automation/profiles/${handle}/stop` },
    { base: 'local', path: `/api/profiles/${handle}/stop` },
  ];
}

/**
 * Force-stop routes for one attempt. The last attempt also asks the cloud.
 */
export function forceStopRoutes(handle: ProfileHandle, finalAttempt: boolean): Route[] {
  const routes: Route[] = [
    { base: 'local', path: '/api/profiles/force_stop' },
    { base: 'local', path: '/api/profiles/stop' },
    { base: 'local', path: `/api/v2/automation/profiles/${handle}/stop` },
  ];
  if (finalAttempt) {
    routes.push({ base: 'cloud', path: `/api/v2/automation/profiles/${handle}/stop` });
  }
  return routes;
}

// ============================================
// ENDPOINT SOURCES
// ============================================

/**
 * One named way of reading a profile's endpoint.
 * Returns null when this source has nothing; throws only CancelledError.
 */
export interface EndpointSource {
  readonly name: string;
  read(handle: ProfileHandle, signal?: AbortSignal): Promise<EndpointFields | null>;
}

export interface SourceHit {
  source: string;
  fields: EndpointFields;
}

/**
 * GET a single profile record and read its endpoint fields.
 */
export function recordSource(
  transport: ControlApiTransport,
  base: ServiceBase,
  pathFor: (handle: ProfileHandle) => string
): EndpointSource {
  return {
    name: `${base} GET ${pathFor('{id}')}`,
    async read(handle, signal) {
      const outcome = await transport.send('GET', base, pathFor(handle), undefined, {
        signal,
        maxRetries: 0,
      });
      if (!outcome.ok) {
        if (outcome.error instanceof CancelledError) throw outcome.error;
        log.debug('Record read failed', { profileId: handle, base, error: outcome.error.message });
        return null;
      }
      return extractEndpointFields(outcome.body);
    },
  };
}

/**
 * GET a listing, locate the profile's record and read its endpoint fields.
 */
export function listingSource(
  transport: ControlApiTransport,
  base: ServiceBase,
  path: string
): EndpointSource {
  return {
    name: `${base} GET ${path}`,
    async read(handle, signal) {
      const outcome = await transport.send('GET', base, path, undefined, {
        signal,
        allowList: true,
        maxRetries: 0,
      });
      if (!outcome.ok) {
        if (outcome.error instanceof CancelledError) throw outcome.error;
        log.debug('Listing read failed', { profileId: handle, base, path, error: outcome.error.message });
        return null;
      }
      const record = findProfileRecord(outcome.body, handle);
      return record === null ? null : extractEndpointFields(record);
    },
  };
}

/**
 * Sources consulted between polling rounds after an ambiguous start.
 */
export function createPollingSources(transport: ControlApiTransport): EndpointSource[] {
  return [
    recordSource(transport, 'cloud', (id) => `/api/v2/automation/profiles/${id}`),
    recordSource(transport, 'local', (id) => `/api/v2/automation/profiles/${id}`),
    recordSource(transport, 'local', (id) => `/api/v2/profiles/${id}`),
    recordSource(transport, 'local', (id) => `/api/v2/automation/profiles/${id}/status`),
    recordSource(transport, 'local', (id) => `/api/v2/profiles/${id}/status`),
    listingSource(transport, 'local', '/api/v2/automation/profiles'),
    listingSource(transport, 'local', '/api/v2/profiles'),
    listingSource(transport, 'local', '/api/v2/automation/profiles/active'),
    listingSource(transport, 'local', '/api/v2/profiles/active'),
  ];
}

/**
 * Sources consulted when the service reports the profile as already running.
 * Local stores first, then the cloud.
 */
export function createRunningSources(transport: ControlApiTransport): EndpointSource[] {
  return [
    ...RUNNING_LIST_ROUTES.map((route) => listingSource(transport, route.base, route.path)),
    recordSource(transport, 'local', (id) => `/api/profiles/${id}`),
    recordSource(transport, 'local', (id) => `/api/v2/profiles/${id}`),
    recordSource(transport, 'local', (id) => `/api/v2/automation/profiles/${id}`),
    listingSource(transport, 'local', '/api/v2/profiles'),
    listingSource(transport, 'local', '/api/v2/automation/profiles'),
    recordSource(transport, 'cloud', (id) => `/api/v2/automation/profiles/${id}`),
    listingSource(transport, 'cloud', '/api/v2/automation/profiles'),
  ];
}

/**
 * Evaluate sources in order and stop at the first that yields a port.
 */
export async function findFirst(
  sources: readonly EndpointSource[],
  handle: ProfileHandle,
  signal?: AbortSignal,
  onTry?: (name: string) => void
): Promise<SourceHit | null> {
  for (const source of sources) {
    throwIfAborted(signal);
    onTry?.(source.name);
    const fields = await source.read(handle, signal);
    if (fields !== null) {
      log.debug('Endpoint source hit', { profileId: handle, source: source.name, port: fields.port });
      return { source: source.name, fields };
    }
  }
  return null;
}
