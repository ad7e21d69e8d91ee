/**
 * Response Shape Resolver
 *
 * Pure extraction of identifiers, ports and WebSocket addresses from the
 * loosely-shaped bodies the control service returns. Keys are always read in
 * a fixed priority order; nothing is defaulted.
 */

import { isJsonObject, isValidPort, type JsonObject, type JsonValue } from '../types/endpoint.js';

/**
 * Endpoint data found in a response body.
 */
export interface EndpointFields {
  port: number;
  webSocketUrl?: string;
}

const IDENTIFIER_KEYS = ['uuid', 'id', 'profile_uuid', 'profileId'] as const;

const PORT_PATHS: readonly (readonly string[])[] = [
  ['debug_port'],
  ['selenium_port'],
  ['port'],
  ['webdriver_port'],
  ['ws', 'selenium'],
];

const WEBSOCKET_KEYS = ['ws_endpoint', 'webSocketDebuggerUrl', 'webdriver'] as const;

const LIST_KEYS = ['data', 'profiles', 'list'] as const;

/**
 * Accepts 9222, "9222" and "127.0.0.1:9222"; anything else is null.
 */
export function parsePort(value: unknown): number | null {
  if (typeof value === 'number') {
    return isValidPort(value) ? value : null;
  }
  if (typeof value !== 'string') {
    return null;
  }
  const trimmed = value.trim();
  const match = /^\d+$/.test(trimmed) ? trimmed : /:(\d+)$/.exec(trimmed)?.[1];
  if (match === undefined) {
    return null;
  }
  const port = Number.parseInt(match, 10);
  return isValidPort(port) ? port : null;
}

/**
 * Explicit port of a ws:// or wss:// URL.
 */
export function portFromWebSocketUrl(url: string): number | null {
  let parsed: URL;
  try {
    parsed = new URL(url.trim());
  } catch {
    return null;
  }
  if (parsed.protocol !== 'ws:' && parsed.protocol !== 'wss:') {
    return null;
  }
  return parsed.port === '' ? null : parsePort(parsed.port);
}

function envelopes(value: JsonObject): JsonObject[] {
  const data = value.data;
  return isJsonObject(data) ? [value, data] : [value];
}

function readPath(record: JsonObject, path: readonly string[]): JsonValue | undefined {
  let current: JsonValue | undefined = record;
  for (const key of path) {
    if (!isJsonObject(current)) {
      return undefined;
    }
    current = current[key];
  }
  return current;
}

function readPort(record: JsonObject): number | null {
  for (const path of PORT_PATHS) {
    const port = parsePort(readPath(record, path));
    if (port !== null) {
      return port;
    }
  }
  return null;
}

function readWebSocketUrl(record: JsonObject): string | undefined {
  for (const key of WEBSOCKET_KEYS) {
    const candidate = record[key];
    if (typeof candidate === 'string' && candidate.trim() !== '') {
      return candidate.trim();
    }
  }
  return undefined;
}

/**
 * Profile identifier, top level first, then `data`.
 */
export function extractIdentifier(value: unknown): string | null {
  if (!isJsonObject(value)) {
    return null;
  }
  for (const record of envelopes(value)) {
    for (const key of IDENTIFIER_KEYS) {
      const candidate = record[key];
      if (typeof candidate === 'string' && candidate.trim() !== '') {
        return candidate.trim();
      }
      if (typeof candidate === 'number' && Number.isFinite(candidate)) {
        return String(candidate);
      }
    }
  }
  return null;
}

/**
 * Port and WebSocket address from a body, top level first, then `data`.
 *
 * The first envelope holding a port wins and its WebSocket address is
 * preferred. Without any port key, a WebSocket URL with an explicit port
 * supplies it.
 */
export function extractEndpointFields(value: unknown): EndpointFields | null {
  if (!isJsonObject(value)) {
    return null;
  }
  const records = envelopes(value);
  const sockets = records.map(readWebSocketUrl);
  const fallbackSocket = sockets.find((socket) => socket !== undefined);

  for (const [index, record] of records.entries()) {
    const port = readPort(record);
    if (port !== null) {
      const webSocketUrl = sockets[index] ?? fallbackSocket;
      return webSocketUrl === undefined ? { port } : { port, webSocketUrl };
    }
  }

  for (const socket of sockets) {
    if (socket === undefined) continue;
    const port = portFromWebSocketUrl(socket);
    if (port !== null) {
      return { port, webSocketUrl: socket };
    }
  }
  return null;
}

/**
 * Items of a listing: `[...]`, `{data: [...]}`, `{profiles: [...]}` or `{list: [...]}`.
 */
export function listRecords(value: unknown): JsonObject[] | null {
  let items: JsonValue[] | null = null;
  if (Array.isArray(value)) {
    items = value;
  } else if (isJsonObject(value)) {
    for (const key of LIST_KEYS) {
      const candidate = value[key];
      if (Array.isArray(candidate)) {
        items = candidate;
        break;
      }
    }
  }
  return items === null ? null : items.filter(isJsonObject);
}

/**
 * Record for `id` inside a listing, or null.
 */
export function findProfileRecord(value: unknown, id: string): JsonObject | null {
  const records = listRecords(value);
  if (records === null) {
    return null;
  }
  return records.find((record) => extractIdentifier(record) === id) ?? null;
}

/**
 * Whether the body reports `success: false` despite a 2xx status.
 */
export function isExplicitFailure(value: unknown): boolean {
  return isJsonObject(value) && value.success === false;
}

/**
 * Text used when matching service error signatures in a body.
 */
export function bodyText(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value) ?? '';
}
