/**
 * Port Probe - CDP liveness checks and range scanning
 *
 * A port is live when a TCP connection succeeds and `GET /json/version`
 * answers 200 with a non-empty `webSocketDebuggerUrl`. Probing never mutates
 * service state.
 */

import * as net from 'node:net';
import { CancelledError } from '../types/errors.js';
import {
  createResolvedEndpoint,
  isJsonObject,
  type ProfileHandle,
  type ResolvedEndpoint,
} from '../types/endpoint.js';
import { logger } from '../utils/logger.js';
import { mergeAbortSignals, throwIfAborted } from '../utils/retry.js';
import { TIMEOUTS } from '../utils/timeouts.js';
import type { FetchFn } from './transport.js';

const log = logger.probe;

/**
 * Resolves true when a TCP connection to host:port opens within the timeout.
 */
export type TcpConnector = (port: number, host: string, timeoutMs: number) => Promise<boolean>;

function range(from: number, to: number): number[] {
  return Array.from({ length: to - from + 1 }, (_, index) => from + index);
}

/**
 * Service-managed debug ports first, then the conventional Chrome range.
 */
export const DEFAULT_SCAN_PORTS: readonly number[] = Object.freeze([
  ...range(52000, 53200),
  ...range(9222, 9350),
]);

/**
 * Short range used by service diagnostics.
 */
export const DIAGNOSTIC_SCAN_PORTS: readonly number[] = Object.freeze([
  ...range(52000, 52100),
  ...range(9222, 9232),
]);

export const tcpConnect: TcpConnector = (port, host, timeoutMs) =>
  new Promise((resolve) => {
    const socket = net.createConnection({ port, host });
    const finish = (open: boolean) => {
      socket.removeAllListeners();
      socket.destroy();
      resolve(open);
    };
    socket.setTimeout(timeoutMs);
    socket.once('connect', () => finish(true));
    socket.once('timeout', () => finish(false));
    socket.once('error', () => finish(false));
  });

export interface PortProbeOptions {
  host?: string;
  connectTimeoutMs?: number;
  httpTimeoutMs?: number;
  connector?: TcpConnector;
  fetch?: FetchFn;
}

export class PortProbe {
  private readonly host: string;
  private readonly connectTimeoutMs: number;
  private readonly httpTimeoutMs: number;
  private readonly connector: TcpConnector;
  private readonly fetchFn: FetchFn;

  constructor(options: PortProbeOptions = {}) {
    this.host = options.host ?? '127.0.0.1';
    this.connectTimeoutMs = options.connectTimeoutMs ?? TIMEOUTS.PROBE_CONNECT;
    this.httpTimeoutMs = options.httpTimeoutMs ?? TIMEOUTS.PROBE_HTTP;
    this.connector = options.connector ?? tcpConnect;
    this.fetchFn = options.fetch ?? ((url, init) => fetch(url, init));
  }

  /**
   * TCP connect, then `/json/version` discovery.
   */
  async isLiveDebugPort(port: number, signal?: AbortSignal): Promise<boolean> {
    return (await this.liveWebSocketUrl(port, signal)) !== null;
  }

  /**
   * WebSocket URL of a live debug port, or null when the port is not live.
   */
  async liveWebSocketUrl(
    port: number,
    signal?: AbortSignal,
    connectTimeoutMs: number = this.connectTimeoutMs
  ): Promise<string | null> {
    throwIfAborted(signal);
    if (!(await this.connector(port, this.host, connectTimeoutMs))) {
      return null;
    }
    return this.discoverWebSocketUrl(port, signal);
  }

  /**
   * `webSocketDebuggerUrl` from `/json/version`, or null.
   */
  async discoverWebSocketUrl(port: number, signal?: AbortSignal): Promise<string | null> {
    throwIfAborted(signal);
    const url = `http://${this.host}:${port}/json/version`;
    const timeout = AbortSignal.timeout(this.httpTimeoutMs);
    const merged = signal ? mergeAbortSignals(signal, timeout) : undefined;

    try {
      const response = await this.fetchFn(url, {
        method: 'GET',
        signal: merged ? merged.signal : timeout,
      });
      if (response.status !== 200) {
        log.debug('Discovery endpoint rejected', { port, status: response.status });
        return null;
      }
      const data: unknown = await response.json();
      const socket = isJsonObject(data) ? data.webSocketDebuggerUrl : undefined;
      return typeof socket === 'string' && socket.trim() !== '' ? socket.trim() : null;
    } catch (error) {
      if (signal?.aborted) {
        throw new CancelledError();
      }
      log.debug('Discovery failed', {
        port,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    } finally {
      merged?.dispose();
    }
  }

  /**
   * First live port in order, as an endpoint for `handle`.
   */
  async scanRange(
    handle: ProfileHandle,
    ports: readonly number[] = DEFAULT_SCAN_PORTS,
    perPortTimeoutMs: number = TIMEOUTS.SCAN_PER_PORT,
    signal?: AbortSignal
  ): Promise<ResolvedEndpoint | null> {
    const startTime = Date.now();
    log.info('Scanning for a live debug port', { profileId: handle, candidates: ports.length });

    for (const port of ports) {
      const webSocketUrl = await this.liveWebSocketUrl(port, signal, perPortTimeoutMs);
      if (webSocketUrl !== null) {
        log.timed('Live debug port found', startTime, { profileId: handle, port });
        return createResolvedEndpoint(handle, port, webSocketUrl);
      }
    }

    log.timed('No live debug port in range', startTime, { profileId: handle });
    return null;
  }

  /**
   * Every live port in order. Used for diagnostics, never for resolution.
   */
  async collectLivePorts(
    ports: readonly number[] = DIAGNOSTIC_SCAN_PORTS,
    perPortTimeoutMs: number = TIMEOUTS.SCAN_PER_PORT,
    signal?: AbortSignal
  ): Promise<number[]> {
    const live: number[] = [];
    for (const port of ports) {
      if ((await this.liveWebSocketUrl(port, signal, perPortTimeoutMs)) !== null) {
        live.push(port);
      }
    }
    return live;
  }
}
