/**
 * CDP Connector - hand-off from a resolved endpoint to page automation
 *
 * Connects Playwright to an already running profile over CDP and reuses its
 * first page. Disconnecting leaves the profile running.
 */

import type { Browser, Page } from 'playwright-core';
import { CdpConnectionError } from '../types/errors.js';
import type { ResolvedEndpoint } from '../types/endpoint.js';
import { logger } from '../utils/logger.js';
import { TIMEOUTS } from '../utils/timeouts.js';
import type { PortProbe } from './port-probe.js';

const log = logger.connector;

type PlaywrightCore = typeof import('playwright-core');

export interface CdpSession {
  readonly endpoint: ResolvedEndpoint;
  readonly webSocketUrl: string;
  readonly browser: Browser;
  readonly page: Page;
  /** Close the CDP connection. The profile keeps running. */
  disconnect(): Promise<void>;
}

export interface CdpConnectOptions {
  probe?: Pick<PortProbe, 'discoverWebSocketUrl'>;
  timeoutMs?: number;
}

/**
 * WebSocket URL of an endpoint, derived from its port when absent.
 */
export async function resolveWebSocketUrl(
  endpoint: ResolvedEndpoint,
  probe?: Pick<PortProbe, 'discoverWebSocketUrl'>
): Promise<string> {
  if (endpoint.webSocketUrl) {
    return endpoint.webSocketUrl;
  }
  const discovered = probe ? await probe.discoverWebSocketUrl(endpoint.port) : null;
  if (discovered === null) {
    throw new CdpConnectionError(
      `No WebSocket address for profile ${endpoint.profileId} and none discoverable on port ${endpoint.port}`
    );
  }
  return discovered;
}

async function loadPlaywright(): Promise<PlaywrightCore> {
  try {
    return await import('playwright-core');
  } catch (error) {
    throw new CdpConnectionError('playwright-core is not installed', { cause: error });
  }
}

/**
 * Connect to a started profile over CDP.
 *
 * @example
 * ```ts
 * const endpoint = await coordinator.start(id, { allowPortScan: true });
 * const session = await connectToEndpoint(endpoint, { probe });
 * await session.page.goto('https://example.com');
 * await session.disconnect();
 * ```
 */
export async function connectToEndpoint(
  endpoint: ResolvedEndpoint,
  options: CdpConnectOptions = {}
): Promise<CdpSession> {
  const webSocketUrl = await resolveWebSocketUrl(endpoint, options.probe);
  const playwright = await loadPlaywright();

  log.info('Connecting over CDP', { profileId: endpoint.profileId, port: endpoint.port });

  let browser: Browser;
  try {
    browser = await playwright.chromium.connectOverCDP(webSocketUrl, {
      timeout: options.timeoutMs ?? TIMEOUTS.CDP_CONNECT,
    });
  } catch (error) {
    throw new CdpConnectionError(
      `Failed to connect over CDP: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }

  const [context] = browser.contexts();
  if (context === undefined) {
    await browser.close();
    throw new CdpConnectionError(`No browser contexts in profile ${endpoint.profileId}`);
  }

  const [existing] = context.pages();
  const page = existing ?? (await context.newPage());
  log.debug(existing ? 'Reusing existing page' : 'Opened new page', { profileId: endpoint.profileId });

  return {
    endpoint,
    webSocketUrl,
    browser,
    page,
    async disconnect() {
      await browser.close();
      log.info('Disconnected from profile', { profileId: endpoint.profileId });
    },
  };
}
