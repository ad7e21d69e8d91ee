/**
 * In-process stand-in for the control API.
 *
 * Replies are queued per `METHOD base path`; the last reply of a queue
 * repeats. Unscripted routes answer 404.
 */

import type { ControlApiTransport, SendOptions } from '../../src/core/transport.js';
import {
  CancelledError,
  ClientError,
  NetworkError,
  ServerError,
  type TransportError,
} from '../../src/types/errors.js';
import type {
  HttpMethod,
  JsonObject,
  JsonValue,
  RequestOutcome,
  ServiceBase,
} from '../../src/types/endpoint.js';
import type { SleepFn } from '../../src/utils/retry.js';

export type Reply =
  | RequestOutcome
  | ((body: JsonObject | undefined) => RequestOutcome | Promise<RequestOutcome>);

export interface RecordedCall {
  method: HttpMethod;
  base: ServiceBase;
  path: string;
  body?: JsonObject;
  options: SendOptions;
}

export function ok(body: JsonObject | JsonValue[], status: number = 200): RequestOutcome {
  return { ok: true, status, body };
}

export function fail(error: TransportError): RequestOutcome {
  return { ok: false, error };
}

export function clientError(status: number, text: string = ''): RequestOutcome {
  return fail(new ClientError(`request returned ${status}`, status, text));
}

export function serverError(status: number, text: string = ''): RequestOutcome {
  return fail(new ServerError(`request returned ${status}`, status, text));
}

export function networkError(message: string = 'connect ECONNREFUSED'): RequestOutcome {
  return fail(new NetworkError(message));
}

function key(method: HttpMethod, base: ServiceBase, path: string): string {
  return `${method} ${base} ${path}`;
}

export class FakeTransport implements ControlApiTransport {
  readonly calls: RecordedCall[] = [];
  private readonly replies = new Map<string, Reply[]>();

  on(method: HttpMethod, base: ServiceBase, path: string, ...replies: Reply[]): this {
    this.replies.set(key(method, base, path), replies);
    return this;
  }

  async send(
    method: HttpMethod,
    base: ServiceBase,
    path: string,
    body?: JsonObject,
    options: SendOptions = {}
  ): Promise<RequestOutcome> {
    this.calls.push({ method, base, path, body, options });
    if (options.signal?.aborted) {
      return fail(new CancelledError());
    }

    const queue = this.replies.get(key(method, base, path));
    if (queue === undefined || queue.length === 0) {
      return fail(new ClientError(`${method} ${path} returned 404`, 404, 'not found'));
    }
    const reply = queue.length > 1 ? queue.shift() : queue[0];
    if (reply === undefined) {
      return fail(new ClientError(`${method} ${path} returned 404`, 404, 'not found'));
    }
    return typeof reply === 'function' ? reply(body) : reply;
  }

  baseUrl(base: ServiceBase): string {
    return base === 'local' ? 'http://127.0.0.1:58888' : 'https://cloud.test';
  }

  /** `METHOD base path` of every call, in order */
  routes(): string[] {
    return this.calls.map((call) => key(call.method, call.base, call.path));
  }

  callsTo(method: HttpMethod, base: ServiceBase, path: string): RecordedCall[] {
    return this.calls.filter(
      (call) => call.method === method && call.base === base && call.path === path
    );
  }
}

/**
 * Sleep that returns immediately and records every requested wait.
 */
export function recordingSleep(): { sleep: SleepFn; waits: number[] } {
  const waits: number[] = [];
  const sleep: SleepFn = async (ms, signal) => {
    if (signal?.aborted) {
      throw new CancelledError();
    }
    waits.push(ms);
  };
  return { sleep, waits };
}

export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}
