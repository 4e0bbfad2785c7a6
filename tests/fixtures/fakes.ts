/**
 * In-process stand-ins for the network and the poll timer
 */

import {
  HttpClient,
  HttpRequest,
  HttpResponse,
} from '../../src/middleware/services/imagegen/utils/http-client';
import { AbortedWaitError, Timer } from '../../src/middleware/services/imagegen/utils/timer';

export interface FakeReply {
  status: number;
  /** JSON body */
  body?: unknown;
  /** Raw text body (takes precedence over `body`) */
  text?: string;
  /** Binary body */
  bytes?: Uint8Array;
}

export interface FakeResponse extends HttpResponse {
  /** Whether any body reader was called */
  readonly bodyRead: boolean;
}

export function fakeResponse(reply: FakeReply): FakeResponse {
  const text = reply.text ?? (reply.body === undefined ? '' : JSON.stringify(reply.body));
  let bodyRead = false;

  return {
    status: reply.status,
    ok: reply.status >= 200 && reply.status < 300,
    get bodyRead() {
      return bodyRead;
    },
    text: async () => {
      bodyRead = true;
      return text;
    },
    json: async (): Promise<unknown> => {
      bodyRead = true;
      return JSON.parse(text);
    },
    arrayBuffer: async () => {
      bodyRead = true;
      const bytes = reply.bytes ?? new Uint8Array(0);
      const copy = new ArrayBuffer(bytes.length);
      new Uint8Array(copy).set(bytes);
      return copy;
    },
  };
}

/**
 * Answers requests from a queue of scripted replies and records every request
 */
export class FakeHttpClient implements HttpClient {
  readonly requests: HttpRequest[] = [];
  readonly responses: FakeResponse[] = [];
  private readonly replies: Array<FakeReply | Error> = [];

  enqueue(...replies: Array<FakeReply | Error>): this {
    this.replies.push(...replies);
    return this;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    this.requests.push(request);
    const next = this.replies.shift();
    if (!next) {
      throw new Error(`Unexpected request: ${request.method} ${request.url}`);
    }
    if (next instanceof Error) {
      throw next;
    }
    const response = fakeResponse(next);
    this.responses.push(response);
    return response;
  }
}

/**
 * Records requested waits and resolves immediately
 */
export class FakeTimer implements Timer {
  readonly waits: number[] = [];
  onWait?: (count: number) => void;

  async wait(ms: number, signal?: AbortSignal): Promise<void> {
    this.waits.push(ms);
    this.onWait?.(this.waits.length);
    if (signal?.aborted) {
      throw new AbortedWaitError();
    }
  }
}

export function pending(count: number, body: unknown): FakeReply[] {
  return Array.from({ length: count }, () => ({ status: 200, body }));
}

export function jsonBody(request: HttpRequest): unknown {
  if (typeof request.body !== 'string') {
    throw new Error('Expected a JSON body');
  }
  return JSON.parse(request.body);
}

export function formBody(request: HttpRequest): FormData {
  if (!(request.body instanceof FormData)) {
    throw new Error('Expected a multipart body');
  }
  return request.body;
}

export async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected the promise to reject');
}
