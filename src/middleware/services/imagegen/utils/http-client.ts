/**
 * HTTP transport used by all providers.
 *
 * Each send() is one fetch call; nothing is kept open between calls. Tests
 * replace the client with an in-process fake.
 */

export type HttpMethod = 'GET' | 'POST';

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  /** JSON string or multipart form */
  body?: string | FormData;
  /** Abort the request after this many milliseconds */
  timeoutMs?: number;
}

/**
 * The subset of the fetch Response the providers read
 */
export interface HttpResponse {
  readonly status: number;
  readonly ok: boolean;
  text(): Promise<string>;
  json(): Promise<unknown>;
  arrayBuffer(): Promise<ArrayBuffer>;
}

export interface HttpClient {
  send(request: HttpRequest, signal?: AbortSignal): Promise<HttpResponse>;
}

export class FetchHttpClient implements HttpClient {
  async send(request: HttpRequest, signal?: AbortSignal): Promise<HttpResponse> {
    const controller = new AbortController();
    const forwardAbort = () => controller.abort(signal?.reason);

    if (signal) {
      if (signal.aborted) {
        controller.abort(signal.reason);
      } else {
        signal.addEventListener('abort', forwardAbort, { once: true });
      }
    }

    const timeout = request.timeoutMs
      ? setTimeout(
          () => controller.abort(new Error(`Request timeout after ${request.timeoutMs}ms`)),
          request.timeoutMs
        )
      : undefined;

    try {
      return await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
      });
    } finally {
      if (timeout) {
        clearTimeout(timeout);
      }
      signal?.removeEventListener('abort', forwardAbort);
    }
  }
}

/**
 * Build a URL with query parameters appended
 */
export function withQuery(url: string, query?: Record<string, string>): string {
  if (!query || Object.keys(query).length === 0) {
    return url;
  }
  const search = new URLSearchParams(query).toString();
  return `${url}${url.includes('?') ? '&' : '?'}${search}`;
}

/**
 * Strip trailing slashes from a base URL
 */
export function normalizeBaseUrl(url: string): string {
  return url.replace(/\/+$/, '');
}
