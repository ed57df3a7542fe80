/**
 * Blob Storage Simulation Module
 *
 * In-process transport stand-in for tests and offline use.
 */

import { HttpHeaders, type RawHeaders } from "../http/headers.js";
import type { HttpMethod, HttpRequest, HttpResponse } from "../http/types.js";
import { abortedOperationError } from "../errors.js";
import type { HttpTransport } from "../transport/types.js";

/**
 * A response before the transport attaches the request to it.
 */
export type MockResponse = Omit<HttpResponse, "request">;

export type MockHandler = (request: HttpRequest) => MockResponse | Promise<MockResponse>;

interface RegisteredHandler {
  method: HttpMethod;
  pattern: string | RegExp;
  handler: MockHandler;
}

type QueuedOutcome = MockResponse | Error;

/**
 * Mock transport that returns configurable responses.
 *
 * Resolution order: queued outcomes first, then registered handlers (first
 * match wins), then the default handler, then an empty 404.
 */
export class MockTransport implements HttpTransport {
  private handlers: RegisteredHandler[] = [];
  private defaultHandler?: MockHandler;
  private queue: QueuedOutcome[] = [];
  private calls: HttpRequest[] = [];

  /**
   * Register a handler for a method and a URL substring or pattern.
   */
  on(method: HttpMethod, urlPattern: string | RegExp, handler: MockHandler): this {
    this.handlers.push({ method, pattern: urlPattern, handler });
    return this;
  }

  /**
   * Set default handler for unmatched requests.
   */
  onDefault(handler: MockHandler): this {
    this.defaultHandler = handler;
    return this;
  }

  /**
   * Queue responses or errors, consumed one per request.
   */
  enqueue(...outcomes: QueuedOutcome[]): this {
    this.queue.push(...outcomes);
    return this;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    this.calls.push(request);

    const signal = request.abortSignal;
    if (signal?.aborted) {
      throw abortedOperationError(signal);
    }

    const queued = this.queue.shift();
    if (queued instanceof Error) {
      throw queued;
    }
    if (queued) {
      return { ...queued, request };
    }

    const handler = this.findHandler(request) ?? this.defaultHandler;
    if (handler) {
      return { ...(await handler(request)), request };
    }

    return { ...createResponse(404), request };
  }

  /**
   * Get all requests that were sent.
   */
  getCalls(): HttpRequest[] {
    return [...this.calls];
  }

  get callCount(): number {
    return this.calls.length;
  }

  /**
   * Clear all handlers, queued outcomes and calls.
   */
  clear(): void {
    this.handlers = [];
    this.defaultHandler = undefined;
    this.queue = [];
    this.calls = [];
  }

  private findHandler(request: HttpRequest): MockHandler | undefined {
    for (const { method, pattern, handler } of this.handlers) {
      if (method !== request.method) continue;
      const matches = typeof pattern === "string" ? request.url.includes(pattern) : pattern.test(request.url);
      if (matches) {
        return handler;
      }
    }
    return undefined;
  }
}

/**
 * Create a response with an optional UTF-8 or binary body.
 */
export function createResponse(status: number, body: Uint8Array | string = "", headers: RawHeaders = {}): MockResponse {
  return {
    status,
    headers: new HttpHeaders(headers),
    body: typeof body === "string" ? Buffer.from(body, "utf8") : body,
  };
}

/**
 * Create a storage error response with an XML body.
 */
export function createErrorResponse(status: number, code: string, message: string): MockResponse {
  const body = `<?xml version="1.0" encoding="utf-8"?>
<Error>
  <Code>${code}</Code>
  <Message>${message}</Message>
</Error>`;

  return createResponse(status, body, {
    "content-type": "application/xml",
    "x-ms-error-code": code,
  });
}
