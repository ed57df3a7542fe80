/**
 * Default network transport built on undici.
 */

import { request as undiciRequest, type Dispatcher } from "undici";
import { BlobStorageError, TransientTransportError, abortedOperationError } from "../errors.js";
import { HttpHeaders } from "../http/headers.js";
import { bufferBody, type HttpRequest, type HttpResponse } from "../http/types.js";
import type { HttpTransport } from "./types.js";

export interface UndiciTransportOptions {
  /** Connection pool or agent; undici's global dispatcher when omitted. */
  dispatcher?: Dispatcher;
  /** Time to wait for response headers. */
  headersTimeoutMs?: number;
  /** Idle time allowed between body chunks. */
  bodyTimeoutMs?: number;
}

/**
 * Sends requests with `undici.request` and reads the whole body into memory.
 */
export class UndiciTransport implements HttpTransport {
  private readonly options: UndiciTransportOptions;

  constructor(options: UndiciTransportOptions = {}) {
    this.options = options;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    const signal = request.abortSignal;
    if (signal?.aborted) {
      throw abortedOperationError(signal);
    }

    try {
      const body = await bufferBody(request.body);
      const response = await undiciRequest(request.url, {
        method: request.method,
        headers: request.headers.toRecord(),
        body,
        signal,
        dispatcher: this.options.dispatcher,
        headersTimeout: this.options.headersTimeoutMs,
        bodyTimeout: this.options.bodyTimeoutMs,
      });

      const data = new Uint8Array(await response.body.arrayBuffer());

      return {
        status: response.statusCode,
        headers: new HttpHeaders(response.headers),
        body: data,
        request,
      };
    } catch (error) {
      if (signal?.aborted) {
        throw abortedOperationError(signal);
      }
      if (error instanceof BlobStorageError) {
        throw error;
      }
      const code = errorCode(error);
      const message = error instanceof Error ? error.message : String(error);
      throw new TransientTransportError(`Network error${code ? ` (${code})` : ""}: ${message}`, {
        cause: error,
      });
    }
  }
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}
