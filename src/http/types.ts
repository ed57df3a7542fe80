/**
 * HTTP request and response types carried through the pipeline.
 */

import type { BlobStorageError } from "../errors.js";
import { HttpHeaders, type RawHeaders } from "./headers.js";

export type HttpMethod = "GET" | "HEAD" | "PUT" | "POST" | "DELETE" | "PATCH" | "OPTIONS";

/**
 * Request body. Async iterables are read once and buffered before the first
 * attempt so that retries resend identical bytes.
 */
export type RequestBody = string | Uint8Array | AsyncIterable<Uint8Array>;

/**
 * Buffered request body.
 */
export type BufferedBody = string | Uint8Array;

/**
 * Which host an attempt was sent to.
 */
export type RetryTarget = "primary" | "secondary";

/**
 * Attempt bookkeeping stamped by the retry policy on each per-try copy.
 */
export interface TryInfo {
  /** 1-based attempt number within the operation. */
  readonly tryNumber: number;
  readonly target: RetryTarget;
  /** Epoch millis when the operation's first attempt was prepared. */
  readonly operationStartedAt: number;
}

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers: HttpHeaders;
  body?: RequestBody;
  /** Opaque caller data; policies pass it through untouched. */
  context: Record<string, unknown>;
  /** Cancels the whole operation, including any pending retry delay. */
  abortSignal?: AbortSignal;
  tryInfo?: TryInfo;
}

export interface HttpResponse {
  status: number;
  headers: HttpHeaders;
  body: Uint8Array;
  request: HttpRequest;
  /** The decoded service error of a non-2xx response. */
  error?: BlobStorageError;
}

/**
 * Options for {@link createRequest}.
 */
export interface CreateRequestOptions {
  headers?: RawHeaders | HttpHeaders;
  body?: RequestBody;
  context?: Record<string, unknown>;
  abortSignal?: AbortSignal;
}

/**
 * Create a request.
 */
export function createRequest(
  method: HttpMethod,
  url: string,
  options: CreateRequestOptions = {}
): HttpRequest {
  return {
    method,
    url,
    headers: new HttpHeaders(options.headers),
    body: options.body,
    context: options.context ?? {},
    abortSignal: options.abortSignal,
  };
}

/**
 * Copy a request with its own header map. The body is shared, so callers
 * must buffer it first when the copy will be resent.
 */
export function cloneRequest(request: HttpRequest, overrides: Partial<HttpRequest> = {}): HttpRequest {
  return {
    ...request,
    headers: request.headers.clone(),
    ...overrides,
  };
}

export function isBufferedBody(body: RequestBody | undefined): body is BufferedBody | undefined {
  return body === undefined || typeof body === "string" || body instanceof Uint8Array;
}

/**
 * Read a streaming body into memory. Buffered bodies are returned as-is.
 */
export async function bufferBody(body: RequestBody | undefined): Promise<BufferedBody | undefined> {
  if (isBufferedBody(body)) {
    return body;
  }
  const chunks: Uint8Array[] = [];
  for await (const chunk of body) {
    chunks.push(chunk);
  }
  return Buffer.concat(chunks);
}

/**
 * Return a copy of the request whose body can be read any number of times.
 */
export async function bufferRequest(request: HttpRequest): Promise<HttpRequest> {
  if (isBufferedBody(request.body)) {
    return request;
  }
  return { ...request, body: await bufferBody(request.body) };
}

/**
 * Byte length of a buffered body, or undefined for a streaming one.
 */
export function bodyLength(body: RequestBody | undefined): number | undefined {
  if (body === undefined) return 0;
  if (typeof body === "string") return Buffer.byteLength(body, "utf8");
  if (body instanceof Uint8Array) return body.byteLength;
  return undefined;
}

/**
 * Helper to check if response is successful (2xx status).
 */
export function isSuccess(response: HttpResponse): boolean {
  return response.status >= 200 && response.status < 300;
}

export function bodyAsText(response: HttpResponse): string {
  return Buffer.from(response.body).toString("utf8");
}
