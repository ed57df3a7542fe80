/**
 * Blob Storage Error Types
 *
 * Error hierarchy shared by the pipeline, the credential policies, the SAS
 * builders and the URL clients.
 */

import type { HttpResponse } from "./http/types.js";

/**
 * Base error options.
 */
export interface BlobStorageErrorOptions {
  statusCode?: number;
  requestId?: string;
  retryable?: boolean;
  cause?: unknown;
}

/**
 * Base Blob Storage error class.
 */
export class BlobStorageError extends Error {
  public readonly code: string;
  public readonly statusCode?: number;
  public readonly requestId?: string;
  public readonly retryable: boolean;
  public override readonly cause?: unknown;

  constructor(message: string, code: string, options?: BlobStorageErrorOptions) {
    super(message);
    this.name = "BlobStorageError";
    this.code = code;
    this.statusCode = options?.statusCode;
    this.requestId = options?.requestId;
    this.retryable = options?.retryable ?? false;
    this.cause = options?.cause;
    Object.setPrototypeOf(this, BlobStorageError.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      requestId: this.requestId,
      retryable: this.retryable,
    };
  }
}

/**
 * The account key is not usable HMAC key material.
 */
export class InvalidKeyError extends BlobStorageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "InvalidKey", { cause: options?.cause });
    this.name = "InvalidKeyError";
    Object.setPrototypeOf(this, InvalidKeyError.prototype);
  }
}

/**
 * A caller-supplied argument is malformed or out of range.
 */
export class InvalidArgumentError extends BlobStorageError {
  public readonly argument?: string;

  constructor(message: string, argument?: string, options?: { cause?: unknown }) {
    super(message, "InvalidArgument", { cause: options?.cause });
    this.name = "InvalidArgumentError";
    this.argument = argument;
    Object.setPrototypeOf(this, InvalidArgumentError.prototype);
  }
}

/**
 * Network failure or a transient server status (500, 503).
 */
export class TransientTransportError extends BlobStorageError {
  constructor(message: string, options?: BlobStorageErrorOptions & { code?: string }) {
    super(message, options?.code ?? "TransientTransport", {
      ...options,
      retryable: true,
    });
    this.name = "TransientTransportError";
    Object.setPrototypeOf(this, TransientTransportError.prototype);
  }
}

/**
 * Any other non-2xx response. Never retried.
 */
export class TerminalHttpError extends BlobStorageError {
  public readonly response?: HttpResponse;

  constructor(
    message: string,
    code: string,
    options: BlobStorageErrorOptions & { statusCode: number; response?: HttpResponse }
  ) {
    super(message, code, { ...options, retryable: false });
    this.name = "TerminalHttpError";
    this.response = options.response;
    Object.setPrototypeOf(this, TerminalHttpError.prototype);
  }
}

/**
 * Which deadline expired.
 */
export type TimeoutScope = "try" | "operation";

/**
 * A per-try timeout (recoverable) or the caller's deadline (fatal).
 */
export class TimeoutError extends BlobStorageError {
  public readonly scope: TimeoutScope;
  public readonly timeoutMs?: number;

  constructor(message: string, scope: TimeoutScope, options?: { timeoutMs?: number; cause?: unknown }) {
    super(message, "Timeout", { retryable: scope === "try", cause: options?.cause });
    this.name = "TimeoutError";
    this.scope = scope;
    this.timeoutMs = options?.timeoutMs;
    Object.setPrototypeOf(this, TimeoutError.prototype);
  }
}

/**
 * The caller cancelled the operation.
 */
export class RequestAbortedError extends BlobStorageError {
  constructor(message: string = "The operation was aborted", options?: { cause?: unknown }) {
    super(message, "Aborted", { cause: options?.cause });
    this.name = "RequestAbortedError";
    Object.setPrototypeOf(this, RequestAbortedError.prototype);
  }
}

/**
 * Build the error that ends an operation whose caller signal fired.
 */
export function abortedOperationError(signal: AbortSignal): BlobStorageError {
  const reason: unknown = signal.reason;
  if (reason instanceof BlobStorageError) {
    return reason;
  }
  // AbortSignal.timeout() aborts with a DOMException named TimeoutError
  if (typeof reason === "object" && reason !== null && "name" in reason && reason.name === "TimeoutError") {
    return new TimeoutError("The operation deadline expired", "operation", { cause: reason });
  }
  return new RequestAbortedError(undefined, { cause: reason });
}

/**
 * Parse a storage error from a final non-2xx response.
 */
export function parseStorageError(response: HttpResponse): BlobStorageError {
  const status = response.status;
  const requestId = response.headers.get("x-ms-request-id");
  let errorCode = response.headers.get("x-ms-error-code");
  let errorMessage = `HTTP ${status}`;

  const body = Buffer.from(response.body).toString("utf8");
  if (body.includes("<Error>")) {
    const codeMatch = body.match(/<Code>([^<]+)<\/Code>/);
    const messageMatch = body.match(/<Message>([^<]+)<\/Message>/);
    if (codeMatch?.[1]) errorCode = codeMatch[1];
    if (messageMatch?.[1]) errorMessage = messageMatch[1];
  }

  if (status === 500 || status === 503) {
    return new TransientTransportError(errorMessage, {
      code: errorCode ?? (status === 500 ? "InternalError" : "ServerBusy"),
      statusCode: status,
      requestId,
    });
  }

  return new TerminalHttpError(errorMessage, errorCode ?? `HTTP_${status}`, {
    statusCode: status,
    requestId,
    response,
  });
}

/**
 * Check if an error is worth another attempt.
 */
export function isRetryable(error: unknown): boolean {
  if (error instanceof TimeoutError) {
    return error.scope === "try";
  }
  if (error instanceof TransientTransportError) {
    return true;
  }
  return false;
}
