/**
 * Decodes service error responses into typed errors.
 *
 * The payload and its headers pass through untouched: a `Content-Encoding`
 * on this service describes how the blob was stored, so inflating it would
 * change the bytes the caller asked for.
 */

import { parseStorageError } from "../errors.js";
import { isSuccess, type HttpRequest, type HttpResponse } from "../http/types.js";
import type { NextPolicy, PipelinePolicy } from "../pipeline/policy.js";

export class DecodingPolicy implements PipelinePolicy {
  readonly name = "decoding";

  async send(request: HttpRequest, next: NextPolicy): Promise<HttpResponse> {
    const response = await next(request);
    if (isSuccess(response) || response.error) {
      return response;
    }
    return { ...response, error: parseStorageError(response) };
  }
}
