/**
 * Base class of the URL clients: a resource URL plus the pipeline that
 * carries requests to it.
 */

import { HeaderNames, STORAGE_VERSION } from "../config/constants.js";
import { parseStorageError } from "../errors.js";
import type { HttpHeaders } from "../http/headers.js";
import { createRequest, isSuccess, type HttpMethod, type HttpResponse, type RequestBody } from "../http/types.js";
import type { Pipeline } from "../pipeline/pipeline.js";
import { parseBlobUrl } from "../url/blob-url-parts.js";
import type { OperationOptions } from "./models.js";

export interface StorageRequest {
  method: HttpMethod;
  url?: string;
  body?: RequestBody;
  /** Fills in operation-specific headers on the outgoing request. */
  headers?: (headers: HttpHeaders) => void;
  options?: OperationOptions;
}

export abstract class StorageUrl {
  readonly url: string;
  readonly pipeline: Pipeline;

  /**
   * @throws InvalidArgumentError when `url` is not an absolute URL
   */
  protected constructor(url: string, pipeline: Pipeline) {
    parseBlobUrl(url);
    this.url = url;
    this.pipeline = pipeline;
  }

  /**
   * Send through the pipeline. Non-2xx responses become errors.
   */
  protected async send(request: StorageRequest): Promise<HttpResponse> {
    const outgoing = createRequest(request.method, request.url ?? this.url, {
      body: request.body,
      abortSignal: request.options?.abortSignal,
      context: request.options?.context,
    });
    outgoing.headers.set(HeaderNames.VERSION, STORAGE_VERSION);
    request.headers?.(outgoing.headers);

    const response = await this.pipeline.send(outgoing);
    if (!isSuccess(response)) {
      throw response.error ?? parseStorageError(response);
    }
    return response;
  }
}
