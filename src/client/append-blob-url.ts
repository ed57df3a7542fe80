/**
 * Append blobs: blocks are only ever added at the end.
 */

import { HeaderNames } from "../config/constants.js";
import { InvalidArgumentError } from "../errors.js";
import { applyAccessConditions, applyLeaseConditions, type HttpAccessConditions } from "../http/conditions.js";
import type { RequestBody } from "../http/types.js";
import type { Pipeline } from "../pipeline/pipeline.js";
import { setUrlParameter } from "../url/blob-url-parts.js";
import { BlobUrl } from "./blob-url.js";
import {
  applyBlobHttpHeaders,
  applyMetadata,
  parseETagResponse,
  parseNumber,
  type AppendBlockResponse,
  type BlobHttpHeaders,
  type ETagResponse,
  type Metadata,
  type OperationOptions,
} from "./models.js";

export interface AppendBlobCreateOptions extends OperationOptions {
  httpHeaders?: BlobHttpHeaders;
  metadata?: Metadata;
  conditions?: HttpAccessConditions;
  leaseId?: string;
}

/**
 * Preconditions on the blob's current length.
 */
export interface AppendPositionConditions {
  /** Fails with 412 unless the blob is exactly this long */
  ifAppendPositionEquals?: number;
  /** Fails with 412 if the append would grow the blob past this */
  ifMaxSizeLessThanOrEqual?: number;
}

export interface AppendBlockOptions extends OperationOptions {
  conditions?: HttpAccessConditions;
  appendConditions?: AppendPositionConditions;
  leaseId?: string;
}

export class AppendBlobUrl extends BlobUrl {
  constructor(url: string, pipeline: Pipeline) {
    super(url, pipeline);
  }

  override withSnapshot(snapshot: string): AppendBlobUrl {
    return new AppendBlobUrl(setUrlParameter(this.url, "snapshot", snapshot), this.pipeline);
  }

  override withPipeline(pipeline: Pipeline): AppendBlobUrl {
    return new AppendBlobUrl(this.url, pipeline);
  }

  /**
   * Create an empty append blob, replacing any existing blob.
   */
  async create(options: AppendBlobCreateOptions = {}): Promise<ETagResponse> {
    const response = await this.send({
      method: "PUT",
      options,
      headers: (headers) => {
        headers.set(HeaderNames.BLOB_TYPE, "AppendBlob");
        applyBlobHttpHeaders(headers, options.httpHeaders);
        applyMetadata(headers, options.metadata);
        applyAccessConditions(headers, options.conditions);
        applyLeaseConditions(headers, { leaseId: options.leaseId });
      },
    });
    return parseETagResponse(response);
  }

  async appendBlock(body: RequestBody, options: AppendBlockOptions = {}): Promise<AppendBlockResponse> {
    const position = options.appendConditions?.ifAppendPositionEquals;
    const maxSize = options.appendConditions?.ifMaxSizeLessThanOrEqual;
    if (position !== undefined && (!Number.isInteger(position) || position < 0)) {
      throw new InvalidArgumentError("Append position must be a non-negative integer", "ifAppendPositionEquals");
    }

    const response = await this.send({
      method: "PUT",
      url: setUrlParameter(this.url, "comp", "appendblock"),
      body,
      options,
      headers: (headers) => {
        if (position !== undefined) {
          headers.set(HeaderNames.BLOB_CONDITION_APPEND_POSITION, position);
        }
        if (maxSize !== undefined) {
          headers.set(HeaderNames.BLOB_CONDITION_MAX_SIZE, maxSize);
        }
        applyAccessConditions(headers, options.conditions);
        applyLeaseConditions(headers, { leaseId: options.leaseId });
      },
    });

    return {
      ...parseETagResponse(response),
      contentMD5: response.headers.get(HeaderNames.CONTENT_MD5),
      appendOffset: parseNumber(response.headers.get(HeaderNames.BLOB_APPEND_OFFSET)),
      committedBlockCount: parseNumber(response.headers.get(HeaderNames.BLOB_COMMITTED_BLOCK_COUNT)),
    };
  }
}
