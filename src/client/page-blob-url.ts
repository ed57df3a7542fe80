/**
 * Page blobs: fixed-size blobs written in 512-byte aligned pages.
 */

import { HeaderNames, PAGE_BYTES } from "../config/constants.js";
import { InvalidArgumentError } from "../errors.js";
import {
  applyAccessConditions,
  applyLeaseConditions,
  formatBlobRange,
  type BlobRange,
  type HttpAccessConditions,
} from "../http/conditions.js";
import type { HttpHeaders } from "../http/headers.js";
import { bodyAsText, type HttpResponse, type RequestBody } from "../http/types.js";
import type { Pipeline } from "../pipeline/pipeline.js";
import { setUrlParameter } from "../url/blob-url-parts.js";
import { BlobUrl } from "./blob-url.js";
import {
  applyBlobHttpHeaders,
  applyMetadata,
  parseETagResponse,
  parseNumber,
  type BlobHttpHeaders,
  type ETagResponse,
  type Metadata,
  type OperationOptions,
  type PageRange,
  type PageRangesResponse,
  type PageWriteResponse,
} from "./models.js";
import { extractXmlElements, extractXmlValue } from "./xml.js";

/**
 * Sequence-number preconditions on page writes.
 */
export interface PageBlobAccessConditions {
  ifSequenceNumberLessThanOrEqual?: number;
  ifSequenceNumberLessThan?: number;
  ifSequenceNumberEqual?: number;
}

export interface PageBlobCreateOptions extends OperationOptions {
  sequenceNumber?: number;
  httpHeaders?: BlobHttpHeaders;
  metadata?: Metadata;
  conditions?: HttpAccessConditions;
  leaseId?: string;
}

export interface PageWriteOptions extends OperationOptions {
  conditions?: HttpAccessConditions;
  pageConditions?: PageBlobAccessConditions;
  leaseId?: string;
}

export interface GetPageRangesOptions extends OperationOptions {
  /** Limits the listing to this part of the blob */
  range?: BlobRange;
  conditions?: HttpAccessConditions;
  leaseId?: string;
}

export interface PageBlobResizeOptions extends OperationOptions {
  conditions?: HttpAccessConditions;
  leaseId?: string;
}

function requirePageAligned(value: number, argument: string): void {
  if (!Number.isInteger(value) || value < 0 || value % PAGE_BYTES !== 0) {
    throw new InvalidArgumentError(`${argument} must be a non-negative multiple of ${PAGE_BYTES}`, argument);
  }
}

/**
 * Format a page range, which must start and end on page boundaries.
 */
export function formatPageRange(range: BlobRange): string {
  requirePageAligned(range.offset, "offset");
  if (range.count === undefined || range.count === 0) {
    throw new InvalidArgumentError("A page range needs a count", "count");
  }
  requirePageAligned(range.count, "count");
  return formatBlobRange(range);
}

function applyPageConditions(headers: HttpHeaders, conditions: PageBlobAccessConditions | undefined): void {
  if (!conditions) {
    return;
  }
  if (conditions.ifSequenceNumberLessThanOrEqual !== undefined) {
    headers.set(HeaderNames.IF_SEQUENCE_NUMBER_LE, conditions.ifSequenceNumberLessThanOrEqual);
  }
  if (conditions.ifSequenceNumberLessThan !== undefined) {
    headers.set(HeaderNames.IF_SEQUENCE_NUMBER_LT, conditions.ifSequenceNumberLessThan);
  }
  if (conditions.ifSequenceNumberEqual !== undefined) {
    headers.set(HeaderNames.IF_SEQUENCE_NUMBER_EQ, conditions.ifSequenceNumberEqual);
  }
}

function parseRanges(xml: string, tag: string): PageRange[] {
  return extractXmlElements(xml, tag).map((range) => ({
    start: parseNumber(extractXmlValue(range, "Start")) ?? 0,
    end: parseNumber(extractXmlValue(range, "End")) ?? 0,
  }));
}

function parsePageWrite(response: HttpResponse): PageWriteResponse {
  return {
    ...parseETagResponse(response),
    contentMD5: response.headers.get(HeaderNames.CONTENT_MD5),
    blobSequenceNumber: parseNumber(response.headers.get(HeaderNames.BLOB_SEQUENCE_NUMBER)),
  };
}

export class PageBlobUrl extends BlobUrl {
  constructor(url: string, pipeline: Pipeline) {
    super(url, pipeline);
  }

  override withSnapshot(snapshot: string): PageBlobUrl {
    return new PageBlobUrl(setUrlParameter(this.url, "snapshot", snapshot), this.pipeline);
  }

  override withPipeline(pipeline: Pipeline): PageBlobUrl {
    return new PageBlobUrl(this.url, pipeline);
  }

  /**
   * Create an empty page blob of `size` bytes, replacing any existing blob.
   *
   * @throws InvalidArgumentError when the size is not page aligned
   */
  async create(size: number, options: PageBlobCreateOptions = {}): Promise<ETagResponse> {
    requirePageAligned(size, "size");

    const response = await this.send({
      method: "PUT",
      options,
      headers: (headers) => {
        headers.set(HeaderNames.BLOB_TYPE, "PageBlob");
        headers.set(HeaderNames.BLOB_CONTENT_LENGTH, size);
        if (options.sequenceNumber !== undefined) {
          headers.set(HeaderNames.BLOB_SEQUENCE_NUMBER, options.sequenceNumber);
        }
        applyBlobHttpHeaders(headers, options.httpHeaders);
        applyMetadata(headers, options.metadata);
        applyAccessConditions(headers, options.conditions);
        applyLeaseConditions(headers, { leaseId: options.leaseId });
      },
    });
    return parseETagResponse(response);
  }

  /**
   * Write `body` into the pages covered by `range`.
   */
  async uploadPages(range: BlobRange, body: RequestBody, options: PageWriteOptions = {}): Promise<PageWriteResponse> {
    return this.writePages("update", range, body, options);
  }

  /**
   * Free the pages covered by `range`. They read back as zeros.
   */
  async clearPages(range: BlobRange, options: PageWriteOptions = {}): Promise<PageWriteResponse> {
    return this.writePages("clear", range, undefined, options);
  }

  async getPageRanges(options: GetPageRangesOptions = {}): Promise<PageRangesResponse> {
    const response = await this.send({
      method: "GET",
      url: setUrlParameter(this.url, "comp", "pagelist"),
      options,
      headers: (headers) => {
        if (options.range) {
          headers.set(HeaderNames.RANGE, formatBlobRange(options.range));
        }
        applyAccessConditions(headers, options.conditions);
        applyLeaseConditions(headers, { leaseId: options.leaseId });
      },
    });

    const xml = bodyAsText(response);
    return {
      ...parseETagResponse(response),
      blobContentLength: parseNumber(response.headers.get(HeaderNames.BLOB_CONTENT_LENGTH)),
      pageRanges: parseRanges(xml, "PageRange"),
      clearRanges: parseRanges(xml, "ClearRange"),
    };
  }

  /**
   * Grow or shrink the blob. Pages past a smaller size are discarded.
   */
  async resize(size: number, options: PageBlobResizeOptions = {}): Promise<PageWriteResponse> {
    requirePageAligned(size, "size");

    const response = await this.send({
      method: "PUT",
      url: setUrlParameter(this.url, "comp", "properties"),
      options,
      headers: (headers) => {
        headers.set(HeaderNames.BLOB_CONTENT_LENGTH, size);
        applyAccessConditions(headers, options.conditions);
        applyLeaseConditions(headers, { leaseId: options.leaseId });
      },
    });
    return parsePageWrite(response);
  }

  private async writePages(
    mode: "update" | "clear",
    range: BlobRange,
    body: RequestBody | undefined,
    options: PageWriteOptions
  ): Promise<PageWriteResponse> {
    const formatted = formatPageRange(range);

    const response = await this.send({
      method: "PUT",
      url: setUrlParameter(this.url, "comp", "page"),
      body,
      options,
      headers: (headers) => {
        headers.set(HeaderNames.PAGE_WRITE, mode);
        headers.set(HeaderNames.RANGE, formatted);
        applyPageConditions(headers, options.pageConditions);
        applyAccessConditions(headers, options.conditions);
        applyLeaseConditions(headers, { leaseId: options.leaseId });
      },
    });
    return parsePageWrite(response);
  }
}
