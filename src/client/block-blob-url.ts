/**
 * Block blobs: single-shot uploads, and block staging with an explicit commit.
 */

import { HeaderNames, MAX_BLOCKS } from "../config/constants.js";
import { InvalidArgumentError } from "../errors.js";
import { applyAccessConditions, applyLeaseConditions, type HttpAccessConditions } from "../http/conditions.js";
import { bodyAsText, type RequestBody } from "../http/types.js";
import type { Pipeline } from "../pipeline/pipeline.js";
import { setUrlParameter } from "../url/blob-url-parts.js";
import { BlobUrl } from "./blob-url.js";
import {
  applyBlobHttpHeaders,
  applyMetadata,
  parseETagResponse,
  parseNumber,
  parseResponseMetadata,
  type Block,
  type BlobHttpHeaders,
  type BlockListResponse,
  type BlockListType,
  type Metadata,
  type OperationOptions,
  type StageBlockResponse,
  type UploadResponse,
} from "./models.js";
import { escapeXml, extractXmlElements, extractXmlValue } from "./xml.js";

export interface BlockBlobUploadOptions extends OperationOptions {
  /** Shorthand for `httpHeaders.contentType` */
  contentType?: string;
  httpHeaders?: BlobHttpHeaders;
  metadata?: Metadata;
  conditions?: HttpAccessConditions;
  leaseId?: string;
}

export interface StageBlockOptions extends OperationOptions {
  leaseId?: string;
}

export type CommitBlockListOptions = Omit<BlockBlobUploadOptions, "contentType">;

export interface GetBlockListOptions extends OperationOptions {
  leaseId?: string;
}

/**
 * Base64 id of the block at `index`. Ids of one blob must all have the same
 * length, so the index is zero-padded.
 */
export function createBlockId(index: number): string {
  return Buffer.from(`block-${String(index).padStart(6, "0")}`).toString("base64");
}

function parseBlocks(xml: string, list: string): Block[] {
  const section = extractXmlElements(xml, list)[0] ?? "";
  return extractXmlElements(section, "Block").map((block) => ({
    name: extractXmlValue(block, "Name") ?? "",
    size: parseNumber(extractXmlValue(block, "Size")) ?? 0,
  }));
}

export class BlockBlobUrl extends BlobUrl {
  constructor(url: string, pipeline: Pipeline) {
    super(url, pipeline);
  }

  override withSnapshot(snapshot: string): BlockBlobUrl {
    return new BlockBlobUrl(setUrlParameter(this.url, "snapshot", snapshot), this.pipeline);
  }

  override withPipeline(pipeline: Pipeline): BlockBlobUrl {
    return new BlockBlobUrl(this.url, pipeline);
  }

  /**
   * Create or replace the blob with `body` in a single request.
   */
  async upload(body: RequestBody, options: BlockBlobUploadOptions = {}): Promise<UploadResponse> {
    const response = await this.send({
      method: "PUT",
      body,
      options,
      headers: (headers) => {
        headers.set(HeaderNames.BLOB_TYPE, "BlockBlob");
        applyBlobHttpHeaders(headers, { contentType: options.contentType, ...options.httpHeaders });
        applyMetadata(headers, options.metadata);
        applyAccessConditions(headers, options.conditions);
        applyLeaseConditions(headers, { leaseId: options.leaseId });
      },
    });

    return {
      ...parseETagResponse(response),
      contentMD5: response.headers.get(HeaderNames.CONTENT_MD5),
    };
  }

  /**
   * Upload one uncommitted block. It becomes part of the blob only once a
   * block list naming it is committed.
   *
   * @throws InvalidArgumentError when the block id is empty
   */
  async stageBlock(blockId: string, body: RequestBody, options: StageBlockOptions = {}): Promise<StageBlockResponse> {
    if (!blockId) {
      throw new InvalidArgumentError("Block ID is required", "blockId");
    }

    const url = setUrlParameter(setUrlParameter(this.url, "comp", "block"), "blockid", blockId);
    const response = await this.send({
      method: "PUT",
      url,
      body,
      options,
      headers: (headers) => applyLeaseConditions(headers, { leaseId: options.leaseId }),
    });

    return {
      ...parseResponseMetadata(response),
      contentMD5: response.headers.get(HeaderNames.CONTENT_MD5),
    };
  }

  /**
   * Commit the blob as the given blocks, in order. Each id names the most
   * recently staged block with that id, or the committed one when none is staged.
   *
   * @throws InvalidArgumentError when more than 50,000 ids are given
   */
  async commitBlockList(blockIds: readonly string[], options: CommitBlockListOptions = {}): Promise<UploadResponse> {
    if (blockIds.length > MAX_BLOCKS) {
      throw new InvalidArgumentError(`A block list holds at most ${MAX_BLOCKS} blocks`, "blockIds");
    }

    const latest = blockIds.map((id) => `<Latest>${escapeXml(id)}</Latest>`).join("");
    const body = `<?xml version="1.0" encoding="utf-8"?><BlockList>${latest}</BlockList>`;

    const response = await this.send({
      method: "PUT",
      url: setUrlParameter(this.url, "comp", "blocklist"),
      body,
      options,
      headers: (headers) => {
        headers.set(HeaderNames.CONTENT_TYPE, "application/xml");
        applyBlobHttpHeaders(headers, options.httpHeaders);
        applyMetadata(headers, options.metadata);
        applyAccessConditions(headers, options.conditions);
        applyLeaseConditions(headers, { leaseId: options.leaseId });
      },
    });

    return {
      ...parseETagResponse(response),
      contentMD5: response.headers.get(HeaderNames.CONTENT_MD5),
    };
  }

  async getBlockList(listType: BlockListType = "committed", options: GetBlockListOptions = {}): Promise<BlockListResponse> {
    const response = await this.send({
      method: "GET",
      url: setUrlParameter(setUrlParameter(this.url, "comp", "blocklist"), "blocklisttype", listType),
      options,
      headers: (headers) => applyLeaseConditions(headers, { leaseId: options.leaseId }),
    });

    const xml = bodyAsText(response);
    return {
      ...parseETagResponse(response),
      blobContentLength: parseNumber(response.headers.get(HeaderNames.BLOB_CONTENT_LENGTH)),
      committedBlocks: parseBlocks(xml, "CommittedBlocks"),
      uncommittedBlocks: parseBlocks(xml, "UncommittedBlocks"),
    };
  }
}
