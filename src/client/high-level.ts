/**
 * Buffer uploads that pick between a single Put Blob and parallel staged blocks.
 */

import { MAX_BLOCK_BYTES, MAX_BLOCKS, MAX_PUT_BLOB_BYTES } from "../config/constants.js";
import { InvalidArgumentError } from "../errors.js";
import type { HttpAccessConditions } from "../http/conditions.js";
import { createBlockId, type BlockBlobUrl } from "./block-blob-url.js";
import type { BlobHttpHeaders, Metadata, OperationOptions, UploadResponse } from "./models.js";

export interface UploadToBlockBlobOptions extends OperationOptions {
  /** Bytes per staged block. Defaults to 4 MiB. */
  blockSize?: number;
  /** Blocks staged at once. Defaults to 5. */
  parallelism?: number;
  /** Bodies up to this size go up in one request. Defaults to 256 MiB. */
  maxSingleShotSize?: number;
  httpHeaders?: BlobHttpHeaders;
  metadata?: Metadata;
  conditions?: HttpAccessConditions;
  leaseId?: string;
  /** Called with the running total of bytes sent */
  onProgress?: (loadedBytes: number) => void;
}

export const DEFAULT_BLOCK_SIZE = 4 * 1024 * 1024;
export const DEFAULT_PARALLELISM = 5;

function positiveInteger(value: number, argument: string, max?: number): number {
  if (!Number.isInteger(value) || value <= 0 || (max !== undefined && value > max)) {
    const bound = max === undefined ? "greater than 0" : `between 1 and ${max}`;
    throw new InvalidArgumentError(`${argument} must be an integer ${bound}`, argument);
  }
  return value;
}

/**
 * Upload `data` to a block blob. Small bodies use one request; larger ones are
 * split into blocks staged `parallelism` at a time and then committed in order.
 *
 * @throws InvalidArgumentError when the options are out of range or the data
 * needs more than 50,000 blocks
 */
export async function uploadBufferToBlockBlob(
  data: Uint8Array | string,
  blockBlobUrl: BlockBlobUrl,
  options: UploadToBlockBlobOptions = {}
): Promise<UploadResponse> {
  const buffer = typeof data === "string" ? Buffer.from(data, "utf8") : data;
  const blockSize = positiveInteger(options.blockSize ?? DEFAULT_BLOCK_SIZE, "blockSize", MAX_BLOCK_BYTES);
  const parallelism = positiveInteger(options.parallelism ?? DEFAULT_PARALLELISM, "parallelism");
  const maxSingleShotSize = options.maxSingleShotSize ?? MAX_PUT_BLOB_BYTES;
  if (!Number.isInteger(maxSingleShotSize) || maxSingleShotSize < 0 || maxSingleShotSize > MAX_PUT_BLOB_BYTES) {
    throw new InvalidArgumentError(`maxSingleShotSize must be between 0 and ${MAX_PUT_BLOB_BYTES}`, "maxSingleShotSize");
  }

  const operation = { abortSignal: options.abortSignal, context: options.context };
  if (buffer.byteLength <= maxSingleShotSize) {
    const response = await blockBlobUrl.upload(buffer, {
      ...operation,
      httpHeaders: options.httpHeaders,
      metadata: options.metadata,
      conditions: options.conditions,
      leaseId: options.leaseId,
    });
    options.onProgress?.(buffer.byteLength);
    return response;
  }

  const blockCount = Math.ceil(buffer.byteLength / blockSize);
  if (blockCount > MAX_BLOCKS) {
    throw new InvalidArgumentError(
      `The data needs ${blockCount} blocks of ${blockSize} bytes; at most ${MAX_BLOCKS} are allowed`,
      "blockSize"
    );
  }

  let nextIndex = 0;
  let loadedBytes = 0;
  let failed = false;
  const stageNext = async (): Promise<void> => {
    while (!failed && nextIndex < blockCount) {
      const index = nextIndex++;
      const chunk = buffer.subarray(index * blockSize, Math.min((index + 1) * blockSize, buffer.byteLength));
      try {
        await blockBlobUrl.stageBlock(createBlockId(index), chunk, { ...operation, leaseId: options.leaseId });
      } catch (error) {
        failed = true;
        throw error;
      }
      loadedBytes += chunk.byteLength;
      options.onProgress?.(loadedBytes);
    }
  };
  await Promise.all(Array.from({ length: Math.min(parallelism, blockCount) }, () => stageNext()));

  const blockIds = Array.from({ length: blockCount }, (_, index) => createBlockId(index));
  return blockBlobUrl.commitBlockList(blockIds, {
    ...operation,
    httpHeaders: options.httpHeaders,
    metadata: options.metadata,
    conditions: options.conditions,
    leaseId: options.leaseId,
  });
}
