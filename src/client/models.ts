/**
 * Response models for the URL clients, read from response headers.
 */

import { HeaderNames } from "../config/constants.js";
import type { HttpHeaders } from "../http/headers.js";
import type { HttpResponse } from "../http/types.js";

/**
 * Caller options shared by every client operation.
 */
export interface OperationOptions {
  /** Cancels the operation, including pending retry delays. */
  abortSignal?: AbortSignal;
  /** Passed through the pipeline untouched. */
  context?: Record<string, unknown>;
}

export type Metadata = Record<string, string>;

export type LeaseState = "available" | "leased" | "expired" | "breaking" | "broken";
export type LeaseStatus = "locked" | "unlocked";
export type CopyStatus = "pending" | "success" | "aborted" | "failed";
export type BlobType = "BlockBlob" | "PageBlob" | "AppendBlob";
export type DeleteSnapshotsOption = "include" | "only";
export type BlockListType = "committed" | "uncommitted" | "all";

/**
 * Standard HTTP properties stored with a blob and returned on reads.
 */
export interface BlobHttpHeaders {
  cacheControl?: string;
  contentDisposition?: string;
  contentEncoding?: string;
  contentLanguage?: string;
  /** Base64 MD5 of the whole blob */
  contentMD5?: string;
  contentType?: string;
}

export interface ResponseMetadata {
  status: number;
  requestId?: string;
  clientRequestId?: string;
  version?: string;
  date?: Date;
}

export interface ContainerProperties extends ResponseMetadata {
  etag?: string;
  lastModified?: Date;
  metadata: Metadata;
  leaseState?: LeaseState;
  leaseStatus?: LeaseStatus;
}

export interface BlobProperties extends ResponseMetadata {
  etag?: string;
  lastModified?: Date;
  contentLength?: number;
  contentType?: string;
  contentEncoding?: string;
  contentLanguage?: string;
  contentMD5?: string;
  cacheControl?: string;
  contentDisposition?: string;
  blobType?: BlobType;
  /** Page blobs only */
  blobSequenceNumber?: number;
  metadata: Metadata;
  leaseState?: LeaseState;
  leaseStatus?: LeaseStatus;
  copyId?: string;
  copyStatus?: CopyStatus;
}

export interface BlobDownloadResponse extends BlobProperties {
  body: Uint8Array;
  contentRange?: string;
}

export interface ETagResponse extends ResponseMetadata {
  etag?: string;
  lastModified?: Date;
}

export interface LeaseResponse extends ETagResponse {
  leaseId?: string;
}

export interface CopyResponse extends ETagResponse {
  copyId?: string;
  copyStatus?: CopyStatus;
}

export interface UploadResponse extends ETagResponse {
  contentMD5?: string;
}

export interface SnapshotResponse extends ETagResponse {
  snapshot?: string;
}

export interface BreakLeaseResponse extends ETagResponse {
  /** Seconds until the broken lease can be acquired again */
  leaseTime?: number;
}

export interface StageBlockResponse extends ResponseMetadata {
  contentMD5?: string;
}

export interface Block {
  /** Base64 block id */
  name: string;
  size: number;
}

export interface BlockListResponse extends ETagResponse {
  blobContentLength?: number;
  committedBlocks: Block[];
  uncommittedBlocks: Block[];
}

export interface PageWriteResponse extends UploadResponse {
  blobSequenceNumber?: number;
}

/**
 * Inclusive byte range of a page blob.
 */
export interface PageRange {
  start: number;
  end: number;
}

export interface PageRangesResponse extends ETagResponse {
  blobContentLength?: number;
  pageRanges: PageRange[];
  clearRanges: PageRange[];
}

export interface AppendBlockResponse extends UploadResponse {
  /** Offset at which the block was committed */
  appendOffset?: number;
  committedBlockCount?: number;
}

export interface BlobItem {
  name: string;
  snapshot?: string;
  properties: {
    etag?: string;
    lastModified?: Date;
    contentLength?: number;
    contentType?: string;
    blobType?: BlobType;
    leaseState?: LeaseState;
    leaseStatus?: LeaseStatus;
  };
  metadata: Metadata;
}

export interface ListBlobsResponse extends ResponseMetadata {
  blobs: BlobItem[];
  /** Virtual directories when listing with a delimiter */
  prefixes: string[];
  nextMarker?: string;
}

export interface ContainerItem {
  name: string;
  properties: {
    etag?: string;
    lastModified?: Date;
    leaseState?: LeaseState;
    leaseStatus?: LeaseStatus;
  };
  metadata: Metadata;
}

export interface ListContainersResponse extends ResponseMetadata {
  containers: ContainerItem[];
  nextMarker?: string;
}

const LEASE_STATES: readonly LeaseState[] = ["available", "leased", "expired", "breaking", "broken"];
const LEASE_STATUSES: readonly LeaseStatus[] = ["locked", "unlocked"];
const COPY_STATUSES: readonly CopyStatus[] = ["pending", "success", "aborted", "failed"];
const BLOB_TYPES: readonly BlobType[] = ["BlockBlob", "PageBlob", "AppendBlob"];

export function parseLeaseState(value: string | undefined): LeaseState | undefined {
  return oneOf(LEASE_STATES, value);
}

export function parseLeaseStatus(value: string | undefined): LeaseStatus | undefined {
  return oneOf(LEASE_STATUSES, value);
}

export function parseBlobType(value: string | undefined): BlobType | undefined {
  return oneOf(BLOB_TYPES, value);
}

function oneOf<T extends string>(allowed: readonly T[], value: string | undefined): T | undefined {
  return allowed.find((candidate) => candidate === value);
}

export function parseCopyStatus(value: string | undefined): CopyStatus | undefined {
  return oneOf(COPY_STATUSES, value);
}

export function parseDate(value: string | undefined): Date | undefined {
  if (!value) return undefined;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

export function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

/**
 * Collect `x-ms-meta-*` headers into a record keyed by the lowercased suffix.
 */
export function parseMetadata(headers: HttpHeaders): Metadata {
  const metadata: Metadata = {};
  for (const [name, value] of headers) {
    const lower = name.toLowerCase();
    if (lower.startsWith(HeaderNames.META_PREFIX)) {
      metadata[lower.slice(HeaderNames.META_PREFIX.length)] = value;
    }
  }
  return metadata;
}

/**
 * Write the blob's HTTP properties as `x-ms-blob-*` headers.
 */
export function applyBlobHttpHeaders(headers: HttpHeaders, blobHeaders: BlobHttpHeaders | undefined): void {
  if (!blobHeaders) {
    return;
  }
  const entries: Array<[string, string | undefined]> = [
    [HeaderNames.BLOB_CACHE_CONTROL, blobHeaders.cacheControl],
    [HeaderNames.BLOB_CONTENT_DISPOSITION, blobHeaders.contentDisposition],
    [HeaderNames.BLOB_CONTENT_ENCODING, blobHeaders.contentEncoding],
    [HeaderNames.BLOB_CONTENT_LANGUAGE, blobHeaders.contentLanguage],
    [HeaderNames.BLOB_CONTENT_MD5, blobHeaders.contentMD5],
    [HeaderNames.BLOB_CONTENT_TYPE, blobHeaders.contentType],
  ];
  for (const [name, value] of entries) {
    if (value) {
      headers.set(name, value);
    }
  }
}

/**
 * Write metadata entries as `x-ms-meta-*` headers.
 */
export function applyMetadata(headers: HttpHeaders, metadata: Metadata | undefined): void {
  for (const [key, value] of Object.entries(metadata ?? {})) {
    headers.set(`${HeaderNames.META_PREFIX}${key}`, value);
  }
}

export function parseResponseMetadata(response: HttpResponse): ResponseMetadata {
  const headers = response.headers;
  return {
    status: response.status,
    requestId: headers.get(HeaderNames.REQUEST_ID),
    clientRequestId: headers.get(HeaderNames.CLIENT_REQUEST_ID),
    version: headers.get(HeaderNames.VERSION),
    date: parseDate(headers.get("date")),
  };
}

export function parseETagResponse(response: HttpResponse): ETagResponse {
  return {
    ...parseResponseMetadata(response),
    etag: response.headers.get("etag"),
    lastModified: parseDate(response.headers.get("last-modified")),
  };
}

export function parseContainerProperties(response: HttpResponse): ContainerProperties {
  const headers = response.headers;
  return {
    ...parseETagResponse(response),
    metadata: parseMetadata(headers),
    leaseState: parseLeaseState(headers.get("x-ms-lease-state")),
    leaseStatus: parseLeaseStatus(headers.get("x-ms-lease-status")),
  };
}

export function parseBlobProperties(response: HttpResponse): BlobProperties {
  const headers = response.headers;
  return {
    ...parseContainerProperties(response),
    contentLength: parseNumber(headers.get(HeaderNames.CONTENT_LENGTH)),
    contentType: headers.get(HeaderNames.CONTENT_TYPE),
    contentEncoding: headers.get(HeaderNames.CONTENT_ENCODING),
    contentLanguage: headers.get(HeaderNames.CONTENT_LANGUAGE),
    contentMD5: headers.get(HeaderNames.CONTENT_MD5),
    cacheControl: headers.get("cache-control"),
    contentDisposition: headers.get("content-disposition"),
    blobType: parseBlobType(headers.get(HeaderNames.BLOB_TYPE)),
    blobSequenceNumber: parseNumber(headers.get(HeaderNames.BLOB_SEQUENCE_NUMBER)),
    copyId: headers.get(HeaderNames.COPY_ID),
    copyStatus: parseCopyStatus(headers.get(HeaderNames.COPY_STATUS)),
  };
}
