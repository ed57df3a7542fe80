/**
 * Service constants shared across the library.
 */

/** Storage service version sent as x-ms-version and signed into SAS tokens */
export const STORAGE_VERSION = "2017-04-17";

/** Prefix of the service's custom headers */
export const STORAGE_HEADER_PREFIX = "x-ms-";

/** Product token placed in the User-Agent header */
export const USER_AGENT_PRODUCT = "Azure-Storage-Blob-TS";

export const USER_AGENT_VERSION = "1.0.0";

/** Largest body a single Put Blob accepts */
export const MAX_PUT_BLOB_BYTES = 256 * 1024 * 1024;

/** Largest block Put Block accepts */
export const MAX_BLOCK_BYTES = 100 * 1024 * 1024;

/** Most blocks a block list may commit */
export const MAX_BLOCKS = 50_000;

/** Page blob sizes and page ranges are multiples of this */
export const PAGE_BYTES = 512;

/**
 * Header names used by the pipeline and the URL clients.
 */
export const HeaderNames = {
  AUTHORIZATION: "Authorization",
  CONTENT_ENCODING: "Content-Encoding",
  CONTENT_LANGUAGE: "Content-Language",
  CONTENT_LENGTH: "Content-Length",
  CONTENT_MD5: "Content-MD5",
  CONTENT_TYPE: "Content-Type",
  IF_MODIFIED_SINCE: "If-Modified-Since",
  IF_MATCH: "If-Match",
  IF_NONE_MATCH: "If-None-Match",
  IF_UNMODIFIED_SINCE: "If-Unmodified-Since",
  RANGE: "Range",
  USER_AGENT: "User-Agent",
  DATE: "x-ms-date",
  VERSION: "x-ms-version",
  CLIENT_REQUEST_ID: "x-ms-client-request-id",
  REQUEST_ID: "x-ms-request-id",
  ERROR_CODE: "x-ms-error-code",
  LEASE_ID: "x-ms-lease-id",
  LEASE_ACTION: "x-ms-lease-action",
  LEASE_DURATION: "x-ms-lease-duration",
  PROPOSED_LEASE_ID: "x-ms-proposed-lease-id",
  BLOB_TYPE: "x-ms-blob-type",
  BLOB_CACHE_CONTROL: "x-ms-blob-cache-control",
  BLOB_CONTENT_DISPOSITION: "x-ms-blob-content-disposition",
  BLOB_CONTENT_ENCODING: "x-ms-blob-content-encoding",
  BLOB_CONTENT_LANGUAGE: "x-ms-blob-content-language",
  BLOB_CONTENT_LENGTH: "x-ms-blob-content-length",
  BLOB_CONTENT_MD5: "x-ms-blob-content-md5",
  BLOB_CONTENT_TYPE: "x-ms-blob-content-type",
  BLOB_PUBLIC_ACCESS: "x-ms-blob-public-access",
  BLOB_SEQUENCE_NUMBER: "x-ms-blob-sequence-number",
  BLOB_APPEND_OFFSET: "x-ms-blob-append-offset",
  BLOB_COMMITTED_BLOCK_COUNT: "x-ms-blob-committed-block-count",
  BLOB_CONDITION_APPEND_POSITION: "x-ms-blob-condition-appendpos",
  BLOB_CONDITION_MAX_SIZE: "x-ms-blob-condition-maxsize",
  IF_SEQUENCE_NUMBER_LE: "x-ms-if-sequence-number-le",
  IF_SEQUENCE_NUMBER_LT: "x-ms-if-sequence-number-lt",
  IF_SEQUENCE_NUMBER_EQ: "x-ms-if-sequence-number-eq",
  PAGE_WRITE: "x-ms-page-write",
  SNAPSHOT: "x-ms-snapshot",
  LEASE_BREAK_PERIOD: "x-ms-lease-break-period",
  LEASE_TIME: "x-ms-lease-time",
  COPY_ACTION: "x-ms-copy-action",
  COPY_SOURCE: "x-ms-copy-source",
  COPY_ID: "x-ms-copy-id",
  COPY_STATUS: "x-ms-copy-status",
  DELETE_SNAPSHOTS: "x-ms-delete-snapshots",
  META_PREFIX: "x-ms-meta-",
} as const;

/**
 * SAS query parameter keys.
 */
export const SasQueryKeys = {
  VERSION: "sv",
  SERVICES: "ss",
  RESOURCE_TYPES: "srt",
  PROTOCOL: "spr",
  START_TIME: "st",
  EXPIRY_TIME: "se",
  IP_RANGE: "sip",
  IDENTIFIER: "si",
  RESOURCE: "sr",
  PERMISSIONS: "sp",
  CACHE_CONTROL: "rscc",
  CONTENT_DISPOSITION: "rscd",
  CONTENT_ENCODING: "rsce",
  CONTENT_LANGUAGE: "rscl",
  CONTENT_TYPE: "rsct",
  SIGNATURE: "sig",
} as const;

export type SasQueryKey = (typeof SasQueryKeys)[keyof typeof SasQueryKeys];
