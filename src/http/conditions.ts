/**
 * Conditional-request, lease and range headers.
 */

import { HeaderNames } from "../config/constants.js";
import { InvalidArgumentError } from "../errors.js";
import type { HttpHeaders } from "./headers.js";

/**
 * An ETag to match against: any resource (`*`), no condition, or one ETag.
 */
export type ETagCondition = { kind: "any" } | { kind: "none" } | { kind: "specific"; etag: string };

export const ETagCondition = {
  any: (): ETagCondition => ({ kind: "any" }),
  none: (): ETagCondition => ({ kind: "none" }),
  specific: (etag: string): ETagCondition => ({ kind: "specific", etag }),
};

export interface HttpAccessConditions {
  ifModifiedSince?: Date;
  ifUnmodifiedSince?: Date;
  ifMatch?: ETagCondition;
  ifNoneMatch?: ETagCondition;
}

export interface LeaseAccessConditions {
  leaseId?: string;
}

/**
 * Byte range of a blob. Without `count` the range runs to the end.
 */
export interface BlobRange {
  offset: number;
  count?: number;
}

/**
 * Header value for an ETag condition, or undefined when it adds no header.
 */
export function formatETagCondition(condition: ETagCondition | undefined): string | undefined {
  if (!condition) {
    return undefined;
  }
  switch (condition.kind) {
    case "any":
      return "*";
    case "specific":
      return condition.etag;
    case "none":
      return undefined;
  }
}

export function applyAccessConditions(headers: HttpHeaders, conditions: HttpAccessConditions | undefined): void {
  if (!conditions) {
    return;
  }
  if (conditions.ifModifiedSince) {
    headers.set(HeaderNames.IF_MODIFIED_SINCE, conditions.ifModifiedSince.toUTCString());
  }
  if (conditions.ifUnmodifiedSince) {
    headers.set(HeaderNames.IF_UNMODIFIED_SINCE, conditions.ifUnmodifiedSince.toUTCString());
  }
  const ifMatch = formatETagCondition(conditions.ifMatch);
  if (ifMatch !== undefined) {
    headers.set(HeaderNames.IF_MATCH, ifMatch);
  }
  const ifNoneMatch = formatETagCondition(conditions.ifNoneMatch);
  if (ifNoneMatch !== undefined) {
    headers.set(HeaderNames.IF_NONE_MATCH, ifNoneMatch);
  }
}

export function applyLeaseConditions(headers: HttpHeaders, conditions: LeaseAccessConditions | undefined): void {
  if (conditions?.leaseId) {
    headers.set(HeaderNames.LEASE_ID, conditions.leaseId);
  }
}

/**
 * Format a range as `bytes=start-end`, or `bytes=start-` when open-ended.
 *
 * @throws InvalidArgumentError on a negative offset or a count below 1
 */
export function formatBlobRange(range: BlobRange): string {
  if (!Number.isInteger(range.offset) || range.offset < 0) {
    throw new InvalidArgumentError("Range offset must be a non-negative integer", "range");
  }
  if (range.count === undefined) {
    return `bytes=${range.offset}-`;
  }
  if (!Number.isInteger(range.count) || range.count < 1) {
    throw new InvalidArgumentError("Range count must be a positive integer", "range");
  }
  return `bytes=${range.offset}-${range.offset + range.count - 1}`;
}
