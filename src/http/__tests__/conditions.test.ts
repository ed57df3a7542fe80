import { describe, it, expect } from "vitest";
import {
  ETagCondition,
  applyAccessConditions,
  applyLeaseConditions,
  formatBlobRange,
  formatETagCondition,
} from "../conditions.js";
import { HttpHeaders } from "../headers.js";
import { InvalidArgumentError } from "../../errors.js";

describe("formatETagCondition", () => {
  it("should map each kind to its header value", () => {
    expect(formatETagCondition(ETagCondition.any())).toBe("*");
    expect(formatETagCondition(ETagCondition.none())).toBeUndefined();
    expect(formatETagCondition(ETagCondition.specific('"0x8D"'))).toBe('"0x8D"');
    expect(formatETagCondition(undefined)).toBeUndefined();
  });
});

describe("applyAccessConditions", () => {
  it("should set only the headers that carry a condition", () => {
    const headers = new HttpHeaders();

    applyAccessConditions(headers, {
      ifUnmodifiedSince: new Date(Date.UTC(2024, 0, 1)),
      ifMatch: ETagCondition.specific('"etag-1"'),
      ifNoneMatch: ETagCondition.none(),
    });

    expect(headers.toRecord()).toEqual({
      "If-Unmodified-Since": "Mon, 01 Jan 2024 00:00:00 GMT",
      "If-Match": '"etag-1"',
    });
  });

  it("should set the lease id", () => {
    const headers = new HttpHeaders();

    applyLeaseConditions(headers, { leaseId: "lease-1" });
    applyLeaseConditions(headers, undefined);

    expect(headers.get("x-ms-lease-id")).toBe("lease-1");
  });
});

describe("formatBlobRange", () => {
  it("should format closed and open ranges", () => {
    expect(formatBlobRange({ offset: 0, count: 512 })).toBe("bytes=0-511");
    expect(formatBlobRange({ offset: 1024 })).toBe("bytes=1024-");
  });

  it("should reject bad bounds", () => {
    expect(() => formatBlobRange({ offset: -1 })).toThrow(InvalidArgumentError);
    expect(() => formatBlobRange({ offset: 0, count: 0 })).toThrow(InvalidArgumentError);
  });
});
