/**
 * Tests for Shared Key canonicalization
 */

import { describe, it, expect } from "vitest";
import {
  buildSharedKeyStringToSign,
  canonicalizeHeaders,
  canonicalizeResource,
  compareOrdinal,
} from "../canonicalize.js";
import { InvalidArgumentError } from "../../errors.js";
import { HttpHeaders } from "../../http/headers.js";
import { createRequest } from "../../http/types.js";

const DATE = "Mon, 01 Jan 2024 00:00:00 GMT";

describe("canonicalizeHeaders", () => {
  it("should lower-case, sort and trim x-ms- headers", () => {
    const headers = new HttpHeaders({
      "x-ms-version": "2017-04-17",
      "X-MS-Meta-Name": "  value ",
      "x-ms-date": DATE,
      "Content-Type": "text/plain",
    });

    expect(canonicalizeHeaders(headers)).toBe(
      `x-ms-date:${DATE}\nx-ms-meta-name:value\nx-ms-version:2017-04-17`
    );
  });

  it("should sort by code unit rather than locale", () => {
    const headers = new HttpHeaders({ "x-ms-ab": "3", "x-ms-a_b": "2", "x-ms-a-b": "1" });

    expect(canonicalizeHeaders(headers)).toBe("x-ms-a-b:1\nx-ms-a_b:2\nx-ms-ab:3");
  });

  it("should comma-join repeated values in insertion order", () => {
    const headers = new HttpHeaders();
    headers.append("x-ms-meta-list", "b");
    headers.append("x-ms-meta-list", "a");

    expect(canonicalizeHeaders(headers)).toBe("x-ms-meta-list:b,a");
  });

  it("should return an empty string without x-ms- headers", () => {
    expect(canonicalizeHeaders(new HttpHeaders({ "Content-Type": "text/plain" }))).toBe("");
  });
});

describe("canonicalizeResource", () => {
  it("should prefix the account and decode the path", () => {
    expect(
      canonicalizeResource("https://myaccount.blob.core.windows.net/mycontainer/my%20blob", "myaccount")
    ).toBe("/myaccount/mycontainer/my blob");
  });

  it("should use / for the service root", () => {
    expect(canonicalizeResource("https://myaccount.blob.core.windows.net", "myaccount")).toBe("/myaccount/");
  });

  it("should list query keys lower-cased and sorted with sorted values", () => {
    const url =
      "https://myaccount.blob.core.windows.net/c?restype=container&Comp=list&include=snapshots&include=metadata";

    expect(canonicalizeResource(url, "myaccount")).toBe(
      "/myaccount/c\ncomp:list\ninclude:metadata,snapshots\nrestype:container"
    );
  });
});

describe("buildSharedKeyStringToSign", () => {
  it("should reject a path with a stray percent sign", () => {
    const request = createRequest("GET", "https://a.blob.core.windows.net/c/50%off");

    expect(() => buildSharedKeyStringToSign(request, "a")).toThrow(InvalidArgumentError);
  });

  it("should lay out the fields in the fixed order", () => {
    const request = createRequest("PUT", "https://myaccount.blob.core.windows.net/mycontainer/blob?comp=metadata", {
      headers: {
        "x-ms-version": "2017-04-17",
        "x-ms-date": DATE,
        "Content-Type": "text/plain",
        "Content-Length": "11",
        "If-Match": '"0x1"',
        Range: "bytes=0-9",
      },
    });

    expect(buildSharedKeyStringToSign(request, "myaccount")).toBe(
      [
        "PUT",
        "",
        "",
        "11",
        "",
        "text/plain",
        "",
        "",
        '"0x1"',
        "",
        "",
        "bytes=0-9",
        `x-ms-date:${DATE}\nx-ms-version:2017-04-17`,
        "/myaccount/mycontainer/blob\ncomp:metadata",
      ].join("\n")
    );
  });

  it("should leave Content-Length empty when it is zero", () => {
    const request = createRequest("DELETE", "https://a.blob.core.windows.net/c/b", {
      headers: { "Content-Length": "0", "x-ms-date": DATE },
    });

    const lines = buildSharedKeyStringToSign(request, "a").split("\n");

    expect(lines[0]).toBe("DELETE");
    expect(lines[3]).toBe("");
    expect(lines[12]).toBe(`x-ms-date:${DATE}`);
    expect(lines[13]).toBe("/a/c/b");
  });

  it("should not depend on header insertion order", () => {
    const url = "https://a.blob.core.windows.net/c/b?timeout=30";
    const first = createRequest("GET", url, {
      headers: { "x-ms-date": DATE, "x-ms-version": "2017-04-17", "x-ms-client-request-id": "id-1", Range: "bytes=0-1" },
    });
    const second = createRequest("GET", url, {
      headers: { Range: "bytes=0-1", "x-ms-client-request-id": "id-1", "x-ms-version": "2017-04-17", "x-ms-date": DATE },
    });

    expect(buildSharedKeyStringToSign(first, "a")).toBe(buildSharedKeyStringToSign(second, "a"));
  });
});

describe("compareOrdinal", () => {
  it("should order by code unit", () => {
    expect(["b", "B", "a", "_"].sort(compareOrdinal)).toEqual(["B", "_", "a", "b"]);
  });
});
