import { describe, it, expect } from "vitest";
import { HttpHeaders } from "../headers.js";
import { bodyLength, bufferRequest, cloneRequest, createRequest } from "../types.js";

describe("HttpHeaders", () => {
  it("should match names case-insensitively", () => {
    const headers = new HttpHeaders({ "Content-Type": "text/plain" });

    expect(headers.get("content-type")).toBe("text/plain");
    expect(headers.has("CONTENT-TYPE")).toBe(true);
  });

  it("should join repeated values in insertion order", () => {
    const headers = new HttpHeaders({ "x-ms-meta-a": ["1", "2"] });
    headers.append("X-MS-META-A", "3");

    expect(headers.get("x-ms-meta-a")).toBe("1,2,3");
    expect(headers.getAll("x-ms-meta-a")).toEqual(["1", "2", "3"]);
  });

  it("should replace values on set and keep insertion order across names", () => {
    const headers = new HttpHeaders();
    headers.set("b", "1").set("a", 2).set("B", "3");

    expect([...headers]).toEqual([
      ["B", "3"],
      ["a", "2"],
    ]);
    expect(headers.size).toBe(2);
  });

  it("should give clones their own storage", () => {
    const headers = new HttpHeaders({ a: "1" });
    const copy = headers.clone();
    copy.append("a", "2");
    copy.delete("missing");

    expect(headers.get("a")).toBe("1");
    expect(copy.get("a")).toBe("1,2");
  });

  it("should skip undefined values from a raw record", () => {
    const headers = new HttpHeaders({ a: undefined, b: "x" });

    expect(headers.names()).toEqual(["b"]);
  });
});

describe("request helpers", () => {
  it("should clone a request with independent headers", () => {
    const request = createRequest("GET", "https://myaccount.blob.core.windows.net/c", { headers: { a: "1" } });
    const copy = cloneRequest(request, { url: "https://other/c" });
    copy.headers.set("a", "2");

    expect(request.headers.get("a")).toBe("1");
    expect(copy.url).toBe("https://other/c");
  });

  it("should buffer a streaming body once", async () => {
    async function* chunks(): AsyncGenerator<Uint8Array> {
      yield Buffer.from("ab");
      yield Buffer.from("cd");
    }
    const request = createRequest("PUT", "https://myaccount.blob.core.windows.net/c/b", { body: chunks() });

    expect(bodyLength(request.body)).toBeUndefined();
    const buffered = await bufferRequest(request);

    expect(bodyLength(buffered.body)).toBe(4);
    expect(Buffer.from(buffered.body instanceof Uint8Array ? buffered.body : "").toString()).toBe("abcd");
  });

  it("should count string bodies in UTF-8 bytes", () => {
    expect(bodyLength("é")).toBe(2);
    expect(bodyLength(undefined)).toBe(0);
  });
});
