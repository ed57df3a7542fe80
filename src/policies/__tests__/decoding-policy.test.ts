import { describe, it, expect } from "vitest";
import { gzipSync } from "zlib";
import { DecodingPolicy } from "../decoding-policy.js";
import { createRequest, type HttpRequest, type HttpResponse } from "../../http/types.js";
import { TerminalHttpError, TransientTransportError } from "../../errors.js";
import { createErrorResponse, createResponse, type MockResponse } from "../../simulation/index.js";

function nextReturning(mock: MockResponse) {
  return async (request: HttpRequest): Promise<HttpResponse> => ({ ...mock, request });
}

const request = createRequest("GET", "https://myaccount.blob.core.windows.net/container/blob");

describe("DecodingPolicy", () => {
  it("should leave a gzip-stored body and its headers untouched", async () => {
    const stored = gzipSync("hello world");
    const mock = createResponse(200, stored, {
      "Content-Encoding": "gzip",
      "Content-Length": String(stored.byteLength),
    });

    const response = await new DecodingPolicy().send(request, nextReturning(mock));

    expect(response.body).toBe(mock.body);
    expect(response.headers.get("content-encoding")).toBe("gzip");
    expect(response.headers.get("content-length")).toBe(String(stored.byteLength));
    expect(response.error).toBeUndefined();
  });

  it("should pass an empty HEAD body with a stored encoding through", async () => {
    const head = createRequest("HEAD", "https://myaccount.blob.core.windows.net/container/blob");
    const mock = createResponse(200, "", { "Content-Encoding": "gzip", "Content-Length": "34" });

    const response = await new DecodingPolicy().send(head, nextReturning(mock));

    expect(response.body.byteLength).toBe(0);
    expect(response.headers.get("content-length")).toBe("34");
  });

  it("should decode a service error body into a terminal error", async () => {
    const mock = createErrorResponse(409, "LeaseAlreadyPresent", "There is already a lease.");

    const response = await new DecodingPolicy().send(request, nextReturning(mock));

    expect(response.status).toBe(409);
    expect(response.error).toBeInstanceOf(TerminalHttpError);
    expect(response.error).toMatchObject({ code: "LeaseAlreadyPresent", message: "There is already a lease." });
  });

  it("should decode 503 as a transient error", async () => {
    const response = await new DecodingPolicy().send(request, nextReturning(createResponse(503)));

    expect(response.error).toBeInstanceOf(TransientTransportError);
    expect(response.error?.code).toBe("ServerBusy");
  });
});
