import { AnonymousCredential } from "../../credentials/index.js";
import type { HttpRequest, RequestBody } from "../../http/types.js";
import { createPipeline } from "../../pipeline/create-pipeline.js";
import { MockTransport } from "../../simulation/index.js";
import { ServiceUrl } from "../service-url.js";

export const ENDPOINT = "https://myaccount.blob.core.windows.net";

export function setup(transport: MockTransport, maxTries = 4): ServiceUrl {
  const pipeline = createPipeline(new AnonymousCredential(), {
    transport,
    retry: { maxTries },
    sleep: async () => {},
  });
  return new ServiceUrl(ENDPOINT, pipeline);
}

export function lastCall(transport: MockTransport): HttpRequest {
  const calls = transport.getCalls();
  const call = calls[calls.length - 1];
  if (!call) {
    throw new Error("no request was sent");
  }
  return call;
}

export function bodyText(body: RequestBody | undefined): string {
  if (body === undefined || typeof body === "string") {
    return body ?? "";
  }
  if (body instanceof Uint8Array) {
    return Buffer.from(body).toString("utf8");
  }
  throw new Error("request body was not buffered");
}
