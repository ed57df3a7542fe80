import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { MockAgent } from "undici";
import { UndiciTransport } from "../undici-transport.js";
import { createRequest, bodyAsText } from "../../http/types.js";
import { RequestAbortedError, TransientTransportError } from "../../errors.js";

const ORIGIN = "https://myaccount.blob.core.windows.net";

describe("UndiciTransport", () => {
  let agent: MockAgent;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    await agent.close();
  });

  it("should return status, headers and the buffered body", async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: "/container/blob", method: "GET" })
      .reply(200, "hello", { headers: { "x-ms-request-id": "req-1" } });
    const transport = new UndiciTransport({ dispatcher: agent });
    const request = createRequest("GET", `${ORIGIN}/container/blob`);

    const response = await transport.send(request);

    expect(response.status).toBe(200);
    expect(bodyAsText(response)).toBe("hello");
    expect(response.headers.get("x-ms-request-id")).toBe("req-1");
    expect(response.request).toBe(request);
  });

  it("should map network failures to TransientTransportError", async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: "/container/blob", method: "GET" })
      .replyWithError(new Error("socket hang up"));
    const transport = new UndiciTransport({ dispatcher: agent });

    await expect(transport.send(createRequest("GET", `${ORIGIN}/container/blob`))).rejects.toBeInstanceOf(
      TransientTransportError
    );
  });

  it("should reject an already aborted request without sending it", async () => {
    const controller = new AbortController();
    controller.abort();
    const transport = new UndiciTransport({ dispatcher: agent });

    await expect(
      transport.send(createRequest("GET", `${ORIGIN}/container/blob`, { abortSignal: controller.signal }))
    ).rejects.toBeInstanceOf(RequestAbortedError);
  });
});
