import { describe, it, expect } from "vitest";
import { createBlockId } from "../block-blob-url.js";
import { InvalidArgumentError } from "../../errors.js";
import { ETagCondition } from "../../http/conditions.js";
import { MockTransport, createResponse } from "../../simulation/index.js";
import { ENDPOINT, bodyText, lastCall, setup } from "./helpers.js";

const BLOCK_LIST = `<?xml version="1.0" encoding="utf-8"?>
<BlockList>
  <CommittedBlocks>
    <Block><Name>YmxvY2stMDAwMDAw</Name><Size>4194304</Size></Block>
    <Block><Name>YmxvY2stMDAwMDAx</Name><Size>1024</Size></Block>
  </CommittedBlocks>
  <UncommittedBlocks>
    <Block><Name>YmxvY2stMDAwMDAy</Name><Size>512</Size></Block>
  </UncommittedBlocks>
</BlockList>`;

describe("createBlockId", () => {
  it("should pad the index so every id has the same length", () => {
    expect(createBlockId(0)).toBe("YmxvY2stMDAwMDAw");
    expect(createBlockId(2)).toBe("YmxvY2stMDAwMDAy");
    expect(createBlockId(123456)).toHaveLength(createBlockId(0).length);
  });
});

describe("BlockBlobUrl", () => {
  it("should stage a block under an encoded id", async () => {
    const transport = new MockTransport().onDefault(() =>
      createResponse(201, "", { "content-md5": "XUFAKrxLKna5cZ2REBfFkg==", "x-ms-request-id": "req-1" })
    );
    const blob = setup(transport).createContainerUrl("mycontainer").createBlockBlobUrl("a.bin");

    const response = await blob.stageBlock("a+b/c=", "hello", { leaseId: "lease-1" });

    const call = lastCall(transport);
    expect(call.method).toBe("PUT");
    expect(call.url).toBe(`${ENDPOINT}/mycontainer/a.bin?comp=block&blockid=a%2Bb%2Fc%3D`);
    expect(call.headers.get("x-ms-lease-id")).toBe("lease-1");
    expect(bodyText(call.body)).toBe("hello");
    expect(response.contentMD5).toBe("XUFAKrxLKna5cZ2REBfFkg==");
    expect(response.requestId).toBe("req-1");
  });

  it("should refuse an empty block id before sending", async () => {
    const transport = new MockTransport();
    const blob = setup(transport).createContainerUrl("mycontainer").createBlockBlobUrl("a.bin");

    await expect(blob.stageBlock("", "hello")).rejects.toBeInstanceOf(InvalidArgumentError);
    expect(transport.callCount).toBe(0);
  });

  it("should commit the block list in order", async () => {
    const transport = new MockTransport().onDefault(() => createResponse(201, "", { etag: '"0x4"' }));
    const blob = setup(transport).createContainerUrl("mycontainer").createBlockBlobUrl("a.bin");

    const response = await blob.commitBlockList(["id-2", "id-1&"], {
      httpHeaders: { contentType: "application/octet-stream" },
      metadata: { owner: "test" },
      conditions: { ifMatch: ETagCondition.specific('"0x3"') },
    });

    const call = lastCall(transport);
    expect(call.url).toBe(`${ENDPOINT}/mycontainer/a.bin?comp=blocklist`);
    expect(call.headers.get("content-type")).toBe("application/xml");
    expect(call.headers.get("x-ms-blob-content-type")).toBe("application/octet-stream");
    expect(call.headers.get("x-ms-meta-owner")).toBe("test");
    expect(call.headers.get("if-match")).toBe('"0x3"');
    expect(bodyText(call.body)).toBe(
      '<?xml version="1.0" encoding="utf-8"?><BlockList><Latest>id-2</Latest><Latest>id-1&amp;</Latest></BlockList>'
    );
    expect(response.etag).toBe('"0x4"');
  });

  it("should refuse a block list longer than the service allows", async () => {
    const transport = new MockTransport();
    const blob = setup(transport).createContainerUrl("mycontainer").createBlockBlobUrl("a.bin");
    const ids = Array.from({ length: 50_001 }, (_, index) => createBlockId(index));

    await expect(blob.commitBlockList(ids)).rejects.toBeInstanceOf(InvalidArgumentError);
    expect(transport.callCount).toBe(0);
  });

  it("should read committed and uncommitted blocks", async () => {
    const transport = new MockTransport().onDefault(() =>
      createResponse(200, BLOCK_LIST, { etag: '"0x5"', "x-ms-blob-content-length": "4195328" })
    );
    const blob = setup(transport).createContainerUrl("mycontainer").createBlockBlobUrl("a.bin");

    const response = await blob.getBlockList("all");

    expect(lastCall(transport).url).toBe(`${ENDPOINT}/mycontainer/a.bin?comp=blocklist&blocklisttype=all`);
    expect(response.blobContentLength).toBe(4195328);
    expect(response.committedBlocks).toEqual([
      { name: "YmxvY2stMDAwMDAw", size: 4194304 },
      { name: "YmxvY2stMDAwMDAx", size: 1024 },
    ]);
    expect(response.uncommittedBlocks).toEqual([{ name: "YmxvY2stMDAwMDAy", size: 512 }]);
  });

  it("should read an empty block list", async () => {
    const transport = new MockTransport().onDefault(() =>
      createResponse(200, "<BlockList><CommittedBlocks /><UncommittedBlocks /></BlockList>")
    );
    const blob = setup(transport).createContainerUrl("mycontainer").createBlockBlobUrl("a.bin");

    const response = await blob.getBlockList();

    expect(lastCall(transport).url).toBe(`${ENDPOINT}/mycontainer/a.bin?comp=blocklist&blocklisttype=committed`);
    expect(response.committedBlocks).toEqual([]);
    expect(response.uncommittedBlocks).toEqual([]);
  });
});
