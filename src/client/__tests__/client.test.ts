import { describe, it, expect } from "vitest";
import { BlobUrl } from "../blob-url.js";
import { BlockBlobUrl } from "../block-blob-url.js";
import { ServiceUrl } from "../service-url.js";
import { configBuilder } from "../../config/index.js";
import { AnonymousCredential } from "../../credentials/index.js";
import {
  BlobStorageError,
  InvalidArgumentError,
  RequestAbortedError,
  TerminalHttpError,
  TransientTransportError,
} from "../../errors.js";
import { ETagCondition } from "../../http/conditions.js";
import { createPipeline } from "../../pipeline/create-pipeline.js";
import { MockTransport, createErrorResponse, createResponse } from "../../simulation/index.js";

const ENDPOINT = "https://myaccount.blob.core.windows.net";
const KEY = Buffer.from("test-secret").toString("base64");

function setup(transport: MockTransport, maxTries = 4): ServiceUrl {
  const pipeline = createPipeline(new AnonymousCredential(), {
    transport,
    retry: { maxTries },
    sleep: async () => {},
  });
  return new ServiceUrl(ENDPOINT, pipeline);
}

function lastCall(transport: MockTransport) {
  const calls = transport.getCalls();
  const call = calls[calls.length - 1];
  if (!call) {
    throw new Error("no request was sent");
  }
  return call;
}

describe("ServiceUrl", () => {
  it("should derive container and blob URLs", () => {
    const container = setup(new MockTransport()).createContainerUrl("mycontainer");

    expect(container.url).toBe(`${ENDPOINT}/mycontainer`);
    expect(container.createBlobUrl("dir/a b.txt").url).toBe(`${ENDPOINT}/mycontainer/dir/a%20b.txt`);
  });

  it("should reject a relative URL", () => {
    const pipeline = createPipeline(new AnonymousCredential(), { transport: new MockTransport() });

    expect(() => new ServiceUrl("/relative", pipeline)).toThrow(InvalidArgumentError);
  });

  it("should reject a URL whose path cannot be decoded", () => {
    const pipeline = createPipeline(new AnonymousCredential(), { transport: new MockTransport() });

    expect(() => new BlobUrl(`${ENDPOINT}/mycontainer/50%off`, pipeline)).toThrow(InvalidArgumentError);
  });

  it("should build a signed pipeline from configuration", async () => {
    const transport = new MockTransport().onDefault(() => createResponse(200));
    const config = configBuilder().sharedKey("myaccount", KEY).retryOptions({ maxTries: 1 }).build();

    await ServiceUrl.fromConfig(config, { transport }).createContainerUrl("c").getProperties();

    const call = lastCall(transport);
    expect(call.url).toBe(`${ENDPOINT}/c?restype=container`);
    expect(call.headers.get("authorization")).toMatch(/^SharedKey myaccount:/);
  });
});

describe("ContainerUrl", () => {
  it("should create a container with metadata", async () => {
    const transport = new MockTransport().on("PUT", "restype=container", () =>
      createResponse(201, "", { etag: '"0x1"', "x-ms-request-id": "req-1" })
    );
    const container = setup(transport).createContainerUrl("mycontainer");

    const response = await container.create({ project: "demo" }, { access: "blob" });

    const call = lastCall(transport);
    expect(call.url).toBe(`${ENDPOINT}/mycontainer?restype=container`);
    expect(call.headers.get("x-ms-meta-project")).toBe("demo");
    expect(call.headers.get("x-ms-blob-public-access")).toBe("blob");
    expect(call.headers.get("x-ms-version")).toBe("2017-04-17");
    expect(response.status).toBe(201);
    expect(response.etag).toBe('"0x1"');
    expect(response.requestId).toBe("req-1");
  });

  it("should refuse ETag conditions on delete", async () => {
    const transport = new MockTransport();
    const container = setup(transport).createContainerUrl("mycontainer");

    await expect(container.delete({ ifMatch: ETagCondition.any() })).rejects.toBeInstanceOf(InvalidArgumentError);
    expect(transport.callCount).toBe(0);
  });

  it("should send date conditions and the lease on delete", async () => {
    const transport = new MockTransport().onDefault(() => createResponse(202));
    const container = setup(transport).createContainerUrl("mycontainer");

    await container.delete({ ifModifiedSince: new Date(Date.UTC(2024, 0, 1)) }, { leaseId: "lease-1" });

    const call = lastCall(transport);
    expect(call.method).toBe("DELETE");
    expect(call.headers.get("if-modified-since")).toBe("Mon, 01 Jan 2024 00:00:00 GMT");
    expect(call.headers.get("x-ms-lease-id")).toBe("lease-1");
  });

  it("should read properties and metadata", async () => {
    const transport = new MockTransport().onDefault(() =>
      createResponse(200, "", {
        "x-ms-meta-Owner": "team-a",
        "x-ms-lease-state": "available",
        "x-ms-lease-status": "unlocked",
        "last-modified": "Mon, 01 Jan 2024 00:00:00 GMT",
      })
    );

    const properties = await setup(transport).createContainerUrl("mycontainer").getProperties();

    expect(properties.metadata).toEqual({ owner: "team-a" });
    expect(properties.leaseState).toBe("available");
    expect(properties.leaseStatus).toBe("unlocked");
    expect(properties.lastModified?.toISOString()).toBe("2024-01-01T00:00:00.000Z");
  });
});

describe("BlobUrl", () => {
  it("should download a range with conditions", async () => {
    const transport = new MockTransport().on("GET", "/mycontainer/a.txt", () =>
      createResponse(206, "hello", {
        "content-length": "5",
        "content-range": "bytes 0-4/11",
        "x-ms-blob-type": "BlockBlob",
      })
    );
    const blob = setup(transport).createContainerUrl("mycontainer").createBlobUrl("a.txt");

    const response = await blob.download({
      range: { offset: 0, count: 5 },
      conditions: { ifNoneMatch: ETagCondition.specific('"0x1"') },
      leaseId: "lease-1",
    });

    const call = lastCall(transport);
    expect(call.headers.get("range")).toBe("bytes=0-4");
    expect(call.headers.get("if-none-match")).toBe('"0x1"');
    expect(call.headers.get("x-ms-lease-id")).toBe("lease-1");
    expect(Buffer.from(response.body).toString()).toBe("hello");
    expect(response.contentLength).toBe(5);
    expect(response.contentRange).toBe("bytes 0-4/11");
    expect(response.blobType).toBe("BlockBlob");
  });

  it("should surface a 404 as a terminal error without retrying", async () => {
    const transport = new MockTransport().onDefault(() =>
      createErrorResponse(404, "BlobNotFound", "The specified blob does not exist.")
    );
    const blob = setup(transport).createContainerUrl("mycontainer").createBlobUrl("missing");

    const error = await blob.getProperties().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TerminalHttpError);
    expect(error).toMatchObject({ code: "BlobNotFound", statusCode: 404, retryable: false });
    expect(transport.callCount).toBe(1);
  });

  it("should surface a final 503 as a transient error", async () => {
    const busy = createErrorResponse(503, "ServerBusy", "The server is busy.");
    const transport = new MockTransport().enqueue(busy, busy);
    const blob = setup(transport, 2).createContainerUrl("mycontainer").createBlobUrl("a.txt");

    const error = await blob.download().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransientTransportError);
    expect(error).toMatchObject({ code: "ServerBusy", statusCode: 503, message: "The server is busy." });
    expect(transport.callCount).toBe(2);
  });

  it("should delete with snapshots included", async () => {
    const transport = new MockTransport().onDefault(() => createResponse(202));
    const blob = setup(transport).createContainerUrl("mycontainer").createBlobUrl("a.txt");

    await blob.delete({ deleteSnapshots: "include", conditions: { ifMatch: ETagCondition.specific('"0x2"') } });

    const call = lastCall(transport);
    expect(call.headers.get("x-ms-delete-snapshots")).toBe("include");
    expect(call.headers.get("if-match")).toBe('"0x2"');
  });

  it("should acquire and release a lease", async () => {
    const transport = new MockTransport().onDefault((request) =>
      createResponse(request.headers.get("x-ms-lease-action") === "acquire" ? 201 : 200, "", {
        "x-ms-lease-id": "lease-1",
      })
    );
    const blob = setup(transport).createContainerUrl("mycontainer").createBlobUrl("a.txt");

    const lease = await blob.acquireLease(30, "proposed-1");
    const acquire = lastCall(transport);
    await blob.releaseLease("lease-1");
    const release = lastCall(transport);

    expect(lease.leaseId).toBe("lease-1");
    expect(lease.status).toBe(201);
    expect(acquire.url).toBe(`${ENDPOINT}/mycontainer/a.txt?comp=lease`);
    expect(acquire.headers.get("x-ms-lease-duration")).toBe("30");
    expect(acquire.headers.get("x-ms-proposed-lease-id")).toBe("proposed-1");
    expect(release.headers.get("x-ms-lease-action")).toBe("release");
    expect(release.headers.get("x-ms-lease-id")).toBe("lease-1");
  });

  it("should validate the lease duration before sending", async () => {
    const transport = new MockTransport();
    const blob = setup(transport).createContainerUrl("mycontainer").createBlobUrl("a.txt");

    await expect(blob.acquireLease(10)).rejects.toBeInstanceOf(InvalidArgumentError);
    expect(transport.callCount).toBe(0);
  });

  it("should fail when the service returns no lease id", async () => {
    const transport = new MockTransport().onDefault(() => createResponse(201));
    const blob = setup(transport).createContainerUrl("mycontainer").createBlobUrl("a.txt");

    const error = await blob.acquireLease(-1).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BlobStorageError);
    expect(error).toMatchObject({ code: "LeaseIdMissing" });
  });

  it("should start a copy", async () => {
    const transport = new MockTransport().onDefault(() =>
      createResponse(202, "", { "x-ms-copy-id": "copy-1", "x-ms-copy-status": "pending" })
    );
    const blob = setup(transport).createContainerUrl("mycontainer").createBlobUrl("b.txt");

    const response = await blob.startCopyFromUrl(`${ENDPOINT}/mycontainer/a.txt`);

    expect(lastCall(transport).headers.get("x-ms-copy-source")).toBe(`${ENDPOINT}/mycontainer/a.txt`);
    expect(response.copyId).toBe("copy-1");
    expect(response.copyStatus).toBe("pending");
  });

  it("should address snapshots and swap pipelines", () => {
    const service = setup(new MockTransport());
    const blob = service.createContainerUrl("mycontainer").createBlockBlobUrl("a.txt");
    const other = createPipeline(new AnonymousCredential(), { transport: new MockTransport() });

    const snapshot = blob.withSnapshot("2024-01-01T00:00:00.0000000Z");

    expect(snapshot).toBeInstanceOf(BlockBlobUrl);
    expect(snapshot.url).toBe(`${ENDPOINT}/mycontainer/a.txt?snapshot=2024-01-01T00%3A00%3A00.0000000Z`);
    expect(snapshot.withSnapshot("").url).toBe(`${ENDPOINT}/mycontainer/a.txt`);
    expect(blob.withPipeline(other).pipeline).toBe(other);
  });

  it("should stop at once when the caller aborted", async () => {
    const transport = new MockTransport().onDefault(() => createResponse(200));
    const blob = setup(transport).createContainerUrl("mycontainer").createBlobUrl("a.txt");
    const controller = new AbortController();
    controller.abort();

    await expect(blob.download({ abortSignal: controller.signal })).rejects.toBeInstanceOf(RequestAbortedError);
  });
});

describe("BlockBlobUrl", () => {
  it("should upload a block blob", async () => {
    const transport = new MockTransport().onDefault(() =>
      createResponse(201, "", { etag: '"0x3"', "content-md5": "XUFAKrxLKna5cZ2REBfFkg==" })
    );
    const blob = setup(transport).createContainerUrl("mycontainer").createBlockBlobUrl("dir/a.txt");

    const response = await blob.upload("hello", { contentType: "text/plain", metadata: { source: "test" } });

    const call = lastCall(transport);
    expect(call.method).toBe("PUT");
    expect(call.url).toBe(`${ENDPOINT}/mycontainer/dir/a.txt`);
    expect(call.body).toBe("hello");
    expect(call.headers.get("x-ms-blob-type")).toBe("BlockBlob");
    expect(call.headers.get("x-ms-blob-content-type")).toBe("text/plain");
    expect(call.headers.get("x-ms-meta-source")).toBe("test");
    expect(response.etag).toBe('"0x3"');
    expect(response.contentMD5).toBe("XUFAKrxLKna5cZ2REBfFkg==");
  });
});

describe("BlobUrl with a stored content encoding", () => {
  const gzipped = Uint8Array.from([0x1f, 0x8b, 0x08, 0x00, 0x01, 0x02]);

  it("should read properties of a gzip-stored blob in one request", async () => {
    const transport = new MockTransport().on("HEAD", "/mycontainer/a.gz", () =>
      createResponse(200, "", { "content-encoding": "gzip", "content-length": "6", etag: '"0x1"' })
    );
    const blob = setup(transport).createContainerUrl("mycontainer").createBlobUrl("a.gz");

    const properties = await blob.getProperties();

    expect(transport.callCount).toBe(1);
    expect(properties.contentEncoding).toBe("gzip");
    expect(properties.contentLength).toBe(6);
  });

  it("should return the stored bytes of a ranged download", async () => {
    const transport = new MockTransport().on("GET", "/mycontainer/a.gz", () =>
      createResponse(206, gzipped.subarray(0, 4), {
        "content-encoding": "gzip",
        "content-length": "4",
        "content-range": "bytes 0-3/6",
      })
    );
    const blob = setup(transport).createContainerUrl("mycontainer").createBlobUrl("a.gz");

    const response = await blob.download({ range: { offset: 0, count: 4 } });

    expect(Array.from(response.body)).toEqual([0x1f, 0x8b, 0x08, 0x00]);
    expect(response.contentEncoding).toBe("gzip");
    expect(response.contentRange).toBe("bytes 0-3/6");
  });

  it("should return the stored bytes of a full download", async () => {
    const transport = new MockTransport().on("GET", "/mycontainer/a.gz", () =>
      createResponse(200, gzipped, { "content-encoding": "gzip", "content-length": "6" })
    );
    const blob = setup(transport).createContainerUrl("mycontainer").createBlobUrl("a.gz");

    const response = await blob.download();

    expect(Array.from(response.body)).toEqual(Array.from(gzipped));
    expect(response.contentEncoding).toBe("gzip");
    expect(response.contentLength).toBe(6);
  });
});

describe("BlobUrl properties, snapshots and leases", () => {
  it("should set HTTP headers and metadata", async () => {
    const transport = new MockTransport().onDefault(() => createResponse(200, "", { etag: '"0x2"' }));
    const blob = setup(transport).createContainerUrl("mycontainer").createBlobUrl("a.txt");

    await blob.setHttpHeaders({ contentType: "text/plain", cacheControl: "no-cache" }, { leaseId: "lease-1" });
    const properties = lastCall(transport);
    const response = await blob.setMetadata({ owner: "ops" });
    const metadata = lastCall(transport);

    expect(properties.url).toBe(`${ENDPOINT}/mycontainer/a.txt?comp=properties`);
    expect(properties.headers.get("x-ms-blob-content-type")).toBe("text/plain");
    expect(properties.headers.get("x-ms-blob-cache-control")).toBe("no-cache");
    expect(properties.headers.get("x-ms-lease-id")).toBe("lease-1");
    expect(metadata.url).toBe(`${ENDPOINT}/mycontainer/a.txt?comp=metadata`);
    expect(metadata.headers.get("x-ms-meta-owner")).toBe("ops");
    expect(response.etag).toBe('"0x2"');
  });

  it("should create a snapshot", async () => {
    const transport = new MockTransport().onDefault(() =>
      createResponse(201, "", { "x-ms-snapshot": "2024-01-01T00:00:00.0000000Z" })
    );
    const blob = setup(transport).createContainerUrl("mycontainer").createBlobUrl("a.txt");

    const response = await blob.createSnapshot({ metadata: { tag: "v1" } });

    expect(lastCall(transport).url).toBe(`${ENDPOINT}/mycontainer/a.txt?comp=snapshot`);
    expect(lastCall(transport).headers.get("x-ms-meta-tag")).toBe("v1");
    expect(response.snapshot).toBe("2024-01-01T00:00:00.0000000Z");
  });

  it("should renew and change a lease", async () => {
    const transport = new MockTransport().onDefault((request) =>
      createResponse(200, "", {
        "x-ms-lease-id": request.headers.get("x-ms-proposed-lease-id") ?? request.headers.get("x-ms-lease-id") ?? "",
      })
    );
    const blob = setup(transport).createContainerUrl("mycontainer").createBlobUrl("a.txt");

    const renewed = await blob.renewLease("lease-1");
    const renew = lastCall(transport);
    const changed = await blob.changeLease("lease-1", "lease-2");
    const change = lastCall(transport);

    expect(renew.headers.get("x-ms-lease-action")).toBe("renew");
    expect(renewed.leaseId).toBe("lease-1");
    expect(change.headers.get("x-ms-lease-action")).toBe("change");
    expect(change.headers.get("x-ms-lease-id")).toBe("lease-1");
    expect(change.headers.get("x-ms-proposed-lease-id")).toBe("lease-2");
    expect(changed.leaseId).toBe("lease-2");
  });

  it("should break a lease with a period", async () => {
    const transport = new MockTransport().onDefault(() => createResponse(202, "", { "x-ms-lease-time": "15" }));
    const blob = setup(transport).createContainerUrl("mycontainer").createBlobUrl("a.txt");

    const response = await blob.breakLease(15);

    const call = lastCall(transport);
    expect(call.url).toBe(`${ENDPOINT}/mycontainer/a.txt?comp=lease`);
    expect(call.headers.get("x-ms-lease-action")).toBe("break");
    expect(call.headers.get("x-ms-lease-break-period")).toBe("15");
    expect(response.leaseTime).toBe(15);
  });

  it("should refuse a break period over a minute before sending", async () => {
    const transport = new MockTransport();
    const blob = setup(transport).createContainerUrl("mycontainer").createBlobUrl("a.txt");

    await expect(blob.breakLease(61)).rejects.toBeInstanceOf(InvalidArgumentError);
    expect(transport.callCount).toBe(0);
  });

  it("should abort a pending copy", async () => {
    const transport = new MockTransport().onDefault(() => createResponse(204));
    const blob = setup(transport).createContainerUrl("mycontainer").createBlobUrl("b.txt");

    const response = await blob.abortCopyFromUrl("copy-1", { leaseId: "lease-1" });

    const call = lastCall(transport);
    expect(call.url).toBe(`${ENDPOINT}/mycontainer/b.txt?comp=copy&copyid=copy-1`);
    expect(call.headers.get("x-ms-copy-action")).toBe("abort");
    expect(call.headers.get("x-ms-lease-id")).toBe("lease-1");
    expect(response.status).toBe(204);
  });
});

describe("ContainerUrl.setMetadata", () => {
  it("should replace the container metadata", async () => {
    const transport = new MockTransport().onDefault(() => createResponse(200, "", { etag: '"0x9"' }));
    const container = setup(transport).createContainerUrl("mycontainer");

    const response = await container.setMetadata({ project: "demo" }, { leaseId: "lease-1" });

    const call = lastCall(transport);
    expect(call.method).toBe("PUT");
    expect(call.url).toBe(`${ENDPOINT}/mycontainer?restype=container&comp=metadata`);
    expect(call.headers.get("x-ms-meta-project")).toBe("demo");
    expect(call.headers.get("x-ms-lease-id")).toBe("lease-1");
    expect(response.etag).toBe('"0x9"');
  });
});
