/**
 * Azure Blob Storage pipeline
 *
 * A request pipeline with retry, secondary-host failover and shared-key or
 * bearer-token signing, SAS generation, and URL clients for blob storage.
 *
 * @example
 * ```typescript
 * import { ServiceUrl, configBuilder, createConsoleLogger } from "azure-blob-pipeline";
 *
 * const config = configBuilder().fromEnv().build();
 * const service = ServiceUrl.fromConfig(config, { logger: createConsoleLogger("info") });
 *
 * const blob = service.createContainerUrl("mycontainer").createBlockBlobUrl("hello.txt");
 * await blob.upload("hello", { contentType: "text/plain" });
 * const { body } = await blob.download({ range: { offset: 0, count: 5 } });
 * ```
 */

// Clients
export * from "./client/index.js";

// Configuration
export * from "./config/index.js";

// Credentials
export * from "./credentials/index.js";

// Pipeline and policies
export * from "./pipeline/index.js";
export * from "./policies/index.js";

// Transport
export * from "./transport/index.js";
export {
  MockTransport,
  createResponse,
  createErrorResponse,
  type MockHandler,
  type MockResponse,
} from "./simulation/index.js";

// HTTP model
export { HttpHeaders, type RawHeaders } from "./http/headers.js";
export * from "./http/types.js";
export * from "./http/conditions.js";

// Signing and SAS
export * from "./signing/index.js";
export * from "./sas/index.js";

// URLs
export * from "./url/index.js";

// Errors
export * from "./errors.js";

// Observability
export * from "./observability/index.js";
