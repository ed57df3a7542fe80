/**
 * URL clients.
 */

export * from "./models.js";
export * from "./storage-url.js";
export * from "./service-url.js";
export * from "./container-url.js";
export * from "./blob-url.js";
export * from "./block-blob-url.js";
export * from "./page-blob-url.js";
export * from "./append-blob-url.js";
export * from "./high-level.js";
export { parseBlobListing, parseContainerListing, type BlobListing, type ContainerListing } from "./listing.js";
