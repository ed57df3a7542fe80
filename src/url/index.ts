/**
 * Blob URL helpers.
 */

export * from "./blob-url-parts.js";
