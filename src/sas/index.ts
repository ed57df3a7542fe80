/**
 * Shared access signatures.
 */

export * from "./permissions.js";
export * from "./ip-range.js";
export * from "./protocol.js";
export * from "./sas-query-parameters.js";
export * from "./account-sas.js";
export * from "./service-sas.js";
