export { TelemetryPolicy, buildUserAgent } from "./telemetry-policy.js";
export { RequestIdPolicy } from "./request-id-policy.js";
export { RetryPolicy, type RetryPolicyOptions } from "./retry-policy.js";
export { DatePolicy } from "./date-policy.js";
export { DecodingPolicy } from "./decoding-policy.js";
export { LoggingPolicy, isErrorStatus } from "./logging-policy.js";
export { delay } from "./delay.js";
