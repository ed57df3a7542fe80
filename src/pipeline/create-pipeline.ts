/**
 * Default pipeline composition.
 */

import {
  DEFAULT_LOGGING_OPTIONS,
  DEFAULT_TELEMETRY_OPTIONS,
  type LoggingOptions,
  type TelemetryOptions,
} from "../config/index.js";
import { createRetryOptions, type RetryOptions, type RetryOptionsInput } from "../config/retry-options.js";
import type { Credential } from "../credentials/index.js";
import { NoopLogger, NoopMetricsCollector, type Logger, type MetricsCollector } from "../observability/index.js";
import { DatePolicy } from "../policies/date-policy.js";
import { DecodingPolicy } from "../policies/decoding-policy.js";
import { LoggingPolicy } from "../policies/logging-policy.js";
import { RequestIdPolicy } from "../policies/request-id-policy.js";
import { RetryPolicy } from "../policies/retry-policy.js";
import { TelemetryPolicy } from "../policies/telemetry-policy.js";
import type { HttpTransport } from "../transport/types.js";
import { UndiciTransport } from "../transport/undici-transport.js";
import { Pipeline } from "./pipeline.js";

export interface PipelineOptions {
  /** Validated options, or raw input passed through createRetryOptions. */
  retry?: RetryOptions | RetryOptionsInput;
  logging?: Partial<LoggingOptions>;
  telemetry?: Partial<TelemetryOptions>;
  logger?: Logger;
  metrics?: MetricsCollector;
  /** Defaults to an {@link UndiciTransport}. */
  transport?: HttpTransport;
  /** Overrides for the retry policy's wait and jitter source. */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
}

/**
 * Build the standard pipeline:
 * telemetry → request-id → retry → date → credential → decoding → logging → transport.
 *
 * Everything from date onwards runs once per attempt.
 */
export function createPipeline(credential: Credential, options: PipelineOptions = {}): Pipeline {
  const logger = options.logger ?? new NoopLogger();
  const metrics = options.metrics ?? new NoopMetricsCollector();
  const retry = createRetryOptions(options.retry);

  return new Pipeline(
    [
      new TelemetryPolicy({ ...DEFAULT_TELEMETRY_OPTIONS, ...options.telemetry }, metrics),
      new RequestIdPolicy(),
      new RetryPolicy({
        retry,
        logger: logger.child({ policy: "retry" }),
        metrics,
        sleep: options.sleep,
        random: options.random,
      }),
      new DatePolicy(),
      credential.createPolicy({ logger: logger.child({ policy: credential.kind }) }),
      new DecodingPolicy(),
      new LoggingPolicy({ ...DEFAULT_LOGGING_OPTIONS, ...options.logging }, logger, metrics),
    ],
    options.transport ?? new UndiciTransport()
  );
}
