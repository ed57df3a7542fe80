/**
 * Per-try request logging.
 */

import type { LoggingOptions } from "../config/index.js";
import type { HttpRequest, HttpResponse } from "../http/types.js";
import { MetricNames, redactUrl, type Logger, type MetricsCollector } from "../observability/index.js";
import type { NextPolicy, PipelinePolicy } from "../pipeline/policy.js";

/**
 * 4xx statuses that callers routinely branch on and that are not logged as errors.
 */
const EXPECTED_CLIENT_STATUSES = new Set([404, 409, 412, 416]);

export function isErrorStatus(status: number): boolean {
  if (status >= 500) return true;
  return status >= 400 && !EXPECTED_CLIENT_STATUSES.has(status);
}

export class LoggingPolicy implements PipelinePolicy {
  readonly name = "logging";
  private readonly options: LoggingOptions;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;

  constructor(options: LoggingOptions, logger: Logger, metrics: MetricsCollector) {
    this.options = options;
    this.logger = logger;
    this.metrics = metrics;
  }

  async send(request: HttpRequest, next: NextPolicy): Promise<HttpResponse> {
    const startedAt = Date.now();
    const tryNumber = request.tryInfo?.tryNumber ?? 1;
    const operationStartedAt = request.tryInfo?.operationStartedAt ?? startedAt;
    const url = redactUrl(request.url);

    this.logger.debug("Outgoing request", { method: request.method, url, tryNumber });

    let response: HttpResponse;
    try {
      response = await next(request);
    } catch (error) {
      this.logger.error("Request attempt failed", {
        method: request.method,
        url,
        tryNumber,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }

    const finishedAt = Date.now();
    const durationMs = finishedAt - startedAt;
    const context = {
      method: request.method,
      url,
      status: response.status,
      tryNumber,
      durationMs,
      operationDurationMs: finishedAt - operationStartedAt,
    };
    this.metrics.recordHistogram(MetricNames.TRY_LATENCY_MS, durationMs, { method: request.method });

    if (isErrorStatus(response.status)) {
      this.logger.error("Request failed", context);
    } else if (durationMs >= this.options.slowRequestThresholdMs) {
      this.logger.warn(`Slow request, took over ${this.options.slowRequestThresholdMs}ms`, context);
    } else {
      this.logger.info("Received response", context);
    }

    return response;
  }
}
