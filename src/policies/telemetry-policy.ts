/**
 * Telemetry policy: User-Agent stamping and operation metrics.
 */

import { release, type } from "os";
import { HeaderNames, USER_AGENT_PRODUCT, USER_AGENT_VERSION } from "../config/constants.js";
import type { TelemetryOptions } from "../config/index.js";
import { cloneRequest, type HttpRequest, type HttpResponse } from "../http/types.js";
import { MetricNames, type MetricsCollector } from "../observability/index.js";
import type { NextPolicy, PipelinePolicy } from "../pipeline/policy.js";

/**
 * Build the User-Agent value: `[prefix ]Azure-Storage-Blob-TS/1.0.0 (Node.js v20.x; Linux 6.x)`.
 */
export function buildUserAgent(prefix: string): string {
  const platform = `(Node.js ${process.version}; ${type().replace(/\s+/g, "")} ${release()})`;
  const product = `${USER_AGENT_PRODUCT}/${USER_AGENT_VERSION} ${platform}`;
  return prefix.length > 0 ? `${prefix} ${product}` : product;
}

export class TelemetryPolicy implements PipelinePolicy {
  readonly name = "telemetry";
  private readonly userAgent: string;
  private readonly metrics: MetricsCollector;

  constructor(options: TelemetryOptions, metrics: MetricsCollector) {
    this.userAgent = buildUserAgent(options.userAgentPrefix);
    this.metrics = metrics;
  }

  async send(request: HttpRequest, next: NextPolicy): Promise<HttpResponse> {
    const stamped = cloneRequest(request);
    stamped.headers.set(HeaderNames.USER_AGENT, this.userAgent);

    const startedAt = Date.now();
    let status = "error";
    try {
      const response = await next(stamped);
      status = String(response.status);
      return response;
    } finally {
      this.metrics.incrementCounter(MetricNames.OPERATIONS_TOTAL, 1, { method: request.method, status });
      this.metrics.recordHistogram(MetricNames.OPERATION_LATENCY_MS, Date.now() - startedAt, {
        method: request.method,
      });
    }
  }
}
