/**
 * Retry policy with read-only secondary failover.
 *
 * Each operation owns its own attempt counter, target selection and timers;
 * the policy instance itself is shared and stateless.
 */

import { calculateRetryDelay, type RetryOptions } from "../config/retry-options.js";
import { TimeoutError, abortedOperationError, isRetryable } from "../errors.js";
import {
  bufferRequest,
  cloneRequest,
  type HttpRequest,
  type HttpResponse,
  type RetryTarget,
} from "../http/types.js";
import { MetricNames, type Logger, type MetricsCollector } from "../observability/index.js";
import type { NextPolicy, PipelinePolicy } from "../pipeline/policy.js";
import { delay } from "./delay.js";

export interface RetryPolicyOptions {
  retry: RetryOptions;
  logger: Logger;
  metrics: MetricsCollector;
  /** Waits between attempts. Must reject when the signal aborts. */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  /** Uniform [0, 1) source for the secondary jitter. */
  random?: () => number;
}

interface Retry {
  retry: true;
  reason: string;
  disableSecondary: boolean;
}

type Verdict = { retry: false } | Retry;

export class RetryPolicy implements PipelinePolicy {
  readonly name = "retry";
  private readonly retry: RetryOptions;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly random: () => number;

  constructor(options: RetryPolicyOptions) {
    this.retry = options.retry;
    this.logger = options.logger;
    this.metrics = options.metrics;
    this.sleep = options.sleep ?? delay;
    this.random = options.random ?? Math.random;
  }

  async send(request: HttpRequest, next: NextPolicy): Promise<HttpResponse> {
    const buffered = await bufferRequest(request);
    const signal = request.abortSignal;
    const operationStartedAt = Date.now();
    const secondaryHost = this.retry.secondaryHost;

    let considerSecondary =
      secondaryHost !== undefined && (request.method === "GET" || request.method === "HEAD");
    let primaryTry = 1;
    let lastResponse: HttpResponse | undefined;
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.retry.maxTries; attempt++) {
      const target: RetryTarget = !considerSecondary || attempt % 2 === 1 ? "primary" : "secondary";
      const delayMs =
        target === "primary" ? calculateRetryDelay(this.retry, primaryTry) : Math.round((this.random() / 2 + 0.8) * 1000);

      if (delayMs > 0) {
        await this.sleep(delayMs, signal);
      }
      if (signal?.aborted) {
        throw abortedOperationError(signal);
      }

      const attemptRequest = cloneRequest(buffered, {
        url: target === "secondary" && secondaryHost ? withHost(buffered.url, secondaryHost) : buffered.url,
        tryInfo: { tryNumber: attempt, target, operationStartedAt },
      });

      let verdict: Retry;
      try {
        const response = await this.sendWithTimeout(attemptRequest, next);
        const classified = this.classify(response, target);
        if (!classified.retry) {
          return response;
        }
        verdict = classified;
        lastResponse = response;
        lastError = undefined;
      } catch (error) {
        if (signal?.aborted) {
          throw abortedOperationError(signal);
        }
        if (!isRetryable(error)) {
          throw error;
        }
        verdict = { retry: true, reason: error instanceof Error ? error.message : String(error), disableSecondary: false };
        lastResponse = undefined;
        lastError = error;
      }

      if (verdict.disableSecondary) {
        considerSecondary = false;
        this.metrics.incrementCounter(MetricNames.SECONDARY_DISABLED);
      }
      if (target === "primary") {
        primaryTry++;
      }

      if (attempt < this.retry.maxTries) {
        this.metrics.incrementCounter(MetricNames.RETRY_ATTEMPTS, 1, { target });
        this.logger.info("Retrying request", {
          method: request.method,
          attempt,
          maxTries: this.retry.maxTries,
          target,
          reason: verdict.reason,
        });
      }
    }

    if (lastResponse) {
      return lastResponse;
    }
    throw lastError;
  }

  private classify(response: HttpResponse, target: RetryTarget): Verdict {
    if (target === "secondary" && response.status === 404) {
      return { retry: true, reason: "Secondary returned 404", disableSecondary: true };
    }
    if (response.status === 500 || response.status === 503) {
      return { retry: true, reason: `HTTP ${response.status}`, disableSecondary: false };
    }
    return { retry: false };
  }

  /**
   * Send one attempt under its own abort signal. The per-try timer aborts
   * only this attempt; the caller's signal aborts it too.
   */
  private async sendWithTimeout(request: HttpRequest, next: NextPolicy): Promise<HttpResponse> {
    const controller = new AbortController();
    const parent = request.abortSignal;
    const timeoutMs = this.retry.tryTimeoutMs;
    let timer: ReturnType<typeof setTimeout> | undefined;
    let onParentAbort: (() => void) | undefined;

    const cancelled = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const error = new TimeoutError(`Try timed out after ${timeoutMs}ms`, "try", { timeoutMs });
        controller.abort(error);
        reject(error);
      }, timeoutMs);

      if (parent) {
        onParentAbort = () => {
          const error = abortedOperationError(parent);
          controller.abort(error);
          reject(error);
        };
        if (parent.aborted) {
          onParentAbort();
        } else {
          parent.addEventListener("abort", onParentAbort, { once: true });
        }
      }
    });

    const attempt = next({ ...request, abortSignal: controller.signal });
    // An abandoned attempt may still reject after the race has settled
    attempt.catch(() => undefined);

    try {
      return await Promise.race([attempt, cancelled]);
    } finally {
      clearTimeout(timer);
      if (parent && onParentAbort) {
        parent.removeEventListener("abort", onParentAbort);
      }
    }
  }
}

function withHost(url: string, host: string): string {
  const parsed = new URL(url);
  parsed.host = host;
  return parsed.toString();
}
