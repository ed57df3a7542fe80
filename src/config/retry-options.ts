/**
 * Retry options for the request pipeline.
 */

import { z } from "zod";
import { InvalidArgumentError } from "../errors.js";

/**
 * How the delay between primary tries grows.
 */
export type RetryPolicyType = "exponential" | "fixed";

export const RetryPolicyType = {
  EXPONENTIAL: "exponential",
  FIXED: "fixed",
} as const satisfies Record<string, RetryPolicyType>;

/**
 * Validated retry options.
 */
export interface RetryOptions {
  readonly policyType: RetryPolicyType;
  /** Total attempts, including the first one. */
  readonly maxTries: number;
  /** Budget for a single attempt; expiry cancels only that attempt. */
  readonly tryTimeoutMs: number;
  /** Base delay between primary tries. */
  readonly retryDelayMs: number;
  readonly maxRetryDelayMs: number;
  /** Read-only replica host (optionally with port) used for GET/HEAD retries. */
  readonly secondaryHost?: string;
}

export type RetryOptionsInput = Partial<RetryOptions>;

export const DEFAULT_RETRY_OPTIONS: RetryOptions = Object.freeze({
  policyType: RetryPolicyType.EXPONENTIAL,
  maxTries: 4,
  tryTimeoutMs: 30_000,
  retryDelayMs: 4_000,
  maxRetryDelayMs: 120_000,
});

const retryOptionsSchema = z
  .object({
    policyType: z.enum(["exponential", "fixed"]).optional(),
    maxTries: z.number().int().min(1).optional(),
    tryTimeoutMs: z.number().int().min(1).optional(),
    retryDelayMs: z.number().int().min(1).optional(),
    maxRetryDelayMs: z.number().int().min(1).optional(),
    secondaryHost: z
      .string()
      .regex(/^[A-Za-z0-9.-]+(:\d+)?$/, "must be a host name with an optional port")
      .optional(),
  })
  .strict();

/**
 * Validate retry options and fill in defaults.
 *
 * When only one of the two delays is given the other is adjusted so that
 * `retryDelayMs <= maxRetryDelayMs` still holds.
 */
export function createRetryOptions(input: RetryOptionsInput = {}): RetryOptions {
  const result = retryOptionsSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new InvalidArgumentError(`Invalid retry options: ${issues.join(", ")}`, "retryOptions");
  }
  const parsed = result.data;

  let retryDelayMs = DEFAULT_RETRY_OPTIONS.retryDelayMs;
  let maxRetryDelayMs = DEFAULT_RETRY_OPTIONS.maxRetryDelayMs;

  if (parsed.retryDelayMs !== undefined && parsed.maxRetryDelayMs !== undefined) {
    if (parsed.retryDelayMs > parsed.maxRetryDelayMs) {
      throw new InvalidArgumentError(
        `Invalid retry options: retryDelayMs (${parsed.retryDelayMs}) exceeds maxRetryDelayMs (${parsed.maxRetryDelayMs})`,
        "retryDelayMs"
      );
    }
    retryDelayMs = parsed.retryDelayMs;
    maxRetryDelayMs = parsed.maxRetryDelayMs;
  } else if (parsed.retryDelayMs !== undefined) {
    retryDelayMs = parsed.retryDelayMs;
    maxRetryDelayMs = Math.max(maxRetryDelayMs, retryDelayMs);
  } else if (parsed.maxRetryDelayMs !== undefined) {
    maxRetryDelayMs = parsed.maxRetryDelayMs;
    retryDelayMs = Math.min(retryDelayMs, maxRetryDelayMs);
  }

  return Object.freeze({
    policyType: parsed.policyType ?? DEFAULT_RETRY_OPTIONS.policyType,
    maxTries: parsed.maxTries ?? DEFAULT_RETRY_OPTIONS.maxTries,
    tryTimeoutMs: parsed.tryTimeoutMs ?? DEFAULT_RETRY_OPTIONS.tryTimeoutMs,
    retryDelayMs,
    maxRetryDelayMs,
    secondaryHost: parsed.secondaryHost,
  });
}

/**
 * Delay before the given primary try (1-based). The first try never waits.
 */
export function calculateRetryDelay(options: RetryOptions, primaryTry: number): number {
  if (primaryTry <= 1) {
    return 0;
  }
  switch (options.policyType) {
    case "exponential":
      return Math.min((Math.pow(2, primaryTry - 1) - 1) * options.retryDelayMs, options.maxRetryDelayMs);
    case "fixed":
      return options.retryDelayMs;
  }
}
