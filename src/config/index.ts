/**
 * Blob Storage Configuration Module
 *
 * Option records for the pipeline policies and a builder that assembles a
 * complete client configuration, optionally from the environment.
 */

import { z } from "zod";
import { InvalidArgumentError } from "../errors.js";
import {
  AnonymousCredential,
  SharedKeyCredential,
  TokenCredential,
  type Credential,
} from "../credentials/index.js";
import { createRetryOptions, type RetryOptions, type RetryOptionsInput } from "./retry-options.js";

export * from "./constants.js";
export * from "./retry-options.js";

/**
 * Logging policy options.
 */
export interface LoggingOptions {
  /** Tries slower than this are logged at warn level. */
  readonly slowRequestThresholdMs: number;
}

/**
 * Telemetry policy options.
 */
export interface TelemetryOptions {
  /** Prepended to the User-Agent value, separated by a space. */
  readonly userAgentPrefix: string;
}

export const DEFAULT_LOGGING_OPTIONS: LoggingOptions = Object.freeze({
  slowRequestThresholdMs: 3_000,
});

export const DEFAULT_TELEMETRY_OPTIONS: TelemetryOptions = Object.freeze({
  userAgentPrefix: "",
});

/**
 * Credential source recorded by the builder and materialized in build().
 */
export type CredentialSource =
  | { type: "shared_key"; accountName: string; accountKey: string }
  | { type: "token"; token: string }
  | { type: "anonymous" };

/**
 * Complete client configuration.
 */
export interface StorageConfig {
  readonly accountName: string;
  readonly credential: Credential;
  /** Primary blob endpoint, e.g. https://myaccount.blob.core.windows.net */
  readonly endpoint: string;
  readonly retry: RetryOptions;
  readonly logging: LoggingOptions;
  readonly telemetry: TelemetryOptions;
}

const configSchema = z.object({
  accountName: z
    .string({ required_error: "Account name must be specified (set AZURE_STORAGE_ACCOUNT or call accountName())" })
    .min(1, "Account name cannot be empty"),
  endpoint: z.string().url("Endpoint must be an absolute URL").optional(),
  logging: z.object({
    slowRequestThresholdMs: z.number().int().min(0),
  }),
  telemetry: z.object({
    userAgentPrefix: z.string(),
  }),
});

/**
 * Storage configuration builder.
 */
export class StorageConfigBuilder {
  private accountNameValue?: string;
  private credentialSource?: CredentialSource;
  private credentialValue?: Credential;
  private endpointValue?: string;
  private retryInput: RetryOptionsInput = {};
  private loggingValue: LoggingOptions = DEFAULT_LOGGING_OPTIONS;
  private telemetryValue: TelemetryOptions = DEFAULT_TELEMETRY_OPTIONS;

  /**
   * Set the storage account name.
   */
  accountName(name: string): this {
    this.accountNameValue = name;
    return this;
  }

  /**
   * Use shared key authentication.
   */
  sharedKey(accountName: string, accountKey: string): this {
    this.accountNameValue = accountName;
    this.credentialSource = { type: "shared_key", accountName, accountKey };
    this.credentialValue = undefined;
    return this;
  }

  /**
   * Use bearer token authentication.
   */
  token(token: string): this {
    this.credentialSource = { type: "token", token };
    this.credentialValue = undefined;
    return this;
  }

  anonymous(): this {
    this.credentialSource = { type: "anonymous" };
    this.credentialValue = undefined;
    return this;
  }

  /**
   * Use an already constructed credential.
   */
  credential(credential: Credential): this {
    this.credentialValue = credential;
    this.credentialSource = undefined;
    if (credential instanceof SharedKeyCredential && this.accountNameValue === undefined) {
      this.accountNameValue = credential.accountName;
    }
    return this;
  }

  /**
   * Set a custom blob endpoint (for emulators).
   */
  endpoint(endpoint: string): this {
    this.endpointValue = endpoint;
    return this;
  }

  retryOptions(options: RetryOptionsInput): this {
    this.retryInput = { ...this.retryInput, ...options };
    return this;
  }

  /**
   * Set the read-only secondary host used for GET/HEAD retries.
   */
  secondaryHost(host: string): this {
    this.retryInput = { ...this.retryInput, secondaryHost: host };
    return this;
  }

  logging(options: Partial<LoggingOptions>): this {
    this.loggingValue = { ...this.loggingValue, ...options };
    return this;
  }

  telemetry(options: Partial<TelemetryOptions>): this {
    this.telemetryValue = { ...this.telemetryValue, ...options };
    return this;
  }

  /**
   * Load configuration from environment variables.
   */
  fromEnv(env: NodeJS.ProcessEnv = process.env): this {
    const accountName = env.AZURE_STORAGE_ACCOUNT;
    if (accountName) {
      this.accountNameValue = accountName;
    }

    const accountKey = env.AZURE_STORAGE_KEY;
    if (accountName && accountKey) {
      this.sharedKey(accountName, accountKey);
    }

    // A token wins over a key when both are present
    const token = env.AZURE_STORAGE_TOKEN;
    if (token) {
      this.token(token);
    }

    const endpoint = env.AZURE_STORAGE_ENDPOINT;
    if (endpoint) {
      this.endpointValue = endpoint;
    }

    const secondaryHost = env.AZURE_STORAGE_SECONDARY_HOST;
    if (secondaryHost) {
      this.secondaryHost(secondaryHost);
    }

    return this;
  }

  /**
   * Validate and build the configuration.
   *
   * @throws InvalidArgumentError when a shared key signs for a different
   * account than the configured one
   */
  build(): StorageConfig {
    const result = configSchema.safeParse({
      accountName: this.accountNameValue,
      endpoint: this.endpointValue,
      logging: this.loggingValue,
      telemetry: this.telemetryValue,
    });
    if (!result.success) {
      const issues = result.error.issues.map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message));
      throw new InvalidArgumentError(`Invalid configuration: ${issues.join(", ")}`, "config");
    }
    const parsed = result.data;

    const credential = this.resolveCredential();
    if (credential instanceof SharedKeyCredential && credential.accountName !== parsed.accountName) {
      throw new InvalidArgumentError(
        `Account name "${parsed.accountName}" does not match the shared key account "${credential.accountName}"`,
        "accountName"
      );
    }

    return Object.freeze({
      accountName: parsed.accountName,
      credential,
      endpoint: (parsed.endpoint ?? `https://${parsed.accountName}.blob.core.windows.net`).replace(/\/+$/, ""),
      retry: createRetryOptions(this.retryInput),
      logging: Object.freeze({ ...parsed.logging }),
      telemetry: Object.freeze({ ...parsed.telemetry }),
    });
  }

  private resolveCredential(): Credential {
    if (this.credentialValue) {
      return this.credentialValue;
    }
    const source = this.credentialSource ?? { type: "anonymous" };
    switch (source.type) {
      case "shared_key":
        return new SharedKeyCredential(source.accountName, source.accountKey);
      case "token":
        return new TokenCredential(source.token);
      case "anonymous":
        return new AnonymousCredential();
    }
  }
}

/**
 * Create a new storage config builder.
 */
export function configBuilder(): StorageConfigBuilder {
  return new StorageConfigBuilder();
}
