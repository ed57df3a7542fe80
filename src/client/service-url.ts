/**
 * Entry point for an account's blob endpoint.
 */

import type { StorageConfig } from "../config/index.js";
import { InvalidArgumentError } from "../errors.js";
import { bodyAsText } from "../http/types.js";
import { createPipeline, type PipelineOptions } from "../pipeline/create-pipeline.js";
import type { Pipeline } from "../pipeline/pipeline.js";
import { appendUrlPath, setUrlParameter } from "../url/blob-url-parts.js";
import { ContainerUrl } from "./container-url.js";
import { parseContainerListing } from "./listing.js";
import {
  parseResponseMetadata,
  type ContainerItem,
  type ListContainersResponse,
  type OperationOptions,
} from "./models.js";
import { StorageUrl } from "./storage-url.js";

export interface ListContainersOptions extends OperationOptions {
  prefix?: string;
  maxResults?: number;
  /** Include each container's metadata */
  includeMetadata?: boolean;
}

/**
 * Pipeline options that a {@link StorageConfig} does not already supply.
 */
export type ServiceUrlOptions = Omit<PipelineOptions, "retry" | "logging" | "telemetry">;

export class ServiceUrl extends StorageUrl {
  constructor(url: string, pipeline: Pipeline) {
    super(url, pipeline);
  }

  /**
   * Build a service URL and its pipeline from a validated configuration.
   */
  static fromConfig(config: StorageConfig, options: ServiceUrlOptions = {}): ServiceUrl {
    const pipeline = createPipeline(config.credential, {
      ...options,
      retry: config.retry,
      logging: config.logging,
      telemetry: config.telemetry,
    });
    return new ServiceUrl(config.endpoint, pipeline);
  }

  withPipeline(pipeline: Pipeline): ServiceUrl {
    return new ServiceUrl(this.url, pipeline);
  }

  createContainerUrl(containerName: string): ContainerUrl {
    return new ContainerUrl(appendUrlPath(this.url, containerName), this.pipeline);
  }

  /**
   * List one page of containers, starting at `marker`.
   *
   * @throws InvalidArgumentError when `maxResults` is not positive
   */
  async listContainers(marker?: string, options: ListContainersOptions = {}): Promise<ListContainersResponse> {
    if (options.maxResults !== undefined && (!Number.isInteger(options.maxResults) || options.maxResults <= 0)) {
      throw new InvalidArgumentError("maxResults must be greater than 0", "maxResults");
    }

    let url = setUrlParameter(this.url, "comp", "list");
    url = setUrlParameter(url, "prefix", options.prefix);
    url = setUrlParameter(url, "marker", marker);
    url = setUrlParameter(url, "maxresults", options.maxResults?.toString());
    url = setUrlParameter(url, "include", options.includeMetadata ? "metadata" : undefined);

    const response = await this.send({ method: "GET", url, options });
    return { ...parseResponseMetadata(response), ...parseContainerListing(bodyAsText(response)) };
  }

  async *listAllContainers(options: ListContainersOptions = {}): AsyncGenerator<ContainerItem> {
    let marker: string | undefined;
    do {
      const page = await this.listContainers(marker, options);
      yield* page.containers;
      marker = page.nextMarker;
    } while (marker);
  }
}
