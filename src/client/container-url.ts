/**
 * Operations on a container.
 */

import { HeaderNames } from "../config/constants.js";
import { InvalidArgumentError } from "../errors.js";
import { applyAccessConditions, applyLeaseConditions, type HttpAccessConditions } from "../http/conditions.js";
import type { Pipeline } from "../pipeline/pipeline.js";
import { appendUrlPath, setUrlParameter } from "../url/blob-url-parts.js";
import { bodyAsText } from "../http/types.js";
import { AppendBlobUrl } from "./append-blob-url.js";
import { BlobUrl } from "./blob-url.js";
import { BlockBlobUrl } from "./block-blob-url.js";
import { parseBlobListing } from "./listing.js";
import {
  applyMetadata,
  parseContainerProperties,
  parseETagResponse,
  parseResponseMetadata,
  type BlobItem,
  type ContainerProperties,
  type ETagResponse,
  type ListBlobsResponse,
  type Metadata,
  type OperationOptions,
} from "./models.js";
import { PageBlobUrl } from "./page-blob-url.js";
import { StorageUrl } from "./storage-url.js";

export type PublicAccessType = "container" | "blob";

export interface ContainerCreateOptions extends OperationOptions {
  access?: PublicAccessType;
}

export interface ContainerDeleteOptions extends OperationOptions {
  leaseId?: string;
}

export interface ContainerSetMetadataOptions extends OperationOptions {
  /** Only `ifModifiedSince` applies to a container metadata write */
  conditions?: Pick<HttpAccessConditions, "ifModifiedSince">;
  leaseId?: string;
}

/**
 * Extra datasets to include with each listed blob.
 */
export interface BlobListingDetails {
  metadata?: boolean;
  snapshots?: boolean;
  uncommittedBlobs?: boolean;
  copy?: boolean;
}

export interface ListBlobsOptions extends OperationOptions {
  prefix?: string;
  /** Groups names sharing a prefix up to this string into `prefixes` */
  delimiter?: string;
  maxResults?: number;
  include?: BlobListingDetails;
}

function includeList(details: BlobListingDetails | undefined): string | undefined {
  if (!details) {
    return undefined;
  }
  const include: string[] = [];
  if (details.copy) include.push("copy");
  if (details.metadata) include.push("metadata");
  if (details.snapshots) include.push("snapshots");
  if (details.uncommittedBlobs) include.push("uncommittedblobs");
  return include.length > 0 ? include.join(",") : undefined;
}

export class ContainerUrl extends StorageUrl {
  constructor(url: string, pipeline: Pipeline) {
    super(url, pipeline);
  }

  withPipeline(pipeline: Pipeline): ContainerUrl {
    return new ContainerUrl(this.url, pipeline);
  }

  createBlobUrl(blobName: string): BlobUrl {
    return new BlobUrl(appendUrlPath(this.url, blobName), this.pipeline);
  }

  createBlockBlobUrl(blobName: string): BlockBlobUrl {
    return new BlockBlobUrl(appendUrlPath(this.url, blobName), this.pipeline);
  }

  createPageBlobUrl(blobName: string): PageBlobUrl {
    return new PageBlobUrl(appendUrlPath(this.url, blobName), this.pipeline);
  }

  createAppendBlobUrl(blobName: string): AppendBlobUrl {
    return new AppendBlobUrl(appendUrlPath(this.url, blobName), this.pipeline);
  }

  async create(metadata?: Metadata, options: ContainerCreateOptions = {}): Promise<ETagResponse> {
    const response = await this.send({
      method: "PUT",
      url: this.containerUrl(),
      options,
      headers: (headers) => {
        applyMetadata(headers, metadata);
        if (options.access) {
          headers.set(HeaderNames.BLOB_PUBLIC_ACCESS, options.access);
        }
      },
    });
    return parseETagResponse(response);
  }

  /**
   * Delete the container. Only the modified-since conditions apply here.
   *
   * @throws InvalidArgumentError when an ETag condition is given
   */
  async delete(conditions?: HttpAccessConditions, options: ContainerDeleteOptions = {}): Promise<ETagResponse> {
    if (conditions?.ifMatch || conditions?.ifNoneMatch) {
      throw new InvalidArgumentError("ETag access conditions are not supported when deleting a container", "conditions");
    }

    const response = await this.send({
      method: "DELETE",
      url: this.containerUrl(),
      options,
      headers: (headers) => {
        applyAccessConditions(headers, conditions);
        applyLeaseConditions(headers, { leaseId: options.leaseId });
      },
    });
    return parseETagResponse(response);
  }

  async getProperties(leaseId?: string, options: OperationOptions = {}): Promise<ContainerProperties> {
    const response = await this.send({
      method: "GET",
      url: this.containerUrl(),
      options,
      headers: (headers) => applyLeaseConditions(headers, { leaseId }),
    });
    return parseContainerProperties(response);
  }

  /**
   * Replace the container's metadata. An empty record clears it.
   */
  async setMetadata(metadata: Metadata = {}, options: ContainerSetMetadataOptions = {}): Promise<ETagResponse> {
    const response = await this.send({
      method: "PUT",
      url: setUrlParameter(this.containerUrl(), "comp", "metadata"),
      options,
      headers: (headers) => {
        applyMetadata(headers, metadata);
        applyAccessConditions(headers, options.conditions);
        applyLeaseConditions(headers, { leaseId: options.leaseId });
      },
    });
    return parseETagResponse(response);
  }

  /**
   * List one page of blobs, starting at `marker` (from a previous page's
   * `nextMarker`), or at the beginning when it is undefined.
   *
   * @throws InvalidArgumentError when `maxResults` is not positive
   */
  async listBlobs(marker?: string, options: ListBlobsOptions = {}): Promise<ListBlobsResponse> {
    if (options.maxResults !== undefined && (!Number.isInteger(options.maxResults) || options.maxResults <= 0)) {
      throw new InvalidArgumentError("maxResults must be greater than 0", "maxResults");
    }

    let url = setUrlParameter(this.containerUrl(), "comp", "list");
    url = setUrlParameter(url, "prefix", options.prefix);
    url = setUrlParameter(url, "delimiter", options.delimiter);
    url = setUrlParameter(url, "marker", marker);
    url = setUrlParameter(url, "maxresults", options.maxResults?.toString());
    url = setUrlParameter(url, "include", includeList(options.include));

    const response = await this.send({ method: "GET", url, options });
    return { ...parseResponseMetadata(response), ...parseBlobListing(bodyAsText(response)) };
  }

  /**
   * Iterate over every blob, fetching pages as needed.
   */
  async *listAllBlobs(options: ListBlobsOptions = {}): AsyncGenerator<BlobItem> {
    let marker: string | undefined;
    do {
      const page = await this.listBlobs(marker, options);
      yield* page.blobs;
      marker = page.nextMarker;
    } while (marker);
  }

  private containerUrl(): string {
    return setUrlParameter(this.url, "restype", "container");
  }
}
