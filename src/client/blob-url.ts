/**
 * Operations on a single blob.
 */

import { HeaderNames } from "../config/constants.js";
import { BlobStorageError, InvalidArgumentError } from "../errors.js";
import {
  applyAccessConditions,
  applyLeaseConditions,
  formatBlobRange,
  type BlobRange,
  type HttpAccessConditions,
} from "../http/conditions.js";
import type { HttpHeaders } from "../http/headers.js";
import type { HttpResponse } from "../http/types.js";
import type { Pipeline } from "../pipeline/pipeline.js";
import { setUrlParameter } from "../url/blob-url-parts.js";
import {
  applyBlobHttpHeaders,
  applyMetadata,
  parseBlobProperties,
  parseCopyStatus,
  parseETagResponse,
  parseNumber,
  type BlobDownloadResponse,
  type BlobHttpHeaders,
  type BlobProperties,
  type BreakLeaseResponse,
  type CopyResponse,
  type DeleteSnapshotsOption,
  type ETagResponse,
  type LeaseResponse,
  type Metadata,
  type OperationOptions,
  type SnapshotResponse,
} from "./models.js";
import { StorageUrl } from "./storage-url.js";

export interface BlobDownloadOptions extends OperationOptions {
  range?: BlobRange;
  conditions?: HttpAccessConditions;
  leaseId?: string;
}

export interface BlobGetPropertiesOptions extends OperationOptions {
  conditions?: HttpAccessConditions;
  leaseId?: string;
}

export interface BlobDeleteOptions extends OperationOptions {
  deleteSnapshots?: DeleteSnapshotsOption;
  conditions?: HttpAccessConditions;
  leaseId?: string;
}

export interface StartCopyOptions extends OperationOptions {
  metadata?: Metadata;
  /** Conditions on the destination blob */
  conditions?: HttpAccessConditions;
  leaseId?: string;
}

/**
 * Conditions and lease shared by the property, metadata and snapshot writes.
 */
export interface BlobWriteOptions extends OperationOptions {
  conditions?: HttpAccessConditions;
  leaseId?: string;
}

export interface CreateSnapshotOptions extends BlobWriteOptions {
  /** Replaces the base blob's metadata on the snapshot */
  metadata?: Metadata;
}

export interface AbortCopyOptions extends OperationOptions {
  leaseId?: string;
}

export interface LeaseOptions extends OperationOptions {
  conditions?: HttpAccessConditions;
}

export type LeaseAction = "acquire" | "renew" | "change" | "release" | "break";

const INFINITE_LEASE = -1;

function validateLeaseDuration(durationSeconds: number): void {
  const valid =
    durationSeconds === INFINITE_LEASE ||
    (Number.isInteger(durationSeconds) && durationSeconds >= 15 && durationSeconds <= 60);
  if (!valid) {
    throw new InvalidArgumentError("Lease duration must be -1 (infinite) or between 15 and 60 seconds", "durationSeconds");
  }
}

function requireLeaseId(leaseId: string, argument = "leaseId"): void {
  if (!leaseId) {
    throw new InvalidArgumentError("Lease ID is required", argument);
  }
}

export class BlobUrl extends StorageUrl {
  constructor(url: string, pipeline: Pipeline) {
    super(url, pipeline);
  }

  /**
   * A URL for the same blob addressed at a snapshot. An empty snapshot
   * addresses the base blob.
   */
  withSnapshot(snapshot: string): BlobUrl {
    return new BlobUrl(setUrlParameter(this.url, "snapshot", snapshot), this.pipeline);
  }

  withPipeline(pipeline: Pipeline): BlobUrl {
    return new BlobUrl(this.url, pipeline);
  }

  async download(options: BlobDownloadOptions = {}): Promise<BlobDownloadResponse> {
    const response = await this.send({
      method: "GET",
      options,
      headers: (headers) => {
        if (options.range) {
          headers.set(HeaderNames.RANGE, formatBlobRange(options.range));
        }
        applyAccessConditions(headers, options.conditions);
        applyLeaseConditions(headers, { leaseId: options.leaseId });
      },
    });

    return {
      ...parseBlobProperties(response),
      body: response.body,
      contentRange: response.headers.get("content-range"),
    };
  }

  async getProperties(options: BlobGetPropertiesOptions = {}): Promise<BlobProperties> {
    const response = await this.send({
      method: "HEAD",
      options,
      headers: (headers) => {
        applyAccessConditions(headers, options.conditions);
        applyLeaseConditions(headers, { leaseId: options.leaseId });
      },
    });
    return parseBlobProperties(response);
  }

  async delete(options: BlobDeleteOptions = {}): Promise<ETagResponse> {
    const response = await this.send({
      method: "DELETE",
      options,
      headers: (headers) => {
        if (options.deleteSnapshots) {
          headers.set(HeaderNames.DELETE_SNAPSHOTS, options.deleteSnapshots);
        }
        applyAccessConditions(headers, options.conditions);
        applyLeaseConditions(headers, { leaseId: options.leaseId });
      },
    });
    return parseETagResponse(response);
  }

  /**
   * Set the blob's HTTP properties. Properties left out are cleared.
   */
  async setHttpHeaders(httpHeaders: BlobHttpHeaders = {}, options: BlobWriteOptions = {}): Promise<ETagResponse> {
    const response = await this.send({
      method: "PUT",
      url: setUrlParameter(this.url, "comp", "properties"),
      options,
      headers: (headers) => {
        applyBlobHttpHeaders(headers, httpHeaders);
        applyAccessConditions(headers, options.conditions);
        applyLeaseConditions(headers, { leaseId: options.leaseId });
      },
    });
    return parseETagResponse(response);
  }

  /**
   * Replace the blob's metadata. An empty record clears it.
   */
  async setMetadata(metadata: Metadata = {}, options: BlobWriteOptions = {}): Promise<ETagResponse> {
    const response = await this.send({
      method: "PUT",
      url: setUrlParameter(this.url, "comp", "metadata"),
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
   * Take a read-only snapshot. Address it with {@link withSnapshot}.
   */
  async createSnapshot(options: CreateSnapshotOptions = {}): Promise<SnapshotResponse> {
    const response = await this.send({
      method: "PUT",
      url: setUrlParameter(this.url, "comp", "snapshot"),
      options,
      headers: (headers) => {
        applyMetadata(headers, options.metadata);
        applyAccessConditions(headers, options.conditions);
        applyLeaseConditions(headers, { leaseId: options.leaseId });
      },
    });
    return { ...parseETagResponse(response), snapshot: response.headers.get(HeaderNames.SNAPSHOT) };
  }

  /**
   * Acquire a lease. Use -1 for a lease that never expires.
   *
   * @throws InvalidArgumentError when the duration is out of range
   */
  async acquireLease(
    durationSeconds: number,
    proposedLeaseId?: string,
    options: LeaseOptions = {}
  ): Promise<LeaseResponse> {
    validateLeaseDuration(durationSeconds);

    const response = await this.lease("acquire", options, (headers) => {
      headers.set(HeaderNames.LEASE_DURATION, durationSeconds);
      if (proposedLeaseId) {
        headers.set(HeaderNames.PROPOSED_LEASE_ID, proposedLeaseId);
      }
    });
    return this.leaseResponse(response);
  }

  async renewLease(leaseId: string, options: LeaseOptions = {}): Promise<LeaseResponse> {
    requireLeaseId(leaseId);

    const response = await this.lease("renew", options, (headers) => headers.set(HeaderNames.LEASE_ID, leaseId));
    return this.leaseResponse(response);
  }

  async changeLease(leaseId: string, proposedLeaseId: string, options: LeaseOptions = {}): Promise<LeaseResponse> {
    requireLeaseId(leaseId);
    requireLeaseId(proposedLeaseId, "proposedLeaseId");

    const response = await this.lease("change", options, (headers) => {
      headers.set(HeaderNames.LEASE_ID, leaseId);
      headers.set(HeaderNames.PROPOSED_LEASE_ID, proposedLeaseId);
    });
    return this.leaseResponse(response);
  }

  async releaseLease(leaseId: string, options: LeaseOptions = {}): Promise<ETagResponse> {
    requireLeaseId(leaseId);

    const response = await this.lease("release", options, (headers) => headers.set(HeaderNames.LEASE_ID, leaseId));
    return parseETagResponse(response);
  }

  /**
   * Break the current lease. Without a period a fixed lease runs out its
   * remaining time and an infinite lease breaks at once.
   *
   * @throws InvalidArgumentError when the period is outside 0-60 seconds
   */
  async breakLease(breakPeriodSeconds?: number, options: LeaseOptions = {}): Promise<BreakLeaseResponse> {
    if (
      breakPeriodSeconds !== undefined &&
      (!Number.isInteger(breakPeriodSeconds) || breakPeriodSeconds < 0 || breakPeriodSeconds > 60)
    ) {
      throw new InvalidArgumentError("Break period must be between 0 and 60 seconds", "breakPeriodSeconds");
    }

    const response = await this.lease("break", options, (headers) => {
      if (breakPeriodSeconds !== undefined) {
        headers.set(HeaderNames.LEASE_BREAK_PERIOD, breakPeriodSeconds);
      }
    });
    return { ...parseETagResponse(response), leaseTime: parseNumber(response.headers.get(HeaderNames.LEASE_TIME)) };
  }

  /**
   * Start a server-side copy from `source` into this blob.
   */
  async startCopyFromUrl(source: string, options: StartCopyOptions = {}): Promise<CopyResponse> {
    const response = await this.send({
      method: "PUT",
      options,
      headers: (headers) => {
        headers.set(HeaderNames.COPY_SOURCE, source);
        applyMetadata(headers, options.metadata);
        applyAccessConditions(headers, options.conditions);
        applyLeaseConditions(headers, { leaseId: options.leaseId });
      },
    });

    return {
      ...parseETagResponse(response),
      copyId: response.headers.get(HeaderNames.COPY_ID),
      copyStatus: parseCopyStatus(response.headers.get(HeaderNames.COPY_STATUS)),
    };
  }

  /**
   * Stop a pending copy. The destination is left empty with its metadata.
   */
  async abortCopyFromUrl(copyId: string, options: AbortCopyOptions = {}): Promise<ETagResponse> {
    if (!copyId) {
      throw new InvalidArgumentError("Copy ID is required", "copyId");
    }

    const response = await this.send({
      method: "PUT",
      url: setUrlParameter(setUrlParameter(this.url, "comp", "copy"), "copyid", copyId),
      options,
      headers: (headers) => {
        headers.set(HeaderNames.COPY_ACTION, "abort");
        applyLeaseConditions(headers, { leaseId: options.leaseId });
      },
    });
    return parseETagResponse(response);
  }

  private async lease(
    action: LeaseAction,
    options: LeaseOptions,
    fill: (headers: HttpHeaders) => void
  ): Promise<HttpResponse> {
    return this.send({
      method: "PUT",
      url: setUrlParameter(this.url, "comp", "lease"),
      options,
      headers: (headers) => {
        headers.set(HeaderNames.LEASE_ACTION, action);
        fill(headers);
        applyAccessConditions(headers, options.conditions);
      },
    });
  }

  private leaseResponse(response: HttpResponse): LeaseResponse {
    const leaseId = response.headers.get(HeaderNames.LEASE_ID);
    if (!leaseId) {
      throw new BlobStorageError("Lease ID not returned in response", "LeaseIdMissing", {
        statusCode: response.status,
        requestId: response.headers.get(HeaderNames.REQUEST_ID),
      });
    }
    return { ...parseETagResponse(response), leaseId };
  }
}
