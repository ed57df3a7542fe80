/**
 * List Blobs and List Containers payload parsing.
 */

import {
  parseBlobType,
  parseDate,
  parseLeaseState,
  parseLeaseStatus,
  parseNumber,
  type BlobItem,
  type ContainerItem,
} from "./models.js";
import { extractXmlElements, extractXmlMetadata, extractXmlValue } from "./xml.js";

export interface BlobListing {
  blobs: BlobItem[];
  prefixes: string[];
  nextMarker?: string;
}

export interface ContainerListing {
  containers: ContainerItem[];
  nextMarker?: string;
}

function parseBlobItem(xml: string): BlobItem | undefined {
  const name = extractXmlValue(xml, "Name");
  if (name === undefined) {
    return undefined;
  }
  const props = extractXmlElements(xml, "Properties")[0] ?? "";

  return {
    name,
    snapshot: extractXmlValue(xml, "Snapshot"),
    properties: {
      etag: extractXmlValue(props, "Etag"),
      lastModified: parseDate(extractXmlValue(props, "Last-Modified")),
      contentLength: parseNumber(extractXmlValue(props, "Content-Length")),
      contentType: extractXmlValue(props, "Content-Type"),
      blobType: parseBlobType(extractXmlValue(props, "BlobType")),
      leaseState: parseLeaseState(extractXmlValue(props, "LeaseState")),
      leaseStatus: parseLeaseStatus(extractXmlValue(props, "LeaseStatus")),
    },
    metadata: extractXmlMetadata(xml),
  };
}

export function parseBlobListing(xml: string): BlobListing {
  const blobs: BlobItem[] = [];
  for (const element of extractXmlElements(xml, "Blob")) {
    const blob = parseBlobItem(element);
    if (blob) {
      blobs.push(blob);
    }
  }

  const prefixes: string[] = [];
  for (const element of extractXmlElements(xml, "BlobPrefix")) {
    const name = extractXmlValue(element, "Name");
    if (name !== undefined) {
      prefixes.push(name);
    }
  }

  return { blobs, prefixes, nextMarker: extractXmlValue(xml, "NextMarker") };
}

export function parseContainerListing(xml: string): ContainerListing {
  const containers: ContainerItem[] = [];
  for (const element of extractXmlElements(xml, "Container")) {
    const name = extractXmlValue(element, "Name");
    if (name === undefined) {
      continue;
    }
    const props = extractXmlElements(element, "Properties")[0] ?? "";
    containers.push({
      name,
      properties: {
        etag: extractXmlValue(props, "Etag"),
        lastModified: parseDate(extractXmlValue(props, "Last-Modified")),
        leaseState: parseLeaseState(extractXmlValue(props, "LeaseState")),
        leaseStatus: parseLeaseStatus(extractXmlValue(props, "LeaseStatus")),
      },
      metadata: extractXmlMetadata(element),
    });
  }
  return { containers, nextMarker: extractXmlValue(xml, "NextMarker") };
}
