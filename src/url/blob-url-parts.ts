/**
 * Blob URL parsing and assembly.
 */

import { InvalidArgumentError } from "../errors.js";
import { SasQueryParameters, isSasQueryKey } from "../sas/sas-query-parameters.js";

export interface BlobUrlParts {
  scheme: string;
  /** Host name, with the port when one is given */
  host: string;
  containerName?: string;
  blobName?: string;
  snapshot?: string;
  sas?: SasQueryParameters;
  /** Query parameters that are neither the snapshot nor SAS keys */
  unparsedParameters: Record<string, string>;
}

const SNAPSHOT = "snapshot";

function toUrl(value: string): URL {
  try {
    return new URL(value);
  } catch {
    throw new InvalidArgumentError(`Invalid URL "${value}"`, "url");
  }
}

function decodeSegment(segment: string, value: string): string {
  try {
    return decodeURIComponent(segment);
  } catch (error) {
    throw new InvalidArgumentError(`Invalid percent-encoding in URL "${value}"`, "url", { cause: error });
  }
}

/**
 * Percent-encode a blob name one path segment at a time.
 */
export function encodeBlobName(name: string): string {
  return name.split("/").map(encodeURIComponent).join("/");
}

/**
 * @throws InvalidArgumentError when `value` is not an absolute URL or its
 * path has a malformed percent-encoding
 */
export function parseBlobUrl(value: string): BlobUrlParts {
  const url = toUrl(value);
  const [containerName, ...blobSegments] = url.pathname
    .split("/")
    .slice(1)
    .map((segment) => decodeSegment(segment, value));

  const unparsedParameters: Record<string, string> = {};
  for (const [key, param] of url.searchParams) {
    if (key !== SNAPSHOT && !isSasQueryKey(key) && !(key in unparsedParameters)) {
      unparsedParameters[key] = param;
    }
  }

  return {
    scheme: url.protocol.replace(/:$/, ""),
    host: url.host,
    containerName: containerName || undefined,
    blobName: blobSegments.length > 0 && blobSegments.join("/") !== "" ? blobSegments.join("/") : undefined,
    snapshot: url.searchParams.get(SNAPSHOT) ?? undefined,
    sas: SasQueryParameters.fromSearchParams(url.searchParams),
    unparsedParameters,
  };
}

export function formatBlobUrl(parts: BlobUrlParts): string {
  let path = "";
  if (parts.containerName) {
    path += `/${encodeURIComponent(parts.containerName)}`;
    if (parts.blobName) {
      path += `/${encodeBlobName(parts.blobName)}`;
    }
  }

  const query: string[] = [];
  if (parts.snapshot) {
    query.push(`${SNAPSHOT}=${encodeURIComponent(parts.snapshot)}`);
  }
  const sas = parts.sas?.encode();
  if (sas) {
    query.push(sas);
  }
  for (const [key, value] of Object.entries(parts.unparsedParameters)) {
    query.push(`${encodeURIComponent(key)}=${encodeURIComponent(value)}`);
  }

  return `${parts.scheme}://${parts.host}${path}${query.length > 0 ? `?${query.join("&")}` : ""}`;
}

/**
 * Append an already-decoded path segment, keeping the query string.
 */
export function appendUrlPath(value: string, segment: string): string {
  const url = toUrl(value);
  url.pathname = `${url.pathname.replace(/\/+$/, "")}/${encodeBlobName(segment)}`;
  return url.toString();
}

/**
 * Set or remove one query parameter, keeping the rest.
 */
export function setUrlParameter(value: string, key: string, param: string | undefined): string {
  const url = toUrl(value);
  if (param === undefined || param === "") {
    url.searchParams.delete(key);
  } else {
    url.searchParams.set(key, param);
  }
  url.search = url.searchParams.toString();
  return url.toString();
}
