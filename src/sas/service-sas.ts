/**
 * Service SAS
 *
 * Signs access to a single container or blob, optionally through a stored
 * access policy identifier, and can override response headers on download.
 */

import { STORAGE_VERSION } from "../config/constants.js";
import type { SharedKeyCredential } from "../credentials/shared-key-credential.js";
import { InvalidArgumentError } from "../errors.js";
import { formatIpRange, type IpRange } from "./ip-range.js";
import { BlobSasPermissions, ContainerSasPermissions } from "./permissions.js";
import type { SasProtocol } from "./protocol.js";
import { SasQueryParameters, formatSasTime } from "./sas-query-parameters.js";

export interface ServiceSasSignatureValues {
  containerName: string;
  /** Present for a blob SAS, absent for a container SAS */
  blobName?: string;
  permissions?: string | ContainerSasPermissions;
  expiresOn?: Date;
  startsOn?: Date;
  /** Stored access policy on the container */
  identifier?: string;
  ipRange?: IpRange;
  protocol?: SasProtocol;
  version?: string;
  cacheControl?: string;
  contentDisposition?: string;
  contentEncoding?: string;
  contentLanguage?: string;
  contentType?: string;
}

function canonicalResource(accountName: string, containerName: string, blobName?: string): string {
  const base = `/blob/${accountName}/${containerName}`;
  return blobName ? `${base}/${blobName.replace(/\\/g, "/")}` : base;
}

function normalizePermissions(values: ServiceSasSignatureValues): string | undefined {
  if (values.permissions === undefined) {
    return undefined;
  }
  const container = ContainerSasPermissions.normalize(values.permissions);
  // list has no meaning on a single blob
  return values.blobName ? BlobSasPermissions.normalize(container) : container;
}

/**
 * Build and sign service SAS query parameters for a container or a blob.
 *
 * @throws InvalidArgumentError when the container is missing, or neither
 * permissions with an expiry nor an identifier are given
 */
export function generateServiceSasQueryParameters(
  values: ServiceSasSignatureValues,
  credential: SharedKeyCredential
): SasQueryParameters {
  if (values.containerName.length === 0) {
    throw new InvalidArgumentError("Service SAS requires a container name", "containerName");
  }

  const permissions = normalizePermissions(values);
  const identifier = values.identifier || undefined;
  if (!(permissions && values.expiresOn) && identifier === undefined) {
    throw new InvalidArgumentError(
      "Service SAS requires permissions and an expiry time, or a stored access policy identifier",
      identifier === undefined && permissions ? "expiresOn" : "permissions"
    );
  }

  const version = values.version ?? STORAGE_VERSION;
  const startTime = values.startsOn ? formatSasTime(values.startsOn) : undefined;
  const expiryTime = values.expiresOn ? formatSasTime(values.expiresOn) : undefined;
  // An empty blob name addresses the container
  const resource = values.blobName ? "b" : "c";

  const stringToSign = [
    permissions ?? "",
    startTime ?? "",
    expiryTime ?? "",
    canonicalResource(credential.accountName, values.containerName, values.blobName),
    identifier ?? "",
    values.ipRange ? formatIpRange(values.ipRange) : "",
    values.protocol ?? "",
    version,
    values.cacheControl ?? "",
    values.contentDisposition ?? "",
    values.contentEncoding ?? "",
    values.contentLanguage ?? "",
    values.contentType ?? "",
  ].join("\n");

  return new SasQueryParameters({
    version,
    protocol: values.protocol,
    startTime,
    expiryTime,
    ipRange: values.ipRange,
    identifier,
    resource,
    permissions,
    cacheControl: values.cacheControl,
    contentDisposition: values.contentDisposition,
    contentEncoding: values.contentEncoding,
    contentLanguage: values.contentLanguage,
    contentType: values.contentType,
    signature: credential.computeHmacSha256(stringToSign),
  });
}
