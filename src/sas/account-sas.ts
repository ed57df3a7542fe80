/**
 * Account SAS
 *
 * Signs access to one or more services of a storage account with the account key.
 */

import { STORAGE_VERSION } from "../config/constants.js";
import type { SharedKeyCredential } from "../credentials/shared-key-credential.js";
import { InvalidArgumentError } from "../errors.js";
import { formatIpRange, type IpRange } from "./ip-range.js";
import {
  AccountSasPermissions,
  AccountSasResourceTypes,
  AccountSasServices,
} from "./permissions.js";
import type { SasProtocol } from "./protocol.js";
import { SasQueryParameters, formatSasTime } from "./sas-query-parameters.js";

export interface AccountSasSignatureValues {
  expiresOn: Date;
  permissions: string | AccountSasPermissions;
  services: string | AccountSasServices;
  resourceTypes: string | AccountSasResourceTypes;
  startsOn?: Date;
  ipRange?: IpRange;
  protocol?: SasProtocol;
  /** Defaults to the library's service version */
  version?: string;
}

function required(value: string, argument: string): string {
  if (value.length === 0) {
    throw new InvalidArgumentError(`Account SAS requires ${argument}`, argument);
  }
  return value;
}

/**
 * Build and sign account SAS query parameters.
 *
 * @throws InvalidArgumentError when a required field is missing or a flag string is invalid
 */
export function generateAccountSasQueryParameters(
  values: AccountSasSignatureValues,
  credential: SharedKeyCredential
): SasQueryParameters {
  const version = values.version ?? STORAGE_VERSION;
  const permissions = required(AccountSasPermissions.normalize(values.permissions), "permissions");
  const services = required(AccountSasServices.normalize(values.services), "services");
  const resourceTypes = required(AccountSasResourceTypes.normalize(values.resourceTypes), "resourceTypes");
  const expiryTime = formatSasTime(values.expiresOn);
  const startTime = values.startsOn ? formatSasTime(values.startsOn) : undefined;

  const stringToSign = [
    credential.accountName,
    permissions,
    services,
    resourceTypes,
    startTime ?? "",
    expiryTime,
    values.ipRange ? formatIpRange(values.ipRange) : "",
    values.protocol ?? "",
    version,
    "",
  ].join("\n");

  return new SasQueryParameters({
    version,
    services,
    resourceTypes,
    protocol: values.protocol,
    startTime,
    expiryTime,
    ipRange: values.ipRange,
    permissions,
    signature: credential.computeHmacSha256(stringToSign),
  });
}
