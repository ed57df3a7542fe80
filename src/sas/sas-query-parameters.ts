/**
 * SAS Query Parameters
 *
 * The signed result of a SAS builder, or the SAS portion of a parsed URL.
 */

import { SasQueryKeys, type SasQueryKey } from "../config/constants.js";
import { InvalidArgumentError } from "../errors.js";
import { formatIpRange, parseIpRange, type IpRange } from "./ip-range.js";
import { parseSasProtocol, type SasProtocol } from "./protocol.js";

/**
 * Format a SAS time as ISO 8601 UTC without milliseconds.
 */
export function formatSasTime(date: Date): string {
  if (Number.isNaN(date.getTime())) {
    throw new InvalidArgumentError("SAS time is not a valid date", "date");
  }
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

export interface SasQueryParameterFields {
  version: string;
  services?: string;
  resourceTypes?: string;
  protocol?: SasProtocol;
  startTime?: string;
  expiryTime?: string;
  ipRange?: IpRange;
  identifier?: string;
  resource?: string;
  permissions?: string;
  cacheControl?: string;
  contentDisposition?: string;
  contentEncoding?: string;
  contentLanguage?: string;
  contentType?: string;
  signature?: string;
}

const ALL_KEYS: ReadonlySet<string> = new Set<string>(Object.values(SasQueryKeys));

export function isSasQueryKey(key: string): key is SasQueryKey {
  return ALL_KEYS.has(key);
}

/**
 * Immutable SAS query parameters. Times are kept in their wire form.
 */
export class SasQueryParameters {
  readonly version: string;
  readonly services?: string;
  readonly resourceTypes?: string;
  readonly protocol?: SasProtocol;
  readonly startTime?: string;
  readonly expiryTime?: string;
  readonly ipRange?: Readonly<IpRange>;
  readonly identifier?: string;
  readonly resource?: string;
  readonly permissions?: string;
  readonly cacheControl?: string;
  readonly contentDisposition?: string;
  readonly contentEncoding?: string;
  readonly contentLanguage?: string;
  readonly contentType?: string;
  readonly signature?: string;

  constructor(fields: SasQueryParameterFields) {
    this.version = fields.version;
    this.services = fields.services;
    this.resourceTypes = fields.resourceTypes;
    this.protocol = fields.protocol;
    this.startTime = fields.startTime;
    this.expiryTime = fields.expiryTime;
    this.ipRange = fields.ipRange ? Object.freeze({ ...fields.ipRange }) : undefined;
    this.identifier = fields.identifier;
    this.resource = fields.resource;
    this.permissions = fields.permissions;
    this.cacheControl = fields.cacheControl;
    this.contentDisposition = fields.contentDisposition;
    this.contentEncoding = fields.contentEncoding;
    this.contentLanguage = fields.contentLanguage;
    this.contentType = fields.contentType;
    this.signature = fields.signature;
    Object.freeze(this);
  }

  get startsOn(): Date | undefined {
    return this.startTime === undefined ? undefined : new Date(this.startTime);
  }

  get expiresOn(): Date | undefined {
    return this.expiryTime === undefined ? undefined : new Date(this.expiryTime);
  }

  /**
   * Percent-encoded query string, without a leading `?`.
   */
  encode(): string {
    const entries: Array<readonly [SasQueryKey, string | undefined]> = [
      [SasQueryKeys.VERSION, this.version],
      [SasQueryKeys.SERVICES, this.services],
      [SasQueryKeys.RESOURCE_TYPES, this.resourceTypes],
      [SasQueryKeys.PROTOCOL, this.protocol],
      [SasQueryKeys.START_TIME, this.startTime],
      [SasQueryKeys.EXPIRY_TIME, this.expiryTime],
      [SasQueryKeys.IP_RANGE, this.ipRange ? formatIpRange(this.ipRange) : undefined],
      [SasQueryKeys.IDENTIFIER, this.identifier],
      [SasQueryKeys.RESOURCE, this.resource],
      [SasQueryKeys.PERMISSIONS, this.permissions],
      [SasQueryKeys.CACHE_CONTROL, this.cacheControl],
      [SasQueryKeys.CONTENT_DISPOSITION, this.contentDisposition],
      [SasQueryKeys.CONTENT_ENCODING, this.contentEncoding],
      [SasQueryKeys.CONTENT_LANGUAGE, this.contentLanguage],
      [SasQueryKeys.CONTENT_TYPE, this.contentType],
      [SasQueryKeys.SIGNATURE, this.signature],
    ];

    return entries
      .filter((entry): entry is readonly [SasQueryKey, string] => entry[1] !== undefined && entry[1] !== "")
      .map(([key, value]) => `${key}=${encodeURIComponent(value)}`)
      .join("&");
  }

  toString(): string {
    return this.encode();
  }

  /**
   * Read the SAS keys out of decoded search params. Other keys are ignored.
   * Returns undefined when no SAS key is present.
   */
  static fromSearchParams(params: URLSearchParams): SasQueryParameters | undefined {
    let found = false;
    for (const key of params.keys()) {
      if (isSasQueryKey(key)) {
        found = true;
        break;
      }
    }
    if (!found) {
      return undefined;
    }

    const get = (key: SasQueryKey): string | undefined => params.get(key) ?? undefined;
    const protocol = get(SasQueryKeys.PROTOCOL);
    const ipRange = get(SasQueryKeys.IP_RANGE);

    return new SasQueryParameters({
      version: get(SasQueryKeys.VERSION) ?? "",
      services: get(SasQueryKeys.SERVICES),
      resourceTypes: get(SasQueryKeys.RESOURCE_TYPES),
      protocol: protocol === undefined ? undefined : parseSasProtocol(protocol),
      startTime: get(SasQueryKeys.START_TIME),
      expiryTime: get(SasQueryKeys.EXPIRY_TIME),
      ipRange: ipRange === undefined ? undefined : parseIpRange(ipRange),
      identifier: get(SasQueryKeys.IDENTIFIER),
      resource: get(SasQueryKeys.RESOURCE),
      permissions: get(SasQueryKeys.PERMISSIONS),
      cacheControl: get(SasQueryKeys.CACHE_CONTROL),
      contentDisposition: get(SasQueryKeys.CONTENT_DISPOSITION),
      contentEncoding: get(SasQueryKeys.CONTENT_ENCODING),
      contentLanguage: get(SasQueryKeys.CONTENT_LANGUAGE),
      contentType: get(SasQueryKeys.CONTENT_TYPE),
      signature: get(SasQueryKeys.SIGNATURE),
    });
  }
}
