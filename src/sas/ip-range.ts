import { InvalidArgumentError } from "../errors.js";

/**
 * An inclusive range of IPv4 addresses, or a single address.
 */
export interface IpRange {
  start: string;
  end?: string;
}

export function formatIpRange(range: IpRange): string {
  if (range.start.length === 0) {
    return "";
  }
  return range.end && range.end !== range.start ? `${range.start}-${range.end}` : range.start;
}

export function parseIpRange(value: string): IpRange {
  const [start, end, ...rest] = value.split("-");
  if (!start || rest.length > 0 || end === "") {
    throw new InvalidArgumentError(`Invalid IP range "${value}"`, "ipRange");
  }
  return end === undefined ? { start } : { start, end };
}
