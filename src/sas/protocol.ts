import { InvalidArgumentError } from "../errors.js";

/**
 * Protocols a SAS may be used over.
 */
export type SasProtocol = "https" | "https,http";

export const SasProtocol = {
  HTTPS_ONLY: "https",
  HTTPS_AND_HTTP: "https,http",
} as const satisfies Record<string, SasProtocol>;

export function parseSasProtocol(value: string): SasProtocol {
  switch (value) {
    case "https":
    case "https,http":
      return value;
    default:
      throw new InvalidArgumentError(`Invalid SAS protocol "${value}"`, "protocol");
  }
}
