/**
 * SAS permission, service and resource-type flags.
 *
 * Every flag set has one canonical character order. Strings are accepted in
 * any order and case and are always emitted canonically.
 */

import { InvalidArgumentError } from "../errors.js";

type FlagTable<K extends string> = ReadonlyArray<readonly [string, K]>;

export type FlagSet<K extends string> = Partial<Record<K, boolean>>;

/**
 * Parse, format and normalize one kind of flag string.
 */
export interface FlagCodec<K extends string> {
  /** @throws InvalidArgumentError on a character outside the set */
  parse(input: string): FlagSet<K>;
  format(flags: FlagSet<K>): string;
  normalize(input: string | FlagSet<K>): string;
}

function flagCodec<K extends string>(kind: string, table: FlagTable<K>): FlagCodec<K> {
  const parse = (input: string): FlagSet<K> => {
    const flags: FlagSet<K> = {};
    for (const char of input.toLowerCase()) {
      const entry = table.find(([c]) => c === char);
      if (!entry) {
        throw new InvalidArgumentError(`Invalid ${kind} character '${char}' in "${input}"`, kind);
      }
      flags[entry[1]] = true;
    }
    return flags;
  };

  const format = (flags: FlagSet<K>): string =>
    table
      .filter(([, key]) => flags[key] === true)
      .map(([char]) => char)
      .join("");

  return {
    parse,
    format,
    normalize: (input) => format(typeof input === "string" ? parse(input) : input),
  };
}

export type BlobPermission = "read" | "add" | "create" | "write" | "delete";
export type ContainerPermission = BlobPermission | "list";
export type AccountPermission = ContainerPermission | "update" | "process";
export type AccountService = "blob" | "file" | "queue" | "table";
export type AccountResourceType = "service" | "container" | "object";

export type BlobSasPermissions = FlagSet<BlobPermission>;
export type ContainerSasPermissions = FlagSet<ContainerPermission>;
export type AccountSasPermissions = FlagSet<AccountPermission>;
export type AccountSasServices = FlagSet<AccountService>;
export type AccountSasResourceTypes = FlagSet<AccountResourceType>;

/** Canonical order `racwd`. */
export const BlobSasPermissions = flagCodec<BlobPermission>("blob permission", [
  ["r", "read"],
  ["a", "add"],
  ["c", "create"],
  ["w", "write"],
  ["d", "delete"],
]);

/** Canonical order `racwdl`. */
export const ContainerSasPermissions = flagCodec<ContainerPermission>("container permission", [
  ["r", "read"],
  ["a", "add"],
  ["c", "create"],
  ["w", "write"],
  ["d", "delete"],
  ["l", "list"],
]);

/** Canonical order `racwdlup`. */
export const AccountSasPermissions = flagCodec<AccountPermission>("account permission", [
  ["r", "read"],
  ["a", "add"],
  ["c", "create"],
  ["w", "write"],
  ["d", "delete"],
  ["l", "list"],
  ["u", "update"],
  ["p", "process"],
]);

/** Canonical order `bfqt`. */
export const AccountSasServices = flagCodec<AccountService>("account service", [
  ["b", "blob"],
  ["f", "file"],
  ["q", "queue"],
  ["t", "table"],
]);

/** Canonical order `sco`. */
export const AccountSasResourceTypes = flagCodec<AccountResourceType>("account resource type", [
  ["s", "service"],
  ["c", "container"],
  ["o", "object"],
]);
