/**
 * Shared Key canonicalization.
 *
 * Produces the string-to-sign for a request. The output is a pure function of
 * the request's method, URL and headers and never depends on the order in
 * which headers were added.
 */

import { HeaderNames, STORAGE_HEADER_PREFIX } from "../config/constants.js";
import { InvalidArgumentError } from "../errors.js";
import type { HttpHeaders } from "../http/headers.js";
import type { HttpRequest } from "../http/types.js";

/**
 * Code-unit comparison, independent of locale.
 */
export function compareOrdinal(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Render the x-ms- headers as sorted `name:value` lines.
 */
export function canonicalizeHeaders(headers: HttpHeaders): string {
  const lines: Array<[string, string]> = [];
  for (const [name, value] of headers) {
    const lower = name.toLowerCase();
    if (lower.startsWith(STORAGE_HEADER_PREFIX)) {
      lines.push([lower, value.trim()]);
    }
  }
  lines.sort(([a], [b]) => compareOrdinal(a, b));
  return lines.map(([name, value]) => `${name}:${value}`).join("\n");
}

function parseRequestUrl(url: string): { parsed: URL; path: string } {
  try {
    const parsed = new URL(url);
    return { parsed, path: parsed.pathname.length > 0 ? decodeURIComponent(parsed.pathname) : "/" };
  } catch (error) {
    throw new InvalidArgumentError(`Cannot sign malformed URL "${url}"`, "url", { cause: error });
  }
}

/**
 * Render `/{account}{path}` followed by one line per query key.
 *
 * @throws InvalidArgumentError when the URL or its path encoding is malformed
 */
export function canonicalizeResource(url: string, accountName: string): string {
  const { parsed, path } = parseRequestUrl(url);
  let resource = `/${accountName}${path}`;

  const query = new Map<string, string[]>();
  for (const [key, value] of parsed.searchParams) {
    const lower = key.toLowerCase();
    const values = query.get(lower);
    if (values) {
      values.push(value);
    } else {
      query.set(lower, [value]);
    }
  }

  const keys = [...query.keys()].sort(compareOrdinal);
  for (const key of keys) {
    const values = [...(query.get(key) ?? [])].sort(compareOrdinal);
    resource += `\n${key}:${values.join(",")}`;
  }

  return resource;
}

/**
 * Build the Shared Key string-to-sign.
 */
export function buildSharedKeyStringToSign(request: HttpRequest, accountName: string): string {
  const header = (name: string): string => request.headers.get(name) ?? "";
  const contentLength = header(HeaderNames.CONTENT_LENGTH);

  return [
    request.method.toUpperCase(),
    header(HeaderNames.CONTENT_ENCODING),
    header(HeaderNames.CONTENT_LANGUAGE),
    contentLength === "0" ? "" : contentLength,
    header(HeaderNames.CONTENT_MD5),
    header(HeaderNames.CONTENT_TYPE),
    "", // Date; x-ms-date is signed with the other x-ms- headers
    header(HeaderNames.IF_MODIFIED_SINCE),
    header(HeaderNames.IF_MATCH),
    header(HeaderNames.IF_NONE_MATCH),
    header(HeaderNames.IF_UNMODIFIED_SINCE),
    header(HeaderNames.RANGE),
    canonicalizeHeaders(request.headers),
    canonicalizeResource(request.url, accountName),
  ].join("\n");
}
