/**
 * HMAC-SHA256 signing with a base64 account key.
 */

import { createHmac } from "crypto";
import { InvalidKeyError } from "../errors.js";

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/**
 * Decode a base64 account key, rejecting anything Buffer.from would silently
 * truncate.
 */
export function decodeAccountKey(accountKey: string): Buffer {
  if (accountKey.length === 0) {
    throw new InvalidKeyError("Account key cannot be empty");
  }
  if (!BASE64_PATTERN.test(accountKey)) {
    throw new InvalidKeyError("Account key is not valid base64");
  }
  const key = Buffer.from(accountKey, "base64");
  if (key.length === 0) {
    throw new InvalidKeyError("Account key decodes to zero bytes");
  }
  return key;
}

/**
 * Base64 HMAC-SHA256 of the UTF-8 bytes of `stringToSign`.
 */
export function computeHmacSha256(key: Uint8Array, stringToSign: string): string {
  const hmac = createHmac("sha256", key);
  hmac.update(stringToSign, "utf8");
  return hmac.digest("base64");
}
