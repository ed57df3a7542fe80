export {
  buildSharedKeyStringToSign,
  canonicalizeHeaders,
  canonicalizeResource,
  compareOrdinal,
} from "./canonicalize.js";
export { computeHmacSha256, decodeAccountKey } from "./hmac.js";
