export type { HttpTransport } from "./types.js";
export { UndiciTransport, type UndiciTransportOptions } from "./undici-transport.js";
