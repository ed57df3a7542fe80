/**
 * HTTP transport type definitions.
 */

import type { HttpRequest, HttpResponse } from "../http/types.js";

/**
 * The last hop of a pipeline. Sends one request and returns a response with a
 * fully buffered body. Implementations must honour `request.abortSignal`.
 */
export interface HttpTransport {
  send(request: HttpRequest): Promise<HttpResponse>;
}
