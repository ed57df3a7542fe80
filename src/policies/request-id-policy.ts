import { v4 as uuidv4 } from "uuid";
import { HeaderNames } from "../config/constants.js";
import { cloneRequest, type HttpRequest, type HttpResponse } from "../http/types.js";
import type { NextPolicy, PipelinePolicy } from "../pipeline/policy.js";

/**
 * Stamps a client request id once per operation. It sits outside the retry
 * policy, so every attempt carries the same id.
 */
export class RequestIdPolicy implements PipelinePolicy {
  readonly name = "requestId";

  send(request: HttpRequest, next: NextPolicy): Promise<HttpResponse> {
    if (request.headers.has(HeaderNames.CLIENT_REQUEST_ID)) {
      return next(request);
    }
    const stamped = cloneRequest(request);
    stamped.headers.set(HeaderNames.CLIENT_REQUEST_ID, uuidv4());
    return next(stamped);
  }
}
