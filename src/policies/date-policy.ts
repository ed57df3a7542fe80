import { HeaderNames } from "../config/constants.js";
import { cloneRequest, type HttpRequest, type HttpResponse } from "../http/types.js";
import type { NextPolicy, PipelinePolicy } from "../pipeline/policy.js";

/**
 * Stamps a fresh RFC 1123 `x-ms-date` on every attempt.
 */
export class DatePolicy implements PipelinePolicy {
  readonly name = "date";
  private readonly now: () => Date;

  constructor(now: () => Date = () => new Date()) {
    this.now = now;
  }

  send(request: HttpRequest, next: NextPolicy): Promise<HttpResponse> {
    const stamped = cloneRequest(request);
    stamped.headers.set(HeaderNames.DATE, this.now().toUTCString());
    return next(stamped);
  }
}
