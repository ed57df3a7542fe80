/**
 * Pipeline policy contract.
 */

import type { HttpRequest, HttpResponse } from "../http/types.js";

/**
 * Continuation that hands a request to the rest of the pipeline.
 */
export type NextPolicy = (request: HttpRequest) => Promise<HttpResponse>;

/**
 * One stage of the pipeline. A policy may change the request, call `next`
 * zero or more times, and inspect or replace the response.
 *
 * Policies are shared by every request sent through a pipeline, so any
 * per-request state belongs on the request, not on the policy.
 */
export interface PipelinePolicy {
  readonly name: string;
  send(request: HttpRequest, next: NextPolicy): Promise<HttpResponse>;
}
