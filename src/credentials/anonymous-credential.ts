import type { HttpRequest, HttpResponse } from "../http/types.js";
import type { NextPolicy, PipelinePolicy } from "../pipeline/policy.js";
import type { CredentialPolicyOptions } from "./types.js";

/**
 * No authentication. Used for public containers or SAS-signed URLs.
 */
export class AnonymousCredential {
  readonly kind = "anonymous";

  createPolicy(_options: CredentialPolicyOptions): PipelinePolicy {
    return new AnonymousCredentialPolicy();
  }
}

export class AnonymousCredentialPolicy implements PipelinePolicy {
  readonly name = "anonymousCredential";

  send(request: HttpRequest, next: NextPolicy): Promise<HttpResponse> {
    return next(request);
  }
}
