/**
 * Bearer token authentication.
 */

import { HeaderNames } from "../config/constants.js";
import { InvalidArgumentError } from "../errors.js";
import { cloneRequest, type HttpRequest, type HttpResponse } from "../http/types.js";
import type { NextPolicy, PipelinePolicy } from "../pipeline/policy.js";
import type { CredentialPolicyOptions } from "./types.js";

/**
 * Holds an OAuth access token. The token can be replaced at any time; every
 * request reads whichever value is current when it is signed.
 */
export class TokenCredential {
  readonly kind = "token";
  private tokenValue: string;

  constructor(token: string) {
    this.tokenValue = TokenCredential.validate(token);
  }

  get token(): string {
    return this.tokenValue;
  }

  set token(value: string) {
    this.tokenValue = TokenCredential.validate(value);
  }

  createPolicy(_options: CredentialPolicyOptions): PipelinePolicy {
    return new TokenCredentialPolicy(this);
  }

  private static validate(token: string): string {
    if (token.length === 0) {
      throw new InvalidArgumentError("Token cannot be empty", "token");
    }
    return token;
  }
}

export class TokenCredentialPolicy implements PipelinePolicy {
  readonly name = "tokenCredential";
  private readonly credential: TokenCredential;

  constructor(credential: TokenCredential) {
    this.credential = credential;
  }

  async send(request: HttpRequest, next: NextPolicy): Promise<HttpResponse> {
    if (new URL(request.url).protocol !== "https:") {
      throw new InvalidArgumentError("Token credentials can only be used with HTTPS", "url");
    }

    const token = this.credential.token;
    const authorized = cloneRequest(request);
    authorized.headers.set(HeaderNames.AUTHORIZATION, `Bearer ${token}`);
    return next(authorized);
  }
}
