/**
 * Shared Key Authentication
 *
 * Signs each request with HMAC-SHA256 over its canonical form, using the
 * storage account key.
 */

import { HeaderNames } from "../config/constants.js";
import { bodyLength, bufferRequest, cloneRequest, type HttpRequest, type HttpResponse } from "../http/types.js";
import type { Logger } from "../observability/index.js";
import type { NextPolicy, PipelinePolicy } from "../pipeline/policy.js";
import { buildSharedKeyStringToSign } from "../signing/canonicalize.js";
import { computeHmacSha256, decodeAccountKey } from "../signing/hmac.js";
import type { CredentialPolicyOptions } from "./types.js";

/**
 * Account name plus the decoded account key.
 */
export class SharedKeyCredential {
  readonly kind = "sharedKey";
  readonly accountName: string;
  private readonly accountKey: Buffer;

  /**
   * @throws InvalidKeyError when the key is not valid non-empty base64
   */
  constructor(accountName: string, accountKey: string) {
    this.accountName = accountName;
    this.accountKey = decodeAccountKey(accountKey);
  }

  /**
   * Base64 HMAC-SHA256 of `stringToSign` under the account key.
   */
  computeHmacSha256(stringToSign: string): string {
    return computeHmacSha256(this.accountKey, stringToSign);
  }

  createPolicy(options: CredentialPolicyOptions): PipelinePolicy {
    return new SharedKeyCredentialPolicy(this, options.logger);
  }
}

/**
 * Stamps x-ms-date and Content-Length when missing, then sets the
 * Authorization header.
 */
export class SharedKeyCredentialPolicy implements PipelinePolicy {
  readonly name = "sharedKeyCredential";
  private readonly credential: SharedKeyCredential;
  private readonly logger: Logger;

  constructor(credential: SharedKeyCredential, logger: Logger) {
    this.credential = credential;
    this.logger = logger;
  }

  async send(request: HttpRequest, next: NextPolicy): Promise<HttpResponse> {
    const signed = cloneRequest(await bufferRequest(request));

    if (!signed.headers.has(HeaderNames.DATE)) {
      signed.headers.set(HeaderNames.DATE, new Date().toUTCString());
    }

    const length = bodyLength(signed.body);
    if (signed.body !== undefined && length !== undefined && !signed.headers.has(HeaderNames.CONTENT_LENGTH)) {
      signed.headers.set(HeaderNames.CONTENT_LENGTH, length);
    }

    const stringToSign = buildSharedKeyStringToSign(signed, this.credential.accountName);
    const signature = this.credential.computeHmacSha256(stringToSign);
    signed.headers.set(HeaderNames.AUTHORIZATION, `SharedKey ${this.credential.accountName}:${signature}`);

    const response = await next(signed);

    if (response.status === 403) {
      this.logger.error("Request signature was rejected", {
        status: response.status,
        requestId: response.headers.get(HeaderNames.REQUEST_ID),
        stringToSign,
      });
    }

    return response;
  }
}
