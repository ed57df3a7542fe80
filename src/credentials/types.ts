/**
 * Credential union.
 */

import type { Logger } from "../observability/index.js";
import type { AnonymousCredential } from "./anonymous-credential.js";
import type { SharedKeyCredential } from "./shared-key-credential.js";
import type { TokenCredential } from "./token-credential.js";

export type CredentialKind = "sharedKey" | "token" | "anonymous";

/**
 * What a credential policy gets from the pipeline builder.
 */
export interface CredentialPolicyOptions {
  logger: Logger;
}

/**
 * Every credential creates exactly one authentication policy.
 */
export type Credential = SharedKeyCredential | TokenCredential | AnonymousCredential;
