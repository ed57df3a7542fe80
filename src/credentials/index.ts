/**
 * Credentials and their authentication policies.
 */

export type { Credential, CredentialKind, CredentialPolicyOptions } from "./types.js";
export { SharedKeyCredential, SharedKeyCredentialPolicy } from "./shared-key-credential.js";
export { TokenCredential, TokenCredentialPolicy } from "./token-credential.js";
export { AnonymousCredential, AnonymousCredentialPolicy } from "./anonymous-credential.js";
