/**
 * Signer types
 */

import type { SigningAlgorithm } from "./tokens";

/**
 * Produces signatures over arbitrary bytes and names the signing principal.
 */
export interface Signer {
  /** Algorithm placed in the `alg` header of tokens this signer produces */
  readonly algorithm: SigningAlgorithm;

  /** Sign raw bytes, returning the raw signature */
  sign(data: Uint8Array, signal?: AbortSignal): Promise<Uint8Array>;

  /** Principal email used as `iss` and `sub` of minted tokens */
  email(signal?: AbortSignal): Promise<string>;
}

/** Supplies OAuth2 bearer tokens for calls to the platform */
export interface AccessTokenProvider {
  getAccessToken(signal?: AbortSignal): Promise<string>;
}
