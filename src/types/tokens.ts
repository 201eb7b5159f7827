/**
 * JWT header and payload types for minted and verified tokens
 */

import type { Uid } from "./branded";

/** Algorithms the SDK produces or accepts */
export type SigningAlgorithm = "RS256" | "none";

/** Compact JWT header
 * @param alg - Algorithm identifier
 * @param typ - Always "JWT" for tokens the SDK mints
 * @param kid - Key ID naming the verification key
 */
export interface JwtHeader {
  alg: string;
  typ?: string;
  kid?: string;
}

/** Payload of a custom token exchanged by client devices for a session */
export interface CustomTokenPayload {
  /** Principal email of the signer */
  iss: string;
  /** Fixed identity-toolkit audience */
  aud: string;
  /** Expiration, always `iat + 3600` */
  exp: number;
  /** Issued at */
  iat: number;
  /** Same as `iss` */
  sub: string;
  uid: Uid;
  /** Developer claims; omitted when empty */
  claims?: Record<string, unknown>;
  tenant_id?: string;
}

/** Sign-in details the platform embeds under the `firebase` claim */
export interface SignInInfo {
  sign_in_provider?: string;
  tenant?: string;
  identities?: Record<string, unknown>;
  [key: string]: unknown;
}

/** Payload of an ID token or session cookie as read off the wire */
export interface IdTokenPayload {
  iss: string;
  aud: string;
  exp: number;
  iat: number;
  sub: string;
  auth_time?: number;
  firebase?: SignInInfo;
  [key: string]: unknown;
}

/** A verified ID token or session cookie */
export interface DecodedIdToken {
  iss: string;
  aud: string;
  exp: number;
  iat: number;
  sub: string;
  /** Copy of `sub` */
  uid: string;
  auth_time?: number;
  firebase?: SignInInfo;
  /** Every payload claim except iss, aud, exp, iat, sub and uid */
  claims: Record<string, unknown>;
}
