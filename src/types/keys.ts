/**
 * Public verification key types
 */

import type { KeyObject } from "node:crypto";

/** RSA public key parsed from an X.509 certificate */
export interface PublicKey {
  /** Key ID, unique within a snapshot */
  kid: string;
  key: KeyObject;
}

/** Immutable set of trusted keys plus its absolute expiry (epoch ms) */
export interface KeySnapshot {
  readonly keys: readonly PublicKey[];
  readonly expiresAt: number;
}

/** Anything that can hand out the currently trusted keys */
export interface KeySource {
  keys(signal?: AbortSignal): Promise<readonly PublicKey[]>;
}
