/**
 * Environment variables and middleware context types
 */

import type { DecodedIdToken } from "./tokens";

/** Process environment variables the SDK reads at initialization */
export interface AuthEnv {
  /** `host:port` of a running auth emulator */
  FIREBASE_AUTH_EMULATOR_HOST?: string;
  /** Project id fallbacks */
  GOOGLE_CLOUD_PROJECT?: string;
  GCLOUD_PROJECT?: string;
  [key: string]: string | undefined;
}

/** Context variables (for c.set/c.get) */
export interface Variables {
  /** Verified ID token or session cookie */
  token: DecodedIdToken;
}
