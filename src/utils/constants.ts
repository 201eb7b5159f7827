/**
 * Protocol constants and tunable defaults
 *
 * For unit conversions, see ~/types/time (TIME).
 */

// =============================================================================
// Custom tokens
// =============================================================================

/** Audience of every custom token; also how the verifier recognizes one */
export const CUSTOM_TOKEN_AUDIENCE =
  "https://identitytoolkit.googleapis.com/google.identity.identitytoolkit.v1.IdentityToolkit";

/** Custom token lifetime in seconds */
export const CUSTOM_TOKEN_TTL_SECONDS = 3600;

/**
 * Claims whose meaning is fixed by the platform. Rejected in developer claims
 * when minting.
 */
export const RESERVED_CLAIMS = [
  "acr",
  "amr",
  "at_hash",
  "aud",
  "auth_time",
  "azp",
  "cnf",
  "c_hash",
  "exp",
  "firebase",
  "iat",
  "iss",
  "jti",
  "nbf",
  "nonce",
  "sub",
] as const;

/** Payload fields stripped from `claims` of a verified token */
export const STANDARD_CLAIMS = ["iss", "aud", "exp", "iat", "sub", "uid"] as const;

// =============================================================================
// Verification
// =============================================================================

/** Tolerance applied to both `iat` and `exp`, in seconds */
export const CLOCK_SKEW_SECONDS = 300;

/** Smallest RSA modulus accepted for RS256 verification keys */
export const MIN_RSA_MODULUS_BITS = 2048;

export const ID_TOKEN_CERT_URL =
  "https://www.googleapis.com/robot/v1/metadata/x509/securetoken@system.gserviceaccount.com";
export const SESSION_COOKIE_CERT_URL =
  "https://www.googleapis.com/identitytoolkit/v3/relyingparty/publicKeys";

export const ID_TOKEN_ISSUER_PREFIX = "https://securetoken.google.com/";
export const SESSION_COOKIE_ISSUER_PREFIX =
  "https://session.firebase.google.com/";

export const DOC_URLS = {
  ID_TOKEN: "https://firebase.google.com/docs/auth/admin/verify-id-tokens",
  SESSION_COOKIE: "https://firebase.google.com/docs/auth/admin/manage-cookies",
  CUSTOM_TOKEN:
    "https://firebase.google.com/docs/auth/admin/create-custom-tokens",
} as const;

// =============================================================================
// Emulator
// =============================================================================

export const EMULATOR_HOST_ENV_VAR = "FIREBASE_AUTH_EMULATOR_HOST";

/** Principal reported by the emulated signer */
export const EMULATOR_EMAIL = "firebase-auth-emulator@example.com";

/** Bearer token the emulator accepts for admin calls */
export const EMULATOR_ACCESS_TOKEN = "owner";

// =============================================================================
// Transport (configurable)
// =============================================================================

export const DEFAULT_HOSTS = {
  IAM: "https://iam.googleapis.com",
  METADATA: "http://metadata",
  IDENTITY_TOOLKIT: "https://identitytoolkit.googleapis.com",
} as const;

/** Per-request timeout for outbound HTTP calls */
export const DEFAULT_HTTP_TIMEOUT_MS = 10_000;

/** Metadata-server tokens are refreshed this long before they expire */
export const ACCESS_TOKEN_EXPIRY_MARGIN_SECONDS = 60;

// =============================================================================
// Validation limits
// =============================================================================

export const LIMITS = {
  /** Longest uid (and `sub` claim) accepted */
  MAX_UID_LENGTH: 128,
} as const;
