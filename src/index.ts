export { AuthClient, TenantAwareAuth } from "~/lib/auth";
export type { AuthDependencies } from "~/lib/auth";
export { MetadataAccessTokenProvider, staticAccessToken } from "~/lib/access-token";
export type { MetadataAccessTokenProviderOptions } from "~/lib/access-token";
export {
  FileKeySource,
  HttpKeySource,
  InMemoryKeySource,
  parsePublicCertificates,
} from "~/lib/key-source";
export type { HttpKeySourceOptions } from "~/lib/key-source";
export {
  createSigner,
  EmulatedSigner,
  IamSigner,
  ServiceAccountSigner,
} from "~/lib/signer";
export type { IamSignerOptions } from "~/lib/signer";
export { TokenGenerator } from "~/lib/token-generator";
export type { TokenGeneratorOptions } from "~/lib/token-generator";
export { ID_TOKEN, SESSION_COOKIE, TokenVerifier } from "~/lib/token-verifier";
export type { TokenKind, TokenVerifierOptions } from "~/lib/token-verifier";
export { IdentityToolkitUserProvider } from "~/lib/user-lookup";
export type { IdentityToolkitUserProviderOptions } from "~/lib/user-lookup";

export * from "~/schemas";
export * from "~/types";

export { MockClock, systemClock } from "~/utils/clock";
export type { Clock } from "~/utils/clock";
export { loadServiceAccount, resolveAuthConfig } from "~/utils/config";
export type { ResolvedAuthConfig } from "~/utils/config";
export {
  CLOCK_SKEW_SECONDS,
  CUSTOM_TOKEN_AUDIENCE,
  CUSTOM_TOKEN_TTL_SECONDS,
  EMULATOR_HOST_ENV_VAR,
  RESERVED_CLAIMS,
} from "~/utils/constants";
export * from "~/utils/errors";
export { decodeToken, signToken } from "~/utils/jwt";
export { Logger, logger } from "~/utils/logger";
export type { LogContext, LogLevel } from "~/utils/logger";
