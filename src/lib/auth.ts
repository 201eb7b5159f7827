/**
 * @fileoverview Public entry point: minting, verification and revocation
 * checks behind one client.
 *
 * {@link AuthClient} works at project level; {@link AuthClient.forTenant}
 * returns a {@link TenantAwareAuth} that stamps `tenant_id` on custom tokens
 * and only accepts ID tokens issued for its tenant.
 *
 * @module lib/auth
 */

import type { AuthOptions } from "~/schemas/config";
import type {
  AccessTokenProvider,
  AuthEnv,
  DecodedIdToken,
  KeySource,
  Signer,
  TenantId,
  UserRecordProvider,
} from "~/types";
import { createTenantId } from "~/types";
import type { Clock } from "~/utils/clock";
import { systemClock } from "~/utils/clock";
import type { ResolvedAuthConfig } from "~/utils/config";
import { resolveAuthConfig } from "~/utils/config";
import { EMULATOR_ACCESS_TOKEN } from "~/utils/constants";
import { AuthError, wrapAuthError } from "~/utils/errors";
import { logger } from "~/utils/logger";
import { MetadataAccessTokenProvider, staticAccessToken } from "./access-token";
import { HttpKeySource } from "./key-source";
import { createSigner } from "./signer";
import { TokenGenerator } from "./token-generator";
import type { TokenKind } from "./token-verifier";
import { ID_TOKEN, SESSION_COOKIE, TokenVerifier } from "./token-verifier";
import { IdentityToolkitUserProvider } from "./user-lookup";

/**
 * Collaborators a client builds for itself unless given one
 */
export interface AuthDependencies {
  signer?: Signer;
  idTokenKeySource?: KeySource;
  sessionCookieKeySource?: KeySource;
  userProvider?: UserRecordProvider;
  tokenProvider?: AccessTokenProvider;
  clock?: Clock;
  /** Environment read for project id and emulator fallbacks */
  env?: AuthEnv;
}

const log = logger.withContext({ component: "auth" });

/** Shared by a client and the tenant views derived from it */
interface AuthInternals {
  config: ResolvedAuthConfig;
  signer: Signer;
  clock: Clock;
  tokenProvider: AccessTokenProvider;
  idTokenVerifier: TokenVerifier;
  sessionCookieVerifier: TokenVerifier;
  userProvider?: UserRecordProvider;
}

abstract class BaseAuth {
  protected readonly generator: TokenGenerator;
  protected readonly userProvider: UserRecordProvider;

  protected constructor(
    protected readonly internals: AuthInternals,
    readonly tenantId?: TenantId,
  ) {
    this.generator = new TokenGenerator({
      signer: internals.signer,
      clock: internals.clock,
      tenantId,
    });
    this.userProvider =
      internals.userProvider ??
      new IdentityToolkitUserProvider({
        projectId: internals.config.projectId,
        tenantId,
        tokenProvider: internals.tokenProvider,
        host: internals.config.identityToolkitHost,
        emulatorHost: internals.config.emulatorHost,
        timeoutMs: internals.config.httpTimeoutMs,
      });
  }

  /**
   * Mint a custom token a client device can exchange for an ID token
   */
  createCustomToken(
    uid: string,
    developerClaims?: Record<string, unknown>,
    signal?: AbortSignal,
  ): Promise<string> {
    return this.generator.createCustomToken(uid, developerClaims, signal);
  }

  /**
   * Verify an ID token's signature and claims. Revocation is not checked;
   * see {@link verifyIdTokenAndCheckRevoked}.
   */
  async verifyIdToken(idToken: string, signal?: AbortSignal): Promise<DecodedIdToken> {
    const token = await this.internals.idTokenVerifier.verifyToken(idToken, signal);
    this.assertTenant(token);
    return token;
  }

  /**
   * Verify an ID token, then reject it when its user is disabled or its
   * tokens were revoked after it was issued
   */
  async verifyIdTokenAndCheckRevoked(
    idToken: string,
    signal?: AbortSignal,
  ): Promise<DecodedIdToken> {
    const token = await this.verifyIdToken(idToken, signal);
    return this.checkRevokedOrDisabled(token, ID_TOKEN, signal);
  }

  protected async checkRevokedOrDisabled(
    token: DecodedIdToken,
    kind: TokenKind,
    signal?: AbortSignal,
  ): Promise<DecodedIdToken> {
    const user = await this.userProvider.getUser(token.uid, signal);

    if (user.disabled) {
      log.info("Rejected token of disabled user", { uid: token.uid });
      throw wrapAuthError(
        kind.invalidCode,
        new AuthError({
          category: "INVALID_ARGUMENT",
          code: "USER_DISABLED",
          message: "user has been disabled",
        }),
      );
    }
    if (token.iat * 1000 < user.tokensValidAfterMillis) {
      log.info("Rejected revoked token", { uid: token.uid, kind: kind.shortName });
      throw wrapAuthError(
        kind.invalidCode,
        new AuthError({
          category: "INVALID_ARGUMENT",
          code: kind.revokedCode,
          message: `${kind.shortName} has been revoked`,
        }),
      );
    }
    return token;
  }

  private assertTenant(token: DecodedIdToken): void {
    if (this.tenantId && token.firebase?.tenant !== this.tenantId) {
      throw new AuthError({
        category: "INVALID_ARGUMENT",
        code: "TENANT_ID_MISMATCH",
        message: `invalid tenant id: ${JSON.stringify(token.firebase?.tenant ?? "")}`,
      });
    }
  }
}

/**
 * Project-level auth client
 *
 * @example
 * ```ts
 * const auth = new AuthClient({ projectId: "my-project", credential });
 * const token = await auth.verifyIdTokenAndCheckRevoked(idToken);
 * ```
 */
export class AuthClient extends BaseAuth {
  constructor(options: AuthOptions = {}, deps: AuthDependencies = {}) {
    super(buildInternals(options, deps));
  }

  get projectId(): string {
    return this.internals.config.projectId;
  }

  /**
   * Verify a session cookie's signature and claims
   */
  verifySessionCookie(cookie: string, signal?: AbortSignal): Promise<DecodedIdToken> {
    return this.internals.sessionCookieVerifier.verifyToken(cookie, signal);
  }

  /**
   * Verify a session cookie, then reject it when its user is disabled or
   * its tokens were revoked after it was issued
   */
  async verifySessionCookieAndCheckRevoked(
    cookie: string,
    signal?: AbortSignal,
  ): Promise<DecodedIdToken> {
    const token = await this.verifySessionCookie(cookie, signal);
    return this.checkRevokedOrDisabled(token, SESSION_COOKIE, signal);
  }

  /**
   * A view of this client scoped to one tenant
   *
   * @throws AuthError INVALID_ARGUMENT for an empty tenant id
   */
  forTenant(tenantId: string): TenantAwareAuth {
    return new TenantAwareAuth(this.internals, createTenantId(tenantId));
  }
}

/**
 * Tenant-scoped client obtained from {@link AuthClient.forTenant}
 */
export class TenantAwareAuth extends BaseAuth {
  /** @internal */
  constructor(internals: AuthInternals, tenantId: TenantId) {
    super(internals, tenantId);
  }
}

function buildInternals(options: AuthOptions, deps: AuthDependencies): AuthInternals {
  const config = resolveAuthConfig(options, deps.env ?? process.env);
  const clock = deps.clock ?? systemClock;
  const emulator = Boolean(config.emulatorHost);

  if (emulator) {
    log.warn("Auth emulator in use; token signatures are not verified", {
      emulatorHost: config.emulatorHost,
    });
  }

  const tokenProvider =
    deps.tokenProvider ??
    (emulator
      ? staticAccessToken(EMULATOR_ACCESS_TOKEN)
      : new MetadataAccessTokenProvider({
          metadataHost: config.metadataHost,
          timeoutMs: config.httpTimeoutMs,
          clock,
        }));

  const verifier = (kind: TokenKind, keySource: KeySource | undefined) =>
    new TokenVerifier({
      kind,
      projectId: config.projectId,
      keySource:
        keySource ??
        new HttpKeySource({ url: kind.certUrl, clock, timeoutMs: config.httpTimeoutMs }),
      clock,
      emulator,
    });

  return {
    config,
    signer: deps.signer ?? createSigner(config, tokenProvider),
    clock,
    tokenProvider,
    idTokenVerifier: verifier(ID_TOKEN, deps.idTokenKeySource),
    sessionCookieVerifier: verifier(SESSION_COOKIE, deps.sessionCookieKeySource),
    userProvider: deps.userProvider,
  };
}
