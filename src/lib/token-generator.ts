/**
 * Custom token minting
 *
 * A custom token is a short-lived RS256 assertion, signed by the SDK's
 * principal, that a client device exchanges for an ID token.
 */

import type { CustomTokenPayload, JwtHeader, Signer } from "~/types";
import { createUid, toEpochSeconds } from "~/types";
import type { Clock } from "~/utils/clock";
import { systemClock } from "~/utils/clock";
import {
  CUSTOM_TOKEN_AUDIENCE,
  CUSTOM_TOKEN_TTL_SECONDS,
  RESERVED_CLAIMS,
} from "~/utils/constants";
import { AuthError } from "~/utils/errors";
import { signToken } from "~/utils/jwt";
import { logger } from "~/utils/logger";

export interface TokenGeneratorOptions {
  signer: Signer;
  clock?: Clock;
  /** Embedded as `tenant_id` in every token */
  tenantId?: string;
}

export class TokenGenerator {
  private readonly signer: Signer;
  private readonly clock: Clock;
  private readonly tenantId?: string;
  private readonly log = logger.withContext({ component: "token-generator" });

  constructor(options: TokenGeneratorOptions) {
    this.signer = options.signer;
    this.clock = options.clock ?? systemClock;
    this.tenantId = options.tenantId;
  }

  /**
   * Mint a custom token for `uid`, optionally carrying developer claims
   *
   * @throws AuthError INVALID_ARGUMENT for a bad uid or a reserved claim;
   *   signer failures propagate unchanged
   */
  async createCustomToken(
    uid: string,
    developerClaims?: Record<string, unknown>,
    signal?: AbortSignal,
  ): Promise<string> {
    const email = await this.signer.email(signal);
    const validUid = createUid(uid);
    assertNoReservedClaims(developerClaims);

    const iat = toEpochSeconds(this.clock.now());
    const header: JwtHeader = { alg: this.signer.algorithm, typ: "JWT" };
    const payload: CustomTokenPayload = {
      iss: email,
      aud: CUSTOM_TOKEN_AUDIENCE,
      exp: iat + CUSTOM_TOKEN_TTL_SECONDS,
      iat,
      sub: email,
      uid: validUid,
    };
    if (developerClaims && Object.keys(developerClaims).length > 0) {
      payload.claims = developerClaims;
    }
    if (this.tenantId) {
      payload.tenant_id = this.tenantId;
    }

    const token = await signToken(header, payload, this.signer, signal);
    this.log.debug("Minted custom token", {
      uid,
      alg: header.alg,
      tenantId: this.tenantId,
    });
    return token;
  }
}

function assertNoReservedClaims(claims?: Record<string, unknown>): void {
  if (!claims) {
    return;
  }
  const disallowed = RESERVED_CLAIMS.filter((name) => Object.hasOwn(claims, name));
  if (disallowed.length === 0) {
    return;
  }

  const message =
    disallowed.length === 1
      ? `developer claim "${disallowed.join(", ")}" is reserved and cannot be specified`
      : `developer claims "${disallowed.join(", ")}" are reserved and cannot be specified`;
  throw new AuthError({ category: "INVALID_ARGUMENT", code: "INVALID_ARGUMENT", message });
}
