/**
 * @fileoverview Verification of ID tokens and session cookies.
 *
 * Both token kinds share one algorithm and differ only in the
 * {@link TokenKind} they are verified as: issuer prefix, the name used in
 * messages, the documentation link and the error-code family.
 *
 * Order of checks:
 * 1. project id and token present
 * 2. structure and claims (kid, alg, aud, iss, sub), first failure wins
 * 3. iat / exp against the clock, with 300 s tolerance either way
 * 4. RS256 signature against the key source (skipped for the emulator)
 *
 * @module lib/token-verifier
 */

import { compactVerify, errors as joseErrors } from "jose";
import type { AuthErrorCode } from "~/schemas/errors";
import { IdTokenPayloadSchema, JwtHeaderSchema } from "~/schemas/tokens";
import type { ParsedIdTokenPayload, ParsedJwtHeader } from "~/schemas/tokens";
import type { DecodedIdToken, KeySource, PublicKey } from "~/types";
import { toEpochSeconds } from "~/types";
import type { Clock } from "~/utils/clock";
import { systemClock } from "~/utils/clock";
import {
  CLOCK_SKEW_SECONDS,
  CUSTOM_TOKEN_AUDIENCE,
  DOC_URLS,
  ID_TOKEN_CERT_URL,
  ID_TOKEN_ISSUER_PREFIX,
  LIMITS,
  SESSION_COOKIE_CERT_URL,
  SESSION_COOKIE_ISSUER_PREFIX,
  STANDARD_CLAIMS,
} from "~/utils/constants";
import { AuthError, errorMessage } from "~/utils/errors";
import type { DecodedJwt } from "~/utils/jwt";
import { decodeToken } from "~/utils/jwt";

/** Per-kind settings of a verifier */
export interface TokenKind {
  /** Name used in messages, e.g. "ID token" */
  shortName: string;
  articledShortName: string;
  docUrl: string;
  issuerPrefix: string;
  certUrl: string;
  invalidCode: AuthErrorCode;
  expiredCode: AuthErrorCode;
  revokedCode: AuthErrorCode;
}

export const ID_TOKEN: TokenKind = {
  shortName: "ID token",
  articledShortName: "an ID token",
  docUrl: DOC_URLS.ID_TOKEN,
  issuerPrefix: ID_TOKEN_ISSUER_PREFIX,
  certUrl: ID_TOKEN_CERT_URL,
  invalidCode: "ID_TOKEN_INVALID",
  expiredCode: "ID_TOKEN_EXPIRED",
  revokedCode: "ID_TOKEN_REVOKED",
};

export const SESSION_COOKIE: TokenKind = {
  shortName: "session cookie",
  articledShortName: "a session cookie",
  docUrl: DOC_URLS.SESSION_COOKIE,
  issuerPrefix: SESSION_COOKIE_ISSUER_PREFIX,
  certUrl: SESSION_COOKIE_CERT_URL,
  invalidCode: "SESSION_COOKIE_INVALID",
  expiredCode: "SESSION_COOKIE_EXPIRED",
  revokedCode: "SESSION_COOKIE_REVOKED",
};

export interface TokenVerifierOptions {
  kind: TokenKind;
  projectId: string;
  keySource: KeySource;
  clock?: Clock;
  /** Accept unsigned `alg: "none"` tokens and skip signature checks */
  emulator?: boolean;
}

export class TokenVerifier {
  readonly kind: TokenKind;
  private readonly projectId: string;
  private readonly keySource: KeySource;
  private readonly clock: Clock;
  private readonly emulator: boolean;

  constructor(options: TokenVerifierOptions) {
    this.kind = options.kind;
    this.projectId = options.projectId;
    this.keySource = options.keySource;
    this.clock = options.clock ?? systemClock;
    this.emulator = options.emulator ?? false;
  }

  /**
   * Verify a compact token and return its decoded form
   *
   * @throws AuthError with the kind's INVALID or EXPIRED code; key source
   *   failures (CERTIFICATE_FETCH_FAILED) propagate unchanged
   */
  async verifyToken(token: string, signal?: AbortSignal): Promise<DecodedIdToken> {
    if (!this.projectId) {
      throw this.invalid("project id not available");
    }
    if (!token) {
      throw this.invalid(`${this.kind.shortName} must be a non-empty string`);
    }

    const { decoded, header } = this.verifyContent(token);
    this.verifyTimestamps(decoded);

    if (!this.emulator) {
      await this.verifySignature(token, header, signal);
    }
    return decoded;
  }

  private verifyContent(token: string): {
    decoded: DecodedIdToken;
    header: ParsedJwtHeader;
  } {
    let parts: DecodedJwt<ParsedJwtHeader, ParsedIdTokenPayload>;
    try {
      parts = decodeToken(token, JwtHeaderSchema, IdTokenPayloadSchema);
    } catch (error) {
      throw this.invalid(this.withDocLink(errorMessage(error)), error);
    }

    const problem = this.findClaimProblem(parts.header, parts.payload);
    if (problem) {
      throw this.invalid(this.withDocLink(problem));
    }

    const { payload, rawPayload } = parts;
    const claims: Record<string, unknown> = { ...rawPayload };
    for (const name of STANDARD_CLAIMS) {
      delete claims[name];
    }

    const decoded: DecodedIdToken = {
      iss: payload.iss,
      aud: payload.aud,
      exp: payload.exp,
      iat: payload.iat,
      sub: payload.sub,
      uid: payload.sub,
      claims,
    };
    if (payload.auth_time !== undefined) {
      decoded.auth_time = payload.auth_time;
    }
    if (payload.firebase !== undefined) {
      decoded.firebase = payload.firebase;
    }

    return { decoded, header: parts.header };
  }

  private findClaimProblem(
    header: ParsedJwtHeader,
    payload: ParsedIdTokenPayload,
  ): string | undefined {
    const { shortName } = this.kind;
    const issuer = this.kind.issuerPrefix + this.projectId;

    if (!header.kid) {
      if (payload.aud === CUSTOM_TOKEN_AUDIENCE) {
        return `expected ${this.kind.articledShortName} but got a custom token`;
      }
      if (!this.emulator) {
        return `${shortName} has no 'kid' header`;
      }
    }
    if (!this.acceptsAlgorithm(header.alg)) {
      return `${shortName} has invalid algorithm; expected 'RS256' but got ${quote(header.alg)}`;
    }
    if (payload.aud !== this.projectId) {
      return (
        `${shortName} has invalid 'aud' (audience) claim; expected ${quote(this.projectId)} ` +
        `but got ${quote(payload.aud)}; ${this.projectMatchHint()}`
      );
    }
    if (payload.iss !== issuer) {
      return (
        `${shortName} has invalid 'iss' (issuer) claim; expected ${quote(issuer)} ` +
        `but got ${quote(payload.iss)}; ${this.projectMatchHint()}`
      );
    }
    if (!payload.sub) {
      return `${shortName} has empty 'sub' (subject) claim`;
    }
    if (payload.sub.length > LIMITS.MAX_UID_LENGTH) {
      return `${shortName} has a 'sub' (subject) claim longer than ${LIMITS.MAX_UID_LENGTH} characters`;
    }
    return undefined;
  }

  private acceptsAlgorithm(alg: string): boolean {
    return alg === "RS256" || (this.emulator && alg === "none");
  }

  private verifyTimestamps(token: DecodedIdToken): void {
    const now = toEpochSeconds(this.clock.now());
    if (token.iat - CLOCK_SKEW_SECONDS > now) {
      throw this.invalid(`${this.kind.shortName} issued at future timestamp: ${token.iat}`);
    }
    if (token.exp + CLOCK_SKEW_SECONDS < now) {
      throw new AuthError({
        category: "INVALID_ARGUMENT",
        code: this.kind.expiredCode,
        message: `${this.kind.shortName} has expired at: ${token.exp}`,
      });
    }
  }

  private async verifySignature(
    token: string,
    header: ParsedJwtHeader,
    signal?: AbortSignal,
  ): Promise<void> {
    const keys = await this.keySource.keys(signal);
    const candidates = header.kid ? keys.filter((key) => key.kid === header.kid) : keys;

    for (const key of candidates) {
      if (await verifiesWith(token, key)) {
        return;
      }
    }
    throw this.invalid("failed to verify token signature");
  }

  private projectMatchHint(): string {
    return (
      `make sure the ${this.kind.shortName} comes from the same Firebase project ` +
      "as the credential used to authenticate this SDK"
    );
  }

  private withDocLink(message: string): string {
    return `${message}; see ${this.kind.docUrl} for details on how to retrieve a valid ${this.kind.shortName}`;
  }

  private invalid(message: string, cause?: unknown): AuthError {
    return new AuthError({
      category: "INVALID_ARGUMENT",
      code: this.kind.invalidCode,
      message,
      cause,
    });
  }
}

async function verifiesWith(token: string, key: PublicKey): Promise<boolean> {
  try {
    await compactVerify(token, key.key, { algorithms: ["RS256"] });
    return true;
  } catch (error) {
    if (error instanceof joseErrors.JOSEError) {
      return false;
    }
    throw error;
  }
}

function quote(value: string): string {
  return JSON.stringify(value);
}
