import type { MiddlewareHandler } from "hono";
import { getCookie } from "hono/cookie";
import type { AuthClient } from "~/lib/auth";
import type { ErrorResponse } from "~/schemas/errors";
import type { DecodedIdToken, Variables } from "~/types";
import { HTTP } from "~/types";
import { isAuthError } from "~/utils/errors";
import { logger } from "~/utils/logger";

type AuthMiddleware = MiddlewareHandler<{ Variables: Variables }>;

/** Anything that verifies ID tokens: a client or one of its tenant views */
export type IdTokenVerifier = Pick<
  AuthClient,
  "verifyIdToken" | "verifyIdTokenAndCheckRevoked"
>;

export type SessionCookieVerifier = Pick<
  AuthClient,
  "verifySessionCookie" | "verifySessionCookieAndCheckRevoked"
>;

export interface IdTokenAuthOptions {
  /** Also reject tokens of disabled users and revoked sessions */
  checkRevoked?: boolean;
}

export interface SessionCookieAuthOptions {
  /** Defaults to "session" */
  cookieName?: string;
  checkRevoked?: boolean;
}

/**
 * Require `Authorization: Bearer <ID token>`; the verified token is stored
 * as `c.var.token`
 */
export function idTokenAuth(
  auth: IdTokenVerifier,
  options: IdTokenAuthOptions = {},
): AuthMiddleware {
  return async (c, next) => {
    const authHeader = c.req.header("Authorization");

    if (!authHeader?.startsWith("Bearer ")) {
      return c.json(
        { error: "Missing authorization header", code: "AUTH_MISSING" } satisfies ErrorResponse,
        HTTP.Unauthorized,
      );
    }

    const idToken = authHeader.slice(7).trim();
    if (!idToken) {
      return c.json(
        { error: "Missing token", code: "AUTH_MISSING" } satisfies ErrorResponse,
        HTTP.Unauthorized,
      );
    }

    const verify = options.checkRevoked
      ? auth.verifyIdTokenAndCheckRevoked.bind(auth)
      : auth.verifyIdToken.bind(auth);
    const result = await authenticate(() => verify(idToken, c.req.raw.signal));
    if ("failure" in result) {
      return c.json(result.failure, HTTP.Unauthorized);
    }

    c.set("token", result.token);
    return next();
  };
}

/**
 * Require a session cookie; the verified cookie is stored as `c.var.token`
 */
export function sessionCookieAuth(
  auth: SessionCookieVerifier,
  options: SessionCookieAuthOptions = {},
): AuthMiddleware {
  const cookieName = options.cookieName ?? "session";

  return async (c, next) => {
    const cookie = getCookie(c, cookieName);
    if (!cookie) {
      return c.json(
        { error: "Missing session cookie", code: "AUTH_MISSING" } satisfies ErrorResponse,
        HTTP.Unauthorized,
      );
    }

    const verify = options.checkRevoked
      ? auth.verifySessionCookieAndCheckRevoked.bind(auth)
      : auth.verifySessionCookie.bind(auth);
    const result = await authenticate(() => verify(cookie, c.req.raw.signal));
    if ("failure" in result) {
      return c.json(result.failure, HTTP.Unauthorized);
    }

    c.set("token", result.token);
    return next();
  };
}

// AuthErrors become a 401 body; anything else goes to the app's error handler
async function authenticate(
  verify: () => Promise<DecodedIdToken>,
): Promise<{ token: DecodedIdToken } | { failure: ErrorResponse }> {
  try {
    return { token: await verify() };
  } catch (error) {
    if (!isAuthError(error)) {
      throw error;
    }
    logger.warn("Request authentication failed", {
      component: "auth-middleware",
      code: error.code,
      category: error.category,
    });
    return { failure: { error: error.message, code: error.code } };
  }
}
