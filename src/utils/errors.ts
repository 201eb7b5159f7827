/**
 * Error handling utilities
 *
 * Every failure the SDK raises is an {@link AuthError} carrying a coarse
 * platform category and a fine SDK code. Predicates compare codes and never
 * inspect messages.
 */

import type { AuthErrorCode, ErrorCategory } from "~/schemas/errors";
import {
  ErrorCategorySchema,
  PlatformErrorResponseSchema,
} from "~/schemas/errors";
import { HTTP } from "~/types/http";

/** Buffered copy of the HTTP response behind an error */
export interface ErrorHttpResponse {
  status: number;
  body: string;
}

interface AuthErrorOptions {
  category: ErrorCategory;
  code: AuthErrorCode;
  message: string;
  cause?: unknown;
  httpResponse?: ErrorHttpResponse;
}

/**
 * Typed error class for everything the SDK surfaces
 */
export class AuthError extends Error {
  public readonly category: ErrorCategory;
  public readonly code: AuthErrorCode;
  public readonly httpResponse?: ErrorHttpResponse;

  constructor(options: AuthErrorOptions) {
    super(
      options.message,
      options.cause === undefined ? undefined : { cause: options.cause },
    );
    this.name = "AuthError";
    this.category = options.category;
    this.code = options.code;
    this.httpResponse = options.httpResponse;
  }

  toJSON(): { code: AuthErrorCode; category: ErrorCategory; message: string } {
    return { code: this.code, category: this.category, message: this.message };
  }
}

/**
 * Type guard for AuthError
 */
export function isAuthError(error: unknown): error is AuthError {
  return error instanceof AuthError;
}

/**
 * Wrap a specific failure in the `..._INVALID` code of a token family. The
 * outer error reuses the inner message so callers see a single sentence.
 */
export function wrapAuthError(
  outerCode: AuthErrorCode,
  inner: AuthError,
): AuthError {
  return new AuthError({
    category: inner.category,
    code: outerCode,
    message: inner.message,
    cause: inner,
  });
}

// =============================================================================
// HTTP responses
// =============================================================================

const HTTP_STATUS_CATEGORIES: ReadonlyMap<number, ErrorCategory> = new Map([
  [HTTP.BadRequest, "INVALID_ARGUMENT"],
  [HTTP.Unauthorized, "UNAUTHENTICATED"],
  [HTTP.Forbidden, "PERMISSION_DENIED"],
  [HTTP.NotFound, "NOT_FOUND"],
  [HTTP.Conflict, "CONFLICT"],
  [HTTP.TooManyRequests, "RESOURCE_EXHAUSTED"],
  [HTTP.InternalServerError, "INTERNAL"],
  [HTTP.ServiceUnavailable, "UNAVAILABLE"],
]);

/** Server error status strings that map onto SDK codes */
const SERVER_ERROR_CODES: Readonly<Record<string, AuthErrorCode>> = {
  INSUFFICIENT_PERMISSION: "INSUFFICIENT_PERMISSION",
  PERMISSION_DENIED: "INSUFFICIENT_PERMISSION",
  USER_NOT_FOUND: "USER_NOT_FOUND",
};

/**
 * Platform category for an HTTP status; unmapped statuses are UNKNOWN
 */
export function categoryFromHttpStatus(status: number): ErrorCategory {
  return HTTP_STATUS_CATEGORIES.get(status) ?? "UNKNOWN";
}

/**
 * Build an AuthError from a non-success platform response.
 *
 * The category comes from the HTTP status unless the body names a known
 * platform status. The SDK code comes from `error.status`, then the leading
 * token of `error.message` (identity-toolkit style, e.g. `USER_NOT_FOUND : ...`).
 */
export function errorFromResponse(status: number, body: string): AuthError {
  let platformStatus: string | undefined;
  let platformMessage: string | undefined;

  try {
    const parsed = PlatformErrorResponseSchema.safeParse(JSON.parse(body));
    if (parsed.success) {
      platformStatus = parsed.data.error.status;
      platformMessage = parsed.data.error.message;
    }
  } catch {
    // body is not JSON; fall back to the raw text below
  }

  const recognized = ErrorCategorySchema.safeParse(platformStatus);
  const category = recognized.success
    ? recognized.data
    : categoryFromHttpStatus(status);

  const serverCode = platformMessage?.split(/[\s:]/, 1)[0];
  const code =
    (platformStatus && SERVER_ERROR_CODES[platformStatus]) ||
    (serverCode && SERVER_ERROR_CODES[serverCode]) ||
    "UNKNOWN";

  return new AuthError({
    category,
    code,
    message:
      platformMessage ||
      `client encountered an unknown error; response: ${body}`,
    httpResponse: { status, body },
  });
}

// =============================================================================
// Predicates
// =============================================================================

/**
 * Whether the error, or any AuthError in its cause chain, has the code
 */
export function hasAuthErrorCode(error: unknown, code: AuthErrorCode): boolean {
  let current: unknown = error;
  while (current instanceof AuthError) {
    if (current.code === code) {
      return true;
    }
    current = current.cause;
  }
  return false;
}

/**
 * Whether the error carries the platform category
 */
export function hasCategory(error: unknown, category: ErrorCategory): boolean {
  return isAuthError(error) && error.category === category;
}

export const isIdTokenInvalid = (error: unknown) =>
  hasAuthErrorCode(error, "ID_TOKEN_INVALID");
export const isIdTokenExpired = (error: unknown) =>
  hasAuthErrorCode(error, "ID_TOKEN_EXPIRED");
export const isIdTokenRevoked = (error: unknown) =>
  hasAuthErrorCode(error, "ID_TOKEN_REVOKED");
export const isSessionCookieInvalid = (error: unknown) =>
  hasAuthErrorCode(error, "SESSION_COOKIE_INVALID");
export const isSessionCookieExpired = (error: unknown) =>
  hasAuthErrorCode(error, "SESSION_COOKIE_EXPIRED");
export const isSessionCookieRevoked = (error: unknown) =>
  hasAuthErrorCode(error, "SESSION_COOKIE_REVOKED");
export const isUserDisabled = (error: unknown) =>
  hasAuthErrorCode(error, "USER_DISABLED");
export const isUserNotFound = (error: unknown) =>
  hasAuthErrorCode(error, "USER_NOT_FOUND");
export const isCertificateFetchFailed = (error: unknown) =>
  hasAuthErrorCode(error, "CERTIFICATE_FETCH_FAILED");
export const isInvalidCredential = (error: unknown) =>
  hasAuthErrorCode(error, "INVALID_CREDENTIAL");
export const isInsufficientPermission = (error: unknown) =>
  hasAuthErrorCode(error, "INSUFFICIENT_PERMISSION");
export const isTenantIdMismatch = (error: unknown) =>
  hasAuthErrorCode(error, "TENANT_ID_MISMATCH");
export const isUnknown = (error: unknown) =>
  hasAuthErrorCode(error, "UNKNOWN");

export const isInvalidArgument = (error: unknown) =>
  hasCategory(error, "INVALID_ARGUMENT");
export const isUnauthenticated = (error: unknown) =>
  hasCategory(error, "UNAUTHENTICATED");
export const isPermissionDenied = (error: unknown) =>
  hasCategory(error, "PERMISSION_DENIED");
export const isNotFound = (error: unknown) => hasCategory(error, "NOT_FOUND");
export const isConflict = (error: unknown) => hasCategory(error, "CONFLICT");
export const isResourceExhausted = (error: unknown) =>
  hasCategory(error, "RESOURCE_EXHAUSTED");
export const isInternal = (error: unknown) => hasCategory(error, "INTERNAL");
export const isUnavailable = (error: unknown) =>
  hasCategory(error, "UNAVAILABLE");
export const isDeadlineExceeded = (error: unknown) =>
  hasCategory(error, "DEADLINE_EXCEEDED");
export const isCancelled = (error: unknown) => hasCategory(error, "CANCELLED");

/**
 * Message of any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
