import { z } from "zod";

/**
 * Platform-wide error categories (coarse)
 */
export const ErrorCategorySchema = z.enum([
  "INVALID_ARGUMENT",
  "FAILED_PRECONDITION",
  "UNAUTHENTICATED",
  "PERMISSION_DENIED",
  "NOT_FOUND",
  "CONFLICT",
  "RESOURCE_EXHAUSTED",
  "CANCELLED",
  "DATA_LOSS",
  "UNKNOWN",
  "INTERNAL",
  "UNAVAILABLE",
  "DEADLINE_EXCEEDED",
]);

/**
 * SDK-specific error codes (fine)
 */
export const AuthErrorCodeSchema = z.enum([
  "ID_TOKEN_INVALID",
  "ID_TOKEN_EXPIRED",
  "ID_TOKEN_REVOKED",
  "SESSION_COOKIE_INVALID",
  "SESSION_COOKIE_EXPIRED",
  "SESSION_COOKIE_REVOKED",
  "USER_DISABLED",
  "USER_NOT_FOUND",
  "CERTIFICATE_FETCH_FAILED",
  "INVALID_CREDENTIAL",
  "INSUFFICIENT_PERMISSION",
  "TENANT_ID_MISMATCH",
  "INVALID_ARGUMENT",
  "UNKNOWN",
]);

/**
 * Error envelope returned by platform REST APIs
 */
export const PlatformErrorResponseSchema = z.object({
  error: z
    .object({
      status: z.string().optional(),
      message: z.string().optional(),
    })
    .passthrough(),
});

/**
 * Error body the middleware answers with
 */
export const ErrorResponseSchema = z.object({
  error: z.string().min(1, "Error message cannot be empty"),
  code: z.union([AuthErrorCodeSchema, z.literal("AUTH_MISSING")]),
});

/** Type inferred from ErrorCategorySchema */
export type ErrorCategory = z.infer<typeof ErrorCategorySchema>;

/** Type inferred from AuthErrorCodeSchema */
export type AuthErrorCode = z.infer<typeof AuthErrorCodeSchema>;

/** Type inferred from ErrorResponseSchema */
export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;
