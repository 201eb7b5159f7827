/**
 * Branded types for identifiers that carry validation guarantees
 */

import { LIMITS } from "~/utils/constants";
import { AuthError } from "~/utils/errors";

/**
 * Brand type for nominal typing - creates distinct types from string
 */
declare const __brand: unique symbol;
type Brand<T, B> = T & { readonly [__brand]: B };

/** User identifier accepted by the minter (1..128 characters)
 * @example "user1"
 */
export type Uid = Brand<string, "Uid">;

/** Multi-tenancy discriminator, non-empty */
export type TenantId = Brand<string, "TenantId">;

/** Helper function to create a validated uid */
export function createUid(value: string): Uid {
  if (value.length === 0 || value.length > LIMITS.MAX_UID_LENGTH) {
    throw new AuthError({
      category: "INVALID_ARGUMENT",
      code: "INVALID_ARGUMENT",
      message: `uid must be non-empty, and not longer than ${LIMITS.MAX_UID_LENGTH} characters`,
    });
  }
  return value as Uid;
}

/** Helper function to create a validated tenant id */
export function createTenantId(value: string): TenantId {
  if (value.length === 0) {
    throw new AuthError({
      category: "INVALID_ARGUMENT",
      code: "INVALID_ARGUMENT",
      message: "tenantId must not be empty",
    });
  }
  return value as TenantId;
}
