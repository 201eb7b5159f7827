/**
 * Central types module - re-exports all type definitions
 *
 * - branded: Validated identifier types
 * - env: Environment variables and middleware context
 * - headers: HTTP header names
 * - http: HTTP status codes enum
 * - keys: Public keys and key sources
 * - signing: Signer and access-token contracts
 * - time: Time conversion constants
 * - tokens: JWT header and payload shapes
 * - users: User-management collaborator contract
 */

export * from "./branded";
export type * from "./env";
export { HEADERS } from "./headers";
export { HTTP } from "./http";
export type * from "./keys";
export type * from "./signing";
export { TIME, toEpochSeconds } from "./time";
export type * from "./tokens";
export type * from "./users";
