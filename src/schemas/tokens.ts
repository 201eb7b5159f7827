import { z } from "zod";

/**
 * Decoded JWT header. Missing fields decode to empty strings so the verifier
 * can report which one is absent.
 */
export const JwtHeaderSchema = z
  .object({
    alg: z.string().default(""),
    typ: z.string().optional(),
    kid: z.string().default(""),
  })
  .passthrough();

/**
 * Decoded ID token / session cookie payload
 */
export const IdTokenPayloadSchema = z
  .object({
    iss: z.string().default(""),
    aud: z.string().default(""),
    exp: z.number().default(0),
    iat: z.number().default(0),
    sub: z.string().default(""),
    auth_time: z.number().optional(),
    firebase: z
      .object({
        sign_in_provider: z.string().optional(),
        tenant: z.string().optional(),
        identities: z.record(z.unknown()).optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

/** Type inferred from JwtHeaderSchema */
export type ParsedJwtHeader = z.infer<typeof JwtHeaderSchema>;

/** Type inferred from IdTokenPayloadSchema */
export type ParsedIdTokenPayload = z.infer<typeof IdTokenPayloadSchema>;
