import { z } from "zod";
import { DEFAULT_HOSTS, DEFAULT_HTTP_TIMEOUT_MS } from "~/utils/constants";

/**
 * Service-account credential as downloaded from the cloud console
 */
export const ServiceAccountSchema = z
  .object({
    type: z.literal("service_account").optional(),
    project_id: z.string().min(1).optional(),
    private_key_id: z.string().optional(),
    private_key: z
      .string()
      .min(1, "private_key must be a non-empty string")
      .optional(),
    client_email: z
      .string()
      .email("client_email must be a valid email address"),
  })
  .passthrough();

/**
 * Options accepted when constructing an AuthClient
 */
export const AuthConfigSchema = z.object({
  projectId: z.string().optional(),
  /** Service account used by the remote signer when no private key exists */
  serviceAccountId: z.string().min(1).optional(),
  credential: ServiceAccountSchema.optional(),
  /** `host:port` of an auth emulator; overrides FIREBASE_AUTH_EMULATOR_HOST */
  emulatorHost: z.string().min(1).optional(),
  httpTimeoutMs: z.number().int().positive().default(DEFAULT_HTTP_TIMEOUT_MS),
  iamHost: z.string().url().default(DEFAULT_HOSTS.IAM),
  metadataHost: z.string().url().default(DEFAULT_HOSTS.METADATA),
  identityToolkitHost: z.string().url().default(DEFAULT_HOSTS.IDENTITY_TOOLKIT),
});

/** Type inferred from ServiceAccountSchema */
export type ServiceAccount = z.infer<typeof ServiceAccountSchema>;

/** Options as callers write them (defaults optional) */
export type AuthOptions = z.input<typeof AuthConfigSchema>;

/** Options after defaults were applied */
export type ParsedAuthOptions = z.output<typeof AuthConfigSchema>;
