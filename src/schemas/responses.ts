import { z } from "zod";

/**
 * Public certificates endpoint body: key ID to PEM-encoded X.509 certificate
 */
export const PublicCertificatesSchema = z.record(z.string().min(1), z.string());

/**
 * Successful signBlob response
 */
export const SignBlobResponseSchema = z.object({
  signature: z.string().min(1),
});

/**
 * OAuth2 token served by the instance metadata server
 */
export const MetadataTokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().int().nonnegative(),
  token_type: z.string().optional(),
});

/**
 * accounts:lookup response, reduced to the fields the revocation check reads
 */
export const AccountsLookupResponseSchema = z.object({
  users: z
    .array(
      z
        .object({
          localId: z.string(),
          disabled: z.boolean().optional(),
          /** Epoch seconds, serialized as a decimal string */
          validSince: z.string().regex(/^\d+$/).optional(),
        })
        .passthrough(),
    )
    .optional(),
});

/** Type inferred from PublicCertificatesSchema */
export type PublicCertificates = z.infer<typeof PublicCertificatesSchema>;

/** Type inferred from AccountsLookupResponseSchema */
export type AccountsLookupResponse = z.infer<
  typeof AccountsLookupResponseSchema
>;
