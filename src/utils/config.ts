/**
 * Client configuration: option validation, environment fallbacks and
 * service-account loading
 */

import { readFile } from "node:fs/promises";
import type { z } from "zod";
import type { AuthOptions, ParsedAuthOptions, ServiceAccount } from "~/schemas/config";
import { AuthConfigSchema, ServiceAccountSchema } from "~/schemas/config";
import type { AuthEnv } from "~/types";
import { EMULATOR_HOST_ENV_VAR } from "./constants";
import { AuthError, errorMessage } from "./errors";

/** Options after defaults and environment fallbacks were applied */
export interface ResolvedAuthConfig extends ParsedAuthOptions {
  /** Empty when no source supplied one; verification then fails */
  projectId: string;
}

/**
 * Validate client options and fill project id and emulator host from the
 * environment
 *
 * Project id: `options.projectId`, then `credential.project_id`, then
 * `GOOGLE_CLOUD_PROJECT`, then `GCLOUD_PROJECT`.
 */
export function resolveAuthConfig(
  options: AuthOptions = {},
  env: AuthEnv = process.env,
): ResolvedAuthConfig {
  const parsed = AuthConfigSchema.safeParse(options);
  if (!parsed.success) {
    const credentialIssue = parsed.error.issues.some(
      (issue) => issue.path[0] === "credential",
    );
    throw new AuthError({
      category: "INVALID_ARGUMENT",
      code: credentialIssue ? "INVALID_CREDENTIAL" : "INVALID_ARGUMENT",
      message: `invalid auth options: ${formatIssues(parsed.error)}`,
    });
  }

  const config = parsed.data;
  const projectId =
    config.projectId ||
    config.credential?.project_id ||
    env.GOOGLE_CLOUD_PROJECT ||
    env.GCLOUD_PROJECT ||
    "";
  const emulatorHost = config.emulatorHost || env[EMULATOR_HOST_ENV_VAR] || undefined;

  return { ...config, projectId, emulatorHost };
}

/**
 * Load a service-account credential from a file path or a JSON string
 *
 * @throws AuthError INVALID_CREDENTIAL when unreadable or malformed
 */
export async function loadServiceAccount(
  pathOrJson: string,
): Promise<ServiceAccount> {
  let text = pathOrJson;
  if (!pathOrJson.trimStart().startsWith("{")) {
    try {
      text = await readFile(pathOrJson, "utf8");
    } catch (error) {
      throw invalidCredential(
        `failed to read credentials file ${pathOrJson}: ${errorMessage(error)}`,
        error,
      );
    }
  }

  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    throw invalidCredential(
      `failed to parse credentials: ${errorMessage(error)}`,
      error,
    );
  }

  const parsed = ServiceAccountSchema.safeParse(document);
  if (!parsed.success) {
    throw invalidCredential(
      `invalid service account credential: ${formatIssues(parsed.error)}`,
    );
  }
  return parsed.data;
}

function invalidCredential(message: string, cause?: unknown): AuthError {
  return new AuthError({
    category: "INVALID_ARGUMENT",
    code: "INVALID_CREDENTIAL",
    message,
    cause,
  });
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    .join("; ");
}
