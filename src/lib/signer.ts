/**
 * @fileoverview Signers used to mint custom tokens.
 *
 * - {@link ServiceAccountSigner}: RS256 with a local service-account key
 * - {@link IamSigner}: RS256 through the remote signBlob API, discovering the
 *   service account from the metadata server when none is configured
 * - {@link EmulatedSigner}: fixed placeholder output for the auth emulator
 *
 * @module lib/signer
 */

import type { KeyObject } from "node:crypto";
import { createPrivateKey, sign } from "node:crypto";
import type { ServiceAccount } from "~/schemas/config";
import { SignBlobResponseSchema } from "~/schemas/responses";
import type { ResolvedAuthConfig } from "~/utils/config";
import type { AccessTokenProvider, Signer } from "~/types";
import { HEADERS } from "~/types";
import {
  DEFAULT_HOSTS,
  DEFAULT_HTTP_TIMEOUT_MS,
  DOC_URLS,
  EMULATOR_EMAIL,
} from "~/utils/constants";
import {
  AuthError,
  errorFromResponse,
  errorMessage,
  isAuthError,
} from "~/utils/errors";
import { fetchWithTimeout } from "~/utils/fetch";
import { logger } from "~/utils/logger";
import { Mutex } from "~/utils/mutex";
import { MetadataAccessTokenProvider } from "./access-token";

/**
 * Signs with the RSA private key embedded in a service-account credential.
 * Accepts PKCS#1 and PKCS#8 PEM blocks.
 */
export class ServiceAccountSigner implements Signer {
  readonly algorithm = "RS256";
  private readonly privateKey: KeyObject;
  private readonly clientEmail: string;

  constructor(credential: Pick<ServiceAccount, "client_email" | "private_key">) {
    if (!credential.private_key) {
      throw new AuthError({
        category: "INVALID_ARGUMENT",
        code: "INVALID_CREDENTIAL",
        message: "service account credential has no private key",
      });
    }

    let privateKey: KeyObject;
    try {
      privateKey = createPrivateKey(credential.private_key);
    } catch (error) {
      throw new AuthError({
        category: "INVALID_ARGUMENT",
        code: "INVALID_CREDENTIAL",
        message: `private key should be a PEM encoded PKCS1 or PKCS8 key; parse error: ${errorMessage(error)}`,
        cause: error,
      });
    }
    if (privateKey.asymmetricKeyType !== "rsa") {
      throw new AuthError({
        category: "INVALID_ARGUMENT",
        code: "INVALID_CREDENTIAL",
        message: "private key is not an RSA key",
      });
    }

    this.privateKey = privateKey;
    this.clientEmail = credential.client_email;
  }

  async sign(data: Uint8Array): Promise<Uint8Array> {
    return sign("sha256", data, this.privateKey);
  }

  async email(): Promise<string> {
    return this.clientEmail;
  }
}

export interface IamSignerOptions {
  /** Explicit service account; skips metadata discovery */
  serviceAccountId?: string;
  tokenProvider: AccessTokenProvider;
  iamHost?: string;
  metadataHost?: string;
  timeoutMs?: number;
}

/**
 * Signs by calling the IAM signBlob API for a service account.
 *
 * Without an explicit service account the signer asks the metadata server
 * for the default one once; the answer is memoized for the process.
 */
export class IamSigner implements Signer {
  readonly algorithm = "RS256";
  private readonly tokenProvider: AccessTokenProvider;
  private readonly iamHost: string;
  private readonly metadataHost: string;
  private readonly timeoutMs: number;
  private readonly mutex = new Mutex();
  private readonly log = logger.withContext({ component: "iam-signer" });
  private serviceAccount: string | undefined;

  constructor(options: IamSignerOptions) {
    this.serviceAccount = options.serviceAccountId;
    this.tokenProvider = options.tokenProvider;
    this.iamHost = options.iamHost ?? DEFAULT_HOSTS.IAM;
    this.metadataHost = options.metadataHost ?? DEFAULT_HOSTS.METADATA;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
  }

  async sign(data: Uint8Array, signal?: AbortSignal): Promise<Uint8Array> {
    const account = await this.email(signal);
    const token = await this.tokenProvider.getAccessToken(signal);
    const url = `${this.iamHost}/v1/projects/-/serviceAccounts/${account}:signBlob`;

    const response = await fetchWithTimeout(
      url,
      {
        method: "POST",
        headers: {
          [HEADERS.AUTHORIZATION]: `Bearer ${token}`,
          [HEADERS.CONTENT_TYPE]: "application/json",
        },
        body: JSON.stringify({
          bytesToSign: Buffer.from(data).toString("base64"),
        }),
      },
      this.timeoutMs,
      signal,
    );
    const body = await response.text();

    if (!response.ok) {
      const error = errorFromResponse(response.status, body);
      this.log.error("signBlob request failed", error, {
        serviceAccount: account,
        status: response.status,
      });
      throw error;
    }

    let parsed: ReturnType<typeof SignBlobResponseSchema.safeParse>;
    try {
      parsed = SignBlobResponseSchema.safeParse(JSON.parse(body));
    } catch (error) {
      throw unexpectedSignResponse(body, error);
    }
    if (!parsed.success) {
      throw unexpectedSignResponse(body);
    }
    return Buffer.from(parsed.data.signature, "base64");
  }

  async email(signal?: AbortSignal): Promise<string> {
    if (this.serviceAccount) {
      return this.serviceAccount;
    }

    return this.mutex.runExclusive(async () => {
      if (this.serviceAccount) {
        return this.serviceAccount;
      }
      try {
        const discovered = await this.discoverServiceAccount(signal);
        this.log.info("Discovered service account from metadata server", {
          serviceAccount: discovered,
        });
        this.serviceAccount = discovered;
        return discovered;
      } catch (error) {
        this.log.error("Service account discovery failed", error);
        throw new AuthError({
          category: isAuthError(error) ? error.category : "UNKNOWN",
          code: "INVALID_CREDENTIAL",
          message:
            `failed to determine service account: ${errorMessage(error)}; ` +
            "initialize the SDK with service account credentials or specify a service account " +
            "with iam.serviceAccounts.signBlob permission; " +
            `refer to ${DOC_URLS.CUSTOM_TOKEN} for more details on creating custom tokens`,
          cause: error,
        });
      }
    }, signal);
  }

  private async discoverServiceAccount(signal?: AbortSignal): Promise<string> {
    const url = `${this.metadataHost}/computeMetadata/v1/instance/service-accounts/default/email`;
    const response = await fetchWithTimeout(
      url,
      { headers: { [HEADERS.METADATA_FLAVOR]: "Google" } },
      this.timeoutMs,
      signal,
    );
    const body = await response.text();

    if (!response.ok) {
      throw new Error(
        `unexpected response (${response.status}) from metadata service: ${body}`,
      );
    }
    const email = body.trim();
    if (!email) {
      throw new Error("unexpected response from metadata service");
    }
    return email;
  }
}

function unexpectedSignResponse(body: string, cause?: unknown): AuthError {
  return new AuthError({
    category: "UNKNOWN",
    code: "UNKNOWN",
    message: `unexpected signBlob response: ${body}`,
    cause,
  });
}

const EMULATED_SIGNATURE = new TextEncoder().encode("signature");

/**
 * Signer for the auth emulator. Its tokens carry `alg: "none"` and are only
 * accepted by verifiers in emulator mode.
 */
export class EmulatedSigner implements Signer {
  readonly algorithm = "none";

  async sign(): Promise<Uint8Array> {
    return EMULATED_SIGNATURE;
  }

  async email(): Promise<string> {
    return EMULATOR_EMAIL;
  }
}

/**
 * Pick the signer for a configuration: the emulated one when an emulator
 * host is set, the local key when the credential carries one, the IAM API
 * otherwise.
 */
export function createSigner(
  config: ResolvedAuthConfig,
  tokenProvider?: AccessTokenProvider,
): Signer {
  if (config.emulatorHost) {
    return new EmulatedSigner();
  }
  if (config.credential?.private_key) {
    return new ServiceAccountSigner(config.credential);
  }
  return new IamSigner({
    serviceAccountId: config.serviceAccountId ?? config.credential?.client_email,
    tokenProvider:
      tokenProvider ??
      new MetadataAccessTokenProvider({
        metadataHost: config.metadataHost,
        timeoutMs: config.httpTimeoutMs,
      }),
    iamHost: config.iamHost,
    metadataHost: config.metadataHost,
    timeoutMs: config.httpTimeoutMs,
  });
}
