/**
 * OAuth2 bearer tokens for calls to platform APIs
 */

import { MetadataTokenResponseSchema } from "~/schemas/responses";
import type { AccessTokenProvider } from "~/types";
import { HEADERS, TIME } from "~/types";
import type { Clock } from "~/utils/clock";
import { systemClock } from "~/utils/clock";
import {
  ACCESS_TOKEN_EXPIRY_MARGIN_SECONDS,
  DEFAULT_HOSTS,
  DEFAULT_HTTP_TIMEOUT_MS,
} from "~/utils/constants";
import { AuthError } from "~/utils/errors";
import { fetchJsonWithTimeout } from "~/utils/fetch";
import { Mutex } from "~/utils/mutex";

export interface MetadataAccessTokenProviderOptions {
  metadataHost?: string;
  timeoutMs?: number;
  clock?: Clock;
}

/**
 * Fetches the default service account's token from the instance metadata
 * server and reuses it until shortly before it expires.
 */
export class MetadataAccessTokenProvider implements AccessTokenProvider {
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly clock: Clock;
  private readonly mutex = new Mutex();
  private cached: { token: string; refreshAt: number } | null = null;

  constructor(options: MetadataAccessTokenProviderOptions = {}) {
    const host = options.metadataHost ?? DEFAULT_HOSTS.METADATA;
    this.url = `${host}/computeMetadata/v1/instance/service-accounts/default/token`;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
    this.clock = options.clock ?? systemClock;
  }

  async getAccessToken(signal?: AbortSignal): Promise<string> {
    return this.mutex.runExclusive(async () => {
      if (this.cached && this.clock.now() < this.cached.refreshAt) {
        return this.cached.token;
      }

      const body = await fetchJsonWithTimeout(
        this.url,
        { headers: { [HEADERS.METADATA_FLAVOR]: "Google" } },
        this.timeoutMs,
        signal,
      );
      const parsed = MetadataTokenResponseSchema.safeParse(body);
      if (!parsed.success) {
        throw new AuthError({
          category: "UNKNOWN",
          code: "INVALID_CREDENTIAL",
          message: "unexpected access token response from metadata service",
        });
      }

      const lifetime = parsed.data.expires_in - ACCESS_TOKEN_EXPIRY_MARGIN_SECONDS;
      this.cached = {
        token: parsed.data.access_token,
        refreshAt: this.clock.now() + Math.max(lifetime, 0) * TIME.SECOND,
      };
      return this.cached.token;
    }, signal);
  }
}

/**
 * Provider that always returns the same token (emulator, tests, tokens
 * managed by the host application)
 */
export function staticAccessToken(token: string): AccessTokenProvider {
  return { getAccessToken: async () => token };
}
