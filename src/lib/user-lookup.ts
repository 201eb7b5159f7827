/**
 * User-record lookup against the identity-toolkit REST API, as consulted by
 * the revocation check
 */

import { AccountsLookupResponseSchema } from "~/schemas/responses";
import type { AccessTokenProvider, UserRecord, UserRecordProvider } from "~/types";
import { HEADERS, TIME } from "~/types";
import { DEFAULT_HOSTS, DEFAULT_HTTP_TIMEOUT_MS } from "~/utils/constants";
import { AuthError } from "~/utils/errors";
import { fetchJsonWithTimeout } from "~/utils/fetch";

export interface IdentityToolkitUserProviderOptions {
  projectId: string;
  tokenProvider: AccessTokenProvider;
  tenantId?: string;
  /** Defaults to the production identity-toolkit host */
  host?: string;
  /** `host:port` of an auth emulator; replaces `host` */
  emulatorHost?: string;
  timeoutMs?: number;
}

export class IdentityToolkitUserProvider implements UserRecordProvider {
  private readonly url: string;
  private readonly tokenProvider: AccessTokenProvider;
  private readonly timeoutMs: number;

  constructor(options: IdentityToolkitUserProviderOptions) {
    const host = options.emulatorHost
      ? `http://${options.emulatorHost}/identitytoolkit.googleapis.com`
      : (options.host ?? DEFAULT_HOSTS.IDENTITY_TOOLKIT);
    const tenantPath = options.tenantId ? `/tenants/${options.tenantId}` : "";
    this.url = `${host}/v1/projects/${options.projectId}${tenantPath}/accounts:lookup`;
    this.tokenProvider = options.tokenProvider;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
  }

  async getUser(uid: string, signal?: AbortSignal): Promise<UserRecord> {
    const token = await this.tokenProvider.getAccessToken(signal);
    const body = await fetchJsonWithTimeout(
      this.url,
      {
        method: "POST",
        headers: {
          [HEADERS.AUTHORIZATION]: `Bearer ${token}`,
          [HEADERS.CONTENT_TYPE]: "application/json",
        },
        body: JSON.stringify({ localId: [uid] }),
      },
      this.timeoutMs,
      signal,
    );

    const parsed = AccountsLookupResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new AuthError({
        category: "UNKNOWN",
        code: "UNKNOWN",
        message: `unexpected accounts:lookup response: ${JSON.stringify(body)}`,
      });
    }

    const user = parsed.data.users?.[0];
    if (!user) {
      throw new AuthError({
        category: "NOT_FOUND",
        code: "USER_NOT_FOUND",
        message: `no user exists with the uid: ${JSON.stringify(uid)}`,
      });
    }

    return {
      uid: user.localId,
      disabled: user.disabled ?? false,
      tokensValidAfterMillis: Number(user.validSince ?? "0") * TIME.SECOND,
    };
  }
}
