/**
 * @fileoverview Sources of trusted public keys for token verification.
 *
 * - {@link HttpKeySource}: certificates fetched over HTTP, cached until the
 *   `max-age` of the response runs out
 * - {@link FileKeySource}: certificates read once from a local JSON file
 * - {@link InMemoryKeySource}: a fixed key list
 *
 * All three read the same document shape: an object mapping key IDs to
 * PEM-encoded X.509 certificates.
 *
 * @module lib/key-source
 */

import { X509Certificate } from "node:crypto";
import { readFile } from "node:fs/promises";
import type { PublicCertificates } from "~/schemas/responses";
import { PublicCertificatesSchema } from "~/schemas/responses";
import type { KeySnapshot, KeySource, PublicKey } from "~/types";
import { HEADERS, TIME } from "~/types";
import { parseMaxAge } from "~/utils/cache-control";
import type { Clock } from "~/utils/clock";
import { systemClock } from "~/utils/clock";
import { DEFAULT_HTTP_TIMEOUT_MS, MIN_RSA_MODULUS_BITS } from "~/utils/constants";
import type { ErrorCategory } from "~/schemas/errors";
import {
  AuthError,
  categoryFromHttpStatus,
  errorMessage,
  isAuthError,
} from "~/utils/errors";
import { fetchWithTimeout } from "~/utils/fetch";
import { type Logger, logger } from "~/utils/logger";
import { Mutex } from "~/utils/mutex";

/**
 * Parse a key-id → PEM certificate map into RSA public keys
 *
 * @throws AuthError CERTIFICATE_FETCH_FAILED on malformed input, a non-RSA key
 *   or a modulus too short for RS256
 */
export function parsePublicCertificates(document: unknown): PublicKey[] {
  const parsed = PublicCertificatesSchema.safeParse(document);
  if (!parsed.success) {
    throw fetchFailed(
      "UNKNOWN",
      "public keys document must map key IDs to PEM certificates",
    );
  }
  return Object.entries(parsed.data).map(([kid, pem]) =>
    parsePublicKey(kid, pem),
  );
}

function parsePublicKey(kid: string, pem: string): PublicKey {
  let certificate: X509Certificate;
  try {
    certificate = new X509Certificate(pem);
  } catch (error) {
    throw fetchFailed(
      "UNKNOWN",
      `failed to parse certificate for key "${kid}": ${errorMessage(error)}`,
      error,
    );
  }
  const key = certificate.publicKey;
  if (key.asymmetricKeyType !== "rsa") {
    throw fetchFailed("UNKNOWN", `certificate for key "${kid}" is not an RSA key`);
  }
  const bits = key.asymmetricKeyDetails?.modulusLength ?? 0;
  if (bits < MIN_RSA_MODULUS_BITS) {
    throw fetchFailed(
      "UNKNOWN",
      `certificate for key "${kid}" has a ${bits}-bit modulus; RS256 requires at least ${MIN_RSA_MODULUS_BITS} bits`,
    );
  }
  return { kid, key };
}

function fetchFailed(
  category: ErrorCategory,
  message: string,
  cause?: unknown,
): AuthError {
  return new AuthError({
    category,
    code: "CERTIFICATE_FETCH_FAILED",
    message,
    cause,
  });
}

export interface HttpKeySourceOptions {
  url: string;
  clock?: Clock;
  timeoutMs?: number;
}

/**
 * Fetches RSA public keys from a URL and caches them per the response's
 * Cache-Control `max-age`.
 *
 * A mutex guards the snapshot: readers that find it expired refresh while
 * holding the lock, so concurrent readers share one network round-trip. When
 * a refresh fails and a non-empty snapshot exists, the stale keys are served.
 */
export class HttpKeySource implements KeySource {
  private readonly url: string;
  private readonly clock: Clock;
  private readonly timeoutMs: number;
  private readonly mutex = new Mutex();
  private readonly log: Logger;
  private snapshot: KeySnapshot | null = null;

  constructor(options: HttpKeySourceOptions) {
    this.url = options.url;
    this.clock = options.clock ?? systemClock;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
    this.log = logger.withContext({
      component: "http-key-source",
      url: this.url,
    });
  }

  /** Absolute expiry (epoch ms) of the current snapshot, if any */
  get expiresAt(): number | undefined {
    return this.snapshot?.expiresAt;
  }

  async keys(signal?: AbortSignal): Promise<readonly PublicKey[]> {
    return this.mutex.runExclusive(async () => {
      const current = this.snapshot;
      if (current && current.keys.length > 0 && !this.hasExpired(current)) {
        return current.keys;
      }

      try {
        const next = await this.refresh(signal);
        this.snapshot = next;
        return next.keys;
      } catch (error) {
        if (current && current.keys.length > 0) {
          this.log.warn("Serving stale public keys after refresh failure", {
            error: errorMessage(error),
            expiredAt: new Date(current.expiresAt).toISOString(),
          });
          return current.keys;
        }
        throw error;
      }
    }, signal);
  }

  private hasExpired(snapshot: KeySnapshot): boolean {
    return this.clock.now() > snapshot.expiresAt;
  }

  private async refresh(signal?: AbortSignal): Promise<KeySnapshot> {
    this.log.debug("Refreshing public keys");

    let response: Response;
    try {
      response = await fetchWithTimeout(
        this.url,
        { method: "GET" },
        this.timeoutMs,
        signal,
      );
    } catch (error) {
      throw fetchFailed(
        isAuthError(error) ? error.category : "UNKNOWN",
        `failed to fetch public key certificates: ${errorMessage(error)}`,
        error,
      );
    }

    const body = await response.text();
    if (!response.ok) {
      throw fetchFailed(
        categoryFromHttpStatus(response.status),
        `invalid response (${response.status}) while retrieving public keys: ${body}`,
      );
    }

    let document: unknown;
    try {
      document = JSON.parse(body);
    } catch (error) {
      throw fetchFailed(
        "UNKNOWN",
        `failed to parse public keys response: ${errorMessage(error)}`,
        error,
      );
    }
    const keys = parsePublicCertificates(document);

    let maxAge: number;
    try {
      maxAge = parseMaxAge(response.headers.get(HEADERS.CACHE_CONTROL));
    } catch (error) {
      throw fetchFailed("UNKNOWN", errorMessage(error), error);
    }

    const expiresAt = this.clock.now() + maxAge * TIME.SECOND;
    this.log.info("Public keys refreshed", {
      count: keys.length,
      maxAgeSeconds: maxAge,
    });
    return Object.freeze({ keys: Object.freeze(keys), expiresAt });
  }
}

/**
 * Reads certificates from a local JSON file on first use and keeps them for
 * the lifetime of the process.
 */
export class FileKeySource implements KeySource {
  private readonly mutex = new Mutex();
  private cached: readonly PublicKey[] | null = null;

  constructor(private readonly path: string) {}

  async keys(signal?: AbortSignal): Promise<readonly PublicKey[]> {
    return this.mutex.runExclusive(async () => {
      if (this.cached) {
        return this.cached;
      }

      let document: unknown;
      try {
        document = JSON.parse(await readFile(this.path, "utf8"));
      } catch (error) {
        throw fetchFailed(
          "UNKNOWN",
          `failed to read public keys from ${this.path}: ${errorMessage(error)}`,
          error,
        );
      }

      this.cached = Object.freeze(parsePublicCertificates(document));
      return this.cached;
    }, signal);
  }
}

/**
 * Serves a fixed key list
 */
export class InMemoryKeySource implements KeySource {
  private readonly snapshot: readonly PublicKey[];

  constructor(keys: readonly PublicKey[]) {
    this.snapshot = Object.freeze([...keys]);
  }

  static fromCertificates(certificates: PublicCertificates): InMemoryKeySource {
    return new InMemoryKeySource(parsePublicCertificates(certificates));
  }

  async keys(): Promise<readonly PublicKey[]> {
    return this.snapshot;
  }
}
