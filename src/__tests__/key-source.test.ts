import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  FileKeySource,
  HttpKeySource,
  InMemoryKeySource,
  parsePublicCertificates,
} from "~/lib/key-source";
import { parseMaxAge } from "~/utils/cache-control";
import { MockClock } from "~/utils/clock";
import {
  CERTIFICATE,
  EC_CERTIFICATE,
  fixturePath,
  NOW_MS,
  PUBLIC_CERTS,
  WEAK_CERTIFICATE,
} from "./helpers";

const CERT_URL = "https://certs.example.com/keys";

function certsResponse(
  cacheControl: string | null = "public, max-age=3600, must-revalidate",
  body: unknown = PUBLIC_CERTS,
): Response {
  const headers = new Headers({ "Content-Type": "application/json" });
  if (cacheControl !== null) {
    headers.set("Cache-Control", cacheControl);
  }
  return new Response(JSON.stringify(body), { status: 200, headers });
}

describe("parseMaxAge", () => {
  it.each([
    ["public, max-age=19302, must-revalidate, no-transform", 19302],
    ["public,max-age=100", 100],
    ["max-age = 5", 5],
    ["MAX-AGE=7", 7],
    ["private ,  max-age=0", 0],
  ])("should read %j as %d seconds", (header, seconds) => {
    expect(parseMaxAge(header)).toBe(seconds);
  });

  it.each([null, "", "no-cache", "max-age=abc", "s-maxage=10"])(
    "should reject %j",
    (header) => {
      expect(() => parseMaxAge(header)).toThrow(
        "could not find expiry time from HTTP headers",
      );
    },
  );
});

describe("parsePublicCertificates", () => {
  it("should parse every certificate into an RSA key", () => {
    const keys = parsePublicCertificates(PUBLIC_CERTS);

    expect(keys.map((key) => key.kid)).toEqual(["key-1", "key-2"]);
    expect(keys.every((key) => key.key.asymmetricKeyType === "rsa")).toBe(true);
  });

  it("should reject a certificate without an RSA key", () => {
    expect(() => parsePublicCertificates({ ec: EC_CERTIFICATE })).toThrow(
      'certificate for key "ec" is not an RSA key',
    );
  });

  it("should reject an RSA key too short for RS256", () => {
    expect(() => parsePublicCertificates({ weak: WEAK_CERTIFICATE })).toThrow(
      'certificate for key "weak" has a 1024-bit modulus; RS256 requires at least 2048 bits',
    );
  });

  it("should reject an unparsable certificate", () => {
    expect(() => parsePublicCertificates({ bad: "not a certificate" })).toThrow(
      /^failed to parse certificate for key "bad": /,
    );
  });

  it("should reject a document that is not a key map", () => {
    expect(() => parsePublicCertificates(["a"])).toThrow(
      "public keys document must map key IDs to PEM certificates",
    );
  });
});

describe("HttpKeySource", () => {
  let clock: MockClock;
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    clock = new MockClock(NOW_MS);
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should fetch keys and set expiry from max-age", async () => {
    const fetchSpy = vi
      .spyOn(globalThis, "fetch")
      .mockImplementation(async () => certsResponse());
    const source = new HttpKeySource({ url: CERT_URL, clock });

    const keys = await source.keys();

    expect(keys.map((key) => key.kid)).toEqual(["key-1", "key-2"]);
    expect(source.expiresAt).toBe(NOW_MS + 3600 * 1000);
    expect(fetchSpy).toHaveBeenCalledWith(
      CERT_URL,
      expect.objectContaining({ method: "GET", signal: expect.any(AbortSignal) }),
    );
  });

  it("should serve cached keys until expiry", async () => {
    const fetchSpy = vi
      .spyOn(globalThis, "fetch")
      .mockImplementation(async () => certsResponse());
    const source = new HttpKeySource({ url: CERT_URL, clock });

    const first = await source.keys();
    clock.advance(3600 * 1000);
    const second = await source.keys();

    expect(second).toBe(first);
    expect(fetchSpy).toHaveBeenCalledTimes(1);
  });

  it("should refresh once the snapshot has expired", async () => {
    const fetchSpy = vi
      .spyOn(globalThis, "fetch")
      .mockImplementationOnce(async () => certsResponse("max-age=60"))
      .mockImplementationOnce(async () => certsResponse("max-age=120"));
    const source = new HttpKeySource({ url: CERT_URL, clock });

    await source.keys();
    clock.advance(60 * 1000 + 1);
    await source.keys();

    expect(fetchSpy).toHaveBeenCalledTimes(2);
    expect(source.expiresAt).toBe(NOW_MS + 60 * 1000 + 1 + 120 * 1000);
  });

  it("should issue a single request for concurrent readers", async () => {
    let resolveFetch: (response: Response) => void = () => undefined;
    const fetchSpy = vi.spyOn(globalThis, "fetch").mockImplementation(
      () =>
        new Promise<Response>((resolve) => {
          resolveFetch = resolve;
        }),
    );
    const source = new HttpKeySource({ url: CERT_URL, clock });

    const readers = Array.from({ length: 5 }, () => source.keys());
    await vi.waitFor(() => expect(fetchSpy).toHaveBeenCalledTimes(1));
    resolveFetch(certsResponse());
    const results = await Promise.all(readers);

    expect(fetchSpy).toHaveBeenCalledTimes(1);
    expect(new Set(results).size).toBe(1);
  });

  it("should let a queued reader cancel without disturbing the refresh", async () => {
    let resolveFetch: (response: Response) => void = () => undefined;
    const fetchSpy = vi.spyOn(globalThis, "fetch").mockImplementation(
      () =>
        new Promise<Response>((resolve) => {
          resolveFetch = resolve;
        }),
    );
    const source = new HttpKeySource({ url: CERT_URL, clock });
    const controller = new AbortController();

    const refreshing = source.keys();
    await vi.waitFor(() => expect(fetchSpy).toHaveBeenCalledTimes(1));
    const queued = source.keys(controller.signal);
    controller.abort();

    await expect(queued).rejects.toMatchObject({
      category: "CANCELLED",
      message: "operation was cancelled while waiting for a pending refresh",
    });
    resolveFetch(certsResponse());
    const keys = await refreshing;

    expect(keys.map((key) => key.kid)).toEqual(["key-1", "key-2"]);
    await expect(source.keys()).resolves.toBe(keys);
    expect(fetchSpy).toHaveBeenCalledTimes(1);
  });

  it("should serve stale keys when a refresh fails", async () => {
    const fetchSpy = vi
      .spyOn(globalThis, "fetch")
      .mockImplementationOnce(async () => certsResponse("max-age=60"))
      .mockImplementationOnce(async () => new Response("unavailable", { status: 503 }));
    const source = new HttpKeySource({ url: CERT_URL, clock });

    const first = await source.keys();
    clock.advance(61 * 1000);
    const second = await source.keys();

    expect(second).toBe(first);
    expect(fetchSpy).toHaveBeenCalledTimes(2);
    const warning = consoleLogSpy.mock.calls
      .map((call) => JSON.parse(String(call[0])))
      .find((entry) => entry.level === "warn");
    expect(warning).toMatchObject({
      message: "Serving stale public keys after refresh failure",
      component: "http-key-source",
      error: "invalid response (503) while retrieving public keys: unavailable",
    });
  });

  it("should fail on an error status without cached keys", async () => {
    vi.spyOn(globalThis, "fetch").mockResolvedValue(
      new Response("boom", { status: 500 }),
    );
    const source = new HttpKeySource({ url: CERT_URL, clock });

    await expect(source.keys()).rejects.toMatchObject({
      code: "CERTIFICATE_FETCH_FAILED",
      category: "INTERNAL",
      message: "invalid response (500) while retrieving public keys: boom",
    });
    expect(source.expiresAt).toBeUndefined();
  });

  it("should fail when the response has no max-age", async () => {
    vi.spyOn(globalThis, "fetch").mockResolvedValue(certsResponse(null));
    const source = new HttpKeySource({ url: CERT_URL, clock });

    await expect(source.keys()).rejects.toMatchObject({
      code: "CERTIFICATE_FETCH_FAILED",
      message: "could not find expiry time from HTTP headers",
    });
  });

  it("should fail when a certificate is not RSA", async () => {
    vi.spyOn(globalThis, "fetch").mockResolvedValue(
      certsResponse(undefined, { ec: EC_CERTIFICATE }),
    );
    const source = new HttpKeySource({ url: CERT_URL, clock });

    await expect(source.keys()).rejects.toMatchObject({
      code: "CERTIFICATE_FETCH_FAILED",
      message: 'certificate for key "ec" is not an RSA key',
    });
  });

  it("should fail on a body that is not JSON", async () => {
    vi.spyOn(globalThis, "fetch").mockResolvedValue(
      new Response("<html>", { status: 200, headers: { "Cache-Control": "max-age=10" } }),
    );
    const source = new HttpKeySource({ url: CERT_URL, clock });

    await expect(source.keys()).rejects.toMatchObject({
      code: "CERTIFICATE_FETCH_FAILED",
      message: expect.stringMatching(/^failed to parse public keys response: /),
    });
  });

  it("should report transport failures", async () => {
    vi.spyOn(globalThis, "fetch").mockRejectedValue(new TypeError("fetch failed"));
    const source = new HttpKeySource({ url: CERT_URL, clock });

    await expect(source.keys()).rejects.toMatchObject({
      code: "CERTIFICATE_FETCH_FAILED",
      category: "UNAVAILABLE",
      message:
        "failed to fetch public key certificates: failed to establish a connection: fetch failed",
    });
  });

  it("should refetch after an empty key set", async () => {
    const fetchSpy = vi
      .spyOn(globalThis, "fetch")
      .mockImplementationOnce(async () => certsResponse(undefined, {}))
      .mockImplementationOnce(async () => certsResponse());
    const source = new HttpKeySource({ url: CERT_URL, clock });

    expect(await source.keys()).toEqual([]);
    expect((await source.keys()).length).toBe(2);
    expect(fetchSpy).toHaveBeenCalledTimes(2);
  });
});

describe("FileKeySource", () => {
  it("should read the key file once", async () => {
    const source = new FileKeySource(fixturePath("public-certs.json"));

    const first = await source.keys();
    const second = await source.keys();

    expect(first.map((key) => key.kid)).toEqual(["key-1", "key-2"]);
    expect(second).toBe(first);
  });

  it("should fail for a missing file", async () => {
    const source = new FileKeySource("/nonexistent/certs.json");

    await expect(source.keys()).rejects.toMatchObject({
      code: "CERTIFICATE_FETCH_FAILED",
      message: expect.stringMatching(
        /^failed to read public keys from \/nonexistent\/certs\.json: /,
      ),
    });
  });
});

describe("InMemoryKeySource", () => {
  it("should return the injected keys", async () => {
    const source = InMemoryKeySource.fromCertificates({ only: CERTIFICATE });

    const keys = await source.keys();

    expect(keys).toHaveLength(1);
    expect(keys[0]?.kid).toBe("only");
  });
});
