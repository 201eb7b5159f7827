import { createPrivateKey, sign } from "node:crypto";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { base64url } from "jose";
import { InMemoryKeySource } from "~/lib/key-source";
import { PublicCertificatesSchema } from "~/schemas/responses";

export const PROJECT_ID = "mock-project-id";
/** 2023-11-14T22:13:20Z */
export const NOW_MS = 1_700_000_000_000;
export const NOW = NOW_MS / 1000;

export const ID_TOKEN_ISSUER = `https://securetoken.google.com/${PROJECT_ID}`;
export const SESSION_COOKIE_ISSUER = `https://session.firebase.google.com/${PROJECT_ID}`;

export function fixturePath(name: string): string {
  return fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
}

export function readFixture(name: string): string {
  return readFileSync(fixturePath(name), "utf8");
}

export const PRIVATE_KEY = readFixture("private-key.pem");
export const PRIVATE_KEY_PKCS1 = readFixture("private-key-pkcs1.pem");
export const OTHER_PRIVATE_KEY = readFixture("other-private-key.pem");
export const CERTIFICATE = readFixture("certificate.pem");
export const OTHER_CERTIFICATE = readFixture("other-certificate.pem");
export const EC_CERTIFICATE = readFixture("ec-certificate.pem");
/** Self-signed, 1024-bit RSA key */
export const WEAK_CERTIFICATE = readFixture("weak-certificate.pem");
export const PUBLIC_CERTS = PublicCertificatesSchema.parse(
  JSON.parse(readFixture("public-certs.json")),
);

/** key-1 is signed by PRIVATE_KEY, key-2 by OTHER_PRIVATE_KEY */
export function testKeySource(): InMemoryKeySource {
  return InMemoryKeySource.fromCertificates(PUBLIC_CERTS);
}

interface TestTokenOptions {
  header?: Record<string, unknown>;
  payload: Record<string, unknown>;
  privateKey?: string;
}

/**
 * Build a compact RS256 token without going through the code under test
 */
export function signTestToken({
  header = { alg: "RS256", kid: "key-1", typ: "JWT" },
  payload,
  privateKey = PRIVATE_KEY,
}: TestTokenOptions): string {
  const encode = (value: unknown) => base64url.encode(JSON.stringify(value));
  const signingInput = `${encode(header)}.${encode(payload)}`;
  const signature = sign(
    "sha256",
    Buffer.from(signingInput),
    createPrivateKey(privateKey),
  );
  return `${signingInput}.${base64url.encode(signature)}`;
}

/** A well-formed ID token payload issued 100 s before NOW */
export function idTokenPayload(
  overrides: Record<string, unknown> = {},
): Record<string, unknown> {
  return {
    iss: ID_TOKEN_ISSUER,
    aud: PROJECT_ID,
    iat: NOW - 100,
    exp: NOW + 3500,
    auth_time: NOW - 100,
    sub: "user-1",
    firebase: { sign_in_provider: "custom", identities: {} },
    ...overrides,
  };
}

/** Decode one segment of a compact token */
export function decodePart(token: string, index: 0 | 1): Record<string, unknown> {
  const segment = token.split(".")[index] ?? "";
  return JSON.parse(new TextDecoder().decode(base64url.decode(segment)));
}

export function jsonResponse(
  body: unknown,
  init: ResponseInit = {},
): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { "Content-Type": "application/json" },
    ...init,
  });
}
