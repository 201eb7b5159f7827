/**
 * @fileoverview Compact JWT serialization.
 *
 * `base64url(header) "." base64url(payload) "." base64url(signature)`, all
 * segments URL-safe base64 without padding. Signing is delegated to a
 * {@link Signer}; verification lives in the token verifier.
 *
 * @module utils/jwt
 */

import { base64url } from "jose";
import type { z } from "zod";
import type { Signer } from "~/types";
import { AuthError, errorMessage } from "./errors";

/** A compact token split into its parts */
export interface DecodedJwt<H, P> {
  header: H;
  payload: P;
  /** Payload as a plain JSON object, before schema defaults */
  rawPayload: Record<string, unknown>;
  /** `segment0 "." segment1`, the bytes the signature covers */
  signingInput: string;
  signature: Uint8Array;
}

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/**
 * JSON-serialize and base64url-encode one segment
 */
export function encodeSegment(value: unknown): string {
  return base64url.encode(JSON.stringify(value));
}

/**
 * Base64url-decode and JSON-parse one segment. Parse errors propagate
 * unchanged.
 */
export function decodeSegment(segment: string): unknown {
  return JSON.parse(decoder.decode(base64url.decode(segment)));
}

/**
 * Split a compact token, rejecting anything that is not three segments
 */
export function splitToken(token: string): [string, string, string] {
  const segments = token.split(".");
  if (segments.length !== 3) {
    throw new AuthError({
      category: "INVALID_ARGUMENT",
      code: "INVALID_ARGUMENT",
      message: "incorrect number of segments",
    });
  }
  const [header, payload, signature] = segments;
  return [header ?? "", payload ?? "", signature ?? ""];
}

/**
 * Parse a compact token, validating header and payload against schemas
 *
 * @throws AuthError naming the malformed segment and field
 */
export function decodeToken<HS extends z.ZodTypeAny, PS extends z.ZodTypeAny>(
  token: string,
  headerSchema: HS,
  payloadSchema: PS,
): DecodedJwt<z.output<HS>, z.output<PS>> {
  const [headerSegment, payloadSegment, signatureSegment] = splitToken(token);

  const rawHeader = parseSegment(headerSegment, "header");
  const rawPayload = parseSegment(payloadSegment, "payload");

  return {
    header: validate(headerSchema, rawHeader, "header"),
    payload: validate(payloadSchema, rawPayload, "payload"),
    rawPayload,
    signingInput: `${headerSegment}.${payloadSegment}`,
    signature: base64url.decode(signatureSegment),
  };
}

/**
 * Encode header and payload, sign them, and emit the compact token
 */
export async function signToken(
  header: object,
  payload: object,
  signer: Signer,
  signal?: AbortSignal,
): Promise<string> {
  const signingInput = `${encodeSegment(header)}.${encodeSegment(payload)}`;
  const signature = await signer.sign(encoder.encode(signingInput), signal);
  return `${signingInput}.${base64url.encode(signature)}`;
}

function parseSegment(
  segment: string,
  name: "header" | "payload",
): Record<string, unknown> {
  let value: unknown;
  try {
    value = decodeSegment(segment);
  } catch (error) {
    throw malformed(`failed to decode token ${name}: ${errorMessage(error)}`);
  }
  if (!isRecord(value)) {
    throw malformed(`token ${name} must be a JSON object`);
  }
  return value;
}

function validate<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  name: "header" | "payload",
): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw malformed(`malformed token ${name}: ${issues}`);
  }
  return result.data;
}

function malformed(message: string): AuthError {
  return new AuthError({
    category: "INVALID_ARGUMENT",
    code: "INVALID_ARGUMENT",
    message,
  });
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
