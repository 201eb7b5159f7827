/**
 * Extract the `max-age` directive of a Cache-Control header, in seconds.
 *
 * Directives are comma-separated with optional whitespace, so
 * `public, max-age=19302, must-revalidate` and `public,max-age=19302` both
 * yield 19302.
 *
 * @throws Error when the header is absent or carries no integer max-age
 */
export function parseMaxAge(header: string | null | undefined): number {
  for (const directive of (header ?? "").split(",")) {
    const match = /^max-age\s*=\s*(\d+)$/i.exec(directive.trim());
    if (match?.[1] !== undefined) {
      return Number.parseInt(match[1], 10);
    }
  }
  throw new Error("could not find expiry time from HTTP headers");
}
