import { DEFAULT_HTTP_TIMEOUT_MS } from "./constants";
import { AuthError, errorFromResponse, errorMessage } from "./errors";

/**
 * Fetch with timeout and caller cancellation using AbortController
 *
 * @param url - URL to fetch
 * @param options - Fetch options
 * @param timeoutMs - Timeout in milliseconds (default: 10000)
 * @param signal - Caller cancellation, aborts the request immediately
 * @returns Response from fetch
 * @throws AuthError DEADLINE_EXCEEDED on timeout, CANCELLED when `signal`
 *   aborts, UNAVAILABLE when no connection could be made
 */
export async function fetchWithTimeout(
  url: string | URL,
  options: RequestInit = {},
  timeoutMs = DEFAULT_HTTP_TIMEOUT_MS,
  signal?: AbortSignal,
): Promise<Response> {
  if (signal?.aborted) {
    throw cancelled(url, signal.reason);
  }

  const controller = new AbortController();
  let timedOut = false;
  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const onAbort = () => controller.abort();
  signal?.addEventListener("abort", onAbort, { once: true });

  try {
    const response = await fetch(url, {
      ...options,
      signal: controller.signal,
    });
    return response;
  } catch (error) {
    if (timedOut) {
      throw new AuthError({
        category: "DEADLINE_EXCEEDED",
        code: "UNKNOWN",
        message: `Request to ${url.toString()} timed out after ${timeoutMs}ms`,
        cause: error,
      });
    }
    if (signal?.aborted) {
      throw cancelled(url, error);
    }
    throw new AuthError({
      category: "UNAVAILABLE",
      code: "UNKNOWN",
      message: `failed to establish a connection: ${describeCause(error)}`,
      cause: error,
    });
  } finally {
    clearTimeout(timeoutId);
    signal?.removeEventListener("abort", onAbort);
  }
}

/**
 * Fetch JSON with timeout
 *
 * @returns Parsed JSON response, unvalidated
 * @throws AuthError built from the platform error body on non-OK responses
 */
export async function fetchJsonWithTimeout(
  url: string | URL,
  options: RequestInit = {},
  timeoutMs = DEFAULT_HTTP_TIMEOUT_MS,
  signal?: AbortSignal,
): Promise<unknown> {
  const response = await fetchWithTimeout(url, options, timeoutMs, signal);
  const body = await response.text();

  if (!response.ok) {
    throw errorFromResponse(response.status, body);
  }

  try {
    return JSON.parse(body);
  } catch (error) {
    throw new AuthError({
      category: "UNKNOWN",
      code: "UNKNOWN",
      message: `error while parsing response from ${url.toString()}: ${errorMessage(error)}`,
      cause: error,
      httpResponse: { status: response.status, body },
    });
  }
}

function cancelled(url: string | URL, cause: unknown): AuthError {
  return new AuthError({
    category: "CANCELLED",
    code: "UNKNOWN",
    message: `request to ${url.toString()} was cancelled`,
    cause,
  });
}

// undici reports the socket error as the cause of a generic "fetch failed"
function describeCause(error: unknown): string {
  if (error instanceof Error && error.cause instanceof Error) {
    return `${error.message} (${error.cause.message})`;
  }
  return errorMessage(error);
}
