/**
 * Error inspection helpers
 */

/**
 * AbortController timeouts surface as an AbortError (DOMException or Error)
 */
export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    // fetch wraps transport failures: "fetch failed" with the socket error as cause
    if (error.cause instanceof Error && error.cause.message) {
      return `${error.message}: ${error.cause.message}`;
    }
    return error.message;
  }
  return String(error);
}
