/**
 * Error Utilities
 */

/** Coerce anything thrown into an Error without losing the original value */
export function toError(e: unknown): Error {
  if (e instanceof Error) {
    return e;
  }
  if (typeof e === "string") {
    return new Error(e);
  }
  return new Error(`Non-error value thrown: ${safeStringify(e)}`);
}

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

/**
 * Extract an HTTP status code from an error message
 */
export function extractStatusCode(message: string): number | null {
  const patterns = [
    /unexpected server response: (\d+)/i,
    /server response: (\d+)/i,
    /status code:? (\d+)/i,
    /http (\d+)/i,
    /^(\d{3})$/,
  ];

  for (const pattern of patterns) {
    const match = message.match(pattern);
    if (match) {
      const code = parseInt(match[1], 10);
      if (code >= 100 && code < 600) {
        return code;
      }
    }
  }

  return null;
}
