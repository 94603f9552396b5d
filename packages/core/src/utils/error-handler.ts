/**
 * Error helpers shared across the core package
 */

/**
 * Extract error message from unknown error type
 */
export function extractErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Safely parse JSON with error handling
 */
export function safeJsonParse(
  json: string
): { success: true; data: unknown } | { success: false; error: string } {
  try {
    const data: unknown = JSON.parse(json);
    return { success: true, data };
  } catch (error) {
    return {
      success: false,
      error: extractErrorMessage(error),
    };
  }
}
