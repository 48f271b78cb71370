/**
 * Shared utility functions used across the fleetdeck codebase.
 *
 * @module utils
 */

/**
 * Get current timestamp as an ISO-8601 string.
 *
 * @returns ISO-8601 formatted timestamp (e.g., "2026-01-25T12:34:56.789Z")
 */
export function isoNow(): string {
  return new Date().toISOString();
}

/**
 * Type guard to check if a value is a non-null object (Record).
 *
 * @param v - Value to check
 * @returns true if v is a non-null, non-array object
 */
export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/**
 * Type guard to check if a value is a non-empty string.
 *
 * @param v - Value to check
 * @returns true if v is a string with length > 0 after trimming
 */
export function isNonEmptyString(v: unknown): v is string {
  return typeof v === "string" && v.trim().length > 0;
}

/**
 * Render an unknown thrown value as a message.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Split tool output into lines, accepting both LF and CRLF endings.
 */
export function splitLines(text: string): string[] {
  return text.split(/\r?\n/g);
}
