/**
 * Type guards for values decoded from TOML and JSON.
 *
 * @packageDocumentation
 */

/**
 * Type guard for plain objects (not arrays, not null).
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Extracts a message from any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
