/**
 * JSON helpers shared by the stream interpreter and the non-streaming path.
 */

import type { JsonObject } from './types.js';

/** True for plain JSON objects (not arrays, not null). */
export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse text that must hold a JSON object.
 * Returns undefined for invalid JSON and for any other top-level JSON type.
 */
export function parseJsonObject(text: string): JsonObject | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return undefined;
  }
  return isJsonObject(parsed) ? parsed : undefined;
}
