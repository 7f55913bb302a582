/**
 * Resolved Schema helpers
 */

import type { ResolvedSchema } from "./types.js";

/**
 * Freeze an object graph in place
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Canonical JSON text of a resolved schema. Two runs over the same input
 * produce identical text.
 */
export function serializeSchema(schema: ResolvedSchema): string {
  return JSON.stringify(schema, null, 2);
}
