import { nanoid } from "nanoid";

/**
 * ID generation utilities.
 *
 * Query and operation identifiers only label errors and hook contexts;
 * they never appear in rendered SQL.
 */

/**
 * Generates a new unique ID.
 */
export function generateId(): string {
  return nanoid();
}

