import { z } from "zod";

import { ConfigurationError } from "../errors";
import { validateInput } from "../errors/validation";
import { ENTITY_TYPE_BRAND, type EntityType } from "./types";

// ============================================================
// Identifier Rules
// ============================================================

/**
 * Table and column names are spliced into SQL text verbatim, so they are
 * restricted to plain identifiers. Tables may be schema-qualified.
 */
const COLUMN_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_$]*$/;
const TABLE_NAME_PATTERN =
  /^[A-Za-z_][A-Za-z0-9_$]*(\.[A-Za-z_][A-Za-z0-9_$]*)?$/;

export const columnNameSchema = z
  .string()
  .regex(COLUMN_NAME_PATTERN, "Must be a plain SQL identifier");

export const tableNameSchema = z
  .string()
  .regex(TABLE_NAME_PATTERN, "Must be a plain or schema-qualified identifier");

// ============================================================
// Entity Factory Options
// ============================================================

/**
 * Options for defining an entity type.
 */
export type DefineEntityOptions = Readonly<{
  /** Mapped table name, e.g. "BOOK" or "library.BOOK" */
  table: string;
  /** Identity column (defaults to "ID") */
  idColumn?: string;
  /** Non-id columns selected by default */
  columns?: readonly string[];
  /** Optional description for documentation */
  description?: string;
}>;

const defineEntityOptionsSchema = z.object({
  table: tableNameSchema,
  idColumn: columnNameSchema.optional(),
  columns: z.array(columnNameSchema).optional(),
  description: z.string().optional(),
});

// ============================================================
// Entity Factory
// ============================================================

/**
 * Creates an entity type definition.
 *
 * @example
 * ```typescript
 * const Book = defineEntity("Book", {
 *   table: "BOOK",
 *   columns: ["NAME", "PRICE", "STORE_ID"],
 * });
 * ```
 */
export function defineEntity<K extends string>(
  name: K,
  options: DefineEntityOptions,
): EntityType<K> {
  const parsed = validateInput(
    defineEntityOptionsSchema,
    options,
    `entity "${name}"`,
  );
  const idColumn = parsed.idColumn ?? "ID";
  const columns = parsed.columns ?? [];

  if (columns.includes(idColumn)) {
    throw new ConfigurationError(
      `Entity "${name}" lists its id column "${idColumn}" among its columns`,
      { entityType: name, idColumn },
      { suggestion: `Remove "${idColumn}" from columns; it is always selected.` },
    );
  }

  return Object.freeze({
    [ENTITY_TYPE_BRAND]: true as const,
    name,
    table: parsed.table,
    idColumn,
    columns: Object.freeze([...columns]),
    description: parsed.description,
  });
}

/**
 * Checks if a value is an EntityType.
 */
export function isEntityType(value: unknown): value is EntityType {
  return (
    typeof value === "object" &&
    value !== null &&
    ENTITY_TYPE_BRAND in value &&
    value[ENTITY_TYPE_BRAND] === true
  );
}
