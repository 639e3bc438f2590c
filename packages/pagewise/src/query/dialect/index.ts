/**
 * SQL Dialect Module
 *
 * Provides pagination dialects for different databases.
 * Use `getDialect()` to resolve a dialect name to its adapter.
 */

export { defaultDialect } from "./default";
export { mysqlDialect } from "./mysql";
export { oracleDialect } from "./oracle";
export { sqlServerDialect } from "./sqlserver";
export type { PaginationDialect, SqlDialect } from "./types";

import { type SQL } from "drizzle-orm";

import { UnsupportedDialectError } from "../../errors";
import { createPaging } from "../paging";
import { defaultDialect } from "./default";
import { mysqlDialect } from "./mysql";
import { oracleDialect } from "./oracle";
import { sqlServerDialect } from "./sqlserver";
import { type PaginationDialect, type SqlDialect } from "./types";

/**
 * Map of dialect names to their adapters.
 */
const DIALECT_ADAPTERS: Record<SqlDialect, PaginationDialect> = {
  default: defaultDialect,
  postgres: defaultDialect,
  sqlite: defaultDialect,
  h2: defaultDialect,
  mysql: mysqlDialect,
  sqlserver: sqlServerDialect,
  oracle: oracleDialect,
};

export const SUPPORTED_DIALECTS: readonly SqlDialect[] = Object.freeze(
  Object.keys(DIALECT_ADAPTERS).filter((name): name is SqlDialect =>
    isSqlDialect(name),
  ),
);

function isSqlDialect(name: string): name is SqlDialect {
  return Object.hasOwn(DIALECT_ADAPTERS, name);
}

/**
 * Resolves a dialect name, or passes a custom adapter through.
 *
 * @throws UnsupportedDialectError for names outside the built-in set
 *
 * @example
 * ```typescript
 * const adapter = getDialect("oracle");
 * const paged = adapter.paginate(body, 10, 90);
 * ```
 */
export function getDialect(
  dialect: string | PaginationDialect,
): PaginationDialect {
  if (typeof dialect !== "string") {
    return dialect;
  }
  if (!isSqlDialect(dialect)) {
    throw new UnsupportedDialectError(dialect, SUPPORTED_DIALECTS);
  }
  return DIALECT_ADAPTERS[dialect];
}

/**
 * Applies a dialect's paging syntax to a rendered SELECT body.
 *
 * @throws UnsupportedDialectError for unknown dialect names
 * @throws ValidationError for negative or non-integer paging values
 */
export function renderPagination(
  dialect: string | PaginationDialect,
  body: SQL,
  limit: number,
  offset: number,
): SQL {
  const adapter = getDialect(dialect);
  const paging = createPaging(limit, offset);
  return adapter.paginate(body, paging.limit, paging.offset);
}

/**
 * Default dialect used when none is specified.
 */
export const DEFAULT_DIALECT: SqlDialect = "default";
