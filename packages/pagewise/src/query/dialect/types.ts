/**
 * Pagination Dialect Abstraction
 *
 * Databases disagree on how a result window is expressed. A dialect wraps
 * or suffixes a rendered SELECT body with its paging syntax; everything
 * else in the statement is shared.
 */
import { type SQL } from "drizzle-orm";

/**
 * Built-in dialect names.
 */
export type SqlDialect =
  | "default"
  | "postgres"
  | "sqlite"
  | "h2"
  | "mysql"
  | "sqlserver"
  | "oracle";

/**
 * Adapter that renders the paging clause for one database.
 *
 * `paginate` receives validated, non-negative integer values. Paging values
 * must be bound as parameters (not inlined), appearing after the body's
 * own parameters in text order.
 */
export interface PaginationDialect {
  readonly name: string;

  paginate(body: SQL, limit: number, offset: number): SQL;
}
