import { type SQL, sql } from "drizzle-orm";

import { type PaginationDialect } from "./types";

/**
 * SQL Server 2012+ row limiting.
 *
 * `offset ... fetch` is only valid after an ORDER BY; callers paging an
 * unordered query on SQL Server must add one.
 */
export const sqlServerDialect: PaginationDialect = {
  name: "sqlserver",

  paginate(body: SQL, limit: number, offset: number): SQL {
    return sql`${body} offset ${offset} rows fetch next ${limit} rows only`;
  },
};
