import { type SQL, sql } from "drizzle-orm";

import { type PaginationDialect } from "./types";

/**
 * `limit ? offset ?`, shared by PostgreSQL, SQLite and H2.
 */
export const defaultDialect: PaginationDialect = {
  name: "default",

  paginate(body: SQL, limit: number, offset: number): SQL {
    return sql`${body} limit ${limit} offset ${offset}`;
  },
};
