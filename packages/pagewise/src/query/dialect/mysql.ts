import { type SQL, sql } from "drizzle-orm";

import { type PaginationDialect } from "./types";

/**
 * MySQL's two-argument form: `limit <offset>, <limit>`.
 */
export const mysqlDialect: PaginationDialect = {
  name: "mysql",

  paginate(body: SQL, limit: number, offset: number): SQL {
    return sql`${body} limit ${offset}, ${limit}`;
  },
};
