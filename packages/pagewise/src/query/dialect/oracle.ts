import { type SQL, sql } from "drizzle-orm";

import { type PaginationDialect } from "./types";

/**
 * ROWNUM-based windowing for Oracle releases without `fetch first`.
 *
 * ROWNUM is assigned before the outer filter runs, so a window that does
 * not start at the first row needs a second wrapping level that
 * materializes the row number as `rn__`.
 */
export const oracleDialect: PaginationDialect = {
  name: "oracle",

  paginate(body: SQL, limit: number, offset: number): SQL {
    if (offset === 0) {
      return sql`select core__.* from ( ${body} ) core__ where rownum <= ${limit}`;
    }
    return sql`select * from ( select core__.*, rownum rn__ from ( ${body} ) core__ where rownum <= ${limit + offset} ) limited__ where rn__ > ${offset}`;
  },
};
