import { type SQL, sql } from "drizzle-orm";

/**
 * Clause fragments of one SELECT statement, each already prefixed with its
 * keyword.
 */
export type SelectStatementEmitterInput = Readonly<{
  projection: SQL;
  fromClause: SQL;
  where?: SQL | undefined;
  groupBy?: SQL | undefined;
  having?: SQL | undefined;
  orderBy?: SQL | undefined;
}>;

export function emitSelectStatementSql(input: SelectStatementEmitterInput): SQL {
  const parts: SQL[] = [sql`select ${input.projection}`, input.fromClause];

  if (input.where !== undefined) {
    parts.push(input.where);
  }
  if (input.groupBy !== undefined) {
    parts.push(input.groupBy);
  }
  if (input.having !== undefined) {
    parts.push(input.having);
  }
  if (input.orderBy !== undefined) {
    parts.push(input.orderBy);
  }

  return sql.join(parts, sql` `);
}
