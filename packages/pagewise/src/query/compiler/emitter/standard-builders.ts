import { type SQL, sql } from "drizzle-orm";

import {
  type ColumnExpr,
  type JoinedTableReference,
  type OrderSpec,
  type PredicateExpression,
  type SelectExpression,
  type TableReference,
} from "../../ast";
import {
  compileColumn,
  compilePredicateExpression,
  compileValueExpr,
  type ExpressionCompilerContext,
} from "../predicates";

function compileJoin(
  reference: JoinedTableReference,
  ctx: ExpressionCompilerContext,
): SQL {
  const alias = ctx.render.aliasOf(reference);
  const parentAlias = ctx.render.aliasOf(reference.parent);
  const conditions = reference.association.joinColumns.map((pair) =>
    sql.raw(`${parentAlias}.${pair.source} = ${alias}.${pair.target}`),
  );
  return sql`${sql.raw(reference.joinType)} join ${sql.raw(`${reference.table} as ${alias}`)} on ${sql.join(conditions, sql` and `)}`;
}

/**
 * Builds `from <root> as <alias>` followed by one join per rendered
 * reference, in the given order. Every reference must already have an
 * alias in the render context.
 */
export function buildFromClause(
  references: readonly TableReference[],
  ctx: ExpressionCompilerContext,
): SQL {
  const parts: SQL[] = [];
  for (const reference of references) {
    if (reference.parent === undefined) {
      const alias = ctx.render.aliasOf(reference);
      parts.push(sql`from ${sql.raw(`${reference.table} as ${alias}`)}`);
    } else {
      parts.push(compileJoin(reference, ctx));
    }
  }
  return sql.join(parts, sql` `);
}

export function buildProjection(
  select: readonly SelectExpression[],
  ctx: ExpressionCompilerContext,
): SQL {
  return sql.join(
    select.map((expression) => compileValueExpr(expression, ctx)),
    sql`, `,
  );
}

function buildConjunction(
  keyword: "where" | "having",
  predicates: readonly PredicateExpression[],
  ctx: ExpressionCompilerContext,
): SQL | undefined {
  if (predicates.length === 0) {
    return undefined;
  }
  const compiled = predicates.map((predicate) =>
    compilePredicateExpression(predicate, ctx),
  );
  return sql`${sql.raw(keyword)} ${sql.join(compiled, sql` and `)}`;
}

export function buildWhere(
  predicates: readonly PredicateExpression[],
  ctx: ExpressionCompilerContext,
): SQL | undefined {
  return buildConjunction("where", predicates, ctx);
}

export function buildHaving(
  predicates: readonly PredicateExpression[],
  ctx: ExpressionCompilerContext,
): SQL | undefined {
  return buildConjunction("having", predicates, ctx);
}

export function buildGroupBy(
  columns: readonly ColumnExpr[],
  ctx: ExpressionCompilerContext,
): SQL | undefined {
  if (columns.length === 0) {
    return undefined;
  }
  const compiled = columns.map((column) => compileColumn(column, ctx));
  return sql`group by ${sql.join(compiled, sql`, `)}`;
}

export function buildOrderBy(
  orderBy: readonly OrderSpec[],
  ctx: ExpressionCompilerContext,
): SQL | undefined {
  if (orderBy.length === 0) {
    return undefined;
  }
  const compiled = orderBy.map(
    (spec) =>
      sql`${compileValueExpr(spec.expression, ctx)} ${sql.raw(spec.direction)}`,
  );
  return sql`order by ${sql.join(compiled, sql`, `)}`;
}
