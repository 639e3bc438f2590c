/**
 * Query Compiler Module
 *
 * Main entry point for compiling queries to SQL.
 * Re-exports individual compiler modules and provides the main compile and
 * render functions.
 */

// Re-export sub-modules
export { type CountQueryPlan, planCountQuery } from "./count-pass-pipeline";
export {
  compileAggregateExpr,
  compileColumn,
  compilePredicateExpression,
  compileValueExpr,
  type ExpressionCompilerContext,
} from "./predicates";
export { RenderContext } from "./render-context";

import { type SQL } from "drizzle-orm";
import { SQLiteSyncDialect } from "drizzle-orm/sqlite-core";

import { type Query, type TableReference } from "../ast";
import { getDialect, type PaginationDialect } from "../dialect";
import { type CountQueryPlan, planCountQuery } from "./count-pass-pipeline";
import {
  buildFromClause,
  buildGroupBy,
  buildHaving,
  buildOrderBy,
  buildProjection,
  buildWhere,
  emitSelectStatementSql,
} from "./emitter";
import { type ExpressionCompilerContext } from "./predicates";
import { RenderContext } from "./render-context";

/**
 * Rendered SQL text with positional `?` placeholders and their values.
 */
export type RenderResult = Readonly<{
  sql: string;
  params: readonly unknown[];
}>;

/**
 * Options for compileQuery().
 */
export type CompileQueryOptions = Readonly<{
  /** References to render; defaults to every reference of the query */
  retained?: ReadonlySet<TableReference>;
  /** Whether to render the order by clause (default: true) */
  includeOrderBy?: boolean;
}>;

/**
 * Compiles a query body in an existing render context.
 *
 * Aliases for the query's own references are assigned before any clause is
 * compiled, so sub-queries found in the clauses number after them.
 */
function compileInContext(
  query: Query,
  render: RenderContext,
  options: CompileQueryOptions,
): SQL {
  const retained = options.retained;
  const references = query.registry
    .references()
    .filter((reference) => retained === undefined || retained.has(reference));
  for (const reference of references) {
    render.assign(reference);
  }

  const ctx: ExpressionCompilerContext = {
    render,
    compileSubquery: (subquery) =>
      compileInContext(subquery, render, { includeOrderBy: false }),
  };

  return emitSelectStatementSql({
    projection: buildProjection(query.select, ctx),
    fromClause: buildFromClause(references, ctx),
    where: buildWhere(query.where, ctx),
    groupBy: buildGroupBy(query.groupBy, ctx),
    having: buildHaving(query.having, ctx),
    orderBy:
      options.includeOrderBy === false ?
        undefined
      : buildOrderBy(query.orderBy, ctx),
  });
}

/**
 * Compiles a query to a drizzle SQL object, without paging.
 *
 * @example
 * ```typescript
 * const body = compileQuery(query);
 * const { sql, params } = toRenderResult(body);
 * ```
 */
export function compileQuery(
  query: Query,
  options: CompileQueryOptions = {},
): SQL {
  return compileInContext(query, new RenderContext(), options);
}

/**
 * Compiles the data query with its paging applied in the given dialect.
 *
 * @throws UnsupportedDialectError for unknown dialect names
 */
export function compileDataQuery(
  query: Query,
  dialect: string | PaginationDialect = "default",
): SQL {
  const adapter = getDialect(dialect);
  const body = compileQuery(query);
  if (query.paging === undefined) {
    return body;
  }
  return adapter.paginate(body, query.paging.limit, query.paging.offset);
}

/**
 * Compiles a planned count query, rendering only the retained references.
 */
export function compileCountPlan(plan: CountQueryPlan): SQL {
  return compileQuery(plan.derived, { retained: plan.retained });
}

/**
 * Plans and compiles the pruned count query of a data query.
 */
export function compileCountQuery(query: Query): SQL {
  return compileCountPlan(planCountQuery(query));
}

const sqlTextCompiler = new SQLiteSyncDialect();

/**
 * Converts a drizzle SQL object to text with positional `?` placeholders.
 */
export function toRenderResult(query: SQL): RenderResult {
  const { sql, params } = sqlTextCompiler.sqlToQuery(query);
  return { sql, params };
}

/**
 * Renders the data query, paging included.
 */
export function renderQuery(
  query: Query,
  dialect: string | PaginationDialect = "default",
): RenderResult {
  return toRenderResult(compileDataQuery(query, dialect));
}

/**
 * Renders the pruned count query of a data query.
 */
export function renderCountQuery(query: Query): RenderResult {
  return toRenderResult(compileCountQuery(query));
}
