/**
 * Expression Compilation
 *
 * Compiles value, select and predicate AST nodes to drizzle SQL. Columns
 * render as `<alias>.<column>`; literals and patterns become bound
 * parameters.
 */
import { type SQL, sql } from "drizzle-orm";

import {
  type AggregateExpr,
  type ColumnExpr,
  type ComparisonOp,
  type PredicateExpression,
  type Query,
  type ValueExpr,
} from "../ast";
import { type RenderContext } from "./render-context";

const COMPARISON_OP_SQL: Record<ComparisonOp, string> = {
  eq: "=",
  neq: "!=",
  gt: ">",
  gte: ">=",
  lt: "<",
  lte: "<=",
};

const ALWAYS_TRUE = sql.raw("1 = 1");
const ALWAYS_FALSE = sql.raw("1 = 0");

/**
 * State threaded through expression compilation.
 */
export type ExpressionCompilerContext = Readonly<{
  render: RenderContext;
  /** Compiles a nested query in the same render context */
  compileSubquery: (subquery: Query) => SQL;
}>;

// ============================================================
// Value Expressions
// ============================================================

export function compileColumn(
  column: ColumnExpr,
  ctx: ExpressionCompilerContext,
): SQL {
  return sql.raw(`${ctx.render.aliasOf(column.table)}.${column.column}`);
}

export function compileAggregateExpr(
  expression: AggregateExpr,
  ctx: ExpressionCompilerContext,
): SQL {
  const argument = compileColumn(expression.argument, ctx);
  const fn = sql.raw(expression.function);
  return expression.distinct ?
      sql`${fn}(distinct ${argument})`
    : sql`${fn}(${argument})`;
}

export function compileValueExpr(
  expression: ValueExpr,
  ctx: ExpressionCompilerContext,
): SQL {
  switch (expression.__type) {
    case "column": {
      return compileColumn(expression, ctx);
    }
    case "aggregate": {
      return compileAggregateExpr(expression, ctx);
    }
    case "literal": {
      return sql`${expression.value}`;
    }
  }
}

// ============================================================
// Predicates
// ============================================================

function compileJunction(
  predicates: readonly PredicateExpression[],
  separator: " and " | " or ",
  ctx: ExpressionCompilerContext,
): SQL {
  if (predicates.length === 0) {
    return separator === " and " ? ALWAYS_TRUE : ALWAYS_FALSE;
  }
  const compiled = predicates.map((predicate) =>
    compilePredicateExpression(predicate, ctx),
  );
  return sql`(${sql.join(compiled, sql.raw(separator))})`;
}

/**
 * Compiles a predicate. Junctions are parenthesized; top-level WHERE and
 * HAVING items are joined with `and` by the caller.
 */
export function compilePredicateExpression(
  expression: PredicateExpression,
  ctx: ExpressionCompilerContext,
): SQL {
  switch (expression.__type) {
    case "comparison": {
      const left = compileValueExpr(expression.left, ctx);
      const right = compileValueExpr(expression.right, ctx);
      return sql`${left} ${sql.raw(COMPARISON_OP_SQL[expression.op])} ${right}`;
    }
    case "between": {
      const operand = compileValueExpr(expression.operand, ctx);
      const lower = compileValueExpr(expression.lower, ctx);
      const upper = compileValueExpr(expression.upper, ctx);
      return sql`${operand} between ${lower} and ${upper}`;
    }
    case "like": {
      return sql`${compileColumn(expression.operand, ctx)} like ${expression.pattern}`;
    }
    case "in_list": {
      if (expression.values.length === 0) {
        return expression.negated ? ALWAYS_TRUE : ALWAYS_FALSE;
      }
      const operand = compileValueExpr(expression.operand, ctx);
      const values = expression.values.map((value) =>
        compileValueExpr(value, ctx),
      );
      const keyword = sql.raw(expression.negated ? "not in" : "in");
      return sql`${operand} ${keyword} (${sql.join(values, sql`, `)})`;
    }
    case "null_check": {
      const operand = compileColumn(expression.operand, ctx);
      return expression.op === "isNull" ?
          sql`${operand} is null`
        : sql`${operand} is not null`;
    }
    case "and": {
      return compileJunction(expression.predicates, " and ", ctx);
    }
    case "or": {
      return compileJunction(expression.predicates, " or ", ctx);
    }
    case "not": {
      const inner = expression.predicate;
      const compiled = compilePredicateExpression(inner, ctx);
      return inner.__type === "and" || inner.__type === "or" ?
          sql`not ${compiled}`
        : sql`not (${compiled})`;
    }
    case "exists": {
      const subquery = ctx.compileSubquery(expression.subquery);
      return expression.negated ?
          sql`not exists(${subquery})`
        : sql`exists(${subquery})`;
    }
    case "in_subquery": {
      const operand = compileColumn(expression.operand, ctx);
      const subquery = ctx.compileSubquery(expression.subquery);
      const keyword = sql.raw(expression.negated ? "not in" : "in");
      return sql`${operand} ${keyword} (${subquery})`;
    }
  }
}
