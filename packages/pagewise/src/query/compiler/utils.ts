/**
 * Shared Compiler Utilities
 *
 * Column traversal shared by the usage analyzer and the join elimination
 * pass.
 */
import {
  type ClauseKind,
  type ColumnExpr,
  type PredicateExpression,
  type Query,
  type ValueExpr,
} from "../ast";

export type ColumnVisitor = (column: ColumnExpr) => void;

// ============================================================
// Expression Traversal
// ============================================================

export function visitValueColumns(
  expression: ValueExpr,
  visit: ColumnVisitor,
): void {
  switch (expression.__type) {
    case "column": {
      visit(expression);
      return;
    }
    case "aggregate": {
      visit(expression.argument);
      return;
    }
    case "literal": {
      return;
    }
  }
}

/**
 * Visits every column of a predicate, including the columns of nested
 * sub-queries.
 */
export function visitPredicateColumns(
  expression: PredicateExpression,
  visit: ColumnVisitor,
): void {
  switch (expression.__type) {
    case "comparison": {
      visitValueColumns(expression.left, visit);
      visitValueColumns(expression.right, visit);
      return;
    }
    case "between": {
      visitValueColumns(expression.operand, visit);
      visitValueColumns(expression.lower, visit);
      visitValueColumns(expression.upper, visit);
      return;
    }
    case "like":
    case "null_check": {
      visit(expression.operand);
      return;
    }
    case "in_list": {
      visitValueColumns(expression.operand, visit);
      return;
    }
    case "and":
    case "or": {
      for (const predicate of expression.predicates) {
        visitPredicateColumns(predicate, visit);
      }
      return;
    }
    case "not": {
      visitPredicateColumns(expression.predicate, visit);
      return;
    }
    case "exists": {
      visitSubqueryColumns(expression.subquery, visit);
      return;
    }
    case "in_subquery": {
      visit(expression.operand);
      visitSubqueryColumns(expression.subquery, visit);
      return;
    }
  }
}

/**
 * Visits the columns of the clauses a sub-query renders.
 */
function visitSubqueryColumns(subquery: Query, visit: ColumnVisitor): void {
  forEachClauseColumn(subquery, (column, clause) => {
    if (clause !== "orderBy") {
      visit(column);
    }
  });
}

/**
 * Visits every column of a query, tagged with the clause it appears in.
 */
export function forEachClauseColumn(
  query: Query,
  visit: (column: ColumnExpr, clause: ClauseKind) => void,
): void {
  for (const expression of query.select) {
    visitValueColumns(expression, (column) => visit(column, "select"));
  }
  for (const predicate of query.where) {
    visitPredicateColumns(predicate, (column) => visit(column, "where"));
  }
  for (const column of query.groupBy) {
    visit(column, "groupBy");
  }
  for (const predicate of query.having) {
    visitPredicateColumns(predicate, (column) => visit(column, "having"));
  }
  for (const spec of query.orderBy) {
    visitValueColumns(spec.expression, (column) => visit(column, "orderBy"));
  }
}
