/**
 * Expression and predicate constructors.
 *
 * A thin, typed surface for building the AST nodes the compiler consumes.
 * Plain values passed as operands become bound literals.
 *
 * @example
 * ```typescript
 * const q = engine.from("Book");
 * const store = q.join(q.root, "store", "left");
 * q.where(
 *   between(column(q.root, "PRICE"), 20, 40),
 *   or(eq(column(store, "CITY"), "Paris"), isNull(column(q.root, "STORE_ID"))),
 * );
 * ```
 */
import {
  type AggregateExpr,
  type AggregateFunction,
  type AndPredicate,
  type BetweenPredicate,
  type ColumnExpr,
  type ComparisonOp,
  type ComparisonPredicate,
  type ExistsPredicate,
  type InListPredicate,
  type InSubqueryPredicate,
  type LikePredicate,
  type LiteralExpr,
  type NotPredicate,
  type NullPredicate,
  type OrderSpec,
  type OrPredicate,
  type PredicateExpression,
  type Query,
  type SelectExpression,
  type SqlValue,
  type TableReference,
  type ValueExpr,
} from "./ast";

/**
 * An operand: an expression, or a plain value bound as a parameter.
 */
export type Operand = ValueExpr | SqlValue;

function toValueExpr(operand: Operand): ValueExpr {
  return typeof operand === "object" ? operand : literal(operand);
}

// ============================================================
// Value Expressions
// ============================================================

export function column(table: TableReference, name: string): ColumnExpr {
  return { __type: "column", table, column: name };
}

export function literal(value: SqlValue): LiteralExpr {
  return { __type: "literal", value };
}

function aggregate(
  fn: AggregateFunction,
  argument: ColumnExpr,
  distinct = false,
): AggregateExpr {
  return { __type: "aggregate", function: fn, argument, distinct };
}

export function count(argument: ColumnExpr): AggregateExpr {
  return aggregate("count", argument);
}

export function countDistinct(argument: ColumnExpr): AggregateExpr {
  return aggregate("count", argument, true);
}

export function sum(argument: ColumnExpr): AggregateExpr {
  return aggregate("sum", argument);
}

export function avg(argument: ColumnExpr): AggregateExpr {
  return aggregate("avg", argument);
}

export function min(argument: ColumnExpr): AggregateExpr {
  return aggregate("min", argument);
}

export function max(argument: ColumnExpr): AggregateExpr {
  return aggregate("max", argument);
}

// ============================================================
// Comparisons
// ============================================================

function compare(
  op: ComparisonOp,
  left: Operand,
  right: Operand,
): ComparisonPredicate {
  return {
    __type: "comparison",
    op,
    left: toValueExpr(left),
    right: toValueExpr(right),
  };
}

export function eq(left: Operand, right: Operand): ComparisonPredicate {
  return compare("eq", left, right);
}

export function neq(left: Operand, right: Operand): ComparisonPredicate {
  return compare("neq", left, right);
}

export function gt(left: Operand, right: Operand): ComparisonPredicate {
  return compare("gt", left, right);
}

export function gte(left: Operand, right: Operand): ComparisonPredicate {
  return compare("gte", left, right);
}

export function lt(left: Operand, right: Operand): ComparisonPredicate {
  return compare("lt", left, right);
}

export function lte(left: Operand, right: Operand): ComparisonPredicate {
  return compare("lte", left, right);
}

export function between(
  operand: Operand,
  lower: Operand,
  upper: Operand,
): BetweenPredicate {
  return {
    __type: "between",
    operand: toValueExpr(operand),
    lower: toValueExpr(lower),
    upper: toValueExpr(upper),
  };
}

export function like(operand: ColumnExpr, pattern: string): LikePredicate {
  return { __type: "like", operand, pattern };
}

export function inList(
  operand: Operand,
  values: readonly SqlValue[],
): InListPredicate {
  return {
    __type: "in_list",
    operand: toValueExpr(operand),
    values: values.map((value) => literal(value)),
    negated: false,
  };
}

export function notInList(
  operand: Operand,
  values: readonly SqlValue[],
): InListPredicate {
  return { ...inList(operand, values), negated: true };
}

export function isNull(operand: ColumnExpr): NullPredicate {
  return { __type: "null_check", op: "isNull", operand };
}

export function isNotNull(operand: ColumnExpr): NullPredicate {
  return { __type: "null_check", op: "isNotNull", operand };
}

// ============================================================
// Logical Operators
// ============================================================

export function and(...predicates: PredicateExpression[]): AndPredicate {
  return { __type: "and", predicates };
}

export function or(...predicates: PredicateExpression[]): OrPredicate {
  return { __type: "or", predicates };
}

export function not(predicate: PredicateExpression): NotPredicate {
  return { __type: "not", predicate };
}

// ============================================================
// Sub-queries
// ============================================================

export function exists(subquery: Query): ExistsPredicate {
  return { __type: "exists", subquery, negated: false };
}

export function notExists(subquery: Query): ExistsPredicate {
  return { __type: "exists", subquery, negated: true };
}

export function inSubquery(
  operand: ColumnExpr,
  subquery: Query,
): InSubqueryPredicate {
  return { __type: "in_subquery", operand, subquery, negated: false };
}

export function notInSubquery(
  operand: ColumnExpr,
  subquery: Query,
): InSubqueryPredicate {
  return { __type: "in_subquery", operand, subquery, negated: true };
}

// ============================================================
// Ordering
// ============================================================

export function asc(expression: SelectExpression): OrderSpec {
  return { expression, direction: "asc" };
}

export function desc(expression: SelectExpression): OrderSpec {
  return { expression, direction: "desc" };
}
