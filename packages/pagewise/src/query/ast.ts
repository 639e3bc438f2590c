/**
 * Query AST types.
 *
 * Defines the immutable tree a data query is built into: a root table,
 * join-derived table references, and the clause trees the compiler
 * rewrites and renders.
 */
import { type AssociationDescriptor } from "../core/types";
import { type JoinRegistry } from "./join-registry";

// ============================================================
// Table References
// ============================================================

/**
 * SQL join type of a joined table reference.
 */
export type JoinType = "inner" | "left";

type TableReferenceBase = Readonly<{
  __type: "table_ref";
  /** Readable path, e.g. "Book.store(left).city(inner)" */
  key: string;
  entityType: string;
  table: string;
  idColumn: string;
  /** Number of joins between this reference and the root */
  depth: number;
}>;

/**
 * The query's FROM table.
 */
export type RootTableReference = TableReferenceBase &
  Readonly<{
    parent: undefined;
    property: undefined;
    association: undefined;
    joinType: undefined;
  }>;

/**
 * A table reached by joining an association from a parent reference.
 */
export type JoinedTableReference = TableReferenceBase &
  Readonly<{
    parent: TableReference;
    property: string;
    association: AssociationDescriptor;
    joinType: JoinType;
  }>;

/**
 * One SQL table occurrence. Identity is object identity: the join
 * registry hands out at most one reference per (parent, property, join type).
 */
export type TableReference = RootTableReference | JoinedTableReference;

// ============================================================
// Value Expressions
// ============================================================

/**
 * Scalar values that can be bound as statement parameters.
 */
export type SqlValue = string | number | bigint | boolean;

/**
 * A column of a table reference.
 */
export type ColumnExpr = Readonly<{
  __type: "column";
  table: TableReference;
  column: string;
}>;

/**
 * A literal, rendered as a bound parameter.
 */
export type LiteralExpr = Readonly<{
  __type: "literal";
  value: SqlValue;
}>;

/**
 * Aggregate functions.
 */
export type AggregateFunction = "count" | "sum" | "avg" | "min" | "max";

/**
 * An aggregate over a column.
 */
export type AggregateExpr = Readonly<{
  __type: "aggregate";
  function: AggregateFunction;
  argument: ColumnExpr;
  distinct: boolean;
}>;

/**
 * Any expression usable as a predicate operand.
 */
export type ValueExpr = ColumnExpr | LiteralExpr | AggregateExpr;

/**
 * Any expression usable in a select list or an order by.
 */
export type SelectExpression = ColumnExpr | AggregateExpr;

// ============================================================
// Predicate Expressions
// ============================================================

/**
 * Comparison operators.
 */
export type ComparisonOp = "eq" | "neq" | "gt" | "gte" | "lt" | "lte";

/**
 * A binary comparison predicate.
 */
export type ComparisonPredicate = Readonly<{
  __type: "comparison";
  op: ComparisonOp;
  left: ValueExpr;
  right: ValueExpr;
}>;

/**
 * A between predicate (inclusive bounds).
 */
export type BetweenPredicate = Readonly<{
  __type: "between";
  operand: ValueExpr;
  lower: ValueExpr;
  upper: ValueExpr;
}>;

/**
 * A LIKE predicate with a bound pattern.
 */
export type LikePredicate = Readonly<{
  __type: "like";
  operand: ColumnExpr;
  pattern: string;
}>;

/**
 * An IN / NOT IN predicate over literal values.
 */
export type InListPredicate = Readonly<{
  __type: "in_list";
  operand: ValueExpr;
  values: readonly LiteralExpr[];
  negated: boolean;
}>;

/**
 * A null check predicate.
 */
export type NullPredicate = Readonly<{
  __type: "null_check";
  op: "isNull" | "isNotNull";
  operand: ColumnExpr;
}>;

/**
 * AND of predicates.
 */
export type AndPredicate = Readonly<{
  __type: "and";
  predicates: readonly PredicateExpression[];
}>;

/**
 * OR of predicates.
 */
export type OrPredicate = Readonly<{
  __type: "or";
  predicates: readonly PredicateExpression[];
}>;

/**
 * NOT of a predicate.
 */
export type NotPredicate = Readonly<{
  __type: "not";
  predicate: PredicateExpression;
}>;

/**
 * EXISTS / NOT EXISTS over a (usually correlated) sub-query.
 */
export type ExistsPredicate = Readonly<{
  __type: "exists";
  subquery: Query;
  negated: boolean;
}>;

/**
 * IN / NOT IN over a single-column sub-query.
 */
export type InSubqueryPredicate = Readonly<{
  __type: "in_subquery";
  operand: ColumnExpr;
  subquery: Query;
  negated: boolean;
}>;

/**
 * Union of all predicate expression types.
 */
export type PredicateExpression =
  | ComparisonPredicate
  | BetweenPredicate
  | LikePredicate
  | InListPredicate
  | NullPredicate
  | AndPredicate
  | OrPredicate
  | NotPredicate
  | ExistsPredicate
  | InSubqueryPredicate;

// ============================================================
// Clauses
// ============================================================

/**
 * Sort direction.
 */
export type SortDirection = "asc" | "desc";

/**
 * One ORDER BY item.
 */
export type OrderSpec = Readonly<{
  expression: SelectExpression;
  direction: SortDirection;
}>;

/**
 * LIMIT / OFFSET pair (non-negative integers).
 */
export type Paging = Readonly<{
  limit: number;
  offset: number;
}>;

/**
 * Clause kinds tracked by usage analysis.
 */
export type ClauseKind = "select" | "where" | "groupBy" | "having" | "orderBy";

// ============================================================
// Query
// ============================================================

/**
 * An immutable query.
 *
 * Built once through the query builder; derivations (reselect, paging
 * changes) always produce a new Query that shares the registry and the
 * untouched clauses with its base.
 */
export type Query = Readonly<{
  __type: "query";
  /** Identifies the query in errors and hook contexts */
  id: string;
  root: RootTableReference;
  registry: JoinRegistry;
  select: readonly SelectExpression[];
  /** Conjunction; empty means no WHERE clause */
  where: readonly PredicateExpression[];
  groupBy: readonly ColumnExpr[];
  /** Conjunction; empty means no HAVING clause */
  having: readonly PredicateExpression[];
  orderBy: readonly OrderSpec[];
  paging?: Paging | undefined;
  /** True once produced by reselect() */
  isDerived: boolean;
}>;

// ============================================================
// Type Guards
// ============================================================

export function isAggregateExpr(
  expression: ValueExpr,
): expression is AggregateExpr {
  return expression.__type === "aggregate";
}

export function isJoinedReference(
  reference: TableReference,
): reference is JoinedTableReference {
  return reference.parent !== undefined;
}
