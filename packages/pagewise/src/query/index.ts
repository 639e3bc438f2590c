/**
 * Query module for Pagewise.
 *
 * Builds immutable queries, derives their count queries and renders both.
 */

// ============================================================
// Public Types
// ============================================================

export type {
  AggregateExpr,
  AggregateFunction,
  ClauseKind,
  ColumnExpr,
  ComparisonOp,
  JoinedTableReference,
  JoinType,
  LiteralExpr,
  OrderSpec,
  Paging,
  PredicateExpression,
  Query,
  RootTableReference,
  SelectExpression,
  SortDirection,
  SqlValue,
  TableReference,
  ValueExpr,
} from "./ast";
export { isAggregateExpr, isJoinedReference } from "./ast";

// ============================================================
// Construction
// ============================================================

export { createQueryBuilder, QueryBuilder } from "./builder";
export { JoinRegistry, pathToRoot } from "./join-registry";
export { createPaging } from "./paging";
export {
  and,
  asc,
  avg,
  between,
  column,
  count,
  countDistinct,
  desc,
  eq,
  exists,
  gt,
  gte,
  inList,
  inSubquery,
  isNotNull,
  isNull,
  like,
  literal,
  lt,
  lte,
  max,
  min,
  neq,
  not,
  notExists,
  notInList,
  notInSubquery,
  type Operand,
  or,
  sum,
} from "./predicates";

// ============================================================
// Derivation
// ============================================================

export {
  deriveCountQuery,
  reselect,
  withoutSortingAndPaging,
  withPaging,
} from "./reselect";

// ============================================================
// Compilation
// ============================================================

export {
  analyzeClauseUsage,
  type ClauseUsage,
  eliminateJoins,
  isEliminable,
  type JoinEliminationResult,
} from "./compiler/passes";
export {
  compileCountPlan,
  compileCountQuery,
  compileDataQuery,
  compileQuery,
  type CompileQueryOptions,
  type CountQueryPlan,
  planCountQuery,
  renderCountQuery,
  renderQuery,
  type RenderResult,
  toRenderResult,
} from "./compiler";

// ============================================================
// Dialects
// ============================================================

export {
  DEFAULT_DIALECT,
  defaultDialect,
  getDialect,
  mysqlDialect,
  oracleDialect,
  type PaginationDialect,
  renderPagination,
  type SqlDialect,
  sqlServerDialect,
  SUPPORTED_DIALECTS,
} from "./dialect";
