import { type ResultRow, type SqlExecutor } from "../backend/types";
import { type JoinedTableReference, type TableReference } from "../query/ast";
import { type RenderResult } from "../query/compiler";
import { type PaginationDialect } from "../query/dialect";

// ============================================================
// Observability Hooks
// ============================================================

/**
 * Context passed to observability hooks.
 */
export type HookContext = Readonly<{
  /** Unique ID for this operation */
  operationId: string;
  /** ID of the query the operation works on */
  queryId: string;
  /** Timestamp when operation started */
  startedAt: Date;
}>;

/**
 * Query hook context with SQL information.
 */
export type QueryHookContext = HookContext &
  Readonly<{
    /** Which statement of a page fetch is running */
    statement: "count" | "data";
    /** The SQL query being executed */
    sql: string;
    /** Query parameters */
    params: readonly unknown[];
  }>;

/**
 * Observability hooks for monitoring count planning and page fetches.
 *
 * @example
 * ```typescript
 * const hooks: PagewiseHooks = {
 *   onJoinsEliminated: (ctx, result) => {
 *     console.log(`[${ctx.operationId}] dropped ${result.eliminated.join(", ")}`);
 *   },
 *   onQueryEnd: (ctx, result) => {
 *     console.log(`[${ctx.operationId}] ${ctx.statement} in ${result.durationMs}ms`);
 *   },
 *   onError: (ctx, error) => {
 *     console.error(`[${ctx.operationId}] Error:`, error);
 *   },
 * };
 *
 * const engine = createPagewise(model, { hooks });
 * ```
 */
export type PagewiseHooks = Readonly<{
  /** Called before a statement is executed */
  onQueryStart?: (ctx: QueryHookContext) => void;
  /** Called after a statement completes successfully */
  onQueryEnd?: (
    ctx: QueryHookContext,
    result: Readonly<{ rowCount: number; durationMs: number }>,
  ) => void;
  /** Called after a count query is planned, with reference keys */
  onJoinsEliminated?: (
    ctx: HookContext,
    result: Readonly<{
      eliminated: readonly string[];
      retained: readonly string[];
    }>,
  ) => void;
  /** Called when an error occurs */
  onError?: (ctx: HookContext, error: Error) => void;
}>;

// ============================================================
// Engine Configuration
// ============================================================

/**
 * Options for createPagewise().
 */
export type PagewiseOptions = Readonly<{
  /** Dialect name or custom adapter (default: "default") */
  dialect?: string | PaginationDialect;
  /** Page size used when fetchPage() gets none (default: 20) */
  defaultPageSize?: number;
  /** Required by fetchPage() */
  executor?: SqlExecutor;
  /** Observability hooks for monitoring */
  hooks?: PagewiseHooks;
}>;

// ============================================================
// Pages
// ============================================================

export type FetchPageOptions = Readonly<{
  /** Zero-based page number */
  pageIndex: number;
  pageSize?: number;
}>;

/**
 * One page of a data query plus the totals of the whole result.
 */
export type Page = Readonly<{
  rows: readonly ResultRow[];
  totalRowCount: number;
  totalPageCount: number;
  pageIndex: number;
  pageSize: number;
}>;

/**
 * The join elimination outcome, as reference keys.
 */
export type EliminationSummary = Readonly<{
  eliminated: readonly string[];
  retained: readonly string[];
}>;

export function summarizeElimination(
  eliminated: readonly JoinedTableReference[],
  retained: ReadonlySet<TableReference>,
): EliminationSummary {
  return {
    eliminated: eliminated.map((reference) => reference.key),
    retained: [...retained].map((reference) => reference.key),
  };
}
