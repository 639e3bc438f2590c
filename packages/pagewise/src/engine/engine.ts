/**
 * Pagewise engine: the entry point tying a model, a dialect and an
 * executor together.
 */
import { z } from "zod";

import { type ResultRow, type SqlExecutor } from "../backend/types";
import { type EntityModel } from "../core/define-model";
import {
  ConfigurationError,
  DatabaseOperationError,
  isPagewiseError,
} from "../errors";
import { validateInput } from "../errors/validation";
import { type Query } from "../query/ast";
import { createQueryBuilder, type QueryBuilder } from "../query/builder";
import {
  compileCountPlan,
  type CountQueryPlan,
  planCountQuery,
  renderQuery,
  type RenderResult,
  toRenderResult,
} from "../query/compiler";
import { getDialect, type PaginationDialect } from "../query/dialect";
import { withPaging } from "../query/reselect";
import { generateId } from "../utils/id";
import {
  type FetchPageOptions,
  type HookContext,
  type Page,
  type PagewiseHooks,
  type PagewiseOptions,
  type QueryHookContext,
  summarizeElimination,
} from "./types";

const DEFAULT_PAGE_SIZE = 20;

// ============================================================
// Option Validation
// ============================================================

function isPaginationDialect(value: unknown): value is PaginationDialect {
  return (
    typeof value === "object" &&
    value !== null &&
    "name" in value &&
    typeof value.name === "string" &&
    "paginate" in value &&
    typeof value.paginate === "function"
  );
}

function isSqlExecutor(value: unknown): value is SqlExecutor {
  return (
    typeof value === "object" &&
    value !== null &&
    "execute" in value &&
    typeof value.execute === "function"
  );
}

function isHooks(value: unknown): value is PagewiseHooks {
  return typeof value === "object" && value !== null;
}

const pagewiseOptionsSchema = z.object({
  dialect: z
    .union([
      z.string().min(1),
      z.custom<PaginationDialect>((value: unknown) => isPaginationDialect(value), {
        message: "Expected a dialect name or an object with name and paginate()",
      }),
    ])
    .optional(),
  defaultPageSize: z.number().int().positive().optional(),
  executor: z
    .custom<SqlExecutor>((value: unknown) => isSqlExecutor(value), {
      message: "Expected an object with an execute() function",
    })
    .optional(),
  hooks: z
    .custom<PagewiseHooks>((value: unknown) => isHooks(value), {
      message: "Expected an object of hook functions",
    })
    .optional(),
});

const fetchPageOptionsSchema = z.object({
  pageIndex: z.number().int().nonnegative(),
  pageSize: z.number().int().positive().optional(),
});

// ============================================================
// Count Extraction
// ============================================================

function readCount(rows: readonly ResultRow[], queryId: string): number {
  const value = rows[0]?.[0];
  if (typeof value === "number" && Number.isInteger(value) && value >= 0) {
    return value;
  }
  if (typeof value === "bigint" && value >= 0n) {
    return Number(value);
  }
  if (typeof value === "string" && /^\d+$/.test(value)) {
    return Number(value);
  }
  throw new DatabaseOperationError(
    "Count query did not return a non-negative integer",
    { operation: "count", queryId },
  );
}

// ============================================================
// Engine
// ============================================================

/**
 * Derives pruned count queries, renders paged data queries and fetches
 * pages through an executor.
 */
export class Pagewise {
  readonly model: EntityModel;
  readonly dialect: PaginationDialect;
  readonly defaultPageSize: number;

  readonly #executor: SqlExecutor | undefined;
  readonly #hooks: PagewiseHooks;

  constructor(model: EntityModel, options: PagewiseOptions = {}) {
    const parsed = validateInput(
      pagewiseOptionsSchema,
      options,
      "engine options",
    );
    this.model = model;
    this.dialect = getDialect(parsed.dialect ?? "default");
    this.defaultPageSize = parsed.defaultPageSize ?? DEFAULT_PAGE_SIZE;
    this.#executor = parsed.executor;
    this.#hooks = parsed.hooks ?? {};
  }

  /**
   * Starts a query rooted at an entity type.
   */
  from(rootType: string): QueryBuilder {
    return createQueryBuilder(this.model, rootType);
  }

  /**
   * Plans the count query of a data query.
   */
  planCount(query: Query): CountQueryPlan {
    const ctx = this.#createHookContext(query);
    try {
      const plan = planCountQuery(query);
      this.#hooks.onJoinsEliminated?.(
        ctx,
        summarizeElimination(plan.eliminated, plan.retained),
      );
      return plan;
    } catch (error) {
      this.#reportError(ctx, error);
      throw error;
    }
  }

  /**
   * Renders the data query with its paging in the engine's dialect.
   */
  render(query: Query): RenderResult {
    return renderQuery(query, this.dialect);
  }

  /**
   * Renders the pruned count query of a data query.
   */
  renderCount(query: Query): RenderResult {
    return toRenderResult(compileCountPlan(this.planCount(query)));
  }

  /**
   * Fetches one page of a data query.
   *
   * Runs the count query first; the data query only runs when the
   * requested page has rows. Any paging already on `query` is replaced.
   *
   * @throws ConfigurationError if the engine has no executor
   * @throws ValidationError for a negative page index or a non-positive size
   * @throws DatabaseOperationError if the executor fails
   */
  async fetchPage(query: Query, options: FetchPageOptions): Promise<Page> {
    const executor = this.#executor;
    if (executor === undefined) {
      throw new ConfigurationError(
        "fetchPage() requires an executor",
        { queryId: query.id },
        { suggestion: "Pass an executor to createPagewise()." },
      );
    }
    const parsed = validateInput(
      fetchPageOptionsSchema,
      options,
      "page request",
    );
    const pageIndex = parsed.pageIndex;
    const pageSize = parsed.pageSize ?? this.defaultPageSize;

    const countRows = await this.#execute(
      executor,
      query,
      "count",
      this.renderCount(query),
    );
    const totalRowCount = readCount(countRows, query.id);
    const totalPageCount = Math.ceil(totalRowCount / pageSize);
    const offset = pageIndex * pageSize;

    if (offset >= totalRowCount) {
      return { rows: [], totalRowCount, totalPageCount, pageIndex, pageSize };
    }

    const rows = await this.#execute(
      executor,
      query,
      "data",
      this.render(withPaging(query, pageSize, offset)),
    );
    return { rows, totalRowCount, totalPageCount, pageIndex, pageSize };
  }

  // === Internal: Hooks ===

  #createHookContext(query: Query): HookContext {
    return {
      operationId: generateId(),
      queryId: query.id,
      startedAt: new Date(),
    };
  }

  #reportError(ctx: HookContext, error: unknown): void {
    this.#hooks.onError?.(
      ctx,
      error instanceof Error ? error : new Error(String(error)),
    );
  }

  async #execute(
    executor: SqlExecutor,
    query: Query,
    statement: QueryHookContext["statement"],
    rendered: RenderResult,
  ): Promise<readonly ResultRow[]> {
    const ctx: QueryHookContext = {
      ...this.#createHookContext(query),
      statement,
      sql: rendered.sql,
      params: rendered.params,
    };
    this.#hooks.onQueryStart?.(ctx);
    const startTime = Date.now();
    try {
      const rows = await executor.execute(rendered);
      this.#hooks.onQueryEnd?.(ctx, {
        rowCount: rows.length,
        durationMs: Date.now() - startTime,
      });
      return rows;
    } catch (error) {
      const wrapped =
        isPagewiseError(error) ? error : (
          new DatabaseOperationError(
            `Failed to execute ${statement} query`,
            { operation: statement, queryId: query.id },
            { cause: error },
          )
        );
      this.#reportError(ctx, wrapped);
      throw wrapped;
    }
  }
}

// ============================================================
// Factory Function
// ============================================================

/**
 * Creates a Pagewise engine.
 *
 * @param model - The entity model from defineModel()
 * @param options - Dialect, default page size, executor and hooks
 *
 * @example
 * ```typescript
 * const engine = createPagewise(model, {
 *   dialect: "oracle",
 *   executor: createSqliteExecutor(db),
 * });
 *
 * const q = engine.from("Book");
 * const store = q.join(q.root, "store", "left");
 * const query = q.orderBy(column(store, "NAME")).build();
 *
 * const page = await engine.fetchPage(query, { pageIndex: 2, pageSize: 10 });
 * ```
 */
export function createPagewise(
  model: EntityModel,
  options?: PagewiseOptions,
): Pagewise {
  return new Pagewise(model, options);
}
