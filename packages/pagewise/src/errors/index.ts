/**
 * Pagewise Error Hierarchy
 *
 * All errors extend PagewiseError with:
 * - `code`: Machine-readable error code for programmatic handling
 * - `category`: Classification for error handling strategies
 * - `suggestion`: Optional recovery guidance for users
 * - `details`: Structured context about the error
 *
 * @example
 * ```typescript
 * try {
 *   reselect(countQuery, [count(column(book, "ID"))]);
 * } catch (error) {
 *   if (isPagewiseError(error)) {
 *     console.error(error.toUserMessage());
 *   }
 * }
 * ```
 */

// ============================================================
// Types
// ============================================================

/**
 * Error category for programmatic handling.
 *
 * - `user`: Caused by invalid input or incorrect usage. Recoverable by fixing input.
 * - `constraint`: Model or schema rule violation. Recoverable by changing the model.
 * - `system`: Internal error or infrastructure issue. May require investigation or retry.
 */
export type ErrorCategory = "user" | "constraint" | "system";

/**
 * Options for PagewiseError constructor.
 */
export type PagewiseErrorOptions = Readonly<{
  /** Structured context about the error */
  details?: Record<string, unknown>;
  /** Error category for handling strategies */
  category: ErrorCategory;
  /** Recovery guidance for users */
  suggestion?: string;
  /** Underlying cause of the error */
  cause?: unknown;
}>;

function formatCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.stack ?? cause.message;
  }
  if (typeof cause === "string") {
    return cause;
  }
  if (
    typeof cause === "number" ||
    typeof cause === "boolean" ||
    typeof cause === "bigint"
  ) {
    return String(cause);
  }
  if (typeof cause === "symbol") {
    return cause.description ?? "Symbol";
  }
  if (cause === undefined) {
    return "Unknown cause";
  }

  try {
    return JSON.stringify(cause);
  } catch (error) {
    return `Unserializable cause: ${
      error instanceof Error ? error.message : "Unknown error"
    }`;
  }
}

// ============================================================
// Base Error
// ============================================================

/**
 * Base error class for all Pagewise errors.
 */
export class PagewiseError extends Error {
  /** Machine-readable error code (e.g., "VALIDATION_ERROR") */
  readonly code: string;

  /** Error category for handling strategies */
  readonly category: ErrorCategory;

  /** Structured context about the error */
  readonly details: Readonly<Record<string, unknown>>;

  /** Recovery guidance for users */
  readonly suggestion?: string;

  constructor(message: string, code: string, options: PagewiseErrorOptions) {
    super(message, options.cause ? { cause: options.cause } : undefined);
    this.name = "PagewiseError";
    this.code = code;
    this.category = options.category;
    this.details = Object.freeze(options.details ?? {});
    if (options.suggestion !== undefined) {
      this.suggestion = options.suggestion;
    }
  }

  /**
   * Returns a user-friendly error message with suggestion if available.
   */
  toUserMessage(): string {
    if (this.suggestion) {
      return `${this.message}\n\nSuggestion: ${this.suggestion}`;
    }
    return this.message;
  }

  /**
   * Returns a detailed string representation for logging.
   */
  toLogString(): string {
    const lines = [
      `[${this.code}] ${this.message}`,
      `  Category: ${this.category}`,
    ];

    if (this.suggestion) {
      lines.push(`  Suggestion: ${this.suggestion}`);
    }

    const detailKeys = Object.keys(this.details);
    if (detailKeys.length > 0) {
      lines.push(`  Details: ${JSON.stringify(this.details)}`);
    }

    if (this.cause) {
      lines.push(`  Cause: ${formatCause(this.cause)}`);
    }

    return lines.join("\n");
  }
}

// ============================================================
// Validation Errors (category: "user")
// ============================================================

/**
 * Validation issue from Zod or custom validation.
 */
export type ValidationIssue = Readonly<{
  /** Path to the invalid field (e.g., "paging.limit") */
  path: string;
  /** Human-readable error message */
  message: string;
  /** Zod error code if from Zod validation */
  code?: string;
}>;

/**
 * Details for ValidationError.
 */
export type ValidationErrorDetails = Readonly<{
  /** What was being validated (e.g., "pagination", "engine options") */
  subject: string;
  /** Individual validation issues */
  issues: readonly ValidationIssue[];
}>;

/**
 * Thrown when caller input fails validation.
 *
 * @example
 * ```typescript
 * try {
 *   renderPagination("default", body, -1, 0);
 * } catch (error) {
 *   if (error instanceof ValidationError) {
 *     console.log(error.details.issues);
 *     // [{ path: "limit", message: "Number must be greater than or equal to 0" }]
 *   }
 * }
 * ```
 */
export class ValidationError extends PagewiseError {
  declare readonly details: ValidationErrorDetails;

  constructor(
    message: string,
    details: ValidationErrorDetails,
    options?: { cause?: unknown; suggestion?: string },
  ) {
    const fieldList =
      details.issues.length > 0 ?
        details.issues.map((issue) => issue.path || "(root)").join(", ")
      : "unknown";

    super(message, "VALIDATION_ERROR", {
      details,
      category: "user",
      suggestion:
        options?.suggestion ??
        `Check the following fields: ${fieldList}. See error.details.issues for specific validation failures.`,
      cause: options?.cause,
    });
    this.name = "ValidationError";
  }
}

// ============================================================
// Reselect Errors (category: "user")
// ============================================================

/**
 * Context identifying the query a derivation was attempted on.
 */
export type QueryErrorDetails = Readonly<{
  queryId: string;
  rootType: string;
}>;

/**
 * Thrown when reselecting a query that was itself produced by a reselect.
 */
export class ReselectNotAllowedError extends PagewiseError {
  declare readonly details: QueryErrorDetails;

  constructor(details: QueryErrorDetails, options?: { cause?: unknown }) {
    super(
      `Query ${details.queryId} on "${details.rootType}" is derived from another query and cannot be reselected`,
      "RESELECT_NOT_ALLOWED",
      {
        details,
        category: "user",
        suggestion: `Reselect the original query instead of the derived one.`,
        cause: options?.cause,
      },
    );
    this.name = "ReselectNotAllowedError";
  }
}

/**
 * Thrown when reselecting a query whose select clause contains an aggregate.
 */
export class AggregateSelectNotReselectableError extends PagewiseError {
  declare readonly details: QueryErrorDetails &
    Readonly<{ aggregates: readonly string[] }>;

  constructor(
    details: QueryErrorDetails & Readonly<{ aggregates: readonly string[] }>,
    options?: { cause?: unknown },
  ) {
    super(
      `Query ${details.queryId} on "${details.rootType}" selects aggregate expressions (${details.aggregates.join(", ")}) and cannot be reselected`,
      "AGGREGATE_SELECT_NOT_RESELECTABLE",
      {
        details,
        category: "user",
        suggestion: `Build the count query from a query that selects plain columns.`,
        cause: options?.cause,
      },
    );
    this.name = "AggregateSelectNotReselectableError";
  }
}

/**
 * Thrown when reselecting a query that has a GROUP BY clause.
 *
 * A grouped query yields one row per group rather than one per entity,
 * so a derived row count is ill-defined.
 */
export class GroupedQueryNotReselectableError extends PagewiseError {
  declare readonly details: QueryErrorDetails &
    Readonly<{ groupByCount: number }>;

  constructor(
    details: QueryErrorDetails & Readonly<{ groupByCount: number }>,
    options?: { cause?: unknown },
  ) {
    super(
      `Query ${details.queryId} on "${details.rootType}" has a group by clause and cannot be reselected`,
      "GROUPED_QUERY_NOT_RESELECTABLE",
      {
        details,
        category: "user",
        suggestion: `Count grouped results by wrapping the grouped query in a sub-query instead.`,
        cause: options?.cause,
      },
    );
    this.name = "GroupedQueryNotReselectableError";
  }
}

// ============================================================
// Dialect Errors (category: "user")
// ============================================================

/**
 * Thrown when pagination is requested for a dialect outside the supported set.
 */
export class UnsupportedDialectError extends PagewiseError {
  constructor(
    dialect: string,
    supported: readonly string[],
    options?: { cause?: unknown },
  ) {
    super(`Unsupported SQL dialect: "${dialect}"`, "UNSUPPORTED_DIALECT", {
      details: { dialect, supported },
      category: "user",
      suggestion: `Use one of: ${supported.join(", ")}, or pass a custom PaginationDialect.`,
      cause: options?.cause,
    });
    this.name = "UnsupportedDialectError";
  }
}

// ============================================================
// Model Lookup Errors (category: "user")
// ============================================================

/**
 * Thrown when an entity type is not defined in the model.
 */
export class UnknownEntityError extends PagewiseError {
  constructor(entityType: string, options?: { cause?: unknown }) {
    super(`Entity type not found: ${entityType}`, "UNKNOWN_ENTITY", {
      details: { entityType },
      category: "user",
      suggestion: `Verify "${entityType}" is passed to defineModel() and spelled correctly.`,
      cause: options?.cause,
    });
    this.name = "UnknownEntityError";
  }
}

/**
 * Thrown when an association property is not defined on an entity type.
 */
export class UnknownAssociationError extends PagewiseError {
  constructor(
    ownerType: string,
    property: string,
    options?: { cause?: unknown },
  ) {
    super(
      `Association not found: ${ownerType}.${property}`,
      "UNKNOWN_ASSOCIATION",
      {
        details: { ownerType, property },
        category: "user",
        suggestion: `Declare "${ownerType}.${property}" in the associations of defineModel().`,
        cause: options?.cause,
      },
    );
    this.name = "UnknownAssociationError";
  }
}

// ============================================================
// Query Construction Errors (category: "user")
// ============================================================

/**
 * Thrown when a join is requested after the owning query has been built.
 */
export class RegistryFrozenError extends PagewiseError {
  constructor(
    details: Readonly<{ parent: string; property: string }>,
    options?: { cause?: unknown },
  ) {
    super(
      `Cannot join "${details.property}" from ${details.parent}: the query has already been built`,
      "REGISTRY_FROZEN",
      {
        details,
        category: "user",
        suggestion: `Add all joins before calling build().`,
        cause: options?.cause,
      },
    );
    this.name = "RegistryFrozenError";
  }
}

/**
 * Thrown when a join starts from a table reference owned by another query.
 */
export class ForeignTableReferenceError extends PagewiseError {
  constructor(
    details: Readonly<{ reference: string; property: string }>,
    options?: { cause?: unknown },
  ) {
    super(
      `Table reference ${details.reference} does not belong to this query`,
      "FOREIGN_TABLE_REFERENCE",
      {
        details,
        category: "user",
        suggestion: `Join from the builder's root or from references returned by the same builder.`,
        cause: options?.cause,
      },
    );
    this.name = "ForeignTableReferenceError";
  }
}

// ============================================================
// Configuration Errors (category: "user")
// ============================================================

/**
 * Thrown when the entity model or engine configuration is invalid.
 */
export class ConfigurationError extends PagewiseError {
  constructor(
    message: string,
    details: Record<string, unknown> = {},
    options?: { cause?: unknown; suggestion?: string },
  ) {
    super(message, "CONFIGURATION_ERROR", {
      details,
      category: "user",
      suggestion:
        options?.suggestion ?? `Review your model definition for errors.`,
      cause: options?.cause,
    });
    this.name = "ConfigurationError";
  }
}

// ============================================================
// Database Errors (category: "system")
// ============================================================

/**
 * Thrown when the executor fails to run a rendered statement.
 */
export class DatabaseOperationError extends PagewiseError {
  constructor(
    message: string,
    details: Readonly<{ operation: string; queryId: string }>,
    options?: { cause?: unknown },
  ) {
    super(message, "DATABASE_OPERATION_ERROR", {
      details,
      category: "system",
      suggestion: `This is a system-level database error. Check the database connection and retry the operation. If the problem persists, investigate the underlying cause.`,
      cause: options?.cause,
    });
    this.name = "DatabaseOperationError";
  }
}

// ============================================================
// Compiler Errors (category: "system")
// ============================================================

/**
 * Thrown when a compiler invariant is violated.
 *
 * The compiler reached a state that should be unreachable for a query
 * built through the public builder.
 */
export class CompilerInvariantError extends PagewiseError {
  constructor(
    message: string,
    details?: Readonly<Record<string, unknown>>,
    options?: { cause?: unknown },
  ) {
    super(message, "COMPILER_INVARIANT_ERROR", {
      details: details ?? {},
      category: "system",
      suggestion: `This is an internal compiler error. Please report it as a bug with the query that triggered it.`,
      cause: options?.cause,
    });
    this.name = "CompilerInvariantError";
  }
}

// ============================================================
// Utility Functions
// ============================================================

/**
 * Type guard for PagewiseError.
 */
export function isPagewiseError(error: unknown): error is PagewiseError {
  return error instanceof PagewiseError;
}

/**
 * Check if error is recoverable by user action (user or constraint error).
 */
export function isUserRecoverable(error: unknown): boolean {
  if (!isPagewiseError(error)) return false;
  return error.category === "user" || error.category === "constraint";
}

/**
 * Check if error indicates a system/infrastructure issue.
 */
export function isSystemError(error: unknown): boolean {
  return isPagewiseError(error) && error.category === "system";
}

/**
 * Extract suggestion from error if available.
 */
export function getErrorSuggestion(error: unknown): string | undefined {
  return isPagewiseError(error) ? error.suggestion : undefined;
}
