/**
 * Pagewise: count-query derivation, join elimination and dialect-aware
 * pagination for SQL queries.
 *
 * @example
 * ```typescript
 * import * as pw from "pagewise";
 *
 * const Book = pw.defineEntity("Book", {
 *   table: "BOOK",
 *   columns: ["NAME", "PRICE", "STORE_ID"],
 * });
 * const BookStore = pw.defineEntity("BookStore", {
 *   table: "BOOK_STORE",
 *   columns: ["NAME"],
 * });
 *
 * const model = pw.defineModel({
 *   entities: [Book, BookStore],
 *   associations: {
 *     Book: {
 *       store: { target: "BookStore", foreignKey: "STORE_ID", nullable: true },
 *     },
 *   },
 * });
 *
 * const engine = pw.createPagewise(model, { dialect: "oracle" });
 * const q = engine.from("Book");
 * const store = q.join(q.root, "store", "left");
 * const query = q
 *   .where(pw.between(pw.column(q.root, "PRICE"), 20, 40))
 *   .orderBy(pw.column(store, "NAME"))
 *   .limit(10, 90)
 *   .build();
 *
 * engine.renderCount(query).sql;
 * // select count(tb_1_.ID) from BOOK as tb_1_ where tb_1_.PRICE between ? and ?
 * ```
 */

// ============================================================
// Model
// ============================================================

export * from "./core";

// ============================================================
// Queries
// ============================================================

export * from "./query";

// ============================================================
// Engine
// ============================================================

export * from "./engine";
export type { ResultRow, SqlExecutor } from "./backend/types";

// ============================================================
// Errors
// ============================================================

export {
  AggregateSelectNotReselectableError,
  CompilerInvariantError,
  ConfigurationError,
  DatabaseOperationError,
  type ErrorCategory,
  ForeignTableReferenceError,
  getErrorSuggestion,
  GroupedQueryNotReselectableError,
  isPagewiseError,
  isSystemError,
  isUserRecoverable,
  PagewiseError,
  type PagewiseErrorOptions,
  type QueryErrorDetails,
  RegistryFrozenError,
  ReselectNotAllowedError,
  UnknownAssociationError,
  UnknownEntityError,
  UnsupportedDialectError,
  ValidationError,
  type ValidationErrorDetails,
  type ValidationIssue,
} from "./errors";

// ============================================================
// Utilities
// ============================================================

export { generateId } from "./utils";
