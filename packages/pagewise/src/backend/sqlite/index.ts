/**
 * SQLite executor backed by better-sqlite3.
 *
 * @example Quick start with in-memory database
 * ```typescript
 * import { createLocalSqliteExecutor } from "pagewise/sqlite";
 *
 * const { executor, db } = createLocalSqliteExecutor();
 * db.exec("create table BOOK (ID integer primary key, NAME text)");
 * const engine = createPagewise(model, { dialect: "sqlite", executor });
 * ```
 *
 * @example Existing connection
 * ```typescript
 * import Database from "better-sqlite3";
 * import { createSqliteExecutor } from "pagewise/sqlite";
 *
 * const executor = createSqliteExecutor(new Database("app.db"));
 * ```
 */
import Database from "better-sqlite3";

import { ConfigurationError } from "../../errors";
import { type RenderResult } from "../../query/compiler";
import { type ResultRow, type SqlExecutor } from "../types";

type NodeModuleVersionMismatch = Readonly<{
  compiled: number;
  required: number;
}>;

function getUnknownErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

function parseNodeModuleVersionMismatchMessage(
  message: string,
): NodeModuleVersionMismatch | undefined {
  const regexp =
    /NODE_MODULE_VERSION (?<compiled>\d+)[\s\S]*?NODE_MODULE_VERSION (?<required>\d+)/;
  const match = regexp.exec(message);
  if (!match?.groups) return undefined;

  const compiled = Number(match.groups.compiled);
  const required = Number(match.groups.required);

  if (!Number.isFinite(compiled) || !Number.isFinite(required))
    return undefined;

  return { compiled, required };
}

function createDatabase(path: string): Database.Database {
  try {
    return new Database(path);
  } catch (error) {
    const mismatch = parseNodeModuleVersionMismatchMessage(
      getUnknownErrorMessage(error),
    );
    if (!mismatch) throw error;

    throw new ConfigurationError(
      [
        "Failed to load better-sqlite3 native addon.",
        `It was compiled for NODE_MODULE_VERSION ${mismatch.compiled}, but this Node.js runtime requires ${mismatch.required}.`,
        "Rebuild with: npm rebuild better-sqlite3.",
      ].join(" "),
      {
        nodeVersion: process.version,
        compiledNodeModuleVersion: mismatch.compiled,
        requiredNodeModuleVersion: mismatch.required,
      },
      { cause: error },
    );
  }
}

function toResultRow(row: unknown): ResultRow {
  if (!Array.isArray(row)) {
    throw new TypeError("better-sqlite3 returned a row that is not in raw mode");
  }
  return row;
}

// ============================================================
// Factory Functions
// ============================================================

/**
 * Creates an executor over an open better-sqlite3 connection.
 *
 * Statements run in raw mode, so rows come back as positional arrays.
 * Booleans are bound as 1 / 0, since SQLite has no boolean type.
 */
export function createSqliteExecutor(db: Database.Database): SqlExecutor {
  return {
    execute(statement: RenderResult): Promise<readonly ResultRow[]> {
      const params = statement.params.map((value) =>
        typeof value === "boolean" ? Number(value) : value,
      );
      try {
        const rows = db.prepare(statement.sql).raw(true).all(...params);
        return Promise.resolve(rows.map((row) => toResultRow(row)));
      } catch (error) {
        return Promise.reject(
          error instanceof Error ? error : new Error(String(error)),
        );
      }
    },
  };
}

/**
 * Options for creating a local SQLite executor.
 */
export type LocalSqliteExecutorOptions = Readonly<{
  /**
   * Path to the SQLite database file.
   * Defaults to ":memory:" for an in-memory database.
   */
  path?: string;
}>;

/**
 * Result of creating a local SQLite executor.
 */
export type LocalSqliteExecutorResult = Readonly<{
  executor: SqlExecutor;
  /** The underlying connection, for schema setup and cleanup */
  db: Database.Database;
  close: () => Promise<void>;
}>;

/**
 * Opens a SQLite database and wraps it in an executor.
 *
 * @example File-based database
 * ```typescript
 * const { executor, close } = createLocalSqliteExecutor({ path: "./data.db" });
 * ```
 */
export function createLocalSqliteExecutor(
  options: LocalSqliteExecutorOptions = {},
): LocalSqliteExecutorResult {
  const db = createDatabase(options.path ?? ":memory:");
  let isClosed = false;

  function close(): Promise<void> {
    if (isClosed) return Promise.resolve();
    isClosed = true;
    db.close();
    return Promise.resolve();
  }

  return { executor: createSqliteExecutor(db), db, close };
}
