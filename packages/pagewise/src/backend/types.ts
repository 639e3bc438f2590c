/**
 * Execution interface between the engine and a database.
 */
import { type RenderResult } from "../query/compiler";

/**
 * A result row as positional column values, in select-list order.
 */
export type ResultRow = readonly unknown[];

/**
 * Runs rendered statements against a database.
 *
 * Connection management is the executor's concern; the engine only hands
 * over SQL text with `?` placeholders and the matching parameter values.
 */
export type SqlExecutor = Readonly<{
  execute: (statement: RenderResult) => Promise<readonly ResultRow[]>;
}>;
