import { type ClauseKind, type Query, type TableReference } from "../../ast";
import { pathToRoot } from "../../join-registry";
import { forEachClauseColumn } from "../utils";

/**
 * Clause kinds in which each table reference (or one of its descendants)
 * is used. References absent from the map are unused.
 */
export type ClauseUsage = ReadonlyMap<TableReference, ReadonlySet<ClauseKind>>;

const NO_USAGE: ReadonlySet<ClauseKind> = new Set();

/**
 * Records, for every table reference of the query, the clauses that use it.
 *
 * A column use counts for its table reference and for every ancestor up to
 * the root, since rendering the reference requires rendering its joins.
 * Columns inside sub-queries that point back at this query's references
 * count under the clause holding the sub-query.
 */
export function analyzeClauseUsage(query: Query): ClauseUsage {
  const usage = new Map<TableReference, Set<ClauseKind>>();

  forEachClauseColumn(query, (column, clause) => {
    // Sub-query internal references belong to their own registry.
    if (!query.registry.has(column.table)) {
      return;
    }
    for (const reference of pathToRoot(column.table)) {
      let clauses = usage.get(reference);
      if (clauses === undefined) {
        clauses = new Set();
        usage.set(reference, clauses);
      }
      clauses.add(clause);
    }
  });

  return usage;
}

export function usageOf(
  usage: ClauseUsage,
  reference: TableReference,
): ReadonlySet<ClauseKind> {
  return usage.get(reference) ?? NO_USAGE;
}
