/**
 * Join elimination for count queries.
 *
 * Decides which joins of a derived count query can be dropped without
 * changing the number of rows the query produces.
 */
import {
  type ClauseKind,
  isJoinedReference,
  type JoinedTableReference,
  type Query,
  type TableReference,
} from "../../ast";
import { pathToRoot } from "../../join-registry";
import { visitValueColumns } from "../utils";
import { type ClauseUsage, usageOf } from "./clause-usage";

export type JoinEliminationResult = Readonly<{
  /** References the count query still renders, root included */
  retained: ReadonlySet<TableReference>;
  /** Dropped references, in registration order */
  eliminated: readonly JoinedTableReference[];
}>;

const FILTERING_CLAUSES: readonly ClauseKind[] = ["where", "groupBy", "having"];
const RESULT_ONLY_CLAUSES: ReadonlySet<ClauseKind> = new Set([
  "select",
  "orderBy",
]);

function isUsedForFiltering(clauses: ReadonlySet<ClauseKind>): boolean {
  return FILTERING_CLAUSES.some((clause) => clauses.has(clause));
}

function isUsedOnlyForResults(clauses: ReadonlySet<ClauseKind>): boolean {
  for (const clause of clauses) {
    if (!RESULT_ONLY_CLAUSES.has(clause)) {
      return false;
    }
  }
  return true;
}

/**
 * Whether dropping the join cannot change the row count.
 *
 * A to-one left join never removes or duplicates rows. An inner join does
 * the same only when it follows a non-null foreign key of a parent that is
 * present in every row; below a left join the parent may be null, and the
 * inner join then filters those rows out.
 */
function preservesRowCount(reference: JoinedTableReference): boolean {
  const { association, parent } = reference;
  if (association.isCollection) {
    return false;
  }
  if (reference.joinType === "left") {
    return true;
  }
  return (
    association.isBasedOnForeignKey &&
    !association.isNullable &&
    parent.joinType !== "left"
  );
}

/**
 * Whether a single reference, judged on its own, may be dropped from the
 * count query.
 */
export function isEliminable(
  reference: JoinedTableReference,
  clauses: ReadonlySet<ClauseKind>,
): boolean {
  return (
    !isUsedForFiltering(clauses) &&
    isUsedOnlyForResults(clauses) &&
    preservesRowCount(reference)
  );
}

function collectSelectedReferences(query: Query): Set<TableReference> {
  const selected = new Set<TableReference>();
  for (const expression of query.select) {
    visitValueColumns(expression, (column) => {
      if (!query.registry.has(column.table)) {
        return;
      }
      for (const reference of pathToRoot(column.table)) {
        selected.add(reference);
      }
    });
  }
  return selected;
}

/**
 * Computes the retained table references of a derived count query.
 *
 * `originalUsage` describes the query the count was derived from. A
 * reference is dropped together with its whole subtree, and only when every
 * reference of that subtree is eliminable: a dropped reference always hangs
 * off the root or off another dropped reference, and a retained reference
 * always keeps its ancestors. References the derived query selects are
 * retained.
 */
export function eliminateJoins(
  derived: Query,
  originalUsage: ClauseUsage,
): JoinEliminationResult {
  const registry = derived.registry;
  const selected = collectSelectedReferences(derived);
  const joins = registry.joins();

  // Children are registered after their parents, so a reverse walk settles
  // every subtree before its root.
  const subtreeEliminable = new Map<TableReference, boolean>();
  for (let index = joins.length - 1; index >= 0; index--) {
    const reference = joins[index];
    if (reference === undefined) continue;
    const self =
      !selected.has(reference) &&
      isEliminable(reference, usageOf(originalUsage, reference));
    const children = registry
      .childrenOf(reference)
      .every((child) => subtreeEliminable.get(child) === true);
    subtreeEliminable.set(reference, self && children);
  }

  const eliminatedSet = new Set<TableReference>();
  const eliminated: JoinedTableReference[] = [];
  const retained = new Set<TableReference>();

  for (const reference of registry.references()) {
    if (!isJoinedReference(reference)) {
      retained.add(reference);
      continue;
    }
    const dropped =
      isJoinedReference(reference.parent) ?
        eliminatedSet.has(reference.parent)
      : subtreeEliminable.get(reference) === true;
    if (dropped) {
      eliminatedSet.add(reference);
      eliminated.push(reference);
    } else {
      retained.add(reference);
    }
  }

  return { retained, eliminated };
}
