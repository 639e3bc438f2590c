/**
 * Query derivation.
 *
 * Produces new queries from a built one without mutating it. The count
 * query used for pagination is the main client: it keeps the base's
 * filtering (root, joins, where, group by, having) and swaps the select
 * list for a row-count aggregate.
 */
import {
  AggregateSelectNotReselectableError,
  GroupedQueryNotReselectableError,
  ReselectNotAllowedError,
  ValidationError,
} from "../errors";
import { generateId } from "../utils/id";
import {
  isAggregateExpr,
  type Paging,
  type Query,
  type SelectExpression,
} from "./ast";
import { createPaging } from "./paging";
import { column, count } from "./predicates";

function describeAggregate(expression: SelectExpression): string {
  if (!isAggregateExpr(expression)) {
    return expression.column;
  }
  const distinct = expression.distinct ? "distinct " : "";
  return `${expression.function}(${distinct}${expression.argument.column})`;
}

/**
 * Returns a derived query with the select list replaced.
 *
 * The derived query shares root, registry, where, group by and having with
 * the base; ordering and paging are dropped.
 *
 * @throws ReselectNotAllowedError if `base` is itself derived
 * @throws AggregateSelectNotReselectableError if `base` selects an aggregate
 * @throws GroupedQueryNotReselectableError if `base` has a group by clause
 * @throws ValidationError if `newSelect` is empty
 */
export function reselect(
  base: Query,
  newSelect: readonly SelectExpression[],
): Query {
  const details = { queryId: base.id, rootType: base.root.entityType };

  if (base.isDerived) {
    throw new ReselectNotAllowedError(details);
  }

  const aggregates = base.select.filter((expression) =>
    isAggregateExpr(expression),
  );
  if (aggregates.length > 0) {
    throw new AggregateSelectNotReselectableError({
      ...details,
      aggregates: aggregates.map((expression) => describeAggregate(expression)),
    });
  }

  if (base.groupBy.length > 0) {
    throw new GroupedQueryNotReselectableError({
      ...details,
      groupByCount: base.groupBy.length,
    });
  }

  if (newSelect.length === 0) {
    throw new ValidationError(
      "Invalid select: at least one expression is required",
      {
        subject: "select",
        issues: [
          { path: "select", message: "Must not be empty", code: "too_small" },
        ],
      },
    );
  }

  return Object.freeze({
    ...base,
    id: generateId(),
    select: Object.freeze([...newSelect]),
    orderBy: Object.freeze([]),
    paging: undefined,
    isDerived: true,
  });
}

/**
 * Returns a copy of the query without ordering and paging.
 * The copy is not marked derived and can still be reselected.
 */
export function withoutSortingAndPaging(query: Query): Query {
  return Object.freeze({
    ...query,
    id: generateId(),
    orderBy: Object.freeze([]),
    paging: undefined,
  });
}

/**
 * Returns a copy of the query with the given paging.
 *
 * @throws ValidationError for negative or non-integer values
 */
export function withPaging(query: Query, limit: number, offset = 0): Query {
  const paging: Paging = createPaging(limit, offset);
  return Object.freeze({ ...query, id: generateId(), paging });
}

/**
 * Derives the row-count query: `select count(<root>.<id>)` over the same
 * filtering as `query`.
 */
export function deriveCountQuery(query: Query): Query {
  return reselect(query, [count(column(query.root, query.root.idColumn))]);
}
