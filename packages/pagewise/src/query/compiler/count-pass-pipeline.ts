import { CompilerInvariantError } from "../../errors";
import {
  type JoinedTableReference,
  type Query,
  type TableReference,
} from "../ast";
import { deriveCountQuery } from "../reselect";
import {
  analyzeClauseUsage,
  type ClauseUsage,
  eliminateJoins,
  type JoinEliminationResult,
  runCompilerPass,
} from "./passes";

/**
 * Everything needed to render the pruned count query of a data query.
 */
export type CountQueryPlan = Readonly<{
  /** The reselected `count(root.id)` query */
  derived: Query;
  /** Clause usage of the original data query */
  usage: ClauseUsage;
  retained: ReadonlySet<TableReference>;
  eliminated: readonly JoinedTableReference[];
}>;

type CountQueryPassState = Readonly<{
  original: Query;
  derived: Query | undefined;
  usage: ClauseUsage | undefined;
  elimination: JoinEliminationResult | undefined;
}>;

function requirePassOutputs(
  state: CountQueryPassState,
): Readonly<{ derived: Query; usage: ClauseUsage }> {
  if (state.derived === undefined || state.usage === undefined) {
    throw new CompilerInvariantError("Count query passes ran out of order", {
      queryId: state.original.id,
    });
  }
  return { derived: state.derived, usage: state.usage };
}

/**
 * Plans the count query of a data query:
 * reselect, then clause usage analysis, then join elimination.
 *
 * @throws ReselectNotAllowedError, AggregateSelectNotReselectableError,
 *   GroupedQueryNotReselectableError when the query cannot be counted
 */
export function planCountQuery(query: Query): CountQueryPlan {
  let state: CountQueryPassState = {
    original: query,
    derived: undefined,
    usage: undefined,
    elimination: undefined,
  };

  state = runCompilerPass(state, {
    name: "reselect",
    execute(currentState): Query {
      return deriveCountQuery(currentState.original);
    },
    update(currentState, derived): CountQueryPassState {
      return { ...currentState, derived };
    },
  }).state;

  state = runCompilerPass(state, {
    name: "clause_usage",
    execute(currentState): ClauseUsage {
      return analyzeClauseUsage(currentState.original);
    },
    update(currentState, usage): CountQueryPassState {
      return { ...currentState, usage };
    },
  }).state;

  state = runCompilerPass(state, {
    name: "join_elimination",
    execute(currentState): JoinEliminationResult {
      const { derived, usage } = requirePassOutputs(currentState);
      return eliminateJoins(derived, usage);
    },
    update(currentState, elimination): CountQueryPassState {
      return { ...currentState, elimination };
    },
  }).state;

  const { derived, usage } = requirePassOutputs(state);
  const elimination = state.elimination;
  if (elimination === undefined) {
    throw new CompilerInvariantError(
      "join_elimination pass produced no result",
      { queryId: query.id },
    );
  }

  return {
    derived,
    usage,
    retained: elimination.retained,
    eliminated: elimination.eliminated,
  };
}
