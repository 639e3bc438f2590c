export {
  analyzeClauseUsage,
  type ClauseUsage,
  usageOf,
} from "./clause-usage";
export {
  eliminateJoins,
  isEliminable,
  type JoinEliminationResult,
} from "./join-elimination";
export {
  type CompilerPass,
  type CompilerPassResult,
  runCompilerPass,
} from "./runner";
