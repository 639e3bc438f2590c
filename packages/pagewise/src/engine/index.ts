export { createPagewise, Pagewise } from "./engine";
export type {
  EliminationSummary,
  FetchPageOptions,
  HookContext,
  Page,
  PagewiseHooks,
  PagewiseOptions,
  QueryHookContext,
} from "./types";
