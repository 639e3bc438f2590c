/**
 * A compiler pass computes an output from the pipeline state, then folds
 * that output back into a new state. Passes never mutate the state they
 * receive.
 */
export type CompilerPass<TState, TPassName extends string, TOutput> = Readonly<{
  name: TPassName;
  execute: (state: TState) => TOutput;
  update: (state: TState, output: TOutput) => TState;
}>;

export type CompilerPassResult<TState, TPassName extends string> = Readonly<{
  name: TPassName;
  state: TState;
}>;

export function runCompilerPass<TState, TPassName extends string, TOutput>(
  state: TState,
  pass: CompilerPass<TState, TPassName, TOutput>,
): CompilerPassResult<TState, TPassName> {
  const output = pass.execute(state);
  return {
    name: pass.name,
    state: pass.update(state, output),
  };
}
