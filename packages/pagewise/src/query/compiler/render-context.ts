import { CompilerInvariantError } from "../../errors";
import { type TableReference } from "../ast";

/**
 * Per-render alias allocation.
 *
 * Aliases are `tb_<n>_`, numbered from 1 in the order references are
 * assigned. One context spans a statement and all of its sub-queries, so
 * sub-query aliases continue the outer numbering. A fresh context is
 * created for every render.
 */
export class RenderContext {
  readonly #aliases = new Map<TableReference, string>();
  #next = 1;

  /**
   * Assigns the next alias to a reference, or returns its existing one.
   */
  assign(reference: TableReference): string {
    const existing = this.#aliases.get(reference);
    if (existing !== undefined) {
      return existing;
    }
    const alias = `tb_${this.#next}_`;
    this.#next += 1;
    this.#aliases.set(reference, alias);
    return alias;
  }

  /**
   * @throws CompilerInvariantError if the reference is not rendered
   */
  aliasOf(reference: TableReference): string {
    const alias = this.#aliases.get(reference);
    if (alias === undefined) {
      throw new CompilerInvariantError(
        `Table reference ${reference.key} is not part of the rendered statement`,
        { component: "render-context", reference: reference.key },
      );
    }
    return alias;
  }
}
