/**
 * Join Registry
 *
 * Deduplicates the table references created while navigating associations
 * during query construction. For one query, a (parent, property, join type)
 * triple maps to exactly one TableReference, so navigating `book.store`
 * from both the where and the order by clause yields a single join.
 */
import { type EntityModel } from "../core/define-model";
import {
  ForeignTableReferenceError,
  RegistryFrozenError,
} from "../errors";
import {
  type JoinedTableReference,
  type JoinType,
  type RootTableReference,
  type TableReference,
} from "./ast";

function childKey(property: string, joinType: JoinType): string {
  return `${property}\u0000${joinType}`;
}

/**
 * Owns every table reference of one query, in registration order.
 *
 * A parent is always registered before its children, so iterating
 * `references()` yields a valid FROM/JOIN order.
 */
export class JoinRegistry {
  readonly root: RootTableReference;

  readonly #model: EntityModel;
  readonly #ordered: TableReference[];
  readonly #owned = new Set<TableReference>();
  readonly #children = new Map<TableReference, Map<string, JoinedTableReference>>();
  #frozen = false;

  constructor(model: EntityModel, rootType: string) {
    const entity = model.entity(rootType);
    this.#model = model;
    this.root = Object.freeze({
      __type: "table_ref" as const,
      key: entity.name,
      entityType: entity.name,
      table: entity.table,
      idColumn: entity.idColumn,
      depth: 0,
      parent: undefined,
      property: undefined,
      association: undefined,
      joinType: undefined,
    });
    this.#ordered = [this.root];
    this.#owned.add(this.root);
  }

  /**
   * Returns the reference for (parent, property, joinType), creating and
   * registering it on first use.
   *
   * @throws RegistryFrozenError once the owning query has been built
   * @throws ForeignTableReferenceError if `parent` belongs to another registry
   * @throws UnknownAssociationError if the parent type has no such association
   */
  join(
    parent: TableReference,
    property: string,
    joinType: JoinType,
  ): JoinedTableReference {
    if (!this.#owned.has(parent)) {
      throw new ForeignTableReferenceError({ reference: parent.key, property });
    }

    const key = childKey(property, joinType);
    const existing = this.#children.get(parent)?.get(key);
    if (existing !== undefined) {
      return existing;
    }

    if (this.#frozen) {
      throw new RegistryFrozenError({ parent: parent.key, property });
    }

    const association = this.#model.association(parent.entityType, property);
    const target = this.#model.entity(association.targetType);
    const reference: JoinedTableReference = Object.freeze({
      __type: "table_ref" as const,
      key: `${parent.key}.${property}(${joinType})`,
      entityType: target.name,
      table: target.table,
      idColumn: target.idColumn,
      depth: parent.depth + 1,
      parent,
      property,
      association,
      joinType,
    });

    let siblings = this.#children.get(parent);
    if (siblings === undefined) {
      siblings = new Map();
      this.#children.set(parent, siblings);
    }
    siblings.set(key, reference);
    this.#ordered.push(reference);
    this.#owned.add(reference);
    return reference;
  }

  /**
   * Whether a reference was created by this registry.
   */
  has(reference: TableReference): boolean {
    return this.#owned.has(reference);
  }

  /**
   * All references, root first, in registration order.
   */
  references(): readonly TableReference[] {
    return this.#ordered;
  }

  /**
   * Joined references in registration order.
   */
  joins(): readonly JoinedTableReference[] {
    return this.#ordered.filter(
      (reference): reference is JoinedTableReference =>
        reference.parent !== undefined,
    );
  }

  /**
   * Direct children of a reference.
   */
  childrenOf(reference: TableReference): readonly JoinedTableReference[] {
    const children = this.#children.get(reference);
    return children === undefined ? [] : [...children.values()];
  }

  /**
   * Ends the construction phase. Lookups of existing triples still work.
   */
  freeze(): void {
    this.#frozen = true;
  }

  get isFrozen(): boolean {
    return this.#frozen;
  }

  get size(): number {
    return this.#ordered.length;
  }
}

/**
 * The reference and all its ancestors, ending at the root.
 */
export function pathToRoot(reference: TableReference): TableReference[] {
  const path: TableReference[] = [];
  let current: TableReference | undefined = reference;
  while (current !== undefined) {
    path.push(current);
    current = current.parent;
  }
  return path;
}
