/**
 * QueryBuilder - assembles one immutable Query.
 */
import { type EntityModel } from "../../core/define-model";
import { ValidationError } from "../../errors";
import { generateId } from "../../utils/id";
import {
  type ColumnExpr,
  type JoinedTableReference,
  type JoinType,
  type OrderSpec,
  type Paging,
  type PredicateExpression,
  type Query,
  type RootTableReference,
  type SelectExpression,
  type SortDirection,
  type TableReference,
} from "../ast";
import { JoinRegistry } from "../join-registry";
import { createPaging } from "../paging";
import { column } from "../predicates";

type QueryBuilderState = {
  select: SelectExpression[] | undefined;
  where: PredicateExpression[];
  groupBy: ColumnExpr[];
  having: PredicateExpression[];
  orderBy: OrderSpec[];
  paging: Paging | undefined;
};

/**
 * Fluent, single-use builder for a Query.
 *
 * Clause methods append; `build()` freezes the join registry, after which
 * no new table reference can be introduced.
 *
 * @example
 * ```typescript
 * const q = createQueryBuilder(model, "Book");
 * const store = q.join(q.root, "store");
 * const query = q
 *   .where(between(column(q.root, "PRICE"), 20, 40))
 *   .orderBy(column(store, "NAME"))
 *   .limit(10, 90)
 *   .build();
 * ```
 */
export class QueryBuilder {
  readonly #model: EntityModel;
  readonly #registry: JoinRegistry;
  readonly #state: QueryBuilderState = {
    select: undefined,
    where: [],
    groupBy: [],
    having: [],
    orderBy: [],
    paging: undefined,
  };
  #built: Query | undefined;

  constructor(model: EntityModel, rootType: string) {
    this.#model = model;
    this.#registry = new JoinRegistry(model, rootType);
  }

  get root(): RootTableReference {
    return this.#registry.root;
  }

  /**
   * Navigates an association, returning the deduplicated table reference.
   */
  join(
    parent: TableReference,
    property: string,
    joinType: JoinType = "inner",
  ): JoinedTableReference {
    return this.#registry.join(parent, property, joinType);
  }

  /**
   * Adds predicates to the WHERE conjunction.
   */
  where(...predicates: PredicateExpression[]): this {
    this.#assertOpen();
    this.#state.where.push(...predicates);
    return this;
  }

  groupBy(...columns: ColumnExpr[]): this {
    this.#assertOpen();
    this.#state.groupBy.push(...columns);
    return this;
  }

  /**
   * Adds predicates to the HAVING conjunction.
   */
  having(...predicates: PredicateExpression[]): this {
    this.#assertOpen();
    this.#state.having.push(...predicates);
    return this;
  }

  /**
   * Appends an ORDER BY item, given as an expression plus direction or as
   * an `OrderSpec` from `asc()` or `desc()`.
   */
  orderBy(
    expression: SelectExpression | OrderSpec,
    direction: SortDirection = "asc",
  ): this {
    this.#assertOpen();
    this.#state.orderBy.push(
      "__type" in expression ? { expression, direction } : expression,
    );
    return this;
  }

  /**
   * Replaces the select list. Without a call, the query selects the root id
   * followed by the root entity's declared columns.
   */
  select(...expressions: SelectExpression[]): this {
    this.#assertOpen();
    if (expressions.length === 0) {
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
    this.#state.select = [...expressions];
    return this;
  }

  /**
   * @throws ValidationError for negative or non-integer values
   */
  limit(limit: number, offset = 0): this {
    this.#assertOpen();
    this.#state.paging = createPaging(limit, offset);
    return this;
  }

  /**
   * Produces the immutable Query. Further calls return the same instance.
   */
  build(): Query {
    if (this.#built !== undefined) {
      return this.#built;
    }
    this.#registry.freeze();
    const root = this.#registry.root;
    const state = this.#state;

    this.#built = Object.freeze({
      __type: "query" as const,
      id: generateId(),
      root,
      registry: this.#registry,
      select: Object.freeze(state.select ?? this.#defaultSelect(root)),
      where: Object.freeze([...state.where]),
      groupBy: Object.freeze([...state.groupBy]),
      having: Object.freeze([...state.having]),
      orderBy: Object.freeze([...state.orderBy]),
      paging: state.paging,
      isDerived: false,
    });
    return this.#built;
  }

  #defaultSelect(root: RootTableReference): SelectExpression[] {
    const entity = this.#model.entity(root.entityType);
    return [
      column(root, entity.idColumn),
      ...entity.columns.map((name) => column(root, name)),
    ];
  }

  #assertOpen(): void {
    if (this.#built !== undefined) {
      throw new ValidationError("Query has already been built", {
        subject: "query builder",
        issues: [
          { path: "build", message: "Builder is single-use", code: "custom" },
        ],
      });
    }
  }
}

/**
 * Starts a query rooted at an entity type.
 *
 * @throws UnknownEntityError
 */
export function createQueryBuilder(
  model: EntityModel,
  rootType: string,
): QueryBuilder {
  return new QueryBuilder(model, rootType);
}
