// ============================================================
// Brand Symbols
// ============================================================

export const ENTITY_TYPE_BRAND = "__pagewiseEntityType" as const;

// ============================================================
// Entity Types
// ============================================================

/**
 * A mapped entity: one table with a single-column identity.
 */
export type EntityType<K extends string = string> = Readonly<{
  [ENTITY_TYPE_BRAND]: true;
  name: K;
  table: string;
  idColumn: string;
  /** Non-id columns selected by default */
  columns: readonly string[];
  description?: string | undefined;
}>;

// ============================================================
// Associations
// ============================================================

/**
 * One equality of a join condition: `parent.source = joined.target`.
 */
export type JoinColumnPair = Readonly<{
  /** Column on the owning (parent) table */
  source: string;
  /** Column on the joined (target) table */
  target: string;
}>;

/**
 * Fully resolved association between two entity types.
 *
 * Produced eagerly by `defineModel()`; the query engine only reads the
 * three boolean facts plus the join columns.
 */
export type AssociationDescriptor = Readonly<{
  ownerType: string;
  property: string;
  targetType: string;
  targetTable: string;
  targetIdColumn: string;
  /** One-to-many / many-to-many (may multiply parent rows) */
  isCollection: boolean;
  /** The owning foreign key may be null */
  isNullable: boolean;
  /** Join goes through a foreign key held by the owner table */
  isBasedOnForeignKey: boolean;
  joinColumns: readonly JoinColumnPair[];
}>;

/**
 * How an association is declared in `defineModel()`.
 *
 * Exactly one of `foreignKey`, `mappedBy` or `joinColumns` describes the
 * join condition:
 * - `foreignKey`: column on the owner table that references the target id
 * - `mappedBy`: column on the target table that references the owner id
 * - `joinColumns`: arbitrary column pairs (computed joins)
 */
export type AssociationDefinition = Readonly<{
  target: string;
  collection?: boolean | undefined;
  nullable?: boolean | undefined;
  foreignKey?: string | undefined;
  mappedBy?: string | undefined;
  joinColumns?: readonly JoinColumnPair[] | undefined;
}>;
