import { z } from "zod";

import {
  ConfigurationError,
  UnknownAssociationError,
  UnknownEntityError,
} from "../errors";
import { validateInput } from "../errors/validation";
import { columnNameSchema } from "./entity";
import {
  type AssociationDefinition,
  type AssociationDescriptor,
  type EntityType,
  type JoinColumnPair,
} from "./types";

// ============================================================
// Model Definition Types
// ============================================================

/**
 * Associations keyed by owner entity name, then by property name.
 */
export type AssociationMap = Readonly<
  Record<string, Readonly<Record<string, AssociationDefinition>>>
>;

/**
 * Configuration for defineModel().
 */
export type ModelConfig = Readonly<{
  entities: readonly EntityType[];
  associations?: AssociationMap;
}>;

const joinColumnPairSchema = z.object({
  source: columnNameSchema,
  target: columnNameSchema,
});

const associationDefinitionSchema = z
  .object({
    target: z.string().min(1),
    collection: z.boolean().optional(),
    nullable: z.boolean().optional(),
    foreignKey: columnNameSchema.optional(),
    mappedBy: columnNameSchema.optional(),
    joinColumns: z.array(joinColumnPairSchema).min(1).optional(),
  })
  .refine(
    (definition) =>
      [definition.foreignKey, definition.mappedBy, definition.joinColumns]
        .filter((value) => value !== undefined).length === 1,
    {
      message: "Exactly one of foreignKey, mappedBy or joinColumns is required",
    },
  )
  .refine(
    (definition) =>
      !(definition.foreignKey !== undefined && definition.collection === true),
    {
      message: "A foreign-key association cannot be a collection",
      path: ["collection"],
    },
  );

const associationMapSchema = z.record(
  z.string(),
  z.record(z.string(), associationDefinitionSchema),
);

// ============================================================
// Entity Model
// ============================================================

/**
 * Read-only metadata provider.
 *
 * Holds entity types and eagerly resolved association descriptors.
 * The query engine looks associations up by (owner type, property).
 */
export class EntityModel {
  readonly entities: ReadonlyMap<string, EntityType>;
  readonly #associations: ReadonlyMap<
    string,
    ReadonlyMap<string, AssociationDescriptor>
  >;

  constructor(
    entities: ReadonlyMap<string, EntityType>,
    associations: ReadonlyMap<
      string,
      ReadonlyMap<string, AssociationDescriptor>
    >,
  ) {
    this.entities = entities;
    this.#associations = associations;
  }

  /**
   * Returns the entity type registered under a name.
   *
   * @throws UnknownEntityError
   */
  entity(name: string): EntityType {
    const entity = this.entities.get(name);
    if (entity === undefined) {
      throw new UnknownEntityError(name);
    }
    return entity;
  }

  /**
   * Resolves an association property of an owner type.
   *
   * @throws UnknownAssociationError
   */
  association(ownerType: string, property: string): AssociationDescriptor {
    const descriptor = this.#associations.get(ownerType)?.get(property);
    if (descriptor === undefined) {
      throw new UnknownAssociationError(ownerType, property);
    }
    return descriptor;
  }

  /**
   * Lists all associations declared on an owner type.
   */
  associationsOf(ownerType: string): readonly AssociationDescriptor[] {
    const byProperty = this.#associations.get(ownerType);
    return byProperty === undefined ? [] : [...byProperty.values()];
  }
}

// ============================================================
// Association Resolution
// ============================================================

function resolveJoinColumns(
  owner: EntityType,
  target: EntityType,
  definition: AssociationDefinition,
): readonly JoinColumnPair[] {
  if (definition.foreignKey !== undefined) {
    return [{ source: definition.foreignKey, target: target.idColumn }];
  }
  if (definition.mappedBy !== undefined) {
    return [{ source: owner.idColumn, target: definition.mappedBy }];
  }
  return definition.joinColumns ?? [];
}

function resolveAssociation(
  owner: EntityType,
  property: string,
  definition: AssociationDefinition,
  entities: ReadonlyMap<string, EntityType>,
): AssociationDescriptor {
  const target = entities.get(definition.target);
  if (target === undefined) {
    throw new ConfigurationError(
      `Association "${owner.name}.${property}" targets undefined entity "${definition.target}"`,
      { ownerType: owner.name, property, targetType: definition.target },
      {
        suggestion: `Add "${definition.target}" to the entities of defineModel().`,
      },
    );
  }

  const isBasedOnForeignKey = definition.foreignKey !== undefined;

  return Object.freeze({
    ownerType: owner.name,
    property,
    targetType: target.name,
    targetTable: target.table,
    targetIdColumn: target.idColumn,
    isCollection: definition.collection ?? false,
    // An owner-side foreign key is non-null unless declared otherwise;
    // inverse and computed joins may always find no row.
    isNullable: definition.nullable ?? !isBasedOnForeignKey,
    isBasedOnForeignKey,
    joinColumns: Object.freeze(
      resolveJoinColumns(owner, target, definition).map((pair) =>
        Object.freeze({ ...pair }),
      ),
    ),
  });
}

// ============================================================
// Model Factory
// ============================================================

/**
 * Creates the metadata provider for a set of entities and associations.
 *
 * Every association is resolved and validated here, so query building
 * never discovers a broken mapping late.
 *
 * @example
 * ```typescript
 * const model = defineModel({
 *   entities: [Book, BookStore],
 *   associations: {
 *     Book: {
 *       store: { target: "BookStore", foreignKey: "STORE_ID", nullable: true },
 *     },
 *     BookStore: {
 *       books: { target: "Book", mappedBy: "STORE_ID", collection: true },
 *     },
 *   },
 * });
 * ```
 */
export function defineModel(config: ModelConfig): EntityModel {
  const entities = new Map<string, EntityType>();
  for (const entity of config.entities) {
    if (entities.has(entity.name)) {
      throw new ConfigurationError(
        `Entity "${entity.name}" is defined more than once`,
        { entityType: entity.name },
      );
    }
    entities.set(entity.name, entity);
  }

  const definitions = validateInput(
    associationMapSchema,
    config.associations ?? {},
    "associations",
  );

  const associations = new Map<string, Map<string, AssociationDescriptor>>();
  for (const [ownerName, properties] of Object.entries(definitions)) {
    const owner = entities.get(ownerName);
    if (owner === undefined) {
      throw new ConfigurationError(
        `Associations declared for undefined entity "${ownerName}"`,
        { ownerType: ownerName },
        { suggestion: `Add "${ownerName}" to the entities of defineModel().` },
      );
    }

    const byProperty = new Map<string, AssociationDescriptor>();
    for (const [property, definition] of Object.entries(properties)) {
      byProperty.set(
        property,
        resolveAssociation(owner, property, definition, entities),
      );
    }
    associations.set(ownerName, byProperty);
  }

  return new EntityModel(entities, associations);
}
