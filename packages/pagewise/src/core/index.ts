// Entity factory
export { defineEntity, type DefineEntityOptions, isEntityType } from "./entity";

// Model factory
export {
  type AssociationMap,
  defineModel,
  EntityModel,
  type ModelConfig,
} from "./define-model";

// Types
export {
  type AssociationDefinition,
  type AssociationDescriptor,
  ENTITY_TYPE_BRAND,
  type EntityType,
  type JoinColumnPair,
} from "./types";
