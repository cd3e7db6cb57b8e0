export { FilterBuilder } from './filters/builder.js';
export { Relation, isRelation } from './filters/relation.js';
export { RELATION_TABLE, accepts, relationsFor, isFilterField } from './filters/fields.js';
export type { FilterField } from './filters/fields.js';
export { validateOperatorPlacement } from './filters/placement.js';
export type {
  FilterTerm,
  PredicateTerm,
  GeoTerm,
  OperatorTerm,
  Operator,
  PredicateValue,
  WireTerm,
  WirePredicate,
  WireGeo,
  WireOperator,
  FilterBuilderOptions,
} from './filters/types.js';
export { ValidationError } from './errors.js';
export type { ValidationErrorCode, ValidationErrorContext } from './errors.js';
