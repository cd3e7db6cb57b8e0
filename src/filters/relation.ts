/**
 * Comparison operators understood by the delivery service. Each member's
 * value is the symbol sent on the wire.
 */
export const Relation = Object.freeze({
  GreaterThan: '>',
  LowerThan: '<',
  Equal: '=',
  NotEqual: '!=',
  Exists: 'exists',
  NotExists: 'not_exists',
} as const);

export type Relation = (typeof Relation)[keyof typeof Relation];

export const ALL_RELATIONS: readonly Relation[] = Object.freeze(Object.values(Relation));

export function isRelation(value: unknown): value is Relation {
  return ALL_RELATIONS.some((relation) => relation === value);
}
