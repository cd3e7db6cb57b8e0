import { ValidationError } from '../errors.js';
import { Relation, isRelation } from './relation.js';

export type FilterField =
  | 'last_session'
  | 'first_session'
  | 'session_count'
  | 'session_time'
  | 'amount_spent'
  | 'bought_sku'
  | 'tag'
  | 'language'
  | 'app_version'
  | 'country';

function row(...relations: Relation[]): readonly Relation[] {
  return Object.freeze(relations);
}

/**
 * Relations each field accepts. Consulted on every predicate append and
 * on wire-format parsing. Every row is its own frozen array.
 */
export const RELATION_TABLE: Readonly<Record<FilterField, readonly Relation[]>> = Object.freeze({
  last_session: row(Relation.GreaterThan, Relation.LowerThan),
  first_session: row(Relation.GreaterThan, Relation.LowerThan),
  session_count: row(Relation.GreaterThan, Relation.LowerThan, Relation.Equal, Relation.NotEqual),
  session_time: row(Relation.GreaterThan, Relation.LowerThan),
  amount_spent: row(Relation.GreaterThan, Relation.LowerThan, Relation.Equal),
  bought_sku: row(Relation.GreaterThan, Relation.LowerThan, Relation.Equal),
  tag: row(
    Relation.GreaterThan,
    Relation.LowerThan,
    Relation.Equal,
    Relation.NotEqual,
    Relation.Exists,
    Relation.NotExists,
  ),
  language: row(Relation.Equal, Relation.NotEqual),
  app_version: row(Relation.GreaterThan, Relation.LowerThan, Relation.Equal, Relation.NotEqual),
  country: row(Relation.Equal),
});

export const FILTER_FIELDS: readonly FilterField[] = Object.freeze([
  'last_session',
  'first_session',
  'session_count',
  'session_time',
  'amount_spent',
  'bought_sku',
  'tag',
  'language',
  'app_version',
  'country',
]);

export function isFilterField(value: unknown): value is FilterField {
  return FILTER_FIELDS.some((field) => field === value);
}

export function relationsFor(field: FilterField): readonly Relation[] {
  return RELATION_TABLE[field];
}

/**
 * Throws ValidationError('RELATION_NOT_ACCEPTED') unless `provided` is one
 * of `allowed`. `field` only enriches the error.
 */
export function assertAccepted(
  allowed: readonly Relation[],
  provided: unknown,
  field?: string,
): asserts provided is Relation {
  if (isRelation(provided) && allowed.includes(provided)) {
    return;
  }
  const shown = typeof provided === 'string' ? provided : String(provided);
  const suffix = field !== undefined ? ` (field '${field}', relation '${shown}')` : '';
  throw new ValidationError('RELATION_NOT_ACCEPTED', `relation not accepted for this field${suffix}`, {
    relation: shown,
    ...(field !== undefined ? { field } : {}),
  });
}

/** Returns true when `provided` is one of `allowed`; throws otherwise. */
export function accepts(
  allowed: readonly Relation[],
  provided: unknown,
  field?: string,
): provided is Relation {
  assertAccepted(allowed, provided, field);
  return true;
}
