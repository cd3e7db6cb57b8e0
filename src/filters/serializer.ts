import { ValidationError } from '../errors.js';
import { RELATION_TABLE, assertAccepted, isFilterField } from './fields.js';
import type { Relation } from './relation.js';
import type { FilterTerm, PredicateValue, WireTerm } from './types.js';

/**
 * Projects one typed term onto its wire shape. Key order is fixed so the
 * JSON text is stable across calls.
 */
export function toWireTerm(term: FilterTerm): WireTerm {
  if (term.kind === 'predicate') {
    return term.key !== undefined
      ? { field: term.field, key: term.key, relation: term.relation, value: term.value }
      : { field: term.field, relation: term.relation, value: term.value };
  }

  if (term.kind === 'geo') {
    return { radius: term.radius, lat: term.lat, long: term.long };
  }

  // term.kind === 'operator'
  return { operator: term.operator };
}

export function serializeTerms(terms: readonly FilterTerm[]): WireTerm[] {
  return terms.map(toWireTerm);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPredicateValue(value: unknown): value is PredicateValue {
  return typeof value === 'string' || typeof value === 'boolean' ||
    (typeof value === 'number' && Number.isFinite(value));
}

function isCoordinate(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function invalid(index: number, message: string): ValidationError {
  return new ValidationError('INVALID_TERM', `filters[${index}]: ${message}`, { index });
}

function parseWireTerm(raw: unknown, index: number): FilterTerm {
  if (!isRecord(raw)) {
    throw invalid(index, 'expected an object');
  }

  if ('operator' in raw) {
    const operator = raw['operator'];
    if (operator !== 'AND' && operator !== 'OR') {
      throw invalid(index, `unknown operator '${String(operator)}'`);
    }
    return { kind: 'operator', operator };
  }

  if ('radius' in raw) {
    const { radius, lat, long } = raw;
    if (!isCoordinate(radius) || !isCoordinate(lat) || !isCoordinate(long)) {
      throw invalid(index, 'location requires numeric radius, lat and long');
    }
    return { kind: 'geo', radius, lat, long };
  }

  if ('field' in raw) {
    const { field, key, relation, value } = raw;
    if (typeof field !== 'string' || field.length === 0) {
      throw invalid(index, 'field must be a non-empty string');
    }
    if (!isPredicateValue(value)) {
      throw invalid(index, `value for '${field}' must be a string, number or boolean`);
    }

    if (field === 'tag') {
      if (typeof key !== 'string' || key.length === 0) {
        throw invalid(index, 'tag predicates require a key');
      }
      const checked = requireRelation(RELATION_TABLE.tag, relation, field, index);
      return { kind: 'predicate', field, key, relation: checked, value };
    }

    if (key !== undefined) {
      throw invalid(index, `key is only allowed on tag predicates, got one on '${field}'`);
    }
    // Any field outside the table names a purchased SKU.
    const allowed = isFilterField(field) ? RELATION_TABLE[field] : RELATION_TABLE.bought_sku;
    const checked = requireRelation(allowed, relation, field, index);
    return { kind: 'predicate', field, relation: checked, value };
  }

  throw invalid(index, 'expected a predicate, location or operator term');
}

function requireRelation(
  allowed: readonly Relation[],
  relation: unknown,
  field: string,
  index: number,
): Relation {
  try {
    assertAccepted(allowed, relation, field);
  } catch (err) {
    throw withIndex(err, index);
  }
  return relation;
}

function withIndex(err: unknown, index: number): unknown {
  if (err instanceof ValidationError) {
    return new ValidationError(err.code, `filters[${index}]: ${err.message}`, {
      index,
      ...(err.field !== undefined ? { field: err.field } : {}),
      ...(err.relation !== undefined ? { relation: err.relation } : {}),
    });
  }
  return err;
}

/**
 * Parses an untrusted wire-format array back into typed terms, applying
 * the same relation checks as the builder methods.
 */
export function parseWireTerms(input: unknown): FilterTerm[] {
  if (!Array.isArray(input)) {
    throw new ValidationError('INVALID_TERM', 'filters must be an array');
  }
  return input.map((raw: unknown, index) => parseWireTerm(raw, index));
}
