import { RELATION_TABLE, accepts, isFilterField } from './fields.js';
import type { FilterField } from './fields.js';
import { ValidationError } from '../errors.js';
import { Relation } from './relation.js';
import { assertOperatorAllowed, validateOperatorPlacement } from './placement.js';
import { parseWireTerms, serializeTerms } from './serializer.js';
import type {
  FilterBuilderOptions,
  FilterTerm,
  Operator,
  PredicateValue,
  WireTerm,
} from './types.js';

/**
 * Fluent mutable builder for the `filters` section of a notification
 * request. Every method appends one term and returns the same instance.
 * Relations are checked at call time, so an invalid relation fails at the
 * call that supplied it.
 *
 * @example
 * new FilterBuilder()
 *   .sessionCount(Relation.GreaterThan, 10)
 *   .and()
 *   .sessionTime(Relation.LowerThan, 2000)
 *   .toWireFormat();
 */
export class FilterBuilder {
  private readonly _terms: FilterTerm[] = [];
  private readonly strict: boolean;

  constructor(options: FilterBuilderOptions = {}) {
    this.strict = options.strict ?? false;
  }

  /**
   * Rebuilds a builder from a wire-format array, e.g. one read back from
   * storage or received over HTTP. Throws ValidationError on the first
   * malformed term.
   */
  static fromWireFormat(input: unknown, options: FilterBuilderOptions = {}): FilterBuilder {
    const terms = parseWireTerms(input);
    if (options.strict === true) {
      validateOperatorPlacement(terms);
    }
    const builder = new FilterBuilder(options);
    for (const term of terms) {
      builder.append(term);
    }
    return builder;
  }

  /** Snapshot of the appended terms; each term is frozen. */
  get terms(): readonly FilterTerm[] {
    return this._terms.slice();
  }

  get length(): number {
    return this._terms.length;
  }

  isEmpty(): boolean {
    return this._terms.length === 0;
  }

  /** Hours since the user's last session. */
  lastSession(relation: Relation, hoursAgo: number): this {
    return this.predicate('last_session', relation, hoursAgo);
  }

  /** Hours since the user's first session. */
  firstSession(relation: Relation, hoursAgo: number): this {
    return this.predicate('first_session', relation, hoursAgo);
  }

  sessionCount(relation: Relation, count: number): this {
    return this.predicate('session_count', relation, count);
  }

  /** Total seconds the user has spent in the app. */
  sessionTime(relation: Relation, seconds: number): this {
    return this.predicate('session_time', relation, seconds);
  }

  /** Amount in USD spent on in-app purchases. */
  amountSpent(relation: Relation, amount: number): this {
    return this.predicate('amount_spent', relation, amount);
  }

  /**
   * The SKU name itself becomes the predicate's field, so it must be
   * non-empty and must not collide with a known field name.
   */
  boughtSku(skuKey: string, relation: Relation, amount: number): this {
    if (skuKey.length === 0 || isFilterField(skuKey)) {
      throw new ValidationError('INVALID_TERM', `'${skuKey}' cannot be used as a SKU name`, { field: skuKey });
    }
    accepts(RELATION_TABLE.bought_sku, relation, skuKey);
    return this.append({ kind: 'predicate', field: skuKey, relation, value: finite(skuKey, amount) });
  }

  /**
   * Compares the tag named `tagKey`. `value` is sent even for `exists` and
   * `not_exists`, where the service ignores it.
   */
  tag(tagKey: string, relation: Relation, value: string): this {
    if (tagKey.length === 0) {
      throw new ValidationError('INVALID_TERM', 'tag key must be a non-empty string', { field: 'tag' });
    }
    accepts(RELATION_TABLE.tag, relation, 'tag');
    return this.append({ kind: 'predicate', field: 'tag', key: tagKey, relation, value });
  }

  /** Two-character language code. */
  language(relation: Relation, langCode: string): this {
    return this.predicate('language', relation, langCode);
  }

  appVersion(relation: Relation, version: string): this {
    return this.predicate('app_version', relation, version);
  }

  /** Two-character country code; the relation is always `=`. */
  country(countryCode: string): this {
    return this.predicate('country', Relation.Equal, countryCode);
  }

  /** Users within `radius` meters of the given point. */
  location(radius: number, lat: number, long: number): this {
    return this.append({
      kind: 'geo',
      radius: finite('radius', radius),
      lat: finite('lat', lat),
      long: finite('long', long),
    });
  }

  and(): this {
    return this.operator('AND');
  }

  or(): this {
    return this.operator('OR');
  }

  /**
   * Wire-format array in insertion order. Returns new objects on every
   * call; the builder is left untouched.
   */
  toWireFormat(): WireTerm[] {
    if (this.strict) {
      validateOperatorPlacement(this._terms);
    }
    return serializeTerms(this._terms);
  }

  toJSON(): WireTerm[] {
    return this.toWireFormat();
  }

  private predicate(
    field: Exclude<FilterField, 'tag' | 'bought_sku'>,
    relation: Relation,
    value: PredicateValue,
  ): this {
    accepts(RELATION_TABLE[field], relation, field);
    return this.append({
      kind: 'predicate',
      field,
      relation,
      value: typeof value === 'number' ? finite(field, value) : value,
    });
  }

  private operator(operator: Operator): this {
    if (this.strict) {
      assertOperatorAllowed(this._terms, operator);
    }
    return this.append({ kind: 'operator', operator });
  }

  private append(term: FilterTerm): this {
    this._terms.push(Object.freeze(term));
    return this;
  }
}

// NaN and the infinities serialize as null, which the parser rejects.
function finite(name: string, value: number): number {
  if (!Number.isFinite(value)) {
    throw new ValidationError('INVALID_TERM', `${name} must be a finite number, got ${value}`, { field: name });
  }
  return value;
}
