import type { Relation } from './relation.js';

export type PredicateValue = string | number | boolean;

export type Operator = 'AND' | 'OR';

export type FilterTerm =
  | {
      readonly kind: 'predicate';
      readonly field: string;
      readonly relation: Relation;
      readonly value: PredicateValue;
      readonly key?: string;
    }
  | { readonly kind: 'geo'; readonly radius: number; readonly lat: number; readonly long: number }
  | { readonly kind: 'operator'; readonly operator: Operator };

export type PredicateTerm = Extract<FilterTerm, { kind: 'predicate' }>;
export type GeoTerm = Extract<FilterTerm, { kind: 'geo' }>;
export type OperatorTerm = Extract<FilterTerm, { kind: 'operator' }>;

/**
 * JSON shapes sent under the `filters` key of a notification request.
 * Terms are evaluated left to right; there is no explicit grouping.
 */
export type WirePredicate = { field: string; key?: string; relation: Relation; value: PredicateValue };
export type WireGeo = { radius: number; lat: number; long: number };
export type WireOperator = { operator: Operator };
export type WireTerm = WirePredicate | WireGeo | WireOperator;

export interface FilterBuilderOptions {
  /** Reject leading, trailing and doubled operator markers. Defaults to false. */
  strict?: boolean;
}
