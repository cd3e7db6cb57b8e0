import { ValidationError } from '../errors.js';
import type { FilterTerm, Operator } from './types.js';

/**
 * Throws unless an operator marker may be appended after `terms`:
 * the sequence must be non-empty and must not already end with an operator.
 */
export function assertOperatorAllowed(terms: readonly FilterTerm[], operator: Operator): void {
  const index = terms.length;
  const previous = terms[index - 1];
  if (previous === undefined) {
    throw new ValidationError('OPERATOR_PLACEMENT', `${operator} cannot start a filter expression`, { index });
  }
  if (previous.kind === 'operator') {
    throw new ValidationError(
      'OPERATOR_PLACEMENT',
      `${operator} cannot follow ${previous.operator} at position ${index}`,
      { index },
    );
  }
}

/**
 * Checks a complete sequence: no leading, trailing or adjacent operators.
 */
export function validateOperatorPlacement(terms: readonly FilterTerm[]): void {
  terms.forEach((term, index) => {
    if (term.kind === 'operator') {
      assertOperatorAllowed(terms.slice(0, index), term.operator);
    }
  });
  const last = terms[terms.length - 1];
  if (last !== undefined && last.kind === 'operator') {
    throw new ValidationError(
      'OPERATOR_PLACEMENT',
      `${last.operator} cannot end a filter expression`,
      { index: terms.length - 1 },
    );
  }
}
