import type { Relation } from './filters/relation.js';

export type ValidationErrorCode =
  | 'RELATION_NOT_ACCEPTED'
  | 'OPERATOR_PLACEMENT'
  | 'INVALID_TERM';

export interface ValidationErrorContext {
  field?: string;
  relation?: Relation | string;
  index?: number;
}

export class ValidationError extends Error {
  override readonly name = 'ValidationError';
  readonly field: string | undefined;
  readonly relation: Relation | string | undefined;
  readonly index: number | undefined;

  constructor(
    readonly code: ValidationErrorCode,
    message: string,
    context: ValidationErrorContext = {},
  ) {
    super(message);
    this.field = context.field;
    this.relation = context.relation;
    this.index = context.index;
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
