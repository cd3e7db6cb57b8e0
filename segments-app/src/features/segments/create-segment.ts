import { FilterBuilder } from 'push-segment-filters';
import type { Clock } from '../../domain/clock.js';
import { newSegmentId } from '../../domain/ids.js';
import { EmptySegmentError, InvalidSegmentNameError } from '../../domain/errors.js';
import type { Segment } from '../../domain/segment.js';
import type { SegmentRepository } from '../../segments/repository.js';

export const MAX_NAME_LENGTH = 255;

export interface CreateSegmentInput {
  name: string;
  /** Wire-format filter array, validated before anything is stored. */
  filters: unknown;
}

export interface CreateSegmentOptions {
  strictOperators?: boolean;
}

export async function createSegment(
  repo: SegmentRepository,
  clock: Clock,
  input: CreateSegmentInput,
  options: CreateSegmentOptions = {},
): Promise<Segment> {
  const name = input.name.trim();
  if (name.length === 0 || name.length > MAX_NAME_LENGTH) {
    throw new InvalidSegmentNameError(
      `name must be between 1 and ${MAX_NAME_LENGTH} characters, got ${name.length}`,
    );
  }

  // Throws ValidationError on the first bad term
  const builder = FilterBuilder.fromWireFormat(input.filters, { strict: options.strictOperators ?? false });
  if (builder.isEmpty()) {
    throw new EmptySegmentError(`Segment '${name}' must have at least one filter`);
  }

  return repo.insert({
    segmentId: newSegmentId(),
    name,
    filters: builder.toWireFormat(),
    createdAt: clock.now(),
  });
}
