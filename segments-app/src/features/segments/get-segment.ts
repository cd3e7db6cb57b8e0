import { SegmentNotFoundError } from '../../domain/errors.js';
import type { FiltersFragment, Segment } from '../../domain/segment.js';
import type { SegmentRepository } from '../../segments/repository.js';

export async function getSegment(repo: SegmentRepository, segmentId: string): Promise<Segment> {
  const segment = await repo.findById(segmentId);
  if (segment === null) {
    throw new SegmentNotFoundError(`Segment '${segmentId}' not found`);
  }
  return segment;
}

export function renderFilters(segment: Segment): FiltersFragment {
  return { filters: segment.filters.map((term) => ({ ...term })) };
}
