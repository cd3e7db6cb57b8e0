import { SegmentNotFoundError } from '../../domain/errors.js';
import type { SegmentRepository } from '../../segments/repository.js';

export async function deleteSegment(repo: SegmentRepository, segmentId: string): Promise<void> {
  const deleted = await repo.delete(segmentId);
  if (!deleted) {
    throw new SegmentNotFoundError(`Segment '${segmentId}' not found`);
  }
}
