import type { Segment } from '../domain/segment.js';

export interface SegmentRepository {
  initializeSchema(): Promise<void>;
  insert(segment: Segment): Promise<Segment>;
  findById(segmentId: string): Promise<Segment | null>;
  /** All segments, oldest first. */
  list(): Promise<Segment[]>;
  /** Returns false when no row was removed. */
  delete(segmentId: string): Promise<boolean>;
  close(): Promise<void>;
}
