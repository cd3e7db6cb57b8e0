import { FilterBuilder, ValidationError } from 'push-segment-filters';
import type { WireTerm } from 'push-segment-filters';
import { SegmentStoreError } from '../domain/errors.js';
import type { Segment } from '../domain/segment.js';

// Type alias so it satisfies pg's QueryResultRow constraint.
export type SegmentRow = {
  segment_id: string;
  name: string;
  filters: unknown;   // pg auto-parses JSONB
  created_at: Date;   // pg auto-parses TIMESTAMPTZ
};

/**
 * Stored filters are parsed again so a row edited outside the service
 * cannot leak a malformed expression.
 */
function storedFilters(row: SegmentRow): WireTerm[] {
  try {
    return FilterBuilder.fromWireFormat(row.filters).toWireFormat();
  } catch (err) {
    if (err instanceof ValidationError) {
      throw new SegmentStoreError(`Segment '${row.segment_id}' has invalid stored filters: ${err.message}`, err);
    }
    throw err;
  }
}

export function mapRow(row: SegmentRow): Segment {
  return {
    segmentId: row.segment_id,
    name: row.name,
    filters: storedFilters(row),
    createdAt: row.created_at,
  };
}
