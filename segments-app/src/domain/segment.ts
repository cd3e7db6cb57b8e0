import type { WireTerm } from 'push-segment-filters';

/** A named audience whose membership is a filter expression. */
export interface Segment {
  segmentId: string;
  name: string;
  filters: WireTerm[];
  createdAt: Date;
}

/** The fragment merged into a notification request body. */
export interface FiltersFragment {
  filters: WireTerm[];
}
