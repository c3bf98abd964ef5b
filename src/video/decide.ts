import type { DetectionConfig, MotionEvent, MotionRegion } from '../types.js';
import { compareRegions } from './analyze.js';

export interface EventStamp {
  sequence: number;
  ts: number;
  snapshot: boolean;
}

export interface Decision {
  presence: boolean;
  qualifying: MotionRegion[];
  event: MotionEvent | null;
}

/**
 * Edge-triggered motion decision. Regions smaller than `minArea` are noise; an event is produced
 * only when presence flips from false to true, so sustained motion yields a single event and a
 * new one needs at least one quiet cycle in between.
 */
export function decide(
  regions: readonly MotionRegion[],
  config: Pick<DetectionConfig, 'minArea'>,
  prior: boolean,
  stamp: EventStamp
): Decision {
  const qualifying = filterRegions(regions, config.minArea);
  const presence = qualifying.length > 0;

  if (!presence || prior) {
    return { presence, qualifying, event: null };
  }

  const event: MotionEvent = Object.freeze({
    sequence: stamp.sequence,
    ts: stamp.ts,
    regions: Object.freeze(qualifying.map(region => Object.freeze({ ...region }))),
    snapshot: stamp.snapshot
  });

  return { presence, qualifying, event };
}

export function filterRegions(regions: readonly MotionRegion[], minArea: number): MotionRegion[] {
  return regions.filter(region => region.area >= minArea).sort(compareRegions);
}

export function largestRegion(event: Pick<MotionEvent, 'regions'>): MotionRegion | null {
  return event.regions[0] ?? null;
}
