import { type RectLike } from '../types/box.js';

/**
 * An unordered pair of rectangle indices, stored with the smaller index first.
 */
export type IndexPair = [number, number];

interface SweepEvent {
  id: number;
  isStart: boolean;
  value: number;
}

function pairKey(a: number, b: number): string {
  return a < b ? `${String(a)}:${String(b)}` : `${String(b)}:${String(a)}`;
}

/**
 * Sorts by coordinate; at equal coordinates ends come before starts so that
 * intervals which only touch are not reported. Remaining ties go by id.
 */
function compareEvents(a: SweepEvent, b: SweepEvent): number {
  if (a.value !== b.value) return a.value - b.value;
  if (a.isStart !== b.isStart) return a.isStart ? 1 : -1;
  return a.id - b.id;
}

/**
 * Sweeps one axis and returns the keys of every pair whose half-open intervals
 * `[start, start + extent)` share a positive length. Zero-length intervals never
 * take part.
 */
function sweepAxis(rects: ReadonlyArray<RectLike>, axis: 'x' | 'y'): Set<string> {
  const events: SweepEvent[] = [];

  rects.forEach((rect, id) => {
    const start = axis === 'x' ? rect.x : rect.y;
    const end = start + (axis === 'x' ? rect.width : rect.height);
    if (start === end) return;

    events.push({ id, isStart: true, value: Math.min(start, end) });
    events.push({ id, isStart: false, value: Math.max(start, end) });
  });

  events.sort(compareEvents);

  const open = new Set<number>();
  const pairs = new Set<string>();

  for (const event of events) {
    if (event.isStart) {
      for (const other of open) {
        pairs.add(pairKey(event.id, other));
      }
      open.add(event.id);
    } else {
      open.delete(event.id);
    }
  }

  return pairs;
}

/**
 * Reports every pair of rectangles that overlap with positive area.
 *
 * Each axis is swept independently; a pair overlaps in 2D exactly when it
 * overlaps on both axes. Rectangles that only share an edge are not reported,
 * and negative extents are normalized so `{ x: 5, width: -5 }` covers `[0, 5)`.
 *
 * @returns Unique `[i, j]` pairs with `i < j`, sorted by `i` then `j`.
 */
export function boxIntersections(rects: ReadonlyArray<RectLike>): IndexPair[] {
  const xOverlaps = sweepAxis(rects, 'x');
  const yOverlaps = sweepAxis(rects, 'y');

  const result: IndexPair[] = [];
  for (const key of xOverlaps) {
    if (!yOverlaps.has(key)) continue;
    const [i, j] = key.split(':').map(Number);
    result.push([i, j]);
  }

  result.sort((a, b) => a[0] - b[0] || a[1] - b[1]);
  return result;
}
