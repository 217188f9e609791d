import { type Scalar, abs, add, zero } from '../types/scalar.js';
import { type Length, finite, unbounded, shrink, fits, isPositive } from '../types/length.js';
import { type Box, type PlacedBox } from '../types/box.js';

/**
 * A free rectangle still available for placement.
 * Regions live only inside a single pack call.
 */
export interface Region<U extends string = 'px'> {
  readonly x: Scalar<U>;
  readonly y: Scalar<U>;
  readonly width: Length<U>;
  readonly height: Length<U>;
}

export interface SplitResult<T, U extends string = 'px'> {
  placed: PlacedBox<T, U>;
  /** Zero, one or two surviving child regions: `right` first, then `top`. */
  children: Region<U>[];
}

/**
 * Lexicographic fit score: [tier, leftover, distance from origin]. Lower is better.
 *
 * tier 0: both leftovers finite, leftover = the shorter one.
 * tier 1: one leftover unbounded, leftover = the finite one.
 * tier 2: both unbounded.
 */
type FitScore = readonly [number, number, number];

function compareScores(a: FitScore, b: FitScore): number {
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return a[i] - b[i];
  }
  return 0;
}

function scoreRegion<U extends string>(region: Region<U>, needWidth: Scalar<U>, needHeight: Scalar<U>): FitScore {
  const leftoverWidth = shrink(region.width, needWidth);
  const leftoverHeight = shrink(region.height, needHeight);
  const origin = region.x + region.y;

  if (leftoverWidth.kind === 'finite' && leftoverHeight.kind === 'finite') {
    return [0, Math.min(leftoverWidth.value, leftoverHeight.value), origin];
  }
  if (leftoverWidth.kind === 'finite') return [1, leftoverWidth.value, origin];
  if (leftoverHeight.kind === 'finite') return [1, leftoverHeight.value, origin];
  return [2, 0, origin];
}

/**
 * Places `box` flush at the region origin and cuts the rest of the region in two
 * along the placed footprint, grown by `spacing` on its right and top edges.
 *
 * With `splitVertically` the right child keeps the full region height and the top
 * child is only as wide as the footprint; otherwise the top child keeps the full
 * region width and the right child is only as tall as the footprint.
 * Children with a finite side ≤ 0 are dropped.
 */
export function splitRegion<T, U extends string>(
  spacing: Scalar<U>,
  box: Box<T, U>,
  region: Region<U>,
  splitVertically: boolean,
): SplitResult<T, U> {
  const width = abs(box.width);
  const height = abs(box.height);
  const paddedWidth = add(width, spacing);
  const paddedHeight = add(height, spacing);

  const placed: PlacedBox<T, U> = {
    x: region.x,
    y: region.y,
    width,
    height,
    data: box.data,
  };

  const right: Region<U> = {
    x: add(region.x, paddedWidth),
    y: region.y,
    width: shrink(region.width, paddedWidth),
    height: splitVertically ? region.height : finite(paddedHeight),
  };

  const top: Region<U> = {
    x: region.x,
    y: add(region.y, paddedHeight),
    width: splitVertically ? finite(paddedWidth) : region.width,
    height: shrink(region.height, paddedHeight),
  };

  const children = [right, top].filter((child) => isPositive(child.width) && isPositive(child.height));
  return { placed, children };
}

/**
 * Owns the list of free regions for one packing run and answers best-fit queries.
 * Regions are kept in a flat list; each query is a linear scan.
 */
export class FreeRegionTracker<U extends string = 'px'> {
  private regions: Region<U>[];

  /**
   * Seeds the tracker with a single region, by default unbounded in both
   * dimensions at the origin.
   */
  constructor(seed?: Region<U>) {
    this.regions = [
      seed ?? {
        x: zero<U>(),
        y: zero<U>(),
        width: unbounded<U>(),
        height: unbounded<U>(),
      },
    ];
  }

  /**
   * Snapshot of the current free regions, in insertion order.
   */
  list(): ReadonlyArray<Region<U>> {
    return [...this.regions];
  }

  get size(): number {
    return this.regions.length;
  }

  /**
   * Returns the region leaving the least leftover space around `box` once the
   * trailing spacing is reserved, or undefined when no region can hold it.
   * Ties go to the region nearest the origin, then to the oldest region.
   */
  findBestRegion<T>(spacing: Scalar<U>, box: Box<T, U>): Region<U> | undefined {
    const needWidth = add(abs(box.width), spacing);
    const needHeight = add(abs(box.height), spacing);

    let best: Region<U> | undefined;
    let bestScore: FitScore | undefined;

    for (const region of this.regions) {
      if (!fits(region.width, needWidth) || !fits(region.height, needHeight)) continue;

      const score = scoreRegion(region, needWidth, needHeight);
      if (bestScore === undefined || compareScores(score, bestScore) < 0) {
        best = region;
        bestScore = score;
      }
    }

    return best;
  }

  /**
   * Consumes `region`, places `box` in it, and adds the surviving child regions.
   * Throws if `region` is not currently tracked.
   */
  placeAndSplit<T>(spacing: Scalar<U>, box: Box<T, U>, region: Region<U>, splitVertically: boolean): PlacedBox<T, U> {
    const index = this.regions.indexOf(region);
    if (index === -1) {
      throw new Error('Region is not tracked by this FreeRegionTracker.');
    }

    const { placed, children } = splitRegion(spacing, box, region, splitVertically);
    this.regions.splice(index, 1);
    this.regions.push(...children);
    return placed;
  }
}
