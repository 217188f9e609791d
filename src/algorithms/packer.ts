import { type Scalar, abs, add, sub, max, zero, scalar, compareScalars } from '../types/scalar.js';
import { type Box, type PlacedBox, type PackedBoxes } from '../types/box.js';
import { type PackConfig, resolvePackConfig, seedExtent } from '../types/config.js';
import { FreeRegionTracker } from './free-regions.js';
import * as errors from '../errors.js';

/**
 * A box that no free region could hold. Only reachable when a maximum
 * container size is configured.
 */
export interface UnplaceableBox<T, U extends string = 'px'> {
  kind: 'unplaceable_box';
  box: Box<T, U>;
  /** How many boxes had been placed before this one was rejected. */
  placedCount: number;
}

export type PackResult<T, U extends string = 'px'> =
  | { ok: true; packed: PackedBoxes<T, U> }
  | { ok: false; error: UnplaceableBox<T, U> };

/**
 * Thrown by `pack` when a box cannot be placed. The label in the message is the
 * 1-based position of the box in placement order.
 */
export class UnplaceableBoxError<T, U extends string = 'px'> extends Error {
  readonly box: Box<T, U>;
  readonly placedCount: number;

  constructor(failure: UnplaceableBox<T, U>) {
    super(
      errors.messageOf(
        errors.unplaceableBox(`#${String(failure.placedCount + 1)}`, abs(failure.box.width), abs(failure.box.height)),
      ),
    );
    this.name = 'UnplaceableBoxError';
    this.box = failure.box;
    this.placedCount = failure.placedCount;
  }
}

/**
 * Largest-first ordering.
 *
 * A box that is at least as large in both absolute dimensions (and larger in one)
 * comes first. When neither dominates, the larger absolute area comes first.
 * Returns 0 for boxes of equal rank so a stable sort keeps input order.
 */
export function compareBoxes<T, U extends string>(a: Box<T, U>, b: Box<T, U>): number {
  const aw = abs(a.width);
  const ah = abs(a.height);
  const bw = abs(b.width);
  const bh = abs(b.height);

  const byWidth = compareScalars(bw, aw);
  const byHeight = compareScalars(bh, ah);

  if (byWidth === byHeight) return byWidth;
  if (byWidth === 0) return byHeight;
  if (byHeight === 0) return byWidth;

  return Math.sign(bw * bh - aw * ah);
}

/**
 * Smallest power of two ≥ value. Zero (and anything below) maps to zero.
 */
export function nextPowerOfTwo<U extends string>(value: Scalar<U>): Scalar<U> {
  if (value <= 0) return zero<U>();
  let size = 1;
  while (size < value) {
    size *= 2;
  }
  return scalar<U>(size);
}

/**
 * Fraction of the container covered by placed boxes, in [0, 1].
 * An empty container counts as fully used.
 */
export function packingEfficiency<T, U extends string>(packed: PackedBoxes<T, U>): number {
  const containerArea = packed.width * packed.height;
  if (containerArea === 0) return 1;

  let placedArea = 0;
  for (const box of packed.boxes) {
    placedArea += box.width * box.height;
  }
  return placedArea / containerArea;
}

/**
 * Packs boxes into a small container using a best-fit guillotine heuristic.
 *
 * Boxes are placed largest-first. Each one goes into the free region that
 * leaves the least leftover space, and that region is split into up to two
 * children around the placed footprint (grown by `spacing` on its right and top
 * edges). The split direction alternates from one placement to the next.
 *
 * Returns a failure variant instead of dropping a box; with the default
 * unbounded container the failure branch cannot occur.
 */
export function packBoxes<T, U extends string = 'px'>(config: PackConfig<U>, boxes: ReadonlyArray<Box<T, U>>): PackResult<T, U> {
  const resolved = resolvePackConfig(config);
  const { spacing } = resolved;

  const sorted = [...boxes].sort(compareBoxes);

  const tracker = new FreeRegionTracker<U>({
    x: zero<U>(),
    y: zero<U>(),
    width: seedExtent(resolved.maximumWidth, spacing),
    height: seedExtent(resolved.maximumHeight, spacing),
  });

  const placed: PlacedBox<T, U>[] = [];
  let width = zero<U>();
  let height = zero<U>();

  for (const box of sorted) {
    const region = tracker.findBestRegion(spacing, box);
    if (region === undefined) {
      return { ok: false, error: { kind: 'unplaceable_box', box, placedCount: placed.length } };
    }

    const splitVertically = placed.length % 2 === 1;
    const placement = tracker.placeAndSplit(spacing, box, region, splitVertically);
    placed.push(placement);

    width = max(width, add(add(placement.x, placement.width), spacing));
    height = max(height, add(add(placement.y, placement.height), spacing));
  }

  // Spacing is reserved behind every box but is not an outer margin.
  let finalWidth = max(sub(width, spacing), zero<U>());
  let finalHeight = max(sub(height, spacing), zero<U>());

  finalWidth = max(finalWidth, resolved.minimumWidth);

  if (resolved.powerOfTwoSize) {
    finalWidth = nextPowerOfTwo(finalWidth);
    finalHeight = nextPowerOfTwo(finalHeight);
  }

  return {
    ok: true,
    packed: { width: finalWidth, height: finalHeight, boxes: placed },
  };
}

/**
 * Same as `packBoxes`, but returns the packing directly.
 * Throws UnplaceableBoxError when a maximum container size leaves a box without room.
 */
export function pack<T, U extends string = 'px'>(config: PackConfig<U>, boxes: ReadonlyArray<Box<T, U>>): PackedBoxes<T, U> {
  const result = packBoxes(config, boxes);
  if (!result.ok) {
    throw new UnplaceableBoxError(result.error);
  }
  return result.packed;
}
