/**
 * Core types for packing input and output.
 *
 * A Box is what the caller asks to place; a PlacedBox is where it ended up.
 * The payload `data` is carried through untouched: the packer never compares,
 * hashes or inspects it.
 */

import { type Scalar } from './scalar.js';

/**
 * A rectangle request. Width and height may be negative or zero;
 * the absolute value is the footprint that gets placed.
 */
export interface Box<T, U extends string = 'px'> {
  readonly width: Scalar<U>;
  readonly height: Scalar<U>;
  readonly data: T;
}

/**
 * A box after placement. Position and extents are never negative.
 */
export interface PlacedBox<T, U extends string = 'px'> {
  readonly x: Scalar<U>;
  readonly y: Scalar<U>;
  readonly width: Scalar<U>;
  readonly height: Scalar<U>;
  readonly data: T;
}

/**
 * The container size and every placement, in placement order.
 */
export interface PackedBoxes<T, U extends string = 'px'> {
  readonly width: Scalar<U>;
  readonly height: Scalar<U>;
  readonly boxes: ReadonlyArray<PlacedBox<T, U>>;
}

/**
 * Anything with a position and an extent. Every PlacedBox qualifies.
 */
export interface RectLike {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
}
