import { type Scalar, max, zero, add } from './scalar.js';
import { type Length, finite, unbounded } from './length.js';

/**
 * Caller-facing packing options. Every field is optional.
 */
export interface PackConfig<U extends string = 'px'> {
  /** Gap reserved between adjacent boxes. Not applied as an outer margin. Default 0. */
  spacing?: Scalar<U>;
  /** Round the final width and height up to the next power of two. Default false. */
  powerOfTwoSize?: boolean;
  /** Floor on the container width, applied before rounding. Default 0. */
  minimumWidth?: Scalar<U>;
  /** Upper limit on the container width (before rounding). Default unbounded. */
  maximumWidth?: Scalar<U>;
  /** Upper limit on the container height (before rounding). Default unbounded. */
  maximumHeight?: Scalar<U>;
}

/**
 * A PackConfig with defaults filled in and negative values clamped.
 */
export interface ResolvedPackConfig<U extends string = 'px'> {
  spacing: Scalar<U>;
  powerOfTwoSize: boolean;
  minimumWidth: Scalar<U>;
  maximumWidth: Length<U>;
  maximumHeight: Length<U>;
}

function clampLimit<U extends string>(limit: Scalar<U> | undefined): Length<U> {
  return limit === undefined ? unbounded<U>() : finite(max(limit, zero<U>()));
}

/**
 * Applies defaults and clamps negative values to zero.
 * Configuration is never rejected.
 */
export function resolvePackConfig<U extends string = 'px'>(config: PackConfig<U> = {}): ResolvedPackConfig<U> {
  return {
    spacing: max(config.spacing ?? zero<U>(), zero<U>()),
    powerOfTwoSize: config.powerOfTwoSize ?? false,
    minimumWidth: max(config.minimumWidth ?? zero<U>(), zero<U>()),
    maximumWidth: clampLimit(config.maximumWidth),
    maximumHeight: clampLimit(config.maximumHeight),
  };
}

/**
 * Extent of the seed region for one axis: the configured limit plus the
 * trailing spacing the packer reserves behind every box.
 */
export function seedExtent<U extends string>(limit: Length<U>, spacing: Scalar<U>): Length<U> {
  return limit.kind === 'unbounded' ? limit : finite(add(limit.value, spacing));
}
