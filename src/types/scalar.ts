/**
 * Core types for dimensional quantities.
 *
 * Every coordinate and extent handled by the packer is a Scalar tagged with a
 * phantom unit. Two scalars of different units cannot be combined without an
 * explicit conversion, so pixel sizes never leak into, say, millimetre layouts.
 */

export declare const unitTag: unique symbol;

/**
 * A finite signed number carrying a compile-time unit tag.
 * Defaults to pixels, the unit used by the sprite atlas tooling.
 */
export type Scalar<U extends string = 'px'> = number & { readonly [unitTag]: U };

function isFiniteNumber<U extends string>(value: number): value is Scalar<U> {
  return Number.isFinite(value);
}

/**
 * Tags a plain number with a unit.
 * Throws a RangeError for NaN and infinities: unbounded extents are modelled by
 * `Length`, never by an infinite scalar.
 */
export function scalar<U extends string = 'px'>(value: number): Scalar<U> {
  if (!isFiniteNumber<U>(value)) {
    throw new RangeError(`Scalar must be a finite number, got ${String(value)}.`);
  }
  return value;
}

/**
 * Shorthand for a pixel quantity.
 */
export function px(value: number): Scalar<'px'> {
  return scalar<'px'>(value);
}

export function zero<U extends string = 'px'>(): Scalar<U> {
  return scalar<U>(0);
}

export function add<U extends string>(a: Scalar<U>, b: Scalar<U>): Scalar<U> {
  return scalar<U>(a + b);
}

export function sub<U extends string>(a: Scalar<U>, b: Scalar<U>): Scalar<U> {
  return scalar<U>(a - b);
}

export function abs<U extends string>(a: Scalar<U>): Scalar<U> {
  return scalar<U>(Math.abs(a));
}

export function max<U extends string>(a: Scalar<U>, b: Scalar<U>): Scalar<U> {
  return a >= b ? a : b;
}

export function min<U extends string>(a: Scalar<U>, b: Scalar<U>): Scalar<U> {
  return a <= b ? a : b;
}

/**
 * Three-way comparison: negative if a < b, positive if a > b, 0 if equal.
 */
export function compareScalars<U extends string>(a: Scalar<U>, b: Scalar<U>): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function isZero<U extends string>(a: Scalar<U>): boolean {
  return a === 0;
}
