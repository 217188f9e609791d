import { type Scalar, sub } from './scalar.js';

/**
 * An extent that is either a finite, non-negative Scalar or explicitly unbounded.
 * Only free regions carry lengths; boxes always have finite extents.
 */
export type Length<U extends string = 'px'> =
  | { readonly kind: 'finite'; readonly value: Scalar<U> }
  | { readonly kind: 'unbounded' };

export function finite<U extends string>(value: Scalar<U>): Length<U> {
  return { kind: 'finite', value };
}

export function unbounded<U extends string = 'px'>(): Length<U> {
  return { kind: 'unbounded' };
}

export function isUnbounded<U extends string>(length: Length<U>): length is { readonly kind: 'unbounded' } {
  return length.kind === 'unbounded';
}

/**
 * Subtracts `amount` from a length. Unbounded minus anything stays unbounded.
 */
export function shrink<U extends string>(length: Length<U>, amount: Scalar<U>): Length<U> {
  if (length.kind === 'unbounded') return length;
  return finite(sub(length.value, amount));
}

/**
 * True when the length can hold `required`. Unbounded always fits.
 */
export function fits<U extends string>(length: Length<U>, required: Scalar<U>): boolean {
  if (length.kind === 'unbounded') return true;
  return length.value >= required;
}

/**
 * True when the length still describes a usable extent.
 */
export function isPositive<U extends string>(length: Length<U>): boolean {
  if (length.kind === 'unbounded') return true;
  return length.value > 0;
}
