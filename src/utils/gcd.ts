import { validateNonNegative } from './validation';

/**
 * Greatest common divisor of two non-negative integers (binary / Stein).
 *
 * Common factors of two are stripped with shifts, then odd values are
 * reduced by halving their difference until the two meet.
 *
 * @example
 * gcd(12n, 18n); // 6n
 * gcd(0n, 5n);   // 5n
 */
export function gcd(a: bigint, b: bigint): bigint {
  validateNonNegative(a, 'a');
  validateNonNegative(b, 'b');

  if (a === b) return a;
  if (a === 0n) return b;
  if (b === 0n) return a;

  let shift = 0n;
  while (((a | b) & 1n) === 0n) {
    a >>= 1n;
    b >>= 1n;
    shift++;
  }

  while ((a & 1n) === 0n) a >>= 1n;

  // a is odd from here on
  while (b !== 0n) {
    while ((b & 1n) === 0n) b >>= 1n;
    if (a > b) {
      const t = a;
      a = b;
      b = t;
    }
    b -= a;
  }

  return a << shift;
}
