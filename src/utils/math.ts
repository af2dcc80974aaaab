import { MalformedTextError, ValidationError, ZeroDenominatorError } from '../errors';
import { Ordering, Result } from '../types/common';
import { gcd } from './gcd';
import { attempt } from './result';
import { MediantSearchOptions, searchMediant } from './stern-brocot';
import { validateFinite, validatePositive, validatePositiveInteger } from './validation';

export type FractionLike = Fraction | bigint | number | string;

const INTEGER_PATTERN = /^[+-]?\d+$/;

function toBigInt(value: bigint | number | string, name: string): bigint {
  if (typeof value === 'bigint') return value;
  if (typeof value === 'number') {
    if (!Number.isSafeInteger(value)) {
      throw new ValidationError(`${name} must be a safe integer, got ${value}`, { name, value });
    }
    return BigInt(value);
  }
  if (!INTEGER_PATTERN.test(value)) {
    throw new ValidationError(`${name} must be an integer, got "${value}"`, { name, value });
  }
  return BigInt(value);
}

function abs(value: bigint): bigint {
  return value < 0n ? -value : value;
}

// floor division for a positive divisor
function floorDiv(numerator: bigint, denominator: bigint): bigint {
  const quotient = numerator / denominator;
  return numerator % denominator !== 0n && numerator < 0n ? quotient - 1n : quotient;
}

/**
 * Exact signed rational number.
 *
 * The sign always lives on the numerator and the denominator is always
 * positive. The pair is kept as given, unreduced; equality, ordering and
 * `toString` work on a reduced copy.
 */
export class Fraction {
  public readonly numerator: bigint;
  public readonly denominator: bigint;

  /**
   * @throws ZeroDenominatorError when the denominator is zero
   */
  constructor(numerator: bigint | number | string, denominator: bigint | number | string = 1n) {
    const num = toBigInt(numerator, 'numerator');
    const den = toBigInt(denominator, 'denominator');
    if (den === 0n) {
      throw new ZeroDenominatorError(num);
    }
    const sign = den < 0n ? -1n : 1n;
    this.numerator = num * sign;
    this.denominator = den * sign;
  }

  /**
   * Parse `"<int>/<int>"`, e.g. `"-3/4"` or `"10/+5"`.
   *
   * @throws MalformedTextError for anything but exactly one `/` between two integers
   * @throws ZeroDenominatorError for `"n/0"`
   */
  public static parse(text: string): Fraction {
    const parts = text.split('/');
    if (parts.length !== 2) {
      throw new MalformedTextError(text, 'expected exactly one "/" separator');
    }
    const [numerator, denominator] = parts;
    if (!INTEGER_PATTERN.test(numerator)) {
      throw new MalformedTextError(text, `numerator "${numerator}" is not an integer`);
    }
    if (!INTEGER_PATTERN.test(denominator)) {
      throw new MalformedTextError(text, `denominator "${denominator}" is not an integer`);
    }
    return new Fraction(BigInt(numerator), BigInt(denominator));
  }

  public static tryParse(text: string): Result<Fraction> {
    return attempt(() => Fraction.parse(text));
  }

  /**
   * Simplest fraction within `tolerance` of `value`.
   *
   * The integer part is split off first. A fractional part closer than
   * `tolerance` to 0 or 1 rounds to the neighbouring integer; otherwise the
   * fractional part is found by a Stern-Brocot search.
   *
   * @example
   * Fraction.fromFloat(3.1415926, 0.01).toString(); // "22/7"
   */
  public static fromFloat(
    value: number,
    tolerance: number,
    options: MediantSearchOptions = {},
  ): Fraction {
    validateFinite(value, 'value');
    validatePositive(tolerance, 'tolerance');

    const whole = Math.floor(value);
    const frac = value - whole;
    const integerPart = BigInt(whole);

    if (frac < tolerance) {
      return new Fraction(integerPart, 1n);
    }
    if (frac > 1 - tolerance) {
      return new Fraction(integerPart + 1n, 1n);
    }

    const mediant = searchMediant(frac, tolerance, options);
    const denominator = BigInt(mediant.denominator);
    return new Fraction(integerPart * denominator + BigInt(mediant.numerator), denominator);
  }

  public static tryFromFloat(
    value: number,
    tolerance: number,
    options: MediantSearchOptions = {},
  ): Result<Fraction> {
    return attempt(() => Fraction.fromFloat(value, tolerance, options));
  }

  private static from(other: FractionLike): Fraction {
    return other instanceof Fraction ? other : new Fraction(other);
  }

  /**
   * Returns a new Fraction that is equal to this one, but in lowest terms.
   */
  public reduce(): Fraction {
    const divisor = gcd(abs(this.numerator), this.denominator);
    return new Fraction(this.numerator / divisor, this.denominator / divisor);
  }

  public toFloat(): number {
    return Number(this.numerator) / Number(this.denominator);
  }

  public isInteger(): boolean {
    return this.reduce().denominator === 1n;
  }

  public toString(): string {
    const reduced = this.reduce();
    return `${reduced.numerator}/${reduced.denominator}`;
  }

  public toJSON(): string {
    return this.toString();
  }

  public equals(other: FractionLike): boolean {
    const a = this.reduce();
    const b = Fraction.from(other).reduce();
    return a.numerator === b.numerator && a.denominator === b.denominator;
  }

  public compare(other: FractionLike): Ordering {
    const rhs = Fraction.from(other);
    const left = this.numerator * rhs.denominator;
    const right = rhs.numerator * this.denominator;
    if (left < right) return -1;
    if (left > right) return 1;
    return 0;
  }

  public lessThan(other: FractionLike): boolean {
    return this.compare(other) < 0;
  }

  public lessThanOrEqual(other: FractionLike): boolean {
    return this.compare(other) <= 0;
  }

  public greaterThan(other: FractionLike): boolean {
    return this.compare(other) > 0;
  }

  public greaterThanOrEqual(other: FractionLike): boolean {
    return this.compare(other) >= 0;
  }

  public add(other: FractionLike): Fraction {
    const rhs = Fraction.from(other);
    return new Fraction(
      this.numerator * rhs.denominator + rhs.numerator * this.denominator,
      this.denominator * rhs.denominator
    );
  }

  public sub(other: FractionLike): Fraction {
    const rhs = Fraction.from(other);
    return new Fraction(
      this.numerator * rhs.denominator - rhs.numerator * this.denominator,
      this.denominator * rhs.denominator
    );
  }

  public multiply(other: FractionLike): Fraction {
    const rhs = Fraction.from(other);
    return new Fraction(this.numerator * rhs.numerator, this.denominator * rhs.denominator);
  }

  /**
   * @throws ZeroDenominatorError when `other` is zero
   */
  public divide(other: FractionLike): Fraction {
    const rhs = Fraction.from(other);
    return new Fraction(this.numerator * rhs.denominator, this.denominator * rhs.numerator);
  }

  public negate(): Fraction {
    return new Fraction(-this.numerator, this.denominator);
  }

  public abs(): Fraction {
    return new Fraction(abs(this.numerator), this.denominator);
  }

  public invert(): Fraction {
    return new Fraction(this.denominator, this.numerator);
  }

  /**
   * Closest fraction whose denominator does not exceed `maxDenominator`.
   *
   * @example
   * Fraction.parse('314159265/100000000').limitDenominator(10).toString(); // "22/7"
   */
  public limitDenominator(maxDenominator: bigint | number): Fraction {
    validatePositiveInteger(maxDenominator, 'maxDenominator');
    const max = BigInt(maxDenominator);
    const reduced = this.reduce();
    if (reduced.denominator <= max) return reduced;

    let p0 = 0n;
    let q0 = 1n;
    let p1 = 1n;
    let q1 = 0n;
    let n = reduced.numerator;
    let d = reduced.denominator;

    for (;;) {
      const a = floorDiv(n, d);
      const q2 = q0 + a * q1;
      if (q2 > max) break;
      [p0, q0, p1, q1] = [p1, q1, p0 + a * p1, q2];
      [n, d] = [d, n - a * d];
    }

    // p1/q1 is the last convergent; the semiconvergent below is the other candidate
    const k = (max - q0) / q1;
    if (2n * d * (q0 + k * q1) <= reduced.denominator) {
      return new Fraction(p1, q1);
    }
    return new Fraction(p0 + k * p1, q0 + k * q1);
  }
}
