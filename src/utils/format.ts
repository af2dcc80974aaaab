import { validatePositive, validatePositiveInteger } from './validation';

/**
 * Floor a positive number to `significantDigits` significant digits.
 *
 * @example
 * floorSignificant(1234, 2);   // 1200
 * floorSignificant(0.1234, 3); // 0.123
 */
export function floorSignificant(value: number, significantDigits: number): number {
  validatePositive(value, 'value');
  validatePositiveInteger(significantDigits, 'significantDigits');

  const digitsBeforePoint = Math.floor(Math.log10(value));
  const exponent = significantDigits - 1 - digitsBeforePoint;

  // divide by the power rather than multiply by its inverse: 17 / 10 is exactly 1.7
  if (exponent >= 0) {
    const scale = 10 ** exponent;
    return Math.floor(value * scale) / scale;
  }
  const scale = 10 ** -exponent;
  return Math.floor(value / scale) * scale;
}
