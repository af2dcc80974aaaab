import { NonFiniteValueError, ValidationError } from '../errors';

/**
 * Reject NaN and infinities.
 */
export function validateFinite(value: number, name: string): void {
  if (!Number.isFinite(value)) {
    throw new NonFiniteValueError(name, value);
  }
}

/**
 * Require a finite number strictly greater than zero.
 */
export function validatePositive(value: number, name: string): void {
  validateFinite(value, name);
  if (value <= 0) {
    throw new ValidationError(`${name} must be greater than zero, got ${value}`, {
      name,
      value,
    });
  }
}

/**
 * Require a positive whole number, given as a number or a bigint.
 */
export function validatePositiveInteger(value: number | bigint, name: string): void {
  if (typeof value === 'bigint') {
    if (value <= 0n) {
      throw new ValidationError(`${name} must be a positive integer, got ${value}`, {
        name,
        value: value.toString(),
      });
    }
    return;
  }
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new ValidationError(`${name} must be a positive integer, got ${value}`, {
      name,
      value,
    });
  }
}

/**
 * Require a non-negative bigint.
 */
export function validateNonNegative(value: bigint, name: string): void {
  if (value < 0n) {
    throw new ValidationError(`${name} must not be negative, got ${value}`, {
      name,
      value: value.toString(),
    });
  }
}
