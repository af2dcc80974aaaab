/**
 * Typed error hierarchy for the fraction toolkit.
 *
 * All errors extend FractionError and carry a machine-readable
 * error code for programmatic handling plus human-readable messages.
 */

/**
 * Base error class for all toolkit errors.
 */
export class FractionError extends Error {
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(
    code: string,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "FractionError";
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * A fraction was built with a zero denominator, directly or by
 * dividing by / inverting a zero value.
 */
export class ZeroDenominatorError extends FractionError {
  constructor(numerator: bigint) {
    super(
      "ZERO_DENOMINATOR",
      `Tried to create a fraction with a denominator of 0 (numerator: ${numerator})`,
      { numerator: numerator.toString() },
    );
    this.name = "ZeroDenominatorError";
  }
}

/**
 * Text that is not of the form "<int>/<int>".
 */
export class MalformedTextError extends FractionError {
  readonly text: string;

  constructor(text: string, reason: string) {
    super("MALFORMED_TEXT", `Malformed fraction "${text}": ${reason}`, {
      text,
      reason,
    });
    this.name = "MalformedTextError";
    this.text = text;
  }
}

/**
 * NaN or an infinity where a finite number is required.
 */
export class NonFiniteValueError extends FractionError {
  constructor(name: string, value: number) {
    super("NON_FINITE_VALUE", `${name} must be a finite number, got ${value}`, {
      name,
      value: String(value),
    });
    this.name = "NonFiniteValueError";
  }
}

/**
 * The mediant search left the range where numbers are exact integers.
 */
export class PrecisionError extends FractionError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("PRECISION_EXCEEDED", message, details);
    this.name = "PrecisionError";
  }
}

/**
 * Invalid input parameters.
 */
export class ValidationError extends FractionError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("VALIDATION_ERROR", message, details);
    this.name = "ValidationError";
  }
}

/**
 * Map a raw error to the appropriate typed error class.
 *
 * Errors that already belong to the hierarchy pass through untouched.
 * Anything else is classified from its message, falling back to a
 * generic FractionError with the original error preserved in details.
 */
export function mapError(err: unknown): FractionError {
  if (err instanceof FractionError) return err;

  const message = err instanceof Error ? err.message : String(err);
  const normalizedMessage = message.toLowerCase();

  if (
    normalizedMessage.includes("division by zero") ||
    normalizedMessage.includes("denominator of 0") ||
    normalizedMessage.includes("zero denominator")
  ) {
    return new ZeroDenominatorError(0n);
  }

  // BigInt("1.5") and friends
  if (err instanceof SyntaxError && normalizedMessage.includes("bigint")) {
    return new ValidationError(message, { originalError: err });
  }
  if (err instanceof RangeError) {
    return new ValidationError(message, { originalError: err });
  }

  if (
    normalizedMessage.includes("nan") ||
    normalizedMessage.includes("infinity") ||
    normalizedMessage.includes("not finite")
  ) {
    return new ValidationError(message, { originalError: err });
  }

  if (
    normalizedMessage.includes("invalid") ||
    normalizedMessage.includes("must be")
  ) {
    return new ValidationError(message);
  }

  return new FractionError("UNKNOWN_ERROR", message, {
    originalError: err,
  });
}
