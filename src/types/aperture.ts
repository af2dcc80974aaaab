import { Fraction } from '../utils/math';

/**
 * An aperture expressed both as a rational stop and as an f-number.
 */
export interface ApertureValue {
  /** Stops above f/1, snapped to a simple fraction */
  stop: Fraction;
  /** Display f-number, floored to the configured significant digits */
  fstop: number;
  /** Unrounded f-number, √2 raised to the stop */
  precise: number;
}
