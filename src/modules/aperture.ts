import { ExposureClient } from '../client';
import { FractionError } from '../errors';
import { ApertureValue } from '../types/aperture';
import { floorSignificant } from '../utils/format';
import { Fraction } from '../utils/math';
import { validatePositive } from '../utils/validation';

/**
 * Aperture module -- converts f-numbers to rational stops and back.
 *
 * A stop counts halvings of the light passing through the lens relative
 * to f/1, so f-number = √2 ^ stop. Stops are snapped to simple fractions
 * (1/2, 1/3, ...) with the client's `stopPrecision`.
 */
export class ApertureModule {
  private client: ExposureClient;

  constructor(client: ExposureClient) {
    this.client = client;
  }

  /**
   * Convert an f-number to its stop value.
   *
   * @param fstop - The relative aperture, e.g. 1.4 for f/1.4
   * @returns The stop as a fraction
   * @example
   * client.aperture.fstopToStop(1.8).toString(); // "5/3"
   */
  fstopToStop(fstop: number): Fraction {
    const logger = this.client.config.logger;
    try {
      validatePositive(fstop, 'fstop');
      const exact = 2 * Math.log2(fstop);
      const stop = Fraction.fromFloat(exact, this.client.config.stopPrecision, {
        logger,
        maxSearchDenominator: this.client.config.maxSearchDenominator,
      });
      logger?.debug('fstopToStop: converted', { fstop, exact, stop: stop.toString() });
      return stop;
    } catch (err) {
      if (err instanceof FractionError) {
        logger?.error('fstopToStop: rejected input', err);
      }
      throw err;
    }
  }

  /**
   * √2 raised to the stop, without rounding.
   */
  stopToPreciseFstop(stop: Fraction): number {
    return Math.SQRT2 ** stop.toFloat();
  }

  /**
   * Convert a stop back to the f-number printed on a lens barrel.
   *
   * @example
   * client.aperture.stopToFstop(new Fraction(5, 3)); // 1.7
   */
  stopToFstop(stop: Fraction): number {
    return floorSignificant(
      this.stopToPreciseFstop(stop),
      this.client.config.fstopSignificantDigits,
    );
  }

  fromFstop(fstop: number): ApertureValue {
    const stop = this.fstopToStop(fstop);
    return {
      stop,
      fstop: this.stopToFstop(stop),
      precise: this.stopToPreciseFstop(stop),
    };
  }

  /**
   * Aperture of a lens from its focal length and entrance pupil diameter.
   *
   * @example
   * client.aperture.fromFocalLengthAndDiameter(10, 5).fstop; // 2
   */
  fromFocalLengthAndDiameter(focalLengthMm: number, diameterMm: number): ApertureValue {
    validatePositive(focalLengthMm, 'focalLengthMm');
    validatePositive(diameterMm, 'diameterMm');
    return this.fromFstop(focalLengthMm / diameterMm);
  }

  format(aperture: ApertureValue): string {
    return `f/${aperture.fstop}`;
  }
}
