import { DEFAULTS, ExposureConfig, ResolvedExposureConfig } from './config';
import { ApertureModule } from './modules/aperture';
import { Result } from './types/common';
import { Fraction } from './utils/math';
import { validatePositive, validatePositiveInteger } from './utils/validation';

/**
 * Main entry point for exposure calculations.
 *
 * Holds the shared configuration (tolerances, display precision, logger)
 * and hands it to the conversion modules.
 */
export class ExposureClient {
  readonly config: ResolvedExposureConfig;

  private _aperture: ApertureModule | null = null;

  constructor(config: ExposureConfig = {}) {
    this.config = {
      ...config,
      tolerance: config.tolerance ?? DEFAULTS.tolerance,
      stopPrecision: config.stopPrecision ?? DEFAULTS.stopPrecision,
      fstopSignificantDigits: config.fstopSignificantDigits ?? DEFAULTS.fstopSignificantDigits,
      maxSearchDenominator: config.maxSearchDenominator ?? DEFAULTS.maxSearchDenominator,
    };

    validatePositive(this.config.tolerance, 'tolerance');
    validatePositive(this.config.stopPrecision, 'stopPrecision');
    validatePositiveInteger(this.config.fstopSignificantDigits, 'fstopSignificantDigits');
    validatePositiveInteger(this.config.maxSearchDenominator, 'maxSearchDenominator');

    this.config.logger?.info('ExposureClient: configured', {
      tolerance: this.config.tolerance,
      stopPrecision: this.config.stopPrecision,
      fstopSignificantDigits: this.config.fstopSignificantDigits,
    });
  }

  /**
   * Access the aperture module (singleton).
   */
  get aperture(): ApertureModule {
    if (!this._aperture) {
      this._aperture = new ApertureModule(this);
    }
    return this._aperture;
  }

  /**
   * Best fraction for `value` within `tolerance` (the configured default
   * when omitted).
   */
  approximate(value: number, tolerance: number = this.config.tolerance): Fraction {
    return Fraction.fromFloat(value, tolerance, {
      logger: this.config.logger,
      maxSearchDenominator: this.config.maxSearchDenominator,
    });
  }

  /**
   * Parse user-supplied `"<int>/<int>"` text without throwing.
   */
  parse(text: string): Result<Fraction> {
    const result = Fraction.tryParse(text);
    if (!result.success) {
      this.config.logger?.error('parse: rejected input', result.error);
    }
    return result;
  }
}
