import { Logger } from './types/common';

/**
 * Exposure client configuration.
 */
export interface ExposureConfig {
  /** Optional logger for search and conversion instrumentation. */
  logger?: Logger;
  /** Default tolerance for `ExposureClient.approximate` */
  tolerance?: number;
  /** Tolerance used when snapping a stop value to a fraction */
  stopPrecision?: number;
  /** Significant digits kept when displaying an f-number */
  fstopSignificantDigits?: number;
  /** Largest denominator the mediant search may reach before giving up */
  maxSearchDenominator?: number;
}

/**
 * Default configuration values.
 */
export const DEFAULTS = {
  tolerance: 1e-6,
  stopPrecision: 0.1,
  fstopSignificantDigits: 2,
  maxSearchDenominator: Number.MAX_SAFE_INTEGER,
} as const;

/**
 * Configuration after defaults have been applied.
 */
export type ResolvedExposureConfig = ExposureConfig &
  Required<Omit<ExposureConfig, 'logger'>>;
