export { Fraction } from './utils/math';
export type { FractionLike } from './utils/math';
export { gcd } from './utils/gcd';
export { searchMediant } from './utils/stern-brocot';
export type { MediantSearchOptions, MediantSearchResult } from './utils/stern-brocot';
export { floorSignificant } from './utils/format';
export { attempt } from './utils/result';
export {
  FractionError,
  ZeroDenominatorError,
  MalformedTextError,
  NonFiniteValueError,
  PrecisionError,
  ValidationError,
  mapError,
} from './errors';
export type { Result, FractionErrorInfo, Logger, Ordering } from './types/common';
export type { ApertureValue } from './types/aperture';
export { ExposureClient } from './client';
export { ApertureModule } from './modules/aperture';
export { DEFAULTS } from './config';
export type { ExposureConfig, ResolvedExposureConfig } from './config';
