import { ExposureClient } from '../src/client';
import { DEFAULTS } from '../src/config';
import { NonFiniteValueError, PrecisionError, ValidationError } from '../src/errors';
import { ApertureModule } from '../src/modules/aperture';

describe('ExposureClient', () => {
  describe('configuration', () => {
    it('applies defaults', () => {
      const client = new ExposureClient();
      expect(client.config.tolerance).toBe(DEFAULTS.tolerance);
      expect(client.config.stopPrecision).toBe(0.1);
      expect(client.config.fstopSignificantDigits).toBe(2);
      expect(client.config.maxSearchDenominator).toBe(Number.MAX_SAFE_INTEGER);
      expect(client.config.logger).toBeUndefined();
    });

    it('keeps caller overrides', () => {
      const client = new ExposureClient({ tolerance: 0.01, stopPrecision: 0.05 });
      expect(client.config.tolerance).toBe(0.01);
      expect(client.config.stopPrecision).toBe(0.05);
    });

    it('falls back to defaults for explicit undefined', () => {
      const client = new ExposureClient({ stopPrecision: undefined });
      expect(client.config.stopPrecision).toBe(DEFAULTS.stopPrecision);
    });

    it('rejects invalid values', () => {
      expect(() => new ExposureClient({ stopPrecision: 0 })).toThrow(ValidationError);
      expect(() => new ExposureClient({ tolerance: Number.NaN })).toThrow(NonFiniteValueError);
      expect(() => new ExposureClient({ fstopSignificantDigits: 1.5 })).toThrow(ValidationError);
      expect(() => new ExposureClient({ maxSearchDenominator: 0 })).toThrow(ValidationError);
    });
  });

  describe('aperture', () => {
    it('returns a singleton module', () => {
      const client = new ExposureClient();
      expect(client.aperture).toBeInstanceOf(ApertureModule);
      expect(client.aperture).toBe(client.aperture);
    });
  });

  describe('approximate', () => {
    it('uses the configured tolerance by default', () => {
      expect(new ExposureClient().approximate(Math.PI).toString()).toBe('355/113');
      expect(new ExposureClient({ tolerance: 0.01 }).approximate(Math.PI).toString()).toBe('22/7');
    });

    it('accepts an explicit tolerance', () => {
      expect(new ExposureClient().approximate(Math.PI, 0.01).toString()).toBe('22/7');
    });

    it('honours the search denominator limit', () => {
      const client = new ExposureClient({ maxSearchDenominator: 100 });
      expect(() => client.approximate(Math.PI, 0.00001)).toThrow(PrecisionError);
    });
  });

  describe('parse', () => {
    it('returns a successful result', () => {
      const result = new ExposureClient().parse('10/4');
      expect(result.success).toBe(true);
      expect(result.data?.toString()).toBe('5/2');
    });

    it('returns a failed result for malformed text', () => {
      const result = new ExposureClient().parse('1/x');
      expect(result.success).toBe(false);
      expect(result.error?.code).toBe('MALFORMED_TEXT');
      expect(result.error?.message).toBe('Malformed fraction "1/x": denominator "x" is not an integer');
    });
  });
});
