import { ExposureClient } from '../src/client';
import { NonFiniteValueError, ValidationError } from '../src/errors';
import { Fraction } from '../src/utils/math';

describe('ApertureModule', () => {
  const aperture = new ExposureClient().aperture;

  describe('fstopToStop', () => {
    it.each<[number, string]>([
      [1.4, '1/1'],
      [22, '9/1'],
      [1.7, '3/2'],
      [1.6, '4/3'],
      [1.8, '5/3'],
      [2, '2/1'],
      [8, '6/1'],
    ])('f/%f is stop %s', (fstop, stop) => {
      expect(aperture.fstopToStop(fstop).toString()).toBe(stop);
    });

    it('uses the configured stop precision', () => {
      const fine = new ExposureClient({ stopPrecision: 0.01 }).aperture;
      expect(fine.fstopToStop(1.8).toString()).toBe('17/10');
    });

    it('rejects impossible f-numbers', () => {
      expect(() => aperture.fstopToStop(0)).toThrow(ValidationError);
      expect(() => aperture.fstopToStop(-1.4)).toThrow(ValidationError);
      expect(() => aperture.fstopToStop(Number.NaN)).toThrow(NonFiniteValueError);
    });
  });

  describe('stopToFstop', () => {
    it('floors to two significant digits', () => {
      expect(aperture.stopToFstop(new Fraction(1))).toBe(1.4);
      expect(aperture.stopToFstop(new Fraction(5, 3))).toBe(1.7);
      expect(aperture.stopToFstop(new Fraction(9))).toBe(22);
      expect(aperture.stopToFstop(new Fraction(3))).toBe(2.8);
    });

    it('uses the configured significant digits', () => {
      const precise = new ExposureClient({ fstopSignificantDigits: 3 }).aperture;
      expect(precise.stopToFstop(new Fraction(1))).toBe(1.41);
    });

    it('exposes the unrounded value', () => {
      expect(aperture.stopToPreciseFstop(new Fraction(1))).toBe(Math.SQRT2);
    });
  });

  describe('fromFstop', () => {
    it('bundles stop, display and precise values', () => {
      const value = aperture.fromFstop(1.8);
      expect(value.stop.toString()).toBe('5/3');
      expect(value.fstop).toBe(1.7);
      expect(value.precise).toBe(Math.SQRT2 ** (5 / 3));
    });
  });

  describe('fromFocalLengthAndDiameter', () => {
    it('divides focal length by diameter', () => {
      const value = aperture.fromFocalLengthAndDiameter(10, 5);
      expect(value.stop.toString()).toBe('2/1');
      expect(value.fstop).toBe(2);
      expect(aperture.format(value)).toBe('f/2');
    });

    it('rejects a zero diameter', () => {
      expect(() => aperture.fromFocalLengthAndDiameter(50, 0)).toThrow(ValidationError);
    });
  });
});
