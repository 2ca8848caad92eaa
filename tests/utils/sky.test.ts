/**
 * Unit tests for the sky geometry helpers
 */
import {
  ARCMIN,
  ARCSEC,
  addScaled,
  angularSeparation,
  fromVector,
  normalizeRa,
  positionWeight,
  toDegrees,
  toUnitVector,
} from '../../src/utils/sky';

describe('sky helpers', () => {
  describe('normalizeRa', () => {
    it('wraps into [0, 360)', () => {
      expect(normalizeRa(360)).toBe(0);
      expect(normalizeRa(370)).toBe(10);
      expect(normalizeRa(-10)).toBe(350);
      expect(normalizeRa(123.5)).toBe(123.5);
    });
  });

  describe('angularSeparation', () => {
    it('is zero for identical positions', () => {
      expect(angularSeparation({ ra: 42, dec: -13 }, { ra: 42, dec: -13 })).toBe(0);
    });

    it('measures declination offsets directly', () => {
      expect(angularSeparation({ ra: 10, dec: 0 }, { ra: 10, dec: 1 })).toBeCloseTo(1, 10);
    });

    it('shrinks right-ascension offsets by cos(dec)', () => {
      const sep = angularSeparation({ ra: 0, dec: 60 }, { ra: 1, dec: 60 });
      expect(sep).toBeCloseTo(0.5, 4);
    });

    it('crosses the RA wrap without a jump', () => {
      expect(angularSeparation({ ra: 359.9, dec: 0 }, { ra: 0.1, dec: 0 })).toBeCloseTo(0.2, 8);
    });

    it('gives 180 degrees for antipodes', () => {
      expect(angularSeparation({ ra: 0, dec: 90 }, { ra: 0, dec: -90 })).toBeCloseTo(180, 8);
    });
  });

  describe('unit vectors', () => {
    it('round-trips a position', () => {
      const { ra, dec } = fromVector(toUnitVector(250.25, -33.5));
      expect(ra).toBeCloseTo(250.25, 10);
      expect(dec).toBeCloseTo(-33.5, 10);
    });

    it('averages across the RA wrap', () => {
      const sum = addScaled(toUnitVector(359, 0), toUnitVector(1, 0), 1);
      expect(angularSeparation(fromVector(sum), { ra: 0, dec: 0 })).toBeCloseTo(0, 8);
    });

    it('returns the origin for a zero vector', () => {
      expect(fromVector([0, 0, 0])).toEqual({ ra: 0, dec: 0 });
    });
  });

  describe('positionWeight', () => {
    it('is the inverse variance', () => {
      expect(positionWeight(0.5, 0.001)).toBe(4);
    });

    it('applies the floor', () => {
      expect(positionWeight(0, 0.5)).toBe(4);
    });
  });

  describe('toDegrees', () => {
    it('converts arcseconds, arcminutes and degrees', () => {
      expect(toDegrees(3600, 'arcsec')).toBeCloseTo(1, 10);
      expect(toDegrees(3, 'arcmin')).toBeCloseTo(3 * ARCMIN, 12);
      expect(toDegrees(2, 'deg')).toBe(2);
      expect(toDegrees(1, 'ARCSEC')).toBe(ARCSEC);
    });

    it('returns undefined for an unknown unit', () => {
      expect(toDegrees(1, 'furlong')).toBeUndefined();
    });
  });
});
