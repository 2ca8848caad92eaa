/**
 * Spherical-astronomy helpers. All angles in degrees unless noted.
 */

const DEG = Math.PI / 180;

export type Vector3 = [number, number, number];

export function normalizeRa(ra: number): number {
  const wrapped = ra % 360;
  return wrapped < 0 ? wrapped + 360 : wrapped;
}

/**
 * Great-circle distance between two sky positions (haversine form, stable
 * for the sub-arcsecond separations notices routinely report).
 */
export function angularSeparation(
  a: { ra: number; dec: number },
  b: { ra: number; dec: number }
): number {
  const dec1 = a.dec * DEG;
  const dec2 = b.dec * DEG;
  const dDec = dec2 - dec1;
  const dRa = (b.ra - a.ra) * DEG;

  const h = Math.sin(dDec / 2) ** 2 + Math.cos(dec1) * Math.cos(dec2) * Math.sin(dRa / 2) ** 2;
  return (2 * Math.asin(Math.min(1, Math.sqrt(h)))) / DEG;
}

export function toUnitVector(ra: number, dec: number): Vector3 {
  const r = ra * DEG;
  const d = dec * DEG;
  return [Math.cos(d) * Math.cos(r), Math.cos(d) * Math.sin(r), Math.sin(d)];
}

/**
 * Direction of a (not necessarily unit) vector as RA/Dec
 */
export function fromVector([x, y, z]: Vector3): { ra: number; dec: number } {
  const norm = Math.sqrt(x * x + y * y + z * z);
  if (norm === 0) {
    return { ra: 0, dec: 0 };
  }
  const dec = Math.asin(Math.max(-1, Math.min(1, z / norm))) / DEG;
  const ra = normalizeRa(Math.atan2(y, x) / DEG);
  return { ra, dec };
}

/**
 * Inverse-variance weight of a positional uncertainty, with a floor so that
 * zero-error positions cannot dominate a centroid with infinite weight.
 */
export function positionWeight(errorRadius: number, floor: number): number {
  const sigma = Math.max(errorRadius, floor);
  return 1 / (sigma * sigma);
}

export function addScaled(sum: Vector3, v: Vector3, weight: number): Vector3 {
  return [sum[0] + v[0] * weight, sum[1] + v[1] * weight, sum[2] + v[2] * weight];
}

export const ARCSEC = 1 / 3600;
export const ARCMIN = 1 / 60;

/**
 * Convert an uncertainty expressed with a unit word to degrees
 */
export function toDegrees(value: number, unit: string): number | undefined {
  const u = unit.toLowerCase();
  if (u.startsWith('arcsec') || u === '"') return value * ARCSEC;
  if (u.startsWith('arcmin') || u === "'") return value * ARCMIN;
  if (u.startsWith('deg') || u === 'd') return value;
  return undefined;
}
