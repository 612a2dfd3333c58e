import { RawTrackingRecord } from '../dto/space-track-record.dto';

/**
 * Earth's standard gravitational parameter, mu = GM (km^3 / s^2).
 * WGS-84 value.
 */
export const MU_EARTH = 398600.4418;

/** Mean Earth radius (km) */
export const EARTH_RADIUS = 6371;

const SECONDS_PER_DAY = 86400;

export type RiskLevel = 'LOW' | 'MEDIUM' | 'HIGH';
export type OrbitType = 'LEO' | 'MEO' | 'GEO';

export type Derived<T> = { ok: true; value: T } | { ok: false; reason: string };

const NUMERIC = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Reads a numeric field the way Space-Track serves them (usually as strings).
 * An absent key counts as 0; null or non-numeric text is a conversion fault.
 */
export function readNumber(record: RawTrackingRecord, field: string): Derived<number> {
  const raw = record[field];
  if (raw === undefined) {
    return { ok: true, value: 0 };
  }
  if (typeof raw === 'number') {
    return Number.isNaN(raw)
      ? { ok: false, reason: `${field} is NaN` }
      : { ok: true, value: raw };
  }
  if (typeof raw === 'string' && NUMERIC.test(raw.trim())) {
    return { ok: true, value: Number(raw.trim()) };
  }
  return { ok: false, reason: `${field} is not numeric: ${JSON.stringify(raw)}` };
}

/** Rounds to the nearest integer, ties to even. */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * Altitude estimate (km):
 *   - mid-point of apogee and perigee when both are positive
 *   - otherwise Kepler's third law on the mean motion, a = (mu / n^2)^(1/3)
 *   - otherwise 0
 * A malformed field yields 0; a mid-point that overflows fails the record.
 */
export function altitude(record: RawTrackingRecord): Derived<number> {
  const apogee = readNumber(record, 'APOGEE');
  const perigee = readNumber(record, 'PERIGEE');
  const meanMotion = readNumber(record, 'MEAN_MOTION');
  if (!apogee.ok || !perigee.ok || !meanMotion.ok) {
    return { ok: true, value: 0 };
  }

  if (apogee.value > 0 && perigee.value > 0) {
    const midpoint = (apogee.value + perigee.value) / 2;
    return Number.isFinite(midpoint)
      ? { ok: true, value: roundHalfEven(midpoint) }
      : { ok: false, reason: 'APOGEE/PERIGEE mid-point is not finite' };
  }

  if (meanMotion.value > 0) {
    // rev/day -> rad/s
    const n = (meanMotion.value * 2 * Math.PI) / SECONDS_PER_DAY;
    const semiMajorAxis = Math.cbrt(MU_EARTH / (n * n));
    const km = semiMajorAxis - EARTH_RADIUS;
    return { ok: true, value: Number.isFinite(km) ? roundHalfEven(Math.max(km, 0)) : 0 };
  }

  return { ok: true, value: 0 };
}

/**
 * Simplified speed proxy: mean motion x 0.1, two decimals, ties to even.
 * Unlike the other derivations a malformed mean motion is not defaulted.
 */
export function velocity(record: RawTrackingRecord): Derived<number> {
  const meanMotion = readNumber(record, 'MEAN_MOTION');
  if (!meanMotion.ok) {
    return meanMotion;
  }
  const scaled = meanMotion.value * 0.1 * 100;
  if (!Number.isFinite(scaled)) {
    return { ok: false, reason: 'MEAN_MOTION is not finite' };
  }
  return { ok: true, value: roundHalfEven(scaled) / 100 };
}

export function riskLevel(record: RawTrackingRecord): RiskLevel {
  const meanMotion = readNumber(record, 'MEAN_MOTION');
  const eccentricity = readNumber(record, 'ECCENTRICITY');
  if (!meanMotion.ok || !eccentricity.ok) {
    return 'LOW';
  }

  if (meanMotion.value > 15 && eccentricity.value > 0.1) {
    return 'HIGH';
  }
  if (meanMotion.value > 12) {
    return 'MEDIUM';
  }
  return 'LOW';
}

/**
 * Orbit class by mean motion. "GEO" covers every slow orbit (<= 1 rev/day),
 * not only geostationary ones; the frontend relies on these three labels.
 */
export function orbitType(record: RawTrackingRecord): OrbitType {
  const meanMotion = readNumber(record, 'MEAN_MOTION');
  if (!meanMotion.ok) {
    return 'LEO';
  }

  if (meanMotion.value > 11) {
    return 'LEO';
  }
  if (meanMotion.value > 1) {
    return 'MEO';
  }
  return 'GEO';
}
