import {
  EARTH_RADIUS,
  MU_EARTH,
  altitude,
  orbitType,
  readNumber,
  riskLevel,
  roundHalfEven,
  velocity,
} from './orbital-derivations';

describe('readNumber', () => {
  it('treats an absent field as 0', () => {
    expect(readNumber({}, 'MEAN_MOTION')).toEqual({ ok: true, value: 0 });
  });

  it('parses numeric strings the way Space-Track serves them', () => {
    expect(readNumber({ MEAN_MOTION: ' 15.50096253 ' }, 'MEAN_MOTION')).toEqual({
      ok: true,
      value: 15.50096253,
    });
    expect(readNumber({ ECCENTRICITY: '1e-4' }, 'ECCENTRICITY')).toEqual({
      ok: true,
      value: 0.0001,
    });
  });

  it('rejects null, empty and non-numeric values', () => {
    expect(readNumber({ MEAN_MOTION: null }, 'MEAN_MOTION').ok).toBe(false);
    expect(readNumber({ MEAN_MOTION: '' }, 'MEAN_MOTION').ok).toBe(false);
    expect(readNumber({ MEAN_MOTION: 'fast' }, 'MEAN_MOTION').ok).toBe(false);
    expect(readNumber({ MEAN_MOTION: '0x10' }, 'MEAN_MOTION').ok).toBe(false);
  });
});

describe('roundHalfEven', () => {
  it('rounds ties to the even neighbour', () => {
    expect(roundHalfEven(414.5)).toBe(414);
    expect(roundHalfEven(415.5)).toBe(416);
    expect(roundHalfEven(0.5)).toBe(0);
  });

  it('rounds everything else to the nearest integer', () => {
    expect(roundHalfEven(423.86)).toBe(424);
    expect(roundHalfEven(574.03)).toBe(574);
  });
});

describe('altitude', () => {
  it('averages apogee and perigee when both are positive', () => {
    expect(altitude({ APOGEE: 420, PERIGEE: 410, MEAN_MOTION: 15.5 })).toEqual({ ok: true, value: 415 });
    expect(altitude({ APOGEE: '800', PERIGEE: '780', MEAN_MOTION: '2' })).toEqual({ ok: true, value: 790 });
  });

  it('falls back to the mean motion when apogee or perigee is missing', () => {
    expect(altitude({ MEAN_MOTION: 15.5 })).toEqual({ ok: true, value: 424 });
    expect(altitude({ MEAN_MOTION: '15.0', APOGEE: '600' })).toEqual({ ok: true, value: 574 });
    expect(altitude({ MEAN_MOTION: 2, APOGEE: 0, PERIGEE: 0 })).toEqual({ ok: true, value: 20239 });
  });

  it('matches the closed form for a mean-motion-only record', () => {
    const m = 14.2;
    const n = (m * 2 * Math.PI) / 86400;
    const expected = Math.round(Math.cbrt(MU_EARTH / (n * n)) - EARTH_RADIUS);
    expect(altitude({ MEAN_MOTION: m })).toEqual({ ok: true, value: expected });
    expect(expected).toBe(832);
  });

  it('floors below-surface estimates at 0', () => {
    expect(altitude({ MEAN_MOTION: 18 })).toEqual({ ok: true, value: 0 });
  });

  it('returns 0 without usable fields', () => {
    expect(altitude({})).toEqual({ ok: true, value: 0 });
    expect(altitude({ MEAN_MOTION: 0 })).toEqual({ ok: true, value: 0 });
    expect(altitude({ MEAN_MOTION: -3 })).toEqual({ ok: true, value: 0 });
  });

  it('fails when the apogee/perigee mid-point overflows', () => {
    expect(altitude({ APOGEE: '1e309', PERIGEE: '400', MEAN_MOTION: '15.5' }).ok).toBe(false);
    expect(altitude({ APOGEE: '1e308', PERIGEE: '1e308' }).ok).toBe(false);
  });

  it('returns 0 for an unbounded mean motion', () => {
    expect(altitude({ MEAN_MOTION: '1e309' })).toEqual({ ok: true, value: 0 });
  });

  it('returns 0 when any of the fields is malformed', () => {
    expect(altitude({ MEAN_MOTION: 'n/a' })).toEqual({ ok: true, value: 0 });
    expect(altitude({ APOGEE: 420, PERIGEE: 'low', MEAN_MOTION: 15.5 })).toEqual({ ok: true, value: 0 });
    expect(altitude({ APOGEE: null, MEAN_MOTION: 15.5 })).toEqual({ ok: true, value: 0 });
  });
});

describe('velocity', () => {
  it('scales the mean motion by 0.1 and keeps two decimals', () => {
    expect(velocity({ MEAN_MOTION: 15.5 })).toEqual({ ok: true, value: 1.55 });
    expect(velocity({ MEAN_MOTION: '14.2' })).toEqual({ ok: true, value: 1.42 });
  });

  it('rounds ties at the second decimal to even', () => {
    expect(velocity({ MEAN_MOTION: '11.25' })).toEqual({ ok: true, value: 1.12 });
    expect(velocity({ MEAN_MOTION: '16.25' })).toEqual({ ok: true, value: 1.62 });
    expect(velocity({ MEAN_MOTION: '13.75' })).toEqual({ ok: true, value: 1.38 });
  });

  it('defaults a missing mean motion to 0', () => {
    expect(velocity({})).toEqual({ ok: true, value: 0 });
  });

  it('fails on an unbounded mean motion', () => {
    expect(velocity({ MEAN_MOTION: '1e309' }).ok).toBe(false);
  });

  it('fails on a malformed mean motion', () => {
    expect(velocity({ MEAN_MOTION: 'fast' }).ok).toBe(false);
    expect(velocity({ MEAN_MOTION: null }).ok).toBe(false);
  });
});

describe('riskLevel', () => {
  it('is HIGH only above 15 rev/day and eccentricity 0.1', () => {
    expect(riskLevel({ MEAN_MOTION: 15.5, ECCENTRICITY: 0.12 })).toBe('HIGH');
    expect(riskLevel({ MEAN_MOTION: '15.01', ECCENTRICITY: '0.2' })).toBe('HIGH');
  });

  it('treats the thresholds as strict', () => {
    expect(riskLevel({ MEAN_MOTION: 15, ECCENTRICITY: 0.5 })).toBe('MEDIUM');
    expect(riskLevel({ MEAN_MOTION: 15.5, ECCENTRICITY: 0.1 })).toBe('MEDIUM');
    expect(riskLevel({ MEAN_MOTION: 12, ECCENTRICITY: 0 })).toBe('LOW');
  });

  it('is MEDIUM above 12 rev/day', () => {
    expect(riskLevel({ MEAN_MOTION: 12.5 })).toBe('MEDIUM');
  });

  it('is LOW otherwise or on a malformed field', () => {
    expect(riskLevel({})).toBe('LOW');
    expect(riskLevel({ MEAN_MOTION: 11.2, ECCENTRICITY: 0.3 })).toBe('LOW');
    expect(riskLevel({ MEAN_MOTION: 15.5, ECCENTRICITY: 'wide' })).toBe('LOW');
  });
});

describe('orbitType', () => {
  it('classifies by mean motion', () => {
    expect(orbitType({ MEAN_MOTION: 15.5 })).toBe('LEO');
    expect(orbitType({ MEAN_MOTION: '2.0' })).toBe('MEO');
    expect(orbitType({ MEAN_MOTION: 1.0027 })).toBe('MEO');
    expect(orbitType({ MEAN_MOTION: 1 })).toBe('GEO');
  });

  it('puts the 11 rev/day boundary in MEO', () => {
    expect(orbitType({ MEAN_MOTION: 11 })).toBe('MEO');
  });

  it('labels zero, negative and missing mean motion as GEO', () => {
    expect(orbitType({ MEAN_MOTION: 0 })).toBe('GEO');
    expect(orbitType({ MEAN_MOTION: -1 })).toBe('GEO');
    expect(orbitType({})).toBe('GEO');
  });

  it('defaults to LEO on a malformed mean motion', () => {
    expect(orbitType({ MEAN_MOTION: 'slow' })).toBe('LEO');
  });
});
