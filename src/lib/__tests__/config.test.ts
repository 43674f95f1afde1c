import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadEngineConfig, parseNumberEnv } from '../config';

describe('engine config', () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env.SNAPSHOT_WINDOW_RADIUS;
    delete process.env.SNAPSHOT_MIN_YEARS;
    delete process.env.PROVERB_MIN_OBSERVATIONS_PER_YEAR;
    delete process.env.DEFAULT_STATION_ID;
  });

  afterEach(() => {
    process.env = { ...originalEnv };
  });

  it('uses defaults when nothing is set', () => {
    expect(loadEngineConfig()).toEqual({
      windowRadius: 3,
      minYears: 10,
      minObservationsPerYear: 1,
      defaultStationId: '466920',
    });
  });

  it('reads overrides from the environment', () => {
    process.env.SNAPSHOT_WINDOW_RADIUS = '7';
    process.env.SNAPSHOT_MIN_YEARS = '20';
    process.env.PROVERB_MIN_OBSERVATIONS_PER_YEAR = '300';
    process.env.DEFAULT_STATION_ID = ' 467410 ';

    expect(loadEngineConfig()).toEqual({
      windowRadius: 7,
      minYears: 20,
      minObservationsPerYear: 300,
      defaultStationId: '467410',
    });
  });

  it('falls back on unusable numbers', () => {
    process.env.SNAPSHOT_WINDOW_RADIUS = 'wide';
    process.env.SNAPSHOT_MIN_YEARS = '-4';
    expect(parseNumberEnv('SNAPSHOT_WINDOW_RADIUS', 3)).toBe(3);
    expect(loadEngineConfig().minYears).toBe(10);
  });

  it('never asks for fewer than one year', () => {
    process.env.SNAPSHOT_MIN_YEARS = '0';
    expect(loadEngineConfig().minYears).toBe(1);
  });
});
