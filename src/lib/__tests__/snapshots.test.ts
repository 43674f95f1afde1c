import { afterEach, describe, expect, it, vi } from 'vitest';
import { ClimateAnalyzer } from '../climate/analyzer';
import { buildAnnualSnapshots, filterByYearRange, runSnapshotBatch } from '../climate/snapshots';
import type { DailyObservation, DailyStatisticsRow } from '../climate/types';
import { ValidationError } from '../errors';
import { STATION, dailySeries, observation } from './fixtures';

const FIXED_NOW = () => new Date('2024-01-01T00:00:00.000Z');

function januaryHistory(years: number[]): DailyObservation[] {
  return years.flatMap((year) =>
    dailySeries(`${year}-01-01`, `${year}-01-31`, ({ day }) => ({
      temperature_avg: 15 + (day % 3),
      temperature_max: 20,
      temperature_min: 10,
      precipitation: day % 2 === 0 ? 4 : 0,
      sunshine_hours: 6,
    }))
  );
}

function makeDeps(observations: DailyObservation[]) {
  const written: DailyStatisticsRow[][] = [];
  return {
    written,
    store: { getObservations: vi.fn(async () => observations) },
    writer: {
      replaceForStation: vi.fn(async (_stationId: string, rows: DailyStatisticsRow[]) => {
        written.push(rows);
        return rows.length;
      }),
    },
  };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('buildAnnualSnapshots', () => {
  it('emits one row per canonical day', () => {
    const { rows, skipped } = buildAnnualSnapshots(STATION, januaryHistory([2020, 2021]), { now: FIXED_NOW });
    expect(rows).toHaveLength(366);
    expect(skipped).toEqual([]);
    expect(rows[0].month_day).toBe('01-01');
    expect(rows[59].month_day).toBe('02-29');
    expect(rows[365].month_day).toBe('12-31');
    expect(rows.every((r) => r.computed_at === '2024-01-01T00:00:00.000Z')).toBe(true);
  });

  it('is byte-identical across reruns on the same input', () => {
    const data = januaryHistory([2018, 2019, 2020]);
    const first = buildAnnualSnapshots(STATION, data, { now: FIXED_NOW });
    const second = buildAnnualSnapshots(STATION, data, { now: FIXED_NOW });
    expect(JSON.stringify(second.rows)).toBe(JSON.stringify(first.rows));
  });

  it('takes year coverage from the whole dataset, not the window', () => {
    const { rows } = buildAnnualSnapshots(
      STATION,
      [observation('2000-01-01', { temperature_avg: 12 }), observation('2009-08-01', { temperature_avg: 29 })],
      { now: FIXED_NOW }
    );
    const jan1 = rows[0];
    expect(jan1.years_analyzed).toBe(10);
    expect(jan1.start_year).toBe(2000);
    expect(jan1.end_year).toBe(2009);
    expect(jan1.temp_avg_mean).toBe(12);
  });

  it('stores null temperatures and zero profiles for days with no history in the window', () => {
    const { rows } = buildAnnualSnapshots(STATION, januaryHistory([2020]), { now: FIXED_NOW });
    const july = rows.find((r) => r.month_day === '07-15');
    expect(july).toMatchObject({
      temp_avg_mean: null,
      temp_avg_stddev: null,
      temp_max_record: null,
      precip_probability: 0,
      precip_avg_when_rain: 0,
      precip_heavy_prob: 0,
      precip_max_record: 0,
      tendency_sunny: 0,
      tendency_cloudy: 0,
      tendency_rainy: 0,
    });
  });

  it('fills precipitation and tendency for covered days', () => {
    const { rows } = buildAnnualSnapshots(
      STATION,
      [
        observation('2020-03-10', { precipitation: 0, sunshine_hours: 9 }),
        observation('2021-03-10', { precipitation: 60, sunshine_hours: 0 }),
      ],
      { windowRadius: 0, now: FIXED_NOW }
    );
    expect(rows.find((r) => r.month_day === '03-10')).toMatchObject({
      precip_probability: 0.5,
      precip_avg_when_rain: 60,
      precip_heavy_prob: 0.5,
      precip_max_record: 60,
      tendency_sunny: 0.5,
      tendency_cloudy: 0,
      tendency_rainy: 0.5,
    });
  });

  it('logs and skips a failing day without aborting the run', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const original = ClimateAnalyzer.prototype.getDateRangeStats;
    vi.spyOn(ClimateAnalyzer.prototype, 'getDateRangeStats').mockImplementation(function (
      this: ClimateAnalyzer,
      month: number,
      day: number,
      windowDays?: number
    ) {
      if (month === 6 && day === 1) throw new Error('boom');
      return original.call(this, month, day, windowDays);
    });

    const { rows, skipped } = buildAnnualSnapshots(STATION, januaryHistory([2020]), { now: FIXED_NOW });
    expect(rows).toHaveLength(365);
    expect(skipped).toEqual([{ month_day: '06-01', error: 'boom' }]);
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  it('rejects an invalid radius', () => {
    expect(() => buildAnnualSnapshots(STATION, [], { windowRadius: 400 })).toThrow(ValidationError);
  });
});

describe('filterByYearRange', () => {
  it('keeps years inside the inclusive range', () => {
    const data = [observation('1999-12-31'), observation('2000-01-01'), observation('2005-06-01')];
    expect(filterByYearRange(data, 2000, 2004).map((o) => o.observed_date)).toEqual(['2000-01-01']);
    expect(filterByYearRange(data, undefined, 2000)).toHaveLength(2);
  });
});

describe('runSnapshotBatch', () => {
  it('reports insufficient data without writing', async () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const deps = makeDeps(januaryHistory([2020, 2021, 2022]));

    const result = await runSnapshotBatch(STATION, deps, { minYears: 10, now: FIXED_NOW });

    expect(result).toEqual({
      ok: false,
      station_id: STATION,
      reason: 'insufficient_data',
      years_available: 3,
      min_years: 10,
    });
    expect(deps.writer.replaceForStation).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledTimes(1);
  });

  it('replaces the station snapshot when enough years exist', async () => {
    const deps = makeDeps(januaryHistory([2018, 2019, 2020]));

    const result = await runSnapshotBatch(STATION, deps, { minYears: 3, now: FIXED_NOW });

    expect(result).toEqual({
      ok: true,
      station_id: STATION,
      window_radius: 3,
      years_available: 3,
      start_year: 2018,
      end_year: 2020,
      rows_written: 366,
      skipped_days: [],
    });
    expect(deps.store.getObservations).toHaveBeenCalledWith(STATION);
    expect(deps.written[0]).toHaveLength(366);
  });

  it('restricts the batch to the requested years', async () => {
    const deps = makeDeps(januaryHistory([2015, 2016, 2017, 2018]));

    const result = await runSnapshotBatch(STATION, deps, {
      minYears: 2,
      startYear: 2016,
      endYear: 2017,
      now: FIXED_NOW,
    });

    expect(result).toMatchObject({ ok: true, years_available: 2, start_year: 2016, end_year: 2017 });
    expect(deps.written[0][0].years_analyzed).toBe(2);
  });

  it('validates the request before touching the store', async () => {
    const deps = makeDeps([]);
    await expect(runSnapshotBatch(' ', deps)).rejects.toThrow(ValidationError);
    await expect(runSnapshotBatch(STATION, deps, { startYear: 2020, endYear: 2010 })).rejects.toThrow(
      ValidationError
    );
    await expect(runSnapshotBatch(STATION, deps, { windowRadius: 200 })).rejects.toThrow(ValidationError);
    expect(deps.store.getObservations).not.toHaveBeenCalled();
  });
});
