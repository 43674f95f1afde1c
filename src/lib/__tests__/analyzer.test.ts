import { describe, expect, it } from 'vitest';
import { ClimateAnalyzer } from '../climate/analyzer';
import { ValidationError } from '../errors';
import { dailySeries, observation } from './fixtures';

describe('ClimateAnalyzer', () => {
  it('reports Jan 15 as sunny when every year was dry and bright', () => {
    const analyzer = new ClimateAnalyzer([
      observation('2021-01-15', { precipitation: 0, sunshine_hours: 8 }),
      observation('2022-01-15', { precipitation: 0, sunshine_hours: 8 }),
      observation('2023-01-15', { precipitation: 0, sunshine_hours: 8 }),
    ]);

    const stats = analyzer.getDateRangeStats(1, 15, 3);
    expect(stats.target_date).toBe('01-15');
    expect(stats.sample_size).toBe(3);
    expect(stats.tendency).toMatchObject({ sunny: 1, dominant: 'sunny' });
  });

  it('takes the extra leap day into a window around Feb 28', () => {
    const analyzer = new ClimateAnalyzer([
      ...dailySeries('2019-02-20', '2019-03-10'),
      ...dailySeries('2020-02-20', '2020-03-10'),
      ...dailySeries('2021-02-20', '2021-03-10'),
    ]);

    expect(analyzer.getDateRangeStats(2, 28, 3).sample_size).toBe(22);
  });

  it('gathers window days across the new year', () => {
    const analyzer = new ClimateAnalyzer(dailySeries('2020-12-20', '2021-01-10', () => ({ temperature_avg: 15 })));
    const rows = analyzer.getWindowObservations(1, 1, 3);
    expect(rows.map((r) => r.observed_date)).toEqual([
      '2020-12-29',
      '2020-12-30',
      '2020-12-31',
      '2021-01-01',
      '2021-01-02',
      '2021-01-03',
      '2021-01-04',
    ]);
  });

  it('computes temperature statistics over the window', () => {
    const analyzer = new ClimateAnalyzer([
      observation('2020-07-01', { temperature_avg: 28, temperature_max: 33, temperature_min: 25 }),
      observation('2021-07-02', { temperature_avg: 30, temperature_max: 35, temperature_min: 26 }),
      observation('2022-07-09', { temperature_avg: 40, temperature_max: 45, temperature_min: 35 }),
    ]);

    const stats = analyzer.getDateRangeStats(7, 1, 3);
    expect(stats.sample_size).toBe(2);
    expect(stats.temperature.avg.mean).toBe(29);
    expect(stats.temperature.max.max).toBe(35);
    expect(stats.temperature.min.min).toBe(25);
    expect(stats.humidity.count).toBe(0);
    expect(stats.precipitation.total_days).toBe(0);
    expect(stats.tendency.dominant).toBe('unknown');
  });

  it('reports year coverage from the whole dataset', () => {
    const analyzer = new ClimateAnalyzer([
      observation('2015-03-01'),
      observation('2003-01-01'),
      observation('2015-04-01'),
    ]);
    expect(analyzer.getYearCoverage()).toEqual({ years: [2003, 2015], start_year: 2003, end_year: 2015 });
    expect(new ClimateAnalyzer([]).getYearCoverage()).toEqual({ years: [], start_year: null, end_year: null });
  });

  it('summarizes a month', () => {
    const analyzer = new ClimateAnalyzer([
      observation('2020-05-01', { temperature_avg: 24, precipitation: 0, sunshine_hours: 6 }),
      observation('2020-05-02', { temperature_avg: 26, precipitation: 12, sunshine_hours: 2 }),
      observation('2020-06-01', { temperature_avg: 30, precipitation: 5 }),
    ]);

    expect(analyzer.getMonthlySummary(5)).toEqual({
      month: 5,
      sample_size: 2,
      avg_temperature: 25,
      avg_high_temperature: null,
      avg_low_temperature: null,
      rain_days: 1,
      rain_days_ratio: 0.5,
      avg_sunshine_hours: 4,
    });
    expect(analyzer.getMonthlySummary(8).sample_size).toBe(0);
  });

  it('rejects invalid dates before computing', () => {
    const analyzer = new ClimateAnalyzer([]);
    expect(() => analyzer.getDateRangeStats(2, 30, 3)).toThrow(ValidationError);
    expect(() => analyzer.getMonthlySummary(13)).toThrow(ValidationError);
    expect(() => new ClimateAnalyzer([observation('2023-02-29')])).toThrow(ValidationError);
  });
});
