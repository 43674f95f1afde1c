import { assertCalendarDate, isInWindow, parseIsoDate, resolveWindow, toMonthDay } from './calendar';
import type { CalendarDate } from './calendar';
import {
  RAIN_THRESHOLD_MM,
  computeBasicStats,
  computePrecipitationStats,
  computeWeatherTendency,
  finiteValues,
  mean,
} from './stats';
import type { DailyObservation, DateRangeStats, MonthlySummary, YearCoverage } from './types';
import { DEFAULT_WINDOW_RADIUS } from '../config';

export interface DatedObservation {
  date: CalendarDate;
  observation: DailyObservation;
}

function nullableMean(values: ReadonlyArray<number | null>): number | null {
  const finite = finiteValues(values);
  return finite.length > 0 ? mean(finite) : null;
}

/**
 * Historical statistics over one station's daily observations.
 *
 * Observations are parsed once on construction; every query is a pure scan
 * over that in-memory copy, so the analyzer never sees a store reload.
 */
export class ClimateAnalyzer {
  readonly observations: readonly DatedObservation[];

  constructor(observations: readonly DailyObservation[]) {
    this.observations = observations.map((observation) => ({
      date: parseIsoDate(observation.observed_date),
      observation,
    }));
  }

  getYearCoverage(): YearCoverage {
    const years = [...new Set(this.observations.map((o) => o.date.year))].sort((a, b) => a - b);
    return {
      years,
      start_year: years.length > 0 ? years[0] : null,
      end_year: years.length > 0 ? years[years.length - 1] : null,
    };
  }

  getWindowObservations(month: number, day: number, windowDays = DEFAULT_WINDOW_RADIUS): DailyObservation[] {
    const window = resolveWindow(month, day, windowDays);
    return this.observations.filter((o) => isInWindow(window, o.date)).map((o) => o.observation);
  }

  getDateRangeStats(month: number, day: number, windowDays = DEFAULT_WINDOW_RADIUS): DateRangeStats {
    const rows = this.getWindowObservations(month, day, windowDays);

    return {
      target_date: toMonthDay(month, day),
      window_days: windowDays,
      sample_size: rows.length,
      temperature: {
        avg: computeBasicStats(rows.map((r) => r.temperature_avg)),
        max: computeBasicStats(rows.map((r) => r.temperature_max)),
        min: computeBasicStats(rows.map((r) => r.temperature_min)),
      },
      precipitation: computePrecipitationStats(rows.map((r) => r.precipitation)),
      tendency: computeWeatherTendency(rows),
      humidity: computeBasicStats(rows.map((r) => r.humidity_avg)),
    };
  }

  getMonthlySummary(month: number): MonthlySummary {
    assertCalendarDate(month, 1);
    const rows = this.observations.filter((o) => o.date.month === month).map((o) => o.observation);

    if (rows.length === 0) {
      return {
        month,
        sample_size: 0,
        avg_temperature: null,
        avg_high_temperature: null,
        avg_low_temperature: null,
        rain_days: 0,
        rain_days_ratio: 0,
        avg_sunshine_hours: null,
      };
    }

    const rainDays = rows.filter((r) => r.precipitation !== null && r.precipitation >= RAIN_THRESHOLD_MM).length;

    return {
      month,
      sample_size: rows.length,
      avg_temperature: nullableMean(rows.map((r) => r.temperature_avg)),
      avg_high_temperature: nullableMean(rows.map((r) => r.temperature_max)),
      avg_low_temperature: nullableMean(rows.map((r) => r.temperature_min)),
      rain_days: rainDays,
      rain_days_ratio: rainDays / rows.length,
      avg_sunshine_hours: nullableMean(rows.map((r) => r.sunshine_hours)),
    };
  }
}
