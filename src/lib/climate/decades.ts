import { observationsOnMonthDay } from './records';
import type { YearPoint } from './records';
import { computePrecipitationStats, finiteValues, mean } from './stats';
import type { DailyObservation, DecadeComparison, DecadeStatistic } from './types';

export const RECENT_YEARS = 10;
export const MIN_TREND_POINTS = 5;

export function decadeLabel(year: number): string {
  return `${Math.floor(year / 10) * 10}s`;
}

function nullableMean(values: ReadonlyArray<number | null>): number | null {
  const finite = finiteValues(values);
  return finite.length > 0 ? mean(finite) : null;
}

function summarizeGroup(label: string, points: readonly YearPoint[]): DecadeStatistic {
  const years = points.map((p) => p.year);
  const rows = points.map((p) => p.observation);
  const precip = computePrecipitationStats(rows.map((r) => r.precipitation));
  const hasPrecip = precip.total_days > 0;

  return {
    label,
    start_year: Math.min(...years),
    end_year: Math.max(...years),
    years_count: new Set(years).size,
    temp_avg: nullableMean(rows.map((r) => r.temperature_avg)),
    temp_max_avg: nullableMean(rows.map((r) => r.temperature_max)),
    temp_min_avg: nullableMean(rows.map((r) => r.temperature_min)),
    precip_probability: hasPrecip ? precip.probability : null,
    precip_avg_when_rain: hasPrecip && precip.rain_days > 0 ? precip.mean_rain_day_mm : null,
  };
}

/**
 * Ordinary least-squares slope of value against year, scaled to change per
 * decade and rounded to 2 decimals.
 */
export function computeTrendPerDecade(points: ReadonlyArray<{ year: number; value: number }>): number | null {
  if (points.length < MIN_TREND_POINTS) return null;

  // Centred normal equations.
  const meanX = mean(points.map((p) => p.year));
  const meanY = mean(points.map((p) => p.value));
  let sxy = 0;
  let sxx = 0;
  for (const p of points) {
    const dx = p.year - meanX;
    sxy += dx * (p.value - meanY);
    sxx += dx * dx;
  }
  if (sxx === 0) return null;

  return Math.round((sxy / sxx) * 10 * 100) / 100;
}

export function compareDecades(
  stationId: string,
  monthDay: string,
  observations: readonly DailyObservation[]
): DecadeComparison | null {
  const points = observationsOnMonthDay(stationId, monthDay, observations).filter(
    (p) => p.observation.temperature_avg !== null && Number.isFinite(p.observation.temperature_avg)
  );
  if (points.length === 0) return null;

  const byDecade = new Map<string, YearPoint[]>();
  for (const p of points) {
    const label = decadeLabel(p.year);
    const group = byDecade.get(label) || [];
    group.push(p);
    byDecade.set(label, group);
  }

  const latestYear = points[points.length - 1].year;
  const recent = points.filter((p) => p.year > latestYear - RECENT_YEARS);

  const trendPoints: Array<{ year: number; value: number }> = [];
  for (const p of points) {
    if (p.observation.temperature_avg !== null) {
      trendPoints.push({ year: p.year, value: p.observation.temperature_avg });
    }
  }

  return {
    station_id: stationId,
    month_day: monthDay,
    decades: [...byDecade.keys()].sort().map((label) => summarizeGroup(label, byDecade.get(label) || [])),
    recent_10y: recent.length > 0 ? summarizeGroup('recent_10y', recent) : null,
    all_time: summarizeGroup('all_time', points),
    trend_per_decade: computeTrendPerDecade(trendPoints),
  };
}
