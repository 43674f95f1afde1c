import { parseMonthDay, toMonthDay } from './calendar';
import type { DailyObservation, ExtremeRecord, ExtremeRecords, ObservationMetric } from './types';

export interface YearPoint {
  year: number;
  observation: DailyObservation;
}

/** The station's observations falling on the given MM-DD, oldest year first. */
export function observationsOnMonthDay(
  stationId: string,
  monthDay: string,
  observations: readonly DailyObservation[]
): YearPoint[] {
  const { month, day } = parseMonthDay(monthDay);
  const suffix = `-${toMonthDay(month, day)}`;

  return observations
    .filter((o) => o.station_id === stationId && o.observed_date.slice(4, 10) === suffix)
    .map((observation) => ({ year: Number(observation.observed_date.slice(0, 4)), observation }))
    .sort((a, b) => a.year - b.year);
}

function pickExtreme(
  points: readonly YearPoint[],
  metric: ObservationMetric,
  better: (candidate: number, current: number) => boolean,
  accept: (value: number) => boolean = () => true
): ExtremeRecord | undefined {
  let best: ExtremeRecord | undefined;
  for (const { year, observation } of points) {
    const value = observation[metric];
    if (value === null || !Number.isFinite(value) || !accept(value)) continue;
    // Points are in ascending year order and only a strictly better value
    // replaces the current record, so ties stay with the earliest year.
    if (!best || better(value, best.value)) {
      best = { value, year, date: observation.observed_date };
    }
  }
  return best;
}

export function findExtremeRecords(
  stationId: string,
  monthDay: string,
  observations: readonly DailyObservation[]
): ExtremeRecords {
  const points = observationsOnMonthDay(stationId, monthDay, observations);
  const records: ExtremeRecords = {};

  const maxTemp = pickExtreme(points, 'temperature_max', (a, b) => a > b);
  if (maxTemp) records.max_temp = maxTemp;

  const minTemp = pickExtreme(points, 'temperature_min', (a, b) => a < b);
  if (minTemp) records.min_temp = minTemp;

  const maxPrecip = pickExtreme(points, 'precipitation', (a, b) => a > b, (v) => v > 0);
  if (maxPrecip) records.max_precip = maxPrecip;

  return records;
}

/**
 * Share of same-day historical values strictly below `value`, in percent.
 * Left-exclusive and not interpolated: the historical minimum ranks 0.
 */
export function percentileRank(
  stationId: string,
  monthDay: string,
  value: number,
  observations: readonly DailyObservation[],
  metric: ObservationMetric = 'temperature_avg'
): number | null {
  const history: number[] = [];
  for (const { observation } of observationsOnMonthDay(stationId, monthDay, observations)) {
    const v = observation[metric];
    if (v !== null && Number.isFinite(v)) history.push(v);
  }
  if (history.length === 0) return null;

  const below = history.filter((v) => v < value).length;
  return Math.round((below / history.length) * 1000) / 10;
}
