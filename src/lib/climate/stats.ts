import type { BasicStats, PrecipitationStats, WeatherTendency } from './types';

export const RAIN_THRESHOLD_MM = 0.1;
export const HEAVY_RAIN_THRESHOLD_MM = 50;
export const RAINY_DAY_THRESHOLD_MM = 1.0;
export const SUNNY_SUNSHINE_THRESHOLD_HOURS = 3.0;

export function finiteValues(values: ReadonlyArray<number | null | undefined>): number[] {
  const result: number[] = [];
  for (const v of values) {
    if (typeof v === 'number' && Number.isFinite(v)) result.push(v);
  }
  return result;
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

export function sampleStdDev(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  if (values.length === 1) return 0;
  const m = mean(values);
  let squares = 0;
  for (const v of values) squares += (v - m) ** 2;
  return Math.sqrt(squares / (values.length - 1));
}

// Linear interpolation between closest ranks over an ascending-sorted array.
export function quantile(sorted: readonly number[], q: number): number {
  if (sorted.length === 0) return NaN;
  const pos = (sorted.length - 1) * q;
  const lo = Math.floor(pos);
  const hi = Math.ceil(pos);
  if (lo === hi) return sorted[lo];
  return sorted[lo] + (sorted[hi] - sorted[lo]) * (pos - lo);
}

export const EMPTY_BASIC_STATS: Readonly<BasicStats> = {
  mean: NaN,
  median: NaN,
  std_dev: NaN,
  min: NaN,
  max: NaN,
  percentile_25: NaN,
  percentile_75: NaN,
  count: 0,
};

export function computeBasicStats(data: ReadonlyArray<number | null | undefined>): BasicStats {
  const values = finiteValues(data);
  if (values.length === 0) return { ...EMPTY_BASIC_STATS };

  const sorted = [...values].sort((a, b) => a - b);
  return {
    mean: mean(sorted),
    median: quantile(sorted, 0.5),
    std_dev: sampleStdDev(sorted),
    min: sorted[0],
    max: sorted[sorted.length - 1],
    percentile_25: quantile(sorted, 0.25),
    percentile_75: quantile(sorted, 0.75),
    count: sorted.length,
  };
}

export function computePrecipitationStats(
  precip: ReadonlyArray<number | null | undefined>
): PrecipitationStats {
  const values = finiteValues(precip);
  if (values.length === 0) {
    return {
      probability: 0,
      heavy_rain_probability: 0,
      max_recorded_mm: 0,
      mean_rain_day_mm: 0,
      rain_days: 0,
      total_days: 0,
    };
  }

  const rainValues = values.filter((v) => v >= RAIN_THRESHOLD_MM);
  const heavyDays = values.filter((v) => v > HEAVY_RAIN_THRESHOLD_MM).length;

  return {
    probability: rainValues.length / values.length,
    heavy_rain_probability: heavyDays / values.length,
    max_recorded_mm: Math.max(...values),
    mean_rain_day_mm: rainValues.length > 0 ? mean(rainValues) : 0,
    rain_days: rainValues.length,
    total_days: values.length,
  };
}

export interface TendencyDay {
  precipitation: number | null | undefined;
  sunshine_hours: number | null | undefined;
}

function isFiniteNumber(v: number | null | undefined): v is number {
  return typeof v === 'number' && Number.isFinite(v);
}

export function classifyDay(precipitation: number, sunshineHours: number): 'sunny' | 'cloudy' | 'rainy' {
  if (precipitation >= RAINY_DAY_THRESHOLD_MM) return 'rainy';
  if (precipitation < RAIN_THRESHOLD_MM && sunshineHours > SUNNY_SUNSHINE_THRESHOLD_HOURS) return 'sunny';
  return 'cloudy';
}

export function computeWeatherTendency(days: readonly TendencyDay[]): WeatherTendency {
  const counts = { sunny: 0, cloudy: 0, rainy: 0 };
  let total = 0;

  for (const d of days) {
    if (!isFiniteNumber(d.precipitation) || !isFiniteNumber(d.sunshine_hours)) continue;
    counts[classifyDay(d.precipitation, d.sunshine_hours)]++;
    total++;
  }

  if (total === 0) {
    return { sunny: 0, cloudy: 0, rainy: 0, dominant: 'unknown', total_valid_days: 0 };
  }

  const sunny = counts.sunny / total;
  const cloudy = counts.cloudy / total;
  const rainy = counts.rainy / total;

  // Tie-break order: sunny, rainy, cloudy.
  const max = Math.max(sunny, cloudy, rainy);
  const dominant = max === sunny ? 'sunny' : max === rainy ? 'rainy' : 'cloudy';

  return { sunny, cloudy, rainy, dominant, total_valid_days: total };
}
