import { ClimateAnalyzer } from './analyzer';
import { assertWindowRadius, canonicalDays, parseIsoDate, toMonthDay } from './calendar';
import type {
  DailyObservation,
  DailyStatisticsRow,
  DailyStatisticsWriter,
  RawObservationStore,
  YearCoverage,
} from './types';
import { DEFAULT_MIN_YEARS, DEFAULT_WINDOW_RADIUS } from '../config';
import { ValidationError, errorMessage } from '../errors';

export interface SnapshotContext {
  stationId: string;
  windowRadius: number;
  coverage: YearCoverage;
  computedAt: string;
}

export interface SkippedDay {
  month_day: string;
  error: string;
}

export interface AnnualSnapshotResult {
  rows: DailyStatisticsRow[];
  skipped: SkippedDay[];
}

function finiteOrNull(value: number): number | null {
  return Number.isFinite(value) ? value : null;
}

/**
 * Builds the snapshot row for one canonical day. Rows for different days
 * share no state, so callers may schedule them in any order or in parallel.
 *
 * Temperature aggregates of an empty window persist as null. Precipitation
 * and tendency keep their all-zero empty profile.
 */
export function computeDaySnapshot(
  analyzer: ClimateAnalyzer,
  month: number,
  day: number,
  context: SnapshotContext
): DailyStatisticsRow {
  const stats = analyzer.getDateRangeStats(month, day, context.windowRadius);
  const { start_year, end_year } = context.coverage;

  return {
    station_id: context.stationId,
    month_day: stats.target_date,
    years_analyzed: start_year !== null && end_year !== null ? end_year - start_year + 1 : null,
    start_year,
    end_year,
    temp_avg_mean: finiteOrNull(stats.temperature.avg.mean),
    temp_avg_median: finiteOrNull(stats.temperature.avg.median),
    temp_avg_stddev: finiteOrNull(stats.temperature.avg.std_dev),
    temp_max_mean: finiteOrNull(stats.temperature.max.mean),
    temp_max_record: finiteOrNull(stats.temperature.max.max),
    temp_min_mean: finiteOrNull(stats.temperature.min.mean),
    temp_min_record: finiteOrNull(stats.temperature.min.min),
    precip_probability: stats.precipitation.probability,
    precip_avg_when_rain: stats.precipitation.mean_rain_day_mm,
    precip_heavy_prob: stats.precipitation.heavy_rain_probability,
    precip_max_record: stats.precipitation.max_recorded_mm,
    tendency_sunny: stats.tendency.sunny,
    tendency_cloudy: stats.tendency.cloudy,
    tendency_rainy: stats.tendency.rainy,
    computed_at: context.computedAt,
  };
}

export interface BuildSnapshotOptions {
  windowRadius?: number;
  now?: () => Date;
}

export function buildAnnualSnapshots(
  stationId: string,
  observations: readonly DailyObservation[],
  options: BuildSnapshotOptions = {}
): AnnualSnapshotResult {
  const windowRadius = options.windowRadius ?? DEFAULT_WINDOW_RADIUS;
  assertWindowRadius(windowRadius);

  const analyzer = new ClimateAnalyzer(observations);
  const context: SnapshotContext = {
    stationId,
    windowRadius,
    coverage: analyzer.getYearCoverage(),
    computedAt: (options.now ?? (() => new Date()))().toISOString(),
  };

  const rows: DailyStatisticsRow[] = [];
  const skipped: SkippedDay[] = [];

  for (const { month, day } of canonicalDays()) {
    try {
      rows.push(computeDaySnapshot(analyzer, month, day, context));
    } catch (error) {
      const monthDay = toMonthDay(month, day);
      console.error(`Snapshot for ${stationId} ${monthDay} failed:`, error);
      skipped.push({ month_day: monthDay, error: errorMessage(error) });
    }
  }

  return { rows, skipped };
}

export interface SnapshotBatchOptions extends BuildSnapshotOptions {
  startYear?: number;
  endYear?: number;
  minYears?: number;
}

export type SnapshotBatchResult =
  | {
      ok: true;
      station_id: string;
      window_radius: number;
      years_available: number;
      start_year: number | null;
      end_year: number | null;
      rows_written: number;
      skipped_days: SkippedDay[];
    }
  | {
      ok: false;
      station_id: string;
      reason: 'insufficient_data';
      years_available: number;
      min_years: number;
    };

export function filterByYearRange(
  observations: readonly DailyObservation[],
  startYear?: number,
  endYear?: number
): DailyObservation[] {
  return observations.filter((o) => {
    const { year } = parseIsoDate(o.observed_date);
    if (startYear !== undefined && year < startYear) return false;
    if (endYear !== undefined && year > endYear) return false;
    return true;
  });
}

export async function runSnapshotBatch(
  stationId: string,
  deps: { store: RawObservationStore; writer: DailyStatisticsWriter },
  options: SnapshotBatchOptions = {}
): Promise<SnapshotBatchResult> {
  if (!stationId.trim()) {
    throw new ValidationError('station_id is required');
  }
  if (options.startYear !== undefined && options.endYear !== undefined && options.startYear > options.endYear) {
    throw new ValidationError(`start_year ${options.startYear} is after end_year ${options.endYear}`);
  }

  const minYears = options.minYears ?? DEFAULT_MIN_YEARS;
  const windowRadius = options.windowRadius ?? DEFAULT_WINDOW_RADIUS;
  assertWindowRadius(windowRadius);

  const all = await deps.store.getObservations(stationId);
  const observations = filterByYearRange(all, options.startYear, options.endYear);
  const yearsAvailable = new Set(observations.map((o) => o.observed_date.slice(0, 4))).size;

  if (yearsAvailable < minYears) {
    console.warn(
      `Snapshot batch for ${stationId} skipped: ${yearsAvailable} year(s) available, ${minYears} required`
    );
    return {
      ok: false,
      station_id: stationId,
      reason: 'insufficient_data',
      years_available: yearsAvailable,
      min_years: minYears,
    };
  }

  const { rows, skipped } = buildAnnualSnapshots(stationId, observations, {
    windowRadius,
    now: options.now,
  });
  const written = await deps.writer.replaceForStation(stationId, rows);

  return {
    ok: true,
    station_id: stationId,
    window_radius: windowRadius,
    years_available: yearsAvailable,
    start_year: rows.length > 0 ? rows[0].start_year : null,
    end_year: rows.length > 0 ? rows[0].end_year : null,
    rows_written: written,
    skipped_days: skipped,
  };
}
