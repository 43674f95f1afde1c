import type { SupabaseClient } from '@supabase/supabase-js';
import type { DailyStatisticsRow, DailyStatisticsWriter } from '../../climate/types';
import { DAILY_STATISTICS_TABLE } from '../types';
import { toNullableNumber } from './observations';

export const INSERT_CHUNK_SIZE = 500;

export function toDailyStatisticsRow(row: unknown): DailyStatisticsRow {
  if (
    typeof row !== 'object' ||
    row === null ||
    !('station_id' in row) ||
    !('month_day' in row) ||
    !('computed_at' in row) ||
    typeof row.station_id !== 'string' ||
    typeof row.month_day !== 'string' ||
    typeof row.computed_at !== 'string'
  ) {
    throw new Error(`Malformed ${DAILY_STATISTICS_TABLE} row: ${JSON.stringify(row)}`);
  }

  const source = row;
  const num = (column: keyof DailyStatisticsRow): number | null =>
    toNullableNumber(Reflect.get(source, column));

  return {
    station_id: row.station_id,
    month_day: row.month_day,
    years_analyzed: num('years_analyzed'),
    start_year: num('start_year'),
    end_year: num('end_year'),
    temp_avg_mean: num('temp_avg_mean'),
    temp_avg_median: num('temp_avg_median'),
    temp_avg_stddev: num('temp_avg_stddev'),
    temp_max_mean: num('temp_max_mean'),
    temp_max_record: num('temp_max_record'),
    temp_min_mean: num('temp_min_mean'),
    temp_min_record: num('temp_min_record'),
    precip_probability: num('precip_probability'),
    precip_avg_when_rain: num('precip_avg_when_rain'),
    precip_heavy_prob: num('precip_heavy_prob'),
    precip_max_record: num('precip_max_record'),
    tendency_sunny: num('tendency_sunny'),
    tendency_cloudy: num('tendency_cloudy'),
    tendency_rainy: num('tendency_rainy'),
    computed_at: row.computed_at,
  };
}

/**
 * Full replacement: a shrunk dataset must not leave stale month-days behind.
 * Returns the number of rows inserted.
 */
export async function replaceDailyStatistics(
  client: SupabaseClient,
  stationId: string,
  rows: readonly DailyStatisticsRow[]
): Promise<number> {
  const { error: deleteError } = await client
    .from(DAILY_STATISTICS_TABLE)
    .delete()
    .eq('station_id', stationId);

  if (deleteError) {
    throw new Error(`Failed to clear daily statistics for station ${stationId}: ${deleteError.message}`);
  }

  let written = 0;
  for (let i = 0; i < rows.length; i += INSERT_CHUNK_SIZE) {
    const chunk = rows.slice(i, i + INSERT_CHUNK_SIZE);
    const { error } = await client.from(DAILY_STATISTICS_TABLE).insert(chunk);
    if (error) {
      throw new Error(
        `Failed to insert daily statistics for station ${stationId} (rows ${i}-${i + chunk.length - 1}): ${error.message}`
      );
    }
    written += chunk.length;
  }

  return written;
}

export async function getDailyStatistic(
  client: SupabaseClient,
  stationId: string,
  monthDay: string
): Promise<DailyStatisticsRow | null> {
  const { data, error } = await client
    .from(DAILY_STATISTICS_TABLE)
    .select('*')
    .eq('station_id', stationId)
    .eq('month_day', monthDay)
    .maybeSingle();

  if (error) {
    throw new Error(`Failed to load daily statistics for ${stationId} ${monthDay}: ${error.message}`);
  }

  return data ? toDailyStatisticsRow(data) : null;
}

export function createSupabaseStatisticsWriter(client: SupabaseClient): DailyStatisticsWriter {
  return {
    replaceForStation: (stationId, rows) => replaceDailyStatistics(client, stationId, rows),
  };
}
