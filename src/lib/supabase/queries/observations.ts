import type { SupabaseClient } from '@supabase/supabase-js';
import type { DailyObservation, RawObservationStore } from '../../climate/types';
import { OBSERVATIONS_TABLE } from '../types';
import type { RawObservationRow } from '../types';

export const OBSERVATION_PAGE_SIZE = 1000;

const MEASUREMENT_COLUMNS = [
  'temperature_avg',
  'temperature_max',
  'temperature_min',
  'precipitation',
  'humidity_avg',
  'sunshine_hours',
] as const satisfies ReadonlyArray<keyof RawObservationRow>;

const SELECT_COLUMNS = ['station_id', 'observed_date', ...MEASUREMENT_COLUMNS].join(', ');

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export function toNullableNumber(value: unknown): number | null {
  if (value === null || value === undefined || value === '') return null;
  const n = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(n) ? n : null;
}

export function toDailyObservation(row: unknown): DailyObservation {
  if (!isRecord(row) || typeof row.station_id !== 'string' || typeof row.observed_date !== 'string') {
    throw new Error(`Malformed ${OBSERVATIONS_TABLE} row: ${JSON.stringify(row)}`);
  }
  return {
    station_id: row.station_id,
    observed_date: row.observed_date.slice(0, 10),
    temperature_avg: toNullableNumber(row.temperature_avg),
    temperature_max: toNullableNumber(row.temperature_max),
    temperature_min: toNullableNumber(row.temperature_min),
    precipitation: toNullableNumber(row.precipitation),
    humidity_avg: toNullableNumber(row.humidity_avg),
    sunshine_hours: toNullableNumber(row.sunshine_hours),
  };
}

export async function getObservations(
  client: SupabaseClient,
  stationId: string
): Promise<DailyObservation[]> {
  const rows: DailyObservation[] = [];
  for (let from = 0; ; from += OBSERVATION_PAGE_SIZE) {
    const to = from + OBSERVATION_PAGE_SIZE - 1;
    const { data, error } = await client
      .from(OBSERVATIONS_TABLE)
      .select(SELECT_COLUMNS)
      .eq('station_id', stationId)
      .order('observed_date', { ascending: true })
      .range(from, to);

    if (error) {
      throw new Error(`Failed to load observations for station ${stationId} (rows ${from}-${to}): ${error.message}`);
    }

    const page = data || [];
    for (const row of page) {
      rows.push(toDailyObservation(row));
    }
    if (page.length < OBSERVATION_PAGE_SIZE) {
      break;
    }
  }

  return rows;
}

export function createSupabaseObservationStore(client: SupabaseClient): RawObservationStore {
  return {
    getObservations: (stationId) => getObservations(client, stationId),
  };
}
