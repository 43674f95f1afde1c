// Postgres numeric columns arrive as strings through PostgREST.
export type NumericColumn = number | string | null;

export interface RawObservationRow {
  id: number;
  station_id: string;
  observed_date: string;
  temperature_avg: NumericColumn;
  temperature_max: NumericColumn;
  temperature_min: NumericColumn;
  precipitation: NumericColumn;
  humidity_avg: NumericColumn;
  sunshine_hours: NumericColumn;
}

export const OBSERVATIONS_TABLE = 'raw_observations';
export const DAILY_STATISTICS_TABLE = 'daily_statistics';
