export const DEFAULT_WINDOW_RADIUS = 3;
export const DEFAULT_MIN_YEARS = 10;
export const DEFAULT_MIN_OBSERVATIONS_PER_YEAR = 1;
export const DEFAULT_STATION_ID = '466920';

export interface EngineConfig {
  windowRadius: number;
  minYears: number;
  minObservationsPerYear: number;
  defaultStationId: string;
}

export function parseNumberEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed < 0) return fallback;
  return parsed;
}

export function loadEngineConfig(): EngineConfig {
  return {
    windowRadius: Math.round(parseNumberEnv('SNAPSHOT_WINDOW_RADIUS', DEFAULT_WINDOW_RADIUS)),
    minYears: Math.max(1, Math.round(parseNumberEnv('SNAPSHOT_MIN_YEARS', DEFAULT_MIN_YEARS))),
    minObservationsPerYear: Math.max(
      1,
      Math.round(parseNumberEnv('PROVERB_MIN_OBSERVATIONS_PER_YEAR', DEFAULT_MIN_OBSERVATIONS_PER_YEAR))
    ),
    defaultStationId: process.env.DEFAULT_STATION_ID?.trim() || DEFAULT_STATION_ID,
  };
}
