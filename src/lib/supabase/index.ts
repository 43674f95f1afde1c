export { getServerClient } from './server';

export type { NumericColumn, RawObservationRow } from './types';
export { DAILY_STATISTICS_TABLE, OBSERVATIONS_TABLE } from './types';

export {
  OBSERVATION_PAGE_SIZE,
  INSERT_CHUNK_SIZE,
  createSupabaseObservationStore,
  createSupabaseStatisticsWriter,
  getObservations,
  getDailyStatistic,
  replaceDailyStatistics,
  toDailyObservation,
  toDailyStatisticsRow,
} from './queries/index';
