export {
  OBSERVATION_PAGE_SIZE,
  createSupabaseObservationStore,
  getObservations,
  toDailyObservation,
  toNullableNumber,
} from './observations';
export {
  INSERT_CHUNK_SIZE,
  createSupabaseStatisticsWriter,
  getDailyStatistic,
  replaceDailyStatistics,
  toDailyStatisticsRow,
} from './statistics';
