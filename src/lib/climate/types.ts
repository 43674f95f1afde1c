export interface DailyObservation {
  station_id: string;
  observed_date: string; // YYYY-MM-DD
  temperature_avg: number | null; // °C
  temperature_max: number | null;
  temperature_min: number | null;
  precipitation: number | null; // mm, 0 and "no data" are not told apart upstream
  humidity_avg: number | null; // %
  sunshine_hours: number | null;
}

export type ObservationMetric =
  | 'temperature_avg'
  | 'temperature_max'
  | 'temperature_min'
  | 'precipitation'
  | 'humidity_avg'
  | 'sunshine_hours';

export interface CalendarWindow {
  month: number;
  day: number;
  radius: number;
  day_of_year: number;
  days: number[];
  includes_leap_day: boolean;
}

export interface BasicStats {
  mean: number;
  median: number;
  std_dev: number;
  min: number;
  max: number;
  percentile_25: number;
  percentile_75: number;
  count: number;
}

export interface PrecipitationStats {
  probability: number;
  heavy_rain_probability: number;
  max_recorded_mm: number;
  mean_rain_day_mm: number;
  rain_days: number;
  total_days: number;
}

export type TendencyCategory = 'sunny' | 'cloudy' | 'rainy';

export interface WeatherTendency {
  sunny: number;
  cloudy: number;
  rainy: number;
  dominant: TendencyCategory | 'unknown';
  total_valid_days: number;
}

export interface DateRangeStats {
  target_date: string; // MM-DD
  window_days: number;
  sample_size: number;
  temperature: {
    avg: BasicStats;
    max: BasicStats;
    min: BasicStats;
  };
  precipitation: PrecipitationStats;
  tendency: WeatherTendency;
  humidity: BasicStats;
}

export interface MonthlySummary {
  month: number;
  sample_size: number;
  avg_temperature: number | null;
  avg_high_temperature: number | null;
  avg_low_temperature: number | null;
  rain_days: number;
  rain_days_ratio: number;
  avg_sunshine_hours: number | null;
}

export interface YearCoverage {
  years: number[];
  start_year: number | null;
  end_year: number | null;
}

export interface DailyStatisticsRow {
  station_id: string;
  month_day: string;
  years_analyzed: number | null;
  start_year: number | null;
  end_year: number | null;
  temp_avg_mean: number | null;
  temp_avg_median: number | null;
  temp_avg_stddev: number | null;
  temp_max_mean: number | null;
  temp_max_record: number | null;
  temp_min_mean: number | null;
  temp_min_record: number | null;
  precip_probability: number | null;
  precip_avg_when_rain: number | null;
  precip_heavy_prob: number | null;
  precip_max_record: number | null;
  tendency_sunny: number | null;
  tendency_cloudy: number | null;
  tendency_rainy: number | null;
  computed_at: string;
}

export interface DecadeStatistic {
  label: string; // "1990s", "recent_10y", "all_time"
  start_year: number;
  end_year: number;
  years_count: number;
  temp_avg: number | null;
  temp_max_avg: number | null;
  temp_min_avg: number | null;
  precip_probability: number | null;
  precip_avg_when_rain: number | null;
}

export interface DecadeComparison {
  station_id: string;
  month_day: string;
  decades: DecadeStatistic[];
  recent_10y: DecadeStatistic | null;
  all_time: DecadeStatistic;
  trend_per_decade: number | null; // °C per 10 years
}

export interface ExtremeRecord {
  value: number;
  year: number;
  date: string;
}

export interface ExtremeRecords {
  max_temp?: ExtremeRecord;
  min_temp?: ExtremeRecord;
  max_precip?: ExtremeRecord;
}

export interface RawObservationStore {
  getObservations(stationId: string): Promise<DailyObservation[]>;
}

export interface DailyStatisticsWriter {
  replaceForStation(stationId: string, rows: DailyStatisticsRow[]): Promise<number>;
}
