import { addDays, formatIsoDate, parseIsoDate } from '../climate/calendar';
import type { CalendarDate } from '../climate/calendar';
import type { DailyObservation } from '../climate/types';

export const STATION = 'test-station';

export function observation(date: string, overrides: Partial<DailyObservation> = {}): DailyObservation {
  return {
    station_id: STATION,
    observed_date: date,
    temperature_avg: null,
    temperature_max: null,
    temperature_min: null,
    precipitation: null,
    humidity_avg: null,
    sunshine_hours: null,
    ...overrides,
  };
}

/** One observation per day from `from` to `to` inclusive. */
export function dailySeries(
  from: string,
  to: string,
  fill: (date: CalendarDate) => Partial<DailyObservation> = () => ({})
): DailyObservation[] {
  const rows: DailyObservation[] = [];
  const end = formatIsoDate(parseIsoDate(to));
  for (let d = parseIsoDate(from); ; d = addDays(d, 1)) {
    const iso = formatIsoDate(d);
    rows.push(observation(iso, fill(d)));
    if (iso === end) break;
  }
  return rows;
}
