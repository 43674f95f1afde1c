import { ValidationError } from '../errors';
import { addDays, compareDates, daysBetween, formatIsoDate, parseIsoDate } from './calendar';
import type { CalendarDate } from './calendar';

export type Season = 'spring' | 'summer' | 'autumn' | 'winter';

export type SolarTermId =
  | 'lichun' | 'yushui' | 'jingzhe' | 'chunfen' | 'qingming' | 'guyu'
  | 'lixia' | 'xiaoman' | 'mangzhong' | 'xiazhi' | 'xiaoshu' | 'dashu'
  | 'liqiu' | 'chushu' | 'bailu' | 'qiufen' | 'hanlu' | 'shuangjiang'
  | 'lidong' | 'xiaoxue' | 'daxue' | 'dongzhi' | 'xiaohan' | 'dahan';

export interface SolarTerm {
  id: SolarTermId;
  name: string;
  name_en: string;
  order: number;
  month: number;
  day: number;
  season: Season;
}

// Typical Gregorian dates. Actual crossings drift by 1-2 days from year to
// year; comparisons anchored here carry that bounded error.
export const SOLAR_TERMS: readonly SolarTerm[] = [
  { id: 'lichun', name: '立春', name_en: 'Start of Spring', order: 1, month: 2, day: 4, season: 'spring' },
  { id: 'yushui', name: '雨水', name_en: 'Rain Water', order: 2, month: 2, day: 19, season: 'spring' },
  { id: 'jingzhe', name: '驚蟄', name_en: 'Awakening of Insects', order: 3, month: 3, day: 6, season: 'spring' },
  { id: 'chunfen', name: '春分', name_en: 'Spring Equinox', order: 4, month: 3, day: 21, season: 'spring' },
  { id: 'qingming', name: '清明', name_en: 'Clear and Bright', order: 5, month: 4, day: 5, season: 'spring' },
  { id: 'guyu', name: '穀雨', name_en: 'Grain Rain', order: 6, month: 4, day: 20, season: 'spring' },
  { id: 'lixia', name: '立夏', name_en: 'Start of Summer', order: 7, month: 5, day: 6, season: 'summer' },
  { id: 'xiaoman', name: '小滿', name_en: 'Grain Buds', order: 8, month: 5, day: 21, season: 'summer' },
  { id: 'mangzhong', name: '芒種', name_en: 'Grain in Ear', order: 9, month: 6, day: 6, season: 'summer' },
  { id: 'xiazhi', name: '夏至', name_en: 'Summer Solstice', order: 10, month: 6, day: 21, season: 'summer' },
  { id: 'xiaoshu', name: '小暑', name_en: 'Minor Heat', order: 11, month: 7, day: 7, season: 'summer' },
  { id: 'dashu', name: '大暑', name_en: 'Major Heat', order: 12, month: 7, day: 23, season: 'summer' },
  { id: 'liqiu', name: '立秋', name_en: 'Start of Autumn', order: 13, month: 8, day: 8, season: 'autumn' },
  { id: 'chushu', name: '處暑', name_en: 'End of Heat', order: 14, month: 8, day: 23, season: 'autumn' },
  { id: 'bailu', name: '白露', name_en: 'White Dew', order: 15, month: 9, day: 8, season: 'autumn' },
  { id: 'qiufen', name: '秋分', name_en: 'Autumn Equinox', order: 16, month: 9, day: 23, season: 'autumn' },
  { id: 'hanlu', name: '寒露', name_en: 'Cold Dew', order: 17, month: 10, day: 8, season: 'autumn' },
  { id: 'shuangjiang', name: '霜降', name_en: 'Frost Descent', order: 18, month: 10, day: 24, season: 'autumn' },
  { id: 'lidong', name: '立冬', name_en: 'Start of Winter', order: 19, month: 11, day: 8, season: 'winter' },
  { id: 'xiaoxue', name: '小雪', name_en: 'Minor Snow', order: 20, month: 11, day: 22, season: 'winter' },
  { id: 'daxue', name: '大雪', name_en: 'Major Snow', order: 21, month: 12, day: 7, season: 'winter' },
  { id: 'dongzhi', name: '冬至', name_en: 'Winter Solstice', order: 22, month: 12, day: 22, season: 'winter' },
  { id: 'xiaohan', name: '小寒', name_en: 'Minor Cold', order: 23, month: 1, day: 6, season: 'winter' },
  { id: 'dahan', name: '大寒', name_en: 'Major Cold', order: 24, month: 1, day: 20, season: 'winter' },
];

const byKey = new Map<string, SolarTerm>();
for (const term of SOLAR_TERMS) {
  byKey.set(term.id, term);
  byKey.set(term.name, term);
}

export function findSolarTerm(idOrName: string): SolarTerm | undefined {
  return byKey.get(idOrName.trim());
}

export function getSolarTerm(idOrName: string): SolarTerm {
  const term = findSolarTerm(idOrName);
  if (!term) {
    throw new ValidationError(`Unknown solar term: ${idOrName}`);
  }
  return term;
}

export function resolveAnchorDate(year: number, idOrName: string): CalendarDate {
  if (!Number.isInteger(year)) {
    throw new ValidationError(`Invalid year: ${year}`);
  }
  const term = getSolarTerm(idOrName);
  return { year, month: term.month, day: term.day };
}

export function getSolarTermOn(date: string): SolarTerm | null {
  const { month, day } = parseIsoDate(date);
  return SOLAR_TERMS.find((t) => t.month === month && t.day === day) ?? null;
}

export interface NearestSolarTerm {
  current: SolarTerm;
  current_date: string;
  next: SolarTerm;
  next_date: string;
  days_to_next: number;
}

export function getNearestSolarTerm(date: string): NearestSolarTerm {
  const target = parseIsoDate(date);
  const occurrences: Array<{ term: SolarTerm; date: CalendarDate }> = [];
  for (const year of [target.year - 1, target.year, target.year + 1]) {
    for (const term of SOLAR_TERMS) {
      occurrences.push({ term, date: { year, month: term.month, day: term.day } });
    }
  }
  occurrences.sort((a, b) => compareDates(a.date, b.date));

  const nextIndex = occurrences.findIndex((o) => compareDates(o.date, target) > 0);
  const current = occurrences[nextIndex - 1];
  const next = occurrences[nextIndex];

  return {
    current: current.term,
    current_date: formatIsoDate(current.date),
    next: next.term,
    next_date: formatIsoDate(next.date),
    days_to_next: daysBetween(target, next.date),
  };
}

export function getSolarTermsBySeason(season: Season): SolarTerm[] {
  return SOLAR_TERMS.filter((t) => t.season === season);
}

export function shiftAnchor(year: number, idOrName: string, offsetDays: number): CalendarDate {
  return addDays(resolveAnchorDate(year, idOrName), offsetDays);
}
