import { ValidationError } from '../errors';
import type { CalendarWindow } from './types';

const DAYS_IN_MONTH = [31, 29, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31] as const;
const REFERENCE_YEAR_DAYS = 365;
const MS_PER_DAY = 24 * 60 * 60 * 1000;

export const FEB_28_DOY = 59;
export const MAR_1_DOY = 60;
export const MAX_WINDOW_RADIUS = 182;

export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(month: number, year?: number): number {
  const max = DAYS_IN_MONTH[month - 1];
  if (month === 2 && year !== undefined && !isLeapYear(year)) return 28;
  return max;
}

export function assertCalendarDate(month: number, day: number): void {
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    throw new ValidationError(`Invalid month: ${month}`);
  }
  if (!Number.isInteger(day) || day < 1 || day > daysInMonth(month)) {
    throw new ValidationError(`Invalid day ${day} for month ${month}`);
  }
}

// Feb 29 shares Feb 28's slot; leap-day membership is decided by the window.
export function referenceDayOfYear(month: number, day: number): number {
  assertCalendarDate(month, day);
  let doy = 0;
  for (let m = 1; m < month; m++) {
    doy += daysInMonth(m, 2023);
  }
  return doy + Math.min(day, daysInMonth(month, 2023));
}

function wrapDayOfYear(doy: number): number {
  if (doy < 1) return doy + REFERENCE_YEAR_DAYS;
  if (doy > REFERENCE_YEAR_DAYS) return doy - REFERENCE_YEAR_DAYS;
  return doy;
}

export function assertWindowRadius(radius: number): void {
  if (!Number.isInteger(radius) || radius < 0 || radius > MAX_WINDOW_RADIUS) {
    throw new ValidationError(`Window radius must be an integer between 0 and ${MAX_WINDOW_RADIUS}, got ${radius}`);
  }
}

export function resolveWindow(month: number, day: number, radius: number): CalendarWindow {
  assertCalendarDate(month, day);
  assertWindowRadius(radius);

  const center = referenceDayOfYear(month, day);
  const days: number[] = [];
  for (let offset = -radius; offset <= radius; offset++) {
    days.push(wrapDayOfYear(center + offset));
  }

  const isLeapDayTarget = month === 2 && day === 29;
  return {
    month,
    day,
    radius,
    day_of_year: center,
    days,
    includes_leap_day: isLeapDayTarget || (days.includes(FEB_28_DOY) && days.includes(MAR_1_DOY)),
  };
}

export function isInWindow(window: CalendarWindow, date: CalendarDate): boolean {
  if (date.month === 2 && date.day === 29) return window.includes_leap_day;
  return window.days.includes(referenceDayOfYear(date.month, date.day));
}

export function canonicalDays(): Array<{ month: number; day: number }> {
  const days: Array<{ month: number; day: number }> = [];
  for (let month = 1; month <= 12; month++) {
    for (let day = 1; day <= daysInMonth(month); day++) {
      days.push({ month, day });
    }
  }
  return days;
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

export function toMonthDay(month: number, day: number): string {
  return `${pad2(month)}-${pad2(day)}`;
}

export function parseMonthDay(monthDay: string): { month: number; day: number } {
  const match = /^(\d{2})-(\d{2})$/.exec(monthDay.trim());
  if (!match) {
    throw new ValidationError(`Invalid month-day "${monthDay}", expected MM-DD`);
  }
  const month = Number(match[1]);
  const day = Number(match[2]);
  assertCalendarDate(month, day);
  return { month, day };
}

export function parseIsoDate(value: string): CalendarDate {
  const match = /^(\d{4})-(\d{2})-(\d{2})/.exec(value);
  if (!match) {
    throw new ValidationError(`Invalid date "${value}", expected YYYY-MM-DD`);
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  assertCalendarDate(month, day);
  if (day > daysInMonth(month, year)) {
    throw new ValidationError(`Invalid date "${value}": ${year} is not a leap year`);
  }
  return { year, month, day };
}

export function formatIsoDate(date: CalendarDate): string {
  return `${date.year}-${pad2(date.month)}-${pad2(date.day)}`;
}

function toUtcMs(date: CalendarDate): number {
  return Date.UTC(date.year, date.month - 1, date.day);
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  const shifted = new Date(toUtcMs(date) + days * MS_PER_DAY);
  return {
    year: shifted.getUTCFullYear(),
    month: shifted.getUTCMonth() + 1,
    day: shifted.getUTCDate(),
  };
}

export function daysBetween(from: CalendarDate, to: CalendarDate): number {
  return Math.round((toUtcMs(to) - toUtcMs(from)) / MS_PER_DAY);
}

export function compareDates(a: CalendarDate, b: CalendarDate): number {
  return toUtcMs(a) - toUtcMs(b);
}
