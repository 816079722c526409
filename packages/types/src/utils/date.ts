import { ERA_OFFSETS, ERA_PREFIXES } from './constants.js';
import type { EraInterpretation } from '../schemas/asset.js';

export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31] as const;

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) return 29;
  return DAYS_IN_MONTH[month - 1] ?? 0;
}

/**
 * Strict calendar check: February 30th is invalid, never clamped to March.
 */
export function isValidCalendarDate(year: number, month: number, day: number): boolean {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) {
    return false;
  }
  if (year < 1 || month < 1 || month > 12 || day < 1) {
    return false;
  }
  return day <= daysInMonth(year, month);
}

/**
 * Gregorian year for an era year. `gregorian` reads the digits as 20xx.
 */
export function eraYearToGregorian(interpretation: EraInterpretation, eraYear: number): number {
  switch (interpretation) {
    case 'gregorian':
      return 2000 + eraYear;
    case 'reiwa':
      return ERA_OFFSETS.reiwa + eraYear;
    case 'heisei':
      return ERA_OFFSETS.heisei + eraYear;
    case 'showa':
      return ERA_OFFSETS.showa + eraYear;
  }
}

export function currentReiwaYear(now: Date = new Date()): number {
  return now.getFullYear() - ERA_OFFSETS.reiwa;
}

export function toIsoDate(date: CalendarDate): string {
  const year = String(date.year).padStart(4, '0');
  const month = String(date.month).padStart(2, '0');
  const day = String(date.day).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Era-prefixed rendering, e.g. `R6/12/25`, `H30/05/01`, `S60/01/15`.
 * Years before Showa keep their four-digit Gregorian form.
 */
export function toWarekiDisplay(date: CalendarDate): string {
  const month = String(date.month).padStart(2, '0');
  const day = String(date.day).padStart(2, '0');

  if (date.year >= ERA_OFFSETS.reiwa + 1) {
    return `${ERA_PREFIXES.reiwa}${date.year - ERA_OFFSETS.reiwa}/${month}/${day}`;
  }
  if (date.year >= ERA_OFFSETS.heisei + 1) {
    return `${ERA_PREFIXES.heisei}${date.year - ERA_OFFSETS.heisei}/${month}/${day}`;
  }
  if (date.year >= ERA_OFFSETS.showa + 1) {
    return `${ERA_PREFIXES.showa}${date.year - ERA_OFFSETS.showa}/${month}/${day}`;
  }
  return `${String(date.year).padStart(4, '0')}/${month}/${day}`;
}

export function parseIsoDate(dateStr: string): CalendarDate | null {
  const match = ISO_DATE_PATTERN.exec(dateStr.trim());
  if (match === null) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (!isValidCalendarDate(year, month, day)) return null;

  return { year, month, day };
}

export function isValidISODate(dateStr: string): boolean {
  return parseIsoDate(dateStr) !== null;
}

export function compareDates(a: string, b: string): number {
  return a.localeCompare(b);
}
