/**
 * League calendar
 * Seasons follow the calendar quarters, with the Kings Cup and the Finals
 * carved out of the last ten days of June and December.
 */

import type { SeasonName } from "./types.js";

export const SEASON_ORDER: SeasonName[] = ["Season 1", "Season 2", "Kings Cup", "Season 3", "Season 4", "Finals"];

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

export interface CalendarDate {
  year: number;
  month: number; // 1-12
  day: number;
}

/** Parses YYYY-MM-DD, rejecting impossible dates such as 2026-02-30 */
export function parseIsoDate(value: string): CalendarDate | null {
  const m = ISO_DATE.exec(value.trim());
  if (!m) return null;
  const year = Number(m[1]);
  const month = Number(m[2]);
  const day = Number(m[3]);
  const probe = new Date(Date.UTC(year, month - 1, day));
  if (probe.getUTCFullYear() !== year || probe.getUTCMonth() !== month - 1 || probe.getUTCDate() !== day) {
    return null;
  }
  return { year, month, day };
}

export function isIsoDate(value: string): boolean {
  return parseIsoDate(value) !== null;
}

function seasonFor({ month, day }: CalendarDate): SeasonName {
  if (month <= 3) return "Season 1";
  if (month <= 5 || (month === 6 && day <= 20)) return "Season 2";
  if (month === 6) return "Kings Cup";
  if (month <= 9) return "Season 3";
  if (month <= 11 || day <= 20) return "Season 4";
  return "Finals";
}

/** Season a round date belongs to. Throws on a malformed date. */
export function getSeason(date: string): SeasonName {
  const parsed = parseIsoDate(date);
  if (!parsed) throw new RangeError(`Invalid date "${date}", expected YYYY-MM-DD`);
  return seasonFor(parsed);
}

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/** Inclusive first and last day of a season in a given year */
export function seasonWindow(year: number, season: SeasonName): { start: string; end: string } {
  const d = (month: number, day: number) => `${year}-${pad2(month)}-${pad2(day)}`;
  switch (season) {
    case "Season 1":
      return { start: d(1, 1), end: d(3, 31) };
    case "Season 2":
      return { start: d(4, 1), end: d(6, 20) };
    case "Kings Cup":
      return { start: d(6, 21), end: d(6, 30) };
    case "Season 3":
      return { start: d(7, 1), end: d(9, 30) };
    case "Season 4":
      return { start: d(10, 1), end: d(12, 20) };
    case "Finals":
      return { start: d(12, 21), end: d(12, 31) };
  }
}

/** "2026 Season 1" - identifies a season across years */
export function seasonKey(date: string): string {
  const parsed = parseIsoDate(date);
  if (!parsed) throw new RangeError(`Invalid date "${date}", expected YYYY-MM-DD`);
  return `${parsed.year} ${seasonFor(parsed)}`;
}

/** True once the season's last day is strictly before `asOf` */
export function isSeasonClosed(year: number, season: SeasonName, asOf: string): boolean {
  return seasonWindow(year, season).end < asOf;
}
