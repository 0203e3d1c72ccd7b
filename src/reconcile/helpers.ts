import { formatInTimeZone, fromZonedTime } from 'date-fns-tz';
import { IssueLevel } from './types';
import { nextLocalDate } from '../core/calendar';
import { LocalDate } from '../core/types';

const MINUTE_MS = 60_000;

export const minutesBetween = (start: Date, end: Date): number =>
  Math.round((end.getTime() - start.getTime()) / MINUTE_MS);

export const localDateOf = (instant: Date, timezone: string): LocalDate =>
  formatInTimeZone(instant, timezone, 'yyyy-MM-dd');

export type DaySlice = { date: LocalDate; start: Date; end: Date };

/**
 * 按时区本地零点切分 [start, end)。
 * 22:00–02:00 → [22:00–24:00, 00:00–02:00]
 */
export function splitAtLocalMidnights(start: Date, end: Date, timezone: string): DaySlice[] {
  const slices: DaySlice[] = [];
  let cursor = start;
  while (cursor < end) {
    const date = localDateOf(cursor, timezone);
    const midnight = fromZonedTime(`${nextLocalDate(date)}T00:00:00`, timezone);
    const sliceEnd = midnight < end ? midnight : end;
    slices.push({ date, start: cursor, end: sliceEnd });
    cursor = sliceEnd;
  }
  return slices;
}

// ---------- 聚合工具 ----------

export function sumBy<T>(arr: readonly T[], pick: (x: T) => number): number {
  let s = 0;
  for (const it of arr) s += pick(it) || 0;
  return s;
}

export function groupBy<T>(arr: readonly T[], key: (x: T) => string): Map<string, T[]> {
  const m = new Map<string, T[]>();
  for (const it of arr) {
    const k = key(it);
    const group = m.get(k);
    if (group) group.push(it);
    else m.set(k, [it]);
  }
  return m;
}

// ---------- 评分 ----------
export function computeScore(levels: IssueLevel[]): number {
  if (!levels.length) return 100;
  let score = 100;
  for (const s of levels) {
    if (s === 'WARNING') score -= 5;
    else if (s === 'ERROR') score -= 20;
  }
  return Math.max(0, Math.min(100, score));
}
