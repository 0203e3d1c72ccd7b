import { fromZonedTime } from 'date-fns-tz';
import { BreakRules, WorkSession } from './types';

const MINUTE_MS = 60_000;

/** 工作段落在当天午休窗口（本地时间）内的分钟数 */
export function lunchOverlapMinutes(
  session: Pick<WorkSession, 'date' | 'start' | 'end'>,
  lunch: NonNullable<BreakRules['lunch']>,
  timezone: string,
): number {
  const from = fromZonedTime(`${session.date}T${lunch.from}:00`, timezone).getTime();
  const to = fromZonedTime(`${session.date}T${lunch.to}:00`, timezone).getTime();
  const start = Math.max(new Date(session.start).getTime(), from);
  const end = Math.min(new Date(session.end).getTime(), to);
  return end > start ? Math.round((end - start) / MINUTE_MS) : 0;
}

export type DayBucket = {
  normal: number;
  holiday: number;
  special: Map<string, number>; // specialPeriodId -> minutes
};

/**
 * 每个出勤日固定扣休息分钟，按 normal → special → holiday 顺序扣，
 * 各桶不减到负数。直接修改 bucket，返回实际扣除的分钟数。
 */
export function deductDailyRest(bucket: DayBucket, restMinutes: number): number {
  let remains = Math.max(0, restMinutes);

  const take = (available: number) => {
    const t = Math.min(available, remains);
    remains -= t;
    return t;
  };

  bucket.normal -= take(bucket.normal);
  for (const id of [...bucket.special.keys()].sort()) {
    const minutes = bucket.special.get(id) ?? 0;
    bucket.special.set(id, minutes - take(minutes));
  }
  bucket.holiday -= take(bucket.holiday);

  return Math.max(0, restMinutes) - remains;
}
