import { computeOvertime } from './overtime';
import { DayBucket, deductDailyRest, lunchOverlapMinutes } from './breaks';
import { inPayPeriod } from './payPeriod';
import { sumBy } from '../reconcile/helpers';
import {
  Aggregate,
  BreakRules,
  LocalDate,
  OvertimeRules,
  PayPeriod,
  WorkSession,
} from './types';

export const UNNAMED_SPECIAL_PERIOD = '__UNNAMED__';

export type AggregateRules = {
  overtime?: OvertimeRules;
  breaks?: BreakRules;
  timezone?: string; // 午休窗口按此时区解释，默认 UTC
};

/**
 * 汇总一名员工在一个工资期间内的工作段。
 *
 * 1) 按日期分桶（NORMAL / HOLIDAY / SPECIAL[periodId]），只取期间内的段
 * 2) 扣午休重叠分钟、每日固定休息分钟（均记入 breakMinutes）
 * 3) NORMAL 分钟按日/按期阈值拆出 overtime
 *
 * normal + holiday + special + overtime + breakMinutes === workedMinutes
 */
export function aggregateSessions(
  employeeId: string,
  payPeriod: PayPeriod,
  sessions: readonly WorkSession[],
  rules: AggregateRules = {},
): Aggregate {
  const timezone = rules.timezone ?? 'UTC';
  const lunch = rules.breaks?.lunch;
  const days = new Map<LocalDate, DayBucket>();
  let workedMinutes = 0;
  let breakMinutes = 0;

  // ---------- 1) 分桶 + 午休 ----------
  for (const s of sessions) {
    if (s.employeeId !== employeeId || !inPayPeriod(payPeriod, s.date)) continue;
    if (s.minutes <= 0) continue;

    const lunchMinutes = lunch ? Math.min(s.minutes, lunchOverlapMinutes(s, lunch, timezone)) : 0;
    const paid = s.minutes - lunchMinutes;
    workedMinutes += s.minutes;
    breakMinutes += lunchMinutes;

    let bucket = days.get(s.date);
    if (!bucket) {
      bucket = { normal: 0, holiday: 0, special: new Map() };
      days.set(s.date, bucket);
    }
    if (s.category === 'NORMAL') {
      bucket.normal += paid;
    } else if (s.category === 'HOLIDAY') {
      bucket.holiday += paid;
    } else {
      const id = s.specialPeriodId ?? UNNAMED_SPECIAL_PERIOD;
      bucket.special.set(id, (bucket.special.get(id) ?? 0) + paid);
    }
  }

  // ---------- 2) 每日固定休息 ----------
  const rest = rules.breaks?.dailyRestMinutes ?? 0;
  if (rest > 0) {
    for (const bucket of days.values()) breakMinutes += deductDailyRest(bucket, rest);
  }

  // ---------- 3) 合计 + overtime ----------
  const normalByDate: Record<LocalDate, number> = {};
  const specialByPeriod = new Map<string, number>();
  let holidayMinutes = 0;
  for (const [date, bucket] of days) {
    normalByDate[date] = bucket.normal;
    holidayMinutes += bucket.holiday;
    for (const [id, minutes] of bucket.special) {
      specialByPeriod.set(id, (specialByPeriod.get(id) ?? 0) + minutes);
    }
  }
  const { normalMinutes, overtimeMinutes } = computeOvertime(normalByDate, rules.overtime);

  // 固定 key 顺序，输出与输入顺序无关；fromEntries 写自有属性，id 可以是任意字符串
  const specialEntries = [...specialByPeriod]
    .filter(([, minutes]) => minutes > 0)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  const specialMinutesByPeriod: Record<string, number> = Object.fromEntries(specialEntries);

  return {
    employeeId,
    payPeriod,
    normalMinutes,
    holidayMinutes,
    specialMinutes: sumBy(specialEntries, ([, m]) => m),
    overtimeMinutes,
    specialMinutesByPeriod,
    workedMinutes,
    breakMinutes,
    workedDays: days.size,
  };
}
