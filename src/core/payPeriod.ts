import {
  differenceInCalendarDays,
  eachDayOfInterval,
  format,
  getDaysInMonth,
  isValid,
  parseISO,
} from 'date-fns';
import { fromZonedTime } from 'date-fns-tz';
import { ConfigurationError } from '../errors';
import { nextLocalDate } from './calendar';
import { LocalDate, PayPeriod } from './types';

function parseYearMonth(ym: string): { year: number; month: number } {
  const m = /^(\d{4})-?(\d{2})$/.exec(ym.trim());
  const year = m ? Number(m[1]) : NaN;
  const month = m ? Number(m[2]) : NaN;
  if (!m || month < 1 || month > 12) {
    throw new ConfigurationError(`Invalid year-month "${ym}", expected YYYY-MM or YYYYMM`);
  }
  return { year, month };
}

const pad2 = (n: number) => String(n).padStart(2, '0');
const ymd = (y: number, m: number, d: number): LocalDate => `${y}-${pad2(m)}-${pad2(d)}`;

export function makePayPeriod(start: LocalDate, end: LocalDate, id?: string): PayPeriod {
  if (!isValid(parseISO(start)) || !isValid(parseISO(end)) || start > end) {
    throw new ConfigurationError(`Invalid pay period ${start}..${end}`);
  }
  return { id: id ?? `${start}..${end}`, start, end };
}

/**
 * 按締め日（closing day）求月度工资期间。
 * - closingDay >= 28：按自然月
 * - 否则：上月 closingDay+1 ～ 本月 closingDay
 */
export function resolvePayPeriod(yearMonth: string, closingDay = 31): PayPeriod {
  const { year, month } = parseYearMonth(yearMonth);
  if (!Number.isInteger(closingDay) || closingDay < 1 || closingDay > 31) {
    throw new ConfigurationError(`Invalid closing day ${closingDay}, expected 1..31`);
  }
  const id = `${year}-${pad2(month)}`;

  if (closingDay >= 28) {
    const last = getDaysInMonth(new Date(year, month - 1, 1));
    return { id, start: ymd(year, month, 1), end: ymd(year, month, last) };
  }

  const prevYear = month === 1 ? year - 1 : year;
  const prevMonth = month === 1 ? 12 : month - 1;
  return {
    id,
    start: ymd(prevYear, prevMonth, closingDay + 1),
    end: ymd(year, month, closingDay),
  };
}

export function listPayPeriodDates(period: PayPeriod): LocalDate[] {
  return eachDayOfInterval({ start: parseISO(period.start), end: parseISO(period.end) }).map((d) =>
    format(d, 'yyyy-MM-dd'),
  );
}

export const payPeriodLength = (period: PayPeriod): number =>
  differenceInCalendarDays(parseISO(period.end), parseISO(period.start)) + 1;

export const inPayPeriod = (period: PayPeriod, date: LocalDate): boolean =>
  period.start <= date && date <= period.end;

/** 期间在给定时区下的 [start, end) 绝对时刻 */
export function payPeriodBounds(period: PayPeriod, timezone: string): { start: Date; end: Date } {
  return {
    start: fromZonedTime(`${period.start}T00:00:00`, timezone),
    end: fromZonedTime(`${nextLocalDate(period.end)}T00:00:00`, timezone),
  };
}
