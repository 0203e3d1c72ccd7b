import { differenceInCalendarDays, parseISO } from 'date-fns';
import { ProrationUndefinedError } from '../errors';
import { Exact, div, exact, mul } from '../state/number';
import { listPayPeriodDates, payPeriodLength } from './payPeriod';
import { DayClassification, LocalDate, PayPeriod, PayPolicy, ProrationRule } from './types';

export type ProrationContext = {
  employeeId: string;
  payPeriod: PayPeriod;
  employment?: PayPolicy['employment'];
  /** WORKED_HOURS 用：已付分钟（normal + holiday + special + overtime） */
  paidMinutes: number;
  /** WORKING_DAYS 用 */
  classify?: (date: LocalDate) => DayClassification;
};

/** 在职区间与工资期间的交集；没有交集时为 undefined */
export function employedRange(
  period: PayPeriod,
  employment: PayPolicy['employment'],
): { start: LocalDate; end: LocalDate } | undefined {
  const start = employment?.start && employment.start > period.start ? employment.start : period.start;
  const end = employment?.end && employment.end < period.end ? employment.end : period.end;
  return start <= end ? { start, end } : undefined;
}

export function isPartialPeriod(period: PayPeriod, employment: PayPolicy['employment']): boolean {
  const range = employedRange(period, employment);
  return !range || range.start !== period.start || range.end !== period.end;
}

const daysIn = (range: { start: LocalDate; end: LocalDate } | undefined): number =>
  range ? differenceInCalendarDays(parseISO(range.end), parseISO(range.start)) + 1 : 0;

/**
 * 固定薪资的日割/时割。
 * - CALENDAR_DAYS：salary × 在职日数 / 期间日数
 * - FIXED_30：salary × min(在职日数, 30) / 30
 * - WORKING_DAYS：salary × 在职 NORMAL 日数 / 期间 NORMAL 日数
 * - WORKED_HOURS：salary × 已付小时 / standardMonthlyHours
 * - FULL_SALARY：不扣
 */
export function prorateSalary(salary: Exact, rule: ProrationRule, ctx: ProrationContext): Exact {
  const range = employedRange(ctx.payPeriod, ctx.employment);
  const employedDays = daysIn(range);

  switch (rule.method) {
    case 'FULL_SALARY':
      return salary;
    case 'CALENDAR_DAYS':
      return div(mul(salary, exact(employedDays)), exact(payPeriodLength(ctx.payPeriod)));
    case 'FIXED_30':
      return div(mul(salary, exact(Math.min(employedDays, 30))), exact(30));
    case 'WORKING_DAYS': {
      const { classify } = ctx;
      if (!classify) {
        throw new ProrationUndefinedError(
          ctx.employeeId,
          'WORKING_DAYS proration needs a calendar to count working days',
        );
      }
      const workingDates = listPayPeriodDates(ctx.payPeriod).filter(
        (d) => classify(d).category === 'NORMAL',
      );
      if (workingDates.length === 0) {
        throw new ProrationUndefinedError(
          ctx.employeeId,
          `Pay period ${ctx.payPeriod.id} has no working days to prorate over`,
        );
      }
      const employedWorking = range
        ? workingDates.filter((d) => range.start <= d && d <= range.end).length
        : 0;
      return div(mul(salary, exact(employedWorking)), exact(workingDates.length));
    }
    case 'WORKED_HOURS': {
      if (rule.standardMonthlyHours === undefined) {
        throw new ProrationUndefinedError(
          ctx.employeeId,
          'WORKED_HOURS proration needs standardMonthlyHours',
        );
      }
      const standardMinutes = mul(exact(rule.standardMonthlyHours), exact(60));
      return div(mul(salary, exact(ctx.paidMinutes)), standardMinutes);
    }
  }
}
