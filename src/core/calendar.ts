import { format, getISODay, parseISO, addDays } from 'date-fns';
import { freeze } from 'immer';
import { CalendarConfig, CalendarConfigSchema, parseConfig } from '../config';
import { DayClassification, LocalDate } from './types';

export interface Calendar {
  readonly timezone: string;
  readonly config: CalendarConfig;
  classify(date: LocalDate): DayClassification;
  /** SPECIAL 日对应的专属倍率（未配置时为 undefined） */
  specialMultiplier(specialPeriodId: string): string | undefined;
}

export const nextLocalDate = (date: LocalDate): LocalDate =>
  format(addDays(parseISO(date), 1), 'yyyy-MM-dd');

/**
 * 日历分类：SPECIAL > HOLIDAY > NORMAL
 * - SPECIAL：落在某个特别期间内（同一天不允许出现两个不同 id，加载时即拒绝）
 * - HOLIDAY：每周固定休日（ISO weekday）或显式节假日
 *
 * @throws {ConfigurationError} 配置不合法（含特别期间互相重叠）
 */
export function createCalendar(raw: unknown): Calendar {
  const config = parseConfig(CalendarConfigSchema, raw, 'calendar');
  const weekly = new Set(config.weeklyHolidays);
  const holidays = new Set(config.holidays);
  const multipliers = new Map<string, string>();
  for (const p of config.specialPeriods) {
    if (p.multiplier !== undefined) multipliers.set(p.id, p.multiplier);
  }

  return freeze({
    timezone: config.timezone,
    config,
    classify(date: LocalDate): DayClassification {
      // YYYY-MM-DD 可直接按字符串比较
      const special = config.specialPeriods.find((p) => p.start <= date && date <= p.end);
      if (special) return { date, category: 'SPECIAL', specialPeriodId: special.id };
      if (holidays.has(date) || weekly.has(getISODay(parseISO(date)))) {
        return { date, category: 'HOLIDAY' };
      }
      return { date, category: 'NORMAL' };
    },
    specialMultiplier(specialPeriodId: string) {
      return multipliers.get(specialPeriodId);
    },
  });
}
