import { LocalDate, OvertimeRules } from './types';

export type OvertimeSplit = {
  normalMinutes: number;
  overtimeMinutes: number;
};

/**
 * 把 NORMAL 分钟拆成 regular / overtime。
 * - 先按日：当天超过 dailyCapMinutes 的部分记 overtime
 * - 再按期：剩余 regular 合计超过 periodCapMinutes 的部分记 overtime
 * - 两个阈值都可省略；省略即不触发
 *
 * 只依赖每日合计，与工作段的先后顺序无关。
 *
 * @param normalMinutesByDate 每个本地日期的 NORMAL 分钟（已扣休息）
 */
export function computeOvertime(
  normalMinutesByDate: Record<LocalDate, number>,
  rules: OvertimeRules = {},
): OvertimeSplit {
  const { dailyCapMinutes, periodCapMinutes } = rules;
  let regular = 0;
  let overtime = 0;

  for (const minutesRaw of Object.values(normalMinutesByDate)) {
    const minutes = Math.max(0, minutesRaw || 0); // 保护：负数当 0
    const toRegular = dailyCapMinutes === undefined ? minutes : Math.min(minutes, dailyCapMinutes);
    regular += toRegular;
    overtime += minutes - toRegular;
  }

  if (periodCapMinutes !== undefined && regular > periodCapMinutes) {
    overtime += regular - periodCapMinutes;
    regular = periodCapMinutes;
  }

  return { normalMinutes: regular, overtimeMinutes: overtime };
}
