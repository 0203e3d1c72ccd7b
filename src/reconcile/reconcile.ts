import { isValid, parseISO, startOfMinute } from 'date-fns';
import { formatInTimeZone } from 'date-fns-tz';
import { Calendar } from '../core/calendar';
import { ScanEvent, WorkSession } from '../core/types';
import { ReconcileRules, defaultRules } from './rules';
import { PayrollAnomaly, ReconcileResult } from './types';
import { minutesBetween, splitAtLocalMidnights } from './helpers';

type ParsedEvent = ScanEvent & { at: Date; seq: number };

const formatLocal = (at: Date, calendar: Calendar) =>
  formatInTimeZone(at, calendar.timezone, 'yyyy-MM-dd HH:mm');

/**
 * 把一名员工的 IN/OUT 打卡配对成工作段。
 *
 * - IN 打开一个待闭合段，下一个 OUT 闭合它
 * - 连续 IN：前一个记 DuplicateCheckIn 并丢弃，后一个保持待闭合
 * - 没有待闭合 IN 的 OUT：记 OrphanCheckOut
 * - 输入结束时仍待闭合：记 UnclosedSession，本次不计入
 * - 闭合段跨本地零点时按日切分，每段用自己日期的 classify 结果
 *
 * 时间戳先截断到整分钟；相同时间戳保持输入顺序。
 */
export function reconcileSessions(
  employeeId: string,
  events: readonly ScanEvent[],
  calendar: Calendar,
  config: Partial<ReconcileRules> = {},
): ReconcileResult {
  const rules = { ...defaultRules, ...config };
  const anomalies: PayrollAnomaly[] = [];
  const sessions: WorkSession[] = [];

  // ---------- 1) 解析 + 稳定排序 ----------
  const parsed: ParsedEvent[] = [];
  events.forEach((e, seq) => {
    if (e.employeeId !== employeeId) return;
    const at = parseISO(e.timestamp);
    if (!isValid(at)) {
      anomalies.push({
        level: 'ERROR',
        code: 'InvalidScanEvent',
        message: `Scan event with unreadable timestamp "${e.timestamp}" was skipped.`,
        employeeId,
        meta: { event: e },
      });
      return;
    }
    parsed.push({ ...e, at: startOfMinute(at), seq });
  });
  parsed.sort((a, b) => a.at.getTime() - b.at.getTime() || a.seq - b.seq);

  // ---------- 2) 配对 ----------
  let pending: ParsedEvent | undefined;

  const close = (open: ParsedEvent, out: ParsedEvent) => {
    const minutes = minutesBetween(open.at, out.at);
    if (minutes <= 0) {
      anomalies.push({
        level: 'WARNING',
        code: 'ZeroLengthSession',
        message: `Check-out at ${formatLocal(out.at, calendar)} does not follow its check-in; no time recorded.`,
        employeeId,
        at: open.at.toISOString(),
        meta: { checkIn: open.timestamp, checkOut: out.timestamp },
      });
      return;
    }
    if (minutes > rules.longSessionMinutes) {
      anomalies.push({
        level: 'WARNING',
        code: 'LongSession',
        message: `Session from ${formatLocal(open.at, calendar)} lasted ${(minutes / 60).toFixed(1)}h.`,
        employeeId,
        at: open.at.toISOString(),
        meta: { minutes, limit: rules.longSessionMinutes },
      });
    }

    for (const slice of splitAtLocalMidnights(open.at, out.at, calendar.timezone)) {
      const { category, specialPeriodId } = calendar.classify(slice.date);
      sessions.push({
        employeeId,
        date: slice.date,
        start: slice.start.toISOString(),
        end: slice.end.toISOString(),
        minutes: minutesBetween(slice.start, slice.end),
        category,
        ...(specialPeriodId !== undefined ? { specialPeriodId } : {}),
      });
    }
  };

  for (const ev of parsed) {
    if (ev.direction === 'IN') {
      if (pending) {
        anomalies.push({
          level: 'WARNING',
          code: 'DuplicateCheckIn',
          message: `Check-in at ${formatLocal(pending.at, calendar)} was followed by another check-in and was discarded.`,
          employeeId,
          at: pending.at.toISOString(),
          meta: { discarded: pending.timestamp, kept: ev.timestamp },
        });
      }
      pending = ev;
    } else if (pending) {
      close(pending, ev);
      pending = undefined;
    } else {
      anomalies.push({
        level: 'WARNING',
        code: 'OrphanCheckOut',
        message: `Check-out at ${formatLocal(ev.at, calendar)} has no matching check-in.`,
        employeeId,
        at: ev.at.toISOString(),
      });
    }
  }

  if (pending) {
    anomalies.push({
      level: 'WARNING',
      code: 'UnclosedSession',
      message: `Check-in at ${formatLocal(pending.at, calendar)} has no check-out yet; not counted in this run.`,
      employeeId,
      at: pending.at.toISOString(),
    });
  }

  return { sessions, anomalies };
}
