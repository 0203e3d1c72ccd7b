import { isValid, parseISO } from 'date-fns';
import { EventRange, EventSource } from '../event-source';
import { PayPolicy, ScanEvent } from '../../core/types';
import { groupBy } from '../helpers';

export type InMemoryEventSourceOptions = {
  events: readonly ScanEvent[];
  policies: readonly PayPolicy[];
};

/**
 * 把已经取出来的打卡行/工资规则适配为 EventSource。
 * - listEvents：按员工过滤，落在 [start, end) 内，按时间升序（同一时刻保持原顺序）
 * - 无法解析的时间戳原样保留，交给 reconcile 报 InvalidScanEvent
 */
export function makeInMemoryEventSource(opts: InMemoryEventSourceOptions): EventSource {
  const byEmployee = groupBy(opts.events, (e) => e.employeeId);
  const policies = new Map(opts.policies.map((p) => [p.employeeId, p] as const));

  return {
    listEvents(employeeId: string, range: EventRange): ScanEvent[] {
      const rows = byEmployee.get(employeeId) ?? [];
      const timed = rows.map((e, i) => ({ e, i, at: parseISO(e.timestamp) }));
      return timed
        .filter(({ at }) => !isValid(at) || (at >= range.start && at < range.end))
        .sort((a, b) => {
          const ta = isValid(a.at) ? a.at.getTime() : Number.NEGATIVE_INFINITY;
          const tb = isValid(b.at) ? b.at.getTime() : Number.NEGATIVE_INFINITY;
          return ta === tb ? a.i - b.i : ta - tb;
        })
        .map(({ e }) => e);
    },
    getPolicy(employeeId: string): PayPolicy | undefined {
      return policies.get(employeeId);
    },
  };
}
