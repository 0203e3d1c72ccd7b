import { PayPolicy, ScanEvent } from '../core/types';

export type EventRange = { start: Date; end: Date }; // [start, end)

/**
 * 考勤存储的只读接口。引擎只读不写；一次运行内应来自同一份快照。
 */
export interface EventSource {
  listEvents(employeeId: string, range: EventRange): ScanEvent[];
  getPolicy(employeeId: string): PayPolicy | undefined;
}
