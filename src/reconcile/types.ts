import { WorkSession } from '../core/types';

export type IssueLevel = 'INFO' | 'WARNING' | 'ERROR';

export type AnomalyCode =
  | 'DuplicateCheckIn' // 连续两次 IN，前一次被丢弃
  | 'OrphanCheckOut' // OUT 前没有待闭合的 IN
  | 'UnclosedSession' // 查询区间结束时仍未 OUT
  | 'ZeroLengthSession' // OUT 不晚于 IN（按分钟截断后）
  | 'LongSession' // 超长班次，仍计入
  | 'InvalidScanEvent' // 时间戳无法解析
  | 'NegativeNetClamped'; // 实发为负，已截为 0

export type PayrollAnomaly = {
  level: IssueLevel;
  code: AnomalyCode;
  message: string; // 人类可读
  employeeId: string;
  at?: string; // 相关事件时间 ISO
  meta?: Record<string, unknown>;
};

export type ReconcileResult = {
  sessions: WorkSession[];
  anomalies: PayrollAnomaly[];
};
