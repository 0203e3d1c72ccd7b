import type { RoundingMode } from '../state/number';

export type LocalDate = string; // YYYY-MM-DD（日历时区）
export type Direction = 'IN' | 'OUT';
export type DayCategory = 'NORMAL' | 'HOLIDAY' | 'SPECIAL';

export interface ScanEvent {
  employeeId: string;
  timestamp: string; // ISO 8601 instant
  direction: Direction;
}

export interface DayClassification {
  date: LocalDate;
  category: DayCategory;
  specialPeriodId?: string;
}

export interface WorkSession {
  employeeId: string;
  date: LocalDate; // 本段所在的本地日期
  start: string; // ISO(UTC)
  end: string; // ISO(UTC)，恒 > start
  minutes: number;
  category: DayCategory;
  specialPeriodId?: string;
}

export interface PayPeriod {
  id: string; // 例如 "2025-06"
  start: LocalDate; // 含
  end: LocalDate; // 含
}

export interface Aggregate {
  employeeId: string;
  payPeriod: PayPeriod;
  normalMinutes: number;
  holidayMinutes: number;
  specialMinutes: number;
  overtimeMinutes: number;
  specialMinutesByPeriod: Record<string, number>;
  /** normal + holiday + special + overtime + breakMinutes */
  workedMinutes: number;
  breakMinutes: number;
  workedDays: number;
}

export type PayMode = 'HOURLY' | 'FIXED';
export type DeductionKind = 'PERCENT' | 'FLAT';

export interface DeductionRule {
  name: string;
  kind: DeductionKind;
  amount: string; // PERCENT: "10" 表示 10%
}

export interface Allowance {
  name: string;
  amount: string;
}

export type ProrationMethod =
  | 'CALENDAR_DAYS'
  | 'FIXED_30'
  | 'WORKING_DAYS'
  | 'WORKED_HOURS'
  | 'FULL_SALARY';

export interface ProrationRule {
  method: ProrationMethod;
  /** WORKED_HOURS 的分母，月标准工时 */
  standardMonthlyHours?: string;
}

export interface PayPolicy {
  employeeId: string;
  mode: PayMode;
  rate?: string; // HOURLY：时薪
  salary?: string; // FIXED：每期固定薪资
  deductionRules: DeductionRule[];
  allowances?: Allowance[];
  employment?: { start?: LocalDate; end?: LocalDate };
  proration?: ProrationRule;
}

export interface Multipliers {
  holiday: string;
  special: string;
  overtime: string;
}

export interface RoundingRule {
  decimals: number;
  mode: RoundingMode;
}

export interface OvertimeRules {
  dailyCapMinutes?: number;
  periodCapMinutes?: number;
}

export interface BreakRules {
  lunch?: { from: string; to: string }; // HH:mm 本地时间
  dailyRestMinutes?: number;
}

export interface PayrollLine {
  employeeId: string;
  payPeriod: string;
  normalMinutes: number;
  holidayMinutes: number;
  specialMinutes: number;
  overtimeMinutes: number;
  grossAmount: string;
  allowances: Array<{ name: string; amount: string }>;
  deductions: Array<{ name: string; amount: string }>;
  netAmount: string;
  currency?: string;
}
