export * from './core/types';
export { createCalendar, nextLocalDate } from './core/calendar';
export type { Calendar } from './core/calendar';
export {
  makePayPeriod,
  resolvePayPeriod,
  listPayPeriodDates,
  payPeriodLength,
  inPayPeriod,
  payPeriodBounds,
} from './core/payPeriod';
export { computeOvertime } from './core/overtime';
export type { OvertimeSplit } from './core/overtime';
export { lunchOverlapMinutes, deductDailyRest } from './core/breaks';
export type { DayBucket } from './core/breaks';
export { aggregateSessions, UNNAMED_SPECIAL_PERIOD } from './core/aggregate';
export type { AggregateRules } from './core/aggregate';
export { prorateSalary, employedRange, isPartialPeriod } from './core/proration';
export type { ProrationContext } from './core/proration';
export { calculatePayrollLine } from './core/calcPayrollLine';
export type { PayrollSettings, PayrollLineResult } from './core/calcPayrollLine';

export * from './state/number';

export { reconcileSessions } from './reconcile/reconcile';
export { makeInMemoryEventSource } from './reconcile/adapters/in-memory-event-source';
export type { InMemoryEventSourceOptions } from './reconcile/adapters/in-memory-event-source';
export * from './reconcile/types';
export * from './reconcile/event-source';
export type { ReconcileRules } from './reconcile/rules';

export {
  toExportRows,
  toCsv,
  exportPayrollCsv,
  escapeCsvField,
  escapeDeductionName,
  sortPayrollLines,
  compareIds,
} from './export/to-csv';
export type { DeductionLayout, ExportOptions, CsvOptions } from './export/to-csv';

export { summarizeRun } from './summarize/summarizeRun';
export type { EmployeeFailure, RunIssue, RunReport } from './summarize/type';

export { runPayroll, collectRunInput } from './orchestrator/runPayroll';
export type {
  CollectOptions,
  EmployeeRunInput,
  PayrollRunInput,
  PayrollRunResult,
  RunOptions,
} from './orchestrator/runPayroll';

export * from './errors';
export {
  loadPayrollConfig,
  loadPayPolicy,
  loadEnv,
  parseConfig,
  findSpecialOverlaps,
  CalendarConfigSchema,
  PayPolicySchema,
  PayrollConfigSchema,
} from './config';
export type {
  CalendarConfig,
  PayPolicyConfig,
  PayrollConfig,
  PayrollConfigInput,
  PayrollEnv,
  SpecialPeriodConfig,
} from './config';
export { createLogger } from './logger';
export type { Logger } from './logger';
