import { addMinutes, subMinutes } from 'date-fns';
import type { Logger } from 'pino';
import { loadPayPolicy, loadPayrollConfig, PayPolicyConfig } from '../config';
import { ConfigurationError, ProrationUndefinedError } from '../errors';
import { createLogger } from '../logger';
import { aggregateSessions } from '../core/aggregate';
import { createCalendar } from '../core/calendar';
import { calculatePayrollLine, PayrollSettings } from '../core/calcPayrollLine';
import { inPayPeriod, makePayPeriod, payPeriodBounds } from '../core/payPeriod';
import { Aggregate, PayPeriod, PayrollLine, ScanEvent, WorkSession } from '../core/types';
import { exportPayrollCsv, sortPayrollLines } from '../export/to-csv';
import { EventSource } from '../reconcile/event-source';
import { localDateOf } from '../reconcile/helpers';
import { reconcileSessions } from '../reconcile/reconcile';
import { PayrollAnomaly } from '../reconcile/types';
import { summarizeRun } from '../summarize/summarizeRun';
import { EmployeeFailure, RunReport } from '../summarize/type';

export type EmployeeRunInput = {
  policy: unknown; // 未校验的 PayPolicy，运行前统一校验
  events: readonly ScanEvent[];
};

export type PayrollRunInput = {
  payPeriod: PayPeriod;
  employees: readonly EmployeeRunInput[];
};

export type RunOptions = {
  logger?: Logger;
};

export type CollectOptions = {
  /** 期间前后各多取的分钟数，跨期间边界的班次才能配对；默认一天 */
  marginMinutes?: number;
};

export type PayrollRunResult = {
  payPeriod: PayPeriod;
  sessions: Map<string, WorkSession[]>; // employeeId -> 期间内的工作段
  aggregates: Aggregate[];
  lines: PayrollLine[];
  anomalies: PayrollAnomaly[];
  failures: EmployeeFailure[];
  report: RunReport;
  /** config.export.deductionLayout 下的 CSV */
  csv: string;
};

function validatePolicies(employees: readonly EmployeeRunInput[]): PayPolicyConfig[] {
  const problems: string[] = [];
  const policies: PayPolicyConfig[] = [];
  const seen = new Set<string>();

  employees.forEach((e, i) => {
    try {
      const policy = loadPayPolicy(e.policy);
      if (seen.has(policy.employeeId)) {
        problems.push(`employees[${i}]: duplicate policy for employee ${policy.employeeId}`);
      }
      seen.add(policy.employeeId);
      policies.push(policy);
    } catch (err) {
      if (!(err instanceof ConfigurationError)) throw err;
      problems.push(`employees[${i}]: ${err.message}`);
    }
  });

  if (problems.length > 0) {
    throw new ConfigurationError(`Invalid pay policies: ${problems.join(' | ')}`);
  }
  return policies;
}

/**
 * 一次工资计算：打卡 → 工作段 → 分类汇总 → 工资行。
 *
 * - 配置或任一 PayPolicy 不合法：抛 ConfigurationError，什么都不算
 * - 单个员工的 ProrationUndefinedError 记入 failures，其他员工照常计算
 * - 异常（打卡缺失等）附在结果里，不抛出
 * - 打卡可以超出期间（见 collectRunInput）：只计期间内日期的工作段，
 *   只报 `at` 落在期间内的异常
 *
 * 无共享可变状态；同样的输入总是得到同样的结果。
 */
export function runPayroll(
  input: PayrollRunInput,
  rawConfig: unknown,
  opts: RunOptions = {},
): PayrollRunResult {
  // ---------- 0) 校验（失败即整体中止） ----------
  const config = loadPayrollConfig(rawConfig);
  const payPeriod = makePayPeriod(input.payPeriod.start, input.payPeriod.end, input.payPeriod.id);
  const policies = validatePolicies(input.employees);
  const calendar = createCalendar(config.calendar);
  const log = opts.logger ?? createLogger();

  const settings: PayrollSettings = {
    multipliers: config.multipliers,
    rounding: config.rounding,
    proration: config.proration,
    currency: config.currency,
    classify: (d) => calendar.classify(d),
    specialMultiplier: (id) => calendar.specialMultiplier(id),
  };

  log.info({ payPeriod: payPeriod.id, employees: policies.length }, 'payroll run started');

  const sessions = new Map<string, WorkSession[]>();
  const inPeriod = (at: string | undefined) =>
    at === undefined || inPayPeriod(payPeriod, localDateOf(new Date(at), calendar.timezone));
  const aggregates: Aggregate[] = [];
  const lines: PayrollLine[] = [];
  const anomalies: PayrollAnomaly[] = [];
  const failures: EmployeeFailure[] = [];

  // ---------- 1) 逐员工计算 ----------
  input.employees.forEach((employee, i) => {
    const policy = policies[i];
    const employeeId = policy.employeeId;

    const reconciled = reconcileSessions(employeeId, employee.events, calendar, config.reconcile);
    sessions.set(
      employeeId,
      reconciled.sessions.filter((s) => inPayPeriod(payPeriod, s.date)),
    );
    const reconcileAnomalies = reconciled.anomalies.filter((a) => inPeriod(a.at));
    anomalies.push(...reconcileAnomalies);

    const aggregate = aggregateSessions(employeeId, payPeriod, reconciled.sessions, {
      overtime: config.overtime,
      breaks: config.breaks,
      timezone: calendar.timezone,
    });
    aggregates.push(aggregate);

    try {
      const { line, anomalies: lineAnomalies } = calculatePayrollLine(aggregate, policy, settings);
      lines.push(line);
      anomalies.push(...lineAnomalies);
      log.debug(
        { employeeId, sessions: reconciled.sessions.length, anomalies: reconcileAnomalies.length + lineAnomalies.length },
        'employee payroll calculated',
      );
    } catch (err) {
      if (!(err instanceof ProrationUndefinedError)) throw err;
      failures.push({ employeeId, code: err.code, message: err.message });
      log.warn({ employeeId, code: err.code }, err.message);
    }
  });

  // ---------- 2) 报告 ----------
  const report = summarizeRun(anomalies, failures);
  log.info(
    {
      payPeriod: payPeriod.id,
      lines: lines.length,
      failures: failures.length,
      issues: report.issueCountByLevel,
      score: report.score,
    },
    'payroll run finished',
  );

  const sorted = sortPayrollLines(lines);
  const csv = exportPayrollCsv(sorted, { deductionLayout: config.export.deductionLayout });

  return { payPeriod, sessions, aggregates, lines: sorted, anomalies, failures, report, csv };
}

/**
 * 从 EventSource 取出每名员工的打卡和工资规则。
 * 取数区间是期间本地时间 [start, end) 前后各放宽 marginMinutes，
 * 这样 22:00–02:00 这类跨期间边界的班次在两个期间都能配对，各自只计本期日期的部分。
 *
 * @throws {ConfigurationError} 某员工没有工资规则
 */
export function collectRunInput(
  source: EventSource,
  employeeIds: readonly string[],
  payPeriod: PayPeriod,
  timezone: string,
  opts: CollectOptions = {},
): PayrollRunInput {
  const margin = opts.marginMinutes ?? 24 * 60;
  const bounds = payPeriodBounds(payPeriod, timezone);
  const range = { start: subMinutes(bounds.start, margin), end: addMinutes(bounds.end, margin) };
  const employees = employeeIds.map((employeeId) => {
    const policy = source.getPolicy(employeeId);
    if (!policy) throw new ConfigurationError(`No pay policy for employee ${employeeId}`);
    return { policy, events: source.listEvents(employeeId, range) };
  });
  return { payPeriod, employees };
}
