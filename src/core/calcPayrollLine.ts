import { ProrationUndefinedError } from '../errors';
import { PayrollAnomaly } from '../reconcile/types';
import {
  Exact,
  ZERO,
  add,
  div,
  exact,
  formatExact,
  isNegative,
  max0,
  mul,
  sub,
  sumExact,
} from '../state/number';
import { isPartialPeriod, prorateSalary } from './proration';
import {
  Aggregate,
  DayClassification,
  LocalDate,
  Multipliers,
  PayPolicy,
  PayrollLine,
  ProrationRule,
  RoundingRule,
} from './types';

export type PayrollSettings = {
  multipliers: Multipliers;
  rounding: RoundingRule;
  /** FIXED 且期间不完整时的默认日割规则；policy.proration 优先 */
  proration?: ProrationRule;
  currency?: string;
  classify?: (date: LocalDate) => DayClassification;
  /** 特别期间自己的倍率；没有时用 multipliers.special */
  specialMultiplier?: (specialPeriodId: string) => string | undefined;
};

export type PayrollLineResult = {
  line: PayrollLine;
  anomalies: PayrollAnomaly[];
};

const MINUTES_PER_HOUR = exact(60);

function hourlyGross(rate: Exact, agg: Aggregate, settings: PayrollSettings): Exact {
  const m = settings.multipliers;
  let weighted = add(exact(agg.normalMinutes), mul(exact(agg.holidayMinutes), exact(m.holiday)));
  weighted = add(weighted, mul(exact(agg.overtimeMinutes), exact(m.overtime)));
  for (const [id, minutes] of Object.entries(agg.specialMinutesByPeriod)) {
    const multiplier = settings.specialMultiplier?.(id) ?? m.special;
    weighted = add(weighted, mul(exact(minutes), exact(multiplier)));
  }
  return div(mul(rate, weighted), MINUTES_PER_HOUR);
}

function baseGross(agg: Aggregate, policy: PayPolicy, settings: PayrollSettings): Exact {
  if (policy.mode === 'HOURLY') {
    return hourlyGross(exact(policy.rate ?? '0'), agg, settings);
  }

  const salary = exact(policy.salary ?? '0');
  if (!isPartialPeriod(agg.payPeriod, policy.employment)) return salary;

  const rule = policy.proration ?? settings.proration;
  if (!rule) {
    throw new ProrationUndefinedError(
      policy.employeeId,
      `Employee ${policy.employeeId} is employed for part of pay period ${agg.payPeriod.id} and no proration rule is configured`,
    );
  }
  return prorateSalary(salary, rule, {
    employeeId: policy.employeeId,
    payPeriod: agg.payPeriod,
    employment: policy.employment,
    paidMinutes: agg.normalMinutes + agg.holidayMinutes + agg.specialMinutes + agg.overtimeMinutes,
    classify: settings.classify,
  });
}

/**
 * Aggregate + PayPolicy → PayrollLine.
 *
 * 金额全程精确，net 按配置只取整一次；
 * 行上的 gross、津贴、扣除额是各自精确值按同一规则的显示。
 *
 * @throws {ProrationUndefinedError} FIXED 遇到不完整期间且没有日割规则
 */
export function calculatePayrollLine(
  agg: Aggregate,
  policy: PayPolicy,
  settings: PayrollSettings,
): PayrollLineResult {
  const { decimals, mode } = settings.rounding;
  const render = (x: Exact) => formatExact(x, decimals, mode);
  const anomalies: PayrollAnomaly[] = [];

  const allowances = (policy.allowances ?? []).map((a) => ({ name: a.name, value: exact(a.amount) }));
  const gross = add(
    baseGross(agg, policy, settings),
    sumExact(allowances.map((a) => a.value)),
  );

  // 按给定顺序扣：PERCENT 针对当前余额（不低于 0），FLAT 直接减
  let running = gross;
  const deductions: Array<{ name: string; amount: string }> = [];
  for (const rule of policy.deductionRules) {
    const amount =
      rule.kind === 'PERCENT'
        ? div(mul(max0(running), exact(rule.amount)), exact(100))
        : exact(rule.amount);
    running = sub(running, amount);
    deductions.push({ name: rule.name, amount: render(amount) });
  }

  let net = running;
  if (isNegative(net)) {
    anomalies.push({
      level: 'WARNING',
      code: 'NegativeNetClamped',
      message: `Deductions exceed gross pay for ${policy.employeeId} in ${agg.payPeriod.id}; net pay set to 0.`,
      employeeId: policy.employeeId,
      meta: { unclampedNet: render(net) },
    });
    net = ZERO;
  }

  return {
    line: {
      employeeId: agg.employeeId,
      payPeriod: agg.payPeriod.id,
      normalMinutes: agg.normalMinutes,
      holidayMinutes: agg.holidayMinutes,
      specialMinutes: agg.specialMinutes,
      overtimeMinutes: agg.overtimeMinutes,
      grossAmount: render(gross),
      allowances: allowances.map((a) => ({ name: a.name, amount: render(a.value) })),
      deductions,
      netAmount: render(net),
      ...(settings.currency !== undefined ? { currency: settings.currency } : {}),
    },
    anomalies,
  };
}
