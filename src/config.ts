import { freeze } from 'immer';
import { isValid, parseISO } from 'date-fns';
import { z } from 'zod';
import { ConfigurationError } from './errors';
import { DECIMAL_RE } from './state/number';

// ---------- 1) 基础类型 ----------

export const LocalDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD')
  .refine((d) => isValid(parseISO(d)), 'not a calendar date');

// 金额/倍率一律存为十进制字符串；数字输入转成字符串
export const DecimalSchema = z
  .union([z.string(), z.number().finite()])
  .transform((v) => (typeof v === 'number' ? String(v) : v.trim()))
  .refine((v) => DECIMAL_RE.test(v), 'expected a decimal number');

const NonNegativeDecimalSchema = DecimalSchema.refine(
  (v) => !v.startsWith('-'),
  'must not be negative',
);

const ClockTimeSchema = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'expected HH:mm');

function isTimeZone(tz: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: tz });
    return true;
  } catch (err) {
    if (err instanceof RangeError) return false;
    throw err;
  }
}

// ---------- 2) 日历 ----------

export const SpecialPeriodSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().optional(),
    start: LocalDateSchema,
    end: LocalDateSchema,
    multiplier: NonNegativeDecimalSchema.optional(),
  })
  .refine((p) => p.start <= p.end, { message: 'special period ends before it starts' });

export type SpecialPeriodConfig = z.infer<typeof SpecialPeriodSchema>;

/** 不同 id 的特别期间中日期有交集的对（同一 id 可以有多个区间） */
export function findSpecialOverlaps(
  periods: readonly SpecialPeriodConfig[],
): Array<[SpecialPeriodConfig, SpecialPeriodConfig]> {
  const overlaps: Array<[SpecialPeriodConfig, SpecialPeriodConfig]> = [];
  for (let i = 0; i < periods.length; i++) {
    for (let j = i + 1; j < periods.length; j++) {
      const a = periods[i];
      const b = periods[j];
      if (a.id !== b.id && a.start <= b.end && b.start <= a.end) overlaps.push([a, b]);
    }
  }
  return overlaps;
}

export const CalendarConfigSchema = z
  .object({
    timezone: z.string().default('UTC').refine(isTimeZone, 'unknown time zone'),
    weeklyHolidays: z.array(z.number().int().min(1).max(7)).default([]), // ISO：1 = 周一 … 7 = 周日
    holidays: z.array(LocalDateSchema).default([]),
    specialPeriods: z.array(SpecialPeriodSchema).default([]),
  })
  .superRefine((cal, ctx) => {
    for (const [a, b] of findSpecialOverlaps(cal.specialPeriods)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['specialPeriods'],
        message: `special periods "${a.id}" and "${b.id}" overlap between ${
          a.start > b.start ? a.start : b.start
        } and ${a.end < b.end ? a.end : b.end}`,
      });
    }
  });

export type CalendarConfig = z.infer<typeof CalendarConfigSchema>;

// ---------- 3) 工资规则 ----------

export const DeductionRuleSchema = z.object({
  name: z.string().min(1),
  kind: z.enum(['PERCENT', 'FLAT']),
  amount: NonNegativeDecimalSchema,
});

export const ProrationRuleSchema = z
  .object({
    method: z.enum(['CALENDAR_DAYS', 'FIXED_30', 'WORKING_DAYS', 'WORKED_HOURS', 'FULL_SALARY']),
    standardMonthlyHours: DecimalSchema.refine((v) => Number(v) > 0, 'must be positive').optional(),
  })
  .refine((r) => r.method !== 'WORKED_HOURS' || r.standardMonthlyHours !== undefined, {
    message: 'WORKED_HOURS proration needs standardMonthlyHours',
    path: ['standardMonthlyHours'],
  });

export const PayPolicySchema = z
  .object({
    employeeId: z.string().min(1),
    mode: z.enum(['HOURLY', 'FIXED']),
    rate: NonNegativeDecimalSchema.optional(),
    salary: NonNegativeDecimalSchema.optional(),
    deductionRules: z.array(DeductionRuleSchema).default([]),
    allowances: z
      .array(z.object({ name: z.string().min(1), amount: NonNegativeDecimalSchema }))
      .default([]),
    employment: z
      .object({ start: LocalDateSchema.optional(), end: LocalDateSchema.optional() })
      .optional(),
    proration: ProrationRuleSchema.optional(),
  })
  .superRefine((p, ctx) => {
    if (p.mode === 'HOURLY' && p.rate === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['rate'], message: 'HOURLY policy needs a rate' });
    }
    if (p.mode === 'FIXED' && p.salary === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['salary'], message: 'FIXED policy needs a salary' });
    }
    const { start, end } = p.employment ?? {};
    if (start && end && start > end) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['employment'], message: 'employment ends before it starts' });
    }
  });

export type PayPolicyConfig = z.infer<typeof PayPolicySchema>;

// ---------- 4) 引擎配置 ----------

export const PayrollConfigSchema = z.object({
  calendar: CalendarConfigSchema,
  // 倍率没有内置默认值，必须显式给出
  multipliers: z.object({
    holiday: NonNegativeDecimalSchema,
    special: NonNegativeDecimalSchema,
    overtime: NonNegativeDecimalSchema,
  }),
  rounding: z.object({
    decimals: z.number().int().min(0).max(6),
    mode: z.enum(['HALF_UP', 'HALF_EVEN', 'DOWN', 'UP']),
  }),
  overtime: z
    .object({
      dailyCapMinutes: z.number().int().min(0).optional(),
      periodCapMinutes: z.number().int().min(0).optional(),
    })
    .default({}),
  breaks: z
    .object({
      lunch: z
        .object({ from: ClockTimeSchema, to: ClockTimeSchema })
        .refine((l) => l.from < l.to, 'lunch window ends before it starts')
        .optional(),
      dailyRestMinutes: z.number().int().min(0).optional(),
    })
    .default({}),
  reconcile: z
    .object({
      longSessionMinutes: z.number().int().positive().default(12 * 60),
    })
    .default({}),
  proration: ProrationRuleSchema.optional(),
  currency: z.string().min(1).optional(),
  export: z
    .object({
      deductionLayout: z.enum(['DELIMITED', 'COLUMNS']).default('DELIMITED'),
    })
    .default({}),
});

export type PayrollConfig = z.infer<typeof PayrollConfigSchema>;
export type PayrollConfigInput = z.input<typeof PayrollConfigSchema>;

// ---------- 5) 加载：校验失败抛 ConfigurationError，成功返回深度冻结的对象 ----------

export function parseConfig<S extends z.ZodTypeAny>(
  schema: S,
  raw: unknown,
  label: string,
): z.output<S> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid ${label}: ${detail}`, parsed.error.issues);
  }
  return freeze(parsed.data, true);
}

export function loadPayrollConfig(raw: unknown): PayrollConfig {
  return parseConfig(PayrollConfigSchema, raw, 'payroll config');
}

export function loadPayPolicy(raw: unknown): PayPolicyConfig {
  return parseConfig(PayPolicySchema, raw, 'pay policy');
}

// ---------- 6) 环境变量 ----------

export const EnvSchema = z.object({
  PAYROLL_LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
});

export type PayrollEnv = z.infer<typeof EnvSchema>;

export function loadEnv(env: Record<string, string | undefined> = process.env): PayrollEnv {
  return parseConfig(EnvSchema, env, 'environment');
}
