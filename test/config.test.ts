import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  findSpecialOverlaps,
  loadEnv,
  loadPayPolicy,
  loadPayrollConfig,
} from '../src';

const base = {
  calendar: {},
  multipliers: { holiday: 1.35, special: '1.5', overtime: '1.25' },
  rounding: { decimals: 0, mode: 'HALF_UP' },
};

describe('loadPayrollConfig', () => {
  it('补默认值，数字形式的小数转为字符串', () => {
    const config = loadPayrollConfig(base);

    expect(config.multipliers).toEqual({ holiday: '1.35', special: '1.5', overtime: '1.25' });
    expect(config.calendar).toEqual({ timezone: 'UTC', weeklyHolidays: [], holidays: [], specialPeriods: [] });
    expect(config.reconcile).toEqual({ longSessionMinutes: 720 });
    expect(config.export).toEqual({ deductionLayout: 'DELIMITED' });
    expect(config.overtime).toEqual({});
    expect(config.breaks).toEqual({});
  });

  it('返回的配置被深度冻结', () => {
    const config = loadPayrollConfig(base);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.multipliers)).toBe(true);
  });

  it('缺少倍率或取整规则时报 ConfigurationError，并带上 zod issues', () => {
    try {
      loadPayrollConfig({ calendar: {}, multipliers: base.multipliers });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError);
      if (!(err instanceof ConfigurationError)) return;
      expect(err.code).toBe('CONFIGURATION_ERROR');
      expect(err.message).toBe('Invalid payroll config: rounding: Required');
      expect(err.issues.map((i) => i.path.join('.'))).toEqual(['rounding']);
    }
  });

  it('拒绝负倍率、非法取整方式、反向午休窗口', () => {
    expect(() => loadPayrollConfig({ ...base, multipliers: { ...base.multipliers, overtime: '-1' } })).toThrow(
      ConfigurationError,
    );
    expect(() => loadPayrollConfig({ ...base, rounding: { decimals: 0, mode: 'BANKERS' } })).toThrow(
      ConfigurationError,
    );
    expect(() => loadPayrollConfig({ ...base, breaks: { lunch: { from: '13:00', to: '12:00' } } })).toThrow(
      ConfigurationError,
    );
  });

  it('WORKED_HOURS 需要 standardMonthlyHours', () => {
    expect(() => loadPayrollConfig({ ...base, proration: { method: 'WORKED_HOURS' } })).toThrow(
      'Invalid payroll config: proration.standardMonthlyHours: WORKED_HOURS proration needs standardMonthlyHours',
    );
  });
});

describe('loadPayPolicy', () => {
  it('HOURLY 需要 rate，FIXED 需要 salary', () => {
    expect(() => loadPayPolicy({ employeeId: 'E1', mode: 'HOURLY' })).toThrow(
      'Invalid pay policy: rate: HOURLY policy needs a rate',
    );
    expect(() => loadPayPolicy({ employeeId: 'E1', mode: 'FIXED' })).toThrow(
      'Invalid pay policy: salary: FIXED policy needs a salary',
    );
  });

  it('扣除与津贴默认为空', () => {
    expect(loadPayPolicy({ employeeId: 'E1', mode: 'HOURLY', rate: 1500 })).toEqual({
      employeeId: 'E1',
      mode: 'HOURLY',
      rate: '1500',
      deductionRules: [],
      allowances: [],
    });
  });

  it('在职区间不能反向', () => {
    expect(() =>
      loadPayPolicy({ employeeId: 'E1', mode: 'HOURLY', rate: '1', employment: { start: '2025-06-10', end: '2025-06-01' } }),
    ).toThrow(ConfigurationError);
  });
});

describe('findSpecialOverlaps', () => {
  it('只报告不同 id 之间的重叠', () => {
    const a = { id: 'a', start: '2025-08-01', end: '2025-08-10' };
    const a2 = { id: 'a', start: '2025-08-05', end: '2025-08-06' };
    const b = { id: 'b', start: '2025-08-10', end: '2025-08-12' };
    expect(findSpecialOverlaps([a, a2, b])).toEqual([[a, b]]);
  });
});

describe('loadEnv', () => {
  it('日志级别默认 info', () => {
    expect(loadEnv({})).toEqual({ PAYROLL_LOG_LEVEL: 'info' });
    expect(loadEnv({ PAYROLL_LOG_LEVEL: 'silent', HOME: '/tmp' })).toEqual({ PAYROLL_LOG_LEVEL: 'silent' });
  });

  it('未知级别报错', () => {
    expect(() => loadEnv({ PAYROLL_LOG_LEVEL: 'verbose' })).toThrow(ConfigurationError);
  });
});
