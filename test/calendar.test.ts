import { describe, it, expect } from 'vitest';
import { ConfigurationError, createCalendar, nextLocalDate } from '../src';

const calendar = createCalendar({
  timezone: 'Asia/Tokyo',
  weeklyHolidays: [7], // Sunday
  holidays: ['2025-06-04'],
  specialPeriods: [{ id: 'summer', name: 'Summer break', start: '2025-08-13', end: '2025-08-17', multiplier: '2' }],
});

describe('createCalendar.classify', () => {
  it('普通工作日为 NORMAL', () => {
    expect(calendar.classify('2025-06-02')).toEqual({ date: '2025-06-02', category: 'NORMAL' });
  });

  it('每周休日与显式节假日为 HOLIDAY', () => {
    expect(calendar.classify('2025-06-01').category).toBe('HOLIDAY'); // Sunday
    expect(calendar.classify('2025-06-04').category).toBe('HOLIDAY');
  });

  it('特别期间优先于每周休日', () => {
    // 2025-08-17 是周日
    expect(calendar.classify('2025-08-17')).toEqual({
      date: '2025-08-17',
      category: 'SPECIAL',
      specialPeriodId: 'summer',
    });
    expect(calendar.classify('2025-08-18').category).toBe('NORMAL');
  });

  it('specialMultiplier 只对配置了倍率的期间返回值', () => {
    expect(calendar.specialMultiplier('summer')).toBe('2');
    expect(calendar.specialMultiplier('other')).toBeUndefined();
  });

  it('配置被深度冻结', () => {
    expect(Object.isFrozen(calendar.config)).toBe(true);
    expect(Object.isFrozen(calendar.config.specialPeriods)).toBe(true);
  });
});

describe('createCalendar validation', () => {
  it('不同 id 的特别期间重叠时拒绝', () => {
    expect(() =>
      createCalendar({
        specialPeriods: [
          { id: 'a', start: '2025-08-01', end: '2025-08-10' },
          { id: 'b', start: '2025-08-10', end: '2025-08-20' },
        ],
      }),
    ).toThrow(ConfigurationError);
  });

  it('同一 id 可以出现在多个区间', () => {
    const cal = createCalendar({
      specialPeriods: [
        { id: 'a', start: '2025-08-01', end: '2025-08-10' },
        { id: 'a', start: '2025-08-05', end: '2025-08-12' },
      ],
    });
    expect(cal.classify('2025-08-11').specialPeriodId).toBe('a');
  });

  it('未知时区、非法星期、非法日期都拒绝', () => {
    expect(() => createCalendar({ timezone: 'Mars/Olympus' })).toThrow(ConfigurationError);
    expect(() => createCalendar({ weeklyHolidays: [0] })).toThrow(ConfigurationError);
    expect(() => createCalendar({ holidays: ['2025-02-30'] })).toThrow(ConfigurationError);
  });

  it('不给任何配置时按 UTC、全部 NORMAL', () => {
    const cal = createCalendar({});
    expect(cal.timezone).toBe('UTC');
    expect(cal.classify('2025-06-01').category).toBe('NORMAL');
  });
});

describe('nextLocalDate', () => {
  it('跨月、跨年', () => {
    expect(nextLocalDate('2025-06-30')).toBe('2025-07-01');
    expect(nextLocalDate('2024-12-31')).toBe('2025-01-01');
  });
});
