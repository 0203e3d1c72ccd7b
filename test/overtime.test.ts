import { describe, it, expect } from 'vitest';
import { computeOvertime } from '../src';

describe('computeOvertime', () => {
  const days = { '2025-06-02': 540, '2025-06-03': 600, '2025-06-04': 300 };

  it('没有阈值时全部是 regular', () => {
    expect(computeOvertime(days)).toEqual({ normalMinutes: 1440, overtimeMinutes: 0 });
  });

  it('按日阈值：每天超过 480 的部分记 overtime', () => {
    // 540 → 480 + 60, 600 → 480 + 120, 300 → 300
    expect(computeOvertime(days, { dailyCapMinutes: 480 })).toEqual({
      normalMinutes: 1260,
      overtimeMinutes: 180,
    });
  });

  it('先按日再按期：期阈值只看剩余的 regular', () => {
    expect(computeOvertime(days, { dailyCapMinutes: 480, periodCapMinutes: 1200 })).toEqual({
      normalMinutes: 1200,
      overtimeMinutes: 240,
    });
  });

  it('恰好等于阈值时不产生 overtime', () => {
    expect(computeOvertime({ '2025-06-02': 480 }, { dailyCapMinutes: 480, periodCapMinutes: 480 })).toEqual({
      normalMinutes: 480,
      overtimeMinutes: 0,
    });
  });

  it('阈值为 0 时全部是 overtime', () => {
    expect(computeOvertime(days, { periodCapMinutes: 0 })).toEqual({ normalMinutes: 0, overtimeMinutes: 1440 });
  });

  it('负数按 0 处理；空输入为 0', () => {
    expect(computeOvertime({})).toEqual({ normalMinutes: 0, overtimeMinutes: 0 });
    expect(computeOvertime({ '2025-06-02': -30, '2025-06-03': 60 })).toEqual({
      normalMinutes: 60,
      overtimeMinutes: 0,
    });
  });
});
