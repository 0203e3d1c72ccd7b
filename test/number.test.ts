import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import {
  add,
  compare,
  div,
  exact,
  formatExact,
  formatScaled,
  max0,
  mul,
  roundScaled,
  sub,
  ZERO,
} from '../src';

describe('exact', () => {
  it('十进制字符串解析为约分后的有理数', () => {
    expect(exact('1.35')).toEqual({ num: 27n, den: 20n });
    expect(exact('-0.50')).toEqual({ num: -1n, den: 2n });
    expect(exact(1500)).toEqual({ num: 1500n, den: 1n });
    expect(exact(0.1)).toEqual({ num: 1n, den: 10n });
  });

  it('非法输入抛 RangeError', () => {
    expect(() => exact('abc')).toThrow(RangeError);
    expect(() => exact('1e5')).toThrow(RangeError);
    expect(() => exact(Number.NaN)).toThrow(RangeError);
    expect(() => div(exact(1), ZERO)).toThrow(RangeError);
  });

  it('0.1 + 0.2 精确等于 0.3', () => {
    expect(compare(add(exact('0.1'), exact('0.2')), exact('0.3'))).toBe(0);
  });

  it('540 分钟 × 1500 / 60 = 13500，没有浮点误差', () => {
    expect(div(mul(exact(540), exact(1500)), exact(60))).toEqual({ num: 13500n, den: 1n });
  });

  it('max0 把负数截为 0', () => {
    expect(max0(exact('-3'))).toEqual(ZERO);
    expect(max0(exact('3'))).toEqual({ num: 3n, den: 1n });
  });

  it('a + b - b === a（任意小数）', () => {
    const decimal = fc
      .tuple(fc.bigInt({ min: -(10n ** 12n), max: 10n ** 12n }), fc.integer({ min: 0, max: 6 }))
      .map(([n, scale]) => exact(formatScaled(n, scale)));
    fc.assert(
      fc.property(decimal, decimal, (a, b) => compare(sub(add(a, b), b), a) === 0),
    );
  });
});

describe('roundScaled / formatExact', () => {
  it('12.345 保留两位：各取整方式', () => {
    const x = exact('12.345');
    expect(roundScaled(x, 2, 'HALF_UP')).toBe(1235n);
    expect(roundScaled(x, 2, 'HALF_EVEN')).toBe(1234n);
    expect(roundScaled(x, 2, 'DOWN')).toBe(1234n);
    expect(roundScaled(x, 2, 'UP')).toBe(1235n);
  });

  it('负数按绝对值方向取整', () => {
    const x = exact('-2.5');
    expect(roundScaled(x, 0, 'HALF_UP')).toBe(-3n);
    expect(roundScaled(x, 0, 'HALF_EVEN')).toBe(-2n);
    expect(roundScaled(x, 0, 'DOWN')).toBe(-2n);
    expect(roundScaled(x, 0, 'UP')).toBe(-3n);
  });

  it('1/3 保留两位', () => {
    const third = div(exact(1), exact(3));
    expect(formatExact(third, 2, 'HALF_UP')).toBe('0.33');
    expect(formatExact(third, 2, 'UP')).toBe('0.34');
  });

  it('formatScaled 补零与负号', () => {
    expect(formatScaled(10050n, 2)).toBe('100.50');
    expect(formatScaled(-5n, 2)).toBe('-0.05');
    expect(formatScaled(0n, 2)).toBe('0.00');
    expect(formatScaled(7n, 0)).toBe('7');
  });
});
