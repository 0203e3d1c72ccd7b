// 金额全程用精确有理数（bigint 分子/分母），只在最终 net 时取整一次
export type Exact = {
  readonly num: bigint;
  readonly den: bigint; // 恒 > 0
};

export type RoundingMode = 'HALF_UP' | 'HALF_EVEN' | 'DOWN' | 'UP';

export const DECIMAL_RE = /^-?\d+(\.\d+)?$/;

export const ZERO: Exact = { num: 0n, den: 1n };

function abs(n: bigint): bigint {
  return n < 0n ? -n : n;
}

function gcd(a: bigint, b: bigint): bigint {
  let x = abs(a);
  let y = abs(b);
  while (y !== 0n) {
    [x, y] = [y, x % y];
  }
  return x;
}

function normalize(num: bigint, den: bigint): Exact {
  if (den === 0n) throw new RangeError('[number] division by zero');
  if (den < 0n) {
    num = -num;
    den = -den;
  }
  const g = gcd(num, den);
  return g > 1n ? { num: num / g, den: den / g } : { num, den };
}

/**
 * 解析十进制字符串、bigint 或有限数字。
 *
 * "1.35" → 135/100 → 27/20
 * 数字先转成最短字符串形式，所以 0.1 → 1/10。
 */
export function exact(value: string | number | bigint): Exact {
  if (typeof value === 'bigint') return { num: value, den: 1n };
  const text = typeof value === 'number' ? String(value) : value.trim();
  if (typeof value === 'number' && !Number.isFinite(value)) {
    throw new RangeError(`[number] not a finite number: ${text}`);
  }
  if (!DECIMAL_RE.test(text)) {
    throw new RangeError(`[number] invalid decimal: "${text}"`);
  }
  const negative = text.startsWith('-');
  const [intPart, fracPart = ''] = (negative ? text.slice(1) : text).split('.');
  const scaled = BigInt(intPart + fracPart);
  return normalize(negative ? -scaled : scaled, 10n ** BigInt(fracPart.length));
}

export const add = (a: Exact, b: Exact): Exact =>
  normalize(a.num * b.den + b.num * a.den, a.den * b.den);

export const sub = (a: Exact, b: Exact): Exact =>
  normalize(a.num * b.den - b.num * a.den, a.den * b.den);

export const mul = (a: Exact, b: Exact): Exact => normalize(a.num * b.num, a.den * b.den);

export const div = (a: Exact, b: Exact): Exact => normalize(a.num * b.den, a.den * b.num);

export const sumExact = (xs: Exact[]): Exact => xs.reduce(add, ZERO);

export function compare(a: Exact, b: Exact): -1 | 0 | 1 {
  const l = a.num * b.den;
  const r = b.num * a.den;
  if (l < r) return -1;
  if (l > r) return 1;
  return 0;
}

export const isNegative = (a: Exact): boolean => a.num < 0n;

export const max0 = (a: Exact): Exact => (a.num < 0n ? ZERO : a);

/**
 * 取整到 `decimals` 位，返回放大后的整数
 * 例：12.345 保留 2 位 HALF_UP → 1235n
 */
export function roundScaled(x: Exact, decimals: number, mode: RoundingMode): bigint {
  const scaledNum = x.num * 10n ** BigInt(decimals);
  const q = scaledNum / x.den; // 向零截断
  const r = scaledNum % x.den;
  if (r === 0n) return q;

  const away = scaledNum < 0n ? q - 1n : q + 1n;
  const twice = 2n * abs(r);
  switch (mode) {
    case 'DOWN':
      return q;
    case 'UP':
      return away;
    case 'HALF_UP':
      return twice >= x.den ? away : q;
    case 'HALF_EVEN':
      if (twice > x.den) return away;
      if (twice < x.den) return q;
      return q % 2n === 0n ? q : away;
  }
}

/**
 * 10050n with decimals=2 → "100.50"; -5n with decimals=2 → "-0.05"
 */
export function formatScaled(scaled: bigint, decimals: number): string {
  if (decimals === 0) return scaled.toString();
  const negative = scaled < 0n;
  const str = abs(scaled).toString().padStart(decimals + 1, '0');
  const result = `${str.slice(0, str.length - decimals)}.${str.slice(str.length - decimals)}`;
  return negative ? `-${result}` : result;
}

export const formatExact = (x: Exact, decimals: number, mode: RoundingMode): string =>
  formatScaled(roundScaled(x, decimals, mode), decimals);
