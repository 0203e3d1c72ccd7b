import { PayrollLine } from '../core/types';

export type DeductionLayout = 'DELIMITED' | 'COLUMNS';

export type ExportOptions = {
  /**
   * DELIMITED：单列 `deductions`，`name=amount` 以 `;` 连接，名字里的 `\` `;` `=` 用 `\` 转义
   * COLUMNS：`deduction_N_name` / `deduction_N_amount` 成对列，N 到本次导出最多的扣除项数
   */
  deductionLayout?: DeductionLayout;
};

export type CsvOptions = {
  eol?: string; // 默认 CRLF
};

const LEADING_COLUMNS = [
  'employee_id',
  'pay_period',
  'normal_minutes',
  'holiday_minutes',
  'special_minutes',
  'overtime_minutes',
  'gross_amount',
] as const;

export const collator = new Intl.Collator('en', { numeric: true });

/** 数字感知排序；collator 认为相等的不同 id（如 "1" 与 "01"）再按码元比较 */
export const compareIds = (a: string, b: string): number =>
  collator.compare(a, b) || (a < b ? -1 : a > b ? 1 : 0);

export const escapeDeductionName = (name: string): string => name.replace(/[\\;=]/g, (c) => `\\${c}`);

export function sortPayrollLines(lines: readonly PayrollLine[]): PayrollLine[] {
  return [...lines].sort(
    (a, b) => compareIds(a.employeeId, b.employeeId) || compareIds(a.payPeriod, b.payPeriod),
  );
}

/**
 * PayrollLine → 表格行（第一行是表头）。纯序列化，不做任何重算。
 * 行顺序：employee_id 升序（数字感知），其次 pay_period。
 */
export function toExportRows(lines: readonly PayrollLine[], opts: ExportOptions = {}): string[][] {
  const layout = opts.deductionLayout ?? 'DELIMITED';
  const sorted = sortPayrollLines(lines);
  const width = layout === 'COLUMNS' ? Math.max(0, ...sorted.map((l) => l.deductions.length)) : 0;

  const header: string[] = [...LEADING_COLUMNS];
  if (layout === 'DELIMITED') {
    header.push('deductions');
  } else {
    for (let n = 1; n <= width; n++) header.push(`deduction_${n}_name`, `deduction_${n}_amount`);
  }
  header.push('net_amount');

  const rows = sorted.map((l) => {
    const row = [
      l.employeeId,
      l.payPeriod,
      String(l.normalMinutes),
      String(l.holidayMinutes),
      String(l.specialMinutes),
      String(l.overtimeMinutes),
      l.grossAmount,
    ];
    if (layout === 'DELIMITED') {
      row.push(l.deductions.map((d) => `${escapeDeductionName(d.name)}=${d.amount}`).join(';'));
    } else {
      for (let i = 0; i < width; i++) {
        const d = l.deductions[i];
        row.push(d ? d.name : '', d ? d.amount : '');
      }
    }
    row.push(l.netAmount);
    return row;
  });

  return [header, ...rows];
}

/** RFC 4180: 含 `,` `"` CR LF 的字段加双引号，内部 `"` 写成 `""` */
export function escapeCsvField(field: string): string {
  return /[",\r\n]/.test(field) ? `"${field.replace(/"/g, '""')}"` : field;
}

export function toCsv(rows: readonly (readonly string[])[], opts: CsvOptions = {}): string {
  const eol = opts.eol ?? '\r\n';
  return rows.map((r) => r.map(escapeCsvField).join(',')).join(eol);
}

export function exportPayrollCsv(
  lines: readonly PayrollLine[],
  opts: ExportOptions & CsvOptions = {},
): string {
  return toCsv(toExportRows(lines, opts), opts);
}
