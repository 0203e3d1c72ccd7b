import type { ZodIssue } from 'zod';

export type PayrollErrorCode = 'CONFIGURATION_ERROR' | 'PRORATION_UNDEFINED';

export class PayrollError extends Error {
  public readonly code: PayrollErrorCode;

  constructor(code: PayrollErrorCode, message: string) {
    super(message);
    this.name = 'PayrollError';
    this.code = code;
  }
}

// 日历 / 工资规则 / 引擎配置不合法：计算开始前抛出，整次运行中止
export class ConfigurationError extends PayrollError {
  public readonly issues: readonly ZodIssue[];

  constructor(message: string, issues: readonly ZodIssue[] = []) {
    super('CONFIGURATION_ERROR', message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

// 固定薪资遇到不完整期间，且没有可用的日割规则
export class ProrationUndefinedError extends PayrollError {
  public readonly employeeId: string;

  constructor(employeeId: string, message: string) {
    super('PRORATION_UNDEFINED', message);
    this.name = 'ProrationUndefinedError';
    this.employeeId = employeeId;
  }
}
