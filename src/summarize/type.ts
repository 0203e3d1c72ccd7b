import { IssueLevel, PayrollAnomaly } from '../reconcile/types';
import { PayrollErrorCode } from '../errors';

export type EmployeeFailure = {
  employeeId: string;
  code: PayrollErrorCode;
  message: string;
};

export type RunIssue = {
  level: IssueLevel;
  code: string; // AnomalyCode 或 PayrollErrorCode
  message: string;
  employeeId: string;
  at?: string;
};

export type RunReport = {
  issues: RunIssue[];
  issueCountByLevel: Record<IssueLevel, number>;
  score: number; // 0..100
  blocking: boolean; // 是否存在 ERROR
};

export type { PayrollAnomaly };
