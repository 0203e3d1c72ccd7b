import { compareIds } from '../export/to-csv';
import { computeScore } from '../reconcile/helpers';
import { PayrollAnomaly } from '../reconcile/types';
import { EmployeeFailure, RunIssue, RunReport } from './type';

/**
 * 汇总一次运行的所有问题：异常照抄，失败按 ERROR 计。
 * 排序：employeeId（数字感知），同一员工内保持产生顺序。
 */
export function summarizeRun(
  anomalies: readonly PayrollAnomaly[],
  failures: readonly EmployeeFailure[],
): RunReport {
  const issues: RunIssue[] = [
    ...anomalies.map((a) => ({
      level: a.level,
      code: a.code,
      message: a.message,
      employeeId: a.employeeId,
      ...(a.at !== undefined ? { at: a.at } : {}),
    })),
    ...failures.map((f) => ({
      level: 'ERROR' as const,
      code: f.code,
      message: f.message,
      employeeId: f.employeeId,
    })),
  ]
    .map((issue, i) => ({ issue, i }))
    .sort((a, b) => compareIds(a.issue.employeeId, b.issue.employeeId) || a.i - b.i)
    .map(({ issue }) => issue);

  const issueCountByLevel = { INFO: 0, WARNING: 0, ERROR: 0 };
  for (const issue of issues) issueCountByLevel[issue.level]++;

  return {
    issues,
    issueCountByLevel,
    score: computeScore(issues.map((i) => i.level)),
    blocking: issueCountByLevel.ERROR > 0,
  };
}
