export type ReconcileRules = {
  // 超过该分钟数的班次报 LongSession（仍计入工时）
  longSessionMinutes: number;
};

export const defaultRules: ReconcileRules = {
  longSessionMinutes: 12 * 60, // 12 hours
};
