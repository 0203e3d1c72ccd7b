import pino from 'pino';
import type { Logger } from 'pino';
import { loadEnv } from './config';

export type { Logger };

// 级别默认取 PAYROLL_LOG_LEVEL
export function createLogger(level: string = loadEnv().PAYROLL_LOG_LEVEL): Logger {
  return pino({ name: 'payroll-engine', level });
}
