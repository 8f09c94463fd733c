import dotenv from 'dotenv';
dotenv.config();

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export const DEFAULT_REPORT_FILENAME = 'report.csv';

function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = (value || '').trim().toLowerCase();
  return LOG_LEVELS.find(level => level === normalized) ?? 'info';
}

export const config = {
  logLevel: parseLogLevel(process.env.STOCK_LOG_LEVEL),
};

export function logLevelRank(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}
