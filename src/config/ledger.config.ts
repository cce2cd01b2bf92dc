import { ConfigType, registerAs } from '@nestjs/config';
import { join, resolve } from 'node:path';
import { DEFAULT_LOW_STOCK_THRESHOLD } from '../inventory/constants/categories';

export const LOG_LEVELS = ['error', 'warn', 'info', 'verbose', 'debug'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const DEFAULT_HISTORY_WINDOW = 20;

function readInteger(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  return Number.isInteger(value) ? value : fallback;
}

function readLogLevel(raw: string | undefined): LogLevel {
  return LOG_LEVELS.find((level) => level === raw) ?? 'info';
}

const ledgerConfig = registerAs('ledger', () => {
  const dataDir = resolve(process.env.LEDGER_DATA_DIR ?? '.');

  return {
    dataDir,
    stockFile: join(dataDir, 'stock.dat'),
    revenueFile: join(dataDir, 'grand_total.dat'),
    historyFile: join(dataDir, 'history.log'),
    logFile: process.env.LOG_FILE
      ? resolve(process.env.LOG_FILE)
      : join(dataDir, 'ledger.log'),
    logLevel: readLogLevel(process.env.LOG_LEVEL),
    lowStockThreshold: readInteger(
      process.env.LOW_STOCK_THRESHOLD,
      DEFAULT_LOW_STOCK_THRESHOLD,
    ),
    historyWindow: readInteger(
      process.env.HISTORY_WINDOW,
      DEFAULT_HISTORY_WINDOW,
    ),
  };
});

export type LedgerConfig = ConfigType<typeof ledgerConfig>;

export default ledgerConfig;
