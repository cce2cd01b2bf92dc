#!/usr/bin/env node

import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Command } from 'commander';
import { mkdirSync } from 'node:fs';
import { resolve } from 'node:path';
import { AppModule } from './app.module';
import { errorMessage } from './inventory/errors/ledger.errors';
import { LedgerLoggerService } from './inventory/logging/ledger-logger.service';
import { error, success } from './shell/format';
import { StockShell } from './shell/stock-shell';

interface CliOptions {
  dataDir?: string;
  threshold?: string;
  logLevel?: string;
}

/** Command-line options take precedence over the environment. */
function applyOptions(opts: CliOptions): void {
  if (opts.dataDir) process.env.LEDGER_DATA_DIR = opts.dataDir;
  if (opts.threshold) process.env.LOW_STOCK_THRESHOLD = opts.threshold;
  if (opts.logLevel) process.env.LOG_LEVEL = opts.logLevel;
}

async function bootstrap(): Promise<void> {
  mkdirSync(resolve(process.env.LEDGER_DATA_DIR ?? '.'), { recursive: true });

  const app = await NestFactory.createApplicationContext(AppModule.forRoot(), {
    bufferLogs: true,
    abortOnError: false,
  });
  app.useLogger(app.get(LedgerLoggerService));

  await app.get(StockShell).run();
  await app.close();
  success('Data saved successfully. Good Bye.....');
}

const program = new Command();

program
  .name('stock-ledger')
  .description('Inventory ledger: stock, sales and an activity log')
  .version('1.0.0')
  .option('-d, --data-dir <dir>', 'directory holding stock.dat, grand_total.dat and history.log')
  .option('-t, --threshold <n>', 'low-stock threshold for this session')
  .option('--log-level <level>', 'diagnostic log level (error, warn, info, verbose, debug)')
  .action(async (opts: CliOptions) => {
    applyOptions(opts);
    await bootstrap();
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  error(errorMessage(err));
  process.exitCode = 1;
});
