import { Inject, Injectable } from '@nestjs/common';
import ledgerConfig, { LedgerConfig } from '../config/ledger.config';
import {
  AppendOutcome,
  LogAction,
  LogEntry,
  LogSummary,
} from './events/ledger.events';
import { errorMessage } from './errors/ledger.errors';
import { HistoryRepository } from './history.repository';
import { LedgerLoggerService } from './logging/ledger-logger.service';
import {
  formatHistoryLine,
  parseHistoryLine,
} from './schemas/history-line.schema';

const CONTEXT = 'TransactionLogService';

export interface SaleTotal {
  amount: number;
  count: number;
}

/**
 * Timestamped record of every mutating action. The history file is an
 * audit trail, not the system of record: a failed append is reported to
 * the caller and never undoes the change that produced it.
 */
@Injectable()
export class TransactionLogService {
  private entries: LogEntry[] = [];

  constructor(
    private readonly history: HistoryRepository,
    private readonly logger: LedgerLoggerService,
    @Inject(ledgerConfig.KEY) private readonly config: LedgerConfig,
  ) {}

  /**
   * Reads the existing history file, skipping lines in an unknown format.
   * An unreadable file leaves the history empty.
   */
  load(): number {
    let lines: string[];
    try {
      lines = this.history.readLines();
    } catch (error) {
      const message = errorMessage(error);
      this.logger.warn(
        `Activity log not read, starting with an empty history: ${message}`,
        CONTEXT,
      );
      this.entries = [];
      return 0;
    }
    const loaded: LogEntry[] = [];

    for (const line of lines) {
      const entry = parseHistoryLine(line);
      if (entry) {
        loaded.push(entry);
      }
    }

    const skipped = lines.length - loaded.length;
    if (skipped > 0) {
      this.logger.warn(
        `Skipped ${skipped} unrecognised history lines`,
        CONTEXT,
      );
    }

    this.entries = loaded;
    return loaded.length;
  }

  append(action: LogAction, detail: string, amount?: number): AppendOutcome {
    const entry: LogEntry = {
      timestamp: new Date(),
      action,
      detail,
      ...(amount !== undefined ? { amount } : {}),
    };
    this.entries.push(entry);

    try {
      this.history.appendLine(formatHistoryLine(entry));
      return { entry, persisted: true };
    } catch (error) {
      const message = errorMessage(error);
      this.logger.warn(`Audit entry not written: ${message}`, CONTEXT);
      return { entry, persisted: false, error: message };
    }
  }

  summarize(): LogSummary {
    const summary: LogSummary = {
      total: this.entries.length,
      [LogAction.SALE]: 0,
      [LogAction.ADD]: 0,
      [LogAction.RESTOCK]: 0,
      [LogAction.UPDATE]: 0,
      [LogAction.DELETE]: 0,
      [LogAction.SYSTEM]: 0,
    };

    for (const entry of this.entries) {
      summary[entry.action] += 1;
    }
    return summary;
  }

  recent(limit: number = this.config.historyWindow): LogEntry[] {
    if (limit <= 0) {
      return [];
    }
    return this.entries.slice(-limit).map((entry) => ({ ...entry }));
  }

  saleTotal(): SaleTotal {
    return this.entries
      .filter((entry) => entry.action === LogAction.SALE)
      .reduce(
        (total, entry) => ({
          amount: total.amount + (entry.amount ?? 0),
          count: total.count + 1,
        }),
        { amount: 0, count: 0 },
      );
  }
}
