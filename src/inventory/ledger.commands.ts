import { Injectable } from '@nestjs/common';
import {
  LedgerError,
  LedgerErrorCode,
  errorMessage,
} from './errors/ledger.errors';
import { LogEntry, LogSummary } from './events/ledger.events';
import {
  CreateItemRequest,
  RestockRequest,
  SellRequest,
  UpdateItemRequest,
} from './interface/ledger-requests.interface';
import {
  LedgerOutcome,
  LowStockReport,
  ReconciliationReport,
  SaleResult,
  StockItem,
  StockOverview,
} from './interface/stock-item.interface';
import { LedgerService } from './ledger.service';
import { LedgerLoggerService } from './logging/ledger-logger.service';
import { TransactionLogService } from './transaction-log.service';

const CONTEXT = 'LedgerCommands';

export interface CommandError {
  code: LedgerErrorCode | 'Unexpected';
  message: string;
  context?: Record<string, unknown>;
}

export type CommandResult<T> =
  | { ok: true; data: T; warning?: string }
  | { ok: false; error: CommandError };

export interface HistoryView {
  summary: LogSummary;
  recent: LogEntry[];
}

/**
 * Entry point for the interactive shell: plain requests in, results out.
 * Ledger errors become failed results; nothing is thrown past this layer.
 */
@Injectable()
export class LedgerCommands {
  constructor(
    private readonly ledger: LedgerService,
    private readonly transactionLog: TransactionLogService,
    private readonly logger: LedgerLoggerService,
  ) {}

  sell(request: SellRequest): CommandResult<SaleResult> {
    return this.mutate('sell', () =>
      this.ledger.sell(request.itemId, request.quantity, request.unitPrice),
    );
  }

  add(request: CreateItemRequest): CommandResult<StockItem> {
    return this.mutate('add', () => this.ledger.addItem(request));
  }

  restock(request: RestockRequest): CommandResult<StockItem> {
    return this.mutate('restock', () =>
      this.ledger.restock(request.itemId, request.quantity),
    );
  }

  update(itemId: number, changes: UpdateItemRequest): CommandResult<StockItem> {
    return this.mutate('update', () => this.ledger.updateItem(itemId, changes));
  }

  remove(itemId: number): CommandResult<StockItem> {
    return this.mutate('delete', () => this.ledger.deleteItem(itemId));
  }

  list(): CommandResult<StockItem[]> {
    return this.query('list', () => this.ledger.list());
  }

  overview(): CommandResult<StockOverview> {
    return this.query('overview', () => this.ledger.overview());
  }

  findByName(name: string): CommandResult<StockItem> {
    return this.query('find', () => this.ledger.findByName(name));
  }

  search(term: string): CommandResult<StockItem[]> {
    return this.query('search', () => this.ledger.search(term));
  }

  lowStock(threshold?: number): CommandResult<LowStockReport> {
    return this.query('lowStock', () => this.ledger.lowStock(threshold));
  }

  setThreshold(threshold: number): CommandResult<number> {
    return this.query('setThreshold', () =>
      this.ledger.setLowStockThreshold(threshold),
    );
  }

  history(limit?: number): CommandResult<HistoryView> {
    return this.query('history', () => ({
      summary: this.transactionLog.summarize(),
      recent: this.transactionLog.recent(limit),
    }));
  }

  reconcile(): CommandResult<ReconciliationReport> {
    return this.query('reconcile', () => this.ledger.reconcile());
  }

  private mutate<T>(
    operation: string,
    action: () => LedgerOutcome<T>,
  ): CommandResult<T> {
    const outcome = this.query(operation, action);
    if (!outcome.ok) {
      return outcome;
    }
    const { result, auditWarning } = outcome.data;
    return auditWarning
      ? { ok: true, data: result, warning: auditWarning }
      : { ok: true, data: result };
  }

  private query<T>(operation: string, action: () => T): CommandResult<T> {
    try {
      return { ok: true, data: action() };
    } catch (error) {
      return { ok: false, error: this.describe(operation, error) };
    }
  }

  private describe(operation: string, error: unknown): CommandError {
    if (error instanceof LedgerError) {
      this.logger.debug(
        `${operation} rejected with ${error.code}: ${error.message}`,
        CONTEXT,
      );
      return {
        code: error.code,
        message: error.userMessage,
        ...(error.context ? { context: error.context } : {}),
      };
    }

    const message = errorMessage(error);
    this.logger.error(
      `${operation} failed unexpectedly: ${message}`,
      error instanceof Error ? error.stack : undefined,
      CONTEXT,
    );
    return { code: 'Unexpected', message };
  }
}
