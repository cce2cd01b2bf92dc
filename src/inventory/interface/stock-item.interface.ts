import { Category } from '../constants/categories';
import { LogEntry } from '../events/ledger.events';

export interface StockItem {
  readonly id: number;
  name: string;
  category: Category;
  quantity: number;
  lastPrice: number;
  readonly createdAt: Date;
}

export type StockStatus = 'OUT' | 'LOW' | 'OK';

export interface SaleResult {
  item: StockItem;
  amount: number;
  remainingQty: number;
  totalRevenue: number;
}

export interface LowStockReport {
  threshold: number;
  outOfStock: StockItem[];
  lowStock: StockItem[];
}

/** Every category in option order, zero counts included. */
export type CategoryTally = Map<Category, number>;

export interface StockOverview {
  itemCount: number;
  totalQuantity: number;
  outOfStockCount: number;
  lowStockCount: number;
  threshold: number;
  categories: CategoryTally;
  totalRevenue: number;
}

export interface ReconciliationReport {
  consistent: boolean;
  snapshotRevenue: number;
  loggedRevenue: number;
  difference: number;
}

/**
 * What every mutating ledger operation hands back: the operation's result,
 * the audit entry it produced, and a warning when that entry could not be
 * written to the history file.
 */
export interface LedgerOutcome<T> {
  result: T;
  entry: LogEntry;
  auditWarning?: string;
}
