import { CATEGORY_OPTIONS, Category } from '../constants/categories';
import {
  CategoryTally,
  LowStockReport,
  StockItem,
  StockOverview,
  StockStatus,
} from '../interface/stock-item.interface';

export function stockStatus(item: StockItem, threshold: number): StockStatus {
  if (item.quantity === 0) {
    return 'OUT';
  }
  return item.quantity < threshold ? 'LOW' : 'OK';
}

/**
 * Splits items into empty shelves and those running low. An item with zero
 * units is only ever reported as out of stock.
 */
export function partitionLowStock(
  items: readonly StockItem[],
  threshold: number,
): LowStockReport {
  const outOfStock: StockItem[] = [];
  const lowStock: StockItem[] = [];

  for (const item of items) {
    const status = stockStatus(item, threshold);
    if (status === 'OUT') {
      outOfStock.push(item);
    } else if (status === 'LOW') {
      lowStock.push(item);
    }
  }

  return { threshold, outOfStock, lowStock };
}

export function searchItems(
  items: readonly StockItem[],
  term: string,
): StockItem[] {
  const q = term.toLowerCase();
  return items.filter(
    (item) =>
      item.name.toLowerCase().includes(q) ||
      item.category.toLowerCase().includes(q),
  );
}

export function categoryTally(items: readonly StockItem[]): CategoryTally {
  const tally: CategoryTally = new Map(
    CATEGORY_OPTIONS.map((category): [Category, number] => [category, 0]),
  );

  for (const item of items) {
    tally.set(item.category, (tally.get(item.category) ?? 0) + 1);
  }
  return tally;
}

export function totalQuantity(items: readonly StockItem[]): number {
  return items.reduce((sum, item) => sum + item.quantity, 0);
}

export function buildOverview(
  items: readonly StockItem[],
  threshold: number,
  totalRevenue: number,
): StockOverview {
  const { outOfStock, lowStock } = partitionLowStock(items, threshold);

  return {
    itemCount: items.length,
    totalQuantity: totalQuantity(items),
    outOfStockCount: outOfStock.length,
    lowStockCount: lowStock.length,
    threshold,
    categories: categoryTally(items),
    totalRevenue,
  };
}
