/**
 * Output formatting utilities for the interactive shell
 */

import chalk from 'chalk';
import { StockItem } from '../inventory/interface/stock-item.interface';
import { stockStatus } from '../inventory/reports/stock-report';
import { formatMoney } from '../inventory/utils/format';

export function heading(text: string): void {
  console.log(chalk.bold.cyan(`\n=== ${text} ===`));
}

export function field(label: string, value: string | number): void {
  console.log(`  ${chalk.gray(label.padEnd(14))} ${value}`);
}

export function info(text: string): void {
  console.log(text);
}

export function success(text: string): void {
  console.log(chalk.green(`✓ ${text}`));
}

export function error(text: string): void {
  console.log(chalk.red(`✗ ${text}`));
}

export function warn(text: string): void {
  console.log(chalk.yellow(`! ${text}`));
}

export function money(value: number): string {
  return `$${formatMoney(value)}`;
}

function truncate(text: string, width: number): string {
  return text.length > width ? `${text.slice(0, width - 3)}...` : text;
}

export function table(rows: Record<string, string>[], columns?: string[]): void {
  if (rows.length === 0) {
    console.log(chalk.dim('  No items to display.'));
    return;
  }

  const cols = columns || Object.keys(rows[0]);
  const widths = cols.map((c) =>
    Math.max(c.length, ...rows.map((r) => (r[c] ?? '').length)),
  );

  // Header
  const header = cols.map((c, i) => c.padEnd(widths[i])).join('  ');
  console.log(chalk.bold(`  ${header}`));
  console.log(chalk.dim(`  ${widths.map((w) => '─'.repeat(w)).join('──')}`));

  // Rows
  for (const row of rows) {
    const line = cols.map((c, i) => (row[c] ?? '').padEnd(widths[i])).join('  ');
    console.log(`  ${line}`);
  }
}

export function itemTable(items: readonly StockItem[], threshold: number): void {
  table(
    items.map((item) => ({
      ID: String(item.id),
      'Product Name': truncate(item.name, 25),
      Category: truncate(item.category, 15),
      Qty: String(item.quantity),
      'Last Price': item.lastPrice > 0 ? money(item.lastPrice) : 'Not Set',
      Status: stockStatus(item, threshold),
    })),
  );
}
