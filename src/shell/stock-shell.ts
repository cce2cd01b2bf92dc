import { Inject, Injectable } from '@nestjs/common';
import { CATEGORY_OPTIONS, Category } from '../inventory/constants/categories';
import {
  LEDGER_ERROR_CODES,
  LEDGER_ERROR_MESSAGES,
} from '../inventory/errors/ledger.errors';
import { UpdateItemRequest } from '../inventory/interface/ledger-requests.interface';
import { StockItem } from '../inventory/interface/stock-item.interface';
import {
  CommandError,
  CommandResult,
  LedgerCommands,
} from '../inventory/ledger.commands';
import { formatHistoryLine } from '../inventory/schemas/history-line.schema';
import {
  error,
  field,
  heading,
  info,
  itemTable,
  money,
  success,
  warn,
} from './format';
import { PROMPTER, PromptClosedError, Prompter } from './prompter';

export const MENU_OPTIONS = [
  'Make a Sale',
  'Add New Item',
  'View All Items',
  'Update Item',
  'Delete Item',
  'Search Items',
  'Low Stock Alert',
  'View Stock History',
  'Exit',
] as const;

const EXIT_CHOICE = MENU_OPTIONS.length;

const WHOLE_NUMBER = /^-?\d+$/;
const DECIMAL = /^-?(\d+\.?\d*|\.\d+)$/;

export function parseWholeNumber(text: string): number | null {
  const trimmed = text.trim();
  return WHOLE_NUMBER.test(trimmed) ? Number(trimmed) : null;
}

export function parseDecimal(text: string): number | null {
  const trimmed = text.trim();
  return DECIMAL.test(trimmed) ? Number(trimmed) : null;
}

/**
 * Numbered-menu front end over {@link LedgerCommands}. Input ending is
 * treated the same as choosing Exit.
 */
@Injectable()
export class StockShell {
  constructor(
    private readonly commands: LedgerCommands,
    @Inject(PROMPTER) private readonly prompter: Prompter,
  ) {}

  async run(): Promise<void> {
    this.reportReconciliation();

    try {
      for (;;) {
        this.showMenu();
        const choice = await this.askWholeNumber(
          'Enter your choice: ',
          1,
          MENU_OPTIONS.length,
        );
        if (choice === EXIT_CHOICE) {
          break;
        }
        await this.dispatch(choice);
      }
    } catch (err) {
      if (!(err instanceof PromptClosedError)) {
        throw err;
      }
      info('');
    } finally {
      this.prompter.close();
    }
  }

  private async dispatch(choice: number): Promise<void> {
    switch (choice) {
      case 1:
        return this.sell();
      case 2:
        return this.add();
      case 3:
        return this.viewAll();
      case 4:
        return this.update();
      case 5:
        return this.remove();
      case 6:
        return this.search();
      case 7:
        return this.lowStockAlert();
      case 8:
        return this.viewHistory();
    }
  }

  private showMenu(): void {
    heading('STOCK MANAGEMENT SYSTEM');
    MENU_OPTIONS.forEach((label, index) => info(`${index + 1}. ${label}`));

    const overview = this.commands.overview();
    if (overview.ok) {
      info(
        `Total Revenue: ${money(overview.data.totalRevenue)} | Items in Stock: ${overview.data.itemCount}`,
      );
    }
  }

  private reportReconciliation(): void {
    const report = this.commands.reconcile();
    if (report.ok && !report.data.consistent) {
      warn(
        `Revenue total ${money(report.data.snapshotRevenue)} differs from logged sales of ${money(report.data.loggedRevenue)}`,
      );
    }
  }

  private async sell(): Promise<void> {
    heading('MAKE A SALE');
    const items = this.unwrap(this.commands.list());
    if (!items) {
      return;
    }
    if (items.length === 0) {
      warn('No items in stock to sell.');
      return;
    }

    let sessionTotal = 0;
    let salesCount = 0;

    do {
      info(`Session Total: ${money(sessionTotal)} | Sales Made: ${salesCount}`);
      const current = this.unwrap(this.commands.list()) ?? [];
      this.showItems(current);

      const itemId = await this.askWholeNumber('Product ID to sell (0 to finish): ', 0);
      if (itemId === 0) {
        break;
      }

      const lastPrice = current.find((item) => item.id === itemId)?.lastPrice ?? 0;
      const quantity = await this.askWholeNumber('Enter quantity to sell: ');
      const unitPrice = await this.askDecimal(
        lastPrice > 0
          ? `Enter price per unit (last: ${money(lastPrice)}): $`
          : 'Enter price per unit: $',
      );

      const sale = this.unwrap(this.commands.sell({ itemId, quantity, unitPrice }));
      if (sale) {
        sessionTotal += sale.amount;
        salesCount += 1;
        success(
          `Sale recorded: ${money(sale.amount)} | Remaining stock: ${sale.remainingQty}`,
        );
      }
    } while (await this.confirm('Continue selling?'));

    if (salesCount > 0) {
      info(`Items sold: ${salesCount} | Session total: ${money(sessionTotal)}`);
    } else {
      info('No sales made.');
    }
  }

  private async add(): Promise<void> {
    heading('ADD NEW ITEM');
    let itemsAdded = 0;

    do {
      const id = await this.askWholeNumber('Enter product ID: ');
      const name = await this.askName('Enter item name: ');

      const existing = this.commands.findByName(name);
      if (existing.ok) {
        warn(`Item '${name}' already exists!`);
        if (await this.offerRestock(existing.data)) {
          itemsAdded += 1;
        }
        continue;
      }

      const category = await this.askCategory();
      const price = await this.askDecimal('Enter initial price: $');
      const quantity = await this.askWholeNumber('Enter initial quantity: ');

      const added = this.unwrap(
        this.commands.add({ id, name, category, quantity, price }),
      );
      if (added) {
        success(`Item '${added.name}' added successfully!`);
        itemsAdded += 1;
      }
    } while (await this.confirm('Add another item?'));

    info(`Total items added/updated: ${itemsAdded}`);
  }

  private async offerRestock(item: StockItem): Promise<boolean> {
    if (!(await this.confirm('Add more quantity to existing item?'))) {
      return false;
    }

    info(`Current stock: ${item.quantity}`);
    const quantity = await this.askWholeNumber('Enter quantity to add: ', 0);
    const restocked = this.unwrap(
      this.commands.restock({ itemId: item.id, quantity }),
    );
    if (!restocked) {
      return false;
    }
    success(`Stock updated! New quantity: ${restocked.quantity}`);
    return true;
  }

  private viewAll(): void {
    heading('ALL STOCK ITEMS');
    const overview = this.unwrap(this.commands.overview());
    const items = this.unwrap(this.commands.list());
    if (!overview || !items) {
      return;
    }

    info(
      `OVERVIEW: ${overview.itemCount} items | Total Qty: ${overview.totalQuantity} | Out of Stock: ${overview.outOfStockCount} | Low Stock: ${overview.lowStockCount}`,
    );
    const categories = [...overview.categories]
      .filter(([, count]) => count > 0)
      .map(([category, count]) => `${category}: ${count}`);
    if (categories.length > 0) {
      info(`Categories: ${categories.join(', ')}`);
    }
    itemTable(items, overview.threshold);
  }

  private async update(): Promise<void> {
    heading('UPDATE ITEM');
    const name = (await this.prompter.ask('Enter item name to update: ')).trim();
    const item = this.unwrap(this.commands.findByName(name));
    if (!item) {
      return;
    }

    this.showDetails(item);
    info('\nWhat would you like to update?');
    ['Product ID', 'Name', 'Category', 'Quantity', 'Last Price', 'All fields'].forEach(
      (label, index) => info(`${index + 1}. ${label}`),
    );
    const choice = await this.askWholeNumber('Choice: ', 1, 6);

    const changes: UpdateItemRequest = {};
    switch (choice) {
      case 1:
        changes.id = await this.askWholeNumber('New Product ID: ');
        break;
      case 2:
        changes.name = await this.askName('New name: ');
        break;
      case 3:
        changes.category = await this.askCategory();
        break;
      case 4:
        changes.quantity = await this.askWholeNumber('New quantity: ');
        break;
      case 5:
        changes.lastPrice = await this.askDecimal('New last price: $');
        break;
      default:
        Object.assign(changes, await this.askAllFields(item));
    }

    const updated = this.unwrap(this.commands.update(item.id, changes));
    if (updated) {
      success('Item updated successfully!');
    }
  }

  private async askAllFields(item: StockItem): Promise<UpdateItemRequest> {
    info('Enter new details (leave blank to keep current):');
    const changes: UpdateItemRequest = {};

    const id = await this.askOptional(`Product ID [${item.id}]: `, parseWholeNumber);
    if (id !== undefined) changes.id = id;

    const name = (await this.prompter.ask(`Name [${item.name}]: `)).trim();
    if (name !== '') changes.name = name;

    this.listCategories();
    const category = await this.askOptional(
      `Category number [${item.category}]: `,
      parseWholeNumber,
    );
    if (category !== undefined) {
      const chosen = this.categoryAt(category);
      if (chosen) {
        changes.category = chosen;
      } else {
        warn('Invalid category choice. Keeping current value.');
      }
    }

    const quantity = await this.askOptional(`Quantity [${item.quantity}]: `, parseWholeNumber);
    if (quantity !== undefined) changes.quantity = quantity;

    const lastPrice = await this.askOptional(
      `Last Price [${money(item.lastPrice)}]: `,
      parseDecimal,
    );
    if (lastPrice !== undefined) changes.lastPrice = lastPrice;

    return changes;
  }

  private async remove(): Promise<void> {
    heading('DELETE ITEM');
    const name = (await this.prompter.ask('Enter item name to delete: ')).trim();
    const item = this.unwrap(this.commands.findByName(name));
    if (!item) {
      return;
    }

    this.showDetails(item);
    if (item.quantity > 0) {
      warn(`This item has ${item.quantity} units in stock!`);
    }

    if (!(await this.confirm('Are you sure you want to delete this item?'))) {
      info('Deletion cancelled.');
      return;
    }

    const removed = this.unwrap(this.commands.remove(item.id));
    if (removed) {
      success(`Item '${removed.name}' deleted successfully!`);
    }
  }

  private async search(): Promise<void> {
    heading('SEARCH ITEMS');
    do {
      const term = (await this.prompter.ask('Enter search term (name or category): ')).trim();
      const results = this.unwrap(this.commands.search(term));
      if (!results) {
        continue;
      }
      if (results.length === 0) {
        info(`No items found matching '${term}'.`);
      } else {
        info(`Found ${results.length} item(s) for '${term}'`);
        this.showItems(results);
      }
    } while (await this.confirm('Search for another item?'));
  }

  private async lowStockAlert(): Promise<void> {
    heading('LOW STOCK ALERT');
    const current = this.unwrap(this.commands.lowStock());
    if (!current) {
      return;
    }
    info(`Current threshold: ${current.threshold} units`);

    if (await this.confirm('Change threshold?')) {
      const threshold = await this.askWholeNumber('Enter new threshold: ', 0);
      this.unwrap(this.commands.setThreshold(threshold));
    }

    const report = this.unwrap(this.commands.lowStock());
    if (!report) {
      return;
    }

    if (report.outOfStock.length > 0) {
      error(`CRITICAL - OUT OF STOCK (${report.outOfStock.length} items):`);
      itemTable(report.outOfStock, report.threshold);
    }
    if (report.lowStock.length > 0) {
      warn(`LOW STOCK (${report.lowStock.length} items):`);
      itemTable(report.lowStock, report.threshold);
    }

    if (report.outOfStock.length === 0 && report.lowStock.length === 0) {
      success('All items are well stocked! No alerts.');
    } else {
      info(
        `Action needed for: ${report.outOfStock.length + report.lowStock.length} items`,
      );
    }
  }

  private viewHistory(): void {
    heading('STOCK HISTORY LOG');
    const history = this.unwrap(this.commands.history());
    if (!history) {
      return;
    }

    const { summary, recent } = history;
    info(
      `SUMMARY: ${summary.total} total actions | ${summary.SALE} sales | ${summary.ADD} additions | ${summary.RESTOCK} restocks | ${summary.UPDATE} updates | ${summary.DELETE} deletions`,
    );
    if (recent.length === 0) {
      info('No history recorded yet.');
      return;
    }
    info(`Recent Activities (last ${recent.length} entries):`);
    recent.forEach((entry) => info(formatHistoryLine(entry)));
  }

  private showDetails(item: StockItem): void {
    info('\nCURRENT DETAILS:');
    field('Product ID', item.id);
    field('Name', item.name);
    field('Category', item.category);
    field('Quantity', item.quantity);
    field('Last Price', money(item.lastPrice));
  }

  private showItems(items: readonly StockItem[]): void {
    const overview = this.commands.overview();
    itemTable(items, overview.ok ? overview.data.threshold : 0);
  }

  private listCategories(): void {
    info('Select category:');
    CATEGORY_OPTIONS.forEach((category, index) => info(`  ${index + 1}. ${category}`));
  }

  private categoryAt(choice: number): Category | undefined {
    return CATEGORY_OPTIONS[choice - 1];
  }

  private async askCategory(): Promise<Category> {
    this.listCategories();
    const choice = await this.askWholeNumber(
      `Enter category number (1-${CATEGORY_OPTIONS.length}): `,
      1,
      CATEGORY_OPTIONS.length,
    );
    return CATEGORY_OPTIONS[choice - 1];
  }

  private async askWholeNumber(
    question: string,
    min = Number.MIN_SAFE_INTEGER,
    max = Number.MAX_SAFE_INTEGER,
  ): Promise<number> {
    for (;;) {
      const value = parseWholeNumber(await this.prompter.ask(question));
      if (value !== null && value >= min && value <= max) {
        return value;
      }
      error(
        max === Number.MAX_SAFE_INTEGER
          ? 'Please enter a valid whole number.'
          : `Please enter a number between ${min} and ${max}.`,
      );
    }
  }

  private async askName(question: string): Promise<string> {
    for (;;) {
      const name = (await this.prompter.ask(question)).trim();
      if (name !== '') {
        return name;
      }
      error(LEDGER_ERROR_MESSAGES[LEDGER_ERROR_CODES.EMPTY_NAME]);
    }
  }

  private async askDecimal(question: string): Promise<number> {
    for (;;) {
      const value = parseDecimal(await this.prompter.ask(question));
      if (value !== null) {
        return value;
      }
      error('Please enter a valid amount.');
    }
  }

  private async askOptional(
    question: string,
    parse: (text: string) => number | null,
  ): Promise<number | undefined> {
    for (;;) {
      const answer = await this.prompter.ask(question);
      if (answer.trim() === '') {
        return undefined;
      }
      const value = parse(answer);
      if (value !== null) {
        return value;
      }
      error('Invalid value, try again or leave blank to keep the current one.');
    }
  }

  private async confirm(question: string): Promise<boolean> {
    const answer = await this.prompter.ask(`${question} (Y/N): `);
    return answer.trim().toUpperCase().startsWith('Y');
  }

  private unwrap<T>(result: CommandResult<T>): T | undefined {
    if (!result.ok) {
      this.fail(result.error);
      return undefined;
    }
    if (result.warning) {
      warn(result.warning);
    }
    return result.data;
  }

  private fail(failure: CommandError): void {
    error(failure.message);
  }
}
