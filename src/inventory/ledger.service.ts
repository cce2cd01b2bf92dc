import {
  Inject,
  Injectable,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import ledgerConfig, { LedgerConfig } from '../config/ledger.config';
import { LowStockThresholdDto, RestockItemDto } from './dtos/restock-item.dto';
import { CreateItemDto } from './dtos/create-item.dto';
import { SellItemDto } from './dtos/sell-item.dto';
import { UpdateItemDto } from './dtos/update-item.dto';
import {
  LEDGER_ERROR_CODES,
  NotFoundError,
  ValidationError,
  errorMessage,
} from './errors/ledger.errors';
import { LogAction } from './events/ledger.events';
import { InventoryRepository } from './inventory.repository';
import {
  CreateItemRequest,
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
import { LedgerLoggerService } from './logging/ledger-logger.service';
import {
  buildOverview,
  partitionLowStock,
  searchItems,
} from './reports/stock-report';
import { TransactionLogService } from './transaction-log.service';
import { formatMoney } from './utils/format';
import { validateRequest } from './validation/validate-request';

const CONTEXT = 'LedgerService';

// SALE amounts are written to the history file rounded to cents.
const REVENUE_TOLERANCE_PER_SALE = 0.005;

const UPDATABLE_FIELDS = [
  'id',
  'name',
  'category',
  'quantity',
  'lastPrice',
] as const;

interface LedgerContext {
  items: StockItem[];
  totalRevenue: number;
  lowStockThreshold: number;
}

function copyItem(item: StockItem): StockItem {
  return { ...item, createdAt: new Date(item.createdAt.getTime()) };
}

/**
 * Owns the in-memory ledger: the ordered item list and the running revenue
 * total. Each mutation is saved to disk before it is applied in memory, and
 * only then written to the activity log.
 */
@Injectable()
export class LedgerService implements OnModuleInit, OnModuleDestroy {
  private context: LedgerContext;
  private isOpen = false;

  constructor(
    private readonly inventoryRepository: InventoryRepository,
    private readonly transactionLog: TransactionLogService,
    private readonly logger: LedgerLoggerService,
    @Inject(ledgerConfig.KEY) private readonly config: LedgerConfig,
  ) {
    this.context = {
      items: [],
      totalRevenue: 0,
      lowStockThreshold: config.lowStockThreshold,
    };
  }

  onModuleInit() {
    this.open();
  }

  onModuleDestroy() {
    this.close();
  }

  open(): ReconciliationReport {
    const items = this.inventoryRepository.loadSnapshot();
    const totalRevenue = this.inventoryRepository.loadRevenue();
    this.transactionLog.load();

    this.context = {
      items,
      totalRevenue,
      lowStockThreshold: this.config.lowStockThreshold,
    };
    this.isOpen = true;

    this.transactionLog.append(
      LogAction.SYSTEM,
      `Stock data loaded (${items.length} items)`,
    );
    this.logger.log(
      `Ledger opened with ${items.length} items and $${formatMoney(totalRevenue)} revenue`,
      CONTEXT,
    );

    const report = this.reconcile();
    if (!report.consistent) {
      this.logger.warn(
        `Revenue total $${formatMoney(report.snapshotRevenue)} does not match $${formatMoney(report.loggedRevenue)} of logged sales`,
        CONTEXT,
      );
    }
    return report;
  }

  /** Final flush of items and revenue. Does nothing unless the ledger was opened. */
  close(): void {
    if (!this.isOpen) {
      return;
    }

    const { items, totalRevenue } = this.context;
    try {
      this.inventoryRepository.saveSnapshot(items);
      this.inventoryRepository.saveRevenue(totalRevenue);
    } catch (error) {
      this.logFailure('Final save failed', error);
      throw error;
    }
    this.isOpen = false;

    this.transactionLog.append(
      LogAction.SYSTEM,
      `Session closed (${items.length} items, revenue $${formatMoney(totalRevenue)})`,
    );
    this.logger.log('Ledger closed', CONTEXT);
  }

  addItem(request: CreateItemRequest): LedgerOutcome<StockItem> {
    const dto = validateRequest(CreateItemDto, request);

    if (this.hasId(dto.id)) {
      throw new ValidationError(LEDGER_ERROR_CODES.DUPLICATE_ID, {
        message: `Product ID ${dto.id} is already in use`,
        context: { id: dto.id },
      });
    }

    const sameName = this.context.items.find((item) => item.name === dto.name);
    if (sameName) {
      throw new ValidationError(LEDGER_ERROR_CODES.DUPLICATE_NAME, {
        message: `Item '${dto.name}' already exists`,
        context: { existingId: sameName.id, name: sameName.name },
      });
    }

    const item: StockItem = {
      id: dto.id,
      name: dto.name,
      category: dto.category,
      quantity: dto.quantity,
      lastPrice: dto.price,
      createdAt: new Date(),
    };
    this.persist([...this.context.items, item]);

    return this.record(
      LogAction.ADD,
      `Added ${item.name} (ID: ${item.id}, category: ${item.category}, qty: ${item.quantity}, price: $${formatMoney(item.lastPrice)})`,
      copyItem(item),
    );
  }

  restock(itemId: number, additionalQty: number): LedgerOutcome<StockItem> {
    const { quantity } = validateRequest(RestockItemDto, {
      quantity: additionalQty,
    });
    const current = this.requireItem(itemId);

    const total = current.quantity + quantity;
    if (!Number.isSafeInteger(total)) {
      throw new ValidationError(LEDGER_ERROR_CODES.NEGATIVE_QUANTITY, {
        message: `Adding ${quantity} units to ${current.name} exceeds the largest quantity that can be stored`,
        context: { id: current.id, quantity: current.quantity, requested: quantity },
      });
    }

    const updated: StockItem = { ...current, quantity: total };
    this.persist(this.replaceItem(current.id, updated));

    return this.record(
      LogAction.RESTOCK,
      `Added ${quantity} units to ${updated.name} (ID: ${updated.id}, new total: ${updated.quantity})`,
      copyItem(updated),
    );
  }

  updateItem(
    itemId: number,
    changes: UpdateItemRequest,
  ): LedgerOutcome<StockItem> {
    const dto = validateRequest(UpdateItemDto, changes);
    const fields = UPDATABLE_FIELDS.filter((field) => dto[field] !== undefined);
    if (fields.length === 0) {
      throw new ValidationError(LEDGER_ERROR_CODES.EMPTY_UPDATE);
    }

    const current = this.requireItem(itemId);

    if (dto.id !== undefined && dto.id !== current.id && this.hasId(dto.id)) {
      throw new ValidationError(LEDGER_ERROR_CODES.DUPLICATE_ID, {
        message: `Product ID ${dto.id} is already in use`,
        context: { id: dto.id },
      });
    }

    if (dto.name !== undefined) {
      const holder = this.context.items.find(
        (item) => item.name === dto.name && item.id !== current.id,
      );
      if (holder) {
        throw new ValidationError(LEDGER_ERROR_CODES.DUPLICATE_NAME, {
          message: `Item '${dto.name}' already exists`,
          context: { existingId: holder.id, name: holder.name },
        });
      }
    }

    const updated: StockItem = {
      ...current,
      id: dto.id ?? current.id,
      name: dto.name ?? current.name,
      category: dto.category ?? current.category,
      quantity: dto.quantity ?? current.quantity,
      lastPrice: dto.lastPrice ?? current.lastPrice,
    };
    this.persist(this.replaceItem(current.id, updated));

    return this.record(
      LogAction.UPDATE,
      `${current.name} (ID: ${current.id}) -> ${updated.name} (ID: ${updated.id}) [${fields.join(', ')}]`,
      copyItem(updated),
    );
  }

  deleteItem(itemId: number): LedgerOutcome<StockItem> {
    const removed = this.requireItem(itemId);
    this.persist(this.context.items.filter((item) => item.id !== removed.id));

    return this.record(
      LogAction.DELETE,
      `Removed ${removed.name} (ID: ${removed.id}, had ${removed.quantity} units)`,
      copyItem(removed),
    );
  }

  /**
   * Records a sale. The item's new quantity and the new revenue total are
   * committed to disk together; if that fails nothing changes.
   */
  sell(
    itemId: number,
    quantity: number,
    unitPrice: number,
  ): LedgerOutcome<SaleResult> {
    const dto = validateRequest(SellItemDto, { quantity, unitPrice });
    const current = this.requireItem(itemId);

    if (current.quantity === 0) {
      throw new ValidationError(LEDGER_ERROR_CODES.OUT_OF_STOCK, {
        message: `${current.name} is out of stock`,
        context: { id: current.id },
      });
    }
    if (dto.quantity > current.quantity) {
      throw new ValidationError(LEDGER_ERROR_CODES.INSUFFICIENT_QUANTITY, {
        message: `Only ${current.quantity} units of ${current.name} available, ${dto.quantity} requested`,
        context: {
          id: current.id,
          requested: dto.quantity,
          available: current.quantity,
        },
      });
    }

    const amount = dto.quantity * dto.unitPrice;
    const totalRevenue = this.context.totalRevenue + amount;
    const updated: StockItem = {
      ...current,
      quantity: current.quantity - dto.quantity,
      lastPrice: dto.unitPrice,
    };
    this.persist(this.replaceItem(current.id, updated), totalRevenue);

    return this.record(
      LogAction.SALE,
      `${dto.quantity}x ${updated.name} @ $${formatMoney(dto.unitPrice)} each = $${formatMoney(amount)} (remaining: ${updated.quantity})`,
      {
        item: copyItem(updated),
        amount,
        remainingQty: updated.quantity,
        totalRevenue,
      },
      amount,
    );
  }

  findById(itemId: number): StockItem {
    return copyItem(this.requireItem(itemId));
  }

  findByName(name: string): StockItem {
    const item = this.context.items.find((candidate) => candidate.name === name);
    if (!item) {
      throw new NotFoundError(`'${name}'`, { name });
    }
    return copyItem(item);
  }

  list(): StockItem[] {
    return this.context.items.map(copyItem);
  }

  search(term: string): StockItem[] {
    return searchItems(this.context.items, term).map(copyItem);
  }

  lowStock(threshold: number = this.context.lowStockThreshold): LowStockReport {
    validateRequest(LowStockThresholdDto, { threshold });
    const report = partitionLowStock(this.context.items, threshold);
    return {
      threshold,
      outOfStock: report.outOfStock.map(copyItem),
      lowStock: report.lowStock.map(copyItem),
    };
  }

  getLowStockThreshold(): number {
    return this.context.lowStockThreshold;
  }

  setLowStockThreshold(threshold: number): number {
    validateRequest(LowStockThresholdDto, { threshold });
    this.context.lowStockThreshold = threshold;
    return threshold;
  }

  getTotalRevenue(): number {
    return this.context.totalRevenue;
  }

  overview(): StockOverview {
    return buildOverview(
      this.context.items,
      this.context.lowStockThreshold,
      this.context.totalRevenue,
    );
  }

  /** Compares the revenue total against the sales recorded in the activity log. */
  reconcile(): ReconciliationReport {
    const sales = this.transactionLog.saleTotal();
    const difference = this.context.totalRevenue - sales.amount;
    const tolerance = REVENUE_TOLERANCE_PER_SALE * sales.count + 1e-9;

    return {
      consistent: Math.abs(difference) <= tolerance,
      snapshotRevenue: this.context.totalRevenue,
      loggedRevenue: sales.amount,
      difference,
    };
  }

  private hasId(id: number): boolean {
    return this.context.items.some((item) => item.id === id);
  }

  private requireItem(itemId: number): StockItem {
    const item = this.context.items.find((candidate) => candidate.id === itemId);
    if (!item) {
      throw new NotFoundError(`with ID ${itemId}`, { id: itemId });
    }
    return item;
  }

  private replaceItem(itemId: number, replacement: StockItem): StockItem[] {
    return this.context.items.map((item) =>
      item.id === itemId ? replacement : item,
    );
  }

  private persist(items: StockItem[], totalRevenue?: number): void {
    try {
      if (totalRevenue === undefined) {
        this.inventoryRepository.saveSnapshot(items);
      } else {
        this.inventoryRepository.commitState(items, totalRevenue);
      }
    } catch (error) {
      this.logFailure('Snapshot save failed, change not applied', error);
      throw error;
    }

    this.context.items = items;
    if (totalRevenue !== undefined) {
      this.context.totalRevenue = totalRevenue;
    }
  }

  private record<T>(
    action: LogAction,
    detail: string,
    result: T,
    amount?: number,
  ): LedgerOutcome<T> {
    const appended = this.transactionLog.append(action, detail, amount);
    if (appended.persisted) {
      return { result, entry: appended.entry };
    }
    return {
      result,
      entry: appended.entry,
      auditWarning: `Change saved, but the activity log was not updated: ${appended.error}`,
    };
  }

  private logFailure(message: string, error: unknown): void {
    const reason = errorMessage(error);
    const trace = error instanceof Error ? error.stack : undefined;
    this.logger.error(`${message}: ${reason}`, trace, CONTEXT);
  }
}
