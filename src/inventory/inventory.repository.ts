import { Inject, Injectable } from '@nestjs/common';
import { readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs';
import ledgerConfig, { LedgerConfig } from '../config/ledger.config';
import { PersistenceError, errorMessage } from './errors/ledger.errors';
import { StockItem } from './interface/stock-item.interface';
import { LedgerLoggerService } from './logging/ledger-logger.service';
import { decodeSnapshot, encodeSnapshot } from './schemas/stock-record.schema';

const CONTEXT = 'InventoryRepository';

// fs errors can come from another realm.
export function isMissingFile(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}

/**
 * File-backed store for the item snapshot and the running revenue total.
 * Every save is a full overwrite through a temporary file and a rename.
 */
@Injectable()
export class InventoryRepository {
  constructor(
    @Inject(ledgerConfig.KEY) private readonly config: LedgerConfig,
    private readonly logger: LedgerLoggerService,
  ) {}

  loadSnapshot(): StockItem[] {
    const text = this.readIfPresent(this.config.stockFile);
    if (text === null) {
      this.logger.log(
        `No stock file at ${this.config.stockFile}, starting empty`,
        CONTEXT,
      );
      return [];
    }

    const snapshot = decodeSnapshot(text);
    if (snapshot.rejectedRecord !== undefined) {
      this.logger.warn(
        `Stopped reading ${this.config.stockFile} at record ${snapshot.rejectedRecord} (${snapshot.reason}); kept ${snapshot.items.length} items`,
        CONTEXT,
      );
    }
    return snapshot.items;
  }

  saveSnapshot(items: readonly StockItem[]): void {
    this.replaceFile(this.config.stockFile, encodeSnapshot(items));
  }

  loadRevenue(): number {
    const text = this.readIfPresent(this.config.revenueFile);
    if (text === null) {
      return 0;
    }

    const revenue = Number(text.trim());
    if (text.trim() === '' || !Number.isFinite(revenue) || revenue < 0) {
      this.logger.warn(
        `Ignoring unreadable revenue value "${text.trim()}" in ${this.config.revenueFile}`,
        CONTEXT,
      );
      return 0;
    }
    return revenue;
  }

  saveRevenue(totalRevenue: number): void {
    this.replaceFile(this.config.revenueFile, String(totalRevenue));
  }

  /**
   * Writes the snapshot and the revenue total together: both files are
   * staged first, so a failed write leaves neither changed.
   */
  commitState(items: readonly StockItem[], totalRevenue: number): void {
    const { stockFile, revenueFile } = this.config;
    const previousStock = this.readIfPresent(stockFile);
    const stagedStock = this.stage(stockFile, encodeSnapshot(items));

    let stagedRevenue: string;
    try {
      stagedRevenue = this.stage(revenueFile, String(totalRevenue));
    } catch (error) {
      this.discard(stagedStock);
      throw error;
    }

    this.promote(stagedStock, stockFile, stagedRevenue);

    try {
      renameSync(stagedRevenue, revenueFile);
    } catch (error) {
      this.discard(stagedRevenue);
      this.restore(stockFile, previousStock);
      throw new PersistenceError(revenueFile, 'write', error);
    }
  }

  private readIfPresent(path: string): string | null {
    try {
      return readFileSync(path, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw new PersistenceError(path, 'read', error);
    }
  }

  private replaceFile(path: string, content: string): void {
    const staged = this.stage(path, content);
    this.promote(staged, path);
  }

  private stage(path: string, content: string): string {
    const staged = `${path}.tmp`;
    try {
      writeFileSync(staged, content, 'utf8');
    } catch (error) {
      this.discard(staged);
      throw new PersistenceError(path, 'write', error);
    }
    return staged;
  }

  private promote(staged: string, path: string, ...alsoDiscard: string[]): void {
    try {
      renameSync(staged, path);
    } catch (error) {
      [staged, ...alsoDiscard].forEach((file) => this.discard(file));
      throw new PersistenceError(path, 'write', error);
    }
  }

  private restore(path: string, previous: string | null): void {
    try {
      if (previous === null) {
        rmSync(path, { force: true });
      } else {
        writeFileSync(path, previous, 'utf8');
      }
    } catch (error) {
      const reason = errorMessage(error);
      this.logger.error(
        `Could not restore ${path} after a failed commit: ${reason}`,
        undefined,
        CONTEXT,
      );
    }
  }

  private discard(path: string): void {
    rmSync(path, { force: true });
  }
}
