import { Module } from '@nestjs/common';
import { HistoryRepository } from './history.repository';
import { InventoryRepository } from './inventory.repository';
import { LedgerCommands } from './ledger.commands';
import { LedgerService } from './ledger.service';
import { LedgerLoggerService } from './logging/ledger-logger.service';
import { TransactionLogService } from './transaction-log.service';

@Module({
  providers: [
    LedgerLoggerService,
    InventoryRepository,
    HistoryRepository,
    TransactionLogService,
    LedgerService,
    LedgerCommands,
  ],
  exports: [LedgerCommands, LedgerService, LedgerLoggerService],
})
export class InventoryModule {}
