import { Module } from '@nestjs/common';
import { InventoryModule } from '../inventory/inventory.module';
import { PROMPTER, ReadlinePrompter } from './prompter';
import { StockShell } from './stock-shell';

@Module({
  imports: [InventoryModule],
  providers: [
    StockShell,
    {
      provide: PROMPTER,
      useFactory: () => new ReadlinePrompter(),
    },
  ],
  exports: [StockShell],
})
export class ShellModule {}
