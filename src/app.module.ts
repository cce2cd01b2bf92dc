import { DynamicModule, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import ledgerConfig from './config/ledger.config';
import { validate } from './config/env.validation';
import { InventoryModule } from './inventory/inventory.module';
import { ShellModule } from './shell/shell.module';

@Module({})
export class AppModule {
  /**
   * Built on demand so command-line options can be applied to the
   * environment before configuration is read and validated.
   */
  static forRoot(): DynamicModule {
    return {
      module: AppModule,
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          load: [ledgerConfig],
          validate,
        }),
        InventoryModule,
        ShellModule,
      ],
    };
  }
}
