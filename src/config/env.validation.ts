import { plainToInstance } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  Min,
  validateSync,
} from 'class-validator';
import { LOG_LEVELS } from './ledger.config';

export class EnvironmentVariables {
  @IsOptional()
  @IsString()
  LEDGER_DATA_DIR?: string;

  @IsOptional()
  @IsInt()
  @Min(0)
  LOW_STOCK_THRESHOLD?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  HISTORY_WINDOW?: number;

  @IsOptional()
  @IsIn(LOG_LEVELS)
  LOG_LEVEL?: string;

  @IsOptional()
  @IsString()
  LOG_FILE?: string;
}

export function validate(config: Record<string, unknown>): EnvironmentVariables {
  const validatedConfig = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validatedConfig, {
    skipMissingProperties: false,
  });

  if (errors.length > 0) {
    throw new Error(errors.toString());
  }
  return validatedConfig;
}
