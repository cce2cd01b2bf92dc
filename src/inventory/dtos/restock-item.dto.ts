import { IsInt, Max, Min } from 'class-validator';
import { LEDGER_ERROR_CODES } from '../errors/ledger.errors';
import { withCode } from '../validation/validate-request';

export class RestockItemDto {
  @IsInt(withCode(LEDGER_ERROR_CODES.NEGATIVE_QUANTITY))
  @Min(0, withCode(LEDGER_ERROR_CODES.NEGATIVE_QUANTITY))
  @Max(Number.MAX_SAFE_INTEGER, withCode(LEDGER_ERROR_CODES.NEGATIVE_QUANTITY))
  quantity!: number;
}

export class LowStockThresholdDto {
  @IsInt(withCode(LEDGER_ERROR_CODES.INVALID_THRESHOLD))
  @Min(0, withCode(LEDGER_ERROR_CODES.INVALID_THRESHOLD))
  threshold!: number;
}
