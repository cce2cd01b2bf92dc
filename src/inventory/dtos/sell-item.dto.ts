import { IsInt, IsNumber, Max, Min } from 'class-validator';
import { LEDGER_ERROR_CODES } from '../errors/ledger.errors';
import { withCode } from '../validation/validate-request';

export class SellItemDto {
  @IsInt(withCode(LEDGER_ERROR_CODES.INVALID_QUANTITY))
  @Min(1, withCode(LEDGER_ERROR_CODES.INVALID_QUANTITY))
  @Max(Number.MAX_SAFE_INTEGER, withCode(LEDGER_ERROR_CODES.INVALID_QUANTITY))
  quantity!: number;

  @IsNumber({}, withCode(LEDGER_ERROR_CODES.INVALID_PRICE))
  @Min(0, withCode(LEDGER_ERROR_CODES.INVALID_PRICE))
  unitPrice!: number;
}
