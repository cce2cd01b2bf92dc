import { Transform } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsPositive,
  IsString,
  Matches,
  Max,
  Min,
} from 'class-validator';
import { CATEGORY_OPTIONS, Category } from '../constants/categories';
import { LEDGER_ERROR_CODES } from '../errors/ledger.errors';
import { trimString, withCode } from '../validation/validate-request';

export const SINGLE_LINE = /^[^\r\n]*$/;

export class CreateItemDto {
  @IsInt(withCode(LEDGER_ERROR_CODES.INVALID_ID))
  @IsPositive(withCode(LEDGER_ERROR_CODES.INVALID_ID))
  @Max(Number.MAX_SAFE_INTEGER, withCode(LEDGER_ERROR_CODES.INVALID_ID))
  id!: number;

  @Transform(trimString)
  @Matches(SINGLE_LINE, withCode(LEDGER_ERROR_CODES.INVALID_NAME))
  @IsNotEmpty(withCode(LEDGER_ERROR_CODES.EMPTY_NAME))
  @IsString(withCode(LEDGER_ERROR_CODES.EMPTY_NAME))
  name!: string;

  @IsIn(CATEGORY_OPTIONS, withCode(LEDGER_ERROR_CODES.INVALID_CATEGORY))
  category!: Category;

  @IsInt(withCode(LEDGER_ERROR_CODES.NEGATIVE_QUANTITY))
  @Min(0, withCode(LEDGER_ERROR_CODES.NEGATIVE_QUANTITY))
  @Max(Number.MAX_SAFE_INTEGER, withCode(LEDGER_ERROR_CODES.NEGATIVE_QUANTITY))
  quantity!: number;

  @IsNumber({}, withCode(LEDGER_ERROR_CODES.NEGATIVE_PRICE))
  @Min(0, withCode(LEDGER_ERROR_CODES.NEGATIVE_PRICE))
  price!: number;
}
