import { Transform } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsPositive,
  IsString,
  Matches,
  Max,
  Min,
} from 'class-validator';
import { CATEGORY_OPTIONS, Category } from '../constants/categories';
import { LEDGER_ERROR_CODES } from '../errors/ledger.errors';
import { trimString, withCode } from '../validation/validate-request';
import { SINGLE_LINE } from './create-item.dto';

export class UpdateItemDto {
  @IsOptional()
  @IsInt(withCode(LEDGER_ERROR_CODES.INVALID_ID))
  @IsPositive(withCode(LEDGER_ERROR_CODES.INVALID_ID))
  @Max(Number.MAX_SAFE_INTEGER, withCode(LEDGER_ERROR_CODES.INVALID_ID))
  id?: number;

  @IsOptional()
  @Transform(trimString)
  @Matches(SINGLE_LINE, withCode(LEDGER_ERROR_CODES.INVALID_NAME))
  @IsNotEmpty(withCode(LEDGER_ERROR_CODES.EMPTY_NAME))
  @IsString(withCode(LEDGER_ERROR_CODES.EMPTY_NAME))
  name?: string;

  @IsOptional()
  @IsIn(CATEGORY_OPTIONS, withCode(LEDGER_ERROR_CODES.INVALID_CATEGORY))
  category?: Category;

  @IsOptional()
  @IsInt(withCode(LEDGER_ERROR_CODES.NEGATIVE_QUANTITY))
  @Min(0, withCode(LEDGER_ERROR_CODES.NEGATIVE_QUANTITY))
  @Max(Number.MAX_SAFE_INTEGER, withCode(LEDGER_ERROR_CODES.NEGATIVE_QUANTITY))
  quantity?: number;

  @IsOptional()
  @IsNumber({}, withCode(LEDGER_ERROR_CODES.NEGATIVE_PRICE))
  @Min(0, withCode(LEDGER_ERROR_CODES.NEGATIVE_PRICE))
  lastPrice?: number;
}
