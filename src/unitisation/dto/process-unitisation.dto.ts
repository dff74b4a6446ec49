import { Type } from 'class-transformer';
import {
  IsArray,
  IsDateString,
  IsNotEmpty,
  IsNumber,
  IsObject,
  IsPositive,
  IsString,
  Min,
  ValidateNested,
} from 'class-validator';

// One investor cash movement. kind is free text here; the normalizer
// decides whether it is a subscription or a redemption.
export class TransactionDto {
  @IsDateString()
  date!: string;

  @IsString()
  @IsNotEmpty()
  investor!: string;

  @IsString()
  @IsNotEmpty()
  kind!: string;

  @IsNumber()
  @IsPositive()
  amount!: number;
}

// Batch of transactions priced against per-date NAV per unit.
export class ProcessUnitisationDto {
  @IsNumber()
  @Min(0)
  openingUnits!: number;

  @IsNumber()
  @IsPositive()
  openingNavPerUnit!: number;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => TransactionDto)
  transactions!: TransactionDto[];

  @IsObject()
  navByDate!: Record<string, number>;  // { "2026-01-02": 1.0125 }
}
