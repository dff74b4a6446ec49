import { Type } from 'class-transformer';
import {
  IsArray,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Length,
  ValidateNested,
} from 'class-validator';

export class HoldingDto {
  @IsString()
  @IsNotEmpty()
  instrument!: string;

  @IsNumber()
  quantity!: number;

  @IsNumber()
  price!: number;

  @IsString()
  @Length(3, 3)
  baseCcy!: string;

  @IsNumber()
  fxToBase!: number;
}

export class LiabilityDto {
  @IsString()
  @IsNotEmpty()
  liability!: string;

  @IsNumber()
  amount!: number;

  @IsString()
  @Length(3, 3)
  baseCcy!: string;
}

// Holdings and liabilities for one valuation point.
// unitsOutstanding is range-checked by the service (ArgumentError).
export class CalculateNavDto {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => HoldingDto)
  holdings!: HoldingDto[];

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => LiabilityDto)
  liabilities!: LiabilityDto[];

  @IsNumber()
  unitsOutstanding!: number;

  @IsOptional()
  @IsString()
  @Length(3, 3)
  baseCcy?: string;
}
