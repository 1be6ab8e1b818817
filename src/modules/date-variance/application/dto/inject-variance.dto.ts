import { IsInt, IsNotEmpty, IsString, Min } from 'class-validator';
import { Transform, type TransformFnParams } from 'class-transformer';

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Plain decimal digits only. Anything else (empty, hex, exponent, beyond
 * 2^53) becomes NaN so that @IsInt rejects it.
 */
function toInteger({ value }: TransformFnParams): unknown {
  if (typeof value !== 'string') {
    return value;
  }
  const parsed = INTEGER_PATTERN.test(value) ? Number(value) : Number.NaN;
  return Number.isSafeInteger(parsed) ? parsed : Number.NaN;
}

/**
 * Command-line input after parsing. Numeric options arrive as strings and
 * are converted before validation.
 */
export class InjectVarianceDto {
  @IsString()
  date!: string;

  @Transform(toInteger)
  @IsInt()
  range!: number;

  @Transform(toInteger)
  @IsInt()
  @Min(0)
  maxRange!: number;

  @IsString()
  @IsNotEmpty()
  format!: string;
}
