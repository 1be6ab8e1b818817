import { registerAs } from '@nestjs/config';
import { DEFAULT_DATE_FORMAT } from '../shared/domain/date-format';

export interface VarianceConfig {
  /** Default --range, in days */
  range: number;
  /** Default --max-range, in days */
  maxRange: number;
  /** Default --format */
  format: string;
}

/**
 * CLI defaults. Fixed values: the tool reads no environment.
 */
export default registerAs(
  'variance',
  (): VarianceConfig => ({
    range: 30,
    maxRange: 365,
    format: DEFAULT_DATE_FORMAT,
  }),
);
