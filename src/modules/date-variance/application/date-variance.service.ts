import { Inject, Injectable, Logger } from '@nestjs/common';
import type { RandomSource } from '../../../shared/domain/random.port';
import { RANDOM_SOURCE } from '../../../shared/domain/random.port';
import {
  formatISODate,
  parseISODate,
  type CalendarDate,
} from '../../../shared/domain/date.utils';
import { formatDate } from '../../../shared/domain/date-format';
import {
  applyVariance,
  assertRangeWithinMax,
  getVarianceBounds,
} from '../domain/variance.rules';
import type { InjectVarianceDto } from './dto/inject-variance.dto';

export interface VarianceResult {
  original: CalendarDate;
  offsetDays: number;
  modified: CalendarDate;
  formatted: string;
}

/**
 * Shifts a date by a uniformly drawn offset within [-|range|, |range|] days.
 *
 * Order matters for error reporting: a bad date is reported before a bad
 * range, and nothing is drawn until both are valid.
 */
@Injectable()
export class DateVarianceService {
  private readonly logger = new Logger(DateVarianceService.name);

  constructor(
    @Inject(RANDOM_SOURCE)
    private readonly random: RandomSource,
  ) {}

  inject(input: InjectVarianceDto): VarianceResult {
    const original = parseISODate(input.date);

    assertRangeWithinMax(input.range, input.maxRange);

    const bounds = getVarianceBounds(input.range);
    const offsetDays = this.random.nextInt(bounds.min, bounds.max);
    const modified = applyVariance(original, offsetDays);

    this.logger.debug(
      `Shifted ${formatISODate(original)} by ${offsetDays} day(s) to ${formatISODate(modified)}`,
    );

    return {
      original,
      offsetDays,
      modified,
      formatted: formatDate(modified, input.format),
    };
  }
}
