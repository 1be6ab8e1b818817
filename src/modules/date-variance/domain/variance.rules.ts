import { RangeExceededError } from '../../../shared/domain/errors';
import { addDays, type CalendarDate } from '../../../shared/domain/date.utils';

/**
 * Domain rules for date variance.
 * Pure functions; the random draw is passed in, never made here.
 */

// ============ RANGE RULES ============

export interface VarianceBounds {
  min: number;
  max: number;
}

export function isRangeWithinMax(range: number, maxRange: number): boolean {
  return Math.abs(range) <= maxRange;
}

/**
 * @throws RangeExceededError when |range| > maxRange
 */
export function assertRangeWithinMax(range: number, maxRange: number): void {
  if (!isRangeWithinMax(range, maxRange)) {
    throw new RangeExceededError(range, maxRange);
  }
}

/**
 * The draw is symmetric around the original date, whatever the sign of the
 * requested range.
 */
export function getVarianceBounds(range: number): VarianceBounds {
  const magnitude = Math.abs(range);
  // 0 - 0 would give -0
  return { min: magnitude === 0 ? 0 : -magnitude, max: magnitude };
}

// ============ SHIFT RULES ============

export function applyVariance(
  date: CalendarDate,
  offsetDays: number,
): CalendarDate {
  return offsetDays === 0 ? date : addDays(date, offsetDays);
}
