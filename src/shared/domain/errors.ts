/**
 * Base class for domain errors.
 * Domain errors represent rule violations the CLI reports to the user.
 */
export abstract class DomainError extends Error {
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

// ============ DATE ERRORS ============

export class InvalidDateFormatError extends DomainError {
  readonly code = 'INVALID_FORMAT';

  constructor(public readonly input: string) {
    super('Invalid date format. Please use YYYY-MM-DD (e.g., 2023-10-26).');
  }
}

export class DateOutOfBoundsError extends DomainError {
  readonly code = 'DATE_OUT_OF_BOUNDS';

  constructor() {
    super(
      'Shifted date falls outside the supported range 0001-01-01..9999-12-31',
    );
  }
}

// ============ VARIANCE ERRORS ============

export class RangeExceededError extends DomainError {
  readonly code = 'RANGE_EXCEEDED';

  constructor(
    public readonly range: number,
    public readonly maxRange: number,
  ) {
    super(
      `The specified range (${range}) exceeds the maximum allowed range (${maxRange}).`,
    );
  }
}

// ============ INPUT ERRORS ============

export class InvalidOptionsError extends DomainError {
  readonly code = 'INVALID_OPTIONS';

  constructor(public readonly violations: string[]) {
    super(`Invalid options: ${violations.join('; ')}`);
  }
}
