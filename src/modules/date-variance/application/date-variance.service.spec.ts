import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Test, TestingModule } from '@nestjs/testing';
import { DateVarianceService } from './date-variance.service';
import { RANDOM_SOURCE } from '../../../shared/domain/random.port';
import {
  DateOutOfBoundsError,
  InvalidDateFormatError,
  RangeExceededError,
} from '../../../shared/domain/errors';
import type { InjectVarianceDto } from './dto/inject-variance.dto';

const mockRandom = {
  nextInt: vi.fn(),
};

function input(overrides: Partial<InjectVarianceDto> = {}): InjectVarianceDto {
  return {
    date: '2023-10-26',
    range: 30,
    maxRange: 365,
    format: '%Y-%m-%d',
    ...overrides,
  };
}

describe('DateVarianceService', () => {
  let service: DateVarianceService;

  beforeEach(async () => {
    vi.clearAllMocks();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        DateVarianceService,
        { provide: RANDOM_SOURCE, useValue: mockRandom },
      ],
    }).compile();

    service = module.get<DateVarianceService>(DateVarianceService);
  });

  describe('inject', () => {
    it('should leave the date unchanged for a zero range', () => {
      mockRandom.nextInt.mockReturnValue(0);

      const result = service.inject(input({ range: 0 }));

      expect(mockRandom.nextInt).toHaveBeenCalledWith(0, 0);
      expect(result.offsetDays).toBe(0);
      expect(result.formatted).toBe('2023-10-26');
    });

    it('should draw from the symmetric interval of the range', () => {
      mockRandom.nextInt.mockReturnValue(3);

      service.inject(input({ range: 10 }));

      expect(mockRandom.nextInt).toHaveBeenCalledTimes(1);
      expect(mockRandom.nextInt).toHaveBeenCalledWith(-10, 10);
    });

    it('should treat a negative range like its absolute value', () => {
      mockRandom.nextInt.mockReturnValue(-7);

      const result = service.inject(input({ range: -10 }));

      expect(mockRandom.nextInt).toHaveBeenCalledWith(-10, 10);
      expect(result.formatted).toBe('2023-10-19');
    });

    it('should reach both ends of the interval', () => {
      mockRandom.nextInt.mockReturnValueOnce(-10).mockReturnValueOnce(10);

      expect(service.inject(input({ range: 10 })).formatted).toBe(
        '2023-10-16',
      );
      expect(service.inject(input({ range: 10 })).formatted).toBe(
        '2023-11-05',
      );
    });

    it('should return the original, offset and shifted dates', () => {
      mockRandom.nextInt.mockReturnValue(1);

      const result = service.inject(input({ date: '2024-02-28', range: 5 }));

      expect(result).toEqual({
        original: { year: 2024, month: 2, day: 28 },
        offsetDays: 1,
        modified: { year: 2024, month: 2, day: 29 },
        formatted: '2024-02-29',
      });
    });

    it('should apply the requested format', () => {
      mockRandom.nextInt.mockReturnValue(0);

      const result = service.inject(input({ range: 0, format: '%d.%m.%Y' }));

      expect(result.formatted).toBe('26.10.2023');
    });

    it('should reject a malformed date before drawing', () => {
      expect(() => service.inject(input({ date: '2023/10/26' }))).toThrow(
        InvalidDateFormatError,
      );
      expect(mockRandom.nextInt).not.toHaveBeenCalled();
    });

    it('should report a bad date before a bad range', () => {
      expect(() =>
        service.inject(input({ date: '2023-02-30', range: 50, maxRange: 30 })),
      ).toThrow(InvalidDateFormatError);
    });

    it('should reject a range over the maximum before drawing', () => {
      expect(() =>
        service.inject(input({ range: 50, maxRange: 30 })),
      ).toThrow(RangeExceededError);
      expect(mockRandom.nextInt).not.toHaveBeenCalled();
    });

    it('should reject a shift past the last supported date', () => {
      mockRandom.nextInt.mockReturnValue(2);

      expect(() =>
        service.inject(input({ date: '9999-12-30', range: 2 })),
      ).toThrow(DateOutOfBoundsError);
    });

    it('should propagate random source failures', () => {
      mockRandom.nextInt.mockImplementationOnce(() => {
        throw new Error('entropy unavailable');
      });

      expect(() => service.inject(input())).toThrow('entropy unavailable');
    });
  });
});
