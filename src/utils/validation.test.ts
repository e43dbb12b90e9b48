import { describe, it, expect } from 'vitest';
import { isWeekday, validateDateRange, validateTimeWindow } from './validation.js';

describe('validation utilities', () => {
  describe('validateDateRange', () => {
    it('should accept a range whose end is after its start', () => {
      expect(validateDateRange({ start: '2026-01-05', end: '2026-01-06' })).toEqual({ isValid: true });
    });

    it('should reject an empty or inverted range', () => {
      expect(validateDateRange({ start: '2026-01-05', end: '2026-01-05' })).toEqual({
        isValid: false,
        error: 'end date must be after start date',
      });
      expect(validateDateRange({ start: '2026-01-05', end: '2026-01-01' }).isValid).toBe(false);
    });

    it('should reject missing or malformed dates', () => {
      expect(validateDateRange({ start: '', end: '2026-01-06' }).error).toBe('Both start and end dates are required');
      expect(validateDateRange({ start: '2026-02-30', end: '2026-03-06' }).error).toBe(
        'start date "2026-02-30" is not a valid date',
      );
      expect(validateDateRange({ start: '2026-01-05', end: 'soon' }).error).toBe('end date "soon" is not a valid date');
    });
  });

  describe('validateTimeWindow', () => {
    it('should accept a same-day window', () => {
      expect(validateTimeWindow({ start: '08:00', end: '10:30' })).toEqual({ isValid: true });
    });

    it('should reject malformed times', () => {
      expect(validateTimeWindow({ start: '8:00', end: '10:30' }).error).toBe('start time "8:00" must use HH:MM');
      expect(validateTimeWindow({ start: '08:00', end: '25:00' }).error).toBe('end time "25:00" must use HH:MM');
    });

    it('should reject cross-midnight and zero-length windows', () => {
      expect(validateTimeWindow({ start: '22:00', end: '02:00' }).error).toBe(
        'end time 02:00 must be after start time 22:00',
      );
      expect(validateTimeWindow({ start: '09:00', end: '09:00' }).isValid).toBe(false);
    });
  });

  describe('isWeekday', () => {
    it('should recognise lower-case weekday names only', () => {
      expect(isWeekday('monday')).toBe(true);
      expect(isWeekday('Monday')).toBe(false);
      expect(isWeekday('funday')).toBe(false);
    });
  });
});
