import { describe, it, expect } from 'vitest';
import {
  isValidDateISO,
  isValidGameId,
  isValidSeasonLabel,
  assertSeasonLabel,
  isValidUrl,
  ValidationError
} from '../../src/util/validation.js';

describe('validation', () => {
  describe('isValidDateISO', () => {
    it('should validate correct ISO date format', () => {
      expect(isValidDateISO('2022-10-18')).toBe(true);
      expect(isValidDateISO('2024-02-29')).toBe(true);
    });

    it('should reject invalid formats', () => {
      expect(isValidDateISO('2022/10/18')).toBe(false);
      expect(isValidDateISO('10-18-2022')).toBe(false);
      expect(isValidDateISO('2022-1-18')).toBe(false);
    });

    it('should reject dates the calendar does not have', () => {
      expect(isValidDateISO('2022-13-01')).toBe(false);
      expect(isValidDateISO('2023-02-29')).toBe(false);
    });
  });

  describe('isValidSeasonLabel', () => {
    it('should accept consecutive years', () => {
      expect(isValidSeasonLabel('2022-23')).toBe(true);
      expect(isValidSeasonLabel('1999-00')).toBe(true);
    });

    it('should reject malformed or non-consecutive labels', () => {
      expect(isValidSeasonLabel('2022-24')).toBe(false);
      expect(isValidSeasonLabel('2022')).toBe(false);
      expect(isValidSeasonLabel('22-23')).toBe(false);
      expect(isValidSeasonLabel('2022-2023')).toBe(false);
    });
  });

  describe('assertSeasonLabel', () => {
    it('should return the trimmed label', () => {
      expect(assertSeasonLabel(' 2022-23 ')).toBe('2022-23');
    });

    it('should throw ValidationError on the season field', () => {
      expect(() => assertSeasonLabel('next year')).toThrow(ValidationError);
      try {
        assertSeasonLabel('2022-25');
      } catch (err) {
        expect(err).toBeInstanceOf(ValidationError);
        if (err instanceof ValidationError) expect(err.field).toBe('season');
      }
    });
  });

  describe('isValidGameId', () => {
    it('should validate source game ids', () => {
      expect(isValidGameId('202210180BOS')).toBe(true);
      expect(isValidGameId('202304090LAL')).toBe(true);
    });

    it('should reject invalid formats', () => {
      expect(isValidGameId('202210180bos')).toBe(false);
      expect(isValidGameId('2022101BOS')).toBe(false);
      expect(isValidGameId('../secret')).toBe(false);
      expect(isValidGameId('')).toBe(false);
    });
  });

  describe('isValidUrl', () => {
    it('should validate correct URLs', () => {
      expect(isValidUrl('http://localhost:8000')).toBe(true);
      expect(isValidUrl('https://stats.example.com')).toBe(true);
    });

    it('should reject invalid URLs', () => {
      expect(isValidUrl('not-a-url')).toBe(false);
      expect(isValidUrl('')).toBe(false);
    });
  });

  describe('ValidationError', () => {
    it('should create error with message and field', () => {
      const error = new ValidationError('Invalid input', 'fieldName');
      expect(error.message).toBe('Invalid input');
      expect(error.field).toBe('fieldName');
      expect(error.name).toBe('ValidationError');
    });
  });
});
