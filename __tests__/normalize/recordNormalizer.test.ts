import { describe, it, expect } from 'vitest';
import {
  cleanPlayByPlay,
  dropMissingMarginSentinel,
  replaceTieSentinel,
  parseMargin,
  escapeQuotes
} from '../../src/normalize/recordNormalizer.js';
import type { RawPlayEvent } from '../../src/types/source.js';

function raw(eventNum: number, margin: string | number | null, overrides: Partial<RawPlayEvent> = {}): RawPlayEvent {
  return {
    gameId: '202210180BOS',
    eventNum,
    period: 1,
    clock: '11:00.0',
    score: null,
    margin,
    awayPtsChange: null,
    homePtsChange: null,
    homeDescription: null,
    visitorDescription: null,
    eventType: null,
    eventSubtype: null,
    ...overrides
  };
}

describe('recordNormalizer', () => {
  describe('margin steps', () => {
    it('should map the missing sentinel to null', () => {
      expect(dropMissingMarginSentinel('None')).toBeNull();
      expect(dropMissingMarginSentinel('4')).toBe('4');
    });

    it('should map TIE to zero', () => {
      expect(replaceTieSentinel('TIE')).toBe(0);
      expect(replaceTieSentinel('-3')).toBe('-3');
    });

    it('should parse signed integers only', () => {
      expect(parseMargin('+7')).toBe(7);
      expect(parseMargin('-12')).toBe(-12);
      expect(parseMargin(3)).toBe(3);
      expect(parseMargin('abc')).toBeNull();
      expect(parseMargin('1.5')).toBeNull();
      expect(parseMargin(null)).toBeNull();
    });
  });

  describe('escapeQuotes', () => {
    it('should escape single and double quotes', () => {
      expect(escapeQuotes("O'Neal's dunk")).toBe("O\\'Neal\\'s dunk");
      expect(escapeQuotes('a "quoted" play')).toBe('a \\"quoted\\" play');
    });

    it('should leave escaped quotes alone', () => {
      const once = escapeQuotes("D'Angelo");
      expect(escapeQuotes(once)).toBe(once);
    });

    it('should pass null through', () => {
      expect(escapeQuotes(null)).toBeNull();
    });
  });

  describe('cleanPlayByPlay', () => {
    it('should turn None, TIE and numeric margins into integers', () => {
      const cleaned = cleanPlayByPlay([raw(1, 'None'), raw(2, 'TIE'), raw(3, '5')]);
      expect(cleaned.map(r => r.margin)).toEqual([0, 0, 5]);
    });

    it('should open every game at 0-0', () => {
      const cleaned = cleanPlayByPlay([raw(1, '7', { score: '0-7' }), raw(2, '9', { score: '0-9' })]);
      expect(cleaned[0].score).toBe('0-0');
      expect(cleaned[0].margin).toBe(0);
      expect(cleaned[1].score).toBe('0-9');
      expect(cleaned[1].margin).toBe(9);
    });

    it('should fill missing margins forward', () => {
      const cleaned = cleanPlayByPlay([
        raw(1, 'TIE'),
        raw(2, '3'),
        raw(3, null),
        raw(4, 'None'),
        raw(5, '-2'),
        raw(6, 'garbage')
      ]);
      expect(cleaned.map(r => r.margin)).toEqual([0, 3, 3, 3, -2, -2]);
    });

    it('should escape descriptions and keep other fields', () => {
      const [row] = cleanPlayByPlay([
        raw(1, 'TIE', { homeDescription: "D'Angelo makes 2-pt layup", eventType: 'made_shot', eventSubtype: '2pt' })
      ]);
      expect(row.homeDescription).toBe("D\\'Angelo makes 2-pt layup");
      expect(row.eventType).toBe('made_shot');
      expect(row.eventSubtype).toBe('2pt');
      expect(row.eventNum).toBe(1);
    });

    it('should preserve length and be idempotent', () => {
      const rows = [raw(1, 'None'), raw(2, '2', { visitorDescription: 'a "b"' }), raw(3, null)];
      const cleaned = cleanPlayByPlay(rows);
      expect(cleaned).toHaveLength(rows.length);
      expect(cleanPlayByPlay(cleaned)).toEqual(cleaned);
    });

    it('should return an empty list for no rows', () => {
      expect(cleanPlayByPlay([])).toEqual([]);
    });
  });
});
