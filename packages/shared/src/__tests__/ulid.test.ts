import { describe, it, expect } from 'vitest';
import { decodeTime } from 'ulid';
import { generateUlid, isValidUlid } from '../utils/ulid';

describe('ULID utilities', () => {
  describe('generateUlid', () => {
    it('generates a 26-character string', () => {
      const id = generateUlid();
      expect(id).toHaveLength(26);
    });

    it('generates unique IDs', () => {
      const ids = new Set(Array.from({ length: 100 }, () => generateUlid()));
      expect(ids.size).toBe(100);
    });

    it('generates sortable IDs', () => {
      const id1 = generateUlid();
      const id2 = generateUlid();
      expect(id2 > id1).toBe(true);
    });

    it('encodes the injected time when one is given', () => {
      const at = new Date('2031-04-05T06:07:08.000Z');
      const id = generateUlid(at);
      expect(new Date(decodeTime(id)).toISOString()).toBe('2031-04-05T06:07:08.000Z');
    });

    it('keeps increasing when the injected clock goes back', () => {
      const first = generateUlid(new Date('2031-04-05T06:07:08.000Z'));
      const second = generateUlid(new Date('2031-04-05T06:07:07.000Z'));
      expect(second > first).toBe(true);
      expect(new Date(decodeTime(second)).toISOString()).toBe('2031-04-05T06:07:08.000Z');
    });
  });

  describe('isValidUlid', () => {
    it('returns true for valid ULIDs', () => {
      expect(isValidUlid(generateUlid())).toBe(true);
    });

    it('returns false for invalid strings', () => {
      expect(isValidUlid('')).toBe(false);
      expect(isValidUlid('too-short')).toBe(false);
      expect(isValidUlid('not-a-valid-ulid-at-all!!!!')).toBe(false);
    });
  });
});
