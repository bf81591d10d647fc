/**
 * Tests for the suspension manager
 */

import { KeypadValidationError } from '$types/errors';
import {
  SUSPENSION_OFF,
  ENTRY_IDLE,
  isSuspended,
  appendDigit,
  commitEntry,
  remainingMs,
  hasExpired,
  describeSuspension,
} from './suspension';
import type { DigitEntryState } from './types';

const MAX = 9999;

function typeDigits(digits: number[]): DigitEntryState {
  let entry: DigitEntryState = ENTRY_IDLE;
  for (const d of digits) {
    entry = appendDigit(entry, d, MAX);
  }
  return entry;
}

describe('Suspension', () => {
  describe('isSuspended', () => {
    it('should be false only when off', () => {
      expect(isSuspended(SUSPENSION_OFF)).toBe(false);
      expect(isSuspended({ kind: 'indefinite' })).toBe(true);
      expect(isSuspended({ kind: 'timed', durationMs: 60000, startTime: 0 })).toBe(true);
    });
  });

  describe('appendDigit', () => {
    it('should start accumulating from idle', () => {
      expect(appendDigit(ENTRY_IDLE, 4, MAX)).toEqual({ kind: 'accumulating', value: 4 });
    });

    it('should shift previous digits left', () => {
      expect(typeDigits([1, 2])).toEqual({ kind: 'accumulating', value: 12 });
      expect(typeDigits([0, 7])).toEqual({ kind: 'accumulating', value: 7 });
    });

    it('should clamp at the maximum', () => {
      expect(typeDigits([9, 9, 9, 9, 9])).toEqual({ kind: 'accumulating', value: 9999 });
      expect(typeDigits([1, 2, 3, 4, 5, 6])).toEqual({ kind: 'accumulating', value: 9999 });
    });

    it('should clamp at a custom maximum', () => {
      expect(appendDigit({ kind: 'accumulating', value: 5 }, 0, 30)).toEqual({ kind: 'accumulating', value: 30 });
    });

    it('should reject non-digits', () => {
      expect(() => appendDigit(ENTRY_IDLE, 10, MAX)).toThrow(KeypadValidationError);
      expect(() => appendDigit(ENTRY_IDLE, -1, MAX)).toThrow('digit must be an integer 0-9, got -1');
      expect(() => appendDigit(ENTRY_IDLE, 1.5, MAX)).toThrow(KeypadValidationError);
    });
  });

  describe('commitEntry', () => {
    it('should turn 12 minutes into 720000 ms from now', () => {
      expect(commitEntry(typeDigits([1, 2]), 5000)).toEqual({
        kind: 'timed',
        durationMs: 720000,
        startTime: 5000,
      });
    });

    it('should cancel suspension on 0', () => {
      expect(commitEntry(typeDigits([0]), 5000)).toEqual({ kind: 'off' });
      expect(commitEntry(typeDigits([0, 0]), 5000)).toEqual({ kind: 'off' });
    });

    it('should suspend indefinitely without digits', () => {
      expect(commitEntry(ENTRY_IDLE, 5000)).toEqual({ kind: 'indefinite' });
    });
  });

  describe('remainingMs', () => {
    it('should count down a timed suspension', () => {
      const s = commitEntry(typeDigits([1]), 1000);
      expect(remainingMs(s, 1000)).toBe(60000);
      expect(remainingMs(s, 31000)).toBe(30000);
      expect(remainingMs(s, 61000)).toBe(0);
      expect(remainingMs(s, 90000)).toBe(0);
    });

    it('should be null unless timed', () => {
      expect(remainingMs(SUSPENSION_OFF, 1000)).toBeNull();
      expect(remainingMs({ kind: 'indefinite' }, 1000)).toBeNull();
    });

    it('should count across the clock wrap', () => {
      const s = commitEntry(typeDigits([1]), 0xFFFFFFFF - 9);
      expect(remainingMs(s, 10)).toBe(59980);
    });
  });

  describe('hasExpired', () => {
    it('should expire strictly after the duration', () => {
      const s = commitEntry(typeDigits([1]), 1000);
      expect(hasExpired(s, 61000)).toBe(false);
      expect(hasExpired(s, 61001)).toBe(true);
    });

    it('should never expire off or indefinite', () => {
      expect(hasExpired(SUSPENSION_OFF, 0xFFFFFFFF)).toBe(false);
      expect(hasExpired({ kind: 'indefinite' }, 0xFFFFFFFF)).toBe(false);
    });
  });

  describe('describeSuspension', () => {
    it('should describe each kind', () => {
      expect(describeSuspension(SUSPENSION_OFF)).toBe('off');
      expect(describeSuspension({ kind: 'indefinite' })).toBe('indefinite');
      expect(describeSuspension({ kind: 'timed', durationMs: 720000, startTime: 0 })).toBe('timed 12 min');
    });
  });
});
