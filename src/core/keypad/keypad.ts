/**
 * Keypad event translation
 *
 * The membrane keypad reports single characters. Digits build up a
 * suspension delay in minutes, '#' commits it and '*' resets the alarm.
 * Anything else is not an error; it is simply ignored.
 */

import type { Digit, KeypadEvent } from '@events/types';
import { KEY_CODES } from '@events/types';

const DIGIT_KEYS = new Map<string, Digit>([
  ['0', 0], ['1', 1], ['2', 2], ['3', 3], ['4', 4],
  ['5', 5], ['6', 6], ['7', 7], ['8', 8], ['9', 9],
]);

/**
 * Classify a key character
 * @param key - Character reported by the keypad
 * @returns Keypad event, or null for an unmapped key
 */
export function classifyKey(key: string): KeypadEvent | null {
  const digit = DIGIT_KEYS.get(key);
  if (digit !== undefined) {
    return { type: 'digit', digit: digit };
  }
  if (key === KEY_CODES.COMMIT) {
    return { type: 'commit' };
  }
  if (key === KEY_CODES.RESET) {
    return { type: 'reset' };
  }
  return null;
}

/**
 * Check that a key exists on the keypad
 *
 * The layout is one string per row, e.g. ['123', '456', '789', '*0#'].
 * A keypad without a '*' key can never send a reset, whatever the
 * input adapter delivers.
 *
 * @param layout - Keypad rows
 * @param key - Single key character
 */
export function isOnKeypad(layout: readonly string[], key: string): boolean {
  if (key.length !== 1) {
    return false;
  }
  return layout.some(function(row) {
    return row.indexOf(key) !== -1;
  });
}

/**
 * Describe a keypad event for log output
 */
export function describeKeypadEvent(event: KeypadEvent): string {
  switch (event.type) {
    case 'digit':
      return 'DIGIT ' + event.digit;
    case 'commit':
      return 'HASH';
    case 'reset':
      return 'STAR';
  }
}
