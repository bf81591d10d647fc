/**
 * Event types for the input side of the controller
 *
 * Raw inputs arrive from adapters (key characters, sensor edges) and are
 * queued in the inbox. At the start of each poll they are translated into
 * discrete input events which the controller applies in arrival order.
 */

/**
 * Decimal digit entered on the keypad
 */
export type Digit = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

/**
 * A digit key was pressed
 */
export interface DigitEvent {
  type: 'digit';
  digit: Digit;
}

/**
 * Hash key: commit the entered delay, or suspend indefinitely when nothing was entered
 */
export interface CommitEvent {
  type: 'commit';
}

/**
 * Star key: reset the whole alarm once the gate is closed
 */
export interface ResetEvent {
  type: 'reset';
}

/**
 * Debounced gate sensor reported the gate opening
 */
export interface GateOpenedEvent {
  type: 'gate_opened';
}

export type KeypadEvent = DigitEvent | CommitEvent | ResetEvent;

export type InputEvent = GateOpenedEvent | KeypadEvent;

/**
 * Raw input as captured by an adapter, before translation
 */
export type RawInput =
  | { kind: 'key'; key: string }
  | { kind: 'gate' };

/**
 * Keypad characters with a meaning to the controller
 */
export const KEY_CODES = {
  COMMIT: '#',
  RESET: '*',
} as const;
