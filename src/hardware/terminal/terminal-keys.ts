/**
 * Terminal keypad and gate sensor
 *
 * Maps keystrokes from a raw-mode terminal to the simulator's inputs:
 * - '0'-'9', '#', '*' and any other printable key go to the keypad
 * - 'g' toggles the simulated gate sensor level
 * - 'q' or Ctrl+C quits
 */

import * as readline from 'readline';

/**
 * What a keystroke means to the simulator
 */
export type TerminalCommand =
  | { kind: 'key'; key: string }
  | { kind: 'toggle-gate' }
  | { kind: 'quit' };

const CTRL_C = '\u0003';

/**
 * Map one keystroke
 * @param sequence - Character sequence of the keystroke
 * @returns Command, or null for control sequences with no meaning here
 */
export function mapKeystroke(sequence: string): TerminalCommand | null {
  if (sequence === 'q' || sequence === 'Q' || sequence === CTRL_C) {
    return { kind: 'quit' };
  }
  if (sequence === 'g' || sequence === 'G') {
    return { kind: 'toggle-gate' };
  }
  if (sequence.length === 1 && sequence >= ' ' && sequence <= '~') {
    return { kind: 'key', key: sequence };
  }
  return null;
}

export interface TerminalKeyHandlers {
  onKey(key: string): void;
  onToggleGate(): void;
  onQuit(): void;
}

/**
 * Keystroke source; process.stdin in the simulator
 */
export interface KeyInput extends NodeJS.ReadableStream {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
}

/**
 * Listen for keystrokes
 * @returns Function that detaches the listener and restores the terminal
 */
export function attachTerminalKeys(input: KeyInput, handlers: TerminalKeyHandlers): () => void {
  readline.emitKeypressEvents(input);
  if (input.isTTY && input.setRawMode) {
    input.setRawMode(true);
  }

  function onKeypress(str: string | undefined, key: { sequence?: string } | undefined): void {
    const sequence = str !== undefined ? str : key?.sequence;
    if (sequence === undefined) {
      return;
    }

    const command = mapKeystroke(sequence);
    if (command === null) {
      return;
    }

    switch (command.kind) {
      case 'key':
        handlers.onKey(command.key);
        break;
      case 'toggle-gate':
        handlers.onToggleGate();
        break;
      case 'quit':
        handlers.onQuit();
        break;
    }
  }

  input.on('keypress', onKeypress);
  input.resume();

  return function detach() {
    input.removeListener('keypress', onKeypress);
    if (input.isTTY && input.setRawMode) {
      input.setRawMode(false);
    }
    input.pause();
  };
}
