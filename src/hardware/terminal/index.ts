export { createTerminalDisplay, renderPanel } from './terminal-display';
export type { TerminalDisplay, TerminalDisplayOptions, TerminalOutput } from './terminal-display';
export { mapKeystroke, attachTerminalKeys } from './terminal-keys';
export type { TerminalCommand, TerminalKeyHandlers, KeyInput } from './terminal-keys';
export { createTerminalPins } from './terminal-pins';
export type { TerminalPins } from './terminal-pins';
