export { createInputInbox } from './inbox';
export type { InputInbox } from './inbox';
export { KEY_CODES } from './types';
export type {
  Digit,
  DigitEvent,
  CommitEvent,
  ResetEvent,
  GateOpenedEvent,
  KeypadEvent,
  InputEvent,
  RawInput
} from './types';
