export type { SuspensionState, SuspensionOff, SuspensionTimed, SuspensionIndefinite, DigitEntryState } from './types';
export {
  SUSPENSION_OFF,
  ENTRY_IDLE,
  isSuspended,
  appendDigit,
  commitEntry,
  remainingMs,
  hasExpired,
  describeSuspension,
} from './suspension';
