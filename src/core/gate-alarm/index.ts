export type { GateState, AlarmState, GateAlarmCoreState } from './types';
export {
  activateAlarm,
  silenceAlarm,
  onGateOpened,
  resetGateAlarm,
  applySuspension,
  expireSuspension,
  checkInvariants,
  assertInvariants,
} from './gate-alarm';
