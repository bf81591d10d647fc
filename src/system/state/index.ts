export { createInitialState } from './state';
export type { GateAlarmState } from './types';
