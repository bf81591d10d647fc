export {
  createPulseTimer,
  startPulse,
  stopPulse,
  isPulseActive,
  isPulseOn,
  heartbeatLevel
} from './pulse';
export type { PulseTimer } from './types';
