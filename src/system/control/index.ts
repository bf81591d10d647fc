export { run, startLoop } from './control';
export {
  translateInput,
  processGateOpened,
  processKeypadEvent,
  processInputEvent,
  processSuspensionExpiry,
  processDisplay,
  computeOutputs,
  processOutputs
} from './helpers';
export type { Controller, LoopHandle } from './types';
