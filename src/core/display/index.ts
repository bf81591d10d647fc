export type { DisplayFrame, DisplayView, BacklightTimer } from './types';
export {
  formatRemaining,
  renderFrame,
  frameChanged,
  shouldRender,
  centerOffset,
  centerLine,
  createBacklightTimer,
  activateBacklight,
  deactivateBacklight,
  shouldBacklightTurnOff,
} from './display';
