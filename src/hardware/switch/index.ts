export { createDebouncedSwitch } from './switch';
export type { LevelReader } from './types';
