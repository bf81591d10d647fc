export { writeOutputs, describeOutputs, ALL_OUTPUTS_OFF } from './outputs';
export type { OutputLevels } from './types';
