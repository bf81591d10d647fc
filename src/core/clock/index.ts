export { CLOCK_PERIOD_MS, toClockValue, elapsed, createClock } from './clock';
