export { now, monotonicMs, createNodeTimer } from './time';
