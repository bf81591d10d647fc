export * from './common';
export * from './config';
export * from './errors';
export * from './hardware';
