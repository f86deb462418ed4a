export * from './types.js';
export * from './challenge-state.js';
export * from './errors.js';
