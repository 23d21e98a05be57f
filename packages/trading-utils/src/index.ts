export * from './types.js';
export * from './errors.js';
export * from './indicators/ma.js';
export * from './signals/crossover.js';
export * from './risk/position-sizing.js';
