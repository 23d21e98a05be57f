export * from './date.js';
export * from './env.js';
export * from './logger.js';
export * from './sleep.js';
