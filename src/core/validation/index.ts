export * from './types.js';
export * from './validator.js';
export * from './checks.js';
export * from './runner.js';
