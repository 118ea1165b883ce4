export * from './normalize.js';
export * from './tree.js';
export * from './loaders.js';
