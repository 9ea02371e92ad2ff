export * from './threads/index.js';
export * from './export/index.js';
export * from './errors.js';
