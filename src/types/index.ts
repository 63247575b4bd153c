export * from './result.js';
export * from './selector.js';
export * from './resolution.js';
