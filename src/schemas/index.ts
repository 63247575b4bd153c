export * from './selector.schema.js';
export * from './cli-input.schema.js';
