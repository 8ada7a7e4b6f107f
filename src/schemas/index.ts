export * from './config.schema.js';
export * from './test-case.schema.js';
export * from './history.schema.js';
export * from './review.schema.js';
export * from './feedback.schema.js';
