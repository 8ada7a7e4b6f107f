export * from './locator.js';
export * from './page.js';
export * from './test-case.js';
export * from './config.js';
