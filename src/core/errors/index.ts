export * from './base-error.js';
export * from './validation.error.js';
export * from './not-found.error.js';
export * from './conflict.error.js';
export * from './business-rule.error.js';
