export * from './extraction.js';
export * from './state-configs.js';
export * from './tax-fields.js';
