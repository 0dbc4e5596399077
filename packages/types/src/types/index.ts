export type * from './extraction.js';
export type * from './state-configs.js';
export type * from './tax-fields.js';
