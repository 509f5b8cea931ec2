export type * from './pdf.js';
export * from './outline.js';
export type * from './config.js';
