export * from './indicator.js';
export * from './config.js';
