export * from './config/index.js';
export * from './band/index.js';
