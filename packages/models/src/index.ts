export * from './types/index.js';
export * from './enums/auth.js';
export * from './enums/band.js';
