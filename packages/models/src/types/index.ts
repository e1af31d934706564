export * from './band/index.js';

export type { EnvVarPatternResolverConfig } from './EnvVarPatternResolverConfig.js';
