export * from './errors/index.js';
export * from './validation-utils.js';
export * from './http/index.js';
export * from './secrets/index.js';

export * as RequestUtils from './utils/request/index.js';

// Logging with redaction
export * from './logging/index.js';

export {
  EnvVarPatternResolver,
  EnvironmentResolutionError,
  EnvResolutionErrorCode,
  resolveEnvVar,
} from './env/index.js';
