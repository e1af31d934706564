export {
  EnvVarPatternResolver,
  EnvironmentResolutionError,
  EnvResolutionErrorCode,
  resolveEnvVar,
} from './environment-resolver.js';
