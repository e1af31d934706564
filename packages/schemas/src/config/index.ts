export {
  BandClientConfigSchema,
  createBandClientConfigSchema,
  parseBandClientConfig,
  loadConfigFromEnv,
  DEFAULT_REDIRECT_URI,
  DEFAULT_AUTH_BASE_URL,
  DEFAULT_API_BASE_URL,
  DEFAULT_NAMESPACE,
  DEFAULT_LOCALE,
} from './BandClientConfigSchema.js';
export type { BandClientConfigInput } from './BandClientConfigSchema.js';
