import { z } from 'zod';
import {
  ConfigurationError,
  ValidationUtils,
  resolveEnvVar,
  toError,
} from '@bandkit/core';
import { GrantTypes, ResponseTypes, type BandClientConfig } from '@bandkit/models';

export const DEFAULT_REDIRECT_URI = 'http://localhost:8000';
export const DEFAULT_AUTH_BASE_URL = 'https://auth.band.us';
export const DEFAULT_API_BASE_URL = 'https://openapi.band.us';
export const DEFAULT_NAMESPACE = 'OPENBAND';
export const DEFAULT_LOCALE = 'ko_KR';

type EnvSource = Record<string, string | undefined>;

// Strings may carry ${VAR} / ${VAR:default} references
const envString = (envSource?: EnvSource) =>
  z.string().transform((value, ctx) => {
    try {
      return resolveEnvVar(value, envSource);
    } catch (error) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: toError(error).message });
      return z.NEVER;
    }
  });

const requiredString = (field: string, envSource?: EnvSource) =>
  envString(envSource).refine((value) => value.length > 0, {
    message: `${field} is required`,
  });

const urlString = (field: string, envSource?: EnvSource) =>
  envString(envSource).superRefine((value, ctx) => {
    try {
      ValidationUtils.validateUrl(value, field);
    } catch (error) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: toError(error).message });
    }
  });

/**
 * Builds the client configuration schema against a given environment.
 * `BandClientConfigSchema` is the same schema bound to `process.env`.
 */
export function createBandClientConfigSchema(envSource?: EnvSource) {
  return z.object({
    clientId: requiredString('clientId', envSource),
    clientSecret: requiredString('clientSecret', envSource),
    redirectUri: urlString('redirectUri', envSource).default(DEFAULT_REDIRECT_URI),
    // Checked against 'code' only when the flow runs
    responseType: envString(envSource).default(ResponseTypes.CODE),
    grantType: envString(envSource).default(GrantTypes.AUTHORIZATION_CODE),
    authBaseUrl: urlString('authBaseUrl', envSource).default(DEFAULT_AUTH_BASE_URL),
    apiBaseUrl: urlString('apiBaseUrl', envSource).default(DEFAULT_API_BASE_URL),
    namespace: envString(envSource)
      .superRefine((value, ctx) => {
        try {
          ValidationUtils.sanitizeIdentifier(value, 'namespace');
        } catch (error) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: toError(error).message });
        }
      })
      .default(DEFAULT_NAMESPACE),
    locale: envString(envSource).default(DEFAULT_LOCALE),
    redirectTimeoutMs: z.number().int().positive().optional(),
    openBrowser: z.boolean().default(true),
  });
}

export const BandClientConfigSchema = createBandClientConfigSchema();

export type BandClientConfigInput = z.input<typeof BandClientConfigSchema>;

/**
 * Validates and normalizes client configuration.
 * @throws {ConfigurationError} Listing every failing field
 */
export function parseBandClientConfig(
  input: unknown,
  envSource?: EnvSource,
): BandClientConfig {
  const result = createBandClientConfigSchema(envSource).safeParse(input);
  if (!result.success) {
    const detail = result.error.issues.map((issue) => issue.message).join('; ');
    throw ConfigurationError.invalidConfig(detail, result.error);
  }
  return result.data;
}

/**
 * Reads configuration from `BAND_*` environment variables.
 *
 * Unset variables fall back to the schema defaults; `clientId` and
 * `clientSecret` have none.
 */
export function loadConfigFromEnv(
  env: EnvSource = process.env,
  overrides: Partial<BandClientConfigInput> = {},
): BandClientConfig {
  const timeout = env.BAND_REDIRECT_TIMEOUT_MS;
  return parseBandClientConfig(
    {
      clientId: env.BAND_CLIENT_ID ?? '',
      clientSecret: env.BAND_CLIENT_SECRET ?? '',
      redirectUri: env.BAND_REDIRECT_URI,
      namespace: env.BAND_NAMESPACE,
      locale: env.BAND_LOCALE,
      redirectTimeoutMs: timeout === undefined ? undefined : Number(timeout),
      ...overrides,
    },
    env,
  );
}
