import type { EnvVarPatternResolverConfig } from '@bandkit/models';
import { BandError } from '../errors/band-error.js';

export enum EnvResolutionErrorCode {
  MISSING_VARIABLE = 'missing_variable',
  CIRCULAR_REFERENCE = 'circular_reference',
  MAX_DEPTH_EXCEEDED = 'max_depth_exceeded',
}

/**
 * Error thrown when a `${VAR}` reference in configuration cannot be resolved.
 * @public
 */
export class EnvironmentResolutionError extends BandError<EnvResolutionErrorCode> {
  public constructor(
    message: string,
    code: EnvResolutionErrorCode,
    public readonly variable?: string,
  ) {
    super(message, code);
    this.name = 'EnvironmentResolutionError';
  }

  public static missingVariable(variable: string): EnvironmentResolutionError {
    return new EnvironmentResolutionError(
      `Required environment variable '${variable}' is not defined`,
      EnvResolutionErrorCode.MISSING_VARIABLE,
      variable,
    );
  }

  public static circularReference(variable: string): EnvironmentResolutionError {
    return new EnvironmentResolutionError(
      `Circular reference detected in environment variable '${variable}'`,
      EnvResolutionErrorCode.CIRCULAR_REFERENCE,
      variable,
    );
  }

  public static maxDepthExceeded(depth: number): EnvironmentResolutionError {
    return new EnvironmentResolutionError(
      `Maximum resolution depth of ${depth} exceeded`,
      EnvResolutionErrorCode.MAX_DEPTH_EXCEEDED,
    );
  }
}

const ENV_PATTERN = /\$\{([A-Z_][A-Z0-9_]*)(?::([^}]*))?\}/g;

/**
 * Resolves `${VAR}` and `${VAR:default}` references in configuration strings.
 *
 * Values and defaults are resolved recursively; a variable that refers back to
 * itself, or a chain deeper than `maxDepth`, is rejected.
 * @example
 * ```typescript
 * const resolver = new EnvVarPatternResolver({ envSource: { BAND_CLIENT_ID: 'abc' } });
 * resolver.resolve('${BAND_CLIENT_ID}'); // 'abc'
 * resolver.resolve('${BAND_LOCALE:ko_KR}'); // 'ko_KR'
 * ```
 * @public
 */
export class EnvVarPatternResolver {
  private readonly maxDepth: number;
  private readonly strict: boolean;
  private readonly envSource: Record<string, string | undefined>;

  public constructor(config: EnvVarPatternResolverConfig = {}) {
    this.maxDepth = config.maxDepth ?? 10;
    this.strict = config.strict ?? true;
    this.envSource = config.envSource ?? process.env;
  }

  /**
   * @throws {EnvironmentResolutionError} On a missing variable (strict mode), a cycle, or too deep a chain
   */
  public resolve(
    value: string,
    visited: ReadonlySet<string> = new Set(),
    depth: number = 0,
  ): string {
    if (depth > this.maxDepth) {
      throw EnvironmentResolutionError.maxDepthExceeded(this.maxDepth);
    }

    return value.replace(
      ENV_PATTERN,
      (match: string, name: string, fallback: string | undefined) => {
        if (visited.has(name)) {
          throw EnvironmentResolutionError.circularReference(name);
        }

        const next = new Set(visited).add(name);
        const envValue = this.envSource[name];

        if (envValue !== undefined) {
          return this.resolve(envValue, next, depth + 1);
        }
        if (fallback !== undefined) {
          return this.resolve(fallback, next, depth + 1);
        }
        if (this.strict) {
          throw EnvironmentResolutionError.missingVariable(name);
        }
        return match;
      },
    );
  }

  public static containsPattern(value: string): boolean {
    return /\$\{[A-Z_][A-Z0-9_]*(?::[^}]*)?\}/.test(value);
  }
}

/**
 * Resolves a single configuration value, returning it untouched when it holds
 * no `${VAR}` reference.
 * @param value - String potentially containing environment variable patterns
 * @param envSource - Optional custom environment source
 * @public
 */
export function resolveEnvVar(
  value: string,
  envSource?: Record<string, string | undefined>,
): string {
  return EnvVarPatternResolver.containsPattern(value)
    ? new EnvVarPatternResolver({ envSource }).resolve(value)
    : value;
}
