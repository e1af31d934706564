import { describe, it, expect } from 'vitest';
import {
  EnvVarPatternResolver,
  EnvironmentResolutionError,
  resolveEnvVar,
} from '../../env/environment-resolver.js';

describe('EnvVarPatternResolver', () => {
  it('substitutes variables from the env source', () => {
    const resolver = new EnvVarPatternResolver({
      envSource: { BAND_CLIENT_ID: 'abc' },
    });

    expect(resolver.resolve('id=${BAND_CLIENT_ID}')).toBe('id=abc');
  });

  it('uses the default when the variable is missing', () => {
    const resolver = new EnvVarPatternResolver({ envSource: {} });

    expect(resolver.resolve('${BAND_LOCALE:ko_KR}')).toBe('ko_KR');
  });

  it('resolves nested references', () => {
    const resolver = new EnvVarPatternResolver({
      envSource: { HOST: 'localhost', REDIRECT: 'http://${HOST}:8000' },
    });

    expect(resolver.resolve('${REDIRECT}')).toBe('http://localhost:8000');
  });

  it('throws on a missing variable in strict mode', () => {
    const resolver = new EnvVarPatternResolver({ envSource: {} });

    expect(() => resolver.resolve('${BAND_CLIENT_SECRET}')).toThrow(EnvironmentResolutionError);
    expect(() => resolver.resolve('${BAND_CLIENT_SECRET}')).toThrow(
      "Required environment variable 'BAND_CLIENT_SECRET' is not defined",
    );
  });

  it('leaves the pattern in place when not strict', () => {
    const resolver = new EnvVarPatternResolver({ envSource: {}, strict: false });

    expect(resolver.resolve('${MISSING}')).toBe('${MISSING}');
  });

  it('detects circular references', () => {
    const resolver = new EnvVarPatternResolver({
      envSource: { A: '${B}', B: '${A}' },
    });

    expect(() => resolver.resolve('${A}')).toThrow(
      "Circular reference detected in environment variable 'A'",
    );
  });
});

describe('resolveEnvVar', () => {
  it('returns plain strings untouched', () => {
    expect(resolveEnvVar('https://auth.band.us', {})).toBe('https://auth.band.us');
  });

  it('resolves against a custom env source', () => {
    expect(resolveEnvVar('${BAND_CLIENT_ID}', { BAND_CLIENT_ID: 'abc' })).toBe('abc');
  });
});
