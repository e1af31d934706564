import { vi } from 'vitest';
import type { HttpResponse, IHttpTransport } from '@bandkit/core';
import type { BandClientConfig } from '@bandkit/models';

export function createTestConfig(overrides: Partial<BandClientConfig> = {}): BandClientConfig {
  return {
    clientId: 'abc',
    clientSecret: 'test-secret',
    redirectUri: 'http://localhost:8000',
    responseType: 'code',
    grantType: 'authorization_code',
    authBaseUrl: 'https://auth.band.us',
    apiBaseUrl: 'https://openapi.band.us',
    namespace: 'OPENBAND_TEST',
    locale: 'ko_KR',
    openBrowser: false,
    ...overrides,
  };
}

export function createMockTransport() {
  return {
    get: vi.fn<IHttpTransport['get']>(),
    post: vi.fn<IHttpTransport['post']>(),
  };
}

export function jsonResponse(status: number, body: unknown): HttpResponse {
  return {
    status,
    headers: { 'content-type': 'application/json; charset=utf-8' },
    body: JSON.stringify(body),
  };
}
