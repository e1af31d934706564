import { vi } from 'vitest';
import { MemorySecretStore, type HttpResponse, type IHttpTransport } from '@bandkit/core';
import { BandApi } from '../api/band-api.js';
import { Band } from '../resources/band.js';

export const NAMESPACE = 'OPENBAND_TEST';
export const API_BASE = 'https://openapi.band.us';

export const rawAuthor = (userKey = 'U1', role = 'member') => ({
  name: 'Kim',
  description: 'hiker',
  role,
  profile_image_url: 'https://example.com/kim.png',
  user_key: userKey,
});

export const rawPost = (postKey = 'P1', authorKey = 'U1') => ({
  post_key: postKey,
  band_key: 'B1',
  content: 'Trail report',
  author: rawAuthor(authorKey),
  created_at: 1500000000000,
  comment_count: 1,
  emotion_count: 3,
  photos: [],
  latest_comments: [],
});

export function jsonResponse(status: number, body: unknown): HttpResponse {
  return {
    status,
    headers: { 'content-type': 'application/json;charset=UTF-8' },
    body: JSON.stringify(body),
  };
}

export function envelope(resultData: unknown, resultCode = 1): HttpResponse {
  return jsonResponse(200, { result_code: resultCode, result_data: resultData });
}

export type Routes = Record<string, HttpResponse>;

/**
 * Transport fake answering by URL path; unknown paths get a 404 error body
 */
export function createRoutedTransport(routes: Routes = {}) {
  const answer = async (url: string): Promise<HttpResponse> =>
    routes[new URL(url).pathname] ??
    jsonResponse(404, { result_code: 404, result_data: { message: 'Not Found' } });

  return {
    routes,
    get: vi.fn<IHttpTransport['get']>((url) => answer(url)),
    post: vi.fn<IHttpTransport['post']>((url) => answer(url)),
  };
}

export async function createTestApi(routes: Routes = {}) {
  const transport = createRoutedTransport(routes);
  const secretStore = new MemorySecretStore();
  await secretStore.set(NAMESPACE, 'access_token', 'T1');
  const api = new BandApi({
    transport,
    secretStore,
    namespace: NAMESPACE,
    apiBaseUrl: API_BASE,
    locale: 'ko_KR',
  });
  const band = Band.fromRaw({ band_key: 'B1', name: 'Hikers', member_count: 12 }, api);
  return { transport, secretStore, api, band };
}
