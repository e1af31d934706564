import { describe, it, expect, vi } from 'vitest';
import { MemorySecretStore } from '@bandkit/core';
import { AuthorizationErrorCode, type IBrowserLauncher } from '@bandkit/auth';
import type { BandClientConfig } from '@bandkit/models';
import { BandClient } from '../band-client.js';
import { Band } from '../resources/index.js';
import { API_BASE, NAMESPACE, createRoutedTransport, envelope, type Routes } from './test-utils.js';

const config: BandClientConfig = {
  clientId: 'abc',
  clientSecret: 'test-secret',
  redirectUri: 'http://localhost:8000',
  responseType: 'code',
  grantType: 'authorization_code',
  authBaseUrl: 'https://auth.band.us',
  apiBaseUrl: API_BASE,
  namespace: NAMESPACE,
  locale: 'ko_KR',
  openBrowser: false,
};

async function createClient(routes: Routes = {}, token: string | null = 'T1') {
  const transport = createRoutedTransport(routes);
  const secretStore = new MemorySecretStore();
  if (token) {
    await secretStore.set(NAMESPACE, 'access_token', token);
  }
  const browser = { open: vi.fn<IBrowserLauncher['open']>() };
  const createListener = vi.fn();
  const client = BandClient.create(config, { transport, secretStore, browser, createListener });
  return { client, transport, browser, createListener };
}

describe('BandClient', () => {
  it('fetches the global profile', async () => {
    const { client, transport } = await createClient({
      '/v2/profile': envelope({
        user_key: 'U1',
        name: 'Kim',
        profile_image_url: 'https://example.com/kim.png',
        is_app_member: true,
        message_allowed: true,
      }),
    });

    const profile = await client.getProfile();

    expect(profile.userKey).toBe('U1');
    expect(profile.isAppMember).toBe(true);
    expect(transport.get).toHaveBeenCalledWith(`${API_BASE}/v2/profile`, {
      access_token: 'T1',
      band_key: undefined,
    });
  });

  it('scopes the profile to a band', async () => {
    const { client, transport } = await createClient({
      '/v2/profile': envelope({ user_key: 'U1', name: 'Kim', member_joined_at: 1500000000000 }),
    });

    const profile = await client.getProfile('B1');

    expect(profile.memberJoinedAt).toEqual(new Date(1500000000000));
    expect(transport.get).toHaveBeenCalledWith(`${API_BASE}/v2/profile`, {
      access_token: 'T1',
      band_key: 'B1',
    });
  });

  it('lists bands', async () => {
    const { client } = await createClient({
      '/v2.1/bands': envelope({
        bands: [
          { band_key: 'B1', name: 'Hikers', cover: 'https://example.com/c.jpg', member_count: 12 },
          { band_key: 'B2', name: 'Climbers', cover: null, member_count: 3 },
        ],
      }),
    });

    const bands = await client.getBands();

    expect(bands).toHaveLength(2);
    expect(bands[0]).toBeInstanceOf(Band);
    expect(bands.map((band) => band.name)).toEqual(['Hikers', 'Climbers']);
    expect(bands[1]?.cover).toBeUndefined();
  });

  it('refuses to call the API without a cached token', async () => {
    const { client, transport } = await createClient({}, null);

    await expect(client.getBands()).rejects.toMatchObject({
      code: AuthorizationErrorCode.MISSING_TOKEN,
    });
    expect(transport.get).not.toHaveBeenCalled();
  });

  it('connects without a flow when a token is cached', async () => {
    const transport = createRoutedTransport();
    const secretStore = new MemorySecretStore();
    await secretStore.set(NAMESPACE, 'access_token', 'T1');
    const browser = { open: vi.fn<IBrowserLauncher['open']>() };

    const client = await BandClient.connect(config, { transport, secretStore, browser });

    expect(client.coordinator.state).toBe('tokenized');
    expect(browser.open).not.toHaveBeenCalled();
    expect(transport.get).not.toHaveBeenCalled();
  });
});
