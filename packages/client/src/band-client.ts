import {
  FetchHttpTransport,
  KeychainSecretStore,
  logEvent,
} from '@bandkit/core';
import type { BandClientConfig } from '@bandkit/models';
import { BandsDataSchema, RawProfileSchema } from '@bandkit/schemas';
import {
  AuthorizationCoordinator,
  type AuthorizationCoordinatorDeps,
} from '@bandkit/auth';
import { BandApi } from './api/band-api.js';
import { Endpoints } from './api/endpoints.js';
import { Band } from './resources/band.js';
import { Profile } from './resources/profile.js';

/**
 * Collaborators of the client; each defaults to its production implementation
 */
export type BandClientDeps = Partial<AuthorizationCoordinatorDeps>;

/**
 * Entry point of the library.
 *
 * @example
 * ```typescript
 * const client = await BandClient.connect(loadConfigFromEnv());
 * const [band] = await client.getBands();
 * const { items, nextCursor } = await band.posts();
 * ```
 * @public
 */
export class BandClient {
  public constructor(
    private readonly api: BandApi,
    public readonly coordinator: AuthorizationCoordinator,
  ) {}

  /**
   * Wires the client without touching the network or the secret store
   */
  public static create(config: BandClientConfig, deps: BandClientDeps = {}): BandClient {
    const transport = deps.transport ?? new FetchHttpTransport();
    const secretStore = deps.secretStore ?? new KeychainSecretStore();

    const coordinator = new AuthorizationCoordinator(config, {
      transport,
      secretStore,
      browser: deps.browser,
      createListener: deps.createListener,
    });
    const api = new BandApi({
      transport,
      secretStore,
      namespace: config.namespace,
      apiBaseUrl: config.apiBaseUrl,
      locale: config.locale,
    });
    return new BandClient(api, coordinator);
  }

  /**
   * Creates a client and makes sure an access token is available, running
   * the authorization flow when none is cached.
   */
  public static async connect(
    config: BandClientConfig,
    deps: BandClientDeps = {},
  ): Promise<BandClient> {
    const client = BandClient.create(config, deps);
    await client.authorize();
    logEvent('info', 'client:connected', { namespace: config.namespace });
    return client;
  }

  public authorize(): Promise<string> {
    return this.coordinator.ensureAccessToken();
  }

  /**
   * @param bandKey - Scope the profile to one band's membership
   */
  public async getProfile(bandKey?: string): Promise<Profile> {
    const raw = await this.api.get(Endpoints.PROFILE, { band_key: bandKey }, RawProfileSchema);
    return Profile.fromRaw(raw);
  }

  public async getBands(): Promise<Band[]> {
    const data = await this.api.get(Endpoints.BANDS, {}, BandsDataSchema);
    return data.bands.map((raw) => Band.fromRaw(raw, this.api));
  }
}
