import {
  logError,
  logEvent,
  RequestUtils,
  type IHttpTransport,
  type ISecretStore,
} from '@bandkit/core';
import {
  AuthorizationStates,
  SecretKeys,
  type AuthorizationRequest,
  type AuthorizationState,
  type BandClientConfig,
} from '@bandkit/models';
import { buildAuthorizeUrl } from '../utils/auth-url.js';
import {
  toAuthorizationRequest,
  validateAuthorizationRequest,
} from '../utils/authorization-request.js';
import { exchangeCodeForToken } from '../utils/token-exchange.js';
import {
  ManualBrowserLauncher,
  SystemBrowserLauncher,
  type IBrowserLauncher,
} from './browser-launcher.js';
import {
  OneShotRedirectListener,
  type IRedirectListener,
  type OneShotRedirectListenerOptions,
} from './redirect-listener.js';

export interface AuthorizationCoordinatorDeps {
  transport: IHttpTransport;
  secretStore: ISecretStore;
  /** Defaults to the system browser, or to printing the URL when `openBrowser` is false */
  browser?: IBrowserLauncher;
  createListener?: (options: OneShotRedirectListenerOptions) => IRedirectListener;
}

/**
 * Drives the OAuth2 authorization-code grant and caches the resulting token.
 *
 * A token already in the secret store is returned as is; otherwise the flow
 * binds the redirect listener, opens the authorize URL, waits for the one
 * redirect, exchanges its code and stores the token. There are no retries:
 * any failure returns the coordinator to `no_token` and the next call starts
 * over.
 *
 * @example
 * ```typescript
 * const coordinator = new AuthorizationCoordinator(config, {
 *   transport: new FetchHttpTransport(),
 *   secretStore: new KeychainSecretStore(),
 * });
 * const accessToken = await coordinator.ensureAccessToken();
 * ```
 * @public
 */
export class AuthorizationCoordinator {
  private currentState: AuthorizationState = AuthorizationStates.NO_TOKEN;
  private inflight?: Promise<string>;
  private readonly request: AuthorizationRequest;
  private readonly browser: IBrowserLauncher;
  private readonly createListener: (
    options: OneShotRedirectListenerOptions,
  ) => IRedirectListener;

  public constructor(
    private readonly config: BandClientConfig,
    private readonly deps: AuthorizationCoordinatorDeps,
  ) {
    this.request = toAuthorizationRequest(config);
    this.browser =
      deps.browser ??
      (config.openBrowser ? new SystemBrowserLauncher() : new ManualBrowserLauncher());
    this.createListener =
      deps.createListener ?? ((options) => new OneShotRedirectListener(options));
  }

  public get state(): AuthorizationState {
    return this.currentState;
  }

  /**
   * @returns The cached access token, or a freshly exchanged one
   * @throws {ConfigurationError} When the response or grant type is wrong; raised before any side effect
   * @throws {AuthorizationError} When the redirect or the token exchange fails
   */
  public async ensureAccessToken(): Promise<string> {
    const cached = await this.deps.secretStore.get(
      this.config.namespace,
      SecretKeys.ACCESS_TOKEN,
    );
    if (cached) {
      this.currentState = AuthorizationStates.TOKENIZED;
      return cached;
    }

    // Concurrent callers share one flow and one listener
    if (!this.inflight) {
      this.inflight = this.authorize().finally(() => {
        this.inflight = undefined;
      });
    }
    return this.inflight;
  }

  /**
   * Drops the cached token so the next `ensureAccessToken()` runs the flow.
   */
  public async clearCachedToken(): Promise<void> {
    await this.deps.secretStore.delete(this.config.namespace, SecretKeys.ACCESS_TOKEN);
    this.currentState = AuthorizationStates.NO_TOKEN;
    logEvent('info', 'auth:token_cleared', { namespace: this.config.namespace });
  }

  private async authorize(): Promise<string> {
    const requestId = RequestUtils.generateRequestId('auth');
    validateAuthorizationRequest(this.request);

    try {
      return await this.runFlow(requestId);
    } catch (error) {
      this.transition(AuthorizationStates.NO_TOKEN, requestId);
      logError('auth:flow_failed', error, { requestId });
      throw error;
    }
  }

  private async runFlow(requestId: string): Promise<string> {
    const { config, deps } = this;
    const authorizeUrl = buildAuthorizeUrl(config.authBaseUrl, this.request);

    const listener = this.createListener({
      redirectUri: config.redirectUri,
      secretStore: deps.secretStore,
      namespace: config.namespace,
      timeoutMs: config.redirectTimeoutMs,
    });

    let code: string;
    try {
      await listener.start();
      this.transition(AuthorizationStates.AWAITING_REDIRECT, requestId);
      this.launchBrowser(authorizeUrl, requestId);
      code = await listener.waitForCode();
    } finally {
      await listener.close();
    }
    this.transition(AuthorizationStates.CODE_RECEIVED, requestId);

    this.transition(AuthorizationStates.EXCHANGING, requestId);
    const accessToken = await exchangeCodeForToken({
      transport: deps.transport,
      authBaseUrl: config.authBaseUrl,
      request: this.request,
      code,
    });
    await deps.secretStore.set(config.namespace, SecretKeys.ACCESS_TOKEN, accessToken);

    this.transition(AuthorizationStates.TOKENIZED, requestId);
    return accessToken;
  }

  // Fire-and-forget: the listener is the only thing awaited
  private launchBrowser(url: string, requestId: string): void {
    void this.browser
      .open(url)
      .catch((error: unknown) => {
        logError('auth:browser_open_failed', error, { requestId });
        return new ManualBrowserLauncher().open(url);
      })
      .catch((error: unknown) => {
        logError('auth:authorize_url_unreported', error, { requestId });
      });
  }

  private transition(next: AuthorizationState, requestId: string): void {
    logEvent('debug', 'auth:state_changed', {
      requestId,
      from: this.currentState,
      to: next,
    });
    this.currentState = next;
  }
}
