/**
 * Normalized client configuration.
 *
 * Produced by `BandClientConfigSchema` in `@bandkit/schemas`; every defaulted
 * field is present after parsing.
 */
export interface BandClientConfig {
  clientId: string;
  clientSecret: string;
  /** Where the authorize endpoint sends the browser back; the listener binds to its host/port */
  redirectUri: string;
  /** Must be `code` for an authorize URL to be built */
  responseType: string;
  /** Must be `authorization_code` for a token exchange to be built */
  grantType: string;
  authBaseUrl: string;
  apiBaseUrl: string;
  /** Application namestring the secrets are stored under */
  namespace: string;
  /** Sent as `locale` on post listings */
  locale: string;
  /** Bounds the redirect wait; unset waits indefinitely */
  redirectTimeoutMs?: number;
  /** When false the authorize URL is only logged */
  openBrowser: boolean;
}
