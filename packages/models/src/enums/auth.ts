/**
 * OAuth 2.0 response types accepted by the authorize endpoint
 */
export const ResponseTypes = {
  CODE: 'code',
} as const;

/**
 * OAuth 2.0 grant types accepted by the token endpoint
 */
export const GrantTypes = {
  AUTHORIZATION_CODE: 'authorization_code',
} as const;

/**
 * Keys under which the flow persists its two secrets in the secret store
 */
export const SecretKeys = {
  AUTHORIZATION_CODE: 'authorization_code',
  ACCESS_TOKEN: 'access_token',
} as const;

export type SecretKey = (typeof SecretKeys)[keyof typeof SecretKeys];

/**
 * Lifecycle of the authorization-code flow.
 *
 * `tokenized` is terminal and is entered directly from `no_token` when the
 * secret store already holds an access token.
 */
export const AuthorizationStates = {
  NO_TOKEN: 'no_token',
  AWAITING_REDIRECT: 'awaiting_redirect',
  CODE_RECEIVED: 'code_received',
  EXCHANGING: 'exchanging',
  TOKENIZED: 'tokenized',
} as const;

export type AuthorizationState =
  (typeof AuthorizationStates)[keyof typeof AuthorizationStates];
