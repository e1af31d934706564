export {
  toAuthorizationRequest,
  assertCodeResponseType,
  assertAuthorizationCodeGrant,
  validateAuthorizationRequest,
} from './authorization-request.js';
export { buildAuthorizeUrl, trimTrailingSlash } from './auth-url.js';
export { buildTokenExchangeUrl, exchangeCodeForToken } from './token-exchange.js';
export type { TokenExchangeParams } from './token-exchange.js';
