/**
 * Parameters of the authorization-code grant.
 *
 * Field names follow the wire format of the authorize and token endpoints.
 */
export interface AuthorizationRequest {
  client_id: string;
  client_secret: string;
  redirect_uri: string;
  /** Must equal 'code' before an authorize URL can be built */
  response_type: string;
  /** Must equal 'authorization_code' before a token exchange can be built */
  grant_type: string;
}
