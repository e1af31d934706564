/**
 * Value types accepted as query parameters; everything is sent as its string form
 */
export type QueryValue = string | number | boolean;

/**
 * Query parameters of a request. `undefined` entries are skipped.
 */
export type QueryParams = Readonly<Record<string, QueryValue | undefined>>;

export interface BasicAuthCredentials {
  username: string;
  password: string;
}

/**
 * Transport-level view of a response: nothing is decoded here.
 *
 * FetchHttpTransport lower-cases header names; other transports may keep
 * their original casing.
 */
export interface HttpResponse {
  status: number;
  headers: Readonly<Record<string, string>>;
  body: string;
}

/**
 * HTTP collaborator used by the authorization flow and the resource client.
 *
 * The upstream API takes every parameter in the query string, so there is no
 * request body.
 */
export interface IHttpTransport {
  get(url: string, query?: QueryParams, basicAuth?: BasicAuthCredentials): Promise<HttpResponse>;
  post(url: string, query?: QueryParams): Promise<HttpResponse>;
}
