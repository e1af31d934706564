import { z } from 'zod';
import {
  logEvent,
  RequestUtils,
  type IHttpTransport,
  type ISecretStore,
  type QueryParams,
} from '@bandkit/core';
import { SecretKeys, type Cursor, type PagedResult } from '@bandkit/models';
import { pagedDataSchema } from '@bandkit/schemas';
import { AuthorizationError, trimTrailingSlash } from '@bandkit/auth';
import { parseResponse } from '../response/parse-response.js';
import { unwrapEnvelope } from '../response/unwrap-envelope.js';
import type { Endpoint } from './endpoints.js';

export interface BandApiOptions {
  transport: IHttpTransport;
  secretStore: ISecretStore;
  namespace: string;
  apiBaseUrl: string;
  locale: string;
}

// Mutations answer with data the client does not read
export const IgnoredDataSchema = z.unknown();

/**
 * Authenticated request layer shared by the resource objects.
 *
 * Every call reads the access token from the secret store, sends it as the
 * `access_token` query parameter, decodes the response and unwraps the
 * envelope. One call, one round trip.
 */
export class BandApi {
  public constructor(private readonly options: BandApiOptions) {}

  public get locale(): string {
    return this.options.locale;
  }

  public get<TSchema extends z.ZodTypeAny>(
    endpoint: Endpoint,
    query: QueryParams,
    schema: TSchema,
  ): Promise<z.output<TSchema>> {
    return this.request('GET', endpoint, query, schema);
  }

  public post<TSchema extends z.ZodTypeAny>(
    endpoint: Endpoint,
    query: QueryParams,
    schema: TSchema,
  ): Promise<z.output<TSchema>> {
    return this.request('POST', endpoint, query, schema);
  }

  /**
   * Fetches one page of a listing. The cursor is merged into the query as
   * is, after the fixed parameters.
   */
  public async listPage<TSchema extends z.ZodTypeAny, TItem>(
    endpoint: Endpoint,
    query: QueryParams,
    cursor: Cursor | undefined,
    itemSchema: TSchema,
    toItem: (raw: z.output<TSchema>) => TItem,
  ): Promise<PagedResult<TItem>> {
    const page = await this.get(endpoint, { ...query, ...cursor }, pagedDataSchema(itemSchema));
    const next = page.paging?.next_params;

    return {
      items: page.items.map(toItem),
      nextCursor: next && Object.keys(next).length > 0 ? next : undefined,
    };
  }

  private async request<TSchema extends z.ZodTypeAny>(
    method: 'GET' | 'POST',
    endpoint: Endpoint,
    query: QueryParams,
    schema: TSchema,
  ): Promise<z.output<TSchema>> {
    const { transport, apiBaseUrl } = this.options;
    const accessToken = await this.accessToken();
    const url = `${trimTrailingSlash(apiBaseUrl)}${endpoint}`;
    const params: QueryParams = { access_token: accessToken, ...query };
    const requestId = RequestUtils.generateRequestId('api');

    logEvent('debug', 'client:request', { requestId, method, endpoint });
    const response =
      method === 'GET' ? await transport.get(url, params) : await transport.post(url, params);
    logEvent('debug', 'client:response', { requestId, status: response.status });

    return unwrapEnvelope(parseResponse(response), schema);
  }

  private async accessToken(): Promise<string> {
    const { secretStore, namespace } = this.options;
    const token = await secretStore.get(namespace, SecretKeys.ACCESS_TOKEN);
    if (!token) {
      throw AuthorizationError.missingToken(namespace);
    }
    return token;
  }
}
