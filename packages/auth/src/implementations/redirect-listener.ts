import { createServer, type Server } from 'http';
import type { AddressInfo } from 'net';
import { Hono } from 'hono';
import { getRequestListener } from '@hono/node-server';
import { logEvent, toError, type ISecretStore } from '@bandkit/core';
import { SecretKeys } from '@bandkit/models';
import { AuthorizationError } from '../errors/authorization-error.js';

export type RedirectResult =
  | { ok: true; code: string }
  | { ok: false; error: AuthorizationError };

export interface RedirectAppOptions {
  secretStore: ISecretStore;
  namespace: string;
  onResult: (result: RedirectResult) => void;
}

/**
 * Hono app answering the authorization redirect.
 *
 * Any request is treated as the redirect: its `code` is stored under
 * `authorization_code` and the answer is always 200 with an empty body,
 * whatever the outcome reported through `onResult`.
 */
export function createRedirectApp(options: RedirectAppOptions): Hono {
  const app = new Hono();

  app.all('*', async (c) => {
    const result = await captureCode(c.req.query(), options);
    options.onResult(result);
    c.header('Connection', 'close');
    return c.body(null, 200);
  });

  return app;
}

async function captureCode(
  query: Record<string, string>,
  { secretStore, namespace }: RedirectAppOptions,
): Promise<RedirectResult> {
  const code = query.code;
  if (!code) {
    const error = query.error;
    return {
      ok: false,
      error: error
        ? AuthorizationError.accessDenied(error, query.error_description)
        : AuthorizationError.missingCode(),
    };
  }

  try {
    await secretStore.set(namespace, SecretKeys.AUTHORIZATION_CODE, code);
    return { ok: true, code };
  } catch (error) {
    return { ok: false, error: AuthorizationError.codeNotPersisted(toError(error)) };
  }
}

/**
 * Captures the authorization code from a browser redirect.
 * @public
 */
export interface IRedirectListener {
  /** Binds the socket; resolves with the bound port */
  start(): Promise<number>;
  /** Resolves with the code of the one accepted request */
  waitForCode(): Promise<string>;
  close(): Promise<void>;
}

export interface OneShotRedirectListenerOptions {
  redirectUri: string;
  secretStore: ISecretStore;
  namespace: string;
  /** Unset waits indefinitely */
  timeoutMs?: number;
  /** Overrides the port of `redirectUri`; 0 picks an ephemeral one */
  port?: number;
}

/**
 * HTTP listener that accepts exactly one request on the host and port of the
 * redirect URI, then stops listening.
 *
 * @example
 * ```typescript
 * const listener = new OneShotRedirectListener({ redirectUri, secretStore, namespace });
 * await listener.start();
 * void browser.open(authorizeUrl);
 * const code = await listener.waitForCode();
 * ```
 * @public
 */
export class OneShotRedirectListener implements IRedirectListener {
  private server?: Server;
  private closing?: Promise<void>;
  private timer?: NodeJS.Timeout;
  private result?: RedirectResult;
  private responseSent = false;
  private finishing = false;
  private released = false;
  private readonly waiters: Array<(result: RedirectResult) => void> = [];

  public constructor(private readonly options: OneShotRedirectListenerOptions) {}

  public start(): Promise<number> {
    if (this.server || this.result) {
      return Promise.reject(
        AuthorizationError.listenerFailed(new Error('listener can only be started once')),
      );
    }

    const { hostname, port } = this.bindAddress();
    const app = createRedirectApp({
      secretStore: this.options.secretStore,
      namespace: this.options.namespace,
      onResult: (result) => {
        this.settle(result);
        if (this.responseSent) {
          this.finish();
        }
      },
    });
    const handleRequest = getRequestListener(app.fetch);
    const server = createServer((req, res) => {
      // The sockets are dropped only once the redirect has been answered
      res.once('close', () => {
        this.responseSent = true;
        if (this.result) {
          this.finish();
        }
      });
      void handleRequest(req, res);
    });
    this.server = server;

    return new Promise<number>((resolve, reject) => {
      const onListenError = (error: Error) => {
        this.server = undefined;
        logEvent('error', 'auth:redirect_listener_failed', { hostname, port });
        reject(AuthorizationError.listenerFailed(error));
      };
      server.once('error', onListenError);

      server.listen(port, hostname, () => {
        server.off('error', onListenError);
        server.on('error', (error: Error) => {
          logEvent('error', 'auth:redirect_listener_failed', { hostname, port });
          this.settle({ ok: false, error: AuthorizationError.listenerFailed(error) });
          this.finish();
        });

        const boundPort = this.boundPort(server, port);
        logEvent('debug', 'auth:redirect_listener_started', { hostname, port: boundPort });
        this.armTimeout();
        resolve(boundPort);
      });
    });
  }

  public waitForCode(): Promise<string> {
    return new Promise<RedirectResult>((resolve) => {
      if (this.released && this.result) {
        resolve(this.result);
      } else {
        this.waiters.push(resolve);
      }
    }).then((result) => {
      if (!result.ok) {
        throw result.error;
      }
      return result.code;
    });
  }

  /**
   * Stops listening and drops every open socket, including connections a
   * browser opened ahead of time without sending a request.
   */
  public close(): Promise<void> {
    clearTimeout(this.timer);
    this.timer = undefined;

    const server = this.server;
    if (!server) {
      return this.closing ?? Promise.resolve();
    }
    this.server = undefined;

    this.closing = new Promise<void>((resolve, reject) => {
      server.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        logEvent('debug', 'auth:redirect_listener_closed');
        resolve();
      });
      server.closeAllConnections();
    });
    return this.closing;
  }

  // Only the first outcome counts
  private settle(result: RedirectResult): void {
    if (this.result) {
      return;
    }
    this.result = result;
    logEvent('info', 'auth:redirect_received', { ok: result.ok });
  }

  // Waiters are released once the socket is closed
  private finish(): void {
    const result = this.result;
    if (this.finishing || !result) {
      return;
    }
    this.finishing = true;

    this.close().then(
      () => this.release(result),
      (error: unknown) => {
        logEvent('warn', 'auth:redirect_listener_close_failed', {
          error: toError(error).message,
        });
        this.release(result);
      },
    );
  }

  private release(result: RedirectResult): void {
    this.released = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter(result);
    }
  }

  private armTimeout(): void {
    const { timeoutMs } = this.options;
    if (timeoutMs === undefined) {
      return;
    }
    this.timer = setTimeout(() => {
      this.settle({ ok: false, error: AuthorizationError.redirectTimeout(timeoutMs) });
      this.finish();
    }, timeoutMs);
  }

  private bindAddress(): { hostname: string; port: number } {
    const url = new URL(this.options.redirectUri);
    const defaultPort = url.protocol === 'https:' ? 443 : 80;
    return {
      // URL keeps IPv6 literals bracketed
      hostname: url.hostname.replace(/^\[(.*)\]$/, '$1'),
      port: this.options.port ?? (url.port ? Number(url.port) : defaultPort),
    };
  }

  private boundPort(server: Server, requested: number): number {
    const address: AddressInfo | string | null = server.address();
    return address !== null && typeof address === 'object' ? address.port : requested;
  }
}
