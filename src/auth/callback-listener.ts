/**
 * OAuth Callback Listener
 *
 * A temporary local HTTP server that catches the identity provider's
 * browser redirect and hands the authorization code to exactly one waiter.
 *
 * Route: GET <path> (derived from the redirect URI, e.g. /callback)
 * - bad or missing state → 400, ignored (checked first, for errors too)
 * - ?error=...           → 200 failure page, waiter rejected (AUTH_PROVIDER_DENIED)
 * - ?code=...            → 200 confirmation page, code handed off once;
 *                          failure page if the wait already failed
 * - anything else        → 400 "Missing code parameter"
 *
 * Lifetime: scoped to one interactive sign-in. The authentication manager
 * closes it as soon as the wait settles.
 */

import { createServer } from 'node:http';
import type { Server } from 'node:http';
import express from 'express';
import type { Express, Request, Response } from 'express';
import { errorMessage } from '../errors.js';
import { AuthError } from './errors.js';
import { createOneShot } from './one-shot.js';
import type { OneShot } from './one-shot.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ListenerAddress {
  host: string;
  port: number;
  path: string;
}

export interface CallbackListenerOptions extends ListenerAddress {
  /** When set, callbacks must echo this state value */
  expectedState?: string;
  /** Reject the waiter after this many ms; 0 waits forever */
  timeoutMs: number;
}

export interface CallbackListener {
  /** Bound address (port is the real one when 0 was requested) */
  readonly address: ListenerAddress;
  /** Resolves with the first authorization code; may only be called once */
  waitForCode(): Promise<string>;
  /** Stops listening. Safe to call more than once. */
  close(): Promise<void>;
}

// ---------------------------------------------------------------------------
// Pages
// ---------------------------------------------------------------------------

export const SUCCESS_PAGE =
  '<!doctype html><html><head><title>Signed in</title></head>' +
  '<body><h1>Authorization successful!</h1><p>You can close this tab and return to the CLI.</p></body></html>';

export const FAILURE_PAGE =
  '<!doctype html><html><head><title>Sign-in failed</title></head>' +
  '<body><h1>Authorization failed</h1><p>You can close this tab. Details are in the terminal.</p></body></html>';

// ---------------------------------------------------------------------------
// Redirect URI → listener address
// ---------------------------------------------------------------------------

/**
 * Derives the local bind address from the registered redirect URI.
 * "localhost" binds the IPv4 loopback, matching what the provider redirects to.
 */
export function listenerAddressFromRedirectUri(redirectUri: string): ListenerAddress {
  let url: URL;
  try {
    url = new URL(redirectUri);
  } catch {
    throw new AuthError(`Redirect URI "${redirectUri}" is not a valid URL`, 'AUTH_LISTENER_FAILED');
  }

  if (url.protocol !== 'http:') {
    throw new AuthError(
      `Redirect URI "${redirectUri}" must use http:// so the local listener can serve it`,
      'AUTH_LISTENER_FAILED',
    );
  }

  const hostname = url.hostname.replace(/^\[(.*)\]$/, '$1');

  return {
    host: hostname === 'localhost' ? '127.0.0.1' : hostname,
    port: url.port ? Number(url.port) : 80,
    path: url.pathname || '/',
  };
}

// ---------------------------------------------------------------------------
// Express app
// ---------------------------------------------------------------------------

function queryParam(req: Request, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * Create the Express app serving the callback route.
 *
 * Exported as a factory so tests can drive it with supertest without
 * binding the real port.
 */
export function createCallbackApp(
  path: string,
  handoff: OneShot<string>,
  expectedState?: string,
): Express {
  const app = express();
  app.disable('x-powered-by');

  app.get(path, (req: Request, res: Response) => {
    if (expectedState !== undefined && queryParam(req, 'state') !== expectedState) {
      console.warn('[listener] Ignoring callback with mismatched state');
      res.status(400).type('text/plain').send('State mismatch. Restart sign-in from the CLI.');
      return;
    }

    const error = queryParam(req, 'error');
    if (error) {
      const description = queryParam(req, 'error_description') ?? 'no description';
      console.warn('[listener] Identity provider returned an error', { error });
      res.status(200).type('html').send(FAILURE_PAGE);
      handoff.reject(new AuthError(`Authorization failed: ${error}: ${description}`, 'AUTH_PROVIDER_DENIED'));
      return;
    }

    const code = queryParam(req, 'code');
    if (!code) {
      res.status(400).type('text/plain').send('Missing code parameter');
      return;
    }

    if (handoff.resolve(code)) {
      console.log('[listener] Authorization code received');
    }
    res.status(200).type('html').send(handoff.rejected ? FAILURE_PAGE : SUCCESS_PAGE);
  });

  return app;
}

// ---------------------------------------------------------------------------
// Listener lifecycle
// ---------------------------------------------------------------------------

/** Formats a wait for messages: "250ms" below one second, whole seconds above */
export function formatWait(ms: number): string {
  return ms < 1000 ? `${ms}ms` : `${Math.ceil(ms / 1000)}s`;
}

/**
 * Routes server errors raised after binding (e.g. EMFILE on accept) to the
 * waiter instead of leaving them unhandled.
 */
export function forwardServerErrors(server: Server, handoff: OneShot<string>): void {
  server.on('error', (err: Error) => {
    console.warn('[listener] Callback listener error', { error: err.message });
    handoff.reject(
      new AuthError(`Callback listener failed: ${err.message}`, 'AUTH_LISTENER_FAILED', { cause: err }),
    );
  });
}

function bind(server: Server, port: number, host: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (err: Error) => reject(err);
    server.once('error', onError);
    server.listen(port, host, () => {
      server.off('error', onError);
      resolve();
    });
  });
}

/**
 * Binds the callback listener and returns once it accepts connections.
 *
 * @throws AuthError (AUTH_LISTENER_FAILED) if the port cannot be bound
 */
export async function startCallbackListener(options: CallbackListenerOptions): Promise<CallbackListener> {
  const handoff = createOneShot<string>();
  const app = createCallbackApp(options.path, handoff, options.expectedState);
  const server = createServer(app);

  try {
    await bind(server, options.port, options.host);
  } catch (err) {
    throw new AuthError(
      `Could not start callback listener on ${options.host}:${options.port}: ${errorMessage(err)}`,
      'AUTH_LISTENER_FAILED',
      { cause: err },
    );
  }
  forwardServerErrors(server, handoff);

  const bound = server.address();
  const address: ListenerAddress = {
    host: options.host,
    port: bound !== null && typeof bound === 'object' ? bound.port : options.port,
    path: options.path,
  };
  console.log('[listener] Waiting for authorization redirect', { host: address.host, port: address.port, path: address.path });

  let waiting = false;
  let closed = false;
  let timer: NodeJS.Timeout | undefined;

  function clearTimer(): void {
    if (timer !== undefined) {
      clearTimeout(timer);
      timer = undefined;
    }
  }

  return {
    address,

    waitForCode(): Promise<string> {
      if (waiting) {
        return Promise.reject(new AuthError('Callback listener already has a waiter', 'AUTH_LISTENER_BUSY'));
      }
      waiting = true;

      if (options.timeoutMs > 0 && !handoff.settled) {
        timer = setTimeout(() => {
          handoff.reject(
            new AuthError(
              `Failed to receive auth code: code not received within ${formatWait(options.timeoutMs)}`,
              'AUTH_CODE_NOT_RECEIVED',
            ),
          );
        }, options.timeoutMs);
      }

      return handoff.promise.finally(clearTimer);
    },

    async close(): Promise<void> {
      if (closed) return;
      closed = true;
      clearTimer();
      handoff.reject(new AuthError('Failed to receive auth code: listener closed', 'AUTH_CODE_NOT_RECEIVED'));

      await new Promise<void>((resolve) => {
        server.close(() => resolve());
        server.closeIdleConnections();
      });
    },
  };
}
