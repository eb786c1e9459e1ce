/**
 * Loopback callback server
 *
 * Receives the browser redirect after authorization, hands the query to
 * the session and answers with a small HTML page. Results are queued so
 * the command waiting for them can pick them up in order.
 */

import type { Server } from 'node:net';
import { Hono } from 'hono';
import { serve, type ServerType } from '@hono/node-server';
import type { CallbackParams, CallbackResult } from '../core/session.js';
import type { FlowName } from '../core/oauth/types.js';
import { OAuthClientError, formatErrorForDisplay } from '../core/utils/errors.js';
import { noopLogger, type Logger } from '../core/utils/logger.js';

export const CALLBACK_TIMEOUT_MS = 5 * 60 * 1000;

export type CallbackHandler = (params: CallbackParams) => Promise<CallbackResult>;

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#039;');
}

export function pageTemplate(options: { title: string; heading: string; message: string; isSuccess: boolean }): string {
  const safeTitle = escapeHtml(options.title);
  const safeHeading = escapeHtml(options.heading);
  const safeMessage = escapeHtml(options.message);
  const accent = options.isSuccess ? '#16a34a' : '#dc2626';

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>${safeTitle} - MyBooks MCP</title>
  <style>
    body {
      font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif;
      display: grid;
      place-items: center;
      min-height: 100vh;
      margin: 0;
      background: #fbfbfa;
    }
    .container {
      max-width: 420px;
      text-align: center;
      background: white;
      padding: 40px;
      border-radius: 12px;
      box-shadow: 0 10px 30px rgba(0,0,0,0.1);
    }
    h1 { color: ${accent}; font-size: 20px; margin-bottom: 8px; }
    p { color: #555; font-size: 15px; }
    .hint { margin-top: 20px; color: #999; font-size: 13px; }
  </style>
</head>
<body>
  <div class="container">
    <h1>${safeHeading}</h1>
    <p>${safeMessage}</p>
    <p class="hint">You can close this window and return to your terminal.</p>
  </div>
</body>
</html>`;
}

const SUCCESS_MESSAGES: Record<FlowName, string> = {
  user_login: 'You are signed in. The terminal will continue with registering the application.',
  app_authorize: 'MyBooks MCP is authorized to access your account.',
};

type Outcome = { ok: true; result: CallbackResult } | { ok: false; error: unknown };

export interface CallbackApp {
  app: Hono;
  /** Next callback outcome; rejects with the callback's error or on timeout */
  next(timeoutMs?: number): Promise<CallbackResult>;
}

export function createCallbackApp(path: string, handler: CallbackHandler, logger: Logger = noopLogger): CallbackApp {
  const app = new Hono();
  const outcomes: Outcome[] = [];
  const waiters: Array<(outcome: Outcome) => void> = [];

  const deliver = (outcome: Outcome) => {
    const waiter = waiters.shift();
    if (waiter) {
      waiter(outcome);
    } else {
      outcomes.push(outcome);
    }
  };

  app.get(path, async (c) => {
    const params: CallbackParams = {
      code: c.req.query('code'),
      state: c.req.query('state'),
      error: c.req.query('error'),
      errorDescription: c.req.query('error_description'),
    };

    try {
      const result = await handler(params);
      deliver({ ok: true, result });
      return c.html(
        pageTemplate({
          title: 'Authorized',
          heading: 'Authorization Complete',
          message: SUCCESS_MESSAGES[result.flow],
          isSuccess: true,
        })
      );
    } catch (error) {
      logger.error('OAuth callback failed', error);
      deliver({ ok: false, error });
      return c.html(
        pageTemplate({
          title: 'Authorization Failed',
          heading: 'Authorization Failed',
          message: formatErrorForDisplay(error),
          isSuccess: false,
        }),
        400
      );
    }
  });

  const next = (timeoutMs: number = CALLBACK_TIMEOUT_MS): Promise<CallbackResult> => {
    const queued = outcomes.shift();
    if (queued) {
      return queued.ok ? Promise.resolve(queued.result) : Promise.reject(queued.error);
    }

    return new Promise<CallbackResult>((resolve, reject) => {
      const waiter = (outcome: Outcome) => {
        clearTimeout(timer);
        if (outcome.ok) {
          resolve(outcome.result);
        } else {
          reject(outcome.error);
        }
      };
      const timer = setTimeout(() => {
        const index = waiters.indexOf(waiter);
        if (index >= 0) waiters.splice(index, 1);
        reject(
          new OAuthClientError(
            `Timed out after ${Math.round(timeoutMs / 1000)} seconds waiting for the browser to return. Please try again.`
          )
        );
      }, timeoutMs);
      waiters.push(waiter);
    });
  };

  return { app, next };
}

/**
 * Serve `app` on the loopback address; resolves once listening.
 */
export function listen(app: Hono, port: number, hostname: string): Promise<ServerType> {
  return new Promise((resolve, reject) => {
    const server = serve({ fetch: app.fetch, port, hostname }, () => {
      socket.off('error', reject);
      resolve(server);
    });
    const socket: Server = server;
    socket.once('error', reject);
  });
}

export function closeServer(server: ServerType): Promise<void> {
  const socket: Server = server;
  return new Promise((resolve, reject) => {
    socket.close((error?: Error) => (error ? reject(error) : resolve()));
  });
}
