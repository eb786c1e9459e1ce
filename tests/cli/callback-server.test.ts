/**
 * Callback Server Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { createCallbackApp, escapeHtml, pageTemplate } from '../../src/cli/callback-server.js';
import type { CallbackResult } from '../../src/core/session.js';
import { FlowError } from '../../src/core/utils/errors.js';

const RESULT: CallbackResult = {
  flow: 'app_authorize',
  tokens: { access_token: 'tok_1' },
  credentials: { clientId: 'abc123', accessToken: 'tok_1' },
};

describe('escapeHtml', () => {
  it('should escape markup characters', () => {
    expect(escapeHtml(`<script>alert("x") & 'y'</script>`)).toBe(
      '&lt;script&gt;alert(&quot;x&quot;) &amp; &#039;y&#039;&lt;/script&gt;'
    );
  });
});

describe('pageTemplate', () => {
  it('should escape every dynamic value', () => {
    const html = pageTemplate({
      title: '<t>',
      heading: '<h>',
      message: '<img src=x onerror=alert(1)>',
      isSuccess: false,
    });

    expect(html).toContain('<title>&lt;t&gt; - MyBooks MCP</title>');
    expect(html).toContain('<h1>&lt;h&gt;</h1>');
    expect(html).toContain('<p>&lt;img src=x onerror=alert(1)&gt;</p>');
  });
});

describe('createCallbackApp', () => {
  it('should pass the query to the handler and show success', async () => {
    const handler = vi.fn(async () => RESULT);
    const { app, next } = createCallbackApp('/callback', handler);

    const response = await app.request('/callback?code=xyz&state=test-state');

    expect(response.status).toBe(200);
    expect(await response.text()).toContain('MyBooks MCP is authorized to access your account.');
    expect(handler).toHaveBeenCalledWith({
      code: 'xyz',
      state: 'test-state',
      error: undefined,
      errorDescription: undefined,
    });
    await expect(next(1000)).resolves.toBe(RESULT);
  });

  it('should pass authorization errors through', async () => {
    const handler = vi.fn(async () => RESULT);
    const { app } = createCallbackApp('/callback', handler);

    await app.request('/callback?error=access_denied&error_description=Nope&state=test-state');

    expect(handler).toHaveBeenCalledWith({
      code: undefined,
      state: 'test-state',
      error: 'access_denied',
      errorDescription: 'Nope',
    });
  });

  it('should render failures escaped and hand them to the waiter', async () => {
    const failure = new FlowError('state_mismatch', 'State <mismatch> detected');
    const { app, next } = createCallbackApp('/callback', async () => {
      throw failure;
    });

    const waiting = next(1000);
    const response = await app.request('/callback?code=xyz&state=forged');

    expect(response.status).toBe(400);
    expect(await response.text()).toContain('<p>State &lt;mismatch&gt; detected</p>');
    await expect(waiting).rejects.toBe(failure);
  });

  it('should answer 404 elsewhere', async () => {
    const handler = vi.fn(async () => RESULT);
    const { app } = createCallbackApp('/callback', handler);

    const response = await app.request('/favicon.ico');

    expect(response.status).toBe(404);
    expect(handler).not.toHaveBeenCalled();
  });

  it('should time out when no callback arrives', async () => {
    const { next } = createCallbackApp('/callback', async () => RESULT);

    await expect(next(10)).rejects.toThrow('Timed out after 0 seconds waiting for the browser to return. Please try again.');
  });
});
