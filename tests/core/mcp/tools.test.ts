/**
 * MCP Tools Probe Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { listMcpTools } from '../../../src/core/mcp/tools.js';
import { OAuthClientError } from '../../../src/core/utils/errors.js';
import { createFakeFetch, hangingFetch } from '../../helpers/fake-fetch.js';
import { RESOURCE_METADATA_URL, TEST_ACCESS_TOKEN, createMcpHandler } from '../../helpers/mcp-server.js';

const SERVER_URL = 'http://localhost:8000/mcp';

describe('listMcpTools', () => {
  it('should list tools with a valid token', async () => {
    const { fetch } = createFakeFetch({ [SERVER_URL]: createMcpHandler() });

    const result = await listMcpTools(SERVER_URL, { accessToken: TEST_ACCESS_TOKEN, fetch });

    expect(result).toEqual({
      status: 'ok',
      tools: [
        { name: 'list_books', description: 'List the books in your collection' },
        { name: 'add_review', description: undefined },
      ],
    });
  });

  it('should send the bearer token', async () => {
    const { fetch, requests } = createFakeFetch({ [SERVER_URL]: createMcpHandler() });

    await listMcpTools(SERVER_URL, { accessToken: TEST_ACCESS_TOKEN, fetch });

    const posts = requests.filter((r) => r.method === 'POST');
    expect(posts.length).toBeGreaterThan(0);
    for (const post of posts) {
      expect(post.headers.get('Authorization')).toBe(`Bearer ${TEST_ACCESS_TOKEN}`);
    }
  });

  it('should return the challenge of a refused request', async () => {
    const { fetch } = createFakeFetch({ [SERVER_URL]: createMcpHandler() });

    const result = await listMcpTools(SERVER_URL, { fetch });

    expect(result).toEqual({
      status: 'unauthorized',
      challenge: { status: 401, wwwAuthenticate: `Bearer resource_metadata="${RESOURCE_METADATA_URL}"` },
    });
  });

  it('should treat a rejected token like a missing one', async () => {
    const { fetch } = createFakeFetch({ [SERVER_URL]: createMcpHandler() });

    const result = await listMcpTools(SERVER_URL, { accessToken: 'test-expired-token', fetch });

    expect(result.status).toBe('unauthorized');
  });

  it('should wrap other failures', async () => {
    const fetch = vi.fn(async () => {
      throw new TypeError('fetch failed');
    });

    const error = await listMcpTools(SERVER_URL, { fetch }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(OAuthClientError);
    expect(error instanceof Error ? error.message : '').toMatch(/^Unable to list tools from http:\/\/localhost:8000\/mcp: /);
  });

  it('should give up on a server that never answers', async () => {
    await expect(listMcpTools(SERVER_URL, { fetch: hangingFetch, timeoutMs: 20 })).rejects.toMatchObject({
      name: 'OAuthClientError',
      message: `Unable to list tools from ${SERVER_URL}: MCP request to ${SERVER_URL} timed out after 20ms`,
    });
  });
});
