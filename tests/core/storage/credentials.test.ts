/**
 * Credential Helper Tests
 */

import { describe, it, expect } from 'vitest';
import { applyCredentialUpdate, isAuthorized, isRegistered } from '../../../src/core/storage/credentials.js';
import { MemoryCredentialStore } from '../../../src/core/storage/memory.js';

const NOW = new Date('2026-01-02T03:04:05.000Z');

describe('applyCredentialUpdate', () => {
  it('should keep fields the update leaves out or sets to undefined', () => {
    const next = applyCredentialUpdate(
      { clientId: 'abc123', accessToken: 'tok_1', refreshToken: 'ref_1' },
      { accessToken: 'tok_2', refreshToken: undefined },
      NOW
    );

    expect(next).toEqual({
      clientId: 'abc123',
      accessToken: 'tok_2',
      refreshToken: 'ref_1',
      updatedAt: '2026-01-02T03:04:05.000Z',
    });
  });

  it('should remove fields set to null', () => {
    const next = applyCredentialUpdate({ clientId: 'abc123', accessToken: 'tok_1' }, { accessToken: null }, NOW);

    expect(next).toEqual({ clientId: 'abc123', updatedAt: '2026-01-02T03:04:05.000Z' });
  });

  it('should not modify the current state', () => {
    const current = { clientId: 'abc123' };
    applyCredentialUpdate(current, { clientId: 'def456' }, NOW);

    expect(current).toEqual({ clientId: 'abc123' });
  });
});

describe('derived flags', () => {
  it('should derive registration and authorization', () => {
    expect(isRegistered({})).toBe(false);
    expect(isRegistered({ clientId: 'abc123' })).toBe(true);
    expect(isAuthorized({ clientId: 'abc123' })).toBe(false);
    expect(isAuthorized({ accessToken: 'tok_1' })).toBe(true);
  });
});

describe('MemoryCredentialStore', () => {
  it('should apply partial updates', async () => {
    const store = new MemoryCredentialStore({ clientId: 'abc123' });

    await store.update({ accessToken: 'tok_1' });
    const state = await store.load();

    expect(state.clientId).toBe('abc123');
    expect(state.accessToken).toBe('tok_1');
    expect(state.updatedAt).toBeDefined();
  });

  it('should hand out copies', async () => {
    const store = new MemoryCredentialStore({ clientRedirectUris: ['http://127.0.0.1:8765/callback'] });

    const state = await store.load();
    state.clientRedirectUris?.push('http://127.0.0.1:9999/callback');

    expect((await store.load()).clientRedirectUris).toEqual(['http://127.0.0.1:8765/callback']);
  });

  it('should clear everything', async () => {
    const store = new MemoryCredentialStore({ clientId: 'abc123', accessToken: 'tok_1' });

    await store.clear();

    expect(await store.load()).toEqual({});
  });
});
