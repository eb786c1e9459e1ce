/**
 * In-memory stores. For tests and single-process hosts only: pending
 * flows do not survive a restart.
 */

import type { FlowName, OAuthFlowState } from '../oauth/types.js';
import { applyCredentialUpdate } from './credentials.js';
import type { AppAuthState, CredentialStore, CredentialUpdate, FlowStore } from './types.js';

export class MemoryFlowStore implements FlowStore {
  private readonly flows = new Map<FlowName, OAuthFlowState>();

  async save(name: FlowName, flow: OAuthFlowState): Promise<void> {
    this.flows.set(name, { ...flow });
  }

  async load(name: FlowName): Promise<OAuthFlowState | undefined> {
    const flow = this.flows.get(name);
    return flow ? { ...flow } : undefined;
  }

  async clear(name: FlowName): Promise<void> {
    this.flows.delete(name);
  }
}

export class MemoryCredentialStore implements CredentialStore {
  private state: AppAuthState;

  constructor(initial: AppAuthState = {}) {
    this.state = structuredClone(initial);
  }

  async load(): Promise<AppAuthState> {
    return structuredClone(this.state);
  }

  async update(update: CredentialUpdate): Promise<AppAuthState> {
    this.state = applyCredentialUpdate(this.state, update);
    return structuredClone(this.state);
  }

  async clear(): Promise<void> {
    this.state = {};
  }
}
