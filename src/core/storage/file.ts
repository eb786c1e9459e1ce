/**
 * File stores
 *
 * One directory per session under the data dir:
 *   <baseDir>/<session>/credentials.json
 *   <baseDir>/<session>/flow-<name>.json
 * Directories are created 0700 and files written 0600.
 */

import { promises as fs } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { flowStateSchema } from '../oauth/schemas.js';
import type { FlowName, OAuthFlowState } from '../oauth/types.js';
import { noopLogger, type Logger } from '../utils/logger.js';
import { appAuthStateSchema, applyCredentialUpdate } from './credentials.js';
import type { AppAuthState, CredentialStore, CredentialUpdate, FlowStore } from './types.js';

export const DEFAULT_DATA_DIR = join(homedir(), '.mybooks-mcp');

const CREDENTIALS_FILE = 'credentials.json';
const DIR_MODE = 0o700;
const FILE_MODE = 0o600;

/**
 * Session keys become directory names; anything outside `[A-Za-z0-9._-]`
 * is replaced.
 */
export function sessionDirectory(baseDir: string, sessionKey: string): string {
  const safe = sessionKey.trim().replace(/[^A-Za-z0-9._-]/g, '_').replace(/^\.+/, '_');
  return join(baseDir, safe || 'default');
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function writeSecureFile(dir: string, path: string, data: unknown): Promise<void> {
  await fs.mkdir(dir, { recursive: true, mode: DIR_MODE });
  await fs.writeFile(path, JSON.stringify(data, null, 2), { encoding: 'utf-8', mode: FILE_MODE });
  // mode on writeFile only applies when the file is created
  await fs.chmod(path, FILE_MODE);
}

async function readJson(path: string): Promise<{ found: false } | { found: true; value: unknown; error?: string }> {
  let content: string;
  try {
    content = await fs.readFile(path, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) return { found: false };
    throw error;
  }
  try {
    const value: unknown = JSON.parse(content);
    return { found: true, value };
  } catch (error) {
    return { found: true, value: undefined, error: error instanceof Error ? error.message : String(error) };
  }
}

async function removeFile(path: string): Promise<void> {
  try {
    await fs.unlink(path);
  } catch (error) {
    if (!isNotFound(error)) throw error;
  }
}

export class FileFlowStore implements FlowStore {
  constructor(
    private readonly dir: string,
    private readonly logger: Logger = noopLogger
  ) {}

  private pathFor(name: FlowName): string {
    return join(this.dir, `flow-${name}.json`);
  }

  async save(name: FlowName, flow: OAuthFlowState): Promise<void> {
    await writeSecureFile(this.dir, this.pathFor(name), flow);
  }

  /**
   * A file that is not valid JSON, or not a flow state, is deleted and
   * reported as absent.
   */
  async load(name: FlowName): Promise<OAuthFlowState | undefined> {
    const path = this.pathFor(name);
    const read = await readJson(path);
    if (!read.found) return undefined;

    const parsed = read.error === undefined ? flowStateSchema.safeParse(read.value) : undefined;
    if (parsed?.success) {
      return parsed.data;
    }

    this.logger.warn(`Discarding unreadable flow state ${path}`);
    await removeFile(path);
    return undefined;
  }

  async clear(name: FlowName): Promise<void> {
    await removeFile(this.pathFor(name));
  }
}

export class FileCredentialStore implements CredentialStore {
  constructor(
    private readonly dir: string,
    private readonly logger: Logger = noopLogger
  ) {}

  get path(): string {
    return join(this.dir, CREDENTIALS_FILE);
  }

  /** Where an unreadable credentials file is moved before it is overwritten */
  get backupPath(): string {
    return `${this.path}.bak`;
  }

  private async read(): Promise<{ state: AppAuthState; unreadable: boolean }> {
    const read = await readJson(this.path);
    if (!read.found) return { state: {}, unreadable: false };

    const parsed = read.error === undefined ? appAuthStateSchema.safeParse(read.value) : undefined;
    if (parsed?.success) {
      return { state: parsed.data, unreadable: false };
    }
    this.logger.warn(`Ignoring unreadable credentials file ${this.path}`);
    return { state: {}, unreadable: true };
  }

  async load(): Promise<AppAuthState> {
    return (await this.read()).state;
  }

  async update(update: CredentialUpdate): Promise<AppAuthState> {
    const current = await this.read();
    if (current.unreadable) {
      await fs.rename(this.path, this.backupPath);
      this.logger.warn(`Moved unreadable credentials file to ${this.backupPath}`);
    }
    const next = applyCredentialUpdate(current.state, update);
    await writeSecureFile(this.dir, this.path, next);
    return next;
  }

  async clear(): Promise<void> {
    await removeFile(this.path);
  }
}

export interface FileStores {
  dir: string;
  flows: FileFlowStore;
  credentials: FileCredentialStore;
}

export function createFileStores(
  sessionKey: string,
  baseDir: string = DEFAULT_DATA_DIR,
  logger: Logger = noopLogger
): FileStores {
  const dir = sessionDirectory(baseDir, sessionKey);
  return {
    dir,
    flows: new FileFlowStore(dir, logger),
    credentials: new FileCredentialStore(dir, logger),
  };
}
