import fs from 'fs';
import fsPromises from 'fs/promises';
import path from 'path';
import { DEFAULT_LOCK_TTL_MS } from '../config/env';
import { StoreAccessError, StoreLockedError, StoreValueError } from '../errors';
import type { StoreOperation } from '../errors';
import { appLogger } from '../log/logger';
import type { ConfigStore } from './types';

const STORE_LOCK_BASENAME = '.cookie-console.lock';
const BACKUP_INFIX = '.backup.';

type LockStatus = 'fresh' | 'stale_removed';

interface LockHandle {
  release: () => Promise<void>;
  status: LockStatus;
}

export interface EnvFileStoreOptions {
  filePath: string;
  lockTtlMs?: number;
  now?: () => Date;
}

function errnoCode(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function wrap(operation: StoreOperation, filePath: string, error: unknown): StoreAccessError {
  return error instanceof StoreAccessError ? error : new StoreAccessError(operation, filePath, error);
}

function pad(value: number, width = 2): string {
  return `${value}`.padStart(width, '0');
}

export function formatBackupStamp(date: Date): string {
  const day = `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;
  const time = `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
  return `${day}-${time}-${pad(date.getUTCMilliseconds(), 3)}`;
}

function isLockStale(stats: fs.Stats, ttlMs: number): boolean {
  if (ttlMs <= 0) {
    return false;
  }
  return Date.now() - stats.mtimeMs > ttlMs;
}

async function removeStaleLock(lockPath: string, ttlMs: number): Promise<boolean> {
  if (ttlMs <= 0) {
    return false;
  }
  try {
    const stats = await fsPromises.stat(lockPath);
    if (!stats.isFile() || !isLockStale(stats, ttlMs)) {
      return false;
    }
    await fsPromises.unlink(lockPath);
    return true;
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

async function acquireLock(lockPath: string, ttlMs: number): Promise<LockHandle> {
  let staleRemovedOnLastAttempt = false;
  while (true) {
    let handle: fsPromises.FileHandle | null = null;
    try {
      handle = await fsPromises.open(lockPath, 'wx');
      await handle.writeFile(`locked-by=${process.pid}\n`);
      await handle.close();
      handle = null;
      const status: LockStatus = staleRemovedOnLastAttempt ? 'stale_removed' : 'fresh';
      appLogger.debug('store_lock_acquire', { lockPath, stale: status === 'stale_removed' ? 'removed' : 'fresh' });
      return {
        status,
        release: async () => {
          try {
            await fsPromises.unlink(lockPath);
          } catch (error) {
            appLogger.warn('store_lock_release', 'failed to remove lock file', {
              lockPath,
              code: errnoCode(error),
            });
            return;
          }
          appLogger.debug('store_lock_release', { lockPath });
        },
      };
    } catch (error) {
      if (handle) {
        // opened but not fully written: drop the half-made lock
        await handle.close().catch(() => undefined);
        await fsPromises.unlink(lockPath).catch(() => undefined);
      }
      if (errnoCode(error) === 'EEXIST') {
        const removed = await removeStaleLock(lockPath, ttlMs);
        staleRemovedOnLastAttempt = removed;
        if (removed) {
          continue;
        }
        throw new StoreLockedError(lockPath);
      }
      throw error;
    }
  }
}

function isKeyLine(line: string, key: string): boolean {
  return line.startsWith(`${key}=`);
}

/** Value of the first `KEY=` line, or undefined when the key is absent. */
export function readKey(content: string, key: string): string | undefined {
  for (const rawLine of content.split('\n')) {
    const line = rawLine.replace(/\r$/, '');
    if (isKeyLine(line, key)) {
      return line.slice(key.length + 1).trim();
    }
  }
  return undefined;
}

/**
 * Replaces the first `KEY=` line and drops later duplicates, or appends the
 * assignment when the key is absent.
 */
export function applyKey(content: string, key: string, value: string): string {
  const lines = content.split('\n');
  let replaced = false;
  const nextLines: string[] = [];
  for (const line of lines) {
    if (!isKeyLine(line, key)) {
      nextLines.push(line);
      continue;
    }
    if (replaced) {
      continue;
    }
    replaced = true;
    nextLines.push(`${key}=${value}${line.endsWith('\r') ? '\r' : ''}`);
  }
  if (replaced) {
    return nextLines.join('\n');
  }
  const separator = content.length === 0 || content.endsWith('\n') ? '' : '\n';
  return `${content}${separator}${key}=${value}\n`;
}

/** `.env`-style file holding one `KEY=value` line per setting. */
export class EnvFileStore implements ConfigStore {
  public readonly location: string;

  private readonly lockTtlMs: number;

  private readonly now: () => Date;

  constructor(options: EnvFileStoreOptions) {
    this.location = path.resolve(options.filePath);
    this.lockTtlMs = options.lockTtlMs ?? DEFAULT_LOCK_TTL_MS;
    this.now = options.now ?? (() => new Date());
  }

  get lockPath(): string {
    return path.join(path.dirname(this.location), STORE_LOCK_BASENAME);
  }

  async read(key: string): Promise<string | undefined> {
    return readKey(await this.readContent('read'), key);
  }

  assertStorable(key: string, value: string): void {
    if (/[\r\n]/.test(value)) {
      throw new StoreValueError(key, 'value must fit on a single line');
    }
  }

  async write(key: string, value: string): Promise<void> {
    this.assertStorable(key, value);
    await this.withLock(async () => {
      const content = await this.readContent('write');
      await this.writeAtomically(applyKey(content, key, value));
    });
    appLogger.info('store_write_done', { path: this.location, key });
  }

  /** Snapshots the whole file; the key names what the snapshot protects. */
  async backup(key: string): Promise<string> {
    const content = await this.readContent('backup');
    const base = `${this.location}${BACKUP_INFIX}${formatBackupStamp(this.now())}`;
    for (let attempt = 0; attempt < 100; attempt += 1) {
      const backupPath = attempt === 0 ? base : `${base}-${attempt}`;
      try {
        await fsPromises.writeFile(backupPath, content, { encoding: 'utf8', flag: 'wx' });
        appLogger.info('store_backup_done', { path: backupPath, key });
        return backupPath;
      } catch (error) {
        if (errnoCode(error) !== 'EEXIST') {
          throw wrap('backup', backupPath, error);
        }
      }
    }
    throw new StoreAccessError('backup', base, 'too many backups with the same timestamp');
  }

  async listBackups(): Promise<string[]> {
    const dir = path.dirname(this.location);
    const prefix = `${path.basename(this.location)}${BACKUP_INFIX}`;
    const entries = await fsPromises.readdir(dir);
    return entries
      .filter((name) => name.startsWith(prefix))
      .sort()
      .reverse()
      .map((name) => path.join(dir, name));
  }

  /** Keeps the newest `keep` backups; 0 keeps everything. Never throws. */
  async pruneBackups(keep: number): Promise<number> {
    if (keep <= 0) {
      return 0;
    }
    let backups: string[];
    try {
      backups = await this.listBackups();
    } catch (error) {
      appLogger.warn('store_backup_prune', 'failed to list backups', {
        path: this.location,
        code: errnoCode(error),
      });
      return 0;
    }
    let removed = 0;
    for (const backupPath of backups.slice(keep)) {
      try {
        await fsPromises.unlink(backupPath);
        removed += 1;
      } catch (error) {
        appLogger.warn('store_backup_prune', 'failed to remove backup', {
          path: backupPath,
          code: errnoCode(error),
        });
      }
    }
    if (removed > 0) {
      appLogger.info('store_backup_prune', { path: this.location, removed, kept: keep });
    }
    return removed;
  }

  private async readContent(operation: StoreOperation): Promise<string> {
    try {
      return await fsPromises.readFile(this.location, 'utf8');
    } catch (error) {
      throw wrap(operation, this.location, error);
    }
  }

  private async withLock<T>(fn: () => Promise<T>): Promise<T> {
    let handle: LockHandle;
    try {
      handle = await acquireLock(this.lockPath, this.lockTtlMs);
    } catch (error) {
      throw wrap('lock', this.lockPath, error);
    }
    try {
      return await fn();
    } finally {
      await handle.release();
    }
  }

  private async writeAtomically(contents: string): Promise<void> {
    const dir = path.dirname(this.location);
    const tempPath = path.join(dir, `.cookie-console.tmp-${process.pid}-${Date.now()}`);
    try {
      await fsPromises.writeFile(tempPath, contents, 'utf8');
      await fsPromises.rename(tempPath, this.location);
    } catch (error) {
      await fsPromises.unlink(tempPath).catch((cleanupError: unknown) => {
        appLogger.debug('store_temp_cleanup', { path: tempPath, code: errnoCode(cleanupError) });
      });
      throw wrap('write', this.location, error);
    }
  }
}
