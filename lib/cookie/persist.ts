import { getBackupRetention, getStoreKey } from '../config/env';
import { appLogger } from '../log/logger';
import type { ConfigStore } from '../store/types';
import type { CookieSet } from '../types/cookie';
import { serialize } from './cookie-set';

export interface PersistOptions {
  key?: string;
  backupEnabled?: boolean;
  backupRetention?: number;
}

export interface PersistResult {
  written: boolean;
  backupPath?: string;
  pruned: number;
}

async function pruneQuietly(store: ConfigStore, keep: number): Promise<number> {
  try {
    return await store.pruneBackups(keep);
  } catch (error) {
    appLogger.warn('backup_prune_failure', error instanceof Error ? error.message : String(error), {
      path: store.location,
      keep,
    });
    return 0;
  }
}

/**
 * Writes the serialized set only when it differs from what the store holds.
 * The value is checked against the store before the backup is taken, and
 * the backup before the write; if either fails nothing is written.
 */
export async function persistIfChanged(
  store: ConfigStore,
  set: CookieSet,
  options: PersistOptions = {},
): Promise<PersistResult> {
  const key = options.key ?? getStoreKey();
  const backupEnabled = options.backupEnabled ?? true;

  const current = await store.read(key);
  const next = serialize(set);
  if (current === next) {
    appLogger.debug('cookie_persist_skipped', { path: store.location, reason: 'unchanged' });
    return { written: false, pruned: 0 };
  }

  store.assertStorable(key, next);

  let backupPath: string | undefined;
  if (backupEnabled) {
    backupPath = await store.backup(key);
  }
  await store.write(key, next);

  const pruned = backupEnabled
    ? await pruneQuietly(store, options.backupRetention ?? getBackupRetention())
    : 0;
  appLogger.info('cookie_persist_done', {
    path: store.location,
    fieldCount: Object.keys(set.fields).length,
    backupPath,
    pruned,
  });
  return backupPath ? { written: true, backupPath, pruned } : { written: true, pruned };
}
