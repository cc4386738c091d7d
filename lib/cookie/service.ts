import type { ConsoleSettings } from '../config/env';
import { appLogger } from '../log/logger';
import { EnvFileStore } from '../store/env-file-store';
import type { ConfigStore } from '../store/types';
import type { CookieDiff, CookieSet, StatusReport } from '../types/cookie';
import { parse, withObservedAt } from './cookie-set';
import { diffCookieSets } from './diff';
import { evaluate, tokenIssuedAt } from './evaluate';
import { persistIfChanged } from './persist';
import type { PersistResult } from './persist';

export function openStore(settings: ConsoleSettings): EnvFileStore {
  return new EnvFileStore({ filePath: settings.storePath, lockTtlMs: settings.lockTtlMs });
}

/** Parses raw input and dates it by the token's issue time when it carries one. */
export function parseObserved(raw: string): CookieSet {
  const set = parse(raw);
  return withObservedAt(set, tokenIssuedAt(set));
}

export async function loadStoredCookie(store: ConfigStore, key: string): Promise<CookieSet | undefined> {
  const raw = await store.read(key);
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  return parseObserved(raw);
}

export function evaluateRaw(raw: string, settings: ConsoleSettings, now: Date = new Date()): StatusReport {
  return evaluate(parseObserved(raw), now, settings.freshnessHours);
}

export async function diffAgainstStore(
  store: ConfigStore,
  settings: ConsoleSettings,
  raw: string,
): Promise<CookieDiff> {
  const stored = (await loadStoredCookie(store, settings.storeKey)) ?? parse('');
  return diffCookieSets(stored, parse(raw));
}

export interface UpdateOptions {
  force?: boolean;
  backup?: boolean;
  now?: Date;
}

export type UpdateOutcome =
  | { status: 'incomplete'; report: StatusReport }
  | { status: 'written' | 'unchanged'; report: StatusReport; result: PersistResult };

/**
 * Validates the new cookie and persists it. Incomplete input is refused
 * unless `force` is set.
 */
export async function updateStoredCookie(
  store: ConfigStore,
  settings: ConsoleSettings,
  raw: string,
  options: UpdateOptions = {},
): Promise<UpdateOutcome> {
  const set = parseObserved(raw);
  const report = evaluate(set, options.now ?? new Date(), settings.freshnessHours);
  if (!report.isComplete && !options.force) {
    appLogger.warn('cookie_update_refused', 'cookie is missing required fields', {
      missing: report.missingRequired,
    });
    return { status: 'incomplete', report };
  }
  if (!report.isComplete) {
    appLogger.warn('cookie_update_forced', 'writing incomplete cookie', { missing: report.missingRequired });
  }
  const result = await persistIfChanged(store, set, {
    key: settings.storeKey,
    backupEnabled: options.backup ?? true,
    backupRetention: settings.backupKeep,
  });
  return { status: result.written ? 'written' : 'unchanged', report, result };
}
