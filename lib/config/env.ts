import fs from 'fs';
import os from 'os';
import path from 'path';
import { z } from 'zod';
import { DEFAULT_FRESHNESS_HOURS } from '../cookie/fields';
import { ConfigurationError } from '../errors';

export const DEFAULT_STORE_KEY = 'COOKIES_STR';
export const DEFAULT_BACKUP_KEEP = 5;
export const DEFAULT_LOCK_TTL_MS = 120_000;

const positiveNumber = z.coerce.number().finite().positive();
const nonNegativeNumber = z.coerce.number().finite().nonnegative();
const nonNegativeInt = z.coerce.number().int().nonnegative();

function readNumber(name: string, schema: z.ZodType<number>, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(name, `${name} must be a valid number, got "${raw}"`);
  }
  return parsed.data;
}

/**
 * `COOKIE_STORE_PATH` when set, otherwise the first `.env` found in the
 * working directory or the home directory.
 */
export function resolveEnvFilePath(): string {
  const configured = process.env.COOKIE_STORE_PATH;
  if (configured && configured.trim().length > 0) {
    return path.resolve(configured.trim());
  }
  const candidates = [path.join(process.cwd(), '.env'), path.join(os.homedir(), '.env')];
  const found = candidates.find((candidate) => fs.existsSync(candidate));
  return found ?? candidates[0];
}

export function getStoreKey(): string {
  const key = process.env.COOKIE_STORE_KEY?.trim();
  return key ? key : DEFAULT_STORE_KEY;
}

export function getFreshnessThresholdHours(): number {
  return readNumber('COOKIE_FRESHNESS_HOURS', positiveNumber, DEFAULT_FRESHNESS_HOURS);
}

export function getBackupRetention(): number {
  return readNumber('COOKIE_BACKUP_KEEP', nonNegativeInt, DEFAULT_BACKUP_KEEP);
}

export function getLockTtlMs(): number {
  return readNumber('COOKIE_STORE_LOCK_TTL_MS', nonNegativeNumber, DEFAULT_LOCK_TTL_MS);
}

export interface ConsoleSettings {
  storePath: string;
  storeKey: string;
  freshnessHours: number;
  backupKeep: number;
  lockTtlMs: number;
}

export function loadSettings(): ConsoleSettings {
  return {
    storePath: resolveEnvFilePath(),
    storeKey: getStoreKey(),
    freshnessHours: getFreshnessThresholdHours(),
    backupKeep: getBackupRetention(),
    lockTtlMs: getLockTtlMs(),
  };
}
