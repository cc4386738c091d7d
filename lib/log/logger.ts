import fsPromises from 'fs/promises';
import path from 'path';
import { redactMeta } from './redact';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

type LogMeta = Record<string, unknown>;

type EnvSource = Record<string, string | undefined>;

interface LogEntry {
  ts: string;
  lvl: LogLevel;
  evt: string;
  msg?: string;
  meta: LogMeta;
}

export interface LoggerSettings {
  enabled: boolean;
  dir: string;
  level: LogLevel;
  /** Size at which the day's file rolls over to the next sequence number. */
  maxFileBytes: number;
  /** 0 disables the limit. */
  maxFiles: number;
  /** 0 disables the limit. */
  maxTotalBytes: number;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const ENV_PREFIX = 'COOKIE_CONSOLE_LOG_';
const LOG_FILE_PATTERN = /^cookie-console-(\d{8})\.(\d+)\.jsonl$/;

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_PRIORITY, value);
}

function envNumber(env: EnvSource, name: string, fallback: number, allowZero: boolean): number {
  const raw = env[`${ENV_PREFIX}${name}`];
  if (!raw) {
    return fallback;
  }
  const parsed = Math.floor(Number(raw));
  if (!Number.isFinite(parsed) || parsed < 0 || (!allowZero && parsed === 0)) {
    return fallback;
  }
  return parsed;
}

/** Reads the COOKIE_CONSOLE_LOG_* variables. Bad values fall back to defaults. */
export function loadLoggerSettings(env: EnvSource = process.env): LoggerSettings {
  const enable = env[`${ENV_PREFIX}ENABLE`];
  const level = (env[`${ENV_PREFIX}LEVEL`] ?? '').trim().toLowerCase();
  const dir = (env[`${ENV_PREFIX}DIR`] ?? '').trim();
  return {
    enabled:
      enable !== undefined ? enable !== '0' && enable.toLowerCase() !== 'false' : env.NODE_ENV !== 'production',
    dir: path.resolve(process.cwd(), dir || './logs'),
    level: isLogLevel(level) ? level : 'info',
    maxFileBytes: envNumber(env, 'FILE_MAX_BYTES', 5 * 1024 * 1024, false),
    maxFiles: envNumber(env, 'MAX_FILES', 30, true),
    maxTotalBytes: envNumber(env, 'MAX_TOTAL_BYTES', 100 * 1024 * 1024, true),
  };
}

function dayStamp(date: Date): string {
  return date.toISOString().slice(0, 10).replace(/-/g, '');
}

interface LogFile {
  path: string;
  day: string;
  seq: number;
  size: number;
}

async function scanLogFiles(dir: string): Promise<LogFile[]> {
  const names = await fsPromises.readdir(dir).catch((): string[] => []);
  const files: LogFile[] = [];
  for (const name of names) {
    const match = LOG_FILE_PATTERN.exec(name);
    if (!match) {
      continue;
    }
    const filePath = path.join(dir, name);
    const stats = await fsPromises.stat(filePath).catch(() => null);
    if (stats?.isFile()) {
      files.push({ path: filePath, day: match[1], seq: Number(match[2]), size: stats.size });
    }
  }
  // oldest first
  return files.sort((a, b) => (a.day === b.day ? a.seq - b.seq : a.day < b.day ? -1 : 1));
}

/**
 * Appends JSONL entries to `<dir>/cookie-console-<YYYYMMDD>.<seq>.jsonl`.
 * Writes run one after another on a promise chain; a failed write is
 * reported on stderr and the chain carries on.
 */
export class AppLogger {
  private readonly threshold: number;

  private tail: Promise<void> = Promise.resolve();

  private current: LogFile | null = null;

  private disabledReason: string | null = null;

  constructor(private readonly settings: LoggerSettings = loadLoggerSettings()) {
    this.threshold = LEVEL_PRIORITY[settings.level];
  }

  get directory(): string {
    return this.settings.dir;
  }

  debug(evt: string, meta?: LogMeta): void {
    this.log('debug', evt, undefined, meta);
  }

  info(evt: string, meta?: LogMeta): void {
    this.log('info', evt, undefined, meta);
  }

  warn(evt: string, message: string, meta?: LogMeta): void {
    this.log('warn', evt, message, meta);
  }

  error(evt: string, message: string, meta?: LogMeta): void {
    this.log('error', evt, message, meta);
  }

  /** Resolves once every entry logged so far is on disk. */
  flush(): Promise<void> {
    return this.tail;
  }

  private log(level: LogLevel, evt: string, message: string | undefined, meta: LogMeta | undefined): void {
    if (!this.settings.enabled || this.disabledReason || LEVEL_PRIORITY[level] < this.threshold) {
      return;
    }
    const entry: LogEntry = { ts: new Date().toISOString(), lvl: level, evt, meta: redactMeta(meta) };
    if (message) {
      entry.msg = message;
    }
    const line = `${JSON.stringify(entry)}\n`;
    this.tail = this.tail
      .then(() => this.append(line))
      .catch((error: unknown) => {
        console.error('[cookie-console-logger] write failed:', error instanceof Error ? error.message : error);
      });
  }

  private async append(line: string): Promise<void> {
    if (this.disabledReason) {
      return;
    }
    const bytes = Buffer.byteLength(line);
    const file = await this.fileFor(bytes);
    await fsPromises.appendFile(file.path, line, 'utf8');
    file.size += bytes;
  }

  private async fileFor(bytes: number): Promise<LogFile> {
    const today = dayStamp(new Date());
    if (this.current && this.current.day === today) {
      if (this.current.size + bytes <= this.settings.maxFileBytes || this.current.size === 0) {
        return this.current;
      }
      return this.open(today, this.current.seq + 1);
    }
    try {
      await fsPromises.mkdir(this.settings.dir, { recursive: true });
    } catch (error) {
      this.disabledReason = error instanceof Error ? error.message : String(error);
      throw error;
    }
    const existing = (await scanLogFiles(this.settings.dir)).filter((file) => file.day === today);
    const latest = existing[existing.length - 1];
    if (latest && latest.size + bytes <= this.settings.maxFileBytes) {
      this.current = latest;
      return latest;
    }
    return this.open(today, latest ? latest.seq + 1 : 1);
  }

  private async open(day: string, seq: number): Promise<LogFile> {
    const filePath = path.join(this.settings.dir, `cookie-console-${day}.${seq}.jsonl`);
    await fsPromises.writeFile(filePath, '', { flag: 'a' });
    const file: LogFile = { path: filePath, day, seq, size: 0 };
    this.current = file;
    await this.enforceRetention();
    return file;
  }

  private async enforceRetention(): Promise<void> {
    const { maxFiles, maxTotalBytes } = this.settings;
    if (maxFiles === 0 && maxTotalBytes === 0) {
      return;
    }
    const files = (await scanLogFiles(this.settings.dir)).filter((file) => file.path !== this.current?.path);
    let count = files.length + 1;
    let total = files.reduce((sum, file) => sum + file.size, 0);
    for (const file of files) {
      const overCount = maxFiles > 0 && count > maxFiles;
      const overBytes = maxTotalBytes > 0 && total > maxTotalBytes;
      if (!overCount && !overBytes) {
        break;
      }
      try {
        await fsPromises.unlink(file.path);
        count -= 1;
        total -= file.size;
      } catch (error) {
        const reason = error instanceof Error ? error.message : error;
        console.error('[cookie-console-logger] failed to prune', file.path, reason);
      }
    }
  }
}

export const appLogger = new AppLogger();
