import fs from 'fs';
import os from 'os';
import path from 'path';
import { EXIT_INVALID, EXIT_OK, EXIT_STORE_ERROR, USAGE, runCookieCli } from '../lib/cli/cookie-cli';
import type { CliIo } from '../lib/cli/cookie-cli';
import type { ConsoleSettings } from '../lib/config/env';

const NOW = new Date('2026-06-01T12:00:00.000Z');
const ISSUED_TWO_HOURS_AGO = 1780308000000;
const COMPLETE = `unb=123; _m_h5_tk=tok_${ISSUED_TWO_HOURS_AGO}; cookie2=abc; cna=x; sgcookie=y`;
const SORTED_COMPLETE = `_m_h5_tk=tok_${ISSUED_TWO_HOURS_AGO}; cna=x; cookie2=abc; sgcookie=y; unb=123`;

let dir: string;
let envPath: string;
let settings: ConsoleSettings;

interface CapturedIo extends CliIo {
  stdout: string[];
  stderr: string[];
}

function createIo(files: Record<string, string> = {}, stdin = ''): CapturedIo {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    out: (line) => stdout.push(line),
    err: (line) => stderr.push(line),
    readFile: async (filePath) => {
      const content = files[filePath];
      if (content === undefined) {
        throw new Error(`ENOENT: no such file or directory, open '${filePath}'`);
      }
      return content;
    },
    readStdin: async () => stdin,
  };
}

function run(argv: string[], io: CapturedIo) {
  return runCookieCli(argv, { io, settings, now: () => NOW });
}

function backupsIn(directory: string): string[] {
  return fs.readdirSync(directory).filter((name) => name.startsWith('.env.backup.'));
}

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'cookie-cli-'));
  envPath = path.join(dir, '.env');
  settings = { storePath: envPath, storeKey: 'COOKIES_STR', freshnessHours: 24, backupKeep: 5, lockTtlMs: 120_000 };
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('cookie-cli status', () => {
  it('prints the report for the stored cookie', async () => {
    fs.writeFileSync(envPath, `BOT_NAME=test\nCOOKIES_STR=${COMPLETE}\n`);
    const io = createIo();
    expect(await run(['status'], io)).toBe(EXIT_OK);
    expect(io.stdout).toEqual([
      `Cookie status for ${envPath}`,
      '  Fields: 5',
      '  Complete: yes',
      '  Missing recommended: x, t, tracknick, XSRF-TOKEN',
      '  Fresh: yes',
      '  Age: 2.00 h',
      '  Identity: unb=123',
      '  Token: yes, Session: yes',
      '  Health: 100/100 (good)',
    ]);
  });

  it('prints JSON with --json', async () => {
    fs.writeFileSync(envPath, `COOKIES_STR=${COMPLETE}\n`);
    const io = createIo();
    expect(await run(['status', '--json'], io)).toBe(EXIT_OK);
    const payload = JSON.parse(io.stdout[0]);
    expect(payload.location).toBe(envPath);
    expect(payload.report.isComplete).toBe(true);
    expect(payload.report.ageHours).toBe(2);
  });

  it('fails when the store has no cookie entry', async () => {
    fs.writeFileSync(envPath, 'BOT_NAME=test\n');
    const io = createIo();
    expect(await run(['status'], io)).toBe(EXIT_INVALID);
    expect(io.stderr).toEqual([`No COOKIES_STR entry in ${envPath}`]);
  });

  it('exits with the store error code when the file is missing', async () => {
    const io = createIo();
    expect(await run(['status'], io)).toBe(EXIT_STORE_ERROR);
    expect(io.stderr[0].startsWith(`Cookie store read failed for ${envPath}:`)).toBe(true);
  });
});

describe('cookie-cli update', () => {
  it('writes the cookie with a backup, then reports it unchanged', async () => {
    fs.writeFileSync(envPath, 'BOT_NAME=test\nCOOKIES_STR=unb=old\n');
    const first = createIo();
    expect(await run(['update', '-c', COMPLETE], first)).toBe(EXIT_OK);
    const [backupName] = backupsIn(dir);
    expect(first.stdout).toEqual([`Cookie updated in ${envPath} (5 fields)`, `Backup: ${path.join(dir, backupName)}`]);
    expect(fs.readFileSync(envPath, 'utf8')).toBe(`BOT_NAME=test\nCOOKIES_STR=${SORTED_COMPLETE}\n`);

    const second = createIo();
    expect(await run(['update', '-c', COMPLETE], second)).toBe(EXIT_OK);
    expect(second.stdout).toEqual([`Cookie unchanged in ${envPath}; nothing written`]);
    expect(backupsIn(dir)).toHaveLength(1);
  });

  it('refuses an incomplete cookie without --force', async () => {
    fs.writeFileSync(envPath, 'COOKIES_STR=unb=old\n');
    const io = createIo();
    expect(await run(['update', '--cookie=unb=123'], io)).toBe(EXIT_INVALID);
    expect(io.stderr[io.stderr.length - 1]).toBe(
      'Refusing to write an incomplete cookie; pass --force to write it anyway.',
    );
    expect(io.stderr).toContain('  Missing required: _m_h5_tk, cookie2, cna, sgcookie');
    expect(fs.readFileSync(envPath, 'utf8')).toBe('COOKIES_STR=unb=old\n');
  });

  it('writes an incomplete cookie with --force and skips the backup with --no-backup', async () => {
    fs.writeFileSync(envPath, 'COOKIES_STR=unb=old\n');
    const io = createIo();
    expect(await run(['update', '-c', 'unb=123', '--force', '--no-backup'], io)).toBe(EXIT_OK);
    expect(io.stdout).toEqual([`Cookie updated in ${envPath} (1 fields)`]);
    expect(fs.readFileSync(envPath, 'utf8')).toBe('COOKIES_STR=unb=123\n');
    expect(backupsIn(dir)).toEqual([]);
  });

  it('reads the cookie from a file or stdin', async () => {
    fs.writeFileSync(envPath, 'COOKIES_STR=unb=old\n');
    const fromFile = createIo({ 'cookies.txt': `${COMPLETE}\n` });
    expect(await run(['update', '-f', 'cookies.txt', '--no-backup'], fromFile)).toBe(EXIT_OK);
    expect(fs.readFileSync(envPath, 'utf8')).toBe(`COOKIES_STR=${SORTED_COMPLETE}\n`);

    const fromStdin = createIo({}, '  unb=9; _m_h5_tk=t; cookie2=c; cna=n; sgcookie=s\n');
    expect(await run(['update', '--stdin', '--no-backup'], fromStdin)).toBe(EXIT_OK);
    expect(fs.readFileSync(envPath, 'utf8')).toBe('COOKIES_STR=_m_h5_tk=t; cna=n; cookie2=c; sgcookie=s; unb=9\n');
  });

  it('refuses a value spanning several lines without leaving a backup', async () => {
    fs.writeFileSync(envPath, 'COOKIES_STR=unb=old\n');
    const io = createIo({ 'cookies.txt': 'unb=1\ncna=2; cookie2=c\n' });
    expect(await run(['update', '-f', 'cookies.txt', '--force'], io)).toBe(EXIT_INVALID);
    expect(io.stdout).toEqual([]);
    expect(io.stderr).toEqual(['Cannot store COOKIES_STR: value must fit on a single line']);
    expect(fs.readFileSync(envPath, 'utf8')).toBe('COOKIES_STR=unb=old\n');
    expect(backupsIn(dir)).toEqual([]);
  });

  it('explains how to pass a cookie when none is given', async () => {
    const io = createIo();
    expect(await run(['update'], io)).toBe(EXIT_INVALID);
    expect(io.stderr).toEqual(['update needs a cookie: pass -c <cookie>, -f <file> or --stdin']);
  });

  it('reports unreadable input files', async () => {
    const io = createIo();
    expect(await run(['update', '-f', 'missing.txt'], io)).toBe(EXIT_INVALID);
    expect(io.stderr).toEqual(["Cannot read cookie input: ENOENT: no such file or directory, open 'missing.txt'"]);
  });

  it('rejects an empty cookie', async () => {
    const io = createIo();
    expect(await run(['update', '-c', '   '], io)).toBe(EXIT_INVALID);
    expect(io.stderr).toEqual(['Cookie string is empty']);
  });
});

describe('cookie-cli validate', () => {
  it('prints the report and key fields, failing under --strict', async () => {
    const io = createIo();
    expect(await run(['validate', '-c', 'unb=123', '--strict'], io)).toBe(EXIT_INVALID);
    expect(io.stdout).toEqual([
      'Fields: 1',
      'Complete: no',
      'Missing required: _m_h5_tk, cookie2, cna, sgcookie',
      'Missing recommended: x, t, tracknick, XSRF-TOKEN',
      'Fresh: no (may be stale)',
      'Identity: unb=123',
      'Token: no, Session: no',
      'Health: 0/100 (poor)',
      'Key fields:',
      '  unb: ok 123',
      '  _m_h5_tk: missing',
      '  cookie2: missing',
      '  cna: missing',
    ]);
    expect(io.stderr).toEqual(['Missing required fields: _m_h5_tk, cookie2, cna, sgcookie']);
  });

  it('passes without --strict and shortens long values', async () => {
    const io = createIo();
    expect(await run(['validate', '-c', 'cookie2=abcdefghijklmnopqrstuvwxyz'], io)).toBe(EXIT_OK);
    expect(io.stdout).toContain('  cookie2: ok abcdefghijklmnopqrst...');
  });

  it('does not need a store file', async () => {
    const io = createIo();
    expect(await run(['validate', '-c', COMPLETE, '--strict'], io)).toBe(EXIT_OK);
    expect(fs.existsSync(envPath)).toBe(false);
  });
});

describe('cookie-cli diff', () => {
  it('prints a masked field diff against the stored cookie', async () => {
    fs.writeFileSync(envPath, 'COOKIES_STR=a=1\n');
    const io = createIo();
    expect(await run(['diff', '-c', 'a=1; c=3'], io)).toBe(EXIT_OK);
    expect(io.stdout).toEqual([' a=… #6b86b2\n+c=… #4e0740']);
  });
});

describe('cookie-cli backup', () => {
  it('writes a backup and prunes old ones', async () => {
    fs.writeFileSync(envPath, 'COOKIES_STR=a=1\n');
    fs.writeFileSync(path.join(dir, '.env.backup.20000101-000000-000'), 'COOKIES_STR=ancient\n');
    settings = { ...settings, backupKeep: 1 };
    const io = createIo();
    expect(await run(['backup'], io)).toBe(EXIT_OK);
    const backups = backupsIn(dir);
    expect(backups).toHaveLength(1);
    expect(io.stdout).toEqual([`Backup written: ${path.join(dir, backups[0])}`, 'Removed 1 old backup(s)']);
    expect(fs.readFileSync(path.join(dir, backups[0]), 'utf8')).toBe('COOKIES_STR=a=1\n');
  });
});

describe('cookie-cli usage', () => {
  it('prints usage for --help', async () => {
    const io = createIo();
    expect(await run(['--help'], io)).toBe(EXIT_OK);
    expect(io.stdout).toEqual([USAGE]);
  });

  it('prints usage and fails without a command', async () => {
    const io = createIo();
    expect(await run([], io)).toBe(EXIT_INVALID);
    expect(io.stdout).toEqual([USAGE]);
  });

  it('fails on a mistyped flag instead of running the command', async () => {
    const io = createIo();
    expect(await run(['validate', '--stict', '-c', 'unb=1'], io)).toBe(EXIT_INVALID);
    expect(io.stdout).toEqual([]);
    expect(io.stderr).toEqual(['Unknown argument: --stict', USAGE]);
  });

  it('rejects unknown arguments before touching the store', async () => {
    fs.writeFileSync(envPath, 'COOKIES_STR=unb=old\n');
    const io = createIo();
    expect(await run(['update', '-c', COMPLETE, '--no-backups', 'extra'], io)).toBe(EXIT_INVALID);
    expect(io.stderr).toEqual(['Unknown argument: --no-backups', 'Unknown argument: extra', USAGE]);
    expect(fs.readFileSync(envPath, 'utf8')).toBe('COOKIES_STR=unb=old\n');
    expect(backupsIn(dir)).toEqual([]);
  });

  it('maps configuration errors to the invalid exit code', async () => {
    const previous = process.env.COOKIE_FRESHNESS_HOURS;
    process.env.COOKIE_FRESHNESS_HOURS = 'never';
    try {
      const io = createIo();
      expect(await runCookieCli(['status'], { io })).toBe(EXIT_INVALID);
      expect(io.stderr).toEqual(['COOKIE_FRESHNESS_HOURS must be a valid number, got "never"']);
    } finally {
      if (previous === undefined) {
        delete process.env.COOKIE_FRESHNESS_HOURS;
      } else {
        process.env.COOKIE_FRESHNESS_HOURS = previous;
      }
    }
  });
});
