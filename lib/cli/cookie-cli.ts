import fsPromises from 'fs/promises';
import { loadSettings } from '../config/env';
import type { ConsoleSettings } from '../config/env';
import { KEY_FIELDS } from '../cookie/fields';
import { evaluate, hasField } from '../cookie/evaluate';
import {
  diffAgainstStore,
  evaluateRaw,
  loadStoredCookie,
  openStore,
  parseObserved,
  updateStoredCookie,
} from '../cookie/service';
import { ConfigurationError, StoreAccessError, StoreValueError } from '../errors';
import { appLogger } from '../log/logger';
import type { StatusReport } from '../types/cookie';

export const EXIT_OK = 0;
export const EXIT_INVALID = 1;
export const EXIT_STORE_ERROR = 2;

const COMMANDS = ['status', 'update', 'validate', 'diff', 'backup'] as const;
type Command = (typeof COMMANDS)[number];

export interface CliIo {
  out: (line: string) => void;
  err: (line: string) => void;
  readFile: (filePath: string) => Promise<string>;
  readStdin: () => Promise<string>;
}

export interface CliDeps {
  io: CliIo;
  settings?: ConsoleSettings;
  now?: () => Date;
}

export interface CliOptions {
  command?: Command;
  cookie?: string;
  file?: string;
  stdin: boolean;
  json: boolean;
  force: boolean;
  noBackup: boolean;
  strict: boolean;
  help: boolean;
  unknown: string[];
}

export const USAGE = `Usage: cookie-cli <command> [options]

Commands:
  status [--json]                               show the stored cookie's status
  update (-c <cookie> | -f <file> | --stdin)    replace the stored cookie
         [--no-backup] [--force]
  validate (-c <cookie> | -f <file> | --stdin)  check a cookie without storing it
           [--strict]
  diff (-c <cookie> | -f <file> | --stdin)      compare a cookie with the stored one
  backup                                        back up the store file

Examples:
  cookie-cli status
  cookie-cli update -c "unb=...; _m_h5_tk=...; cookie2=...; cna=...; sgcookie=..."
  cookie-cli update -f cookies.txt --no-backup
  cookie-cli validate -c "unb=..." --strict`;

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

export function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = {
    stdin: false,
    json: false,
    force: false,
    noBackup: false,
    strict: false,
    help: false,
    unknown: [],
  };
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if ((arg === '-c' || arg === '--cookie') && argv[i + 1] !== undefined) {
      options.cookie = argv[i + 1];
      i += 1;
      continue;
    }
    if (arg.startsWith('--cookie=')) {
      options.cookie = arg.slice('--cookie='.length);
      continue;
    }
    if ((arg === '-f' || arg === '--file') && argv[i + 1] !== undefined) {
      options.file = argv[i + 1];
      i += 1;
      continue;
    }
    if (arg.startsWith('--file=')) {
      options.file = arg.slice('--file='.length);
      continue;
    }
    switch (arg) {
      case '--stdin':
        options.stdin = true;
        continue;
      case '--json':
        options.json = true;
        continue;
      case '--force':
        options.force = true;
        continue;
      case '--no-backup':
        options.noBackup = true;
        continue;
      case '--strict':
        options.strict = true;
        continue;
      case '--help':
      case '-h':
        options.help = true;
        continue;
      default:
        break;
    }
    if (!options.command && isCommand(arg)) {
      options.command = arg;
      continue;
    }
    options.unknown.push(arg);
  }
  return options;
}

function yesNo(value: boolean): string {
  return value ? 'yes' : 'no';
}

export function formatReport(report: StatusReport): string[] {
  const lines = [
    `Fields: ${report.fieldCount}`,
    `Complete: ${yesNo(report.isComplete)}`,
  ];
  if (report.missingRequired.length > 0) {
    lines.push(`Missing required: ${report.missingRequired.join(', ')}`);
  }
  if (report.missingRecommended.length > 0) {
    lines.push(`Missing recommended: ${report.missingRecommended.join(', ')}`);
  }
  lines.push(`Fresh: ${report.isFresh ? 'yes' : 'no (may be stale)'}`);
  if (report.ageHours !== undefined) {
    lines.push(`Age: ${report.ageHours.toFixed(2)} h`);
  }
  lines.push(report.identity ? `Identity: ${report.identity.field}=${report.identity.value}` : 'Identity: unknown');
  lines.push(`Token: ${yesNo(report.hasToken)}, Session: ${yesNo(report.hasSession)}`);
  lines.push(`Health: ${report.healthScore}/100 (${report.healthGrade})`);
  return lines;
}

function preview(value: string): string {
  return value.length > 20 ? `${value.slice(0, 20)}...` : value;
}

async function readCookieInput(options: CliOptions, io: CliIo): Promise<string | undefined> {
  if (options.cookie !== undefined) {
    return options.cookie.trim();
  }
  if (options.file !== undefined) {
    return (await io.readFile(options.file)).trim();
  }
  if (options.stdin) {
    return (await io.readStdin()).trim();
  }
  return undefined;
}

async function requireCookieInput(options: CliOptions, io: CliIo): Promise<string | null> {
  let raw: string | undefined;
  try {
    raw = await readCookieInput(options, io);
  } catch (error) {
    io.err(`Cannot read cookie input: ${error instanceof Error ? error.message : String(error)}`);
    return null;
  }
  if (raw === undefined) {
    io.err(`${options.command ?? 'this command'} needs a cookie: pass -c <cookie>, -f <file> or --stdin`);
    return null;
  }
  if (!raw) {
    io.err('Cookie string is empty');
    return null;
  }
  return raw;
}

async function cmdStatus(options: CliOptions, settings: ConsoleSettings, deps: CliDeps): Promise<number> {
  const { io } = deps;
  const store = openStore(settings);
  const stored = await loadStoredCookie(store, settings.storeKey);
  if (!stored) {
    io.err(`No ${settings.storeKey} entry in ${store.location}`);
    return EXIT_INVALID;
  }
  const report = evaluate(stored, deps.now?.() ?? new Date(), settings.freshnessHours);
  if (options.json) {
    io.out(JSON.stringify({ location: store.location, report }, null, 2));
    return EXIT_OK;
  }
  io.out(`Cookie status for ${store.location}`);
  formatReport(report).forEach((line) => io.out(`  ${line}`));
  return EXIT_OK;
}

async function cmdUpdate(options: CliOptions, settings: ConsoleSettings, deps: CliDeps): Promise<number> {
  const { io } = deps;
  const raw = await requireCookieInput(options, io);
  if (raw === null) {
    return EXIT_INVALID;
  }
  const store = openStore(settings);
  const outcome = await updateStoredCookie(store, settings, raw, {
    force: options.force,
    backup: !options.noBackup,
    now: deps.now?.(),
  });
  if (outcome.status === 'incomplete') {
    formatReport(outcome.report).forEach((line) => io.err(`  ${line}`));
    io.err('Refusing to write an incomplete cookie; pass --force to write it anyway.');
    return EXIT_INVALID;
  }
  if (outcome.status === 'unchanged') {
    io.out(`Cookie unchanged in ${store.location}; nothing written`);
    return EXIT_OK;
  }
  io.out(`Cookie updated in ${store.location} (${outcome.report.fieldCount} fields)`);
  if (outcome.result.backupPath) {
    io.out(`Backup: ${outcome.result.backupPath}`);
  }
  return EXIT_OK;
}

async function cmdValidate(options: CliOptions, settings: ConsoleSettings, deps: CliDeps): Promise<number> {
  const { io } = deps;
  const raw = await requireCookieInput(options, io);
  if (raw === null) {
    return EXIT_INVALID;
  }
  const report = evaluateRaw(raw, settings, deps.now?.() ?? new Date());
  formatReport(report).forEach((line) => io.out(line));
  const set = parseObserved(raw);
  io.out('Key fields:');
  for (const field of KEY_FIELDS) {
    io.out(hasField(set, field) ? `  ${field}: ok ${preview(set.fields[field])}` : `  ${field}: missing`);
  }
  if (options.strict && !report.isComplete) {
    io.err(`Missing required fields: ${report.missingRequired.join(', ')}`);
    return EXIT_INVALID;
  }
  return EXIT_OK;
}

async function cmdDiff(options: CliOptions, settings: ConsoleSettings, deps: CliDeps): Promise<number> {
  const { io } = deps;
  const raw = await requireCookieInput(options, io);
  if (raw === null) {
    return EXIT_INVALID;
  }
  const diff = await diffAgainstStore(openStore(settings), settings, raw);
  io.out(diff.text);
  return EXIT_OK;
}

async function cmdBackup(settings: ConsoleSettings, deps: CliDeps): Promise<number> {
  const store = openStore(settings);
  const backupPath = await store.backup(settings.storeKey);
  deps.io.out(`Backup written: ${backupPath}`);
  const removed = await store.pruneBackups(settings.backupKeep);
  if (removed > 0) {
    deps.io.out(`Removed ${removed} old backup(s)`);
  }
  return EXIT_OK;
}

function dispatch(options: CliOptions, settings: ConsoleSettings, deps: CliDeps): Promise<number> {
  switch (options.command) {
    case 'status':
      return cmdStatus(options, settings, deps);
    case 'update':
      return cmdUpdate(options, settings, deps);
    case 'validate':
      return cmdValidate(options, settings, deps);
    case 'diff':
      return cmdDiff(options, settings, deps);
    case 'backup':
      return cmdBackup(settings, deps);
    default:
      deps.io.out(USAGE);
      return Promise.resolve(options.help ? EXIT_OK : EXIT_INVALID);
  }
}

/** Runs one command and returns the process exit code. */
export async function runCookieCli(argv: string[], deps: CliDeps): Promise<number> {
  const options = parseArgs(argv);
  if (options.unknown.length > 0) {
    options.unknown.forEach((arg) => deps.io.err(`Unknown argument: ${arg}`));
    deps.io.err(USAGE);
    return EXIT_INVALID;
  }
  if (options.help) {
    deps.io.out(USAGE);
    return EXIT_OK;
  }
  try {
    const settings = deps.settings ?? loadSettings();
    return await dispatch(options, settings, deps);
  } catch (error) {
    if (error instanceof StoreAccessError) {
      appLogger.error('cli_store_error', error.message, { command: options.command, operation: error.operation });
      deps.io.err(error.message);
      return EXIT_STORE_ERROR;
    }
    if (error instanceof StoreValueError || error instanceof ConfigurationError) {
      deps.io.err(error.message);
      return EXIT_INVALID;
    }
    throw error;
  }
}

let cachedStdin: string | null = null;

async function readStdinOnce(): Promise<string> {
  if (cachedStdin !== null) {
    return cachedStdin;
  }
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  cachedStdin = Buffer.concat(chunks).toString('utf8');
  return cachedStdin;
}

export const processIo: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  readFile: (filePath) => fsPromises.readFile(filePath, 'utf8'),
  readStdin: readStdinOnce,
};
