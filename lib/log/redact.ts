import { sensitiveFieldNames } from '../cookie/fields';

const MASK = '***';

const SENSITIVE_KEY_PATTERN = /cookie|token|secret|password/i;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function collectStoreKeys(): string[] {
  const keys = new Set<string>(['COOKIES_STR']);
  const configured = process.env.COOKIE_STORE_KEY?.trim();
  if (configured) {
    keys.add(configured);
  }
  return Array.from(keys);
}

const STORE_ASSIGNMENT = new RegExp(`\\b(${collectStoreKeys().map(escapeRegExp).join('|')})=[^\\n]*`, 'g');

const FIELD_ASSIGNMENT = new RegExp(
  `(^|[\\s;])(${sensitiveFieldNames().map(escapeRegExp).join('|')})=[^;\\s]*`,
  'g',
);

function redactCookieHeader(value: string): string {
  return value.replace(/((?:set-)?cookie:\s*)[^\n]*/gi, (_match, prefix: string) => `${prefix}${MASK}`);
}

function redactSensitiveStrings(value: string): string {
  return redactCookieHeader(value)
    .replace(STORE_ASSIGNMENT, (_match, key: string) => `${key}=${MASK}`)
    .replace(FIELD_ASSIGNMENT, (_match, lead: string, name: string) => `${lead}${name}=${MASK}`);
}

function redactUnknown(value: unknown): unknown {
  if (value == null) {
    return value;
  }
  if (typeof value === 'string') {
    return redactSensitiveStrings(value);
  }
  if (Array.isArray(value)) {
    return value.map((item) => redactUnknown(item));
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === 'object') {
    const output: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      output[key] = SENSITIVE_KEY_PATTERN.test(key) && typeof entry === 'string' ? MASK : redactUnknown(entry);
    }
    return output;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  return String(value);
}

export function redactText(value: string): string {
  return redactSensitiveStrings(value);
}

export function redactMeta(meta: Record<string, unknown> | undefined): Record<string, unknown> {
  if (!meta) {
    return {};
  }
  const output: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(meta)) {
    output[key] = SENSITIVE_KEY_PATTERN.test(key) && typeof entry === 'string' ? MASK : redactUnknown(entry);
  }
  return output;
}
