import { createHash } from 'crypto';
import { diffLines, type Change } from 'diff';
import type { CookieDiff, CookieSet } from '../types/cookie';

export const NO_CHANGES = 'No changes';

export function maskValue(value: string): string {
  if (!value) {
    return '';
  }
  const fingerprint = createHash('sha256').update(value).digest('hex').slice(0, 6);
  const preview = value.length > 4 ? `${value.slice(0, 4)}…` : '…';
  return `${preview} #${fingerprint}`;
}

function toMaskedLines(set: CookieSet): string {
  return Object.keys(set.fields)
    .sort()
    .map((name) => `${name}=${maskValue(set.fields[name])}\n`)
    .join('');
}

function renderPatch(parts: Change[]): string {
  return parts
    .map((part) => {
      const prefix = part.added ? '+' : part.removed ? '-' : ' ';
      return part.value
        .split('\n')
        .filter(Boolean)
        .map((line) => `${prefix}${line}`)
        .join('\n');
    })
    .filter(Boolean)
    .join('\n');
}

function hasName(set: CookieSet, name: string): boolean {
  return Object.prototype.hasOwnProperty.call(set.fields, name);
}

export function diffCookieSets(current: CookieSet, next: CookieSet): CookieDiff {
  const currentNames = Object.keys(current.fields);
  const nextNames = Object.keys(next.fields);
  const added = nextNames.filter((name) => !hasName(current, name)).sort();
  const removed = currentNames.filter((name) => !hasName(next, name)).sort();
  const changed = nextNames
    .filter((name) => hasName(current, name) && current.fields[name] !== next.fields[name])
    .sort();
  const unchanged = added.length === 0 && removed.length === 0 && changed.length === 0;

  return {
    unchanged,
    added,
    removed,
    changed,
    text: unchanged ? NO_CHANGES : renderPatch(diffLines(toMaskedLines(current), toMaskedLines(next))),
  };
}
