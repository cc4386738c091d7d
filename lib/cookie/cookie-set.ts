import type { CookieFields, CookieSet } from '../types/cookie';

function freezeSet(fields: Map<string, string>, sourceRaw: string, observedAt?: Date): CookieSet {
  const frozenFields: CookieFields = Object.freeze(Object.fromEntries(fields));
  const set: CookieSet = observedAt
    ? { fields: frozenFields, observedAt: new Date(observedAt.getTime()), sourceRaw }
    : { fields: frozenFields, sourceRaw };
  return Object.freeze(set);
}

function splitSegment(segment: string): [string, string] | null {
  const trimmed = segment.trim();
  const eq = trimmed.indexOf('=');
  if (eq === -1) {
    return null;
  }
  const name = trimmed.slice(0, eq).trim();
  if (!name) {
    return null;
  }
  return [name, trimmed.slice(eq + 1).trim()];
}

/**
 * Parses `name=value; name2=value2`. Segments without `=` or with an empty
 * name are dropped; a repeated name keeps its last value.
 */
export function parse(raw: string): CookieSet {
  const fields = new Map<string, string>();
  for (const segment of raw.split(';')) {
    const pair = splitSegment(segment);
    if (!pair) {
      continue;
    }
    fields.set(pair[0], pair[1]);
  }
  return freezeSet(fields, raw);
}

export function serialize(set: CookieSet): string {
  return Object.keys(set.fields)
    .sort()
    .map((name) => `${name}=${set.fields[name]}`)
    .join('; ');
}

export function withObservedAt(set: CookieSet, observedAt: Date | undefined): CookieSet {
  return freezeSet(new Map(Object.entries(set.fields)), set.sourceRaw, observedAt);
}

function laterOf(a: Date | undefined, b: Date | undefined): Date | undefined {
  if (!a) {
    return b;
  }
  if (!b) {
    return a;
  }
  return b.getTime() >= a.getTime() ? b : a;
}

/** Overlays `incoming` on a copy of `base`; incoming values win. */
export function merge(base: CookieSet, incoming: CookieSet): CookieSet {
  const fields = new Map(Object.entries(base.fields));
  for (const [name, value] of Object.entries(incoming.fields)) {
    fields.set(name, value);
  }
  const merged = freezeSet(fields, '', laterOf(base.observedAt, incoming.observedAt));
  return freezeSet(fields, serialize(merged), merged.observedAt);
}

/**
 * Builds a set from raw `Set-Cookie` header values. Only the leading
 * `name=value` pair of each header is kept; attributes are ignored.
 */
export function parseSetCookieHeaders(headers: readonly string[], observedAt?: Date): CookieSet {
  const fields = new Map<string, string>();
  for (const header of headers) {
    const [first = ''] = header.split(';');
    const pair = splitSegment(first);
    if (pair) {
      fields.set(pair[0], pair[1]);
    }
  }
  return freezeSet(fields, headers.join('\n'), observedAt);
}

export function isEmptySet(set: CookieSet): boolean {
  return Object.keys(set.fields).length === 0;
}
