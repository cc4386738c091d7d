import type { ConfigStore } from '../store/types';
import type { CookieSet } from '../types/cookie';
import { isEmptySet, merge, parseSetCookieHeaders, serialize } from './cookie-set';
import { persistIfChanged } from './persist';
import type { PersistOptions, PersistResult } from './persist';

export interface ObserveResult {
  current: CookieSet;
  changed: boolean;
}

/**
 * Tracks the cookies an API client holds. Each `Set-Cookie` batch is merged
 * over the current set; `flush` writes the result back to the store. Flushes
 * from one observer run one at a time.
 */
export class CookieObserver {
  private currentSet: CookieSet;

  private pending: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly store: ConfigStore,
    initial: CookieSet,
    private readonly persistOptions: PersistOptions = {},
  ) {
    this.currentSet = initial;
  }

  get current(): CookieSet {
    return this.currentSet;
  }

  observe(setCookieHeaders: readonly string[], now: Date = new Date()): ObserveResult {
    const incoming = parseSetCookieHeaders(setCookieHeaders, now);
    if (isEmptySet(incoming)) {
      return { current: this.currentSet, changed: false };
    }
    const next = merge(this.currentSet, incoming);
    const changed = serialize(next) !== serialize(this.currentSet);
    this.currentSet = next;
    return { current: next, changed };
  }

  flush(): Promise<PersistResult> {
    const snapshot = this.currentSet;
    const run = this.pending.then(() => persistIfChanged(this.store, snapshot, this.persistOptions));
    // keep the chain alive after a failed flush; the caller still sees the error
    this.pending = run.catch(() => undefined);
    return run;
  }
}
