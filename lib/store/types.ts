/**
 * Text store holding `key=value` settings. Implementations wrap every I/O
 * failure in `StoreAccessError` and reject unstorable values with
 * `StoreValueError`.
 */
export interface ConfigStore {
  /** Path or identifier shown in messages and errors. */
  readonly location: string;
  read(key: string): Promise<string | undefined>;
  /** Throws `StoreValueError` when `value` cannot be written under `key`. */
  assertStorable(key: string, value: string): void;
  write(key: string, value: string): Promise<void>;
  /** Snapshots the current content and returns the backup's path. */
  backup(key: string): Promise<string>;
  /** Best effort; returns how many backups were removed. */
  pruneBackups(keep: number): Promise<number>;
}
