export type StoreOperation = 'read' | 'write' | 'backup' | 'lock';

export class StoreAccessError extends Error {
  public readonly status: number = 500;

  public readonly path: string;

  public readonly operation: StoreOperation;

  /** errno code of the underlying failure, e.g. ENOENT or EACCES. */
  public readonly code?: string;

  constructor(operation: StoreOperation, filePath: string, cause?: unknown) {
    const detail = cause instanceof Error ? cause.message : cause === undefined ? 'unknown error' : String(cause);
    super(`Cookie store ${operation} failed for ${filePath}: ${detail}`, { cause });
    this.name = 'StoreAccessError';
    this.path = filePath;
    this.operation = operation;
    if (cause && typeof cause === 'object' && 'code' in cause && typeof cause.code === 'string') {
      this.code = cause.code;
    }
  }
}

export class StoreLockedError extends StoreAccessError {
  public readonly status = 409;

  constructor(lockPath: string) {
    super('lock', lockPath, 'cookie store is locked by another process, retry later');
    this.name = 'StoreLockedError';
  }
}

/** The store cannot hold the value as given; nothing was touched. */
export class StoreValueError extends Error {
  public readonly status = 422;

  public readonly key: string;

  constructor(key: string, reason: string) {
    super(`Cannot store ${key}: ${reason}`);
    this.name = 'StoreValueError';
    this.key = key;
  }
}

export class ConfigurationError extends Error {
  public readonly variable: string;

  constructor(variable: string, message: string) {
    super(message);
    this.name = 'ConfigurationError';
    this.variable = variable;
  }
}
