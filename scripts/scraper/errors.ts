export type NavigationFailureKind = 'timeout' | 'network';

export class NavigationError extends Error {
  readonly kind: NavigationFailureKind;
  readonly url: string;

  constructor(url: string, kind: NavigationFailureKind, cause?: unknown) {
    super(`Navigation ${kind === 'timeout' ? 'timed out' : 'failed'}: ${url}`, { cause });
    this.name = 'NavigationError';
    this.kind = kind;
    this.url = url;
  }
}

export class PersistenceError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'PersistenceError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const errorMessage = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);
