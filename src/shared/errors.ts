export class FeedloomError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'FeedloomError';
  }
}

export class ConfigError extends FeedloomError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export class DbError extends FeedloomError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DB_ERROR', details);
    this.name = 'DbError';
  }
}

export class RecordError extends FeedloomError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'RECORD_ERROR', details);
    this.name = 'RecordError';
  }
}

export class SourceError extends FeedloomError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SOURCE_ERROR', details);
    this.name = 'SourceError';
  }
}

export class FetchError extends FeedloomError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'FETCH_ERROR', details);
    this.name = 'FetchError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
