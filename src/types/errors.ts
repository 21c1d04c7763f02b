export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class CatalogError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CatalogError';
  }
}

// Error envelope returned by the Last.fm API ({ error, message }).
export class LastfmApiError extends Error {
  public readonly code: number;
  constructor(code: number, message: string) {
    super(`Last.fm error ${code}: ${message}`);
    this.name = 'LastfmApiError';
    this.code = code;
  }
}

// Failure worth another attempt. retryAfterSeconds is set when the server asked us to wait.
export class RetryableError extends Error {
  public readonly retryAfterSeconds?: number;
  public readonly status?: number;
  constructor(message: string, options?: { retryAfterSeconds?: number; status?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'RetryableError';
    this.retryAfterSeconds = options?.retryAfterSeconds;
    this.status = options?.status;
  }
}

export class FatalError extends Error {
  public readonly status?: number;
  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'FatalError';
    this.status = options?.status;
  }
}

export class CancelledError extends Error {
  constructor(message = 'Operation cancelled.') {
    super(message);
    this.name = 'CancelledError';
  }
}

export class InvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantError';
  }
}
