/**
 * Error types for the drift monitor
 *
 * Storage writes and configuration problems surface as thrown errors;
 * embedding and dispatch failures are recoverable and reported instead.
 */

export const DriftErrorCodes = {
  /** Configuration failed validation */
  CONFIG_ERROR: 'CONFIG_ERROR',
  /** SQLite read/write or connection failure */
  STORAGE_ERROR: 'STORAGE_ERROR',
  /** Embedding backend failed to produce a vector */
  EMBEDDING_ERROR: 'EMBEDDING_ERROR',
  /** Outbound alert delivery failed */
  DISPATCH_ERROR: 'DISPATCH_ERROR'
} as const;

export type DriftErrorCode = (typeof DriftErrorCodes)[keyof typeof DriftErrorCodes];

export class DriftMonitorError extends Error {
  public readonly code: DriftErrorCode;

  constructor(message: string, code: DriftErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DriftMonitorError';
    this.code = code;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

export class ConfigError extends DriftMonitorError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, DriftErrorCodes.CONFIG_ERROR);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export class StorageError extends DriftMonitorError {
  public readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super(
      `Storage operation '${operation}' failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      DriftErrorCodes.STORAGE_ERROR,
      { cause }
    );
    this.name = 'StorageError';
    this.operation = operation;
  }
}

export class EmbeddingError extends DriftMonitorError {
  constructor(message: string, cause?: unknown) {
    super(message, DriftErrorCodes.EMBEDDING_ERROR, { cause });
    this.name = 'EmbeddingError';
  }
}

export class DispatchError extends DriftMonitorError {
  public readonly url: string;
  public readonly statusCode: number | undefined;

  constructor(message: string, url: string, statusCode?: number, cause?: unknown) {
    super(message, DriftErrorCodes.DISPATCH_ERROR, { cause });
    this.name = 'DispatchError';
    this.url = url;
    this.statusCode = statusCode;
  }
}
