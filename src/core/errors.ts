/**
 * Base error for everything the loader raises on purpose.
 */
export class PipelineError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'PipelineError';
  }
}

/**
 * Source file could not be copied into the landing container.
 */
export class LoadError extends PipelineError {
  constructor(
    code: 'LOAD_FAILED' | 'SOURCE_NOT_FOUND' | 'SOURCE_UNREADABLE',
    public readonly table: string,
    public readonly sourcePath: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(code, `Load of "${table}" from ${sourcePath} failed: ${message}`, options);
    this.name = 'LoadError';
  }
}

/**
 * Landing rows could not be reconciled into the constrained container.
 */
export class MergeError extends PipelineError {
  constructor(
    code: 'MERGE_FAILED' | 'MERGE_CONSISTENCY',
    public readonly table: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(code, `Merge into "${table}" failed: ${message}`, options);
    this.name = 'MergeError';
  }
}

/**
 * Upstream data defect found while building or reading dimension history.
 */
export class IntegrityError extends PipelineError {
  constructor(
    code: 'INTEGRITY_OVERLAP' | 'INTEGRITY_DUPLICATE_START' | 'INTEGRITY_AMBIGUOUS_MATCH',
    public readonly key: string,
    message: string
  ) {
    super(code, message);
    this.name = 'IntegrityError';
  }
}

export class LedgerError extends PipelineError {
  constructor(
    code: 'LEDGER_WRITE_FAILED' | 'LEDGER_ALREADY_FINISHED',
    message: string,
    options?: { cause?: unknown }
  ) {
    super(code, message, options);
    this.name = 'LedgerError';
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string) {
    super('CONFIG_INVALID', message);
    this.name = 'ConfigError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/** Node's system errors carry a string `code` (ENOENT, EACCES...). */
export function systemErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
