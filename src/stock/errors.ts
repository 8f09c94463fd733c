export type StockErrorKind =
  | 'DirectoryNotFound'
  | 'NoCsvFilesFound'
  | 'MalformedRow'
  | 'UnknownColumn'
  | 'OutputWriteFailure';

export class StockToolError extends Error {
  readonly kind: StockErrorKind;

  constructor(kind: StockErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = kind;
    this.kind = kind;
  }
}

export class DirectoryNotFoundError extends StockToolError {
  constructor(readonly directory: string) {
    super('DirectoryNotFound', `Directory not found: ${directory}`);
  }
}

export class NoCsvFilesFoundError extends StockToolError {
  constructor(readonly directory: string, readonly unreadable: number = 0) {
    super(
      'NoCsvFilesFound',
      unreadable > 0
        ? `No valid CSV files found in ${directory} (${unreadable} could not be read).`
        : `No CSV files found in ${directory}.`
    );
  }
}

export class MalformedRowError extends StockToolError {
  constructor(readonly file: string, readonly line: number, readonly reason: string) {
    super('MalformedRow', `${file}:${line}: ${reason}`);
  }
}

export class UnknownColumnError extends StockToolError {
  constructor(readonly column: string, accepted: readonly string[]) {
    super('UnknownColumn', `Column '${column}' not found. Expected one of: ${accepted.join(', ')}.`);
  }
}

export class OutputWriteFailureError extends StockToolError {
  constructor(readonly path: string, readonly code: string | undefined, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super('OutputWriteFailure', `Could not write ${path}: ${detail}`, { cause });
  }
}

/**
 * Message for anything thrown, typed or not
 */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/** Node system error code (ENOENT, EACCES...) when present */
export function errorCode(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
