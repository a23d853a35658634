export class MalformedRecordError extends Error {
  constructor(
    public readonly recordIndex: number,
    message: string = 'Malformed record',
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = 'MalformedRecordError';
  }

  /** Same failure, re-attributed to a position in the batch. */
  at(recordIndex: number): MalformedRecordError {
    return new MalformedRecordError(recordIndex, this.message, this.cause);
  }
}

/** A fixed field whose source text does not have the expected shape. Always recovered. */
export class UnexpectedStructureError extends Error {
  constructor(
    public readonly field: string,
    public readonly rawValue: string,
    message?: string,
  ) {
    super(message ?? `Unexpected value for ${field}: "${rawValue}"`);
    this.name = 'UnexpectedStructureError';
  }
}

/**
 * Informational signal: one record introduced an unusually large number of columns.
 * Never thrown.
 */
export class SchemaInconsistencyWarning {
  readonly name = 'SchemaInconsistencyWarning';
  constructor(
    public readonly recordIndex: number,
    public readonly newColumns: readonly string[],
  ) {}

  get message(): string {
    return `Record ${this.recordIndex} added ${this.newColumns.length} new columns`;
  }
}

export class SchemaFrozenError extends Error {
  constructor(public readonly columns: readonly string[]) {
    super(`Schema is frozen; cannot add columns: ${columns.join(', ')}`);
    this.name = 'SchemaFrozenError';
  }
}

export class RecordSourceError extends Error {
  constructor(
    message: string,
    public readonly sourcePath?: string,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = 'RecordSourceError';
  }
}

export class ConversionAbortedError extends Error {
  constructor(public readonly processed: number) {
    super(`Conversion aborted after ${processed} records`);
    this.name = 'ConversionAbortedError';
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
