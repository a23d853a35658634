import {
  ConversionAbortedError,
  MalformedRecordError,
  RecordSourceError,
  SchemaInconsistencyWarning,
  UnexpectedStructureError,
} from '../errors';
import { getLogger } from '../logging/logger';
import { ConvertOptions, ConvertProgress, ResolvedConvertOptions, resolveOptions } from '../options';
import { BASE_COLUMNS, FlatRow, flattenRecord, malformedRow } from '../record/RecordFlattener';
import { assembleRow } from '../schema/RowAssembler';
import { FrozenSchema, UnifiedSchema } from '../schema/UnifiedSchema';

const _log = getLogger('batch');

export interface RecordFailure {
  index: number;
  error: MalformedRecordError;
}

export interface StructureIssue {
  index: number;
  issue: UnexpectedStructureError;
}

export interface BatchResult {
  header: readonly string[];
  rows: string[][];
  failures: RecordFailure[];
  issues: StructureIssue[];
  warnings: SchemaInconsistencyWarning[];
}

/**
 * One conversion job. Discovery (`observe`) must see every record, in order,
 * before anything is emitted; `finish` freezes the header.
 */
export class BatchConverter {
  readonly options: ResolvedConvertOptions;
  readonly failures: RecordFailure[] = [];
  readonly issues: StructureIssue[] = [];
  readonly warnings: SchemaInconsistencyWarning[] = [];

  private readonly _schema = new UnifiedSchema(BASE_COLUMNS);
  private readonly _cache: FlatRow[] = [];
  private _observed = 0;

  constructor(options: ConvertOptions = {}) {
    this.options = resolveOptions(options);
  }

  /** Records seen by the discovery pass */
  get observed(): number {
    return this._observed;
  }

  get schema(): UnifiedSchema {
    return this._schema;
  }

  /**
   * Called before each record of either pass: stops the job if the caller aborted
   * and reports progress every `progressInterval` records.
   */
  checkpoint(phase: ConvertProgress['phase'], current: number): void {
    if (this.options.signal?.aborted) throw new ConversionAbortedError(current);
    if (current > 0 && current % this.options.progressInterval === 0) {
      this.options.onProgress?.({ phase, current, total: phase === 'emit' ? this._observed : undefined });
    }
  }

  /** Discovery pass: flatten one record and fold its columns into the schema. */
  observe(xml: string, index: number = this._observed): void {
    this._observed++;
    const row = this.flatten(xml, index, true);
    if (!row) return;

    const added = this._schema.observe(row.keys());
    if (added.length >= this.options.newColumnWarningThreshold) {
      const warning = new SchemaInconsistencyWarning(index, added);
      this.warnings.push(warning);
      _log.info(warning.message);
    }
    if (this.options.strategy === 'cache') this._cache.push(row);
  }

  finish(): FrozenSchema {
    const schema = this._schema.freeze();
    this.options.onProgress?.({ phase: 'discover', current: this._observed });
    return schema;
  }

  /** Emit pass of the `cache` strategy: every kept row, in input order. */
  *rows(): Generator<string[]> {
    const schema = this._schema.freeze();
    for (const row of this._cache) yield assembleRow(row, schema);
  }

  /**
   * Emit pass of the `reparse` strategy: flatten the record again and align it.
   * Returns null for a malformed record that is being skipped.
   */
  reassemble(xml: string, index: number): string[] | null {
    const schema = this._schema.freeze();
    const row = this.flatten(xml, index, false);
    if (!row) return null;
    // a column the discovery pass never saw means the source changed between passes
    this._schema.observe(row.keys());
    return assembleRow(row, schema);
  }

  /** Both passes must have walked the same records. */
  verifySecondPass(count: number): void {
    if (count !== this._observed) {
      throw new RecordSourceError(`Record source yielded ${count} records on the second pass, expected ${this._observed}`);
    }
  }

  private flatten(xml: string, index: number, record: boolean): FlatRow | null {
    const result = flattenRecord(xml, { maxUserDataDepth: this.options.maxUserDataDepth });
    if (!result.ok) {
      const error = result.error.at(index);
      if (record) {
        this.failures.push({ index, error });
        _log.warn(`Record ${index} is malformed: ${error.message}`);
      }
      return this.options.malformedRecords === 'emit' ? malformedRow(error) : null;
    }
    if (record) {
      for (const issue of result.issues) {
        this.issues.push({ index, issue });
        _log.debug(`Record ${index}: ${issue.message}`);
      }
    }
    return result.row;
  }
}

/** Run a whole job in memory over an already available record sequence. */
export function convertBatch(records: Iterable<string>, options: ConvertOptions = {}): BatchResult {
  const converter = new BatchConverter(options);
  let index = 0;
  for (const xml of records) {
    converter.checkpoint('discover', index);
    converter.observe(xml, index++);
  }
  const schema = converter.finish();

  const rows: string[][] = [];
  if (converter.options.strategy === 'cache') {
    for (const values of converter.rows()) {
      converter.checkpoint('emit', rows.length);
      rows.push(values);
    }
  } else {
    let second = 0;
    for (const xml of records) {
      converter.checkpoint('emit', second);
      const values = converter.reassemble(xml, second++);
      if (values) rows.push(values);
    }
    converter.verifySecondPass(second);
  }

  return {
    header: schema.columns,
    rows,
    failures: converter.failures,
    issues: converter.issues,
    warnings: converter.warnings,
  };
}
