import * as fs from 'fs';
import { once } from 'events';
import type { RowSink } from './RowSink';

export interface CsvSinkOptions {
  /** Prefix output with a UTF-8 byte order mark */
  bom?: boolean;
  delimiter?: string;
  lineTerminator?: string;
}

export function escapeCsvField(value: string, delimiter: string = ','): string {
  const needsQuotes =
    value.includes(delimiter) ||
    value.includes('"') ||
    value.includes('\n') ||
    value.includes('\r') ||
    value !== value.trim();
  return needsQuotes ? `"${value.replace(/"/g, '""')}"` : value;
}

export function formatCsvLine(values: readonly string[], delimiter: string = ','): string {
  return values.map(v => escapeCsvField(v, delimiter)).join(delimiter);
}

/** Writes rows as CSV to a stream, honouring back-pressure. */
export class CsvSink implements RowSink {
  private readonly delimiter: string;
  private readonly lineTerminator: string;
  private readonly bom: boolean;
  private _error: Error | null = null;
  private _closed = false;

  constructor(
    private readonly out: NodeJS.WritableStream,
    options: CsvSinkOptions = {},
    private readonly ownsStream: boolean = false,
  ) {
    this.delimiter = options.delimiter ?? ',';
    this.lineTerminator = options.lineTerminator ?? '\r\n';
    this.bom = options.bom ?? false;
    this.out.on('error', (err: Error) => { this._error = err; });
  }

  /** Open `filePath` for writing; rejects when the file cannot be created. */
  static async toFile(filePath: string, options: CsvSinkOptions = {}): Promise<CsvSink> {
    const stream = fs.createWriteStream(filePath, { encoding: 'utf8' });
    await once(stream, 'open');
    return new CsvSink(stream, { ...options, bom: options.bom ?? true }, true);
  }

  async writeHeader(columns: readonly string[]): Promise<void> {
    await this.write((this.bom ? '\uFEFF' : '') + formatCsvLine(columns, this.delimiter) + this.lineTerminator);
  }

  async writeRow(values: readonly string[]): Promise<void> {
    await this.write(formatCsvLine(values, this.delimiter) + this.lineTerminator);
  }

  async close(): Promise<void> {
    if (this._closed) return;
    this._closed = true;
    if (!this.ownsStream) return;
    if (this._error) throw this._error;
    const finished = once(this.out, 'finish');
    this.out.end();
    await finished;
  }

  private async write(chunk: string): Promise<void> {
    if (this._error) throw this._error;
    if (!this.out.write(chunk)) await once(this.out, 'drain');
  }
}
