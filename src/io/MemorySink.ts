import type { RowSink } from './RowSink';

export class MemorySink implements RowSink {
  header: string[] | null = null;
  readonly rows: string[][] = [];
  closed = false;

  writeHeader(columns: readonly string[]): void {
    this.header = [...columns];
  }

  writeRow(values: readonly string[]): void {
    this.rows.push([...values]);
  }

  close(): void {
    this.closed = true;
  }

  /** Rows keyed by header column, for readable assertions */
  records(): Array<Record<string, string>> {
    const header = this.header ?? [];
    return this.rows.map(values => Object.fromEntries(header.map((column, i) => [column, values[i] ?? ''])));
  }
}
