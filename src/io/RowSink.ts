/** Receives the header once, then one value list per record, then `close`. */
export interface RowSink {
  writeHeader(columns: readonly string[]): void | Promise<void>;
  writeRow(values: readonly string[]): void | Promise<void>;
  close(): void | Promise<void>;
}
