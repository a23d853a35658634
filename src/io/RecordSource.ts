/**
 * Anything that yields one XML string per event record, in a stable order.
 * `records()` is called once per pass; the `reparse` strategy calls it twice and
 * expects the same sequence both times.
 */
export interface RecordSource {
  records(): Iterable<string> | AsyncIterable<string>;
}

/** Records already held in memory. */
export function fromXmlStrings(records: readonly string[]): RecordSource {
  return { records: () => records };
}
