import * as fs from 'fs';
import path from 'path';
import { RecordSourceError } from '../errors';
import type { RecordSource } from './RecordSource';

const EVENT_END = '</Event>';

/**
 * Cut an XML export into one string per `<Event>` element. Anything before the
 * first event (declaration, `<Events>` wrapper) and after the last `</Event>` is
 * dropped. A truncated event stays a record of its own and never absorbs the next one.
 */
export function splitEventXml(text: string): string[] {
  const starts: number[] = [];
  // `<Event>` or `<Event xmlns=...>`, never `<Events>`, `<EventData>`, `<EventID>`
  const re = /<Event(?=[\s>/])/g;
  let m: RegExpExecArray | null;
  while ((m = re.exec(text)) !== null) starts.push(m.index);

  const records: string[] = [];
  for (let i = 0; i < starts.length; i++) {
    const chunk = text.slice(starts[i], i + 1 < starts.length ? starts[i + 1] : text.length);
    const end = chunk.lastIndexOf(EVENT_END);
    records.push(end === -1 ? chunk.trim() : chunk.slice(0, end + EVENT_END.length));
  }
  return records;
}

/** Decode an export as written by Event Viewer (UTF-16LE with BOM) or wevtutil (UTF-8). */
export function decodeExport(buffer: Buffer): string {
  if (buffer.length >= 2 && buffer[0] === 0xff && buffer[1] === 0xfe) {
    return buffer.subarray(2).toString('utf16le');
  }
  if (buffer.length >= 3 && buffer[0] === 0xef && buffer[1] === 0xbb && buffer[2] === 0xbf) {
    return buffer.subarray(3).toString('utf8');
  }
  return buffer.toString('utf8');
}

export class XmlExportFile implements RecordSource {
  private readonly _records: readonly string[];

  private constructor(text: string, readonly sourcePath?: string) {
    this._records = splitEventXml(text);
  }

  /** Number of `<Event>` elements found */
  get count(): number {
    return this._records.length;
  }

  get name(): string {
    return this.sourcePath ? path.basename(this.sourcePath) : '<memory>';
  }

  *records(): Generator<string> {
    yield* this._records;
  }

  static fromString(text: string, sourcePath?: string): XmlExportFile {
    return new XmlExportFile(text, sourcePath);
  }

  /** Factory method to read an export from disk */
  static async open(filePath: string): Promise<XmlExportFile> {
    let buffer: Buffer;
    try {
      buffer = await fs.promises.readFile(filePath);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new RecordSourceError(`Cannot read event export ${filePath}: ${reason}`, filePath, err);
    }
    return new XmlExportFile(decodeExport(buffer), filePath);
  }
}
