import path from 'path';
import { RecordSourceError } from '../src/errors';
import { decodeExport, splitEventXml, XmlExportFile } from '../src/io/XmlExportFile';
import { eventXml, TRUNCATED_EVENT } from './helpers';

describe('XmlExportFile', () => {
  describe('splitEventXml', () => {
    it('should cut an export into one string per event', () => {
      const a = eventXml({ recordId: 1 });
      const b = eventXml({ recordId: 2, data: [['A', '1']] });
      const text = `<?xml version="1.0"?>\n<Events>\n${a}\n${b}\n</Events>\n`;
      expect(splitEventXml(text)).toEqual([a, b]);
    });

    it('should not split on EventData or EventID tags', () => {
      const a = eventXml({ data: [['EventData', 'x']] });
      expect(splitEventXml(a)).toEqual([a]);
    });

    it('should keep a truncated event as its own record', () => {
      const next = eventXml({ recordId: 2 });
      expect(splitEventXml(`<Events>${TRUNCATED_EVENT}\n${next}</Events>`)).toEqual([TRUNCATED_EVENT, next]);
    });

    it('should find nothing in text without events', () => {
      expect(splitEventXml('<Events></Events>')).toEqual([]);
    });
  });

  describe('decodeExport', () => {
    it('should decode UTF-16LE with a byte order mark', () => {
      const xml = eventXml({ data: [['User', 'ÅSA']] });
      const buffer = Buffer.concat([Buffer.from([0xff, 0xfe]), Buffer.from(xml, 'utf16le')]);
      expect(decodeExport(buffer)).toBe(xml);
    });

    it('should drop a UTF-8 byte order mark', () => {
      const buffer = Buffer.concat([Buffer.from([0xef, 0xbb, 0xbf]), Buffer.from('<Events/>', 'utf8')]);
      expect(decodeExport(buffer)).toBe('<Events/>');
    });

    it('should read plain UTF-8', () => {
      expect(decodeExport(Buffer.from('<Events/>', 'utf8'))).toBe('<Events/>');
    });
  });

  it('should yield the same records on every pass', () => {
    const file = XmlExportFile.fromString(`<Events>${eventXml({ recordId: 1 })}${eventXml({ recordId: 2 })}</Events>`);
    expect(file.count).toBe(2);
    expect(file.name).toBe('<memory>');
    expect([...file.records()]).toEqual([...file.records()]);
  });

  it('should open an export from disk', async () => {
    const file = await XmlExportFile.open(path.join(__dirname, 'fixtures', 'Security.xml'));
    expect(file.count).toBe(3);
    expect(file.name).toBe('Security.xml');
  });

  it('should wrap read failures in a RecordSourceError', async () => {
    const missing = path.join(__dirname, 'fixtures', 'does-not-exist.xml');
    const err = await XmlExportFile.open(missing).then(
      () => null,
      (e: unknown) => e,
    );
    expect(err).toBeInstanceOf(RecordSourceError);
    if (err instanceof RecordSourceError) expect(err.sourcePath).toBe(missing);
  });
});
