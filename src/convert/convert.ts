import { promises as fsp } from 'fs';
import path from 'path';
import { ConversionAbortedError, describeError, SchemaInconsistencyWarning } from '../errors';
import { CsvSink } from '../io/CsvSink';
import type { RecordSource } from '../io/RecordSource';
import type { RowSink } from '../io/RowSink';
import { XmlExportFile } from '../io/XmlExportFile';
import { getLogger } from '../logging/logger';
import type { ConvertOptions, FileConvertOptions } from '../options';
import { BatchConverter, RecordFailure, StructureIssue } from './BatchConverter';

const _log = getLogger('convert');

export interface ConversionResult {
  header: readonly string[];
  /** Records read from the source, malformed ones included */
  recordCount: number;
  rowsWritten: number;
  failures: RecordFailure[];
  issues: StructureIssue[];
  warnings: SchemaInconsistencyWarning[];
}

async function emitRows(converter: BatchConverter, source: RecordSource, sink: RowSink): Promise<number> {
  let rowsWritten = 0;
  if (converter.options.strategy === 'cache') {
    for (const values of converter.rows()) {
      converter.checkpoint('emit', rowsWritten);
      await sink.writeRow(values);
      rowsWritten++;
    }
    return rowsWritten;
  }

  let second = 0;
  for await (const xml of source.records()) {
    converter.checkpoint('emit', second);
    const values = converter.reassemble(xml, second++);
    if (!values) continue;
    await sink.writeRow(values);
    rowsWritten++;
  }
  converter.verifySecondPass(second);
  return rowsWritten;
}

/**
 * Two passes over `source`: discover the header, then write every row against it.
 * The sink is closed whether or not the job completes; a failed job rejects with
 * its own error, not with one raised while closing.
 */
export async function convertRecords(
  source: RecordSource,
  sink: RowSink,
  options: ConvertOptions = {},
): Promise<ConversionResult> {
  const converter = new BatchConverter(options);
  let result: ConversionResult;

  try {
    let index = 0;
    for await (const xml of source.records()) {
      converter.checkpoint('discover', index);
      converter.observe(xml, index++);
    }
    const schema = converter.finish();
    _log.debug(`Discovered ${schema.columns.length} columns over ${converter.observed} records`);

    await sink.writeHeader(schema.columns);
    const rowsWritten = await emitRows(converter, source, sink);
    converter.options.onProgress?.({ phase: 'emit', current: rowsWritten, total: converter.observed });

    result = {
      header: schema.columns,
      recordCount: converter.observed,
      rowsWritten,
      failures: converter.failures,
      issues: converter.issues,
      warnings: converter.warnings,
    };
  } catch (err) {
    try {
      await sink.close();
    } catch (closeErr) {
      _log.warn(`Closing the output after a failed conversion also failed: ${describeError(closeErr)}`);
    }
    throw err;
  }

  await sink.close();
  return result;
}

/** Convert one XML event export into one CSV file. */
export async function convertFile(
  inputPath: string,
  outputPath: string,
  options: FileConvertOptions = {},
): Promise<ConversionResult> {
  _log.info(`Reading ${inputPath}`);
  const source = await XmlExportFile.open(inputPath);
  const sink = await CsvSink.toFile(outputPath, { bom: options.bom });
  const result = await convertRecords(source, sink, options);
  _log.info(`Wrote ${result.rowsWritten} rows to ${outputPath}`);
  if (result.failures.length) {
    _log.warn(`${result.failures.length} malformed record(s) in ${inputPath}`);
  }
  return result;
}

export const EXPORT_EXTENSION = '.xml';

/**
 * Convert every `.xml` export of a folder into `<name>.csv` under `outputDir`.
 * Returns rows written per input file name, -1 for a file that failed.
 */
export async function convertFolder(
  inputDir: string,
  outputDir: string,
  options: FileConvertOptions = {},
): Promise<Record<string, number>> {
  const results: Record<string, number> = {};
  const entries = await fsp.readdir(inputDir, { withFileTypes: true });
  const files = entries
    .filter(e => e.isFile() && path.extname(e.name).toLowerCase() === EXPORT_EXTENSION)
    .map(e => e.name)
    .sort();

  if (!files.length) {
    _log.info(`No ${EXPORT_EXTENSION} exports found in ${inputDir}`);
    return results;
  }
  await fsp.mkdir(outputDir, { recursive: true });

  for (const file of files) {
    const csvPath = path.join(outputDir, `${path.parse(file).name}.csv`);
    try {
      const result = await convertFile(path.join(inputDir, file), csvPath, options);
      results[file] = result.rowsWritten;
    } catch (err) {
      if (err instanceof ConversionAbortedError) throw err;
      _log.error(`Failed to convert ${file}: ${describeError(err)}`);
      results[file] = -1;
    }
  }
  return results;
}
