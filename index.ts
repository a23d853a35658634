import { parseRecordXml, serializeNode, findChild, findDescendant } from './src/xml/XmlRecordParser';
import { extractFixedFields, fixedFieldsToColumns, levelText, FIXED_COLUMNS, LEVEL_NAMES } from './src/record/FieldExtractor';
import { flattenPayload, canonicalHex } from './src/record/PayloadFlattener';
import { flattenRecord, BASE_COLUMNS, PARSE_ERROR_COLUMN } from './src/record/RecordFlattener';
import { UnifiedSchema } from './src/schema/UnifiedSchema';
import { assembleRow } from './src/schema/RowAssembler';
import { BatchConverter, convertBatch } from './src/convert/BatchConverter';
import { convertRecords, convertFile, convertFolder } from './src/convert/convert';
import { fromXmlStrings } from './src/io/RecordSource';
import { XmlExportFile, splitEventXml } from './src/io/XmlExportFile';
import { CsvSink, escapeCsvField, formatCsvLine } from './src/io/CsvSink';
import { MemorySink } from './src/io/MemorySink';
import { resolveOptions } from './src/options';
import {
  MalformedRecordError,
  UnexpectedStructureError,
  SchemaInconsistencyWarning,
  SchemaFrozenError,
  RecordSourceError,
  ConversionAbortedError,
} from './src/errors';

// Core
export { parseRecordXml, serializeNode, findChild, findDescendant };
export { extractFixedFields, fixedFieldsToColumns, levelText, FIXED_COLUMNS, LEVEL_NAMES };
export { flattenPayload, canonicalHex };
export { flattenRecord, BASE_COLUMNS, PARSE_ERROR_COLUMN };
export { UnifiedSchema, assembleRow };
export { BatchConverter, convertBatch };

// Sources, sinks and drivers
export { convertRecords, convertFile, convertFolder };
export { fromXmlStrings, XmlExportFile, splitEventXml };
export { CsvSink, escapeCsvField, formatCsvLine, MemorySink };
export { resolveOptions };

export {
  MalformedRecordError,
  UnexpectedStructureError,
  SchemaInconsistencyWarning,
  SchemaFrozenError,
  RecordSourceError,
  ConversionAbortedError,
};

export type { ParsedNode, ParseResult } from './src/xml/XmlRecordParser';
export type { FixedFields, FixedColumn, NumericField } from './src/record/FieldExtractor';
export type { PayloadFields, FlattenPayloadOptions } from './src/record/PayloadFlattener';
export type { FlatRow, FlattenResult } from './src/record/RecordFlattener';
export type { FrozenSchema } from './src/schema/UnifiedSchema';
export type { BatchResult, RecordFailure, StructureIssue } from './src/convert/BatchConverter';
export type { ConversionResult } from './src/convert/convert';
export type { RecordSource } from './src/io/RecordSource';
export type { RowSink } from './src/io/RowSink';
export type { CsvSinkOptions } from './src/io/CsvSink';
export type {
  ConvertOptions,
  FileConvertOptions,
  ConvertProgress,
  ConversionStrategy,
  MalformedRecordPolicy,
} from './src/options';

// Logging API (silent by default; consumer-configurable)
export { setLogger, getLogger, ConsoleLogger, MemoryLogger, withMinLevel, parseLogLevel } from './src/logging/logger';
export type { Logger, LogLevel, LogEntry } from './src/logging/logger';
