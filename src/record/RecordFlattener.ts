import { MalformedRecordError, UnexpectedStructureError } from '../errors';
import { parseRecordXml } from '../xml/XmlRecordParser';
import { extractFixedFields, FIXED_COLUMNS, fixedFieldsToColumns } from './FieldExtractor';
import { flattenPayload } from './PayloadFlattener';

export const EVENT_DATA_COLUMN = 'EventData';
export const USER_DATA_RAW_COLUMN = 'UserData_Raw';
export const BINARY_COLUMN = 'Binary';
export const PARSE_ERROR_COLUMN = 'ParseError';

/** Columns every row has, in header order. Dynamic columns follow. */
export const BASE_COLUMNS: readonly string[] = [
  ...FIXED_COLUMNS,
  EVENT_DATA_COLUMN,
  USER_DATA_RAW_COLUMN,
  BINARY_COLUMN,
];

/** One record, flattened. Column order: base columns, then dynamic columns as produced. */
export type FlatRow = ReadonlyMap<string, string>;

export type FlattenResult =
  | { ok: true; row: FlatRow; issues: UnexpectedStructureError[] }
  | { ok: false; error: MalformedRecordError };

export interface FlattenRecordOptions {
  maxUserDataDepth?: number;
}

export function flattenRecord(xml: string, options: FlattenRecordOptions = {}): FlattenResult {
  const parsed = parseRecordXml(xml);
  if (!parsed.ok) return parsed;

  const issues: UnexpectedStructureError[] = [];
  const report = (issue: UnexpectedStructureError) => { issues.push(issue); };

  try {
    const fixed = extractFixedFields(parsed.root, report);
    const payload = flattenPayload(parsed.root, { maxUserDataDepth: options.maxUserDataDepth, report });

    const row = new Map<string, string>(fixedFieldsToColumns(fixed));
    row.set(EVENT_DATA_COLUMN, payload.eventDataSummary);
    row.set(USER_DATA_RAW_COLUMN, payload.userDataRaw);
    row.set(BINARY_COLUMN, payload.binary);
    for (const [column, value] of payload.dynamic) row.set(column, value);
    return { ok: true, row, issues };
  } catch (err) {
    // e.g. the stack running out while re-serializing an extremely deep UserData
    const reason = err instanceof Error ? err.message : String(err);
    return { ok: false, error: new MalformedRecordError(0, `Cannot flatten record: ${reason}`, err) };
  }
}

/** Placeholder row kept for a malformed record when the job is told to emit them. */
export function malformedRow(error: MalformedRecordError): FlatRow {
  return new Map([[PARSE_ERROR_COLUMN, error.message]]);
}
