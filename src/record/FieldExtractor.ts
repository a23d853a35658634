import { UnexpectedStructureError } from '../errors';
import { findChild, findDescendant, ParsedNode } from '../xml/XmlRecordParser';

/** Integer when the source text is a decimal integer; otherwise the raw text ("" when absent). */
export type NumericField = number | string;

export interface FixedFields {
  EventID: NumericField;
  EventIDQualifiers: string;
  Version: NumericField;
  TimeCreated: string;
  Channel: string;
  Computer: string;
  Level: NumericField;
  LevelText: string;
  Task: NumericField;
  Opcode: NumericField;
  /** Bitmask as written, e.g. 0x8020000000000000 */
  Keywords: string;
  Provider: string;
  ProviderGUID: string;
  EventRecordID: NumericField;
  Correlation_ActivityID: string;
  Correlation_RelatedActivityID: string;
  ProcessID: NumericField;
  ThreadID: NumericField;
  UserID: string;
}

export type FixedColumn = keyof FixedFields;

export const FIXED_COLUMNS: readonly FixedColumn[] = [
  'EventID',
  'EventIDQualifiers',
  'Version',
  'TimeCreated',
  'Channel',
  'Computer',
  'Level',
  'LevelText',
  'Task',
  'Opcode',
  'Keywords',
  'Provider',
  'ProviderGUID',
  'EventRecordID',
  'Correlation_ActivityID',
  'Correlation_RelatedActivityID',
  'ProcessID',
  'ThreadID',
  'UserID',
];

export const LEVEL_NAMES: Readonly<Record<number, string>> = {
  0: 'LogAlways',
  1: 'Critical',
  2: 'Error',
  3: 'Warning',
  4: 'Information',
  5: 'Verbose',
};

export type StructureReporter = (issue: UnexpectedStructureError) => void;

const INTEGER = /^\d+$/;

/** Label for a level; unknown numeric levels map to their own decimal string. */
export function levelText(level: NumericField): string {
  if (typeof level === 'number') return LEVEL_NAMES[level] ?? String(level);
  return level;
}

function textOf(node: ParsedNode | undefined): string {
  return node ? node.text.trim() : '';
}

function attrOf(node: ParsedNode | undefined, attr: string): string {
  return node?.attributes[attr]?.trim() ?? '';
}

function integerField(field: FixedColumn, raw: string, report?: StructureReporter): NumericField {
  if (raw === '') return '';
  if (INTEGER.test(raw)) {
    const n = Number(raw);
    if (Number.isSafeInteger(n)) return n;
  }
  report?.(new UnexpectedStructureError(field, raw));
  return raw;
}

/**
 * Read the fixed System header of a record. Missing elements and attributes
 * come back as empty strings; values of the wrong shape are reported and kept as written.
 */
export function extractFixedFields(root: ParsedNode, report?: StructureReporter): FixedFields {
  const system = findChild(root, 'System') ?? root;
  const find = (name: string) => findDescendant(system, name);

  const eventIdEl = find('EventID');
  const providerEl = find('Provider');
  const correlationEl = find('Correlation');
  const executionEl = find('Execution');

  const level = integerField('Level', textOf(find('Level')), report);

  return {
    EventID: integerField('EventID', textOf(eventIdEl), report),
    EventIDQualifiers: attrOf(eventIdEl, 'Qualifiers'),
    Version: integerField('Version', textOf(find('Version')), report),
    TimeCreated: attrOf(find('TimeCreated'), 'SystemTime'),
    Channel: textOf(find('Channel')),
    Computer: textOf(find('Computer')),
    Level: level,
    LevelText: levelText(level),
    Task: integerField('Task', textOf(find('Task')), report),
    Opcode: integerField('Opcode', textOf(find('Opcode')), report),
    Keywords: textOf(find('Keywords')),
    Provider: attrOf(providerEl, 'Name'),
    ProviderGUID: attrOf(providerEl, 'Guid'),
    EventRecordID: integerField('EventRecordID', textOf(find('EventRecordID')), report),
    Correlation_ActivityID: attrOf(correlationEl, 'ActivityID'),
    Correlation_RelatedActivityID: attrOf(correlationEl, 'RelatedActivityID'),
    ProcessID: integerField('ProcessID', attrOf(executionEl, 'ProcessID'), report),
    ThreadID: integerField('ThreadID', attrOf(executionEl, 'ThreadID'), report),
    UserID: attrOf(find('Security'), 'UserID'),
  };
}

/** Fixed fields as ordered string columns. */
export function fixedFieldsToColumns(fields: FixedFields): Array<[FixedColumn, string]> {
  return FIXED_COLUMNS.map(column => [column, String(fields[column])]);
}
