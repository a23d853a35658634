import { UnexpectedStructureError } from '../errors';
import { getLogger } from '../logging/logger';
import { findChild, findDescendant, ParsedNode, serializeNode } from '../xml/XmlRecordParser';
import type { StructureReporter } from './FieldExtractor';

const _log = getLogger('flatten');

export const DATA_PREFIX = 'Data_';
export const USER_DATA_PREFIX = 'UD_';
export const PATH_SEPARATOR = '_';
export const SUMMARY_SEPARATOR = ' | ';
export const DEFAULT_MAX_USER_DATA_DEPTH = 32;

export interface PayloadFields {
  /** Data_* and UD_* columns in the order they were produced */
  dynamic: Map<string, string>;
  /** `name=value` / `index=value` pairs of EventData, document order */
  eventDataSummary: string;
  /** The UserData element as XML, "" when absent */
  userDataRaw: string;
  /** Uppercase hex, "" when absent */
  binary: string;
}

export interface FlattenPayloadOptions {
  maxUserDataDepth?: number;
  report?: StructureReporter;
}

const HEX_BYTES = /^(?:[0-9a-fA-F]{2})*$/;

/** Canonical uppercase hex for the content of a Binary element. */
export function canonicalHex(text: string, report?: StructureReporter): string {
  const compact = text.replace(/\s+/g, '');
  if (compact === '') return '';
  if (HEX_BYTES.test(compact)) {
    return Buffer.from(compact, 'hex').toString('hex').toUpperCase();
  }
  report?.(new UnexpectedStructureError('Binary', compact));
  return text.trim();
}

function freeKey(dynamic: Map<string, string>, key: string): string {
  if (!dynamic.has(key)) return key;
  let i = 2;
  while (dynamic.has(`${key}${PATH_SEPARATOR}${i}`)) i++;
  return `${key}${PATH_SEPARATOR}${i}`;
}

function flattenEventData(eventData: ParsedNode, dynamic: Map<string, string>): string {
  const parts: string[] = [];
  // a repeated Name overwrites its own column only, never a positional one
  const named = new Map<string, string>();
  let unnamed = 0;
  for (const child of eventData.children) {
    // Binary rides alongside the Data items but has its own column
    if (child.localName === 'Binary') continue;
    const value = child.text.trim();
    const name = child.attributes['Name']?.trim() ?? '';
    if (name) {
      const column = named.get(name) ?? freeKey(dynamic, `${DATA_PREFIX}${name}`);
      named.set(name, column);
      dynamic.set(column, value);
      parts.push(`${name}=${value}`);
    } else {
      dynamic.set(freeKey(dynamic, `${DATA_PREFIX}${unnamed}`), value);
      parts.push(`${unnamed}=${value}`);
      unnamed++;
    }
  }
  return parts.join(SUMMARY_SEPARATOR);
}

/** Path segment per child: repeated tags under one parent become Tag, Tag_2, Tag_3, ... */
function segmentNames(children: readonly ParsedNode[]): string[] {
  const seen = new Map<string, number>();
  return children.map(child => {
    const n = (seen.get(child.localName) ?? 0) + 1;
    seen.set(child.localName, n);
    return n === 1 ? child.localName : `${child.localName}${PATH_SEPARATOR}${n}`;
  });
}

function isNamespaceDeclaration(attr: string): boolean {
  return attr === 'xmlns' || attr.startsWith('xmlns:');
}

interface Frame {
  node: ParsedNode;
  path: string[];
}

function flattenUserData(userData: ParsedNode, dynamic: Map<string, string>, maxDepth: number): void {
  const stack: Frame[] = [];
  const pushChildren = (children: readonly ParsedNode[], base: string[]) => {
    const names = segmentNames(children);
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push({ node: children[i], path: [...base, names[i]] });
    }
  };

  // The event-specific wrapper under UserData does not take part in the column path.
  const topNames = segmentNames(userData.children);
  for (let i = userData.children.length - 1; i >= 0; i--) {
    const top = userData.children[i];
    if (top.children.length) pushChildren(top.children, []);
    else stack.push({ node: top, path: [topNames[i]] });
  }

  while (stack.length) {
    const frame = stack.pop();
    if (!frame) break;
    const { node, path } = frame;
    if (path.length > maxDepth) {
      _log.debug(`UserData path ${path.slice(0, 3).join(PATH_SEPARATOR)}... exceeds ${maxDepth} segments; kept in UserData_Raw only`);
      continue;
    }

    const isLeaf = node.children.length === 0;
    const base = `${USER_DATA_PREFIX}${path.join(PATH_SEPARATOR)}`;
    const column = isLeaf ? freeKey(dynamic, base) : base;
    if (isLeaf) dynamic.set(column, node.text.trim());
    for (const [attr, value] of Object.entries(node.attributes)) {
      if (isNamespaceDeclaration(attr)) continue;
      dynamic.set(freeKey(dynamic, `${column}${PATH_SEPARATOR}${attr}`), value);
    }
    if (!isLeaf) pushChildren(node.children, path);
  }
}

/**
 * Flatten the variable part of a record (EventData, UserData, Binary) into
 * dynamically named string columns.
 */
export function flattenPayload(root: ParsedNode, options: FlattenPayloadOptions = {}): PayloadFields {
  const maxDepth = options.maxUserDataDepth ?? DEFAULT_MAX_USER_DATA_DEPTH;
  const dynamic = new Map<string, string>();

  const eventData = findChild(root, 'EventData');
  const eventDataSummary = eventData ? flattenEventData(eventData, dynamic) : '';

  const userData = findChild(root, 'UserData');
  let userDataRaw = '';
  if (userData) {
    flattenUserData(userData, dynamic, maxDepth);
    userDataRaw = serializeNode(userData);
  }

  const binaryEl = (eventData && findChild(eventData, 'Binary')) ?? findDescendant(root, 'Binary');
  const binary = binaryEl ? canonicalHex(binaryEl.text, options.report) : '';

  return { dynamic, eventDataSummary, userDataRaw, binary };
}
