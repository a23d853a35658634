import { XMLBuilder, XMLParser, XMLValidator } from 'fast-xml-parser';
import { MalformedRecordError } from '../errors';

const ATTRS_KEY = ':@';
const TEXT_KEY = '#text';
const ATTR_PREFIX = '@_';

/** One element of a parsed record. */
export interface ParsedNode {
  /** Tag as written, including any namespace prefix */
  readonly name: string;
  readonly localName: string;
  readonly attributes: Readonly<Record<string, string>>;
  /** Element children, document order */
  readonly children: readonly ParsedNode[];
  /** Element children and text runs, document order */
  readonly content: ReadonlyArray<ParsedNode | string>;
  /** The element's own text runs, concatenated */
  readonly text: string;
}

export type ParseResult =
  | { ok: true; root: ParsedNode }
  | { ok: false; error: MalformedRecordError };

// Records may nest far deeper than the library's default guard allows.
const MAX_NESTED_TAGS = 1000000;

// Values are never coerced: "0x8000000000000000" and "4624" stay strings.
// htmlEntities also decodes numeric references such as &#10; and &#x41;.
const parserOptions = {
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTR_PREFIX,
  textNodeName: TEXT_KEY,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  ignoreDeclaration: true,
  processEntities: true,
  htmlEntities: true,
  maxNestedTags: MAX_NESTED_TAGS,
};
const parser = new XMLParser(parserOptions);

const builder = new XMLBuilder({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTR_PREFIX,
  textNodeName: TEXT_KEY,
  suppressEmptyNode: true,
  processEntities: true,
});

export function localNameOf(name: string): string {
  const i = name.lastIndexOf(':');
  return i === -1 ? name : name.slice(i + 1);
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function scalarText(v: unknown): string {
  if (typeof v === 'string') return v;
  if (typeof v === 'number' || typeof v === 'boolean' || typeof v === 'bigint') return String(v);
  return '';
}

interface MutableNode {
  name: string;
  localName: string;
  attributes: Record<string, string>;
  children: ParsedNode[];
  content: Array<ParsedNode | string>;
  text: string;
}

interface PendingNode {
  node: MutableNode;
  body: readonly unknown[];
}

/** Element of an ordered parse result, without its body walked yet. */
function shallowNode(item: Record<string, unknown>): PendingNode | null {
  const name = Object.keys(item).find(k => k !== ATTRS_KEY);
  // processing instructions surface as '?target' entries
  if (!name || name === TEXT_KEY || name.startsWith('?')) return null;

  const attributes: Record<string, string> = {};
  const rawAttrs = item[ATTRS_KEY];
  if (isRecord(rawAttrs)) {
    for (const [key, value] of Object.entries(rawAttrs)) {
      const attrName = key.startsWith(ATTR_PREFIX) ? key.slice(ATTR_PREFIX.length) : key;
      attributes[attrName] = scalarText(value).trim();
    }
  }

  const body = item[name];
  return {
    node: { name, localName: localNameOf(name), attributes, children: [], content: [], text: '' },
    body: Array.isArray(body) ? body : [],
  };
}

function toTree(item: Record<string, unknown>): ParsedNode | null {
  const root = shallowNode(item);
  if (!root) return null;

  const stack: PendingNode[] = [root];
  while (stack.length) {
    const pending = stack.pop();
    if (!pending) break;
    const { node, body } = pending;
    for (const entry of body) {
      if (!isRecord(entry)) continue;
      if (TEXT_KEY in entry) {
        const run = scalarText(entry[TEXT_KEY]);
        node.content.push(run);
        node.text += run;
        continue;
      }
      const child = shallowNode(entry);
      if (!child) continue;
      node.children.push(child.node);
      node.content.push(child.node);
      stack.push(child);
    }
  }
  return root.node;
}

/**
 * Parse one record's XML. Never throws: unparseable input comes back as
 * `{ ok: false }` with a MalformedRecordError (record index 0; the batch
 * driver re-attributes it).
 */
export function parseRecordXml(xml: string): ParseResult {
  if (!xml || xml.trim().length === 0) {
    return { ok: false, error: new MalformedRecordError(0, 'Empty record') };
  }

  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { code, msg, line, col } = validation.err;
    return {
      ok: false,
      error: new MalformedRecordError(0, `${code}: ${msg} (line ${line}, column ${col})`, validation.err),
    };
  }

  try {
    const parsed: unknown = parser.parse(xml);
    if (Array.isArray(parsed)) {
      for (const item of parsed) {
        if (!isRecord(item)) continue;
        const root = toTree(item);
        if (root) return { ok: true, root };
      }
    }
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return { ok: false, error: new MalformedRecordError(0, `Unparseable record: ${reason}`, err) };
  }
  return { ok: false, error: new MalformedRecordError(0, 'Record has no root element') };
}

/** First direct child with the given local name. */
export function findChild(node: ParsedNode, localName: string): ParsedNode | undefined {
  return node.children.find(c => c.localName === localName);
}

/** First descendant (document order, excluding `node` itself) with the given local name. */
export function findDescendant(node: ParsedNode, localName: string): ParsedNode | undefined {
  const stack: ParsedNode[] = [...node.children].reverse();
  while (stack.length) {
    const current = stack.pop();
    if (!current) break;
    if (current.localName === localName) return current;
    for (let i = current.children.length - 1; i >= 0; i--) stack.push(current.children[i]);
  }
  return undefined;
}

type OrderedItem = Record<string, unknown>;

interface PendingItem {
  node: ParsedNode;
  body: unknown[];
}

function orderedShell(node: ParsedNode): { item: OrderedItem; body: unknown[] } {
  const body: unknown[] = [];
  const item: OrderedItem = { [node.name]: body };
  const names = Object.keys(node.attributes);
  if (names.length) {
    const attrs: Record<string, string> = {};
    for (const attr of names) attrs[ATTR_PREFIX + attr] = node.attributes[attr];
    item[ATTRS_KEY] = attrs;
  }
  return { item, body };
}

function toOrdered(node: ParsedNode): OrderedItem {
  const root = orderedShell(node);
  const stack: PendingItem[] = [{ node, body: root.body }];
  while (stack.length) {
    const pending = stack.pop();
    if (!pending) break;
    for (const part of pending.node.content) {
      if (typeof part === 'string') {
        pending.body.push({ [TEXT_KEY]: part });
        continue;
      }
      const child = orderedShell(part);
      pending.body.push(child.item);
      stack.push({ node: part, body: child.body });
    }
  }
  return root.item;
}

/**
 * Serialize a subtree back to XML text. Qualified names and attributes are kept as written;
 * text and attribute values are escaped again.
 */
export function serializeNode(node: ParsedNode): string {
  const xml: unknown = builder.build([toOrdered(node)]);
  return typeof xml === 'string' ? xml : '';
}
