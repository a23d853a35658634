import { MalformedRecordError } from '../src/errors';
import {
  findChild,
  findDescendant,
  localNameOf,
  parseRecordXml,
  ParsedNode,
  serializeNode,
} from '../src/xml/XmlRecordParser';
import { eventXml, TRUNCATED_EVENT } from './helpers';

function parseOk(xml: string): ParsedNode {
  const result = parseRecordXml(xml);
  if (!result.ok) throw result.error;
  return result.root;
}

describe('XmlRecordParser', () => {
  describe('parseRecordXml', () => {
    it('should build a tree with names, attributes and text', () => {
      const root = parseOk(eventXml({ eventId: 4624, data: [['IpAddress', '10.0.0.1']] }));
      expect(root.localName).toBe('Event');
      expect(root.children.map(c => c.localName)).toEqual(['System', 'EventData']);

      const data = findDescendant(root, 'Data');
      expect(data?.attributes).toEqual({ Name: 'IpAddress' });
      expect(data?.text).toBe('10.0.0.1');
    });

    it('should keep values as strings', () => {
      const root = parseOk('<Event><System><EventID>0042</EventID><Keywords>0x8000000000000000</Keywords></System></Event>');
      expect(findDescendant(root, 'EventID')?.text).toBe('0042');
      expect(findDescendant(root, 'Keywords')?.text).toBe('0x8000000000000000');
    });

    it('should decode entities and trim text', () => {
      const root = parseOk('<Event><EventData><Data Name="Cmd">  a &amp; b &lt;c&gt;  </Data></EventData></Event>');
      expect(findDescendant(root, 'Data')?.text).toBe('a & b <c>');
    });

    it('should decode numeric character references', () => {
      const root = parseOk('<Event><EventData><Data Name="Msg">a&#10;b&#x41;&#9;c</Data></EventData></Event>');
      expect(findDescendant(root, 'Data')?.text).toBe('a\nbA\tc');
    });

    it('should parse records nested far deeper than a hundred levels', () => {
      const depth = 2000;
      const root = parseOk('<Event>' + '<N>'.repeat(depth) + 'leaf' + '</N>'.repeat(depth) + '</Event>');
      let node = root;
      let levels = 0;
      while (node.children.length) {
        node = node.children[0];
        levels++;
      }
      expect(levels).toBe(depth);
      expect(node.text).toBe('leaf');
    });

    it('should ignore the XML declaration', () => {
      const root = parseOk('<?xml version="1.0" encoding="utf-8"?><Event><System/></Event>');
      expect(root.name).toBe('Event');
    });

    it('should strip namespace prefixes from local names only', () => {
      const root = parseOk('<e:Event xmlns:e="urn:test"><e:System/></e:Event>');
      expect(root.name).toBe('e:Event');
      expect(root.localName).toBe('Event');
      expect(findChild(root, 'System')?.name).toBe('e:System');
    });

    it('should report truncated XML as a malformed record', () => {
      const result = parseRecordXml(TRUNCATED_EVENT);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(MalformedRecordError);
        expect(result.error.recordIndex).toBe(0);
      }
    });

    it('should report text that is not XML', () => {
      expect(parseRecordXml('not xml at all').ok).toBe(false);
    });

    it('should report empty input', () => {
      const result = parseRecordXml('   ');
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.message).toBe('Empty record');
    });
  });

  describe('lookups', () => {
    const root = parseOk('<A><B><C>1</C></B><C>2</C></A>');

    it('should find direct children only with findChild', () => {
      expect(findChild(root, 'C')?.text).toBe('2');
      expect(findChild(root, 'D')).toBeUndefined();
    });

    it('should find the first descendant in document order', () => {
      expect(findDescendant(root, 'C')?.text).toBe('1');
    });
  });

  describe('serializeNode', () => {
    it('should write a subtree back with attributes and qualified names', () => {
      const root = parseOk('<Event><UserData><x:Item xmlns:x="urn:x" id="7"><Value>v</Value></x:Item></UserData></Event>');
      const userData = findChild(root, 'UserData');
      expect(userData).toBeDefined();
      if (userData) {
        expect(serializeNode(userData)).toBe('<UserData><x:Item xmlns:x="urn:x" id="7"><Value>v</Value></x:Item></UserData>');
      }
    });
  });

  it('should escape text again when serializing', () => {
    const root = parseOk('<Event><UserData><M>a &amp; b &lt;c&gt;</M></UserData></Event>');
    const userData = findChild(root, 'UserData');
    expect(userData && serializeNode(userData)).toBe('<UserData><M>a &amp; b &lt;c&gt;</M></UserData>');
  });

  it('should split local names on the last colon', () => {
    expect(localNameOf('a:b')).toBe('b');
    expect(localNameOf('plain')).toBe('plain');
  });
});
