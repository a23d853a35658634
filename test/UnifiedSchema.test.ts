import { SchemaFrozenError } from '../src/errors';
import { assembleRow } from '../src/schema/RowAssembler';
import { UnifiedSchema } from '../src/schema/UnifiedSchema';

describe('UnifiedSchema', () => {
  it('should keep first-seen order and ignore repeats', () => {
    const schema = new UnifiedSchema(['A', 'B']);
    expect(schema.observe(['B', 'C', 'A', 'D', 'C'])).toEqual(['C', 'D']);
    expect(schema.columns).toEqual(['A', 'B', 'C', 'D']);
    expect(schema.size).toBe(4);
    expect(schema.has('C')).toBe(true);
    expect(schema.has('E')).toBe(false);
  });

  it('should return the same frozen view every time', () => {
    const schema = new UnifiedSchema(['A']);
    const first = schema.freeze();
    expect(schema.isFrozen).toBe(true);
    expect(schema.freeze()).toBe(first);
    expect(first.frozen).toBe(true);
    expect(first.indexOf('A')).toBe(0);
    expect(first.indexOf('Z')).toBe(-1);
    expect(Object.isFrozen(first.columns)).toBe(true);
  });

  it('should accept known columns after freezing', () => {
    const schema = new UnifiedSchema(['A', 'B']);
    schema.freeze();
    expect(schema.observe(['B', 'A'])).toEqual([]);
  });

  it('should reject new columns after freezing', () => {
    const schema = new UnifiedSchema(['A']);
    schema.freeze();
    expect(() => schema.observe(['A', 'X'])).toThrow(SchemaFrozenError);
    expect(schema.columns).toEqual(['A']);
  });
});

describe('assembleRow', () => {
  it('should align values to the header and fill gaps with empty strings', () => {
    const schema = new UnifiedSchema(['A', 'B', 'C']).freeze();
    const row = new Map([['C', '3'], ['A', '1'], ['Other', 'x']]);
    expect(assembleRow(row, schema)).toEqual(['1', '', '3']);
  });
});
