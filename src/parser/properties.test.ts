import { describe, expect, it } from 'vitest';
import { errorOf } from '../test-utils';
import { Lines } from './lines';
import { Properties, PropertyError } from './properties';

const parse = (text: string, strictCounts = false) => Properties.parse(new Lines(text), { strictCounts });

describe('Properties.parse', () => {
  it('parses integer and text values', () => {
    const properties = parse(
      'STARTPROPERTIES 4\nFONT_ASCENT 14\nFONT_DESCENT -2\nCOPYRIGHT "Say ""hi"""\nEMPTY ""\nENDPROPERTIES',
    );
    expect(properties.size).toBe(4);
    expect(properties.get('FONT_ASCENT')).toEqual({ kind: 'int', value: 14 });
    expect(properties.getInt('FONT_DESCENT')).toBe(-2);
    expect(properties.getText('COPYRIGHT')).toBe('Say "hi"');
    expect(properties.getText('EMPTY')).toBe('');
  });

  it('unescapes doubled quotes', () => {
    const properties = parse('STARTPROPERTIES 3\nKEY1 "VALUE"\nWITH_QUOTE "1""23"""\nPOS_INT 10\nENDPROPERTIES');
    expect(properties.get('KEY1')).toEqual({ kind: 'text', value: 'VALUE' });
    expect(properties.get('WITH_QUOTE')).toEqual({ kind: 'text', value: '1"23"' });
    expect(properties.get('POS_INT')).toEqual({ kind: 'int', value: 10 });
  });

  it('keeps the last value of a repeated key', () => {
    const properties = parse('STARTPROPERTIES 2\nA 1\nA 2\nENDPROPERTIES');
    expect(properties.getInt('A')).toBe(2);
    expect(properties.size).toBe(1);
  });

  it('ignores the declared count by default', () => {
    expect(parse('STARTPROPERTIES 3\nA 1\nENDPROPERTIES').size).toBe(1);
  });

  it('checks the declared count in strict mode', () => {
    expect(errorOf(() => parse('STARTPROPERTIES 3\nA 1\nB 2\nENDPROPERTIES', true))).toBe(
      'line 1: "STARTPROPERTIES" declares 3 properties, found 2',
    );
    expect(parse('STARTPROPERTIES 2\nA 1\nB 2\nENDPROPERTIES', true).size).toBe(2);
  });

  it('rejects malformed blocks', () => {
    expect(errorOf(() => parse('FONT x'))).toBe('line 1: expected "STARTPROPERTIES"');
    expect(errorOf(() => parse('STARTPROPERTIES many\nENDPROPERTIES'))).toBe('line 1: invalid "STARTPROPERTIES"');
    expect(errorOf(() => parse('STARTPROPERTIES 1\nA 1'))).toBe('missing "ENDPROPERTIES"');
    expect(errorOf(() => parse('STARTPROPERTIES 1\nSLANT R\nENDPROPERTIES'))).toBe('line 2: invalid property "SLANT"');
  });
});

describe('Properties accessors', () => {
  const properties = new Properties([
    ['FONT_ASCENT', { kind: 'int', value: 6 }],
    ['SPACING', { kind: 'text', value: 'C' }],
  ]);

  it('reports missing properties', () => {
    expect(() => properties.getInt('FONT_DESCENT')).toThrow(PropertyError);
    expect(errorOf(() => properties.getInt('FONT_DESCENT'))).toBe('PropertyError: missing property "FONT_DESCENT"');
  });

  it('reports values of the wrong type', () => {
    expect(errorOf(() => properties.getInt('SPACING'))).toBe('PropertyError: property "SPACING" has the wrong type');
    expect(errorOf(() => properties.getText('FONT_ASCENT'))).toBe(
      'PropertyError: property "FONT_ASCENT" has the wrong type',
    );
  });

  it('lists entries in insertion order', () => {
    expect([...properties.entries()].map(([key]) => key)).toEqual(['FONT_ASCENT', 'SPACING']);
  });
});
