import { describe, it, expect } from 'vitest';
import {
  classifyAttribute,
  parseAnnotation,
  parseNameList,
  parsePtrsAsArrays,
  reprFromItems,
  splitTopLevel,
} from './attributes.js';

describe('classifyAttribute', () => {
  it('classifies repr items', () => {
    expect(classifyAttribute({ name: 'repr', value: 'C, u8' })).toEqual({
      kind: 'repr',
      items: [{ kind: 'c' }, { kind: 'primitive', primitive: 'u8' }],
    });
    expect(classifyAttribute({ name: 'repr', value: 'C, align(8)' })).toEqual({
      kind: 'repr',
      items: [{ kind: 'c' }, { kind: 'align', value: 8 }],
    });
  });

  it('passes unrecognized repr items through', () => {
    expect(classifyAttribute({ name: 'repr', value: 'simd' })).toEqual({
      kind: 'passthrough',
      name: 'repr',
      value: 'simd',
      reason: 'unrecognized repr',
    });
    expect(classifyAttribute({ name: 'repr', value: 'f32' })).toMatchObject({ kind: 'passthrough' });
  });

  it('parses cfg predicates and reports malformed ones', () => {
    expect(classifyAttribute({ name: 'cfg', value: 'unix' })).toEqual({
      kind: 'cfg',
      predicate: { kind: 'flag', name: 'unix' },
    });
    expect(classifyAttribute({ name: 'cfg', value: 'not(a, b)' })).toEqual({
      kind: 'passthrough',
      name: 'cfg',
      value: 'not(a, b)',
      reason: "not() takes exactly one predicate in cfg 'not(a, b)'",
    });
  });

  it('reads doc text, export names and deprecation notes', () => {
    expect(classifyAttribute({ name: 'doc', value: '" Hello"' })).toEqual({ kind: 'doc', text: ' Hello' });
    expect(classifyAttribute({ name: 'export_name', value: '"geo_area"' })).toEqual({
      kind: 'export_name',
      value: 'geo_area',
    });
    expect(classifyAttribute({ name: 'deprecated' })).toEqual({ kind: 'deprecated', note: '' });
    expect(classifyAttribute({ name: 'deprecated', value: 'since = "1.0", note = "use area2"' })).toEqual({
      kind: 'deprecated',
      note: 'use area2',
    });
    expect(classifyAttribute({ name: 'deprecated', value: '"old"' })).toEqual({ kind: 'deprecated', note: 'old' });
  });

  it('reads generator annotations', () => {
    expect(classifyAttribute({ name: 'headergen', value: 'rename-all = "camelCase"' })).toEqual({
      kind: 'annotation',
      key: 'rename-all',
      value: 'camelCase',
    });
    expect(classifyAttribute({ name: 'headergen', value: 'opaque' })).toEqual({
      kind: 'annotation',
      key: 'opaque',
      value: true,
    });
  });

  it('separates inert attributes from unknown ones', () => {
    expect(classifyAttribute({ name: 'derive', value: 'Clone, Copy' })).toEqual({ kind: 'inert', name: 'derive' });
    expect(classifyAttribute({ name: 'link_section' })).toEqual({ kind: 'passthrough', name: 'link_section' });
  });
});

describe('reprFromItems', () => {
  it('folds items into a layout', () => {
    expect(reprFromItems([])).toEqual({ style: 'rust', packed: false });
    expect(
      reprFromItems([{ kind: 'c' }, { kind: 'primitive', primitive: 'i16' }, { kind: 'packed' }, { kind: 'align', value: 4 }])
    ).toEqual({ style: 'c', primitive: 'i16', packed: true, align: 4 });
    expect(reprFromItems([{ kind: 'c' }, { kind: 'transparent' }])).toEqual({ style: 'transparent', packed: false });
  });
});

describe('annotation values', () => {
  it('parses key/value and bare annotations', () => {
    expect(parseAnnotation('prefix-with-name')).toEqual({ key: 'prefix-with-name', value: true });
    expect(parseAnnotation(' derive-eq = true ')).toEqual({ key: 'derive-eq', value: 'true' });
    expect(parseAnnotation('= nothing')).toBeUndefined();
  });

  it('parses ptrs-as-arrays tuples', () => {
    expect(parsePtrsAsArrays('[[data; 4], [out; ]]')).toEqual(
      new Map([
        ['data', '4'],
        ['out', ''],
      ])
    );
  });

  it('parses name lists', () => {
    expect(parseNameList('[x, "y", ]')).toEqual(['x', 'y']);
    expect(splitTopLevel('a, b(c, d), e')).toEqual(['a', 'b(c, d)', 'e']);
  });
});
