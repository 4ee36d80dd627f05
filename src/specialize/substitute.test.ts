import { describe, it, expect } from 'vitest';
import { convertTypeExpr, formatTypeRef } from '../ir/type-ref.js';
import type { GenericArg, StructEntity, TypeRef } from '../ir/types.js';
import { DEFAULT_ATTRIBUTES } from '../ir/types.js';
import { parseTypeExpr } from '../syntax/type-expr.js';
import type { Bindings } from './substitute.js';
import { substituteConst, substituteEntity, substituteType } from './substitute.js';

function ref(source: string): TypeRef {
  return convertTypeExpr(parseTypeExpr(source));
}

const bindings: Bindings = new Map<string, GenericArg>([
  ['T', { kind: 'type', type: ref('u16') }],
  ['N', { kind: 'const', value: '8' }],
]);

describe('substituteType', () => {
  it('replaces type parameters wherever they appear', () => {
    expect(formatTypeRef(substituteType(ref('*mut T'), bindings))).toBe('*mut? u16');
    expect(formatTypeRef(substituteType(ref('Pair<T, Node>'), bindings))).toBe('Pair<u16, Node>');
    expect(formatTypeRef(substituteType(ref('extern "C" fn(T) -> T'), bindings))).toBe('fn(u16) -> u16');
  });

  it('replaces const parameters in lengths and arguments', () => {
    expect(formatTypeRef(substituteType(ref('[T; N]'), bindings))).toBe('[u16; 8]');
    expect(substituteType(ref('Buffer<N>'), bindings)).toEqual({
      kind: 'path',
      name: 'Buffer',
      args: [{ kind: 'const', value: '8' }],
    });
  });

  it('leaves unbound names alone', () => {
    expect(substituteType(ref('U'), bindings)).toEqual({ kind: 'path', name: 'U', args: [] });
  });
});

describe('substituteConst', () => {
  it('replaces whole words only', () => {
    expect(substituteConst('N * 2 + NN', bindings)).toBe('8 * 2 + NN');
  });
});

describe('substituteEntity', () => {
  it('rewrites every field', () => {
    const pair: StructEntity = {
      kind: 'struct',
      name: 'Pair',
      exportName: 'Pair',
      generics: [{ name: 'T', kind: 'type' }],
      docs: [],
      crate: 'geo',
      declIndex: 0,
      public: true,
      attributes: DEFAULT_ATTRIBUTES,
      tuple: false,
      fields: [
        { name: 'first', exportName: 'first', type: ref('T'), docs: [] },
        { name: 'rest', exportName: 'rest', type: ref('[T; N]'), docs: [] },
      ],
    };
    const result = substituteEntity(pair, bindings);

    expect(result.kind === 'struct' ? result.fields.map((f) => formatTypeRef(f.type)) : []).toEqual([
      'u16',
      '[u16; 8]',
    ]);
  });
});
