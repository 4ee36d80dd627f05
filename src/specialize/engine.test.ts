import { describe, it, expect } from 'vitest';
import { buildLibrary } from '../ir/builder.js';
import type { Library } from '../ir/library.js';
import {
  MangledNameCollisionError,
  UnboundedSpecializationError,
  UnresolvedTypeError,
} from '../pipeline/errors.js';
import { parseCrateDump } from '../syntax/loader.js';
import { DEFAULT_MAX_DEPTH, specialize } from './engine.js';

function library(items: unknown[]): Library {
  return buildLibrary([parseCrateDump(JSON.stringify({ crate: 'generic', items }), 'generic.json')]);
}

const reprC = [{ name: 'repr', value: 'C' }];
const exported = { abi: 'C', attributes: [{ name: 'no_mangle' }] };
const pair = {
  kind: 'struct',
  name: 'Pair',
  generics: ['T'],
  attributes: reprC,
  fields: [
    { name: 'first', type: 'T' },
    { name: 'second', type: 'T' },
  ],
};

describe('specialize', () => {
  it('creates one monomorph per instantiation, next to its generic', () => {
    const lib = library([
      pair,
      { kind: 'struct', name: 'Holder', attributes: reprC, fields: [{ name: 'p', type: 'Pair<u8>' }] },
      { kind: 'function', name: 'take', ...exported, params: [{ name: 'x', type: 'Pair<i32>' }, { name: 'y', type: '*const Pair<i32>' }] },
    ]);
    specialize(lib, { maxDepth: DEFAULT_MAX_DEPTH });

    expect(lib.entities().map((e) => e.name)).toEqual(['Pair_u8', 'Pair_i32', 'Holder', 'take']);
    expect(lib.instantiationCount).toBe(2);
    expect(lib.get('Holder')).toMatchObject({ fields: [{ type: { kind: 'path', name: 'Pair_u8', args: [] } }] });
    expect(lib.get('Pair_i32')).toMatchObject({
      kind: 'struct',
      exportName: 'Pair_i32',
      generics: [],
      instantiation: { generic: 'Pair', args: [{ kind: 'type', type: { kind: 'primitive', name: 'i32' } }] },
      fields: [
        { name: 'first', type: { kind: 'primitive', name: 'i32' } },
        { name: 'second', type: { kind: 'primitive', name: 'i32' } },
      ],
    });
    expect(lib.get('take')).toMatchObject({
      params: [
        { type: { kind: 'path', name: 'Pair_i32' } },
        { type: { kind: 'pointer', target: { kind: 'path', name: 'Pair_i32' } } },
      ],
    });
  });

  it('binds const parameters', () => {
    const lib = library([
      { kind: 'struct', name: 'Buffer', generics: ['const N: usize'], attributes: reprC, fields: [{ name: 'data', type: '[u8; N]' }] },
      { kind: 'function', name: 'fill', ...exported, params: [{ name: 'buf', type: '*mut Buffer<16>' }] },
    ]);
    specialize(lib, { maxDepth: DEFAULT_MAX_DEPTH });

    expect(lib.get('Buffer_16')).toMatchObject({
      fields: [{ type: { kind: 'array', element: { kind: 'primitive', name: 'u8' }, length: '16' } }],
    });
  });

  it('shares one monomorph between arguments that are the same C type', () => {
    const lib = library([
      pair,
      { kind: 'function', name: 'by_ref', ...exported, params: [{ name: 'p', type: 'Pair<&i32>' }] },
      { kind: 'function', name: 'by_raw', ...exported, params: [{ name: 'p', type: 'Pair<*const i32>' }] },
      { kind: 'function', name: 'maybe', ...exported, params: [{ name: 'p', type: 'Pair<Option<&i32>>' }] },
    ]);
    specialize(lib, { maxDepth: DEFAULT_MAX_DEPTH });

    expect(lib.entities().map((e) => e.name)).toEqual(['Pair_ptr_i32', 'by_ref', 'by_raw', 'maybe']);
    expect(lib.instantiationCount).toBe(1);
    expect(lib.get('Pair_ptr_i32')).toMatchObject({
      fields: [
        { type: { kind: 'pointer', mutable: false, nullable: true, isRef: false } },
        { type: { kind: 'pointer', mutable: false, nullable: true, isRef: false } },
      ],
    });
  });

  it('shares one monomorph between plain and optional function pointers', () => {
    const lib = library([
      pair,
      { kind: 'function', name: 'plain', ...exported, params: [{ name: 'p', type: 'Pair<extern "C" fn(u8)>' }] },
      { kind: 'function', name: 'optional', ...exported, params: [{ name: 'p', type: 'Pair<Option<extern "C" fn(u8)>>' }] },
    ]);
    specialize(lib, { maxDepth: DEFAULT_MAX_DEPTH });

    expect(lib.instantiationCount).toBe(1);
    expect(lib.has('Pair_fn_u8_ret_void')).toBe(true);
  });

  it('keeps const expressions with different operators apart', () => {
    const buffer = {
      kind: 'struct',
      name: 'Buffer',
      generics: ['const N: usize'],
      attributes: reprC,
      fields: [{ name: 'data', type: '[u8; N]' }],
    };
    const lib = library([
      buffer,
      { kind: 'function', name: 'fill_sum', ...exported, params: [{ name: 'b', type: '*mut Buffer<{4 + 2}>' }] },
      { kind: 'function', name: 'fill_product', ...exported, params: [{ name: 'b', type: '*mut Buffer<{4 * 2}>' }] },
      { kind: 'function', name: 'fill_sum_again', ...exported, params: [{ name: 'b', type: '*mut Buffer<{4+2}>' }] },
    ]);
    specialize(lib, { maxDepth: DEFAULT_MAX_DEPTH });

    expect(lib.instantiationCount).toBe(2);
    expect(lib.has('Buffer_4_add_2')).toBe(true);
    expect(lib.has('Buffer_4_mul_2')).toBe(true);
  });

  it('drops whatever the roots do not reach', () => {
    const lib = library([
      pair,
      { kind: 'struct', name: 'Hidden', public: false, attributes: reprC, fields: [] },
      { kind: 'struct', name: 'Used', public: false, attributes: reprC, fields: [] },
      { kind: 'function', name: 'use_it', ...exported, params: [{ name: 'u', type: '*mut Used' }] },
    ]);
    specialize(lib, { maxDepth: DEFAULT_MAX_DEPTH });

    expect(lib.entities().map((e) => e.name)).toEqual(['Used', 'use_it']);
  });

  it('adds included names as roots and warns about unusable ones', () => {
    const lib = library([pair, { kind: 'struct', name: 'Hidden', public: false, attributes: reprC, fields: [] }]);
    specialize(lib, { maxDepth: DEFAULT_MAX_DEPTH, include: ['Hidden', 'Pair', 'Nowhere'] });

    expect(lib.entities().map((e) => e.name)).toEqual(['Hidden']);
    expect(lib.warnings.map((w) => w.code)).toEqual(['include_generic', 'include_not_found']);
  });

  it('rejects generics used without arguments or with the wrong count', () => {
    const bare = library([pair, { kind: 'function', name: 'bad', ...exported, params: [{ name: 'p', type: 'Pair' }] }]);
    expect(() => specialize(bare, { maxDepth: DEFAULT_MAX_DEPTH })).toThrow(
      new UnresolvedTypeError("Generic type 'Pair' is used without arguments (expects 1)", 'specialization', 'bad')
    );

    const extra = library([pair, { kind: 'function', name: 'bad', ...exported, params: [{ name: 'p', type: 'Pair<i32, u8>' }] }]);
    expect(() => specialize(extra, { maxDepth: DEFAULT_MAX_DEPTH })).toThrow(
      "'Pair<i32, u8>' passes 2 argument(s) to 'Pair', which expects 1"
    );
  });

  it('rejects a mangled name that is already declared', () => {
    const lib = library([
      pair,
      { kind: 'struct', name: 'Pair_i32', attributes: reprC, fields: [] },
      { kind: 'function', name: 'take', ...exported, params: [{ name: 'x', type: 'Pair<i32>' }] },
    ]);

    expect(() => specialize(lib, { maxDepth: DEFAULT_MAX_DEPTH })).toThrow(MangledNameCollisionError);
    expect(() => specialize(lib, { maxDepth: DEFAULT_MAX_DEPTH })).toThrow(
      "Mangled name 'Pair_i32' for 'Pair<i32>' collides with a declared entity"
    );
  });

  it('stops instantiations that keep nesting', () => {
    const lib = library([
      { kind: 'struct', name: 'Nest', generics: ['T'], attributes: reprC, fields: [{ name: 'next', type: '*mut Nest<*const T>' }] },
      { kind: 'function', name: 'grow', ...exported, params: [{ name: 'n', type: '*mut Nest<u8>' }] },
    ]);

    expect(() => specialize(lib, { maxDepth: 3 })).toThrow(UnboundedSpecializationError);
    expect(lib.has('Nest_ptr_ptr_u8')).toBe(true);
    expect(lib.has('Nest_ptr_ptr_ptr_u8')).toBe(false);
  });
});
