import { describe, it, expect } from 'vitest';
import { DuplicateDeclarationError } from '../pipeline/errors.js';
import { parseCrateDump } from '../syntax/loader.js';
import type { CrateDump } from '../syntax/types.js';
import { buildLibrary } from './builder.js';

function crate(name: string, items: unknown[]): CrateDump {
  return parseCrateDump(JSON.stringify({ crate: name, items }), `${name}.json`);
}

const reprC = [{ name: 'repr', value: 'C' }];
const exported = { abi: 'C', attributes: [{ name: 'no_mangle' }] };

describe('buildLibrary', () => {
  it('creates one entity per exported declaration', () => {
    const library = buildLibrary([
      crate('shapes', [
        { kind: 'struct', name: 'Point', attributes: reprC, fields: [{ name: 'x', type: 'f32' }] },
        { kind: 'const', name: 'ORIGIN_X', type: 'f32', value: '0.0' },
        { kind: 'function', name: 'point_len', ...exported, params: [{ name: 'p', type: '&Point' }], returns: 'f32' },
        { kind: 'static', name: 'COUNTER', type: 'u32', mutable: true, attributes: [{ name: 'no_mangle' }] },
      ]),
    ]);

    expect(library.entities().map((e) => `${e.kind} ${e.name} ${String(e.declIndex)}`)).toEqual([
      'struct Point 0',
      'constant ORIGIN_X 1',
      'function point_len 2',
      'static COUNTER 3',
    ]);
    expect(library.warnings).toEqual([]);
  });

  it('keeps layout-less types as opaque', () => {
    const library = buildLibrary([
      crate('shapes', [
        { kind: 'struct', name: 'Cache', fields: [{ name: 'size', type: 'usize' }] },
        { kind: 'enum', name: 'Mode', variants: [{ name: 'Fast' }] },
        { kind: 'struct', name: 'Forced', attributes: [...reprC, { name: 'headergen', value: 'opaque' }], fields: [] },
      ]),
    ]);

    expect(library.entities().map((e) => e.kind)).toEqual(['opaque', 'opaque', 'opaque']);
  });

  it('turns repr(transparent) structs into typedefs', () => {
    const library = buildLibrary([
      crate('ids', [
        {
          kind: 'struct',
          name: 'UserId',
          tuple: true,
          attributes: [{ name: 'repr', value: 'transparent' }],
          fields: [
            { name: '0', type: 'u64' },
            { name: '1', type: 'PhantomData<User>' },
          ],
        },
      ]),
    ]);

    expect(library.get('UserId')).toMatchObject({ kind: 'typedef', target: { kind: 'primitive', name: 'u64' } });
  });

  it('names positional fields with a leading underscore unless field-names says otherwise', () => {
    const library = buildLibrary([
      crate('geo', [
        { kind: 'struct', name: 'Vec2', tuple: true, attributes: reprC, fields: [{ name: '0', type: 'f32' }, { name: '1', type: 'f32' }] },
        {
          kind: 'struct',
          name: 'Size',
          tuple: true,
          attributes: [...reprC, { name: 'headergen', value: 'field-names = "[w, h]"' }],
          fields: [{ name: '0', type: 'f32' }, { name: '1', type: 'f32' }],
        },
      ]),
    ]);

    expect(library.get('Vec2')).toMatchObject({ fields: [{ name: '_0' }, { name: '_1' }] });
    expect(library.get('Size')).toMatchObject({ fields: [{ name: 'w' }, { name: 'h' }] });
  });

  it('conjoins module predicates onto the items inside', () => {
    const library = buildLibrary([
      crate('io', [
        {
          kind: 'module',
          name: 'unix_impl',
          attributes: [{ name: 'cfg', value: 'unix' }],
          items: [
            { kind: 'function', name: 'io_open', ...exported, attributes: [{ name: 'no_mangle' }, { name: 'cfg', value: 'feature = "files"' }] },
          ],
        },
      ]),
    ]);

    expect(library.get('io_open')?.cfg).toEqual({
      kind: 'all',
      items: [
        { kind: 'flag', name: 'unix' },
        { kind: 'keyvalue', key: 'feature', value: 'files' },
      ],
    });
  });

  it('moves annotation doc lines out of the docs', () => {
    const library = buildLibrary([
      crate('docs', [
        { kind: 'opaque', name: 'Ctx', docs: [' The context.', ' headergen:prefix-with-name'] },
      ]),
    ]);
    const entity = library.get('Ctx');

    expect(entity?.docs).toEqual([' The context.']);
    expect(entity?.attributes.annotations.get('prefix-with-name')).toBe(true);
  });

  it('skips functions that cannot be linked from C', () => {
    const library = buildLibrary([
      crate('ffi', [
        { kind: 'function', name: 'plain_rust', attributes: [{ name: 'no_mangle' }] },
        { kind: 'function', name: 'private_fn', public: false, ...exported },
        { kind: 'function', name: 'mangled', abi: 'C' },
        { kind: 'function', name: 'renamed', abi: 'C', attributes: [{ name: 'export_name', value: '"ffi_renamed"' }] },
      ]),
    ]);

    expect(library.entities().map((e) => e.name)).toEqual(['renamed']);
    expect(library.get('renamed')?.exportName).toBe('ffi_renamed');
    expect(library.warnings.map((w) => w.message)).toEqual([
      'Skipping function \'plain_rust\': ABI "Rust" is not callable from C',
    ]);
  });

  it('warns about ignored attributes and unparseable constants', () => {
    const library = buildLibrary([
      crate('misc', [
        { kind: 'opaque', name: 'Slot', attributes: [{ name: 'link_section', value: '".data"' }] },
        { kind: 'const', name: 'BAD', type: 'u32', value: 'a == b' },
      ]),
    ]);

    expect(library.warnings.map((w) => `${w.code}: ${w.message}`)).toEqual([
      "attribute_ignored: Ignoring attribute 'link_section'",
      "constant_skipped: Skipping constant 'BAD': Unexpected character '=' in constant expression 'a == b'",
    ]);
    expect(library.has('BAD')).toBe(false);
  });

  it('rejects a name declared twice in one crate', () => {
    const build = () =>
      buildLibrary([
        crate('dup', [
          { kind: 'opaque', name: 'Thing', attributes: [{ name: 'cfg', value: 'unix' }] },
          { kind: 'opaque', name: 'Thing', attributes: [{ name: 'cfg', value: 'windows' }] },
        ]),
      ]);

    expect(build).toThrow(DuplicateDeclarationError);
    expect(build).toThrow("'Thing' is declared more than once in crate 'dup'");
  });

  it('lets the first crate win a cross-crate duplicate', () => {
    const library = buildLibrary([
      crate('root', [{ kind: 'opaque', name: 'Thing' }]),
      crate('dep', [{ kind: 'opaque', name: 'Thing' }]),
    ]);

    expect(library.get('Thing')?.crate).toBe('root');
    expect(library.warnings).toEqual([
      {
        stage: 'ir-builder',
        code: 'cross_crate_duplicate',
        message: "'Thing' from crate 'dep' is shadowed by the declaration in crate 'root'",
        entity: 'Thing',
      },
    ]);
  });
});
