import { describe, it, expect } from 'vitest';
import { orderLibrary } from '../graph/order.js';
import { buildLibrary } from '../ir/builder.js';
import type { Library } from '../ir/library.js';
import { DuplicateDeclarationError, UnresolvedTypeError } from '../pipeline/errors.js';
import { assignExportNames } from '../specialize/export-names.js';
import { parseCrateDump } from '../syntax/loader.js';
import { emitDeclarations } from './contract.js';
import { describeEvent } from './events.js';

function library(items: unknown[], externalTypes: string[] = []): Library {
  return buildLibrary([parseCrateDump(JSON.stringify({ crate: 'emit', items }), 'emit.json')], { externalTypes });
}

const reprC = [{ name: 'repr', value: 'C' }];
const exported = { abi: 'C', attributes: [{ name: 'no_mangle' }] };

describe('emitDeclarations', () => {
  it('turns the plan into events and records the export names', () => {
    const lib = library([
      { kind: 'struct', name: 'Point', attributes: reprC, fields: [{ name: 'x', type: 'f32' }] },
      { kind: 'const', name: 'ORIGIN', type: 'f32', value: '0.0' },
      { kind: 'function', name: 'point_x', ...exported, params: [{ name: 'p', type: '&Point' }], returns: 'f32' },
    ]);
    const stream = emitDeclarations(lib, orderLibrary(lib));

    expect(stream.events.map(describeEvent)).toEqual([
      'define-type Point',
      'declare-constant ORIGIN',
      'declare-function point_x',
    ]);
    expect(stream.exportNames.get('Point')).toBe('Point');
    expect(lib.emission).toBe(stream.events);
  });

  it('accepts types supplied by included headers', () => {
    const lib = library([{ kind: 'function', name: 'log_to', ...exported, params: [{ name: 'out', type: '*mut FILE' }] }], [
      'FILE',
    ]);
    const stream = emitDeclarations(lib, orderLibrary(lib));

    expect(stream.externalTypes.has('FILE')).toBe(true);
    expect(stream.events.map(describeEvent)).toEqual(['declare-function log_to']);
  });

  it('rejects references to undeclared types', () => {
    const lib = library([{ kind: 'function', name: 'load', ...exported, params: [{ name: 'cfg', type: '*const Missing' }] }]);

    expect(() => emitDeclarations(lib, orderLibrary(lib))).toThrow(
      new UnresolvedTypeError("Type 'Missing' is not declared", 'emission', 'load')
    );
  });

  it('rejects references to entities that are not types', () => {
    const lib = library([
      { kind: 'function', name: 'reset', ...exported },
      { kind: 'function', name: 'call', ...exported, params: [{ name: 'f', type: '*const reset' }] },
    ]);

    expect(() => emitDeclarations(lib, orderLibrary(lib))).toThrow("'reset' is a function, not a type");
  });

  it('rejects two entities with one export name', () => {
    const lib = library([
      { kind: 'struct', name: 'A', attributes: reprC, fields: [] },
      { kind: 'struct', name: 'B', attributes: reprC, fields: [] },
    ]);
    assignExportNames(lib, {
      rename: new Map([
        ['A', 'Same'],
        ['B', 'Same'],
      ]),
      prefix: '',
      renameFields: 'None',
      renameVariants: 'None',
      renameArgs: 'None',
      prefixWithName: false,
    });

    expect(() => emitDeclarations(lib, orderLibrary(lib))).toThrow(
      new DuplicateDeclarationError("Export name 'Same' is used by both 'A' and 'B'", 'emission', 'B')
    );
  });

  it('rejects a type named like the tag of a tagged enum', () => {
    const lib = library([
      {
        kind: 'enum',
        name: 'Shape',
        attributes: reprC,
        variants: [{ name: 'Circle', fields: [{ name: 'radius', type: 'f32' }] }, { name: 'Empty' }],
      },
      { kind: 'struct', name: 'Shape_Tag', attributes: reprC, fields: [] },
    ]);

    expect(() => emitDeclarations(lib, orderLibrary(lib))).toThrow(
      new DuplicateDeclarationError("Export name 'Shape_Tag' is used by both 'Shape' and 'Shape_Tag'", 'emission', 'Shape_Tag')
    );
  });

  it('accepts a tagged enum whose helper names are free', () => {
    const lib = library([
      {
        kind: 'enum',
        name: 'Shape',
        attributes: reprC,
        variants: [{ name: 'Circle', fields: [{ name: 'radius', type: 'f32' }] }, { name: 'Empty' }],
      },
      { kind: 'struct', name: 'ShapeTag', attributes: reprC, fields: [] },
    ]);

    expect(emitDeclarations(lib, orderLibrary(lib)).events.map(describeEvent)).toEqual([
      'define-type Shape',
      'define-type ShapeTag',
    ]);
  });

  it('checks that by-value dependencies come first', () => {
    const lib = library([
      { kind: 'struct', name: 'Line', attributes: reprC, fields: [{ name: 'start', type: 'Point' }] },
      { kind: 'struct', name: 'Point', attributes: reprC, fields: [{ name: 'x', type: 'f32' }] },
      { kind: 'opaque', name: 'Secret' },
    ]);

    expect(() =>
      emitDeclarations(lib, [
        { action: 'define', name: 'Line' },
        { action: 'define', name: 'Point' },
      ])
    ).toThrow("'Point' is used by value before its definition");
    expect(() => emitDeclarations(lib, [{ action: 'define', name: 'Secret' }])).toThrow("'Secret' cannot be defined");
    expect(() => emitDeclarations(lib, [{ action: 'function', name: 'Point' }])).toThrow("'Point' is not a function");
  });
});
