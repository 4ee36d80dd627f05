/**
 * Integration tests for the full pipeline over crate dump fixtures.
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { fileURLToPath } from 'node:url';
import { DEFAULT_CONFIG, loadConfig, mergeConfigRecord } from '../../src/config/index.js';
import type { Config } from '../../src/config/index.js';
import { describeEvent } from '../../src/emit/events.js';
import {
  DuplicateDeclarationError,
  PipelineError,
  runPipeline,
  UnrepresentableCycleError,
} from '../../src/pipeline/index.js';
import { loadCrateDump, loadCrates } from '../../src/syntax/index.js';
import type { CrateDump } from '../../src/syntax/index.js';
import { writeHeader } from '../../src/writer/index.js';

function fixture(name: string): string {
  return fileURLToPath(new URL(`../../test-fixtures/${name}`, import.meta.url));
}

async function captureError(run: () => unknown): Promise<unknown> {
  try {
    await run();
  } catch (error) {
    return error;
  }
  throw new Error('Expected the run to fail');
}

describe('pipeline over the geometry crate', () => {
  it('specializes generics and orders dependencies first', async () => {
    const crates = await loadCrates([fixture('geometry.json')]);
    const result = runPipeline(crates, DEFAULT_CONFIG);

    expect(result.stream.events.map(describeEvent)).toEqual([
      'define-type Pair_i32',
      'define-type Pair_f64',
      'forward-declare Node',
      'define-type Node',
      'declare-constant MAX_NODES',
      'declare-function pair_sum',
      'declare-function pair_scale',
      'declare-function node_push',
    ]);
    expect(result.library.has('Pair')).toBe(false);
    expect(result.library.has('internal_helper')).toBe(false);
    expect(result.warnings).toEqual([]);
  });

  it('writes the header with the fixture configuration', async () => {
    const [crates, config] = await Promise.all([
      loadCrates([fixture('geometry.json')]),
      loadConfig(fixture('headergen.toml'), {}),
    ]);
    const header = writeHeader(runPipeline(crates, config).stream, config, { version: '0.1.0' });

    expect(header).toBe(
      [
        '#ifndef GEOMETRY_H',
        '#define GEOMETRY_H',
        '',
        '/* Warning: this file is generated. Do not edit by hand. */',
        '',
        '#include <stdarg.h>',
        '#include <stdbool.h>',
        '#include <stddef.h>',
        '#include <stdint.h>',
        '#include <stdlib.h>',
        '',
        'typedef struct Pair_i32 {',
        '  int32_t first;',
        '  int32_t second;',
        '} Pair_i32;',
        '',
        'typedef struct Pair_f64 {',
        '  double first;',
        '  double second;',
        '} Pair_f64;',
        '',
        'typedef struct Node Node;',
        '',
        '/**',
        ' * A linked list node.',
        ' */',
        'struct Node {',
        '  Pair_i32 value;',
        '  Node *next;',
        '};',
        '',
        '#define MAX_NODES 64',
        '',
        '#ifdef __cplusplus',
        'extern "C" {',
        '#endif  // __cplusplus',
        '',
        'int32_t pair_sum(Pair_i32 pair);',
        '',
        'Pair_f64 pair_scale(Pair_f64 pair, double factor);',
        '',
        'Node *node_push(Node *head, int32_t value);',
        '',
        '#ifdef __cplusplus',
        '}  // extern "C"',
        '#endif  // __cplusplus',
        '',
        '#endif  /* GEOMETRY_H */',
        '',
      ].join('\n')
    );
  });

  it('produces identical output on every run', async () => {
    const crates = await loadCrates([fixture('geometry.json')]);
    const first = writeHeader(runPipeline(crates, DEFAULT_CONFIG).stream, DEFAULT_CONFIG);
    const second = writeHeader(runPipeline(crates, DEFAULT_CONFIG).stream, DEFAULT_CONFIG);

    expect(second).toBe(first);
  });
});

describe('pipeline failures', () => {
  it('rejects types that contain each other by value', async () => {
    const crates = await loadCrates([fixture('cycle.json')]);
    const error = await captureError(() => runPipeline(crates, DEFAULT_CONFIG));

    expect(error).toBeInstanceOf(UnrepresentableCycleError);
    expect(error).toMatchObject({
      kind: 'UnrepresentableCycle',
      stage: 'ordering',
      entity: 'Bad',
      message: 'Types contain each other by value: Bad, Worse',
    });
  });

  it('rejects a name declared twice in one crate, whatever the predicates', async () => {
    const crates = await loadCrates([fixture('duplicate.json')]);
    const config = mergeConfigRecord({ cfg: { flags: { unix: true, windows: false } } }, DEFAULT_CONFIG);
    const error = await captureError(() => runPipeline(crates, config));

    expect(error).toBeInstanceOf(DuplicateDeclarationError);
    expect(error).toMatchObject({
      kind: 'DuplicateDeclaration',
      stage: 'ir-builder',
      entity: 'Config',
      message: "'Config' is declared more than once in crate 'settings'",
    });
  });

  it('reports pipeline errors as PipelineError', async () => {
    const crates = await loadCrates([fixture('cycle.json')]);
    const error = await captureError(() => runPipeline(crates, DEFAULT_CONFIG));

    expect(error).toBeInstanceOf(PipelineError);
  });
});

describe('conditional compilation', () => {
  let platform: CrateDump | undefined;

  async function platformCrate(): Promise<CrateDump> {
    platform ??= await loadCrateDump(fixture('platform.json'));
    return platform;
  }

  function configFor(unix: boolean, windows: boolean, files: boolean): Config {
    return mergeConfigRecord({ cfg: { flags: { unix, windows }, features: { files } } }, DEFAULT_CONFIG);
  }

  it('drops disabled fields and functions', async () => {
    const config = mergeConfigRecord(
      { no_includes: true, cfg: { flags: { unix: true, windows: false }, features: { files: true } } },
      DEFAULT_CONFIG
    );
    const header = writeHeader(runPipeline([await platformCrate()], config).stream, config);

    expect(header).toBe(
      [
        'typedef struct Handle {',
        '  int32_t fd;',
        '} Handle;',
        '',
        'Handle open_handle(const char *path);',
        '',
        'void close_handle(Handle handle);',
        '',
      ].join('\n')
    );
  });

  it('warns once per unknown predicate', async () => {
    const config = mergeConfigRecord({ cfg: { flags: { unix: true } } }, DEFAULT_CONFIG);
    const result = runPipeline([await platformCrate()], config);

    expect(result.warnings.map((w) => w.message)).toEqual([
      "Unknown predicate 'windows' evaluates to false",
      'Unknown predicate \'feature = "files"\' evaluates to false',
    ]);
  });

  it('keeps exactly the declarations whose predicates hold', async () => {
    const crate = await platformCrate();

    fc.assert(
      fc.property(fc.boolean(), fc.boolean(), fc.boolean(), (unix, windows, files) => {
        const config = configFor(unix, windows, files);
        const header = writeHeader(runPipeline([crate], config).stream, config);

        expect(header.includes('int32_t fd;')).toBe(unix);
        expect(header.includes('void *raw;')).toBe(windows);
        expect(header.includes('open_handle(')).toBe(files);
        expect(header.includes('close_win_handle(')).toBe(windows);
        expect(header.includes('void close_handle(Handle handle);')).toBe(true);
        expect(writeHeader(runPipeline([crate], config).stream, config)).toBe(header);
      })
    );
  });
});
