import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import {
  CfgParseError,
  conjoinCfg,
  EMPTY_CFG_ENVIRONMENT,
  evaluateCfg,
  formatCfg,
  parseCfg,
} from './predicate.js';
import type { Cfg, CfgEnvironment } from './predicate.js';

const linux: CfgEnvironment = {
  flags: new Map([
    ['unix', true],
    ['windows', false],
  ]),
  features: new Map([
    ['serde', true],
    ['ffi', false],
  ]),
  values: new Map([['target_os', 'linux']]),
};

describe('parseCfg', () => {
  it('parses flags and key/value pairs', () => {
    expect(parseCfg('unix')).toEqual({ kind: 'flag', name: 'unix' });
    expect(parseCfg('feature = "serde"')).toEqual({ kind: 'keyvalue', key: 'feature', value: 'serde' });
  });

  it('parses nested combinators', () => {
    expect(parseCfg('all(unix, not(target_os = "macos"), any(feature = "a", feature = "b"),)')).toEqual({
      kind: 'all',
      items: [
        { kind: 'flag', name: 'unix' },
        { kind: 'not', item: { kind: 'keyvalue', key: 'target_os', value: 'macos' } },
        {
          kind: 'any',
          items: [
            { kind: 'keyvalue', key: 'feature', value: 'a' },
            { kind: 'keyvalue', key: 'feature', value: 'b' },
          ],
        },
      ],
    });
  });

  it('rejects malformed predicates', () => {
    expect(() => parseCfg('')).toThrow(CfgParseError);
    expect(() => parseCfg('not(unix, windows)')).toThrow("not() takes exactly one predicate in cfg 'not(unix, windows)'");
    expect(() => parseCfg('maybe(unix)')).toThrow("Unknown predicate combinator 'maybe'");
    expect(() => parseCfg('feature = serde')).toThrow("Expected string value for 'feature'");
    expect(() => parseCfg('unix windows')).toThrow('Unexpected trailing input');
    expect(() => parseCfg('feature = "serde')).toThrow('Unterminated string');
  });
});

describe('evaluateCfg', () => {
  it('looks up flags, features and values', () => {
    expect(evaluateCfg(parseCfg('unix'), linux)).toBe(true);
    expect(evaluateCfg(parseCfg('windows'), linux)).toBe(false);
    expect(evaluateCfg(parseCfg('feature = "serde"'), linux)).toBe(true);
    expect(evaluateCfg(parseCfg('feature = "ffi"'), linux)).toBe(false);
    expect(evaluateCfg(parseCfg('target_os = "linux"'), linux)).toBe(true);
    expect(evaluateCfg(parseCfg('target_os = "macos"'), linux)).toBe(false);
  });

  it('combines with all, any and not', () => {
    expect(evaluateCfg(parseCfg('all(unix, feature = "serde")'), linux)).toBe(true);
    expect(evaluateCfg(parseCfg('all(unix, windows)'), linux)).toBe(false);
    expect(evaluateCfg(parseCfg('any(windows, target_os = "linux")'), linux)).toBe(true);
    expect(evaluateCfg(parseCfg('not(windows)'), linux)).toBe(true);
    expect(evaluateCfg(parseCfg('all()'), linux)).toBe(true);
    expect(evaluateCfg(parseCfg('any()'), linux)).toBe(false);
  });

  it('treats unknown leaves as false and reports each of them', () => {
    const unknown: string[] = [];
    const result = evaluateCfg(
      parseCfg('any(miri, feature = "simd", all(unix, arch = "x86"))'),
      linux,
      (leaf) => unknown.push(leaf)
    );

    expect(result).toBe(false);
    expect(unknown).toEqual(['miri', 'feature = "simd"', 'arch = "x86"']);
  });

  it('negates unknown leaves to true', () => {
    expect(evaluateCfg(parseCfg('not(miri)'), EMPTY_CFG_ENVIRONMENT)).toBe(true);
  });
});

describe('conjoinCfg', () => {
  it('drops missing predicates', () => {
    const unix = parseCfg('unix');
    expect(conjoinCfg([])).toBeUndefined();
    expect(conjoinCfg([undefined, unix])).toBe(unix);
    expect(conjoinCfg([unix, undefined, parseCfg('windows')])).toEqual({
      kind: 'all',
      items: [unix, { kind: 'flag', name: 'windows' }],
    });
  });
});

describe('formatCfg', () => {
  it('renders attribute text', () => {
    expect(formatCfg(parseCfg('all(unix,not( feature="a" ))'))).toBe('all(unix, not(feature = "a"))');
  });
});

describe('predicate laws', () => {
  const leaf = fc.oneof(
    fc.constantFrom('unix', 'windows', 'miri').map((name): Cfg => ({ kind: 'flag', name })),
    fc.constantFrom('serde', 'ffi', 'simd').map((value): Cfg => ({ kind: 'keyvalue', key: 'feature', value })),
    fc.constantFrom('linux', 'macos').map((value): Cfg => ({ kind: 'keyvalue', key: 'target_os', value }))
  );
  const { cfg } = fc.letrec<{ cfg: Cfg }>((tie) => ({
    cfg: fc.oneof(
      { depthSize: 'small', withCrossShrink: true },
      leaf,
      fc.array(tie('cfg'), { maxLength: 3 }).map((items): Cfg => ({ kind: 'all', items })),
      fc.array(tie('cfg'), { maxLength: 3 }).map((items): Cfg => ({ kind: 'any', items })),
      tie('cfg').map((item): Cfg => ({ kind: 'not', item }))
    ),
  }));

  it('double negation is the identity', () => {
    fc.assert(
      fc.property(cfg, (p) => {
        expect(evaluateCfg({ kind: 'not', item: { kind: 'not', item: p } }, linux)).toBe(evaluateCfg(p, linux));
      })
    );
  });

  it('not(all(a, b)) equals any(not(a), not(b))', () => {
    fc.assert(
      fc.property(cfg, cfg, (a, b) => {
        const left: Cfg = { kind: 'not', item: { kind: 'all', items: [a, b] } };
        const right: Cfg = {
          kind: 'any',
          items: [
            { kind: 'not', item: a },
            { kind: 'not', item: b },
          ],
        };
        expect(evaluateCfg(left, linux)).toBe(evaluateCfg(right, linux));
      })
    );
  });

  it('formatted text parses back to the same predicate', () => {
    fc.assert(
      fc.property(cfg, (p) => {
        expect(parseCfg(formatCfg(p))).toEqual(p);
      })
    );
  });
});
