import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import {
  ConfigParseError,
  DEFAULT_CONFIG,
  getDefaultConfig,
  mergeConfigRecord,
  parseConfig,
} from './index.js';

describe('Config Parser', () => {
  describe('parseConfig', () => {
    describe('valid TOML parsing', () => {
      it('should parse empty TOML to default config', () => {
        expect(parseConfig('')).toEqual(DEFAULT_CONFIG);
      });

      it('should parse complete valid configuration', () => {
        const toml = `
language = "C"
header = "/* Placeholder license */"
trailer = "/* end */"
include_guard = "SAMPLE_H"
pragma_once = true
autogen_warning = "/* Generated, do not edit. */"
include_version = true
no_includes = false
sys_includes = ["math.h"]
includes = ["extra.h"]
cpp_compat = true
documentation = false
documentation_style = "c99"
line_length = 80
tab_width = 4
style = "tag"

[cfg]
flags = { unix = true, windows = false }
features = { serde = true }
values = { target_os = "linux" }

[export]
include = ["Extra"]
exclude = ["Hidden"]
opaque = ["Handle"]
prefix = "sm_"
rename = { Config = "SampleConfig" }
external_types = ["FILE"]

[fn]
rename_args = "camelCase"
args = "vertical"
no_return = "__attribute__((noreturn))"
deprecated = "__attribute__((deprecated))"
must_use = "__attribute__((warn_unused_result))"

[struct]
rename_fields = "SnakeCase"

[enum]
rename_variants = "ScreamingSnakeCase"
prefix_with_name = true

[ptr]
non_null_attribute = "_Nonnull"
nullable_attribute = "_Nullable"

[specialization]
max_depth = 8
`;
        const config = parseConfig(toml);

        expect(config.header).toBe('/* Placeholder license */');
        expect(config.trailer).toBe('/* end */');
        expect(config.include_guard).toBe('SAMPLE_H');
        expect(config.pragma_once).toBe(true);
        expect(config.autogen_warning).toBe('/* Generated, do not edit. */');
        expect(config.include_version).toBe(true);
        expect(config.sys_includes).toEqual(['math.h']);
        expect(config.includes).toEqual(['extra.h']);
        expect(config.cpp_compat).toBe(true);
        expect(config.documentation).toBe(false);
        expect(config.documentation_style).toBe('c99');
        expect(config.line_length).toBe(80);
        expect(config.tab_width).toBe(4);
        expect(config.style).toBe('tag');

        expect(config.cfg).toEqual({
          flags: { unix: true, windows: false },
          features: { serde: true },
          values: { target_os: 'linux' },
        });
        expect(config.export).toEqual({
          include: ['Extra'],
          exclude: ['Hidden'],
          opaque: ['Handle'],
          prefix: 'sm_',
          rename: { Config: 'SampleConfig' },
          external_types: ['FILE'],
        });
        expect(config.fn).toEqual({
          rename_args: 'camelCase',
          args: 'vertical',
          no_return: '__attribute__((noreturn))',
          deprecated: '__attribute__((deprecated))',
          must_use: '__attribute__((warn_unused_result))',
        });
        expect(config.struct.rename_fields).toBe('SnakeCase');
        expect(config.enum).toEqual({ rename_variants: 'ScreamingSnakeCase', prefix_with_name: true });
        expect(config.ptr).toEqual({ non_null_attribute: '_Nonnull', nullable_attribute: '_Nullable' });
        expect(config.specialization.max_depth).toBe(8);
      });

      it('should merge partial sections with defaults', () => {
        const config = parseConfig(`
[fn]
args = "horizontal"
`);

        expect(config.fn).toEqual({ ...DEFAULT_CONFIG.fn, args: 'horizontal' });
        expect(config.export).toEqual(DEFAULT_CONFIG.export);
        expect(config.line_length).toBe(100);
      });

      it('should accept dotted section headers', () => {
        const config = parseConfig(`
[cfg.values]
target_os = "macos"
`);

        expect(config.cfg.values).toEqual({ target_os: 'macos' });
        expect(config.cfg.flags).toEqual({});
      });

      it('should ignore unknown keys', () => {
        const config = parseConfig(`
unknown_key = 1

[unknown_section]
value = "x"
`);

        expect(config).toEqual(DEFAULT_CONFIG);
      });
    });

    describe('invalid input', () => {
      it('should throw ConfigParseError for invalid TOML syntax', () => {
        expect(() => parseConfig('style = ')).toThrow(ConfigParseError);
        expect(() => parseConfig('style = ')).toThrow(/Invalid TOML syntax/);
      });

      it('should keep the underlying TOML error as cause', () => {
        try {
          parseConfig('[unterminated');
          expect.unreachable('parseConfig should throw');
        } catch (error) {
          expect(error).toBeInstanceOf(ConfigParseError);
          if (error instanceof ConfigParseError) {
            expect(error.cause).toBeInstanceOf(Error);
          }
        }
      });

      it('should reject wrong scalar types with the field path', () => {
        expect(() => parseConfig('line_length = "wide"')).toThrow(
          "Invalid type for 'line_length': expected number, got string"
        );
        expect(() => parseConfig('pragma_once = "yes"')).toThrow(
          "Invalid type for 'pragma_once': expected boolean, got string"
        );
        expect(() => parseConfig('[export]\nprefix = 3')).toThrow(
          "Invalid type for 'export.prefix': expected string, got number"
        );
      });

      it('should reject values outside a fixed set', () => {
        expect(() => parseConfig('style = "struct"')).toThrow(
          "Invalid value for 'style': expected one of 'both', 'type', 'tag', got 'struct'"
        );
        expect(() => parseConfig('[fn]\nargs = "diagonal"')).toThrow(
          "Invalid value for 'fn.args': expected one of 'horizontal', 'vertical', 'auto', got 'diagonal'"
        );
        expect(() => parseConfig('language = "Cxx"')).toThrow(ConfigParseError);
      });

      it('should report the element of an array with the wrong type', () => {
        expect(() => parseConfig('includes = ["a.h", 2]')).toThrow(
          "Invalid type for 'includes[1]': expected string, got number"
        );
      });

      it('should report the entry of a table with the wrong type', () => {
        expect(() => parseConfig('[cfg]\nflags = { unix = "yes" }')).toThrow(
          "Invalid type for 'cfg.flags.unix': expected boolean, got string"
        );
      });

      it('should reject a section that is not a table', () => {
        expect(() => parseConfig('export = "all"')).toThrow(
          "Invalid type for 'export': expected table, got string"
        );
      });
    });
  });

  describe('mergeConfigRecord', () => {
    it('should merge tables key by key over the base', () => {
      const base = parseConfig('[export]\nrename = { A = "Alpha" }\n[cfg]\nflags = { unix = true }');
      const merged = mergeConfigRecord(
        { export: { rename: { B: 'Beta' } }, cfg: { flags: { windows: false } } },
        base
      );

      expect(merged.export.rename).toEqual({ A: 'Alpha', B: 'Beta' });
      expect(merged.cfg.flags).toEqual({ unix: true, windows: false });
    });

    it('should replace arrays', () => {
      const base = parseConfig('[export]\nexclude = ["A", "B"]');
      const merged = mergeConfigRecord({ export: { exclude: ['C'] } }, base);

      expect(merged.export.exclude).toEqual(['C']);
    });

    it('should not modify the base configuration', () => {
      const base = getDefaultConfig();
      mergeConfigRecord({ style: 'tag', fn: { args: 'vertical' } }, base);

      expect(base).toEqual(DEFAULT_CONFIG);
    });
  });

  describe('getDefaultConfig', () => {
    it('should return default configuration', () => {
      const config = getDefaultConfig();

      expect(config).toEqual(DEFAULT_CONFIG);
      expect(config.specialization.max_depth).toBe(32);
      expect(config.style).toBe('both');
      expect(config.documentation_style).toBe('auto');
    });
  });

  describe('property-based tests', () => {
    it('should round-trip any line_length value', () => {
      fc.assert(
        fc.property(fc.integer({ min: 1, max: 1000 }), (lineLength) => {
          const config = parseConfig(`line_length = ${String(lineLength)}`);
          expect(config.line_length).toBe(lineLength);
        })
      );
    });

    it('should accept any identifier as an export prefix', () => {
      fc.assert(
        fc.property(fc.stringMatching(/^[A-Za-z_][A-Za-z0-9_]{0,10}$/), (prefix) => {
          const config = parseConfig(`[export]\nprefix = "${prefix}"`);
          expect(config.export.prefix).toBe(prefix);
        })
      );
    });
  });
});
