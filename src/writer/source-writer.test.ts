import { describe, expect, it } from 'vitest';
import { SourceWriter } from './source-writer.js';

describe('SourceWriter', () => {
  it('should indent lines opened after indent()', () => {
    const out = new SourceWriter(2);
    out.write('a {').newLine().indent().write('b;').newLine().dedent().write('}');

    expect(out.toString()).toBe('a {\n  b;\n}\n');
  });

  it('should keep blank lines empty inside indented blocks', () => {
    const out = new SourceWriter(4);
    out.indent().write('x').blankLine().write('y');

    expect(out.toString()).toBe('    x\n\n    y\n');
  });

  it('should align continuation lines to a column', () => {
    const out = new SourceWriter(2);
    out.write('foo(');
    out.alignTo(out.column).write('a,').newLine().write('b');

    expect(out.toString()).toBe('foo(a,\n    b\n');
  });

  it('should write each line of a block at the current indentation', () => {
    const out = new SourceWriter(2);
    out.indent().writeBlock('a\nb');

    expect(out.toString()).toBe('  a\n  b\n');
  });

  it('should return an empty string when nothing was written', () => {
    expect(new SourceWriter(2).toString()).toBe('');
  });

  it('should ignore dedent() at the outermost level', () => {
    const out = new SourceWriter(2);
    out.dedent().write('x');

    expect(out.toString()).toBe('x\n');
  });

  describe('tryWrite', () => {
    it('should keep a write that fits', () => {
      const out = new SourceWriter(2);
      out.write('abc');

      expect(out.tryWrite((o) => o.write('def'), 10)).toBe(true);
      expect(out.toString()).toBe('abcdef\n');
    });

    it('should undo a write that runs past the line length', () => {
      const out = new SourceWriter(2);
      out.write('abc');

      expect(out.tryWrite((o) => o.write('defghijk'), 10)).toBe(false);
      expect(out.toString()).toBe('abc\n');
    });

    it('should undo a write that starts a new line', () => {
      const out = new SourceWriter(2);
      out.write('abc');

      expect(out.tryWrite((o) => o.write('d').newLine().write('e'), 100)).toBe(false);
      expect(out.toString()).toBe('abc\n');
    });

    it('should restore the indentation stack', () => {
      const out = new SourceWriter(2);
      out.write('abc');
      out.tryWrite((o) => o.indent().indent().newLine(), 100);
      out.newLine().write('d');

      expect(out.toString()).toBe('abc\nd\n');
    });
  });
});
