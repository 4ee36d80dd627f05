/**
 * Line-oriented text builder with indentation and column alignment.
 *
 * @packageDocumentation
 */

/**
 * Accumulates output lines. Indentation is applied when the first text of a
 * line is written, so blank lines stay empty.
 */
export class SourceWriter {
  private readonly lines: string[] = [];
  private current = '';
  private readonly indents: number[] = [0];

  /**
   * @param tabWidth - Spaces per indentation level.
   */
  constructor(private readonly tabWidth: number) {}

  private get indentation(): number {
    return this.indents[this.indents.length - 1] ?? 0;
  }

  /**
   * Appends text to the current line. The text must not contain line breaks.
   */
  write(text: string): this {
    if (text === '') {
      return this;
    }
    if (this.current === '') {
      this.current = ' '.repeat(this.indentation);
    }
    this.current += text;
    return this;
  }

  /**
   * Writes each line of a multi-line block at the current indentation.
   */
  writeBlock(text: string): this {
    text.split('\n').forEach((line, i) => {
      if (i > 0) {
        this.newLine();
      }
      this.write(line);
    });
    return this;
  }

  newLine(): this {
    this.lines.push(this.current);
    this.current = '';
    return this;
  }

  /**
   * Ends the current line, if it holds text, and writes one empty line.
   */
  blankLine(): this {
    if (this.current !== '') {
      this.newLine();
    }
    this.lines.push('');
    return this;
  }

  indent(): this {
    this.indents.push(this.indentation + this.tabWidth);
    return this;
  }

  /**
   * Sets the indentation of following lines to an absolute column.
   */
  alignTo(column: number): this {
    this.indents.push(column);
    return this;
  }

  /**
   * Undoes the last {@link SourceWriter.indent} or {@link SourceWriter.alignTo}.
   */
  dedent(): this {
    if (this.indents.length > 1) {
      this.indents.pop();
    }
    return this;
  }

  /**
   * Length of the current line.
   */
  get column(): number {
    return this.current.length;
  }

  /**
   * Runs a write on trial. The write is kept when it stays on the current
   * line within `maxLength` columns; otherwise everything it wrote is undone.
   *
   * @returns Whether the write was kept.
   */
  tryWrite(write: (out: SourceWriter) => void, maxLength: number): boolean {
    const lineCount = this.lines.length;
    const saved = this.current;
    const indentDepth = this.indents.length;
    write(this);
    if (this.lines.length === lineCount && this.current.length <= maxLength) {
      return true;
    }
    this.lines.length = lineCount;
    this.current = saved;
    this.indents.length = indentDepth;
    return false;
  }

  /**
   * The text written so far, with a final line break.
   */
  toString(): string {
    const all = this.current === '' ? this.lines : [...this.lines, this.current];
    return all.length === 0 ? '' : `${all.join('\n')}\n`;
  }
}
