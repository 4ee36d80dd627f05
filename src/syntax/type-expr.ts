/**
 * Parser for type expression strings found in crate dumps.
 *
 * Supports paths with generic arguments, raw pointers, references, fixed-size
 * arrays, function pointers, the unit type and the never type:
 *
 * ```
 * *const Node   &mut T   [u8; 16]   Pair<i32>   Buffer<16>
 * Option<extern "C" fn(len: usize) -> bool>   ()   !
 * ```
 *
 * @packageDocumentation
 */

import type { FnParamExpr, GenericArgExpr, TypeExpr } from './types.js';

/**
 * Error thrown when a type expression string cannot be parsed.
 */
export class TypeExprParseError extends Error {
  /** The full source text being parsed. */
  public readonly source: string;
  /** Character offset where parsing failed. */
  public readonly offset: number;

  /**
   * Creates a new TypeExprParseError.
   *
   * @param message - Description of the failure.
   * @param source - The type expression text.
   * @param offset - Character offset of the failure.
   */
  constructor(message: string, source: string, offset: number) {
    super(`${message} at offset ${String(offset)} in '${source}'`);
    this.name = 'TypeExprParseError';
    this.source = source;
    this.offset = offset;
  }
}

type TokenKind = 'ident' | 'number' | 'string' | 'lifetime' | 'punct' | 'eof';

interface Token {
  readonly kind: TokenKind;
  readonly text: string;
  readonly offset: number;
}

const PUNCTUATION = ['::', '->', '*', '&', '<', '>', '(', ')', '[', ']', ';', ',', '!', ':', '-', '+', '/', '{', '}'];

function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < source.length) {
    const ch = source.charAt(i);

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    if (/[A-Za-z_]/.test(ch)) {
      const start = i;
      while (i < source.length && /[A-Za-z0-9_]/.test(source.charAt(i))) {
        i++;
      }
      tokens.push({ kind: 'ident', text: source.slice(start, i), offset: start });
      continue;
    }

    if (/[0-9]/.test(ch)) {
      const start = i;
      while (i < source.length && /[A-Za-z0-9_.]/.test(source.charAt(i))) {
        i++;
      }
      tokens.push({ kind: 'number', text: source.slice(start, i), offset: start });
      continue;
    }

    if (ch === '"') {
      const start = i;
      i++;
      while (i < source.length && source.charAt(i) !== '"') {
        i++;
      }
      if (i >= source.length) {
        throw new TypeExprParseError('Unterminated string literal', source, start);
      }
      i++;
      tokens.push({ kind: 'string', text: source.slice(start + 1, i - 1), offset: start });
      continue;
    }

    if (ch === "'") {
      const start = i;
      i++;
      while (i < source.length && /[A-Za-z0-9_]/.test(source.charAt(i))) {
        i++;
      }
      tokens.push({ kind: 'lifetime', text: source.slice(start, i), offset: start });
      continue;
    }

    const punct = PUNCTUATION.find((p) => source.startsWith(p, i));
    if (punct === undefined) {
      throw new TypeExprParseError(`Unexpected character '${ch}'`, source, i);
    }
    tokens.push({ kind: 'punct', text: punct, offset: i });
    i += punct.length;
  }

  tokens.push({ kind: 'eof', text: '', offset: source.length });
  return tokens;
}

class TypeExprParser {
  private pos = 0;

  constructor(
    private readonly source: string,
    private readonly tokens: readonly Token[]
  ) {}

  parse(): TypeExpr {
    const result = this.parseType();
    const rest = this.peek();
    if (rest.kind !== 'eof') {
      this.fail(`Unexpected trailing '${rest.text}'`);
    }
    return result;
  }

  private peek(offset = 0): Token {
    const token = this.tokens[Math.min(this.pos + offset, this.tokens.length - 1)];
    if (token === undefined) {
      throw new TypeExprParseError('Unexpected end of input', this.source, this.source.length);
    }
    return token;
  }

  private next(): Token {
    const token = this.peek();
    if (token.kind !== 'eof') {
      this.pos++;
    }
    return token;
  }

  private isPunct(text: string, offset = 0): boolean {
    const token = this.peek(offset);
    return token.kind === 'punct' && token.text === text;
  }

  private isKeyword(text: string): boolean {
    const token = this.peek();
    return token.kind === 'ident' && token.text === text;
  }

  private expectPunct(text: string): void {
    if (!this.isPunct(text)) {
      this.fail(`Expected '${text}'`);
    }
    this.next();
  }

  private fail(message: string): never {
    throw new TypeExprParseError(message, this.source, this.peek().offset);
  }

  private parseType(): TypeExpr {
    if (this.isPunct('!')) {
      this.next();
      return { kind: 'never' };
    }

    if (this.isPunct('(')) {
      this.next();
      if (!this.isPunct(')')) {
        this.fail('Tuple types are not supported; only () is allowed');
      }
      this.next();
      return { kind: 'unit' };
    }

    if (this.isPunct('*')) {
      this.next();
      let mutable: boolean;
      if (this.isKeyword('const')) {
        mutable = false;
      } else if (this.isKeyword('mut')) {
        mutable = true;
      } else {
        this.fail("Expected 'const' or 'mut' after '*'");
      }
      this.next();
      return { kind: 'ptr', mutable, target: this.parseType() };
    }

    if (this.isPunct('&')) {
      this.next();
      if (this.peek().kind === 'lifetime') {
        this.next();
      }
      const mutable = this.isKeyword('mut');
      if (mutable) {
        this.next();
      }
      return { kind: 'ref', mutable, target: this.parseType() };
    }

    if (this.isPunct('[')) {
      return this.parseArray();
    }

    if (this.isKeyword('unsafe') || this.isKeyword('extern') || this.isKeyword('fn')) {
      return this.parseFnPointer();
    }

    if (this.peek().kind === 'ident' || this.isPunct('::')) {
      return this.parsePath();
    }

    return this.fail(`Unexpected '${this.peek().text || 'end of input'}'`);
  }

  private parseArray(): TypeExpr {
    this.expectPunct('[');
    const element = this.parseType();
    if (!this.isPunct(';')) {
      this.fail('Slices are not supported; expected \';\' and an array length');
    }
    this.next();

    const parts: string[] = [];
    let depth = 0;
    while (!(depth === 0 && this.isPunct(']'))) {
      const token = this.next();
      if (token.kind === 'eof') {
        this.fail("Expected ']'");
      }
      if (token.kind === 'punct' && (token.text === '(' || token.text === '{')) depth++;
      if (token.kind === 'punct' && (token.text === ')' || token.text === '}')) depth--;
      parts.push(token.text);
    }
    this.next();

    if (parts.length === 0) {
      this.fail('Missing array length');
    }
    return { kind: 'array', element, length: joinLengthTokens(parts) };
  }

  private parseFnPointer(): TypeExpr {
    if (this.isKeyword('unsafe')) {
      this.next();
    }

    let abi: string | undefined;
    if (this.isKeyword('extern')) {
      this.next();
      abi = 'C';
      if (this.peek().kind === 'string') {
        abi = this.next().text;
      }
    }

    if (!this.isKeyword('fn')) {
      this.fail("Expected 'fn'");
    }
    this.next();
    this.expectPunct('(');

    const params: FnParamExpr[] = [];
    while (!this.isPunct(')')) {
      params.push(this.parseFnParam());
      if (this.isPunct(',')) {
        this.next();
      } else if (!this.isPunct(')')) {
        this.fail("Expected ',' or ')'");
      }
    }
    this.next();

    let returns: TypeExpr = { kind: 'unit' };
    if (this.isPunct('->')) {
      this.next();
      returns = this.parseType();
    }

    return abi === undefined ? { kind: 'fn', params, returns } : { kind: 'fn', params, returns, abi };
  }

  private parseFnParam(): FnParamExpr {
    const first = this.peek();
    if ((first.kind === 'ident' || first.text === '_') && this.isPunct(':', 1) && !this.isPunct('::', 1)) {
      this.next();
      this.next();
      const type = this.parseType();
      return first.text === '_' ? { type } : { name: first.text, type };
    }
    return { type: this.parseType() };
  }

  private parsePath(): TypeExpr {
    if (this.isPunct('::')) {
      this.next();
    }

    const segments: string[] = [];
    for (;;) {
      const token = this.next();
      if (token.kind !== 'ident') {
        this.fail('Expected identifier in path');
      }
      segments.push(token.text);
      if (this.isPunct('::') && this.peek(1).kind === 'ident') {
        this.next();
        continue;
      }
      break;
    }

    const args: GenericArgExpr[] = [];
    if (this.isPunct('<')) {
      this.next();
      while (!this.isPunct('>')) {
        const arg = this.parseGenericArg();
        if (arg !== undefined) {
          args.push(arg);
        }
        if (this.isPunct(',')) {
          this.next();
        } else if (!this.isPunct('>')) {
          this.fail("Expected ',' or '>'");
        }
      }
      this.next();
    }

    return { kind: 'path', segments, args };
  }

  /** Lifetime arguments carry no layout and are skipped. */
  private parseGenericArg(): GenericArgExpr | undefined {
    const token = this.peek();
    if (token.kind === 'lifetime') {
      this.next();
      return undefined;
    }
    if (token.kind === 'number') {
      this.next();
      return { kind: 'const', value: token.text };
    }
    if (this.isPunct('-') && this.peek(1).kind === 'number') {
      this.next();
      return { kind: 'const', value: `-${this.next().text}` };
    }
    if (this.isPunct('{')) {
      this.next();
      const parts: string[] = [];
      while (!this.isPunct('}')) {
        const inner = this.next();
        if (inner.kind === 'eof') {
          this.fail("Expected '}'");
        }
        parts.push(inner.text);
      }
      this.next();
      return { kind: 'const', value: joinLengthTokens(parts) };
    }
    return { kind: 'type', type: this.parseType() };
  }
}

function joinLengthTokens(parts: readonly string[]): string {
  return parts.join(' ').replace(/\( /g, '(').replace(/ \)/g, ')');
}

/**
 * Parses a type expression string into a {@link TypeExpr} tree.
 *
 * @param source - Type expression text, e.g. `*const Pair<i32>`.
 * @returns The parsed tree.
 * @throws TypeExprParseError if the text is not a supported type expression.
 *
 * @example
 * ```typescript
 * const expr = parseTypeExpr('[u8; 16]');
 * // { kind: 'array', element: { kind: 'path', segments: ['u8'], args: [] }, length: '16' }
 * ```
 */
export function parseTypeExpr(source: string): TypeExpr {
  return new TypeExprParser(source, tokenize(source)).parse();
}

/**
 * Renders a type expression back to source-like text, for diagnostics.
 *
 * @param expr - The expression to render.
 * @returns Source-like text.
 */
export function formatTypeExpr(expr: TypeExpr): string {
  switch (expr.kind) {
    case 'path': {
      const name = expr.segments.join('::');
      if (expr.args.length === 0) {
        return name;
      }
      const args = expr.args.map((a) => (a.kind === 'const' ? a.value : formatTypeExpr(a.type)));
      return `${name}<${args.join(', ')}>`;
    }
    case 'ptr':
      return `*${expr.mutable ? 'mut' : 'const'} ${formatTypeExpr(expr.target)}`;
    case 'ref':
      return `&${expr.mutable ? 'mut ' : ''}${formatTypeExpr(expr.target)}`;
    case 'array':
      return `[${formatTypeExpr(expr.element)}; ${expr.length}]`;
    case 'fn': {
      const params = expr.params.map((p) =>
        p.name === undefined ? formatTypeExpr(p.type) : `${p.name}: ${formatTypeExpr(p.type)}`
      );
      const prefix = expr.abi === undefined ? '' : `extern "${expr.abi}" `;
      const ret = expr.returns.kind === 'unit' ? '' : ` -> ${formatTypeExpr(expr.returns)}`;
      return `${prefix}fn(${params.join(', ')})${ret}`;
    }
    case 'unit':
      return '()';
    case 'never':
      return '!';
  }
}
