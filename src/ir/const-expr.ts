/**
 * Parser for constant value expressions.
 *
 * Accepts literals (integers in any radix, floats, booleans, chars, strings),
 * references to other constants, unary `-`/`!`, binary arithmetic and bitwise
 * operators, parentheses and `as` casts to primitive or named types.
 *
 * @packageDocumentation
 */

import { primitiveKind } from './type-ref.js';
import type { ConstExpr, TypeRef } from './types.js';

/**
 * Error thrown for values outside the supported expression subset.
 */
export class ConstExprParseError extends Error {
  /** The expression text. */
  public readonly source: string;

  constructor(message: string, source: string) {
    super(`${message} in constant expression '${source}'`);
    this.name = 'ConstExprParseError';
    this.source = source;
  }
}

type Token =
  | { readonly kind: 'int' | 'float' | 'ident' | 'string' | 'char'; readonly text: string }
  | { readonly kind: 'op'; readonly text: string };

const INT_SUFFIX = /(?:u8|u16|u32|u64|u128|usize|i8|i16|i32|i64|i128|isize)$/;
const FLOAT_SUFFIX = /(?:f32|f64)$/;
const OPERATORS = ['<<', '>>', '::', '+', '-', '*', '/', '%', '&', '|', '^', '!', '(', ')'];

/** Binding power of binary operators, loosest first. */
const PRECEDENCE: Readonly<Record<string, number>> = {
  '|': 1,
  '^': 2,
  '&': 3,
  '<<': 4,
  '>>': 4,
  '+': 5,
  '-': 5,
  '*': 6,
  '/': 6,
  '%': 6,
};

function normalizeInt(raw: string, source: string): string {
  const text = raw.replace(/_/g, '').replace(INT_SUFFIX, '');
  if (/^0x[0-9a-fA-F]+$/.test(text) || /^[0-9]+$/.test(text)) {
    return text;
  }
  if (/^0o[0-7]+$/.test(text)) {
    return `0${text.slice(2)}`;
  }
  if (/^0b[01]+$/.test(text)) {
    return BigInt(text).toString();
  }
  throw new ConstExprParseError(`Invalid integer literal '${raw}'`, source);
}

function readQuoted(source: string, start: number, quote: string): { text: string; end: number } {
  let i = start + 1;
  let text = '';
  while (i < source.length && source.charAt(i) !== quote) {
    if (source.charAt(i) === '\\') {
      text += source.slice(i, i + 2);
      i += 2;
      continue;
    }
    text += source.charAt(i);
    i++;
  }
  if (i >= source.length) {
    throw new ConstExprParseError('Unterminated literal', source);
  }
  return { text, end: i + 1 };
}

function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;
  while (i < source.length) {
    const ch = source.charAt(i);
    if (/\s/.test(ch)) {
      i++;
      continue;
    }
    if (/[0-9]/.test(ch)) {
      const match = /^[0-9][0-9A-Za-z_]*(?:\.[0-9][0-9_]*)?(?:[eE][+-]?[0-9]+)?[A-Za-z0-9_]*/.exec(
        source.slice(i)
      );
      const text = match?.[0] ?? ch;
      const isFloat =
        !/^0[xob]/.test(text) && (text.includes('.') || /[eE][+-]?[0-9]/.test(text) || FLOAT_SUFFIX.test(text));
      tokens.push(
        isFloat
          ? { kind: 'float', text: text.replace(/_/g, '').replace(FLOAT_SUFFIX, '') }
          : { kind: 'int', text: normalizeInt(text, source) }
      );
      i += text.length;
      continue;
    }
    if (/[A-Za-z_]/.test(ch)) {
      const match = /^[A-Za-z_][A-Za-z0-9_]*/.exec(source.slice(i));
      const text = match?.[0] ?? ch;
      tokens.push({ kind: 'ident', text });
      i += text.length;
      continue;
    }
    if (ch === '"' || ch === "'") {
      const { text, end } = readQuoted(source, i, ch);
      tokens.push({ kind: ch === '"' ? 'string' : 'char', text });
      i = end;
      continue;
    }
    const op = OPERATORS.find((o) => source.startsWith(o, i));
    if (op === undefined) {
      throw new ConstExprParseError(`Unexpected character '${ch}'`, source);
    }
    tokens.push({ kind: 'op', text: op });
    i += op.length;
  }
  return tokens;
}

/**
 * Parses a constant value expression.
 *
 * @param source - Expression text from the dump.
 * @returns The expression tree.
 * @throws ConstExprParseError for unsupported syntax.
 */
export function parseConstExpr(source: string): ConstExpr {
  const tokens = tokenize(source);
  let pos = 0;

  const peekOp = (): string | undefined => {
    const token = tokens[pos];
    return token?.kind === 'op' ? token.text : undefined;
  };

  const readPath = (first: string): string => {
    let name = first;
    while (peekOp() === '::') {
      pos++;
      const next = tokens[pos];
      if (next?.kind !== 'ident') {
        throw new ConstExprParseError("Expected identifier after '::'", source);
      }
      name = next.text;
      pos++;
    }
    return name;
  };

  const parseCastType = (): TypeRef => {
    const token = tokens[pos];
    if (token?.kind !== 'ident') {
      throw new ConstExprParseError("Expected type after 'as'", source);
    }
    pos++;
    const name = readPath(token.text);
    const primitive = primitiveKind(name);
    return primitive !== undefined ? { kind: 'primitive', name: primitive } : { kind: 'path', name, args: [] };
  };

  const parsePrimary = (): ConstExpr => {
    const token = tokens[pos];
    if (token === undefined) {
      throw new ConstExprParseError('Unexpected end of expression', source);
    }
    pos++;
    switch (token.kind) {
      case 'int':
        return { kind: 'int', text: token.text };
      case 'float':
        return { kind: 'float', text: token.text };
      case 'string':
        return { kind: 'string', value: token.text };
      case 'char':
        return { kind: 'char', value: token.text };
      case 'ident':
        if (token.text === 'true' || token.text === 'false') {
          return { kind: 'bool', value: token.text === 'true' };
        }
        return { kind: 'path', name: readPath(token.text) };
      case 'op':
        if (token.text === '(') {
          const inner = parseBinary(0);
          if (peekOp() !== ')') {
            throw new ConstExprParseError("Expected ')'", source);
          }
          pos++;
          return inner;
        }
        if (token.text === '-' || token.text === '!') {
          return { kind: 'unary', op: token.text, operand: parseUnary() };
        }
        throw new ConstExprParseError(`Unexpected '${token.text}'`, source);
    }
  };

  const parseUnary = (): ConstExpr => {
    let expr = parsePrimary();
    for (;;) {
      const token = tokens[pos];
      if (token?.kind !== 'ident' || token.text !== 'as') {
        return expr;
      }
      pos++;
      expr = { kind: 'cast', expr, type: parseCastType() };
    }
  };

  const parseBinary = (minPrecedence: number): ConstExpr => {
    let left = parseUnary();
    for (;;) {
      const op = peekOp();
      const precedence = op === undefined ? undefined : PRECEDENCE[op];
      if (op === undefined || precedence === undefined || precedence <= minPrecedence) {
        return left;
      }
      pos++;
      const right = parseBinary(precedence);
      left = { kind: 'binary', op, left, right };
    }
  };

  if (tokens.length === 0) {
    throw new ConstExprParseError('Empty expression', source);
  }
  const result = parseBinary(0);
  if (pos !== tokens.length) {
    throw new ConstExprParseError('Unexpected trailing input', source);
  }
  return result;
}

/**
 * Lists the constant names an expression refers to.
 */
export function constExprReferences(expr: ConstExpr): string[] {
  switch (expr.kind) {
    case 'path':
      return [expr.name];
    case 'unary':
      return constExprReferences(expr.operand);
    case 'binary':
      return [...constExprReferences(expr.left), ...constExprReferences(expr.right)];
    case 'cast':
      return constExprReferences(expr.expr);
    default:
      return [];
  }
}
