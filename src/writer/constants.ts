/**
 * Renders constant expressions as C preprocessor values.
 *
 * @packageDocumentation
 */

import type { ConstExpr } from '../ir/types.js';
import { formatDeclaration } from './cdecl.js';
import type { DeclaratorOptions } from './cdecl.js';

export interface ConstRenderContext {
  /** Canonical name to export name. */
  readonly exportNames: ReadonlyMap<string, string>;
  readonly declarators: DeclaratorOptions;
  /** Whether `!` is logical (boolean constants) rather than bitwise. */
  readonly boolean: boolean;
}

function hexPad(hex: string): string {
  return hex.toUpperCase().padStart(8, '0');
}

/**
 * Rewrites `\u{…}` escapes, which C spells `\U` with eight hex digits.
 */
function convertEscapes(text: string): string {
  return text.replace(/\\u\{([0-9A-Fa-f_]{1,8})\}/g, (_match, hex: string) => `\\U${hexPad(hex.replace(/_/g, ''))}`);
}

function renderFloat(text: string): string {
  return /^[0-9]+$/.test(text) ? `${text}.0` : text;
}

function renderChar(value: string): string {
  if (value.startsWith('\\u{')) {
    return `U'${convertEscapes(value)}'`;
  }
  if (!value.startsWith('\\') && (value.codePointAt(0) ?? 0) > 0x7f) {
    return `U'\\U${hexPad((value.codePointAt(0) ?? 0).toString(16))}'`;
  }
  return `'${value}'`;
}

/**
 * Renders a constant expression.
 *
 * Binary expressions are parenthesized; `!` becomes `~` outside boolean constants.
 *
 * @example
 * renderConstExpr(parseConstExpr('1 << 4'), context) // '(1 << 4)'
 */
export function renderConstExpr(expr: ConstExpr, context: ConstRenderContext): string {
  switch (expr.kind) {
    case 'int':
      return expr.text;
    case 'float':
      return renderFloat(expr.text);
    case 'bool':
      return expr.value ? 'true' : 'false';
    case 'char':
      return renderChar(expr.value);
    case 'string':
      return `"${convertEscapes(expr.value)}"`;
    case 'path':
      return context.exportNames.get(expr.name) ?? expr.name;
    case 'unary': {
      const op = expr.op === '!' && !context.boolean ? '~' : expr.op;
      const operand = renderConstExpr(expr.operand, context);
      return expr.operand.kind === 'unary' ? `${op}(${operand})` : `${op}${operand}`;
    }
    case 'binary':
      return `(${renderConstExpr(expr.left, context)} ${expr.op} ${renderConstExpr(expr.right, context)})`;
    case 'cast':
      return `(${formatDeclaration(expr.type, undefined, context.declarators)})${renderConstExpr(expr.expr, context)}`;
  }
}
