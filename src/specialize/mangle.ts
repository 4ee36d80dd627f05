/**
 * Name mangling for monomorphized entities.
 *
 * | Argument                | Mangled          |
 * |-------------------------|------------------|
 * | `Pair<i32>`             | `Pair_i32`       |
 * | `Map<K, V>`             | `Map_K__V`       |
 * | `Outer<Inner<u8>>`      | `Outer_Inner_u8_`|
 * | `*const T` / `*mut T`   | `ptr_T` / `mut_ptr_T` |
 * | `[T; 4]`                | `array_T_4`      |
 * | `fn(A, B) -> R`         | `fn_A__B_ret_R`  |
 * | `Buffer<-5>`            | `Buffer_neg5`    |
 * | `Buffer<{4 * 2}>`       | `Buffer_4_mul_2` |
 *
 * Arguments are normalized with {@link normalizeGenericArgs} before they are
 * keyed or mangled: a reference and a raw pointer to the same target are one
 * C type, and so are `fn` and `Option<fn>`.
 *
 * @packageDocumentation
 */

import type { GenericArg, TypeRef } from '../ir/types.js';

const OPEN = '_';
const SEPARATOR = '__';
const CLOSE = '_';

const CONST_TOKEN = /[A-Za-z0-9_]+|<<|>>|::|\S/g;

const OPERATOR_WORDS: ReadonlyMap<string, string> = new Map([
  ['+', 'add'],
  ['-', 'sub'],
  ['*', 'mul'],
  ['/', 'div'],
  ['%', 'rem'],
  ['<<', 'shl'],
  ['>>', 'shr'],
  ['<', 'lt'],
  ['>', 'gt'],
  ['&', 'and'],
  ['|', 'or'],
  ['^', 'xor'],
  ['!', 'not'],
  ['~', 'bitnot'],
  ['(', 'lp'],
  [')', 'rp'],
  ['::', 'path'],
]);

function isWord(token: string): boolean {
  return /^[A-Za-z0-9_]+$/.test(token);
}

/** A `-` is unary at the start, after an operator and after `(`. */
function isUnaryMinus(tokens: readonly string[], index: number): boolean {
  const previous = tokens[index - 1];
  return tokens[index] === '-' && (previous === undefined || (!isWord(previous) && previous !== ')'));
}

function constTokens(value: string): string[] {
  return value.match(CONST_TOKEN) ?? [];
}

/**
 * Rewrites a const argument in one spelling: tokens separated by single
 * spaces, none inside parentheses, and unary minus attached to its operand.
 *
 * @example
 * normalizeConst('- 5')        // '-5'
 * normalizeConst('( 4+2 ) *3') // '(4 + 2) * 3'
 */
export function normalizeConst(value: string): string {
  const tokens = constTokens(value);
  let text = '';
  tokens.forEach((token, index) => {
    const previous = tokens[index - 1];
    const glued = previous === undefined || previous === '(' || token === ')' || isUnaryMinus(tokens, index - 1);
    text += glued ? token : ` ${token}`;
  });
  return text;
}

function mangleConst(value: string): string {
  const tokens = constTokens(value);
  const pieces: string[] = [];
  let pending = '';
  tokens.forEach((token, index) => {
    if (isUnaryMinus(tokens, index)) {
      pending += 'neg';
      return;
    }
    const word = OPERATOR_WORDS.get(token) ?? (isWord(token) ? token : `x${token.charCodeAt(0).toString(16)}`);
    pieces.push(pending + word);
    pending = '';
  });
  return pieces.join('_');
}

function normalizeType(ref: TypeRef): TypeRef {
  switch (ref.kind) {
    case 'primitive':
      return ref;
    case 'path':
      return ref.args.length === 0 ? ref : { ...ref, args: normalizeGenericArgs(ref.args) };
    case 'pointer':
      return { kind: 'pointer', target: normalizeType(ref.target), mutable: ref.mutable, nullable: true, isRef: false };
    case 'array':
      return { kind: 'array', element: normalizeType(ref.element), length: normalizeConst(ref.length) };
    case 'fnptr':
      return {
        kind: 'fnptr',
        params: ref.params.map((p) => ({ type: normalizeType(p.type) })),
        returns: normalizeType(ref.returns),
        nullable: true,
        neverReturn: ref.neverReturn,
      };
  }
}

/**
 * Brings generic arguments to the form instantiations are keyed on.
 * Pointers become nullable raw pointers, function pointers become nullable
 * and lose their parameter names, and const values are respelled by
 * {@link normalizeConst}.
 */
export function normalizeGenericArgs(args: readonly GenericArg[]): GenericArg[] {
  return args.map((arg) =>
    arg.kind === 'const' ? { kind: 'const', value: normalizeConst(arg.value) } : { kind: 'type', type: normalizeType(arg.type) }
  );
}

function mangleArgs(args: readonly GenericArg[]): string {
  return args.map(mangleArg).join(SEPARATOR);
}

function mangleArg(arg: GenericArg): string {
  return arg.kind === 'const' ? mangleConst(arg.value) : mangleType(arg.type);
}

/**
 * Mangles a type appearing as a generic argument.
 *
 * @param ref - The argument type.
 * @returns An identifier fragment.
 */
export function mangleType(ref: TypeRef): string {
  switch (ref.kind) {
    case 'primitive':
      return ref.name;
    case 'path':
      return ref.args.length === 0 ? ref.name : `${ref.name}${OPEN}${mangleArgs(ref.args)}${CLOSE}`;
    case 'pointer':
      return `${ref.mutable ? 'mut_' : ''}ptr_${mangleType(ref.target)}`;
    case 'array':
      return `array_${mangleType(ref.element)}_${mangleConst(ref.length)}`;
    case 'fnptr': {
      const params = ref.params.map((p) => mangleType(p.type));
      const head = params.length === 0 ? 'fn' : `fn_${params.join(SEPARATOR)}`;
      return `${head}_ret_${mangleType(ref.returns)}`;
    }
  }
}

/**
 * Mangles a generic entity name with concrete arguments.
 *
 * @param name - Canonical name of the generic entity.
 * @param args - Concrete arguments.
 * @returns The mangled name; `name` itself when there are no arguments.
 *
 * @example
 * mangleName('Pair', [{ kind: 'type', type: { kind: 'primitive', name: 'i32' } }]) // 'Pair_i32'
 */
export function mangleName(name: string, args: readonly GenericArg[]): string {
  return args.length === 0 ? name : `${name}${OPEN}${mangleArgs(args)}`;
}
