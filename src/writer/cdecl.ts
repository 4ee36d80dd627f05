/**
 * C declarators.
 *
 * A type is decomposed into a base type name and a chain of declarators
 * (pointer, array, function), outermost first. Writing walks the chain
 * backwards for the part left of the identifier and forwards for the part
 * right of it, adding parentheses where a pointer binds to an array or a
 * function.
 *
 * @packageDocumentation
 */

import type { ArgLayout } from '../config/types.js';
import type { FunctionEntity, Param, PrimitiveKind, TypeRef } from '../ir/types.js';
import { SourceWriter } from './source-writer.js';

/**
 * C spelling of each primitive.
 */
export const PRIMITIVE_C_NAMES: Readonly<Record<PrimitiveKind, string>> = {
  void: 'void',
  never: 'void',
  bool: 'bool',
  char: 'uint32_t',
  i8: 'int8_t',
  i16: 'int16_t',
  i32: 'int32_t',
  i64: 'int64_t',
  u8: 'uint8_t',
  u16: 'uint16_t',
  u32: 'uint32_t',
  u64: 'uint64_t',
  isize: 'intptr_t',
  usize: 'uintptr_t',
  f32: 'float',
  f64: 'double',
  c_void: 'void',
  c_char: 'char',
  c_schar: 'signed char',
  c_uchar: 'unsigned char',
  c_short: 'short',
  c_ushort: 'unsigned short',
  c_int: 'int',
  c_uint: 'unsigned int',
  c_long: 'long',
  c_ulong: 'unsigned long',
  c_longlong: 'long long',
  c_ulonglong: 'unsigned long long',
  c_float: 'float',
  c_double: 'double',
  va_list: 'va_list',
};

/**
 * Settings that shape declarators.
 */
export interface DeclaratorOptions {
  /** C spelling of a named type, given its canonical name. */
  readonly typeName: (name: string) => string;
  /** Parameter layout of function pointer types. */
  readonly layout: ArgLayout;
  readonly lineLength: number;
  /** Written after the parameter list of functions that never return. */
  readonly noReturn: string;
  readonly nonNullAttribute: string;
  readonly nullableAttribute: string;
}

interface DeclParam {
  readonly name?: string;
  readonly decl: CDecl;
}

type Declarator =
  | { readonly kind: 'ptr'; readonly isConst: boolean; readonly nullable: boolean }
  | { readonly kind: 'array'; readonly length: string }
  | {
      readonly kind: 'func';
      readonly params: readonly DeclParam[];
      readonly layout: ArgLayout;
      readonly neverReturn: boolean;
      readonly variadic: boolean;
    };

function bindsLikePointer(declarator: Declarator | undefined): boolean {
  return declarator?.kind === 'ptr' || declarator?.kind === 'func';
}

/**
 * A base type with its declarator chain.
 */
class CDecl {
  private qualifier = '';
  private baseName = '';
  private readonly declarators: Declarator[] = [];

  constructor(private readonly options: DeclaratorOptions) {}

  static fromType(ref: TypeRef, options: DeclaratorOptions): CDecl {
    const decl = new CDecl(options);
    decl.build(ref, false);
    return decl;
  }

  static fromParam(param: Param, options: DeclaratorOptions): CDecl {
    const decl = new CDecl(options);
    if (param.arrayLength !== undefined && param.type.kind === 'pointer') {
      decl.declarators.push({ kind: 'array', length: param.arrayLength });
      decl.build(param.type.target, !param.type.mutable);
    } else {
      decl.build(param.type, false);
    }
    return decl;
  }

  static fromFunction(fn: FunctionEntity, layout: ArgLayout, options: DeclaratorOptions): CDecl {
    const decl = new CDecl(options);
    decl.declarators.push({
      kind: 'func',
      params: fn.params.map((p) => ({
        ...(p.exportName !== undefined ? { name: p.exportName } : {}),
        decl: CDecl.fromParam(p, options),
      })),
      layout,
      neverReturn: fn.neverReturn,
      variadic: fn.variadic,
    });
    decl.build(fn.returns, false);
    return decl;
  }

  private build(ref: TypeRef, isConst: boolean): void {
    switch (ref.kind) {
      case 'primitive':
        this.qualifier = isConst ? 'const' : '';
        this.baseName = PRIMITIVE_C_NAMES[ref.name];
        return;
      case 'path':
        this.qualifier = isConst ? 'const' : '';
        this.baseName = this.options.typeName(ref.name);
        return;
      case 'pointer':
        this.declarators.push({ kind: 'ptr', isConst, nullable: ref.nullable });
        this.build(ref.target, !ref.mutable);
        return;
      case 'array':
        this.declarators.push({ kind: 'array', length: ref.length });
        this.build(ref.element, isConst);
        return;
      case 'fnptr':
        this.declarators.push({ kind: 'ptr', isConst: false, nullable: ref.nullable });
        this.declarators.push({
          kind: 'func',
          params: ref.params.map((p) => ({
            ...(p.name !== undefined ? { name: p.name } : {}),
            decl: CDecl.fromType(p.type, this.options),
          })),
          layout: this.options.layout,
          neverReturn: ref.neverReturn,
          variadic: false,
        });
        this.build(ref.returns, false);
        return;
    }
  }

  write(out: SourceWriter, ident: string | undefined): void {
    if (this.qualifier !== '') {
      out.write(`${this.qualifier} `);
    }
    out.write(this.baseName);
    if (ident !== undefined) {
      out.write(' ');
    }

    for (let i = this.declarators.length - 1; i >= 0; i--) {
      const declarator = this.declarators[i];
      const nextBindsLikePointer = bindsLikePointer(this.declarators[i - 1]);
      switch (declarator?.kind) {
        case 'ptr':
          out.write('*');
          if (declarator.isConst) {
            out.write('const ');
          }
          if (!declarator.nullable && this.options.nonNullAttribute !== '') {
            out.write(`${this.options.nonNullAttribute} `);
          } else if (declarator.nullable && this.options.nullableAttribute !== '') {
            out.write(`${this.options.nullableAttribute} `);
          }
          break;
        case 'array':
        case 'func':
          if (nextBindsLikePointer) {
            out.write('(');
          }
          break;
        case undefined:
          break;
      }
    }

    if (ident !== undefined) {
      out.write(ident);
    }

    let lastWasPointer = false;
    for (const declarator of this.declarators) {
      switch (declarator.kind) {
        case 'ptr':
          lastWasPointer = true;
          break;
        case 'array':
          if (lastWasPointer) {
            out.write(')');
          }
          out.write(`[${declarator.length}]`);
          lastWasPointer = false;
          break;
        case 'func':
          if (lastWasPointer) {
            out.write(')');
          }
          this.writeParams(out, declarator);
          if (declarator.neverReturn && this.options.noReturn !== '') {
            out.write(` ${this.options.noReturn}`);
          }
          lastWasPointer = true;
          break;
      }
    }
  }

  private writeParams(
    out: SourceWriter,
    func: Extract<Declarator, { kind: 'func' }>
  ): void {
    out.write('(');
    if (func.params.length === 0 && !func.variadic) {
      out.write('void');
    }

    const writeHorizontal = (target: SourceWriter): void => {
      func.params.forEach((param, i) => {
        if (i > 0) {
          target.write(', ');
        }
        param.decl.write(target, param.name);
      });
      if (func.variadic) {
        target.write(func.params.length > 0 ? ', ...' : '...');
      }
    };

    const writeVertical = (target: SourceWriter): void => {
      target.alignTo(target.column);
      func.params.forEach((param, i) => {
        if (i > 0) {
          target.write(',').newLine();
        }
        param.decl.write(target, param.name);
      });
      if (func.variadic) {
        if (func.params.length > 0) {
          target.write(',').newLine();
        }
        target.write('...');
      }
      target.dedent();
    };

    switch (func.layout) {
      case 'horizontal':
        writeHorizontal(out);
        break;
      case 'vertical':
        writeVertical(out);
        break;
      case 'auto':
        if (!out.tryWrite(writeHorizontal, this.options.lineLength)) {
          writeVertical(out);
        }
        break;
    }
    out.write(')');
  }
}

/**
 * Writes a declaration of `ident` with the given type, or the bare type
 * when `ident` is undefined.
 */
export function writeDeclaration(
  out: SourceWriter,
  ref: TypeRef,
  ident: string | undefined,
  options: DeclaratorOptions
): void {
  CDecl.fromType(ref, options).write(out, ident);
}

/**
 * Writes a function prototype without the trailing semicolon.
 *
 * @param out - Target writer.
 * @param fn - The function; parameters use their export names and array lengths.
 * @param layout - Parameter layout.
 * @param options - Declarator settings.
 */
export function writeFunctionDeclarator(
  out: SourceWriter,
  fn: FunctionEntity,
  layout: ArgLayout,
  options: DeclaratorOptions
): void {
  CDecl.fromFunction(fn, layout, options).write(out, fn.exportName);
}

/**
 * Renders a type or declaration on a single line.
 *
 * @example
 * formatDeclaration({ kind: 'primitive', name: 'i32' }, 'count', options) // 'int32_t count'
 */
export function formatDeclaration(
  ref: TypeRef,
  ident: string | undefined,
  options: DeclaratorOptions
): string {
  const out = new SourceWriter(0);
  writeDeclaration(out, ref, ident, { ...options, layout: 'horizontal' });
  return out.toString().replace(/\n$/, '');
}
