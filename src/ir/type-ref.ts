/**
 * Type reference construction and traversal.
 *
 * @packageDocumentation
 */

import type { GenericArgExpr, TypeExpr } from '../syntax/types.js';
import type { Entity, GenericArg, PrimitiveKind, TypeRef } from './types.js';

const PRIMITIVES: ReadonlySet<string> = new Set<PrimitiveKind>([
  'bool',
  'char',
  'i8',
  'i16',
  'i32',
  'i64',
  'u8',
  'u16',
  'u32',
  'u64',
  'isize',
  'usize',
  'f32',
  'f64',
  'c_void',
  'c_char',
  'c_schar',
  'c_uchar',
  'c_short',
  'c_ushort',
  'c_int',
  'c_uint',
  'c_long',
  'c_ulong',
  'c_longlong',
  'c_ulonglong',
  'c_float',
  'c_double',
  'va_list',
]);

const NON_ZERO: Readonly<Record<string, PrimitiveKind>> = {
  NonZeroU8: 'u8',
  NonZeroU16: 'u16',
  NonZeroU32: 'u32',
  NonZeroU64: 'u64',
  NonZeroUsize: 'usize',
  NonZeroI8: 'i8',
  NonZeroI16: 'i16',
  NonZeroI32: 'i32',
  NonZeroI64: 'i64',
  NonZeroIsize: 'isize',
};

/** Wrappers whose layout is exactly their single type argument. */
const TRANSPARENT_WRAPPERS: ReadonlySet<string> = new Set(['ManuallyDrop', 'MaybeUninit']);

/** Wrappers that own or borrow through a non-null pointer. */
const POINTER_WRAPPERS: ReadonlySet<string> = new Set(['NonNull', 'Box']);

function isPrimitiveKind(name: string): name is PrimitiveKind {
  return PRIMITIVES.has(name);
}

/**
 * Looks up the primitive a bare path names.
 *
 * @param name - Last path segment.
 * @returns The primitive kind, or undefined for non-primitive names.
 */
export function primitiveKind(name: string): PrimitiveKind | undefined {
  if (isPrimitiveKind(name)) {
    return name;
  }
  if (name === 'VaList') {
    return 'va_list';
  }
  return NON_ZERO[name];
}

function convertGenericArg(arg: GenericArgExpr): GenericArg {
  return arg.kind === 'const'
    ? { kind: 'const', value: arg.value }
    : { kind: 'type', type: convertTypeExpr(arg.type) };
}

function convertPath(segments: readonly string[], argExprs: readonly GenericArgExpr[]): TypeRef {
  const name = segments[segments.length - 1] ?? '';
  const args = argExprs.map(convertGenericArg);

  if (args.length === 0) {
    const primitive = primitiveKind(name);
    if (primitive !== undefined) {
      return { kind: 'primitive', name: primitive };
    }
    return { kind: 'path', name, args };
  }

  const [first] = args;
  if (args.length === 1 && first?.kind === 'type') {
    const inner = first.type;
    if (TRANSPARENT_WRAPPERS.has(name)) {
      return inner;
    }
    if (POINTER_WRAPPERS.has(name)) {
      return { kind: 'pointer', target: inner, mutable: true, nullable: false, isRef: false };
    }
    if (name === 'Option') {
      if (inner.kind === 'pointer' && !inner.nullable) {
        return { ...inner, nullable: true };
      }
      if (inner.kind === 'fnptr' && !inner.nullable) {
        return { ...inner, nullable: true };
      }
      // Option<NonZeroU32> has the layout of u32.
      const argExpr = argExprs[0];
      if (argExpr?.kind === 'type' && argExpr.type.kind === 'path') {
        const last = argExpr.type.segments[argExpr.type.segments.length - 1];
        if (last !== undefined && NON_ZERO[last] !== undefined) {
          return inner;
        }
      }
    }
  }

  return { kind: 'path', name, args };
}

/**
 * Converts a parsed type expression into a type reference, simplifying the
 * standard pointer wrappers.
 *
 * - `&T`, `&mut T` become non-null pointers
 * - `NonNull<T>`, `Box<T>` become non-null mutable pointers
 * - `Option<…>` around any of those, or a function pointer, becomes nullable
 * - `()` is `void`
 *
 * @param expr - The parsed expression.
 * @returns The type reference.
 */
export function convertTypeExpr(expr: TypeExpr): TypeRef {
  switch (expr.kind) {
    case 'unit':
      return { kind: 'primitive', name: 'void' };
    case 'never':
      return { kind: 'primitive', name: 'never' };
    case 'path':
      return convertPath(expr.segments, expr.args);
    case 'ptr':
      return {
        kind: 'pointer',
        target: convertTypeExpr(expr.target),
        mutable: expr.mutable,
        nullable: true,
        isRef: false,
      };
    case 'ref':
      return {
        kind: 'pointer',
        target: convertTypeExpr(expr.target),
        mutable: expr.mutable,
        nullable: false,
        isRef: true,
      };
    case 'array':
      return { kind: 'array', element: convertTypeExpr(expr.element), length: expr.length };
    case 'fn': {
      const returns = convertTypeExpr(expr.returns);
      return {
        kind: 'fnptr',
        params: expr.params.map((p) =>
          p.name === undefined
            ? { type: convertTypeExpr(p.type) }
            : { name: p.name, type: convertTypeExpr(p.type) }
        ),
        returns,
        nullable: false,
        neverReturn: returns.kind === 'primitive' && returns.name === 'never',
      };
    }
  }
}

/**
 * Renders a type reference as canonical text. Structurally equal references
 * render identically, so the text doubles as a cache key.
 */
export function formatTypeRef(ref: TypeRef): string {
  switch (ref.kind) {
    case 'primitive':
      return ref.name;
    case 'path':
      return ref.args.length === 0 ? ref.name : `${ref.name}<${ref.args.map(formatGenericArg).join(', ')}>`;
    case 'pointer':
      return `*${ref.mutable ? 'mut' : 'const'}${ref.nullable ? '?' : ''} ${formatTypeRef(ref.target)}`;
    case 'array':
      return `[${formatTypeRef(ref.element)}; ${ref.length}]`;
    case 'fnptr': {
      const params = ref.params.map((p) => formatTypeRef(p.type)).join(', ');
      return `fn${ref.nullable ? '?' : ''}(${params}) -> ${formatTypeRef(ref.returns)}`;
    }
  }
}

/**
 * Renders a generic argument as canonical text.
 */
export function formatGenericArg(arg: GenericArg): string {
  return arg.kind === 'const' ? arg.value : formatTypeRef(arg.type);
}

/**
 * Lists every top-level type reference an entity holds, in declaration order.
 *
 * @param entity - The entity to inspect.
 * @returns Field, variant field, alias target, signature and value types.
 */
export function entityTypeRefs(entity: Entity): TypeRef[] {
  switch (entity.kind) {
    case 'struct':
    case 'union':
      return entity.fields.map((f) => f.type);
    case 'enum':
      return entity.variants.flatMap((v) => v.fields.map((f) => f.type));
    case 'opaque':
      return [];
    case 'typedef':
      return [entity.target];
    case 'function':
      return [...entity.params.map((p) => p.type), entity.returns];
    case 'constant':
    case 'static':
      return [entity.type];
  }
}

/**
 * Rebuilds an entity with every top-level type reference passed through `fn`.
 *
 * @param entity - The entity to rebuild.
 * @param fn - Mapping applied to each reference, in declaration order.
 * @returns The rebuilt entity.
 */
export function mapEntityTypeRefs(entity: Entity, fn: (ref: TypeRef) => TypeRef): Entity {
  switch (entity.kind) {
    case 'struct':
      return { ...entity, fields: entity.fields.map((f) => ({ ...f, type: fn(f.type) })) };
    case 'union':
      return { ...entity, fields: entity.fields.map((f) => ({ ...f, type: fn(f.type) })) };
    case 'enum':
      return {
        ...entity,
        variants: entity.variants.map((v) => ({
          ...v,
          fields: v.fields.map((f) => ({ ...f, type: fn(f.type) })),
        })),
      };
    case 'opaque':
      return entity;
    case 'typedef':
      return { ...entity, target: fn(entity.target) };
    case 'function': {
      const params = entity.params.map((p) => ({ ...p, type: fn(p.type) }));
      return { ...entity, params, returns: fn(entity.returns) };
    }
    case 'constant':
      return { ...entity, type: fn(entity.type) };
    case 'static':
      return { ...entity, type: fn(entity.type) };
  }
}
