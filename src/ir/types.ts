/**
 * Intermediate representation of the exported library surface.
 *
 * Entities are stored in a name-indexed table owned by the {@link Library};
 * type references name their targets and are resolved by lookup.
 *
 * @packageDocumentation
 */

import type { Cfg } from '../cfg/predicate.js';

/**
 * Primitive type kinds, named as in the source language.
 */
export type PrimitiveKind =
  | 'void'
  | 'never'
  | 'bool'
  | 'char'
  | 'i8'
  | 'i16'
  | 'i32'
  | 'i64'
  | 'u8'
  | 'u16'
  | 'u32'
  | 'u64'
  | 'isize'
  | 'usize'
  | 'f32'
  | 'f64'
  | 'c_void'
  | 'c_char'
  | 'c_schar'
  | 'c_uchar'
  | 'c_short'
  | 'c_ushort'
  | 'c_int'
  | 'c_uint'
  | 'c_long'
  | 'c_ulong'
  | 'c_longlong'
  | 'c_ulonglong'
  | 'c_float'
  | 'c_double'
  | 'va_list';

/**
 * A generic argument: a type, or a const value such as the `16` of `Buffer<16>`.
 */
export type GenericArg =
  | { readonly kind: 'type'; readonly type: TypeRef }
  | { readonly kind: 'const'; readonly value: string };

/**
 * A parameter of a function pointer type.
 */
export interface FnPtrParam {
  readonly name?: string;
  readonly type: TypeRef;
}

/**
 * A structural type reference.
 */
export type TypeRef =
  | { readonly kind: 'primitive'; readonly name: PrimitiveKind }
  | { readonly kind: 'path'; readonly name: string; readonly args: readonly GenericArg[] }
  | {
      readonly kind: 'pointer';
      readonly target: TypeRef;
      readonly mutable: boolean;
      readonly nullable: boolean;
      /** Whether the pointer came from a reference. */
      readonly isRef: boolean;
    }
  | { readonly kind: 'array'; readonly element: TypeRef; readonly length: string }
  | {
      readonly kind: 'fnptr';
      readonly params: readonly FnPtrParam[];
      readonly returns: TypeRef;
      readonly nullable: boolean;
      readonly neverReturn: boolean;
    };

/**
 * A generic parameter placeholder.
 */
export interface GenericParam {
  readonly name: string;
  readonly kind: 'type' | 'const';
}

/**
 * Layout representation derived from `repr` attributes.
 */
export interface Repr {
  readonly style: 'rust' | 'c' | 'transparent';
  /** Integer type of the discriminant, for `repr(u8)` and friends. */
  readonly primitive?: PrimitiveKind;
  readonly packed: boolean;
  readonly align?: number;
}

/**
 * Value of a `headergen` annotation: a string, or `true` for a bare flag.
 */
export type AnnotationValue = string | true;

/**
 * Attributes classified onto an entity.
 */
export interface EntityAttributes {
  readonly repr: Repr;
  /** Deprecation note; an empty string for a bare `deprecated`. */
  readonly deprecated?: string;
  readonly mustUse: boolean;
  readonly annotations: ReadonlyMap<string, AnnotationValue>;
}

/**
 * Origin of a monomorphized entity.
 */
export interface Instantiation {
  /** Canonical name of the generic entity. */
  readonly generic: string;
  readonly args: readonly GenericArg[];
}

interface EntityBase {
  /** Canonical name; the table key. */
  readonly name: string;
  /** Name written to the header. */
  readonly exportName: string;
  readonly generics: readonly GenericParam[];
  readonly docs: readonly string[];
  /** Predicate inherited from the declaration site; undefined means always enabled. */
  readonly cfg?: Cfg;
  readonly crate: string;
  /** Position in the merged declaration sequence. */
  readonly declIndex: number;
  readonly public: boolean;
  readonly attributes: EntityAttributes;
  /** Set on monomorphs synthesized by the specialization engine. */
  readonly instantiation?: Instantiation;
}

/**
 * A struct/union field.
 */
export interface Field {
  readonly name: string;
  readonly exportName: string;
  readonly type: TypeRef;
  readonly docs: readonly string[];
  readonly cfg?: Cfg;
}

/**
 * An enum variant. A variant with fields is a tagged variant.
 */
export interface Variant {
  readonly name: string;
  readonly exportName: string;
  /** Explicit discriminant expression. */
  readonly discriminant?: string;
  readonly fields: readonly Field[];
  readonly docs: readonly string[];
  readonly cfg?: Cfg;
}

/**
 * A function parameter.
 */
export interface Param {
  /** Undefined for unnamed (`_`) parameters. */
  readonly name?: string;
  readonly exportName?: string;
  readonly type: TypeRef;
  /** Set by `ptrs-as-arrays` annotations: write the pointer as `T name[length]`. */
  readonly arrayLength?: string;
}

/**
 * A constant expression, as accepted in `const` values.
 */
export type ConstExpr =
  | { readonly kind: 'int'; readonly text: string }
  | { readonly kind: 'float'; readonly text: string }
  | { readonly kind: 'bool'; readonly value: boolean }
  | { readonly kind: 'char'; readonly value: string }
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'path'; readonly name: string }
  | { readonly kind: 'unary'; readonly op: '-' | '!'; readonly operand: ConstExpr }
  | {
      readonly kind: 'binary';
      readonly op: string;
      readonly left: ConstExpr;
      readonly right: ConstExpr;
    }
  | { readonly kind: 'cast'; readonly expr: ConstExpr; readonly type: TypeRef };

export interface StructEntity extends EntityBase {
  readonly kind: 'struct';
  readonly fields: readonly Field[];
  readonly tuple: boolean;
}

export interface UnionEntity extends EntityBase {
  readonly kind: 'union';
  readonly fields: readonly Field[];
}

export interface EnumEntity extends EntityBase {
  readonly kind: 'enum';
  readonly variants: readonly Variant[];
}

export interface OpaqueEntity extends EntityBase {
  readonly kind: 'opaque';
}

export interface TypedefEntity extends EntityBase {
  readonly kind: 'typedef';
  readonly target: TypeRef;
}

export interface FunctionEntity extends EntityBase {
  readonly kind: 'function';
  readonly params: readonly Param[];
  readonly returns: TypeRef;
  readonly variadic: boolean;
  readonly neverReturn: boolean;
}

export interface ConstantEntity extends EntityBase {
  readonly kind: 'constant';
  readonly type: TypeRef;
  readonly value: ConstExpr;
}

export interface StaticEntity extends EntityBase {
  readonly kind: 'static';
  readonly type: TypeRef;
  readonly mutable: boolean;
}

/**
 * Entities that declare a type.
 */
export type TypeEntity = StructEntity | UnionEntity | EnumEntity | OpaqueEntity | TypedefEntity;

/**
 * Any entity.
 */
export type Entity = TypeEntity | FunctionEntity | ConstantEntity | StaticEntity;

/**
 * Entity kind tags.
 */
export type EntityKind = Entity['kind'];

/**
 * Checks whether an entity declares a type.
 */
export function isTypeEntity(entity: Entity): entity is TypeEntity {
  return (
    entity.kind === 'struct' ||
    entity.kind === 'union' ||
    entity.kind === 'enum' ||
    entity.kind === 'opaque' ||
    entity.kind === 'typedef'
  );
}

/**
 * Checks whether an enum carries payloads on any variant.
 */
export function isTaggedEnum(entity: EnumEntity): boolean {
  return entity.variants.some((v) => v.fields.length > 0);
}

/**
 * C names a tagged enum declares besides its own: the tag enum, then one
 * body struct per variant with fields.
 */
export function taggedEnumHelperNames(entity: EnumEntity): { readonly tag: string; readonly bodies: Map<Variant, string> } {
  const bodies = new Map<Variant, string>();
  for (const variant of entity.variants) {
    if (variant.fields.length > 0) {
      bodies.set(variant, `${entity.exportName}_${variant.name}_Body`);
    }
  }
  return { tag: `${entity.exportName}_Tag`, bodies };
}

/**
 * Default attributes for entities without any.
 */
export const DEFAULT_ATTRIBUTES: EntityAttributes = {
  repr: { style: 'rust', packed: false },
  mustUse: false,
  annotations: new Map(),
};
