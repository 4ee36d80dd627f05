/**
 * Declaration node types handed from the front-end to the IR builder.
 *
 * A front-end produces one {@link CrateDump} per source crate. Nodes keep the
 * source declaration order, which later decides the emission order of
 * functions and statics.
 *
 * @packageDocumentation
 */

/**
 * Kinds of declaration nodes a crate dump may contain.
 */
export type DeclarationKind =
  | 'struct'
  | 'union'
  | 'enum'
  | 'opaque'
  | 'type'
  | 'function'
  | 'const'
  | 'static'
  | 'module';

/**
 * A raw attribute as written at the declaration site, e.g. `repr(C)` is
 * `{ name: 'repr', value: 'C' }`.
 */
export interface RawAttribute {
  readonly name: string;
  readonly value?: string;
}

/**
 * A generic argument inside a type expression.
 */
export type GenericArgExpr =
  | { readonly kind: 'type'; readonly type: TypeExpr }
  | { readonly kind: 'const'; readonly value: string };

/**
 * A parameter of a function pointer type expression.
 */
export interface FnParamExpr {
  readonly name?: string;
  readonly type: TypeExpr;
}

/**
 * Untyped type expression tree, as spelled in the source.
 */
export type TypeExpr =
  | {
      readonly kind: 'path';
      /** Path segments, e.g. `['std', 'os', 'raw', 'c_int']`. */
      readonly segments: readonly string[];
      readonly args: readonly GenericArgExpr[];
    }
  | { readonly kind: 'ptr'; readonly mutable: boolean; readonly target: TypeExpr }
  | { readonly kind: 'ref'; readonly mutable: boolean; readonly target: TypeExpr }
  | { readonly kind: 'array'; readonly element: TypeExpr; readonly length: string }
  | {
      readonly kind: 'fn';
      readonly params: readonly FnParamExpr[];
      readonly returns: TypeExpr;
      readonly abi?: string;
    }
  | { readonly kind: 'unit' }
  | { readonly kind: 'never' };

/**
 * A generic parameter placeholder, either a type (`T`) or a const (`const N: usize`).
 */
export interface GenericParamNode {
  readonly name: string;
  readonly kind: 'type' | 'const';
  /** Declared type of a const parameter. */
  readonly constType?: string;
}

/**
 * A struct/union field or an enum variant payload field.
 */
export interface FieldNode {
  readonly name: string;
  readonly type: TypeExpr;
  readonly attributes: readonly RawAttribute[];
  readonly docs: readonly string[];
}

/**
 * An enum variant, optionally with a payload and an explicit discriminant.
 */
export interface VariantNode {
  readonly name: string;
  readonly discriminant?: string;
  readonly fields: readonly FieldNode[];
  /** Whether the payload is positional (`Circle(f32)`). */
  readonly tuple: boolean;
  readonly attributes: readonly RawAttribute[];
  readonly docs: readonly string[];
}

/**
 * A function parameter.
 */
export interface ParamNode {
  /** Missing for `_` patterns. */
  readonly name?: string;
  readonly type: TypeExpr;
}

interface DeclarationBase {
  readonly name: string;
  readonly attributes: readonly RawAttribute[];
  readonly generics: readonly GenericParamNode[];
  readonly docs: readonly string[];
  readonly public: boolean;
}

export interface StructNode extends DeclarationBase {
  readonly kind: 'struct';
  readonly fields: readonly FieldNode[];
  readonly tuple: boolean;
}

export interface UnionNode extends DeclarationBase {
  readonly kind: 'union';
  readonly fields: readonly FieldNode[];
}

export interface EnumNode extends DeclarationBase {
  readonly kind: 'enum';
  readonly variants: readonly VariantNode[];
}

export interface OpaqueNode extends DeclarationBase {
  readonly kind: 'opaque';
}

export interface TypeAliasNode extends DeclarationBase {
  readonly kind: 'type';
  readonly target: TypeExpr;
}

export interface FunctionNode extends DeclarationBase {
  readonly kind: 'function';
  readonly params: readonly ParamNode[];
  readonly returns: TypeExpr;
  /** ABI string of `extern "..." fn`; undefined for the default ABI. */
  readonly abi?: string;
  readonly variadic: boolean;
}

export interface ConstNode extends DeclarationBase {
  readonly kind: 'const';
  readonly type: TypeExpr;
  /** Constant expression source text. */
  readonly value: string;
}

export interface StaticNode extends DeclarationBase {
  readonly kind: 'static';
  readonly type: TypeExpr;
  readonly mutable: boolean;
}

/**
 * A module container; its attributes (notably `cfg`) apply to every item inside.
 */
export interface ModuleNode extends DeclarationBase {
  readonly kind: 'module';
  readonly items: readonly DeclarationNode[];
}

/**
 * Any declaration node.
 */
export type DeclarationNode =
  | StructNode
  | UnionNode
  | EnumNode
  | OpaqueNode
  | TypeAliasNode
  | FunctionNode
  | ConstNode
  | StaticNode
  | ModuleNode;

/**
 * The declarations of one source crate, in source order.
 */
export interface CrateDump {
  readonly crate: string;
  readonly items: readonly DeclarationNode[];
}
