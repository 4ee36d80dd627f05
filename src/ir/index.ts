/**
 * Intermediate representation: entities, type references and the library
 * that holds them.
 *
 * @packageDocumentation
 */

export type {
  AnnotationValue,
  ConstantEntity,
  ConstExpr,
  Entity,
  EntityAttributes,
  EntityKind,
  EnumEntity,
  Field,
  FnPtrParam,
  FunctionEntity,
  GenericArg,
  GenericParam,
  Instantiation,
  OpaqueEntity,
  Param,
  PrimitiveKind,
  Repr,
  StaticEntity,
  StructEntity,
  TypedefEntity,
  TypeEntity,
  TypeRef,
  UnionEntity,
  Variant,
} from './types.js';
export { DEFAULT_ATTRIBUTES, isTaggedEnum, isTypeEntity, taggedEnumHelperNames } from './types.js';
export { Library } from './library.js';
export type { LibraryWarning } from './library.js';
export { buildLibrary } from './builder.js';
export type { BuildOptions } from './builder.js';
export {
  ANNOTATION_ATTRIBUTE,
  ANNOTATION_DOC_PREFIX,
  classifyAttribute,
  reprFromItems,
} from './attributes.js';
export type { Attribute, ReprItem } from './attributes.js';
export { ConstExprParseError, constExprReferences, parseConstExpr } from './const-expr.js';
export {
  applyRenameRule,
  escapeReserved,
  isReservedWord,
  parseRenameRule,
  RENAME_RULE_SPELLINGS,
} from './rename.js';
export type { IdentifierContext, RenameRule } from './rename.js';
export { convertTypeExpr, entityTypeRefs, formatTypeRef, mapEntityTypeRefs } from './type-ref.js';
