/**
 * Syntax adapter: declaration nodes and the crate dump front-end.
 *
 * @packageDocumentation
 */

export type {
  ConstNode,
  CrateDump,
  DeclarationKind,
  DeclarationNode,
  EnumNode,
  FieldNode,
  FnParamExpr,
  FunctionNode,
  GenericArgExpr,
  GenericParamNode,
  ModuleNode,
  OpaqueNode,
  ParamNode,
  RawAttribute,
  StaticNode,
  StructNode,
  TypeAliasNode,
  TypeExpr,
  UnionNode,
  VariantNode,
} from './types.js';
export { formatTypeExpr, parseTypeExpr, TypeExprParseError } from './type-expr.js';
export { CrateLoadError, loadCrateDump, loadCrates, parseCrateDump } from './loader.js';
