/**
 * C header writer.
 *
 * @packageDocumentation
 */

export { SourceWriter } from './source-writer.js';
export {
  PRIMITIVE_C_NAMES,
  formatDeclaration,
  writeDeclaration,
  writeFunctionDeclarator,
} from './cdecl.js';
export type { DeclaratorOptions } from './cdecl.js';
export { renderConstExpr } from './constants.js';
export type { ConstRenderContext } from './constants.js';
export { writeHeader } from './c-writer.js';
export type { HeaderOptions } from './c-writer.js';
