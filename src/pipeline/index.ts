/**
 * Pipeline sequencing and fatal error kinds.
 *
 * @packageDocumentation
 */

export {
  DuplicateDeclarationError,
  formatPipelineError,
  MangledNameCollisionError,
  PipelineError,
  UnboundedSpecializationError,
  UnrepresentableCycleError,
  UnresolvedTypeError,
} from './errors.js';
export type { PipelineErrorKind, PipelineStage } from './errors.js';
export { cfgEnvironmentFromConfig, runPipeline } from './pipeline.js';
export type { PipelineOptions, PipelineResult } from './pipeline.js';
