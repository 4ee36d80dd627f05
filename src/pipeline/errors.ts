/**
 * Fatal pipeline error kinds.
 *
 * Every stage aborts by throwing one of the {@link PipelineError} subclasses
 * below. Each error names the stage that raised it and the entity it concerns,
 * which the CLI prints as `error[<Kind>] stage=<stage> entity=<name>: <message>`.
 *
 * @packageDocumentation
 */

/**
 * Pipeline stages, in execution order.
 */
export type PipelineStage =
  | 'ir-builder'
  | 'cfg-resolver'
  | 'specialization'
  | 'ordering'
  | 'emission';

/**
 * Kinds of fatal pipeline errors.
 */
export type PipelineErrorKind =
  | 'DuplicateDeclaration'
  | 'UnresolvedType'
  | 'MangledNameCollision'
  | 'UnboundedSpecialization'
  | 'UnrepresentableCycle';

/**
 * Base class for fatal pipeline errors.
 */
export class PipelineError extends Error {
  /** The error kind. */
  public readonly kind: PipelineErrorKind;
  /** Stage that raised the error. */
  public readonly stage: PipelineStage;
  /** Canonical name of the entity the error concerns. */
  public readonly entity: string;

  /**
   * Creates a new PipelineError.
   *
   * @param kind - The error kind.
   * @param message - Human-readable description.
   * @param stage - Stage that raised the error.
   * @param entity - Entity the error concerns.
   */
  constructor(kind: PipelineErrorKind, message: string, stage: PipelineStage, entity: string) {
    super(message);
    this.name = 'PipelineError';
    this.kind = kind;
    this.stage = stage;
    this.entity = entity;
  }
}

/**
 * Two declarations share a canonical name within one crate, or two emitted
 * declarations share an export name.
 */
export class DuplicateDeclarationError extends PipelineError {
  constructor(message: string, stage: PipelineStage, entity: string) {
    super('DuplicateDeclaration', message, stage, entity);
    this.name = 'DuplicateDeclarationError';
  }
}

/**
 * A type reference names nothing the library defines, or names it incorrectly.
 */
export class UnresolvedTypeError extends PipelineError {
  constructor(message: string, stage: PipelineStage, entity: string) {
    super('UnresolvedType', message, stage, entity);
    this.name = 'UnresolvedTypeError';
  }
}

/**
 * A synthesized monomorph name clashes with another entity.
 */
export class MangledNameCollisionError extends PipelineError {
  constructor(message: string, stage: PipelineStage, entity: string) {
    super('MangledNameCollision', message, stage, entity);
    this.name = 'MangledNameCollisionError';
  }
}

/**
 * Generic instantiation nests deeper than the configured maximum.
 */
export class UnboundedSpecializationError extends PipelineError {
  constructor(message: string, stage: PipelineStage, entity: string) {
    super('UnboundedSpecialization', message, stage, entity);
    this.name = 'UnboundedSpecializationError';
  }
}

/**
 * Types contain each other by value, which no C layout can express.
 */
export class UnrepresentableCycleError extends PipelineError {
  constructor(message: string, stage: PipelineStage, entity: string) {
    super('UnrepresentableCycle', message, stage, entity);
    this.name = 'UnrepresentableCycleError';
  }
}

/**
 * Formats a pipeline error as a single diagnostic line.
 *
 * @param error - The error to format.
 * @returns `error[<Kind>] stage=<stage> entity=<name>: <message>`.
 */
export function formatPipelineError(error: PipelineError): string {
  return `error[${error.kind}] stage=${error.stage} entity=${error.entity}: ${error.message}`;
}
