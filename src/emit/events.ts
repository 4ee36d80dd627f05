/**
 * Emission events: the ordered stream a writer renders.
 *
 * Entities travel with their documentation, representation and annotations;
 * rendering them is the writer's job.
 *
 * @packageDocumentation
 */

import type {
  ConstantEntity,
  FunctionEntity,
  OpaqueEntity,
  StaticEntity,
  TypeEntity,
} from '../ir/types.js';

/**
 * Types that get a full definition.
 */
export type DefinableEntity = Exclude<TypeEntity, OpaqueEntity>;

export type EmissionEvent =
  | { readonly kind: 'forward-declare'; readonly entity: TypeEntity }
  | { readonly kind: 'define-type'; readonly entity: DefinableEntity }
  | { readonly kind: 'declare-constant'; readonly entity: ConstantEntity }
  | { readonly kind: 'declare-function'; readonly entity: FunctionEntity }
  | { readonly kind: 'declare-static'; readonly entity: StaticEntity };

/**
 * The checked emission stream.
 */
export interface EmissionStream {
  readonly events: readonly EmissionEvent[];
  /** Canonical name to export name, for resolving type references while writing. */
  readonly exportNames: ReadonlyMap<string, string>;
  /** Names supplied by included headers. */
  readonly externalTypes: ReadonlySet<string>;
}

/**
 * Renders an event as `<kind> <export name>`, for logs and `--events` output.
 */
export function describeEvent(event: EmissionEvent): string {
  return `${event.kind} ${event.entity.exportName}`;
}
