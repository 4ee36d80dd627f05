/**
 * Emission stream and its contract check.
 *
 * @packageDocumentation
 */

export { emitDeclarations } from './contract.js';
export { describeEvent } from './events.js';
export type { DefinableEntity, EmissionEvent, EmissionStream } from './events.js';
