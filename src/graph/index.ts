/**
 * Dependency graph and declaration ordering.
 *
 * @packageDocumentation
 */

export { byValueTargets, entityEdges } from './dependencies.js';
export type { DependencyEdge, EdgeKind } from './dependencies.js';
export { orderLibrary } from './order.js';
export type { PlanStep } from './order.js';
