/**
 * Conditional compilation: predicates and the resolver stage.
 *
 * @packageDocumentation
 */

export {
  CfgParseError,
  conjoinCfg,
  EMPTY_CFG_ENVIRONMENT,
  evaluateCfg,
  formatCfg,
  parseCfg,
} from './predicate.js';
export type { Cfg, CfgEnvironment } from './predicate.js';
export { resolveConditionals } from './resolver.js';
export type { ResolveOptions } from './resolver.js';
