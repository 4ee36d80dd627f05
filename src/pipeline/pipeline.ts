/**
 * Runs the header pipeline over loaded crates.
 *
 * Stages run in a fixed order, each logging under its own component:
 * IR builder, conditional resolver, specialization (then export naming),
 * ordering and emission. The first fatal error aborts the run.
 *
 * @packageDocumentation
 */

import type { CfgEnvironment } from '../cfg/predicate.js';
import { resolveConditionals } from '../cfg/resolver.js';
import type { Config } from '../config/types.js';
import { emitDeclarations } from '../emit/contract.js';
import type { EmissionStream } from '../emit/events.js';
import { orderLibrary } from '../graph/order.js';
import { buildLibrary } from '../ir/builder.js';
import type { Library, LibraryWarning } from '../ir/library.js';
import { parseRenameRule } from '../ir/rename.js';
import type { RenameRule } from '../ir/rename.js';
import { assignExportNames } from '../specialize/export-names.js';
import { specialize } from '../specialize/engine.js';
import type { CrateDump } from '../syntax/types.js';
import { silentLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import type { PipelineStage } from './errors.js';

/**
 * Outcome of a successful run.
 */
export interface PipelineResult {
  readonly library: Library;
  readonly stream: EmissionStream;
  readonly warnings: readonly LibraryWarning[];
}

export interface PipelineOptions {
  readonly logger?: Logger;
}

/**
 * Builds the predicate environment from `[cfg]`.
 */
export function cfgEnvironmentFromConfig(config: Config): CfgEnvironment {
  return {
    flags: new Map(Object.entries(config.cfg.flags)),
    features: new Map(Object.entries(config.cfg.features)),
    values: new Map(Object.entries(config.cfg.values)),
  };
}

// Validated configurations only hold known spellings.
function ruleOf(spelling: string): RenameRule {
  return parseRenameRule(spelling) ?? 'None';
}

/**
 * Runs every stage over the crates.
 *
 * @param crates - Loaded crate dumps; the first is the root crate.
 * @param config - Validated configuration.
 * @param options - Logger for stage output.
 * @returns The library, its checked emission stream and the recorded warnings.
 * @throws PipelineError subclasses when a stage fails.
 */
export function runPipeline(
  crates: readonly CrateDump[],
  config: Config,
  options: PipelineOptions = {}
): PipelineResult {
  const logger = options.logger ?? silentLogger;
  const stageLogger = (stage: PipelineStage): Logger => logger.child(stage);

  const library = buildLibrary(crates, {
    externalTypes: config.export.external_types,
    logger: stageLogger('ir-builder'),
  });

  resolveConditionals(library, {
    env: cfgEnvironmentFromConfig(config),
    exclude: config.export.exclude,
    opaque: config.export.opaque,
    logger: stageLogger('cfg-resolver'),
  });

  const specializationLogger = stageLogger('specialization');
  specialize(library, {
    maxDepth: config.specialization.max_depth,
    include: config.export.include,
    logger: specializationLogger,
  });
  assignExportNames(library, {
    rename: new Map(Object.entries(config.export.rename)),
    prefix: config.export.prefix,
    renameFields: ruleOf(config.struct.rename_fields),
    renameVariants: ruleOf(config.enum.rename_variants),
    renameArgs: ruleOf(config.fn.rename_args),
    prefixWithName: config.enum.prefix_with_name,
    logger: specializationLogger,
  });

  const plan = orderLibrary(library, stageLogger('ordering'));
  const stream = emitDeclarations(library, plan, stageLogger('emission'));

  logger.info('pipeline_complete', {
    entities: library.size,
    events: stream.events.length,
    warnings: library.warnings.length,
  });

  return { library, stream, warnings: library.warnings };
}
