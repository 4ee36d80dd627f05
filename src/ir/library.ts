/**
 * The Library: entity table, instantiation cache and warnings of one run.
 *
 * @packageDocumentation
 */

import type { EmissionEvent } from '../emit/events.js';
import type { PipelineStage } from '../pipeline/errors.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import type { Entity } from './types.js';

/**
 * A non-fatal condition recorded during the run.
 */
export interface LibraryWarning {
  readonly stage: PipelineStage;
  /** Short machine-readable code, also used as the log event name. */
  readonly code: string;
  readonly message: string;
  readonly entity?: string;
}

/**
 * Owns every entity of one invocation, keyed by canonical name.
 *
 * Insertion order is kept; {@link Library.entities} returns entities sorted by
 * declaration index with insertion order breaking ties, so monomorphs of one
 * generic keep the order in which they were first requested.
 */
export class Library {
  private readonly table = new Map<string, Entity>();
  private readonly instantiationCache = new Map<string, string>();
  private readonly recordedWarnings: LibraryWarning[] = [];
  private emitted: readonly EmissionEvent[] = [];
  private readonly logger: Logger;

  /** Type names supplied by included headers; they resolve to themselves. */
  public readonly externalTypes: ReadonlySet<string>;

  /**
   * Creates an empty library.
   *
   * @param externalTypes - Names that resolve without a declaration.
   * @param logger - Logger that mirrors recorded warnings.
   */
  constructor(externalTypes: Iterable<string> = [], logger: Logger = silentLogger) {
    this.externalTypes = new Set(externalTypes);
    this.logger = logger;
  }

  get size(): number {
    return this.table.size;
  }

  has(name: string): boolean {
    return this.table.has(name);
  }

  get(name: string): Entity | undefined {
    return this.table.get(name);
  }

  /**
   * Adds a new entity.
   *
   * @throws Error if the name is already taken; callers check first and raise
   *   the kind of error their stage reports.
   */
  add(entity: Entity): void {
    if (this.table.has(entity.name)) {
      throw new Error(`Entity '${entity.name}' already exists in the library`);
    }
    this.table.set(entity.name, entity);
  }

  /**
   * Replaces an existing entity with a rebuilt one of the same name, keeping its position.
   */
  replace(entity: Entity): void {
    if (!this.table.has(entity.name)) {
      throw new Error(`Entity '${entity.name}' does not exist in the library`);
    }
    this.table.set(entity.name, entity);
  }

  remove(name: string): boolean {
    return this.table.delete(name);
  }

  /**
   * All entities, by declaration index then insertion order.
   */
  entities(): Entity[] {
    return [...this.table.values()]
      .map((entity, position) => ({ entity, position }))
      .sort((a, b) => a.entity.declIndex - b.entity.declIndex || a.position - b.position)
      .map(({ entity }) => entity);
  }

  /**
   * Looks up the monomorph name cached for an instantiation key.
   */
  lookupInstantiation(key: string): string | undefined {
    return this.instantiationCache.get(key);
  }

  /**
   * Records the monomorph synthesized for an instantiation key.
   */
  recordInstantiation(key: string, mangledName: string): void {
    this.instantiationCache.set(key, mangledName);
  }

  get instantiationCount(): number {
    return this.instantiationCache.size;
  }

  /**
   * Records a warning and logs it under the component of its stage.
   */
  warn(warning: LibraryWarning): void {
    this.recordedWarnings.push(warning);
    this.logger.child(warning.stage).warn(warning.code, {
      message: warning.message,
      ...(warning.entity !== undefined ? { entity: warning.entity } : {}),
    });
  }

  get warnings(): readonly LibraryWarning[] {
    return this.recordedWarnings;
  }

  /**
   * The emission stream, once the emission stage has produced it.
   */
  get emission(): readonly EmissionEvent[] {
    return this.emitted;
  }

  setEmission(events: readonly EmissionEvent[]): void {
    this.emitted = events;
  }
}
