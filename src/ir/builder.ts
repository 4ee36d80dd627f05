/**
 * IR builder: declaration nodes to typed entities.
 *
 * One entity is created per exported declaration. Module containers are
 * flattened; their `cfg` predicates are conjoined onto every item inside.
 *
 * @packageDocumentation
 */

import { conjoinCfg } from '../cfg/predicate.js';
import type { Cfg } from '../cfg/predicate.js';
import { DuplicateDeclarationError } from '../pipeline/errors.js';
import type {
  CrateDump,
  DeclarationNode,
  FieldNode,
  RawAttribute,
  VariantNode,
} from '../syntax/types.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import {
  ANNOTATION_DOC_PREFIX,
  classifyAttribute,
  parseAnnotation,
  parseNameList,
  reprFromItems,
} from './attributes.js';
import type { ReprItem } from './attributes.js';
import { ConstExprParseError, parseConstExpr } from './const-expr.js';
import { Library } from './library.js';
import { convertTypeExpr } from './type-ref.js';
import type {
  AnnotationValue,
  Entity,
  EntityAttributes,
  Field,
  GenericParam,
  Param,
  TypeRef,
  Variant,
} from './types.js';

/**
 * Options for {@link buildLibrary}.
 */
export interface BuildOptions {
  /** Type names supplied by included headers. */
  readonly externalTypes?: readonly string[];
  readonly logger?: Logger;
}

/** Function ABIs callable from C. */
const C_ABIS: ReadonlySet<string> = new Set(['C', 'C-unwind', 'system', 'system-unwind']);

/**
 * Attributes of one declaration, after classification.
 */
interface CollectedAttributes {
  readonly cfgs: Cfg[];
  readonly docs: string[];
  readonly reprItems: ReprItem[];
  readonly annotations: Map<string, AnnotationValue>;
  noMangle: boolean;
  exportName: string | undefined;
  deprecated: string | undefined;
  mustUse: boolean;
}

interface BuildContext {
  readonly library: Library;
  readonly logger: Logger;
  readonly crate: string;
}

function isPhantom(type: TypeRef): boolean {
  return type.kind === 'path' && (type.name === 'PhantomData' || type.name === 'PhantomPinned');
}

class CrateBuilder {
  private readonly seen = new Set<string>();

  constructor(
    private readonly ctx: BuildContext,
    private readonly nextIndex: () => number
  ) {}

  build(items: readonly DeclarationNode[], inherited: readonly Cfg[]): void {
    for (const node of items) {
      if (node.kind === 'module') {
        const attrs = this.collect(node.attributes, node.docs, node.name);
        this.build(node.items, [...inherited, ...attrs.cfgs]);
        continue;
      }
      this.declare(node, inherited);
    }
  }

  private declare(node: Exclude<DeclarationNode, { kind: 'module' }>, inherited: readonly Cfg[]): void {
    const declIndex = this.nextIndex();
    const entity = this.convert(node, inherited, declIndex);
    if (entity === undefined) {
      return;
    }

    if (this.seen.has(entity.name)) {
      throw new DuplicateDeclarationError(
        `'${entity.name}' is declared more than once in crate '${this.ctx.crate}'`,
        'ir-builder',
        entity.name
      );
    }
    this.seen.add(entity.name);

    const existing = this.ctx.library.get(entity.name);
    if (existing !== undefined) {
      this.ctx.library.warn({
        stage: 'ir-builder',
        code: 'cross_crate_duplicate',
        message: `'${entity.name}' from crate '${this.ctx.crate}' is shadowed by the declaration in crate '${existing.crate}'`,
        entity: entity.name,
      });
      return;
    }

    this.ctx.library.add(entity);
  }

  private collect(
    rawAttributes: readonly RawAttribute[],
    rawDocs: readonly string[],
    entity: string
  ): CollectedAttributes {
    const collected: CollectedAttributes = {
      cfgs: [],
      docs: [],
      reprItems: [],
      annotations: new Map(),
      noMangle: false,
      exportName: undefined,
      deprecated: undefined,
      mustUse: false,
    };

    for (const line of rawDocs) {
      const trimmed = line.trim();
      if (trimmed.startsWith(ANNOTATION_DOC_PREFIX)) {
        const annotation = parseAnnotation(trimmed.slice(ANNOTATION_DOC_PREFIX.length));
        if (annotation !== undefined) {
          collected.annotations.set(annotation.key, annotation.value);
          continue;
        }
      }
      collected.docs.push(line);
    }

    for (const raw of rawAttributes) {
      const attribute = classifyAttribute(raw);
      switch (attribute.kind) {
        case 'repr':
          collected.reprItems.push(...attribute.items);
          break;
        case 'cfg':
          collected.cfgs.push(attribute.predicate);
          break;
        case 'doc':
          collected.docs.push(attribute.text);
          break;
        case 'no_mangle':
          collected.noMangle = true;
          break;
        case 'export_name':
          collected.exportName = attribute.value;
          break;
        case 'deprecated':
          collected.deprecated = attribute.note;
          break;
        case 'must_use':
          collected.mustUse = true;
          break;
        case 'annotation':
          collected.annotations.set(attribute.key, attribute.value);
          break;
        case 'inert':
          break;
        case 'passthrough':
          this.ctx.library.warn({
            stage: 'ir-builder',
            code: 'attribute_ignored',
            message: `Ignoring attribute '${attribute.name}'${attribute.reason !== undefined ? ` (${attribute.reason})` : ''}`,
            entity,
          });
          break;
      }
    }

    return collected;
  }

  private entityAttributes(collected: CollectedAttributes): EntityAttributes {
    return {
      repr: reprFromItems(collected.reprItems),
      mustUse: collected.mustUse,
      annotations: collected.annotations,
      ...(collected.deprecated !== undefined ? { deprecated: collected.deprecated } : {}),
    };
  }

  private convertFields(fields: readonly FieldNode[], owner: string, fieldNames: readonly string[]): Field[] {
    const result: Field[] = [];
    fields.forEach((node, index) => {
      const type = convertTypeExpr(node.type);
      if (isPhantom(type)) {
        return;
      }
      const attrs = this.collect(node.attributes, node.docs, `${owner}.${node.name}`);
      const name = /^[0-9]+$/.test(node.name) ? (fieldNames[index] ?? `_${node.name}`) : node.name;
      const cfg = conjoinCfg(attrs.cfgs);
      result.push({ name, exportName: name, type, docs: attrs.docs, ...(cfg !== undefined ? { cfg } : {}) });
    });
    return result;
  }

  private convertVariant(node: VariantNode, owner: string): Variant {
    const attrs = this.collect(node.attributes, node.docs, `${owner}::${node.name}`);
    const cfg = conjoinCfg(attrs.cfgs);
    return {
      name: node.name,
      exportName: node.name,
      fields: this.convertFields(node.fields, `${owner}::${node.name}`, []),
      docs: attrs.docs,
      ...(node.discriminant !== undefined ? { discriminant: node.discriminant } : {}),
      ...(cfg !== undefined ? { cfg } : {}),
    };
  }

  private convert(
    node: Exclude<DeclarationNode, { kind: 'module' }>,
    inherited: readonly Cfg[],
    declIndex: number
  ): Entity | undefined {
    const collected = this.collect(node.attributes, node.docs, node.name);
    const attributes = this.entityAttributes(collected);
    const cfg = conjoinCfg([...inherited, ...collected.cfgs]);
    const generics: GenericParam[] = node.generics.map((g) => ({ name: g.name, kind: g.kind }));
    const base = {
      name: node.name,
      exportName: node.name,
      generics,
      docs: collected.docs,
      crate: this.ctx.crate,
      declIndex,
      public: node.public,
      attributes,
      ...(cfg !== undefined ? { cfg } : {}),
    };
    const repr = attributes.repr;
    const forcedOpaque = collected.annotations.has('opaque');

    const opaque = (reason: string): Entity => {
      this.ctx.logger.debug('opaque_representation', { entity: node.name, reason });
      return { ...base, kind: 'opaque' };
    };

    switch (node.kind) {
      case 'struct': {
        if (forcedOpaque) {
          return opaque('opaque annotation');
        }
        const fieldNamesAnnotation = collected.annotations.get('field-names');
        const fieldNames = typeof fieldNamesAnnotation === 'string' ? parseNameList(fieldNamesAnnotation) : [];
        const fields = this.convertFields(node.fields, node.name, fieldNames);
        if (repr.style === 'transparent') {
          const [only] = fields;
          if (fields.length !== 1 || only === undefined) {
            this.ctx.library.warn({
              stage: 'ir-builder',
              code: 'transparent_field_count',
              message: `repr(transparent) struct '${node.name}' needs exactly one non-zero-sized field; emitting it as opaque`,
              entity: node.name,
            });
            return { ...base, kind: 'opaque' };
          }
          return { ...base, kind: 'typedef', target: only.type };
        }
        if (repr.style !== 'c') {
          return opaque('struct without repr(C)');
        }
        return { ...base, kind: 'struct', fields, tuple: node.tuple };
      }

      case 'union':
        if (forcedOpaque || repr.style !== 'c') {
          return opaque(forcedOpaque ? 'opaque annotation' : 'union without repr(C)');
        }
        return { ...base, kind: 'union', fields: this.convertFields(node.fields, node.name, []) };

      case 'enum':
        if (forcedOpaque || (repr.style !== 'c' && repr.primitive === undefined)) {
          return opaque(forcedOpaque ? 'opaque annotation' : 'enum without repr(C) or an integer repr');
        }
        return {
          ...base,
          kind: 'enum',
          variants: node.variants.map((v) => this.convertVariant(v, node.name)),
        };

      case 'opaque':
        return { ...base, kind: 'opaque' };

      case 'type':
        if (forcedOpaque) {
          return opaque('opaque annotation');
        }
        return { ...base, kind: 'typedef', target: convertTypeExpr(node.target) };

      case 'function': {
        const abi = node.abi ?? 'Rust';
        const linkable = collected.noMangle || collected.exportName !== undefined;
        if (!node.public || !linkable || !C_ABIS.has(abi) || generics.length > 0) {
          const reason = !node.public
            ? 'not public'
            : !linkable
              ? 'missing no_mangle'
              : generics.length > 0
                ? 'generic'
                : `ABI "${abi}" is not callable from C`;
          if (linkable && node.public) {
            this.ctx.library.warn({
              stage: 'ir-builder',
              code: 'function_skipped',
              message: `Skipping function '${node.name}': ${reason}`,
              entity: node.name,
            });
          } else {
            this.ctx.logger.debug('function_skipped', { entity: node.name, reason });
          }
          return undefined;
        }
        const returns = convertTypeExpr(node.returns);
        const params: Param[] = node.params.map((p) => {
          const type = convertTypeExpr(p.type);
          return p.name === undefined || p.name === '_' ? { type } : { name: p.name, exportName: p.name, type };
        });
        return {
          ...base,
          exportName: collected.exportName ?? node.name,
          kind: 'function',
          params,
          returns,
          variadic: node.variadic,
          neverReturn: returns.kind === 'primitive' && returns.name === 'never',
        };
      }

      case 'const': {
        if (!node.public) {
          this.ctx.logger.debug('constant_skipped', { entity: node.name, reason: 'not public' });
          return undefined;
        }
        try {
          return {
            ...base,
            kind: 'constant',
            type: convertTypeExpr(node.type),
            value: parseConstExpr(node.value),
          };
        } catch (error) {
          if (!(error instanceof ConstExprParseError)) {
            throw error;
          }
          this.ctx.library.warn({
            stage: 'ir-builder',
            code: 'constant_skipped',
            message: `Skipping constant '${node.name}': ${error.message}`,
            entity: node.name,
          });
          return undefined;
        }
      }

      case 'static': {
        const linkable = collected.noMangle || collected.exportName !== undefined;
        if (!node.public || !linkable) {
          this.ctx.logger.debug('static_skipped', {
            entity: node.name,
            reason: node.public ? 'missing no_mangle' : 'not public',
          });
          return undefined;
        }
        return {
          ...base,
          exportName: collected.exportName ?? node.name,
          kind: 'static',
          type: convertTypeExpr(node.type),
          mutable: node.mutable,
        };
      }
    }
  }
}

/**
 * Builds a library from crate dumps, root crate first.
 *
 * @param crates - Crate dumps in merge order.
 * @param options - External types and logger.
 * @returns The library with one entity per exported declaration.
 * @throws DuplicateDeclarationError when a crate declares a name twice, whatever the predicates.
 */
export function buildLibrary(crates: readonly CrateDump[], options: BuildOptions = {}): Library {
  const logger = options.logger ?? silentLogger;
  const library = new Library(options.externalTypes ?? [], logger);
  let index = 0;
  const nextIndex = (): number => index++;

  for (const crate of crates) {
    new CrateBuilder({ library, logger, crate: crate.crate }, nextIndex).build(crate.items, []);
  }

  logger.debug('library_built', { crates: crates.length, entities: library.size });
  return library;
}
