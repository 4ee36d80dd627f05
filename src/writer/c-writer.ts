/**
 * C header writer.
 *
 * Renders a checked emission stream as one header: preamble, includes, one
 * section per event, then the trailer. Sections are separated by a blank
 * line.
 *
 * @packageDocumentation
 */

import { DEFAULT_SYS_INCLUDES } from '../config/defaults.js';
import type { Config } from '../config/types.js';
import type { DefinableEntity, EmissionEvent, EmissionStream } from '../emit/events.js';
import { ConstExprParseError, parseConstExpr } from '../ir/const-expr.js';
import { applyRenameRule, escapeReserved } from '../ir/rename.js';
import type {
  ConstantEntity,
  EnumEntity,
  Field,
  FunctionEntity,
  StaticEntity,
  StructEntity,
  TypeEntity,
  TypedefEntity,
  UnionEntity,
  Variant,
} from '../ir/types.js';
import { isTaggedEnum, taggedEnumHelperNames } from '../ir/types.js';
import { PRIMITIVE_C_NAMES, writeDeclaration, writeFunctionDeclarator } from './cdecl.js';
import type { DeclaratorOptions } from './cdecl.js';
import { renderConstExpr } from './constants.js';
import { SourceWriter } from './source-writer.js';

/**
 * Options for {@link writeHeader}.
 */
export interface HeaderOptions {
  /** Generator version, written when `include_version` is set. */
  readonly version?: string;
}

type Aggregate = 'struct' | 'union' | 'enum';

const CPP_OPEN = '#ifdef __cplusplus\nextern "C" {\n#endif  // __cplusplus';
const CPP_CLOSE = '#ifdef __cplusplus\n}  // extern "C"\n#endif  // __cplusplus';

/** C keyword that declares the tag of a type entity. */
function aggregateOf(entity: TypeEntity): Aggregate | undefined {
  switch (entity.kind) {
    case 'struct':
    case 'opaque':
      return 'struct';
    case 'union':
      return 'union';
    case 'enum':
      return isTaggedEnum(entity) ? 'struct' : 'enum';
    case 'typedef':
      return undefined;
  }
}

function isSizedEnum(entity: EnumEntity): boolean {
  return entity.attributes.repr.primitive !== undefined;
}

class HeaderWriter {
  private readonly types = new Map<string, TypeEntity>();
  private readonly declared = new Set<string>();
  private readonly declarators: DeclaratorOptions;

  constructor(
    private readonly stream: EmissionStream,
    private readonly config: Config
  ) {
    for (const event of stream.events) {
      if (event.kind === 'forward-declare' || event.kind === 'define-type') {
        this.types.set(event.entity.name, event.entity);
      }
    }
    this.declarators = {
      typeName: (name) => this.typeName(name),
      layout: config.fn.args,
      lineLength: config.line_length,
      noReturn: config.fn.no_return,
      nonNullAttribute: config.ptr.non_null_attribute,
      nullableAttribute: config.ptr.nullable_attribute,
    };
  }

  private get tagStyle(): boolean {
    return this.config.style === 'tag';
  }

  private typeName(name: string): string {
    const exportName = this.stream.exportNames.get(name) ?? name;
    const entity = this.types.get(name);
    if (!this.tagStyle || entity === undefined) {
      return exportName;
    }
    if (entity.kind === 'enum' && !isTaggedEnum(entity) && isSizedEnum(entity)) {
      return exportName;
    }
    const aggregate = aggregateOf(entity);
    return aggregate === undefined ? exportName : `${aggregate} ${exportName}`;
  }

  private newWriter(): SourceWriter {
    return new SourceWriter(this.config.tab_width);
  }

  private writeDocs(out: SourceWriter, docs: readonly string[]): void {
    if (!this.config.documentation || docs.length === 0) {
      return;
    }
    const lines = docs.map((line) => (line.startsWith(' ') ? line.slice(1) : line));
    switch (this.config.documentation_style) {
      case 'c99':
        for (const line of lines) {
          out.write(line === '' ? '//' : `// ${line}`).newLine();
        }
        return;
      case 'c':
      case 'doxy':
      case 'auto':
        out.write(this.config.documentation_style === 'c' ? '/*' : '/**').newLine();
        for (const line of lines) {
          out.write(line === '' ? ' *' : ` * ${line}`).newLine();
        }
        out.write(' */').newLine();
        return;
    }
  }

  private openAggregate(out: SourceWriter, aggregate: Aggregate, name: string, entityName: string): void {
    if (this.tagStyle || this.declared.has(entityName)) {
      out.write(`${aggregate} ${name} {`);
    } else if (this.config.style === 'type') {
      out.write(`typedef ${aggregate} {`);
    } else {
      out.write(`typedef ${aggregate} ${name} {`);
    }
    out.newLine().indent();
  }

  private closeAggregate(out: SourceWriter, name: string, entityName: string): void {
    out.dedent();
    out.write(this.tagStyle || this.declared.has(entityName) ? '};' : `} ${name};`);
  }

  private writeFields(out: SourceWriter, fields: readonly Field[]): void {
    for (const field of fields) {
      this.writeDocs(out, field.docs);
      writeDeclaration(out, field.type, field.exportName, this.declarators);
      out.write(';').newLine();
    }
  }

  /** Discriminants outside the constant grammar are written as given. */
  private renderDiscriminant(text: string): string {
    try {
      return renderConstExpr(parseConstExpr(text), {
        exportNames: this.stream.exportNames,
        declarators: this.declarators,
        boolean: false,
      });
    } catch (error) {
      if (error instanceof ConstExprParseError) {
        return text.trim();
      }
      throw error;
    }
  }

  private writeVariants(out: SourceWriter, variants: readonly Variant[]): void {
    for (const variant of variants) {
      this.writeDocs(out, variant.docs);
      out.write(variant.exportName);
      if (variant.discriminant !== undefined) {
        out.write(` = ${this.renderDiscriminant(variant.discriminant)}`);
      }
      out.write(',').newLine();
    }
  }

  forwardDeclaration(entity: TypeEntity): string {
    const out = this.newWriter();
    if (entity.kind === 'enum' && !isTaggedEnum(entity) && isSizedEnum(entity)) {
      const primitive = entity.attributes.repr.primitive ?? 'i32';
      out.write(`typedef ${PRIMITIVE_C_NAMES[primitive]} ${entity.exportName};`);
    } else {
      const aggregate = aggregateOf(entity) ?? 'struct';
      out.write(
        this.tagStyle
          ? `${aggregate} ${entity.exportName};`
          : `typedef ${aggregate} ${entity.exportName} ${entity.exportName};`
      );
    }
    this.declared.add(entity.name);
    return out.toString();
  }

  private structLike(entity: StructEntity | UnionEntity): string {
    const out = this.newWriter();
    this.writeDocs(out, entity.docs);
    this.openAggregate(out, entity.kind, entity.exportName, entity.name);
    this.writeFields(out, entity.fields);
    this.closeAggregate(out, entity.exportName, entity.name);
    return out.toString();
  }

  private typedef(entity: TypedefEntity): string {
    const out = this.newWriter();
    this.writeDocs(out, entity.docs);
    out.write('typedef ');
    writeDeclaration(out, entity.target, entity.exportName, this.declarators);
    out.write(';');
    return out.toString();
  }

  /**
   * Writes a field-less enum; sized enums get a typedef to their integer type.
   */
  private cLikeEnum(out: SourceWriter, entity: EnumEntity, name: string, entityName: string): void {
    const primitive = entity.attributes.repr.primitive;
    if (primitive !== undefined) {
      out.write(`enum ${name} {`).newLine().indent();
      this.writeVariants(out, entity.variants);
      out.dedent().write('};').newLine();
      out.write(`typedef ${PRIMITIVE_C_NAMES[primitive]} ${name};`);
      return;
    }
    this.openAggregate(out, 'enum', name, entityName);
    this.writeVariants(out, entity.variants);
    this.closeAggregate(out, name, entityName);
  }

  /**
   * Writes a tag enum, one body struct per variant with fields, and the
   * enum struct holding the tag and an anonymous union of the bodies.
   */
  private taggedEnum(entity: EnumEntity): string {
    const out = this.newWriter();
    const { tag: tagName, bodies } = taggedEnumHelperNames(entity);
    const tagType = this.tagStyle && !isSizedEnum(entity) ? `enum ${tagName}` : tagName;

    this.cLikeEnum(out, entity, tagName, tagName);
    out.blankLine();

    for (const [variant, body] of bodies) {
      this.writeDocs(out, variant.docs);
      this.openAggregate(out, 'struct', body, body);
      this.writeFields(out, variant.fields);
      this.closeAggregate(out, body, body);
      out.blankLine();
    }

    this.writeDocs(out, entity.docs);
    this.openAggregate(out, 'struct', entity.exportName, entity.name);
    out.write(`${tagType} tag;`).newLine();
    out.write('union {').newLine().indent();
    for (const [variant, body] of bodies) {
      const member = escapeReserved(applyRenameRule('SnakeCase', variant.name, 'field'));
      out.write(`${this.tagStyle ? `struct ${body}` : body} ${member};`).newLine();
    }
    out.dedent().write('};').newLine();
    this.closeAggregate(out, entity.exportName, entity.name);
    return out.toString();
  }

  private renderDefinition(entity: DefinableEntity): string {
    switch (entity.kind) {
      case 'struct':
      case 'union':
        return this.structLike(entity);
      case 'typedef':
        return this.typedef(entity);
      case 'enum': {
        if (isTaggedEnum(entity)) {
          return this.taggedEnum(entity);
        }
        const out = this.newWriter();
        this.writeDocs(out, entity.docs);
        this.cLikeEnum(out, entity, entity.exportName, entity.name);
        return out.toString();
      }
    }
  }

  definition(entity: DefinableEntity): string {
    const text = this.renderDefinition(entity);
    this.declared.add(entity.name);
    return text;
  }

  constant(entity: ConstantEntity): string {
    const out = this.newWriter();
    this.writeDocs(out, entity.docs);
    const value = renderConstExpr(entity.value, {
      exportNames: this.stream.exportNames,
      declarators: this.declarators,
      boolean: entity.type.kind === 'primitive' && entity.type.name === 'bool',
    });
    out.write(`#define ${entity.exportName} ${value}`);
    return out.toString();
  }

  func(entity: FunctionEntity): string {
    const out = this.newWriter();
    this.writeDocs(out, entity.docs);
    if (entity.attributes.mustUse && this.config.fn.must_use !== '') {
      out.write(`${this.config.fn.must_use} `);
    }
    if (entity.attributes.deprecated !== undefined && this.config.fn.deprecated !== '') {
      out.write(`${this.config.fn.deprecated.replace('{}', JSON.stringify(entity.attributes.deprecated))} `);
    }
    writeFunctionDeclarator(out, entity, this.config.fn.args, this.declarators);
    out.write(';');
    return out.toString();
  }

  staticItem(entity: StaticEntity): string {
    const out = this.newWriter();
    this.writeDocs(out, entity.docs);
    out.write('extern ');
    const constPointee = entity.type.kind === 'pointer' && !entity.type.mutable;
    if (!entity.mutable && !constPointee) {
      out.write('const ');
    }
    writeDeclaration(out, entity.type, entity.exportName, this.declarators);
    out.write(';');
    return out.toString();
  }

  preamble(version: string | undefined): string[] {
    const sections: string[] = [];
    const { config } = this;
    if (config.header !== '') {
      sections.push(config.header);
    }
    if (config.pragma_once) {
      sections.push('#pragma once');
    }
    if (config.include_guard !== '') {
      sections.push(`#ifndef ${config.include_guard}\n#define ${config.include_guard}`);
    }
    if (config.include_version && version !== undefined) {
      sections.push(`/* Generated with ffi-headergen ${version} */`);
    }
    if (config.autogen_warning !== '') {
      sections.push(config.autogen_warning);
    }
    if (!config.no_includes) {
      const system = [...new Set([...DEFAULT_SYS_INCLUDES, ...config.sys_includes])];
      const lines = [
        ...system.map((file) => `#include <${file}>`),
        ...config.includes.map((file) => `#include "${file}"`),
      ];
      sections.push(lines.join('\n'));
    }
    return sections;
  }

  event(event: EmissionEvent): string {
    switch (event.kind) {
      case 'forward-declare':
        return this.forwardDeclaration(event.entity);
      case 'define-type':
        return this.definition(event.entity);
      case 'declare-constant':
        return this.constant(event.entity);
      case 'declare-function':
        return this.func(event.entity);
      case 'declare-static':
        return this.staticItem(event.entity);
    }
  }
}

/**
 * Renders the header text for an emission stream.
 *
 * @param stream - The checked stream.
 * @param config - Output settings.
 * @param options - Generator version.
 * @returns The header, ending with a line break.
 */
export function writeHeader(stream: EmissionStream, config: Config, options: HeaderOptions = {}): string {
  const writer = new HeaderWriter(stream, config);
  const sections = writer.preamble(options.version);

  const isLinkable = (event: EmissionEvent): boolean =>
    event.kind === 'declare-function' || event.kind === 'declare-static';
  const declarations = stream.events.filter((e) => !isLinkable(e));
  const linkable = stream.events.filter(isLinkable);

  for (const event of declarations) {
    sections.push(writer.event(event).replace(/\n$/, ''));
  }
  if (linkable.length > 0) {
    if (config.cpp_compat) {
      sections.push(CPP_OPEN);
    }
    for (const event of linkable) {
      sections.push(writer.event(event).replace(/\n$/, ''));
    }
    if (config.cpp_compat) {
      sections.push(CPP_CLOSE);
    }
  }

  if (config.trailer !== '') {
    sections.push(config.trailer);
  }
  if (config.include_guard !== '') {
    sections.push(`#endif  /* ${config.include_guard} */`);
  }

  return sections.length === 0 ? '' : `${sections.join('\n\n')}\n`;
}
