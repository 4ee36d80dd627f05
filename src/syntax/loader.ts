/**
 * Crate dump loader.
 *
 * Reads the JSON syntax dumps produced by a front-end, validates them against
 * `schemas/crate.schema.json` and converts type strings into
 * {@link TypeExpr} trees.
 *
 * @packageDocumentation
 */

import AjvModule from 'ajv';
import type { ErrorObject, SchemaObject, ValidateFunction } from 'ajv';
import { resolvePackageFile } from '../utils/package-files.js';
import { safeReadFile, safeReadFileSync } from '../utils/safe-fs.js';
import { parseTypeExpr, TypeExprParseError } from './type-expr.js';
import type {
  CrateDump,
  DeclarationNode,
  FieldNode,
  GenericParamNode,
  ParamNode,
  RawAttribute,
  TypeExpr,
  VariantNode,
} from './types.js';

/**
 * Error thrown when a crate dump cannot be read, validated or converted.
 */
export class CrateLoadError extends Error {
  /** Name of the dump source (file path or label). */
  public readonly source: string;
  /** Schema validation failures, when the dump did not match the schema. */
  public readonly details: readonly string[];

  /**
   * Creates a new CrateLoadError.
   *
   * @param message - Descriptive error message.
   * @param source - File path or label of the dump.
   * @param details - Individual validation failures.
   */
  constructor(message: string, source: string, details: readonly string[] = []) {
    super(message);
    this.name = 'CrateLoadError';
    this.source = source;
    this.details = details;
  }
}

interface RawField {
  name: string;
  type: string;
  attributes?: RawAttribute[];
  docs?: string[];
}

interface RawVariant {
  name: string;
  discriminant?: string;
  fields?: RawField[];
  tuple?: boolean;
  attributes?: RawAttribute[];
  docs?: string[];
}

interface RawParam {
  name?: string;
  type: string;
}

interface RawItem {
  kind: DeclarationNode['kind'];
  name: string;
  public?: boolean;
  attributes?: RawAttribute[];
  generics?: string[];
  docs?: string[];
  fields?: RawField[];
  tuple?: boolean;
  variants?: RawVariant[];
  params?: RawParam[];
  returns?: string;
  abi?: string;
  variadic?: boolean;
  type?: string;
  value?: string;
  mutable?: boolean;
  items?: RawItem[];
}

interface RawCrate {
  crate: string;
  items: RawItem[];
}

let cachedValidator: ValidateFunction<RawCrate> | undefined;

function getValidator(): ValidateFunction<RawCrate> {
  if (cachedValidator !== undefined) {
    return cachedValidator;
  }

  const schemaPath = resolvePackageFile(import.meta.url, 2, 'schemas/crate.schema.json');
  const schema: SchemaObject = JSON.parse(safeReadFileSync(schemaPath, 'utf-8'));
  const ajv = new AjvModule.default({ allErrors: true });
  cachedValidator = ajv.compile<RawCrate>(schema);
  return cachedValidator;
}

function formatSchemaError(error: ErrorObject): string {
  const location = error.instancePath === '' ? '/' : error.instancePath;
  return `${location}: ${error.message ?? 'invalid'}`;
}

function convertType(text: string, location: string, source: string): TypeExpr {
  try {
    return parseTypeExpr(text);
  } catch (error) {
    if (error instanceof TypeExprParseError) {
      throw new CrateLoadError(`Invalid type at ${location}: ${error.message}`, source);
    }
    throw error;
  }
}

function convertGenerics(raw: readonly string[] | undefined, location: string, source: string): GenericParamNode[] {
  const result: GenericParamNode[] = [];
  for (const text of raw ?? []) {
    const trimmed = text.trim();
    if (trimmed.startsWith("'")) {
      continue;
    }
    const constMatch = /^const\s+([A-Za-z_][A-Za-z0-9_]*)\s*:\s*([A-Za-z_][A-Za-z0-9_]*)$/.exec(trimmed);
    if (constMatch !== null) {
      const [, name, constType] = constMatch;
      if (name !== undefined && constType !== undefined) {
        result.push({ name, kind: 'const', constType });
        continue;
      }
    }
    // Trait bounds (`T: Copy`) do not affect layout.
    const typeMatch = /^([A-Za-z_][A-Za-z0-9_]*)\s*(?::.*)?$/.exec(trimmed);
    if (typeMatch?.[1] === undefined) {
      throw new CrateLoadError(`Invalid generic parameter '${text}' at ${location}`, source);
    }
    result.push({ name: typeMatch[1], kind: 'type' });
  }
  return result;
}

function convertField(raw: RawField, location: string, source: string): FieldNode {
  return {
    name: raw.name,
    type: convertType(raw.type, `${location}.${raw.name}`, source),
    attributes: raw.attributes ?? [],
    docs: raw.docs ?? [],
  };
}

function convertVariant(raw: RawVariant, location: string, source: string): VariantNode {
  const variantLocation = `${location}::${raw.name}`;
  const fields = (raw.fields ?? []).map((f) => convertField(f, variantLocation, source));
  const base = {
    name: raw.name,
    fields,
    tuple: raw.tuple ?? false,
    attributes: raw.attributes ?? [],
    docs: raw.docs ?? [],
  };
  return raw.discriminant === undefined ? base : { ...base, discriminant: raw.discriminant };
}

function convertParam(raw: RawParam, location: string, source: string): ParamNode {
  const type = convertType(raw.type, `${location}(${raw.name ?? '_'})`, source);
  return raw.name === undefined ? { type } : { name: raw.name, type };
}

function requireString(value: string | undefined, field: string, location: string, source: string): string {
  if (value === undefined) {
    throw new CrateLoadError(`Missing '${field}' at ${location}`, source);
  }
  return value;
}

function convertItem(raw: RawItem, parentLocation: string, source: string): DeclarationNode {
  const location = parentLocation === '' ? raw.name : `${parentLocation}::${raw.name}`;
  const base = {
    name: raw.name,
    attributes: raw.attributes ?? [],
    generics: convertGenerics(raw.generics, location, source),
    docs: raw.docs ?? [],
    public: raw.public ?? true,
  };

  switch (raw.kind) {
    case 'struct':
      return {
        ...base,
        kind: 'struct',
        fields: (raw.fields ?? []).map((f) => convertField(f, location, source)),
        tuple: raw.tuple ?? false,
      };
    case 'union':
      return {
        ...base,
        kind: 'union',
        fields: (raw.fields ?? []).map((f) => convertField(f, location, source)),
      };
    case 'enum':
      return {
        ...base,
        kind: 'enum',
        variants: (raw.variants ?? []).map((v) => convertVariant(v, location, source)),
      };
    case 'opaque':
      return { ...base, kind: 'opaque' };
    case 'type':
      return {
        ...base,
        kind: 'type',
        target: convertType(requireString(raw.type, 'type', location, source), location, source),
      };
    case 'function': {
      const node = {
        ...base,
        kind: 'function' as const,
        params: (raw.params ?? []).map((p) => convertParam(p, location, source)),
        returns:
          raw.returns === undefined
            ? { kind: 'unit' as const }
            : convertType(raw.returns, `${location} -> `, source),
        variadic: raw.variadic ?? false,
      };
      return raw.abi === undefined ? node : { ...node, abi: raw.abi };
    }
    case 'const':
      return {
        ...base,
        kind: 'const',
        type: convertType(requireString(raw.type, 'type', location, source), location, source),
        value: requireString(raw.value, 'value', location, source),
      };
    case 'static':
      return {
        ...base,
        kind: 'static',
        type: convertType(requireString(raw.type, 'type', location, source), location, source),
        mutable: raw.mutable ?? false,
      };
    case 'module':
      return {
        ...base,
        kind: 'module',
        items: (raw.items ?? []).map((item) => convertItem(item, location, source)),
      };
  }
}

/**
 * Parses and validates a crate dump from JSON text.
 *
 * @param jsonText - The JSON document.
 * @param source - File path or label used in error messages.
 * @returns The converted crate dump.
 * @throws CrateLoadError for invalid JSON, schema violations or malformed type strings.
 */
export function parseCrateDump(jsonText: string, source = '<input>'): CrateDump {
  let data: unknown;
  try {
    data = JSON.parse(jsonText);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new CrateLoadError(`Invalid JSON in crate dump: ${message}`, source);
  }

  const validate = getValidator();
  if (!validate(data)) {
    const details = (validate.errors ?? []).map(formatSchemaError);
    throw new CrateLoadError(
      `Crate dump ${source} does not match the crate schema: ${details.join('; ')}`,
      source,
      details
    );
  }

  return {
    crate: data.crate,
    items: data.items.map((item) => convertItem(item, '', source)),
  };
}

/**
 * Reads and parses one crate dump file.
 *
 * @param filePath - Path of the JSON dump.
 * @returns The converted crate dump.
 * @throws CrateLoadError if the file cannot be read or is invalid.
 */
export async function loadCrateDump(filePath: string): Promise<CrateDump> {
  let text: string;
  try {
    text = await safeReadFile(filePath, 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new CrateLoadError(`Cannot read crate dump: ${message}`, filePath);
  }
  return parseCrateDump(text, filePath);
}

/**
 * Loads several crate dumps concurrently, keeping the given order.
 *
 * The first path is the root crate; its declarations win over same-named
 * declarations of later crates when the dumps are merged into one library.
 *
 * @param filePaths - Paths of the JSON dumps, root crate first.
 * @returns The converted dumps, in the same order.
 */
export async function loadCrates(filePaths: readonly string[]): Promise<CrateDump[]> {
  return Promise.all(filePaths.map((p) => loadCrateDump(p)));
}
