/**
 * Attribute classification.
 *
 * Raw attributes from the syntax dump are sorted into a closed tagged variant.
 * Anything not recognized lands in `passthrough`, which the IR builder ignores
 * with a warning.
 *
 * @packageDocumentation
 */

import { CfgParseError, parseCfg } from '../cfg/predicate.js';
import type { Cfg } from '../cfg/predicate.js';
import type { RawAttribute } from '../syntax/types.js';
import { primitiveKind } from './type-ref.js';
import type { AnnotationValue, PrimitiveKind, Repr } from './types.js';

/**
 * Attribute name carrying generator annotations, e.g.
 * `#[headergen(rename-all = "camelCase")]`.
 */
export const ANNOTATION_ATTRIBUTE = 'headergen';

/**
 * Doc comment lines starting with this prefix are annotations, e.g.
 * `/// headergen:prefix-with-name`.
 */
export const ANNOTATION_DOC_PREFIX = 'headergen:';

/**
 * One `repr` item.
 */
export type ReprItem =
  | { readonly kind: 'c' }
  | { readonly kind: 'transparent' }
  | { readonly kind: 'rust' }
  | { readonly kind: 'primitive'; readonly primitive: PrimitiveKind }
  | { readonly kind: 'packed' }
  | { readonly kind: 'align'; readonly value: number };

/**
 * A classified attribute.
 */
export type Attribute =
  | { readonly kind: 'repr'; readonly items: readonly ReprItem[] }
  | { readonly kind: 'cfg'; readonly predicate: Cfg }
  | { readonly kind: 'doc'; readonly text: string }
  | { readonly kind: 'no_mangle' }
  | { readonly kind: 'export_name'; readonly value: string }
  | { readonly kind: 'deprecated'; readonly note: string }
  | { readonly kind: 'must_use' }
  | { readonly kind: 'annotation'; readonly key: string; readonly value: AnnotationValue }
  | { readonly kind: 'inert'; readonly name: string }
  | { readonly kind: 'passthrough'; readonly name: string; readonly value?: string; readonly reason?: string };

/** Attributes that have no bearing on the header. */
const INERT_ATTRIBUTES: ReadonlySet<string> = new Set([
  'derive',
  'allow',
  'warn',
  'deny',
  'forbid',
  'expect',
  'inline',
  'cold',
  'track_caller',
  'non_exhaustive',
  'automatically_derived',
  'rustfmt',
  'clippy',
  'test',
  'doc_hidden',
]);

const INTEGER_REPRS: ReadonlySet<PrimitiveKind> = new Set<PrimitiveKind>([
  'u8',
  'u16',
  'u32',
  'u64',
  'usize',
  'i8',
  'i16',
  'i32',
  'i64',
  'isize',
]);

/**
 * Splits `a, b(c, d), e` on top-level commas.
 */
export function splitTopLevel(text: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let current = '';
  for (const ch of text) {
    if (ch === '(' || ch === '[') depth++;
    if (ch === ')' || ch === ']') depth--;
    if (ch === ',' && depth === 0) {
      parts.push(current.trim());
      current = '';
      continue;
    }
    current += ch;
  }
  if (current.trim() !== '') {
    parts.push(current.trim());
  }
  return parts;
}

function unquote(text: string): string {
  const trimmed = text.trim();
  if (trimmed.length >= 2 && trimmed.startsWith('"') && trimmed.endsWith('"')) {
    return trimmed.slice(1, -1);
  }
  return trimmed;
}

function parseReprItems(value: string): ReprItem[] | undefined {
  const items: ReprItem[] = [];
  for (const part of splitTopLevel(value)) {
    if (part === 'C') {
      items.push({ kind: 'c' });
    } else if (part === 'transparent') {
      items.push({ kind: 'transparent' });
    } else if (part === 'Rust') {
      items.push({ kind: 'rust' });
    } else if (part === 'packed') {
      items.push({ kind: 'packed' });
    } else {
      const align = /^align\(\s*(\d+)\s*\)$/.exec(part);
      const primitive = primitiveKind(part);
      if (align?.[1] !== undefined) {
        items.push({ kind: 'align', value: Number(align[1]) });
      } else if (primitive !== undefined && INTEGER_REPRS.has(primitive)) {
        items.push({ kind: 'primitive', primitive });
      } else {
        return undefined;
      }
    }
  }
  return items;
}

/**
 * Parses the body of an annotation attribute or doc line:
 * `rename-all = "camelCase"` or a bare `opaque`.
 */
export function parseAnnotation(text: string): { key: string; value: AnnotationValue } | undefined {
  const match = /^\s*([A-Za-z][A-Za-z0-9_-]*)\s*(?:=\s*(.*?))?\s*$/.exec(text);
  if (match?.[1] === undefined) {
    return undefined;
  }
  return { key: match[1], value: match[2] === undefined ? true : unquote(match[2]) };
}

/**
 * Classifies one raw attribute.
 *
 * @param raw - The attribute as written in the dump.
 * @returns The classified attribute; unrecognized or malformed attributes are `passthrough`.
 */
export function classifyAttribute(raw: RawAttribute): Attribute {
  const value = raw.value?.trim();
  const passthrough = (reason?: string): Attribute => ({
    kind: 'passthrough',
    name: raw.name,
    ...(value !== undefined ? { value } : {}),
    ...(reason !== undefined ? { reason } : {}),
  });

  switch (raw.name) {
    case 'repr': {
      const items = value === undefined ? undefined : parseReprItems(value);
      return items === undefined ? passthrough('unrecognized repr') : { kind: 'repr', items };
    }
    case 'cfg': {
      if (value === undefined) {
        return passthrough('cfg without predicate');
      }
      try {
        return { kind: 'cfg', predicate: parseCfg(value) };
      } catch (error) {
        if (error instanceof CfgParseError) {
          return passthrough(error.message);
        }
        throw error;
      }
    }
    case 'doc':
      return { kind: 'doc', text: value === undefined ? '' : unquote(value) };
    case 'no_mangle':
      return { kind: 'no_mangle' };
    case 'export_name':
      return value === undefined
        ? passthrough('export_name without value')
        : { kind: 'export_name', value: unquote(value) };
    case 'deprecated': {
      if (value === undefined) {
        return { kind: 'deprecated', note: '' };
      }
      const note = /note\s*=\s*("(?:[^"\\]|\\.)*")/.exec(value);
      return { kind: 'deprecated', note: unquote(note?.[1] ?? value) };
    }
    case 'must_use':
      return { kind: 'must_use' };
    case ANNOTATION_ATTRIBUTE: {
      const annotation = value === undefined ? undefined : parseAnnotation(value);
      return annotation === undefined
        ? passthrough('malformed annotation')
        : { kind: 'annotation', key: annotation.key, value: annotation.value };
    }
    default:
      return INERT_ATTRIBUTES.has(raw.name) ? { kind: 'inert', name: raw.name } : passthrough();
  }
}

/**
 * Folds `repr` items into a {@link Repr}. Later items win for the style.
 */
export function reprFromItems(items: readonly ReprItem[]): Repr {
  let style: Repr['style'] = 'rust';
  let primitive: PrimitiveKind | undefined;
  let packed = false;
  let align: number | undefined;

  for (const item of items) {
    switch (item.kind) {
      case 'c':
        style = 'c';
        break;
      case 'transparent':
        style = 'transparent';
        break;
      case 'rust':
        break;
      case 'primitive':
        primitive = item.primitive;
        break;
      case 'packed':
        packed = true;
        break;
      case 'align':
        align = item.value;
        break;
    }
  }

  return {
    style,
    packed,
    ...(primitive !== undefined ? { primitive } : {}),
    ...(align !== undefined ? { align } : {}),
  };
}

/**
 * Parses a `ptrs-as-arrays` annotation value: `[[data; 4], [out; ]]`.
 *
 * @returns Parameter name to array length; malformed tuples are skipped.
 */
export function parsePtrsAsArrays(value: string): Map<string, string> {
  const result = new Map<string, string>();
  for (const match of value.matchAll(/\[\s*([A-Za-z_][A-Za-z0-9_]*)\s*;\s*([^\]\[]*?)\s*\]/g)) {
    const [, name, length] = match;
    if (name !== undefined && length !== undefined) {
      result.set(name, length);
    }
  }
  return result;
}

/**
 * Parses a list annotation value such as `field-names = [x, y]`.
 */
export function parseNameList(value: string): string[] {
  const inner = value.trim().replace(/^\[/, '').replace(/\]$/, '');
  return splitTopLevel(inner).map(unquote).filter((s) => s !== '');
}
