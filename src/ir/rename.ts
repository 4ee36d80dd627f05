/**
 * Identifier rename rules and C keyword escaping.
 *
 * @packageDocumentation
 */

import { resolvePackageFile } from '../utils/package-files.js';
import { safeReadFileSync } from '../utils/safe-fs.js';

/**
 * Rename rules applied to fields, variants and function arguments.
 */
export type RenameRule =
  | 'None'
  | 'GeckoCase'
  | 'LowerCase'
  | 'UpperCase'
  | 'PascalCase'
  | 'CamelCase'
  | 'SnakeCase'
  | 'ScreamingSnakeCase'
  | 'QualifiedScreamingSnakeCase';

/**
 * What kind of identifier a rule is applied to.
 */
export type IdentifierContext = 'field' | 'arg' | 'variant';

/**
 * Accepted spellings of each rule, as written in config or annotations.
 */
const RULE_SPELLINGS: ReadonlyMap<string, RenameRule> = new Map<string, RenameRule>([
  ['None', 'None'],
  ['none', 'None'],
  ['GeckoCase', 'GeckoCase'],
  ['mGeckoCase', 'GeckoCase'],
  ['LowerCase', 'LowerCase'],
  ['lowercase', 'LowerCase'],
  ['UpperCase', 'UpperCase'],
  ['UPPERCASE', 'UpperCase'],
  ['PascalCase', 'PascalCase'],
  ['CamelCase', 'CamelCase'],
  ['camelCase', 'CamelCase'],
  ['SnakeCase', 'SnakeCase'],
  ['snake_case', 'SnakeCase'],
  ['ScreamingSnakeCase', 'ScreamingSnakeCase'],
  ['SCREAMING_SNAKE_CASE', 'ScreamingSnakeCase'],
  ['QualifiedScreamingSnakeCase', 'QualifiedScreamingSnakeCase'],
]);

/**
 * Every recognized rule spelling.
 */
export const RENAME_RULE_SPELLINGS: readonly string[] = [...RULE_SPELLINGS.keys()];

/**
 * Parses a rule spelling.
 *
 * @returns The rule, or undefined for an unrecognized spelling.
 */
export function parseRenameRule(text: string): RenameRule | undefined {
  return RULE_SPELLINGS.get(text);
}

/**
 * Splits an identifier into lowercase words at underscores and case changes.
 *
 * @example
 * splitWords('fooBar_baz') // ['foo', 'bar', 'baz']
 */
export function splitWords(name: string): string[] {
  return name
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .split('_')
    .filter((w) => w !== '')
    .map((w) => w.toLowerCase());
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

/**
 * Applies a rename rule to an identifier.
 *
 * @param rule - The rule.
 * @param name - The identifier.
 * @param context - Identifier kind; GeckoCase prefixes fields with `m` and arguments with `a`.
 * @param qualifier - Owner name for QualifiedScreamingSnakeCase, e.g. the enum name.
 * @returns The renamed identifier.
 */
export function applyRenameRule(
  rule: RenameRule,
  name: string,
  context: IdentifierContext,
  qualifier?: string
): string {
  // Leading underscores mark positional fields (`_0`) and survive every rule.
  const leading = /^_*/.exec(name)?.[0] ?? '';
  const words = splitWords(name);
  if (words.length === 0) {
    return name;
  }

  switch (rule) {
    case 'None':
      return name;
    case 'LowerCase':
      return name.toLowerCase();
    case 'UpperCase':
      return name.toUpperCase();
    case 'PascalCase':
      return leading + words.map(capitalize).join('');
    case 'CamelCase': {
      const [first = '', ...rest] = words;
      return leading + first + rest.map(capitalize).join('');
    }
    case 'SnakeCase':
      return leading + words.join('_');
    case 'ScreamingSnakeCase':
      return leading + words.join('_').toUpperCase();
    case 'QualifiedScreamingSnakeCase': {
      const body = words.join('_').toUpperCase();
      return qualifier === undefined ? body : `${splitWords(qualifier).join('_').toUpperCase()}_${body}`;
    }
    case 'GeckoCase': {
      const prefix = context === 'field' ? 'm' : context === 'arg' ? 'a' : '';
      return prefix + words.map(capitalize).join('');
    }
  }
}

interface ReservedWords {
  c: string[];
  cpp: string[];
}

let reservedWords: ReadonlySet<string> | undefined;

function loadReservedWords(): ReadonlySet<string> {
  if (reservedWords === undefined) {
    const path = resolvePackageFile(import.meta.url, 2, 'data/reserved-words.json');
    const data: ReservedWords = JSON.parse(safeReadFileSync(path, 'utf-8'));
    reservedWords = new Set([...data.c, ...data.cpp]);
  }
  return reservedWords;
}

/**
 * Checks whether a name is a C or C++ keyword.
 */
export function isReservedWord(name: string): boolean {
  return loadReservedWords().has(name);
}

/**
 * Escapes a C or C++ keyword by appending an underscore.
 *
 * @example
 * escapeReserved('int') // 'int_'
 */
export function escapeReserved(name: string): string {
  return isReservedWord(name) ? `${name}_` : name;
}
