/**
 * Conditional-compilation predicates.
 *
 * A predicate is parsed from the text of a `cfg` attribute:
 *
 * ```
 * unix
 * feature = "serde"
 * all(unix, not(target_os = "macos"))
 * any(feature = "a", feature = "b")
 * ```
 *
 * @packageDocumentation
 */

/**
 * A parsed conditional-compilation predicate.
 */
export type Cfg =
  | { readonly kind: 'flag'; readonly name: string }
  | { readonly kind: 'keyvalue'; readonly key: string; readonly value: string }
  | { readonly kind: 'all'; readonly items: readonly Cfg[] }
  | { readonly kind: 'any'; readonly items: readonly Cfg[] }
  | { readonly kind: 'not'; readonly item: Cfg };

/**
 * The flags, features and key/value settings predicates are evaluated against.
 */
export interface CfgEnvironment {
  /** Bare flags such as `unix`; absent flags are unknown. */
  readonly flags: ReadonlyMap<string, boolean>;
  /** Features tested by `feature = "name"`; absent features are unknown. */
  readonly features: ReadonlyMap<string, boolean>;
  /** Key/value settings such as `target_os = "linux"`; absent keys are unknown. */
  readonly values: ReadonlyMap<string, string>;
}

/**
 * Error thrown when predicate text cannot be parsed.
 */
export class CfgParseError extends Error {
  /** The predicate text. */
  public readonly source: string;

  constructor(message: string, source: string) {
    super(`${message} in cfg '${source}'`);
    this.name = 'CfgParseError';
    this.source = source;
  }
}

/**
 * An environment where every leaf is unknown.
 */
export const EMPTY_CFG_ENVIRONMENT: CfgEnvironment = {
  flags: new Map(),
  features: new Map(),
  values: new Map(),
};

type CfgToken =
  | { readonly kind: 'ident'; readonly text: string }
  | { readonly kind: 'string'; readonly text: string }
  | { readonly kind: 'punct'; readonly text: '(' | ')' | ',' | '=' };

function tokenizeCfg(source: string): CfgToken[] {
  const tokens: CfgToken[] = [];
  let i = 0;
  while (i < source.length) {
    const ch = source.charAt(i);
    if (/\s/.test(ch)) {
      i++;
    } else if (/[A-Za-z_]/.test(ch)) {
      const start = i;
      while (i < source.length && /[A-Za-z0-9_]/.test(source.charAt(i))) {
        i++;
      }
      tokens.push({ kind: 'ident', text: source.slice(start, i) });
    } else if (ch === '"') {
      const end = source.indexOf('"', i + 1);
      if (end === -1) {
        throw new CfgParseError('Unterminated string', source);
      }
      tokens.push({ kind: 'string', text: source.slice(i + 1, end) });
      i = end + 1;
    } else if (ch === '(' || ch === ')' || ch === ',' || ch === '=') {
      tokens.push({ kind: 'punct', text: ch });
      i++;
    } else {
      throw new CfgParseError(`Unexpected character '${ch}'`, source);
    }
  }
  return tokens;
}

/**
 * Parses predicate text into a {@link Cfg} tree.
 *
 * @param source - Text of the `cfg` attribute, without the surrounding `cfg(...)`.
 * @returns The parsed predicate.
 * @throws CfgParseError if the text is not a predicate.
 */
export function parseCfg(source: string): Cfg {
  const tokens = tokenizeCfg(source);
  let pos = 0;

  const fail = (message: string): never => {
    throw new CfgParseError(message, source);
  };

  const isPunct = (text: string): boolean => {
    const token = tokens[pos];
    return token?.kind === 'punct' && token.text === text;
  };

  const expectPunct = (text: string): void => {
    if (!isPunct(text)) {
      fail(`Expected '${text}'`);
    }
    pos++;
  };

  const parseList = (): Cfg[] => {
    expectPunct('(');
    const items: Cfg[] = [];
    while (!isPunct(')')) {
      items.push(parsePredicate());
      if (isPunct(',')) {
        pos++;
      } else if (!isPunct(')')) {
        fail("Expected ',' or ')'");
      }
    }
    pos++;
    return items;
  };

  const parsePredicate = (): Cfg => {
    const token = tokens[pos];
    if (token?.kind !== 'ident') {
      return fail('Expected identifier');
    }
    pos++;

    if (isPunct('(')) {
      const items = parseList();
      switch (token.text) {
        case 'all':
          return { kind: 'all', items };
        case 'any':
          return { kind: 'any', items };
        case 'not': {
          const [item] = items;
          if (items.length !== 1 || item === undefined) {
            return fail('not() takes exactly one predicate');
          }
          return { kind: 'not', item };
        }
        default:
          return fail(`Unknown predicate combinator '${token.text}'`);
      }
    }

    if (isPunct('=')) {
      pos++;
      const value = tokens[pos];
      if (value?.kind !== 'string') {
        return fail(`Expected string value for '${token.text}'`);
      }
      pos++;
      return { kind: 'keyvalue', key: token.text, value: value.text };
    }

    return { kind: 'flag', name: token.text };
  };

  const result = parsePredicate();
  if (pos !== tokens.length) {
    fail('Unexpected trailing input');
  }
  return result;
}

/**
 * Conjoins predicates, e.g. a module's predicate with an item's own.
 *
 * @param predicates - Predicates to combine; undefined entries are ignored.
 * @returns undefined when nothing remains, the single predicate, or an `all`.
 */
export function conjoinCfg(predicates: readonly (Cfg | undefined)[]): Cfg | undefined {
  const present = predicates.filter((p): p is Cfg => p !== undefined);
  if (present.length === 0) {
    return undefined;
  }
  if (present.length === 1) {
    return present[0];
  }
  return { kind: 'all', items: present };
}

/**
 * Renders a predicate back to attribute text.
 */
export function formatCfg(cfg: Cfg): string {
  switch (cfg.kind) {
    case 'flag':
      return cfg.name;
    case 'keyvalue':
      return `${cfg.key} = "${cfg.value}"`;
    case 'all':
    case 'any':
      return `${cfg.kind}(${cfg.items.map(formatCfg).join(', ')})`;
    case 'not':
      return `not(${formatCfg(cfg.item)})`;
  }
}

/**
 * Evaluates a predicate.
 *
 * Leaves missing from the environment evaluate to false and are reported
 * through `onUnknown`, formatted as attribute text.
 *
 * @param cfg - The predicate.
 * @param env - Flags, features and values.
 * @param onUnknown - Called for every unknown leaf encountered.
 * @returns Whether the predicate holds.
 */
export function evaluateCfg(
  cfg: Cfg,
  env: CfgEnvironment,
  onUnknown: (leaf: string) => void = () => undefined
): boolean {
  switch (cfg.kind) {
    case 'flag': {
      const value = env.flags.get(cfg.name);
      if (value === undefined) {
        onUnknown(formatCfg(cfg));
        return false;
      }
      return value;
    }
    case 'keyvalue': {
      if (cfg.key === 'feature') {
        const enabled = env.features.get(cfg.value);
        if (enabled === undefined) {
          onUnknown(formatCfg(cfg));
          return false;
        }
        return enabled;
      }
      const actual = env.values.get(cfg.key);
      if (actual === undefined) {
        onUnknown(formatCfg(cfg));
        return false;
      }
      return actual === cfg.value;
    }
    // Every item is evaluated so each unknown leaf gets reported.
    case 'all':
      return cfg.items.map((item) => evaluateCfg(item, env, onUnknown)).every(Boolean);
    case 'any':
      return cfg.items.map((item) => evaluateCfg(item, env, onUnknown)).some(Boolean);
    case 'not':
      return !evaluateCfg(cfg.item, env, onUnknown);
  }
}
