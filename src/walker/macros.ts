import type { CfgPredicate } from './cfg.js';
import { parseAttribute } from './attributes.js';
import { isGroup, isKeyword, isPunct } from './tokens.js';
import type { Delimiter, TokenTree } from './tokens.js';

/** An item-position macro call whose input declares file-backed modules. */
export interface MacroInvocation {
  /** Last path segment, e.g. `cfg_if` for `cfg_if::cfg_if!`. */
  name: string;
  /** Full macro path as written. */
  path: string;
  delimiter: Delimiter;
  tokens: TokenTree[];
  filePath: string;
  line: number;
  column: number;
}

/** Items a macro expands to, scanned as if written in place of the call. */
export interface MacroExpansion {
  cfg?: CfgPredicate;
  tokens: TokenTree[];
}

/**
 * Supplies expansions for macros the walker cannot see through. Return
 * `undefined` to decline; the next resolver is then asked.
 */
export interface MacroResolver {
  readonly name: string;
  expand(invocation: MacroInvocation): MacroExpansion[] | undefined;
}

/**
 * `cfg_if! { if #[cfg(a)] { .. } else if #[cfg(b)] { .. } else { .. } }`
 *
 * Each branch is gated on its own condition and on every earlier condition
 * being false, so an undecidable chain keeps all branches.
 */
export const cfgIfResolver: MacroResolver = {
  name: 'cfg_if',

  expand(invocation) {
    if (invocation.name !== 'cfg_if') return undefined;

    const trees = invocation.tokens;
    const expansions: MacroExpansion[] = [];
    const earlier: CfgPredicate[] = [];
    let i = 0;

    while (i < trees.length) {
      if (expansions.length > 0) {
        if (!isKeyword(trees[i], 'else')) return undefined;
        i++;
        const body = trees[i];
        if (isGroup(body, '{')) {
          expansions.push({ cfg: negateAll(earlier), tokens: body.children });
          i++;
          break;
        }
      }

      const attr = trees[i + 2];
      const body = trees[i + 3];
      if (!isKeyword(trees[i], 'if') || !isPunct(trees[i + 1], '#') || !isGroup(attr, '[') || !isGroup(body, '{')) {
        return undefined;
      }
      const parsed = parseAttribute(attr, invocation.filePath);
      if (parsed?.kind !== 'cfg') return undefined;

      expansions.push({
        cfg: { kind: 'all', predicates: [parsed.predicate, ...earlier.map(negate)] },
        tokens: body.children,
      });
      earlier.push(parsed.predicate);
      i += 4;
    }

    return i === trees.length && expansions.length > 0 ? expansions : undefined;
  },
};

function negate(predicate: CfgPredicate): CfgPredicate {
  return { kind: 'not', predicate };
}

function negateAll(predicates: readonly CfgPredicate[]): CfgPredicate {
  return { kind: 'all', predicates: predicates.map(negate) };
}

export const DEFAULT_MACRO_RESOLVERS: readonly MacroResolver[] = [cfgIfResolver];
