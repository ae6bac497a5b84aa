import { ParseError, UnsupportedConstructError } from '../errors.js';
import { parseCfgPredicate } from './cfg.js';
import type { CfgEvaluator, CfgPredicate } from './cfg.js';
import { isGroup, isPunct, isStringLiteral, splitOnCommas } from './tokens.js';
import type { Group, TokenTree } from './tokens.js';

/** The attributes that affect where, or whether, a module is loaded. Others are dropped. */
export type Attribute =
  | { kind: 'cfg'; predicate: CfgPredicate }
  | { kind: 'path'; value: string; line: number; column: number }
  /** A `path` attribute not of the `path = "..."` form; only an error on a `mod`. */
  | { kind: 'malformed-path'; error: ParseError | UnsupportedConstructError }
  | { kind: 'cfg_attr'; predicate: CfgPredicate; attributes: Attribute[]; line: number; column: number };

/** Parse the contents of one `#[...]` group. */
export function parseAttribute(group: Group, filePath: string): Attribute | undefined {
  return parseAttributeTokens(group.children, filePath, group);
}

function parseAttributeTokens(trees: readonly TokenTree[], filePath: string, at: Group): Attribute | undefined {
  const head = trees[0];
  if (head === undefined || head.kind !== 'ident' || trees.length < 2) return undefined;
  // Multi-segment paths (`rustfmt::skip`) never name one of ours.
  if (isPunct(trees[1], ':')) return undefined;

  switch (head.name) {
    case 'path': {
      const value = trees[2];
      if (!isPunct(trees[1], '=') || value === undefined) {
        const error = new ParseError('expected `#[path = "..."]`', { filePath, line: at.line, column: at.column });
        return { kind: 'malformed-path', error };
      }
      if (trees.length !== 3 || !isStringLiteral(value)) {
        const error = new UnsupportedConstructError(
          'module path attribute is not a string literal',
          { filePath, line: value.line, column: value.column },
          'a path computed by a macro cannot be resolved statically',
        );
        return { kind: 'malformed-path', error };
      }
      return { kind: 'path', value: value.value, line: at.line, column: at.column };
    }
    case 'cfg': {
      const args = trees[1];
      if (!isGroup(args, '(') || trees.length !== 2) {
        throw new ParseError('expected `#[cfg(...)]`', { filePath, line: at.line, column: at.column });
      }
      return { kind: 'cfg', predicate: parseCfgPredicate(args.children, filePath, args) };
    }
    case 'cfg_attr': {
      const args = trees[1];
      if (!isGroup(args, '(') || trees.length !== 2) {
        throw new ParseError('expected `#[cfg_attr(...)]`', { filePath, line: at.line, column: at.column });
      }
      const [condition, ...rest] = splitOnCommas(args.children);
      if (condition === undefined) {
        throw new ParseError('`cfg_attr` is missing its predicate', { filePath, line: args.line, column: args.column });
      }
      const attributes: Attribute[] = [];
      for (const part of rest) {
        const attribute = parseAttributeTokens(part, filePath, args);
        if (attribute) attributes.push(attribute);
      }
      return {
        kind: 'cfg_attr',
        predicate: parseCfgPredicate(condition, filePath, args),
        attributes,
        line: at.line,
        column: at.column,
      };
    }
    default:
      return undefined;
  }
}

export interface EffectiveAttributes {
  cfgs: CfgPredicate[];
  path?: string;
}

/**
 * Flatten `cfg_attr` under the given evaluator. An undecidable `cfg_attr`
 * that carries a `path` makes the backing file itself undecidable.
 */
export function resolveAttributes(
  attributes: readonly Attribute[],
  evaluate: CfgEvaluator,
  filePath: string,
): EffectiveAttributes {
  const result: EffectiveAttributes = { cfgs: [] };

  const visit = (list: readonly Attribute[]): void => {
    for (const attribute of list) {
      switch (attribute.kind) {
        case 'cfg':
          result.cfgs.push(attribute.predicate);
          break;
        case 'path':
          result.path = attribute.value;
          break;
        case 'malformed-path':
          break;
        case 'cfg_attr': {
          const truth = evaluate(attribute.predicate);
          if (truth === true) {
            visit(attribute.attributes);
          } else if (truth === 'unknown' && containsPath(attribute.attributes)) {
            throw new UnsupportedConstructError(
              'module path depends on a cfg_attr condition that cannot be decided',
              { filePath, line: attribute.line, column: attribute.column },
              'pass the relevant flags with --cfg so the condition can be evaluated',
            );
          }
          break;
        }
      }
    }
  };

  visit(attributes);
  return result;
}

/** Throws for a malformed `path` among the attributes of a `mod` declaration. */
export function checkModuleAttributes(attributes: readonly Attribute[]): void {
  for (const attribute of attributes) {
    if (attribute.kind === 'malformed-path') throw attribute.error;
    if (attribute.kind === 'cfg_attr') checkModuleAttributes(attribute.attributes);
  }
}

function containsPath(attributes: readonly Attribute[]): boolean {
  return attributes.some(a => a.kind === 'path' || (a.kind === 'cfg_attr' && containsPath(a.attributes)));
}

/** Combined truth of every `cfg` attached to an item. */
export function isExcluded(cfgs: readonly CfgPredicate[], evaluate: CfgEvaluator): boolean {
  if (cfgs.length === 0) return false;
  return evaluate({ kind: 'all', predicates: [...cfgs] }) === false;
}
