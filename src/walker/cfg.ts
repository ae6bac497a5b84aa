import { ParseError } from '../errors.js';
import type { Target } from '../types.js';
import { isGroup, isPunct, isStringLiteral, splitOnCommas } from './tokens.js';
import type { Group, TokenTree } from './tokens.js';

export type CfgPredicate =
  | { kind: 'literal'; value: boolean }
  | { kind: 'option'; name: string; value?: string }
  | { kind: 'all'; predicates: CfgPredicate[] }
  | { kind: 'any'; predicates: CfgPredicate[] }
  | { kind: 'not'; predicate: CfgPredicate };

/** Three-valued: options the configuration says nothing about are `unknown`. */
export type CfgTruth = boolean | 'unknown';

export type CfgEvaluator = (predicate: CfgPredicate) => CfgTruth;

export interface CfgSettings {
  features: ReadonlySet<string>;
  enabled: ReadonlySet<string>;
  disabled: ReadonlySet<string>;
}

/**
 * Parse the contents of a `cfg(...)` group, e.g. the tokens of
 * `all(unix, not(feature = "std"))`.
 */
export function parseCfgPredicate(trees: readonly TokenTree[], filePath: string, at: Group): CfgPredicate {
  const fail = (message: string): never => {
    throw new ParseError(message, { filePath, line: at.line, column: at.column });
  };

  const head = trees[0];
  if (head === undefined || head.kind !== 'ident') {
    return fail('expected a cfg predicate');
  }

  if (trees.length === 1) {
    // `cfg(true)` and `cfg(false)` are literals, never option names.
    if (!head.raw && (head.name === 'true' || head.name === 'false')) {
      return { kind: 'literal', value: head.name === 'true' };
    }
    return { kind: 'option', name: head.name };
  }

  if (trees.length === 3 && isPunct(trees[1], '=')) {
    const value = trees[2];
    if (!isStringLiteral(value)) return fail(`cfg option \`${head.name}\` expects a string value`);
    return { kind: 'option', name: head.name, value: value.value };
  }

  const args = trees[1];
  if (trees.length === 2 && isGroup(args, '(')) {
    const predicates = splitOnCommas(args.children).map(part => parseCfgPredicate(part, filePath, args));
    switch (head.name) {
      case 'all':
        return { kind: 'all', predicates };
      case 'any':
        return { kind: 'any', predicates };
      case 'not':
        if (predicates.length !== 1) return fail('`not` takes exactly one cfg predicate');
        return { kind: 'not', predicate: predicates[0] };
      default:
        return fail(`unknown cfg operator \`${head.name}\``);
    }
  }

  return fail('malformed cfg predicate');
}

/** `name` or `key="value"`, the form flags are written in configuration. */
export function cfgOptionKey(name: string, value?: string): string {
  return value === undefined ? name : `${name}="${value}"`;
}

/** Accepts `unix`, `target_os = "linux"` and `target_os=linux`. */
export function normalizeCfgFlag(flag: string): string {
  const eq = flag.indexOf('=');
  if (eq === -1) return flag.trim();
  const key = flag.slice(0, eq).trim();
  const value = flag.slice(eq + 1).trim().replace(/^"(.*)"$/, '$1');
  return cfgOptionKey(key, value);
}

export function evaluateCfg(predicate: CfgPredicate, settings: CfgSettings): CfgTruth {
  switch (predicate.kind) {
    case 'literal':
      return predicate.value;
    case 'option': {
      if (predicate.name === 'feature' && predicate.value !== undefined) {
        return settings.features.has(predicate.value);
      }
      const key = cfgOptionKey(predicate.name, predicate.value);
      if (settings.enabled.has(key)) return true;
      if (settings.disabled.has(key)) return false;
      return 'unknown';
    }
    case 'all': {
      let result: CfgTruth = true;
      for (const p of predicate.predicates) {
        const value = evaluateCfg(p, settings);
        if (value === false) return false;
        if (value === 'unknown') result = 'unknown';
      }
      return result;
    }
    case 'any': {
      let result: CfgTruth = false;
      for (const p of predicate.predicates) {
        const value = evaluateCfg(p, settings);
        if (value === true) return true;
        if (value === 'unknown') result = 'unknown';
      }
      return result;
    }
    case 'not': {
      const value = evaluateCfg(predicate.predicate, settings);
      return value === 'unknown' ? 'unknown' : !value;
    }
  }
}

export interface CfgConfiguration {
  defaultFeatures?: boolean;
  features?: readonly string[];
  enabledFlags?: readonly string[];
  disabledFlags?: readonly string[];
}

export function createCfgEvaluator(
  target: Pick<Target, 'defaultFeatures'>,
  configuration: CfgConfiguration = {},
): CfgEvaluator {
  const enabled = new Set((configuration.enabledFlags ?? []).map(normalizeCfgFlag));
  const disabled = new Set((configuration.disabledFlags ?? []).map(normalizeCfgFlag));

  const features = new Set(configuration.features ?? []);
  if (configuration.defaultFeatures ?? true) {
    for (const feature of target.defaultFeatures) features.add(feature);
  }
  for (const flag of enabled) {
    const match = /^feature="(.*)"$/.exec(flag);
    if (match) features.add(match[1]);
  }

  const settings: CfgSettings = { features, enabled, disabled };
  return predicate => evaluateCfg(predicate, settings);
}
