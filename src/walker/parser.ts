import { ParseError } from '../errors.js';
import { checkModuleAttributes, parseAttribute } from './attributes.js';
import type { Attribute } from './attributes.js';
import { tokenize } from './lexer.js';
import type { MacroInvocation } from './macros.js';
import { buildTokenTrees, isGroup, isKeyword, isPunct } from './tokens.js';
import type { Group, IdentToken, TokenTree } from './tokens.js';

export interface ModuleDeclaration {
  name: string;
  attributes: Attribute[];
  /** Present for `mod name { ... }`; absent for `mod name;`. */
  body?: ItemList;
  line: number;
  column: number;
}

/**
 * What the walker needs from a source file: module declarations, the
 * blocks that may hide more of them, and macro calls that might.
 */
export type SourceItem =
  | { kind: 'module'; declaration: ModuleDeclaration }
  | { kind: 'block'; attributes: Attribute[]; items: SourceItem[] }
  | { kind: 'macro'; attributes: Attribute[]; invocation: MacroInvocation };

export interface ItemList {
  /** `#![...]` attributes of the enclosing module or file. */
  innerAttributes: Attribute[];
  items: SourceItem[];
}

export function parseSourceFile(source: string, filePath: string): ItemList {
  const trees = buildTokenTrees(tokenize(source, filePath), filePath);
  return parseItems(trees, filePath);
}

export function parseItems(trees: readonly TokenTree[], filePath: string): ItemList {
  const innerAttributes: Attribute[] = [];
  const items: SourceItem[] = [];
  // Outer attributes wait here until the item they belong to is found.
  let pending: Attribute[] = [];

  for (let i = 0; i < trees.length; i++) {
    const tree = trees[i];

    if (isPunct(tree, '#')) {
      const inner = isPunct(trees[i + 1], '!');
      const group = trees[inner ? i + 2 : i + 1];
      if (isGroup(group, '[')) {
        const attribute = parseAttribute(group, filePath);
        if (attribute) (inner ? innerAttributes : pending).push(attribute);
        i += inner ? 2 : 1;
      }
      continue;
    }

    if (isKeyword(tree, 'mod')) {
      i = parseModule(trees, i, filePath, pending, items);
      pending = [];
      continue;
    }

    if (tree.kind === 'ident' && isPunct(trees[i + 1], '!')) {
      if (isKeyword(tree, 'macro_rules') && trees[i + 2]?.kind === 'ident' && trees[i + 3]?.kind === 'group') {
        i += 3;
        pending = [];
        continue;
      }
      const input = trees[i + 2];
      if (input !== undefined && input.kind === 'group') {
        if (declaresFileModule(input.children)) {
          items.push({ kind: 'macro', attributes: pending, invocation: invocationAt(trees, i, input, filePath) });
        }
        i += 2;
        pending = [];
        continue;
      }
    }

    if (tree.kind === 'group') {
      const nested = parseItems(tree.children, filePath);
      if (nested.items.length > 0) {
        items.push({ kind: 'block', attributes: tree.delimiter === '{' ? pending : [], items: nested.items });
      }
      if (tree.delimiter === '{') pending = [];
      continue;
    }

    if (isPunct(tree, ';')) pending = [];
  }

  return { innerAttributes, items };
}

/** Parses `mod name;` or `mod name { .. }` at `start`; returns the index of its last tree. */
function parseModule(
  trees: readonly TokenTree[],
  start: number,
  filePath: string,
  attributes: Attribute[],
  items: SourceItem[],
): number {
  const keyword = trees[start];
  const name = trees[start + 1];
  const next = trees[start + 2];
  const at = { filePath, line: keyword.line, column: keyword.column };

  if (name === undefined || name.kind !== 'ident') {
    throw new ParseError('expected a module name after `mod`', at);
  }
  checkModuleAttributes(attributes);

  if (isPunct(next, ';')) {
    items.push({ kind: 'module', declaration: { name: name.name, attributes, ...position(keyword) } });
  } else if (isGroup(next, '{')) {
    const body = parseItems(next.children, filePath);
    items.push({ kind: 'module', declaration: { name: name.name, attributes, body, ...position(keyword) } });
  } else {
    throw new ParseError(`expected \`;\` or \`{\` after \`mod ${name.name}\``, at);
  }

  return start + 2;
}

function position(tree: TokenTree): { line: number; column: number } {
  return { line: tree.line, column: tree.column };
}

/** Looks for `mod <ident>;` anywhere inside a macro's input. */
export function declaresFileModule(trees: readonly TokenTree[]): boolean {
  return trees.some((tree, i) => {
    if (tree.kind === 'group') return declaresFileModule(tree.children);
    return isKeyword(tree, 'mod') && trees[i + 1]?.kind === 'ident' && isPunct(trees[i + 2], ';');
  });
}

function invocationAt(trees: readonly TokenTree[], nameIndex: number, input: Group, filePath: string): MacroInvocation {
  const segments: IdentToken[] = [];
  let j = nameIndex;
  for (;;) {
    const segment = trees[j];
    if (segment?.kind !== 'ident') break;
    segments.unshift(segment);
    if (!isPunct(trees[j - 1], ':') || !isPunct(trees[j - 2], ':')) break;
    j -= 3;
  }
  const first = segments[0];

  return {
    name: segments[segments.length - 1].name,
    path: segments.map(s => s.name).join('::'),
    delimiter: input.delimiter,
    tokens: input.children,
    filePath,
    line: first.line,
    column: first.column,
  };
}
