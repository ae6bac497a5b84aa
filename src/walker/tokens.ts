import { ParseError } from '../errors.js';

export type LiteralKind = 'str' | 'raw-str' | 'byte-str' | 'c-str' | 'char' | 'byte' | 'number';

export type Delimiter = '(' | '[' | '{';

interface TokenBase {
  /** Source text of the token, exactly as written. */
  text: string;
  start: number;
  end: number;
  line: number;
  column: number;
}

export interface IdentToken extends TokenBase {
  kind: 'ident';
  /** Identifier with any `r#` prefix removed. */
  name: string;
  raw: boolean;
}

export interface LifetimeToken extends TokenBase {
  kind: 'lifetime';
}

export interface LiteralToken extends TokenBase {
  kind: 'literal';
  literal: LiteralKind;
  /** Decoded contents for string-like literals. */
  value?: string;
}

export interface PunctToken extends TokenBase {
  kind: 'punct';
}

export type Token = IdentToken | LifetimeToken | LiteralToken | PunctToken;

export interface Group {
  kind: 'group';
  delimiter: Delimiter;
  children: TokenTree[];
  line: number;
  column: number;
}

export type TokenTree = Token | Group;

const CLOSERS: Record<Delimiter, string> = { '(': ')', '[': ']', '{': '}' };

function isOpener(text: string): text is Delimiter {
  return text === '(' || text === '[' || text === '{';
}

/**
 * Nest a flat token stream into delimited groups.
 * Mismatched or unclosed delimiters are parse errors.
 */
export function buildTokenTrees(tokens: readonly Token[], filePath: string): TokenTree[] {
  const root: TokenTree[] = [];
  const stack: Group[] = [];

  const current = (): TokenTree[] => (stack.length > 0 ? stack[stack.length - 1].children : root);

  for (const token of tokens) {
    if (token.kind === 'punct' && isOpener(token.text)) {
      const group: Group = {
        kind: 'group',
        delimiter: token.text,
        children: [],
        line: token.line,
        column: token.column,
      };
      current().push(group);
      stack.push(group);
      continue;
    }

    if (token.kind === 'punct' && (token.text === ')' || token.text === ']' || token.text === '}')) {
      const open = stack.pop();
      if (!open) {
        throw new ParseError(`unexpected closing delimiter \`${token.text}\``, {
          filePath, line: token.line, column: token.column,
        });
      }
      if (CLOSERS[open.delimiter] !== token.text) {
        throw new ParseError(
          `mismatched closing delimiter \`${token.text}\` for \`${open.delimiter}\` opened at ${open.line}:${open.column}`,
          { filePath, line: token.line, column: token.column },
        );
      }
      continue;
    }

    current().push(token);
  }

  const unclosed = stack.pop();
  if (unclosed) {
    throw new ParseError(`unclosed delimiter \`${unclosed.delimiter}\``, {
      filePath, line: unclosed.line, column: unclosed.column,
    });
  }

  return root;
}

export function isPunct(tree: TokenTree | undefined, text: string): tree is PunctToken {
  return tree !== undefined && tree.kind === 'punct' && tree.text === text;
}

/** True for a keyword-position identifier; `r#mod` is never the keyword `mod`. */
export function isKeyword(tree: TokenTree | undefined, keyword: string): boolean {
  return tree !== undefined && tree.kind === 'ident' && !tree.raw && tree.name === keyword;
}

export function isGroup(tree: TokenTree | undefined, delimiter: Delimiter): tree is Group {
  return tree !== undefined && tree.kind === 'group' && tree.delimiter === delimiter;
}

export function isStringLiteral(tree: TokenTree | undefined): tree is LiteralToken & { value: string } {
  return tree !== undefined
    && tree.kind === 'literal'
    && (tree.literal === 'str' || tree.literal === 'raw-str')
    && tree.value !== undefined;
}

/** Split a token list on top-level commas, dropping a trailing empty segment. */
export function splitOnCommas(trees: readonly TokenTree[]): TokenTree[][] {
  const parts: TokenTree[][] = [[]];
  for (const tree of trees) {
    if (isPunct(tree, ',')) {
      parts.push([]);
    } else {
      parts[parts.length - 1].push(tree);
    }
  }
  if (parts[parts.length - 1].length === 0) parts.pop();
  return parts;
}
