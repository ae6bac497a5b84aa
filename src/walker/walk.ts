import fs from 'fs';
import { NotFoundError, ParseError, UnsupportedConstructError } from '../errors.js';
import type { ResolutionConfig, Target } from '../types.js';
import { isExcluded, resolveAttributes } from './attributes.js';
import type { Attribute } from './attributes.js';
import { createCfgEvaluator } from './cfg.js';
import type { CfgEvaluator } from './cfg.js';
import { DEFAULT_MACRO_RESOLVERS } from './macros.js';
import type { MacroInvocation, MacroResolver } from './macros.js';
import { parseItems, parseSourceFile } from './parser.js';
import type { ModuleDeclaration, SourceItem } from './parser.js';
import { canonicalPath, enterBlock, enterInlineModule, isFile, resolveModuleFile, rootScope } from './resolve.js';
import type { ModuleScope } from './resolve.js';

/**
 * List every source file compiled into `target`: the entry file first, then
 * module files in depth-first declaration order, each at most once.
 *
 * Any module that cannot be resolved aborts the walk; a partial list is
 * never returned.
 */
export function getTargetFiles(target: Target, configuration: ResolutionConfig = {}): string[] {
  if (!isFile(target.entryPath)) {
    throw new NotFoundError(
      `entry file of ${target.kind} target \`${target.targetName}\` does not exist: ${target.entryPath}`,
      { filePath: target.entryPath, package: target.packageName, target: target.targetName },
    );
  }

  const walker = new ModuleWalker(
    createCfgEvaluator(target, configuration),
    configuration.macroResolvers ?? DEFAULT_MACRO_RESOLVERS,
  );
  return walker.walk(target.entryPath);
}

class ModuleWalker {
  private readonly visited = new Set<string>();
  private readonly files: string[] = [];

  constructor(
    private readonly evaluate: CfgEvaluator,
    private readonly resolvers: readonly MacroResolver[],
  ) {}

  /** The entry is listed as given; the canonical path only guards against revisits. */
  walk(entryPath: string): string[] {
    this.visited.add(canonicalPath(entryPath));
    this.files.push(entryPath);

    const parsed = parseSourceFile(readSource(entryPath), entryPath);
    if (!this.excluded(parsed.innerAttributes, entryPath)) {
      this.walkItems(parsed.items, rootScope(entryPath), entryPath);
    }
    return this.files;
  }

  private excluded(attributes: readonly Attribute[], filePath: string): boolean {
    return isExcluded(resolveAttributes(attributes, this.evaluate, filePath).cfgs, this.evaluate);
  }

  private walkItems(items: readonly SourceItem[], scope: ModuleScope, filePath: string): void {
    for (const item of items) {
      switch (item.kind) {
        case 'module':
          this.walkModule(item.declaration, scope, filePath);
          break;
        case 'block':
          if (!this.excluded(item.attributes, filePath)) {
            this.walkItems(item.items, enterBlock(scope), filePath);
          }
          break;
        case 'macro':
          if (!this.excluded(item.attributes, filePath)) {
            this.walkMacro(item.invocation, scope, filePath);
          }
          break;
      }
    }
  }

  private walkModule(declaration: ModuleDeclaration, scope: ModuleScope, filePath: string): void {
    const attributes = resolveAttributes(declaration.attributes, this.evaluate, filePath);
    if (isExcluded(attributes.cfgs, this.evaluate)) return;

    if (declaration.body) {
      if (this.excluded(declaration.body.innerAttributes, filePath)) return;
      this.walkItems(declaration.body.items, enterInlineModule(scope, declaration.name, attributes.path), filePath);
      return;
    }

    const resolved = resolveModuleFile(scope, declaration.name, attributes.path, {
      filePath,
      line: declaration.line,
      column: declaration.column,
    });
    if (this.visited.has(resolved.filePath)) return;
    this.visited.add(resolved.filePath);

    // `#![cfg(..)]` at the top of a module file compiles the module out.
    const parsed = parseSourceFile(readSource(resolved.filePath), resolved.filePath);
    if (this.excluded(parsed.innerAttributes, resolved.filePath)) return;

    this.files.push(resolved.filePath);
    this.walkItems(parsed.items, resolved.scope, resolved.filePath);
  }

  private walkMacro(invocation: MacroInvocation, scope: ModuleScope, filePath: string): void {
    for (const resolver of this.resolvers) {
      const expansions = resolver.expand(invocation);
      if (expansions === undefined) continue;

      for (const expansion of expansions) {
        if (expansion.cfg && this.evaluate(expansion.cfg) === false) continue;
        this.walkItems(parseItems(expansion.tokens, filePath).items, scope, filePath);
      }
      return;
    }

    throw new UnsupportedConstructError(
      `modules declared inside \`${invocation.path}!\` cannot be resolved statically`,
      { filePath, line: invocation.line, column: invocation.column, macro: invocation.path },
      'supply a MacroResolver for this macro through the resolution configuration',
    );
  }
}

function readSource(filePath: string): string {
  try {
    return fs.readFileSync(filePath, 'utf8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ParseError(`could not read ${filePath}: ${reason}`, { filePath });
  }
}
