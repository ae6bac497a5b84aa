import fs from 'fs';
import path from 'path';
import { ParseError, UnresolvedModuleError } from '../errors.js';

/**
 * Where the children of a module are looked up.
 *
 * Crate roots, `mod.rs` files and files loaded through `#[path]` own their
 * directory. A file loaded as `<name>.rs` does not: its children live in
 * `<dir>/<name>/`, which `relative` records.
 */
export interface ModuleScope {
  dir: string;
  relative?: string;
  /** Inside a function body or other block rather than a module. */
  inBlock: boolean;
}

export interface ResolvedModule {
  /** Canonical path of the backing file. */
  filePath: string;
  scope: ModuleScope;
}

export interface DeclarationSite {
  filePath: string;
  line: number;
  column: number;
}

export function rootScope(entryPath: string): ModuleScope {
  return { dir: path.dirname(entryPath), inBlock: false };
}

export function enterInlineModule(scope: ModuleScope, name: string, pathOverride?: string): ModuleScope {
  if (pathOverride !== undefined) {
    return { dir: path.resolve(scope.dir, pathOverride), inBlock: false };
  }
  // Inside a block the directory is not owned, so `relative` no longer applies.
  const relative = scope.inBlock ? '' : scope.relative ?? '';
  return { dir: path.join(scope.dir, relative, name), inBlock: scope.inBlock };
}

export function enterBlock(scope: ModuleScope): ModuleScope {
  return { ...scope, inBlock: true };
}

export function resolveModuleFile(
  scope: ModuleScope,
  name: string,
  pathOverride: string | undefined,
  site: DeclarationSite,
): ResolvedModule {
  if (pathOverride !== undefined) {
    const candidate = path.resolve(scope.dir, pathOverride);
    if (!isFile(candidate)) {
      throw new UnresolvedModuleError(
        `file not found for module \`${name}\`: ${candidate}`,
        { ...site, module: name, candidates: [candidate] },
        'check the #[path] attribute; it is relative to the declaring file\'s directory',
      );
    }
    return { filePath: canonicalPath(candidate), scope: { dir: path.dirname(candidate), inBlock: false } };
  }

  if (scope.inBlock) {
    throw new ParseError(
      `cannot declare a file module \`${name}\` inside a block without a #[path] attribute`,
      { ...site, module: name },
    );
  }

  const base = path.join(scope.dir, scope.relative ?? '');
  const named = path.join(base, `${name}.rs`);
  if (isFile(named)) {
    return { filePath: canonicalPath(named), scope: { dir: path.dirname(named), relative: name, inBlock: false } };
  }

  const modRs = path.join(base, name, 'mod.rs');
  if (isFile(modRs)) {
    return { filePath: canonicalPath(modRs), scope: { dir: path.dirname(modRs), inBlock: false } };
  }

  throw new UnresolvedModuleError(
    `file not found for module \`${name}\``,
    { ...site, module: name, candidates: [named, modRs] },
    `create ${named} or ${modRs}`,
  );
}

export function isFile(filePath: string): boolean {
  try {
    return fs.statSync(filePath, { throwIfNoEntry: false })?.isFile() ?? false;
  } catch (err) {
    // A path through a regular file (`a.rs/b.rs`) is simply absent.
    if (err instanceof Error && 'code' in err && err.code === 'ENOTDIR') return false;
    throw err;
  }
}

/** Symlinks resolved, so one file reached two ways is visited once. */
export function canonicalPath(filePath: string): string {
  return fs.realpathSync(filePath);
}
