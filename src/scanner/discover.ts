import fs from 'fs';
import path from 'path';
import fg from 'fast-glob';
import type { Target } from '../types.js';

export const SOURCE_GLOBS = ['**/*.rs'];
/** Relative to each package root: only the package's own build directory is skipped. */
export const IGNORED_GLOBS = ['target/**', '**/.git/**', '**/node_modules/**'];

/**
 * Every `.rs` file under the packages of `targets` that no resolved file
 * list claims. Sorted for diffable output.
 */
export function findUnclaimedFiles(targets: readonly Target[], claimed: Iterable<string>): string[] {
  const claimedSet = new Set([...claimed].map(file => fs.realpathSync(file)));
  const roots = [...new Set(targets.map(t => path.dirname(t.manifestPath)))];
  const unclaimed = new Set<string>();

  for (const root of roots) {
    const files = fg.sync(SOURCE_GLOBS, {
      cwd: root,
      ignore: IGNORED_GLOBS,
      absolute: true,
      followSymbolicLinks: false,
      onlyFiles: true,
    });
    for (const file of files) {
      const canonical = fs.realpathSync(path.normalize(file));
      if (!claimedSet.has(canonical)) unclaimed.add(canonical);
    }
  }

  return [...unclaimed].sort();
}
