import path from 'path';
import type { Target, TargetFiles } from '../types.js';

export function displayPath(file: string, relativeTo?: string): string {
  return relativeTo ? path.relative(relativeTo, file) : file;
}

/** One path per line; a file shared by several targets is printed once. */
export function buildPlainReport(results: readonly TargetFiles[], relativeTo?: string): string {
  const seen = new Set<string>();
  const lines: string[] = [];
  for (const { files } of results) {
    for (const file of files) {
      if (seen.has(file)) continue;
      seen.add(file);
      lines.push(displayPath(file, relativeTo));
    }
  }
  return lines.join('\n');
}

export function buildPlainFileList(files: readonly string[], relativeTo?: string): string {
  return files.map(f => displayPath(f, relativeTo)).join('\n');
}

/** Tab-separated: kind, package, target, entry file. */
export function buildPlainTargetList(targets: readonly Target[], relativeTo?: string): string {
  return targets
    .map(t => [t.kind, t.packageName, t.targetName, displayPath(t.entryPath, relativeTo)].join('\t'))
    .join('\n');
}
