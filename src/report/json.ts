import type { Target, TargetFiles } from '../types.js';
import { displayPath } from './plain.js';

export interface TargetFilesEntry {
  packageName: string;
  targetName: string;
  kind: Target['kind'];
  entryPath: string;
  files: string[];
}

export function toEntry(result: TargetFiles, relativeTo?: string): TargetFilesEntry {
  return {
    packageName: result.target.packageName,
    targetName: result.target.targetName,
    kind: result.target.kind,
    entryPath: displayPath(result.target.entryPath, relativeTo),
    files: result.files.map(f => displayPath(f, relativeTo)),
  };
}

export function buildJsonReport(results: readonly TargetFiles[], relativeTo?: string): string {
  return JSON.stringify(results.map(r => toEntry(r, relativeTo)), null, 2);
}

export function buildJsonTargetList(targets: readonly Target[]): string {
  return JSON.stringify(targets, null, 2);
}
