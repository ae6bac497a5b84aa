import type { TargetFiles } from '../types.js';
import { toEntry } from './json.js';

export function buildJsonlReport(results: readonly TargetFiles[], relativeTo?: string): string {
  return results.map(r => JSON.stringify(toEntry(r, relativeTo))).join('\n');
}
