import type { TargetKind, TargetFiles } from '../types.js';
import type { TargetFilesError } from '../errors.js';
import { displayPath } from './plain.js';

// ANSI color codes (no external dependency needed for basic colors)
const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const RED = '\x1b[31m';
const YELLOW = '\x1b[33m';
const GREEN = '\x1b[32m';
const CYAN = '\x1b[36m';
const MAGENTA = '\x1b[35m';
const BLUE = '\x1b[34m';
const DIM = '\x1b[2m';

function kindColor(kind: TargetKind): string {
  switch (kind) {
    case 'library': return `${BOLD}${GREEN}`;
    case 'binary': return GREEN;
    case 'test': return YELLOW;
    case 'example': return CYAN;
    case 'benchmark': return MAGENTA;
    case 'build-script': return BLUE;
  }
}

export interface ConsoleReportOptions {
  verbose?: boolean;
  relativeTo?: string;
}

export function printConsoleReport(results: readonly TargetFiles[], options: ConsoleReportOptions = {}): void {
  console.log();
  console.log(`${BOLD}${MAGENTA}=== Target files ===${RESET}`);
  console.log();

  for (const { target, files } of results) {
    const color = kindColor(target.kind);
    console.log(`${color}[${target.kind}]${RESET} ${BOLD}${target.packageName}::${target.targetName}${RESET} ${DIM}(${files.length} file${files.length === 1 ? '' : 's'})${RESET}`);
    if (options.verbose) {
      console.log(`    ${DIM}Edition:${RESET} ${target.edition}`);
      console.log(`    ${DIM}Manifest:${RESET} ${displayPath(target.manifestPath, options.relativeTo)}`);
    }
    for (const file of files) {
      console.log(`    ${displayPath(file, options.relativeTo)}`);
    }
    console.log();
  }

  const total = new Set(results.flatMap(r => r.files)).size;
  console.log('─'.repeat(60));
  console.log(`${BOLD}Targets:${RESET} ${results.length}`);
  console.log(`${BOLD}Distinct files:${RESET} ${total}`);
  console.log();
}

/**
 * Render an error the way rustc does: a coded headline, the location, and
 * an optional help line.
 */
export function formatError(error: TargetFilesError, color = false): string {
  const red = color ? `${BOLD}${RED}` : '';
  const dim = color ? DIM : '';
  const reset = color ? RESET : '';
  const lines = [`${red}error[${error.code}]${reset}: ${error.message}`];

  const { filePath, line, column } = error.context;
  if (filePath !== undefined) {
    const location = line !== undefined ? `${filePath}:${line}:${column ?? 1}` : filePath;
    lines.push(`  ${dim}-->${reset} ${location}`);
  }
  const stderr = error.context.stderr;
  if (typeof stderr === 'string' && stderr.length > 0) {
    lines.push(...stderr.split('\n').map(l => `  ${dim}|${reset} ${l}`));
  }
  if (error.suggestion) {
    lines.push(`  ${dim}= help:${reset} ${error.suggestion}`);
  }
  return lines.join('\n');
}
