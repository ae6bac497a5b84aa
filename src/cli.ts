#!/usr/bin/env node
import { Command } from 'commander';
import fs from 'fs';
import path from 'path';
import { getTargets } from './catalog/targets.js';
import type { MetadataSource } from './catalog/metadata.js';
import { loadConfig, parseFormat, parseKinds, parseList } from './config/loader.js';
import { CONFIG_FILENAME, DEFAULT_CONFIG } from './config/defaults.js';
import { isTargetFilesError } from './errors.js';
import { buildJsonReport, buildJsonTargetList } from './report/json.js';
import { buildJsonlReport } from './report/jsonl.js';
import { buildPlainFileList, buildPlainReport, buildPlainTargetList, displayPath } from './report/plain.js';
import { formatError, printConsoleReport } from './report/console.js';
import { findUnclaimedFiles } from './scanner/discover.js';
import { getTargetFiles } from './walker/walk.js';
import type { FilesConfig, ResolutionConfig, Target, TargetFiles } from './types.js';

interface WorkspaceOptions {
  manifestPath?: string;
  config?: string;
  format?: string;
  features?: string;
  defaultFeatures: boolean;
  cfg: string[];
  kind?: string;
  relative?: boolean;
  offline?: boolean;
  followPathDeps?: boolean;
  verbose?: boolean;
}

export interface ProgramDependencies {
  /** Replaces `cargo metadata`; used by tests. */
  source?: MetadataSource;
}

interface Workspace {
  dir: string;
  config: FilesConfig;
  targets: Target[];
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function withWorkspaceOptions(command: Command): Command {
  return command
    .option('--manifest-path <path>', 'Path to Cargo.toml or the workspace directory (default: current directory)')
    .option('-c, --config <path>', `Path to ${CONFIG_FILENAME} config file`)
    .option('-f, --format <format>', 'Output format: plain,json,jsonl,console')
    .option('--features <list>', 'Comma-separated features to treat as enabled')
    .option('--no-default-features', 'Do not treat default features as enabled')
    .option('--cfg <flag>', 'cfg option known to be set, e.g. unix or target_os="linux" (repeatable)', collect, [])
    .option('--kind <kinds>', 'Only these target kinds: library,binary,test,example,benchmark,build-script')
    .option('--relative', 'Print paths relative to the workspace directory')
    .option('--offline', 'Never let cargo touch the network')
    .option('--follow-path-deps', 'Also list targets of local path dependencies outside the workspace')
    .option('-v, --verbose', 'Print progress to stderr');
}

function workspaceDir(manifestPath?: string): string {
  if (!manifestPath) return process.cwd();
  const resolved = path.resolve(manifestPath);
  return fs.existsSync(resolved) && fs.statSync(resolved).isFile() ? path.dirname(resolved) : resolved;
}

function resolveConfig(opts: WorkspaceOptions, dir: string): FilesConfig {
  // Load config file (includes env var overrides)
  const fileConfig = loadConfig(opts.config, dir);

  // CLI options override config file and env vars
  return {
    ...fileConfig,
    format: opts.format ? parseFormat(opts.format) : fileConfig.format,
    features: opts.features !== undefined ? parseList(opts.features) : fileConfig.features,
    defaultFeatures: opts.defaultFeatures ? fileConfig.defaultFeatures : false,
    enabledFlags: [...fileConfig.enabledFlags, ...opts.cfg],
    kinds: opts.kind ? parseKinds(opts.kind) : fileConfig.kinds,
    relative: opts.relative ?? fileConfig.relative,
    offline: opts.offline ?? fileConfig.offline,
    followPathDependencies: opts.followPathDeps ?? fileConfig.followPathDependencies,
    verbose: opts.verbose ?? fileConfig.verbose,
  };
}

function openWorkspace(opts: WorkspaceOptions, deps: ProgramDependencies): Workspace {
  const dir = workspaceDir(opts.manifestPath);
  const config = resolveConfig(opts, dir);

  if (config.verbose) {
    console.error(`Workspace: ${dir}`);
    if (config.features.length > 0) console.error(`Features: ${config.features.join(', ')}`);
    if (config.enabledFlags.length > 0) console.error(`cfg: ${config.enabledFlags.join(', ')}`);
  }

  const targets = getTargets(opts.manifestPath, {
    source: deps.source,
    followPathDependencies: config.followPathDependencies,
    kinds: config.kinds,
    offline: config.offline,
  });

  if (config.verbose) console.error(`Targets: ${targets.length}`);
  return { dir, config, targets };
}

function resolveAll(workspace: Workspace): TargetFiles[] {
  const { config } = workspace;
  const resolution: ResolutionConfig = {
    defaultFeatures: config.defaultFeatures,
    features: config.features,
    enabledFlags: config.enabledFlags,
    disabledFlags: config.disabledFlags,
  };

  return workspace.targets.map(target => {
    const started = Date.now();
    const files = getTargetFiles(target, resolution);
    if (config.verbose) {
      console.error(`  ${target.kind} ${target.packageName}::${target.targetName}: ${files.length} file(s) in ${Date.now() - started}ms`);
    }
    return { target, files };
  });
}

function print(text: string): void {
  if (text.length > 0) console.log(text);
}

/** Errors of our own are reported rustc-style with exit code 1; anything else propagates. */
function guarded<T extends unknown[]>(action: (...args: T) => void): (...args: T) => void {
  return (...args: T) => {
    try {
      action(...args);
    } catch (err) {
      if (!isTargetFilesError(err)) throw err;
      console.error(formatError(err, process.stderr.isTTY === true));
      process.exitCode = 1;
    }
  };
}

export function createProgram(deps: ProgramDependencies = {}): Command {
  const program = new Command();

  program
    .name('target-files')
    .description('List the Rust source files compiled into each Cargo target')
    .version('0.1.0');

  // ── init command ─────────────────────────────────────────────────────────────

  program
    .command('init')
    .description(`Scaffold a ${CONFIG_FILENAME} config file`)
    .option('--force', 'Overwrite existing config')
    .option('--dir <path>', 'Directory to write the config into (default: current directory)')
    .action(guarded((opts: { force?: boolean; dir?: string }) => {
      const outPath = path.join(opts.dir ? path.resolve(opts.dir) : process.cwd(), CONFIG_FILENAME);
      if (fs.existsSync(outPath) && !opts.force) {
        console.error(`Error: ${CONFIG_FILENAME} already exists. Use --force to overwrite.`);
        process.exitCode = 1;
        return;
      }

      const template = {
        _comment: 'target-files configuration',
        ...DEFAULT_CONFIG,
      };
      fs.writeFileSync(outPath, JSON.stringify(template, null, 2) + '\n', 'utf8');
      console.log(`Created ${CONFIG_FILENAME}`);
    }));

  // ── files command ────────────────────────────────────────────────────────────

  withWorkspaceOptions(
    program
      .command('files', { isDefault: true })
      .description('Print every source file of every target, one per line'),
  ).action(guarded((opts: WorkspaceOptions) => {
    const workspace = openWorkspace(opts, deps);
    const results = resolveAll(workspace);
    const relativeTo = workspace.config.relative ? workspace.dir : undefined;

    switch (workspace.config.format) {
      case 'plain':
        print(buildPlainReport(results, relativeTo));
        break;
      case 'json':
        print(buildJsonReport(results, relativeTo));
        break;
      case 'jsonl':
        print(buildJsonlReport(results, relativeTo));
        break;
      case 'console':
        printConsoleReport(results, { verbose: workspace.config.verbose, relativeTo });
        break;
    }
  }));

  // ── targets command ──────────────────────────────────────────────────────────

  withWorkspaceOptions(
    program
      .command('targets')
      .description('Print the targets of the workspace without walking their modules'),
  ).action(guarded((opts: WorkspaceOptions) => {
    const workspace = openWorkspace(opts, deps);
    const relativeTo = workspace.config.relative ? workspace.dir : undefined;

    switch (workspace.config.format) {
      case 'json':
        print(buildJsonTargetList(workspace.targets));
        break;
      case 'jsonl':
        print(workspace.targets.map(t => JSON.stringify(t)).join('\n'));
        break;
      default:
        print(buildPlainTargetList(workspace.targets, relativeTo));
    }
  }));

  // ── unclaimed command ────────────────────────────────────────────────────────

  withWorkspaceOptions(
    program
      .command('unclaimed')
      .description('Print .rs files under the workspace that no target compiles'),
  ).action(guarded((opts: WorkspaceOptions) => {
    const workspace = openWorkspace(opts, deps);
    const results = resolveAll(workspace);
    const unclaimed = findUnclaimedFiles(workspace.targets, results.flatMap(r => r.files));
    const relativeTo = workspace.config.relative ? workspace.dir : undefined;

    if (workspace.config.format === 'json' || workspace.config.format === 'jsonl') {
      print(JSON.stringify(unclaimed.map(f => displayPath(f, relativeTo)), null, 2));
    } else {
      print(buildPlainFileList(unclaimed, relativeTo));
    }
    if (workspace.config.verbose) console.error(`Unclaimed: ${unclaimed.length}`);
  }));

  return program;
}

if (require.main === module) {
  createProgram().parse(process.argv);
}
