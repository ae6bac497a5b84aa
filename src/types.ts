import type { MacroResolver } from './walker/macros.js';

export type TargetKind = 'library' | 'binary' | 'test' | 'example' | 'benchmark' | 'build-script';
export type OutputFormat = 'plain' | 'json' | 'jsonl' | 'console';

export const TARGET_KINDS: readonly TargetKind[] = [
  'library', 'binary', 'test', 'example', 'benchmark', 'build-script',
];

/** One compilation unit of a package. Built once per catalog call; never mutated. */
export interface Target {
  readonly packageName: string;
  readonly targetName: string;
  readonly kind: TargetKind;
  /** Absolute, canonical path of the root source file. */
  readonly entryPath: string;
  readonly edition: string;
  /** Absolute path of the Cargo.toml that declares the target. */
  readonly manifestPath: string;
  /** Features enabled by the package's `default` feature, transitively. */
  readonly defaultFeatures: readonly string[];
  readonly requiredFeatures: readonly string[];
}

export interface ResolutionConfig {
  /** Treat the target's default features as enabled. Defaults to true. */
  defaultFeatures?: boolean;
  features?: readonly string[];
  /** cfg options known to be set, as `name` or `key="value"`. */
  enabledFlags?: readonly string[];
  /** cfg options known to be unset. */
  disabledFlags?: readonly string[];
  macroResolvers?: readonly MacroResolver[];
}

export interface TargetFiles {
  target: Target;
  files: string[];
}

export interface FilesConfig {
  features: string[];
  defaultFeatures: boolean;
  enabledFlags: string[];
  disabledFlags: string[];
  kinds: TargetKind[];
  format: OutputFormat;
  relative: boolean;
  verbose: boolean;
  offline: boolean;
  followPathDependencies: boolean;
}
