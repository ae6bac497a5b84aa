import fs from 'fs';
import path from 'path';
import { MetadataError, NotFoundError } from '../errors.js';
import type { Target, TargetKind } from '../types.js';
import { CargoMetadataSource, parseMetadata } from './metadata.js';
import type { CargoMetadata, CargoPackage, CargoTarget, MetadataSource } from './metadata.js';

const MANIFEST_NAME = 'Cargo.toml';

const KIND_MAP: Record<string, TargetKind> = {
  lib: 'library',
  rlib: 'library',
  dylib: 'library',
  cdylib: 'library',
  staticlib: 'library',
  'proc-macro': 'library',
  bin: 'binary',
  test: 'test',
  example: 'example',
  bench: 'benchmark',
  'custom-build': 'build-script',
};

export interface CatalogOptions {
  /** Defaults to running `cargo metadata`. */
  source?: MetadataSource;
  /** Also enumerate local `path` dependencies outside the workspace. */
  followPathDependencies?: boolean;
  /** Keep only these kinds; empty or absent keeps all. */
  kinds?: readonly TargetKind[];
  offline?: boolean;
}

/**
 * Enumerate every target of every package at `workspaceRoot` (a directory
 * or a Cargo.toml), in the order the build metadata lists them.
 */
export function getTargets(workspaceRoot?: string, options: CatalogOptions = {}): Target[] {
  const manifestPath = workspaceRoot === undefined ? undefined : locateManifest(workspaceRoot);
  const source = options.source ?? new CargoMetadataSource({ offline: options.offline });

  const metadata = queryMetadata(source, manifestPath);
  const targets: Target[] = [];
  const seenManifests = new Set<string>();
  const followed = new Set<string>();

  const collect = (meta: CargoMetadata): void => {
    const pending: string[] = [];

    for (const pkg of meta.packages) {
      const pkgManifest = path.resolve(pkg.manifest_path);
      if (seenManifests.has(pkgManifest)) continue;
      seenManifests.add(pkgManifest);

      const defaults = expandDefaultFeatures(pkg.features);
      for (const target of pkg.targets) {
        targets.push(toTarget(pkg, target, defaults));
      }

      if (!options.followPathDependencies) continue;
      for (const dependency of pkg.dependencies) {
        if (dependency.path === undefined || followed.has(dependency.name)) continue;
        const dependencyManifest = path.resolve(dependency.path, MANIFEST_NAME);
        const inWorkspace = meta.packages.some(p => path.resolve(p.manifest_path) === dependencyManifest);
        if (!inWorkspace && fs.existsSync(dependencyManifest)) {
          followed.add(dependency.name);
          pending.push(dependencyManifest);
        }
      }
    }

    for (const dependencyManifest of pending) {
      collect(queryMetadata(source, dependencyManifest));
    }
  };

  collect(metadata);

  const kinds = options.kinds ?? [];
  return kinds.length > 0 ? targets.filter(t => kinds.includes(t.kind)) : targets;
}

function locateManifest(workspaceRoot: string): string {
  const resolved = path.resolve(workspaceRoot);
  if (!fs.existsSync(resolved)) {
    throw new NotFoundError(`workspace root does not exist: ${resolved}`, { filePath: resolved });
  }

  if (fs.statSync(resolved).isDirectory()) {
    const manifest = path.join(resolved, MANIFEST_NAME);
    if (!fs.existsSync(manifest)) {
      throw new MetadataError(`no ${MANIFEST_NAME} found in ${resolved}`, { filePath: resolved });
    }
    return manifest;
  }

  if (path.basename(resolved) !== MANIFEST_NAME) {
    throw new MetadataError(`the manifest path must point to a ${MANIFEST_NAME} file: ${resolved}`, {
      filePath: resolved,
    });
  }
  return resolved;
}

function queryMetadata(source: MetadataSource, manifestPath: string | undefined): CargoMetadata {
  const metadata = parseMetadata(source.query(manifestPath));
  if (metadata.packages.length === 0) {
    throw new MetadataError(`no packages found at ${manifestPath ?? metadata.workspace_root}`, {
      filePath: manifestPath ?? metadata.workspace_root,
    });
  }
  return metadata;
}

function toTarget(pkg: CargoPackage, target: CargoTarget, defaultFeatures: string[]): Target {
  const cargoKind = target.kind[0];
  const kind: TargetKind | undefined = KIND_MAP[cargoKind];
  if (kind === undefined) {
    throw new MetadataError(`unknown kind \`${cargoKind}\` for target \`${target.name}\` of \`${pkg.name}\``, {
      filePath: pkg.manifest_path,
    });
  }

  const entry = path.resolve(target.src_path);
  return Object.freeze({
    packageName: pkg.name,
    targetName: target.name,
    kind,
    entryPath: fs.existsSync(entry) ? fs.realpathSync(entry) : entry,
    edition: target.edition,
    manifestPath: path.resolve(pkg.manifest_path),
    defaultFeatures,
    requiredFeatures: target['required-features'] ?? [],
  });
}

/**
 * Features switched on by `default`, following feature-to-feature links.
 * `dep:x` and `x/y` entries enable dependencies, not features of this package.
 */
export function expandDefaultFeatures(features: Record<string, string[]>): string[] {
  const enabled: string[] = [];
  const queue = [...(features.default ?? [])];

  while (queue.length > 0) {
    const next = queue.shift();
    if (next === undefined || enabled.includes(next)) continue;
    if (next.startsWith('dep:') || next.includes('/')) continue;
    enabled.push(next);
    queue.push(...(features[next] ?? []));
  }

  return enabled;
}
