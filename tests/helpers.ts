import fs from 'fs';
import os from 'os';
import path from 'path';
import type { MetadataSource } from '../src/catalog/metadata';
import type { Target } from '../src/types';

const FIXTURES_DIR = path.resolve(__dirname, 'fixtures');
const created: string[] = [];

/**
 * Write `files` (relative path → contents) under a fresh temp directory and
 * return its canonical path.
 */
export function makeCrate(files: Record<string, string>): string {
  const root = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'target-files-test-')));
  created.push(root);
  for (const [relative, contents] of Object.entries(files)) {
    const filePath = path.join(root, relative);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, contents, 'utf8');
  }
  return root;
}

export function removeCrates(): void {
  for (const root of created.splice(0)) {
    fs.rmSync(root, { recursive: true, force: true });
  }
}

export function makeTarget(root: string, entry = 'src/lib.rs', overrides: Partial<Target> = {}): Target {
  return {
    packageName: 'demo',
    targetName: 'demo',
    kind: 'library',
    entryPath: path.join(root, entry),
    edition: '2021',
    manifestPath: path.join(root, 'Cargo.toml'),
    defaultFeatures: [],
    requiredFeatures: [],
    ...overrides,
  };
}

/** Reads a metadata fixture, substituting `@ROOT@` with `root`. */
export function loadMetadataFixture(name: string, root: string): unknown {
  const text = fs.readFileSync(path.join(FIXTURES_DIR, name), 'utf8');
  return JSON.parse(text.split('@ROOT@').join(root));
}

/** In-process stand-in for `cargo metadata`. */
export class FixtureMetadataSource implements MetadataSource {
  readonly queries: Array<string | undefined> = [];

  constructor(private readonly respond: (manifestPath?: string) => unknown) {}

  query(manifestPath?: string): unknown {
    this.queries.push(manifestPath);
    return this.respond(manifestPath);
  }
}

/** Unset every TARGET_FILES_* variable; returns a restore function. */
export function clearEnv(): () => void {
  const saved: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (key.startsWith('TARGET_FILES_') && value !== undefined) {
      saved[key] = value;
      delete process.env[key];
    }
  }
  return () => {
    for (const key of Object.keys(process.env)) {
      if (key.startsWith('TARGET_FILES_')) delete process.env[key];
    }
    Object.assign(process.env, saved);
  };
}
