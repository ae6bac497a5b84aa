import fs from 'fs';
import path from 'path';
import { CargoMetadataSource, parseMetadata } from '../src/catalog/metadata';
import { expandDefaultFeatures, getTargets } from '../src/catalog/targets';
import { MetadataError, NotFoundError } from '../src/errors';
import { FixtureMetadataSource, loadMetadataFixture, makeCrate, removeCrates } from './helpers';

let root: string;
let source: FixtureMetadataSource;

beforeEach(() => {
  root = makeCrate({
    'ws/Cargo.toml': '[workspace]\nmembers = ["core-lib", "app"]\n',
    'ws/core-lib/Cargo.toml': '[package]\nname = "core-lib"\n',
    'ws/core-lib/src/lib.rs': '',
    'ws/app/Cargo.toml': '[package]\nname = "app"\n',
    'ws/app/src/main.rs': 'fn main() {}\n',
    'helper/Cargo.toml': '[package]\nname = "helper"\n',
    'helper/src/lib.rs': '',
  });
  source = new FixtureMetadataSource(manifestPath =>
    manifestPath === path.join(root, 'helper/Cargo.toml')
      ? loadMetadataFixture('helper-metadata.json', root)
      : loadMetadataFixture('workspace-metadata.json', root),
  );
});

afterEach(() => {
  removeCrates();
});

describe('getTargets', () => {
  it('lists every target in package then target order', () => {
    const targets = getTargets(path.join(root, 'ws'), { source });
    expect(targets.map(t => [t.packageName, t.targetName, t.kind])).toEqual([
      ['core-lib', 'core_lib', 'library'],
      ['core-lib', 'integration', 'test'],
      ['app', 'app', 'binary'],
      ['app', 'build-script-build', 'build-script'],
    ]);
  });

  it('queries the build metadata once for the workspace manifest', () => {
    getTargets(path.join(root, 'ws'), { source });
    expect(source.queries).toEqual([path.join(root, 'ws/Cargo.toml')]);
  });

  it('accepts a path to Cargo.toml as well as its directory', () => {
    const fromManifest = getTargets(path.join(root, 'ws/Cargo.toml'), { source });
    expect(fromManifest).toEqual(getTargets(path.join(root, 'ws'), { source }));
  });

  it('fills in entry, edition, manifest and feature context', () => {
    const [lib, integration, app] = getTargets(path.join(root, 'ws'), { source });
    expect(lib).toEqual({
      packageName: 'core-lib',
      targetName: 'core_lib',
      kind: 'library',
      entryPath: path.join(root, 'ws/core-lib/src/lib.rs'),
      edition: '2021',
      manifestPath: path.join(root, 'ws/core-lib/Cargo.toml'),
      defaultFeatures: ['std', 'alloc'],
      requiredFeatures: [],
    });
    expect(integration.requiredFeatures).toEqual(['std']);
    expect(app.edition).toBe('2018');
    expect(app.defaultFeatures).toEqual([]);
  });

  it('returns frozen targets', () => {
    const [lib] = getTargets(path.join(root, 'ws'), { source });
    expect(Object.isFrozen(lib)).toBe(true);
  });

  it('filters by kind without reordering', () => {
    const targets = getTargets(path.join(root, 'ws'), { source, kinds: ['binary', 'library'] });
    expect(targets.map(t => t.targetName)).toEqual(['core_lib', 'app']);
  });

  it('follows path dependencies outside the workspace on request', () => {
    const targets = getTargets(path.join(root, 'ws'), { source, followPathDependencies: true });
    expect(targets.map(t => `${t.packageName}::${t.targetName}`)).toEqual([
      'core-lib::core_lib',
      'core-lib::integration',
      'app::app',
      'app::build-script-build',
      'helper::helper',
    ]);
    expect(source.queries).toEqual([path.join(root, 'ws/Cargo.toml'), path.join(root, 'helper/Cargo.toml')]);
  });

  it('lists one binary target per package with distinct entry files', () => {
    const twoBinaries = new FixtureMetadataSource(() => loadMetadataFixture('two-binaries-metadata.json', root));
    const targets = getTargets(path.join(root, 'ws'), { source: twoBinaries });
    expect(targets.map(t => [t.packageName, t.kind, t.entryPath])).toEqual([
      ['alpha', 'binary', path.join(root, 'ws/alpha/src/main.rs')],
      ['beta', 'binary', path.join(root, 'ws/beta/src/main.rs')],
    ]);
  });

  it('throws NotFoundError for a missing workspace root', () => {
    expect(() => getTargets(path.join(root, 'nope'), { source })).toThrow(NotFoundError);
    expect(source.queries).toEqual([]);
  });

  it('throws MetadataError for a directory without Cargo.toml', () => {
    fs.mkdirSync(path.join(root, 'empty'));
    expect(() => getTargets(path.join(root, 'empty'), { source })).toThrow(MetadataError);
  });

  it('throws MetadataError for a file that is not Cargo.toml', () => {
    expect(() => getTargets(path.join(root, 'ws/app/src/main.rs'), { source })).toThrow(
      'the manifest path must point to a Cargo.toml file',
    );
  });

  it('throws MetadataError when no packages are reported', () => {
    const empty = new FixtureMetadataSource(() => ({ workspace_root: root, packages: [] }));
    expect(() => getTargets(path.join(root, 'ws'), { source: empty })).toThrow(
      `no packages found at ${path.join(root, 'ws/Cargo.toml')}`,
    );
  });

  it('throws MetadataError for malformed metadata', () => {
    const broken = new FixtureMetadataSource(() => ({ workspace_root: root, packages: 'nope' }));
    expect(() => getTargets(path.join(root, 'ws'), { source: broken })).toThrow(MetadataError);
  });

  it('throws MetadataError for an unknown target kind', () => {
    const odd = new FixtureMetadataSource(() => ({
      workspace_root: root,
      packages: [{
        name: 'odd',
        manifest_path: path.join(root, 'ws/Cargo.toml'),
        features: {},
        dependencies: [],
        targets: [{ name: 'odd', kind: ['plugin'], src_path: path.join(root, 'odd.rs'), edition: '2021' }],
      }],
    }));
    expect(() => getTargets(path.join(root, 'ws'), { source: odd })).toThrow('unknown kind `plugin` for target `odd` of `odd`');
  });

  it('maps every library crate type to library', () => {
    const kinds = ['lib', 'rlib', 'dylib', 'cdylib', 'staticlib', 'proc-macro'];
    const many = new FixtureMetadataSource(() => ({
      workspace_root: root,
      packages: [{
        name: 'many',
        manifest_path: path.join(root, 'ws/Cargo.toml'),
        features: {},
        dependencies: [],
        targets: kinds.map(kind => ({ name: kind, kind: [kind], src_path: path.join(root, 'lib.rs'), edition: '2021' })),
      }],
    }));
    expect(getTargets(path.join(root, 'ws'), { source: many }).map(t => t.kind)).toEqual(kinds.map(() => 'library'));
  });
});

describe('parseMetadata', () => {
  it('accepts the fixture metadata', () => {
    const metadata = parseMetadata(loadMetadataFixture('workspace-metadata.json', root));
    expect(metadata.packages.map(p => p.name)).toEqual(['core-lib', 'app']);
  });

  it('rejects a target without a kind', () => {
    const raw = {
      workspace_root: root,
      packages: [{
        name: 'x', manifest_path: 'Cargo.toml', features: {}, dependencies: [],
        targets: [{ name: 'x', kind: [], src_path: 'x.rs', edition: '2021' }],
      }],
    };
    expect(() => parseMetadata(raw)).toThrow(/build metadata has an unexpected shape/);
  });
});

describe('CargoMetadataSource', () => {
  it('reports a cargo executable that cannot be started', () => {
    const missing = new CargoMetadataSource({ cargo: path.join(root, 'no-such-cargo'), offline: true });
    expect(() => missing.query()).toThrow(MetadataError);
    expect(() => missing.query()).toThrow(`failed to run ${path.join(root, 'no-such-cargo')}`);
  });
});

describe('expandDefaultFeatures', () => {
  it('follows feature links from default', () => {
    expect(expandDefaultFeatures({ default: ['a'], a: ['b'], b: ['a'], c: [] })).toEqual(['a', 'b']);
  });

  it('skips dependency features', () => {
    expect(expandDefaultFeatures({ default: ['dep:serde', 'serde/derive', 'std'], std: [] })).toEqual(['std']);
  });

  it('returns nothing without a default feature', () => {
    expect(expandDefaultFeatures({ std: [] })).toEqual([]);
  });
});
