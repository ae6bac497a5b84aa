import { MetadataError, UnresolvedModuleError } from '../src/errors';
import { formatError, printConsoleReport } from '../src/report/console';
import { buildJsonReport, buildJsonTargetList } from '../src/report/json';
import { buildJsonlReport } from '../src/report/jsonl';
import { buildPlainFileList, buildPlainReport, buildPlainTargetList, displayPath } from '../src/report/plain';
import type { Target, TargetFiles } from '../src/types';

function makeTarget(overrides: Partial<Target> = {}): Target {
  return {
    packageName: 'core',
    targetName: 'core',
    kind: 'library',
    entryPath: '/ws/core/src/lib.rs',
    edition: '2021',
    manifestPath: '/ws/core/Cargo.toml',
    defaultFeatures: [],
    requiredFeatures: [],
    ...overrides,
  };
}

const lib = makeTarget();
const bin = makeTarget({ targetName: 'cli', kind: 'binary', entryPath: '/ws/core/src/main.rs' });

const results: TargetFiles[] = [
  { target: lib, files: ['/ws/core/src/lib.rs', '/ws/core/src/shared.rs'] },
  { target: bin, files: ['/ws/core/src/main.rs', '/ws/core/src/shared.rs'] },
];

describe('plain report', () => {
  it('prints each file once, in first-seen order', () => {
    expect(buildPlainReport(results)).toBe([
      '/ws/core/src/lib.rs',
      '/ws/core/src/shared.rs',
      '/ws/core/src/main.rs',
    ].join('\n'));
  });

  it('prints paths relative to a directory on request', () => {
    expect(buildPlainReport(results, '/ws')).toBe('core/src/lib.rs\ncore/src/shared.rs\ncore/src/main.rs');
    expect(displayPath('/ws/core/src/lib.rs')).toBe('/ws/core/src/lib.rs');
  });

  it('prints nothing for no targets', () => {
    expect(buildPlainReport([])).toBe('');
  });

  it('prints a file list', () => {
    expect(buildPlainFileList(['/ws/a.rs', '/ws/b.rs'], '/ws')).toBe('a.rs\nb.rs');
  });

  it('prints targets as tab-separated columns', () => {
    expect(buildPlainTargetList([lib, bin], '/ws')).toBe(
      'library\tcore\tcore\tcore/src/lib.rs\nbinary\tcore\tcli\tcore/src/main.rs',
    );
  });
});

describe('json report', () => {
  it('emits one entry per target', () => {
    const parsed: unknown = JSON.parse(buildJsonReport(results, '/ws'));
    expect(parsed).toEqual([
      {
        packageName: 'core',
        targetName: 'core',
        kind: 'library',
        entryPath: 'core/src/lib.rs',
        files: ['core/src/lib.rs', 'core/src/shared.rs'],
      },
      {
        packageName: 'core',
        targetName: 'cli',
        kind: 'binary',
        entryPath: 'core/src/main.rs',
        files: ['core/src/main.rs', 'core/src/shared.rs'],
      },
    ]);
  });

  it('emits the full target records for the target list', () => {
    const parsed: unknown = JSON.parse(buildJsonTargetList([lib]));
    expect(parsed).toEqual([lib]);
  });
});

describe('jsonl report', () => {
  it('emits one JSON object per line', () => {
    const lines = buildJsonlReport(results).split('\n');
    expect(lines).toHaveLength(2);
    const second: unknown = JSON.parse(lines[1]);
    expect(second).toMatchObject({ targetName: 'cli', files: ['/ws/core/src/main.rs', '/ws/core/src/shared.rs'] });
  });
});

describe('console report', () => {
  let logs: string[];
  let spy: jest.SpyInstance;

  beforeEach(() => {
    logs = [];
    spy = jest.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
      logs.push(args.join(' '));
    });
  });

  afterEach(() => {
    spy.mockRestore();
  });

  it('groups files under their target', () => {
    printConsoleReport(results, { relativeTo: '/ws' });
    const libHeader = logs.findIndex(l => l.includes('[library]') && l.includes('core::core') && l.includes('(2 files)'));
    expect(libHeader).toBeGreaterThan(-1);
    expect(logs[libHeader + 1]).toBe('    core/src/lib.rs');
    expect(logs[libHeader + 2]).toBe('    core/src/shared.rs');
    expect(logs.some(l => l.includes('[binary]') && l.includes('core::cli'))).toBe(true);
  });

  it('prints totals with distinct files counted once', () => {
    printConsoleReport(results);
    expect(logs).toContain('\x1b[1mTargets:\x1b[0m 2');
    expect(logs).toContain('\x1b[1mDistinct files:\x1b[0m 3');
  });

  it('prints edition and manifest when verbose', () => {
    printConsoleReport([results[0]], { verbose: true });
    expect(logs).toContain('    \x1b[2mEdition:\x1b[0m 2021');
  });
});

describe('formatError', () => {
  it('renders the code, message, location and help', () => {
    const error = new UnresolvedModuleError(
      'file not found for module `foo`',
      { filePath: '/ws/core/src/lib.rs', line: 3, column: 5, module: 'foo' },
      'create /ws/core/src/foo.rs or /ws/core/src/foo/mod.rs',
    );
    expect(formatError(error)).toBe([
      'error[UNRESOLVED_MODULE]: file not found for module `foo`',
      '  --> /ws/core/src/lib.rs:3:5',
      '  = help: create /ws/core/src/foo.rs or /ws/core/src/foo/mod.rs',
    ].join('\n'));
  });

  it('includes captured stderr line by line', () => {
    const error = new MetadataError('cargo metadata exited with status 101', { stderr: 'error: oops\ncaused by: bad' });
    expect(formatError(error)).toBe([
      'error[METADATA_ERROR]: cargo metadata exited with status 101',
      '  | error: oops',
      '  | caused by: bad',
    ].join('\n'));
  });

  it('colours the headline when asked', () => {
    const error = new MetadataError('no packages');
    expect(formatError(error, true)).toBe('\x1b[1m\x1b[31merror[METADATA_ERROR]\x1b[0m: no packages');
  });

  it('serializes to JSON with its code', () => {
    const error = new MetadataError('no packages', { filePath: '/ws/Cargo.toml' });
    expect(error.toJSON()).toEqual({
      code: 'METADATA_ERROR',
      message: 'no packages',
      context: { filePath: '/ws/Cargo.toml' },
      suggestion: undefined,
    });
  });
});
