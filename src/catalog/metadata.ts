import { spawnSync } from 'child_process';
import Ajv from 'ajv';
import type { JSONSchemaType } from 'ajv';
import { MetadataError } from '../errors.js';

/** The parts of `cargo metadata --format-version 1` the catalog reads. */
export interface CargoTarget {
  name: string;
  kind: string[];
  src_path: string;
  edition: string;
  'required-features'?: string[];
}

export interface CargoDependency {
  name: string;
  /** Set only for `path = "..."` dependencies. */
  path?: string;
}

export interface CargoPackage {
  name: string;
  manifest_path: string;
  targets: CargoTarget[];
  dependencies: CargoDependency[];
  features: Record<string, string[]>;
}

export interface CargoMetadata {
  packages: CargoPackage[];
  workspace_root: string;
}

/**
 * The build-graph query behind the catalog. Returns the raw decoded
 * response; validation happens in the catalog.
 */
export interface MetadataSource {
  query(manifestPath?: string): unknown;
}

const metadataSchema: JSONSchemaType<CargoMetadata> = {
  type: 'object',
  required: ['packages', 'workspace_root'],
  properties: {
    workspace_root: { type: 'string' },
    packages: {
      type: 'array',
      items: {
        type: 'object',
        required: ['name', 'manifest_path', 'targets', 'dependencies', 'features'],
        properties: {
          name: { type: 'string' },
          manifest_path: { type: 'string' },
          features: { type: 'object', required: [], additionalProperties: { type: 'array', items: { type: 'string' } } },
          dependencies: {
            type: 'array',
            items: {
              type: 'object',
              required: ['name'],
              properties: {
                name: { type: 'string' },
                path: { type: 'string', nullable: true },
              },
            },
          },
          targets: {
            type: 'array',
            items: {
              type: 'object',
              required: ['name', 'kind', 'src_path', 'edition'],
              properties: {
                name: { type: 'string' },
                kind: { type: 'array', items: { type: 'string' }, minItems: 1 },
                src_path: { type: 'string' },
                edition: { type: 'string' },
                'required-features': { type: 'array', items: { type: 'string' }, nullable: true },
              },
            },
          },
        },
      },
    },
  },
};

const ajv = new Ajv({ allErrors: true });
const validateMetadata = ajv.compile(metadataSchema);

export function parseMetadata(raw: unknown): CargoMetadata {
  if (!validateMetadata(raw)) {
    const details = ajv.errorsText(validateMetadata.errors, { dataVar: 'metadata' });
    throw new MetadataError(`build metadata has an unexpected shape: ${details}`);
  }
  return raw;
}

export interface CargoMetadataSourceOptions {
  /** Cargo executable; defaults to `$CARGO`, then `cargo`. */
  cargo?: string;
  /** Never retry without `--offline`. */
  offline?: boolean;
  cwd?: string;
}

/** Runs `cargo metadata --no-deps`, offline first. */
export class CargoMetadataSource implements MetadataSource {
  constructor(private readonly options: CargoMetadataSourceOptions = {}) {}

  query(manifestPath?: string): unknown {
    const args = ['metadata', '--format-version', '1', '--no-deps'];
    if (manifestPath) args.push('--manifest-path', manifestPath);

    let result = this.run([...args, '--offline']);
    if (result.status !== 0 && !this.options.offline) {
      result = this.run(args);
    }

    if (result.error) {
      throw new MetadataError(`failed to run ${this.cargo}: ${result.error.message}`, { manifestPath },
        'make sure cargo is installed and on PATH, or set $CARGO');
    }
    if (result.status !== 0) {
      throw new MetadataError(`cargo metadata exited with status ${result.status}`, {
        manifestPath,
        stderr: result.stderr.trim(),
      });
    }

    try {
      const decoded: unknown = JSON.parse(result.stdout);
      return decoded;
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new MetadataError(`cargo metadata returned invalid JSON: ${reason}`, { manifestPath });
    }
  }

  private get cargo(): string {
    return this.options.cargo ?? process.env.CARGO ?? 'cargo';
  }

  private run(args: string[]) {
    return spawnSync(this.cargo, args, {
      cwd: this.options.cwd,
      encoding: 'utf8',
      maxBuffer: 64 * 1024 * 1024,
    });
  }
}
