import fs from 'fs';
import path from 'path';
import Ajv from 'ajv';
import type { JSONSchemaType } from 'ajv';
import { ConfigError } from '../errors.js';
import { TARGET_KINDS } from '../types.js';
import type { FilesConfig, OutputFormat, TargetKind } from '../types.js';
import { CONFIG_FILENAME, DEFAULT_CONFIG } from './defaults.js';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['plain', 'json', 'jsonl', 'console'];

interface RcFile {
  _comment?: string;
  features?: string[];
  defaultFeatures?: boolean;
  enabledFlags?: string[];
  disabledFlags?: string[];
  kinds?: TargetKind[];
  format?: OutputFormat;
  relative?: boolean;
  verbose?: boolean;
  offline?: boolean;
  followPathDependencies?: boolean;
}

const rcSchema: JSONSchemaType<RcFile> = {
  type: 'object',
  additionalProperties: false,
  properties: {
    _comment: { type: 'string', nullable: true },
    features: { type: 'array', items: { type: 'string' }, nullable: true },
    defaultFeatures: { type: 'boolean', nullable: true },
    enabledFlags: { type: 'array', items: { type: 'string' }, nullable: true },
    disabledFlags: { type: 'array', items: { type: 'string' }, nullable: true },
    kinds: { type: 'array', items: { type: 'string', enum: [...TARGET_KINDS] }, nullable: true },
    format: { type: 'string', enum: [...OUTPUT_FORMATS], nullable: true },
    relative: { type: 'boolean', nullable: true },
    verbose: { type: 'boolean', nullable: true },
    offline: { type: 'boolean', nullable: true },
    followPathDependencies: { type: 'boolean', nullable: true },
  },
};

const ajv = new Ajv({ allErrors: true });
const validateRc = ajv.compile(rcSchema);

function readRcFile(configPath: string): RcFile {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`could not read config file: ${reason}`, { filePath: configPath });
  }
  if (!validateRc(raw)) {
    throw new ConfigError(
      `invalid config file: ${ajv.errorsText(validateRc.errors, { dataVar: 'config' })}`,
      { filePath: configPath },
    );
  }
  return raw;
}

export function parseList(value: string): string[] {
  return value.split(',').map(v => v.trim()).filter(v => v.length > 0);
}

function isTruthy(value: string): boolean {
  const v = value.toLowerCase();
  return v === '1' || v === 'true' || v === 'yes';
}

/** Priority: CLI > env > config file > default. CLI options are applied by the caller. */
export function loadConfig(configPath?: string, cwd: string = process.cwd()): FilesConfig {
  // TARGET_FILES_CONFIG can name an alternative config path
  const explicit = configPath ?? process.env.TARGET_FILES_CONFIG;
  const resolvedConfigPath = explicit ? path.resolve(cwd, explicit) : path.join(cwd, CONFIG_FILENAME);

  let rc: RcFile = {};
  if (fs.existsSync(resolvedConfigPath)) {
    rc = readRcFile(resolvedConfigPath);
  } else if (explicit) {
    throw new ConfigError(`config file not found: ${resolvedConfigPath}`, { filePath: resolvedConfigPath });
  }

  const base: FilesConfig = {
    features: rc.features ?? DEFAULT_CONFIG.features,
    defaultFeatures: rc.defaultFeatures ?? DEFAULT_CONFIG.defaultFeatures,
    enabledFlags: rc.enabledFlags ?? DEFAULT_CONFIG.enabledFlags,
    disabledFlags: rc.disabledFlags ?? DEFAULT_CONFIG.disabledFlags,
    kinds: rc.kinds ?? DEFAULT_CONFIG.kinds,
    format: rc.format ?? DEFAULT_CONFIG.format,
    relative: rc.relative ?? DEFAULT_CONFIG.relative,
    verbose: rc.verbose ?? DEFAULT_CONFIG.verbose,
    offline: rc.offline ?? DEFAULT_CONFIG.offline,
    followPathDependencies: rc.followPathDependencies ?? DEFAULT_CONFIG.followPathDependencies,
  };

  const env = process.env;
  if (env.TARGET_FILES_FEATURES) {
    base.features = parseList(env.TARGET_FILES_FEATURES);
  }
  if (env.TARGET_FILES_NO_DEFAULT_FEATURES) {
    base.defaultFeatures = !isTruthy(env.TARGET_FILES_NO_DEFAULT_FEATURES);
  }
  if (env.TARGET_FILES_CFG) {
    base.enabledFlags = [...base.enabledFlags, ...parseList(env.TARGET_FILES_CFG)];
  }
  if (env.TARGET_FILES_OFFLINE) {
    base.offline = isTruthy(env.TARGET_FILES_OFFLINE);
  }
  if (env.TARGET_FILES_VERBOSE) {
    base.verbose = isTruthy(env.TARGET_FILES_VERBOSE);
  }

  return base;
}

export function parseKinds(value: string): TargetKind[] {
  return parseList(value).map(kind => {
    const match = TARGET_KINDS.find(k => k === kind);
    if (match === undefined) {
      throw new ConfigError(`unknown target kind \`${kind}\``, {}, `expected one of: ${TARGET_KINDS.join(', ')}`);
    }
    return match;
  });
}

export function parseFormat(value: string): OutputFormat {
  const match = OUTPUT_FORMATS.find(f => f === value.trim());
  if (match === undefined) {
    throw new ConfigError(`unknown output format \`${value}\``, {}, `expected one of: ${OUTPUT_FORMATS.join(', ')}`);
  }
  return match;
}
