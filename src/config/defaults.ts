import type { FilesConfig } from '../types.js';

export const CONFIG_FILENAME = '.targetfilesrc.json';

export const DEFAULT_CONFIG: FilesConfig = {
  features: [],
  defaultFeatures: true,
  enabledFlags: [],
  disabledFlags: [],
  kinds: [],
  format: 'plain',
  relative: false,
  verbose: false,
  offline: false,
  followPathDependencies: false,
};
