export { getTargets, expandDefaultFeatures } from './catalog/targets.js';
export type { CatalogOptions } from './catalog/targets.js';
export { CargoMetadataSource, parseMetadata } from './catalog/metadata.js';
export type {
  CargoDependency, CargoMetadata, CargoMetadataSourceOptions, CargoPackage, CargoTarget, MetadataSource,
} from './catalog/metadata.js';
export { getTargetFiles } from './walker/walk.js';
export { cfgIfResolver, DEFAULT_MACRO_RESOLVERS } from './walker/macros.js';
export type { MacroExpansion, MacroInvocation, MacroResolver } from './walker/macros.js';
export type { CfgPredicate, CfgTruth } from './walker/cfg.js';
export { findUnclaimedFiles } from './scanner/discover.js';
export {
  ConfigError,
  MetadataError,
  NotFoundError,
  ParseError,
  TargetFilesError,
  UnresolvedModuleError,
  UnsupportedConstructError,
  isTargetFilesError,
} from './errors.js';
export type { ErrorCode, ErrorContext, TargetFilesErrorJSON } from './errors.js';
export { TARGET_KINDS } from './types.js';
export type { FilesConfig, OutputFormat, ResolutionConfig, Target, TargetFiles, TargetKind } from './types.js';
