/**
 * Error hierarchy shared by the catalog, the walker and the CLI.
 *
 * - MetadataError: the build-graph descriptor failed or returned unusable data
 * - NotFoundError: a workspace root or entry file is missing
 * - ParseError: a source file could not be read far enough to find its modules
 * - UnresolvedModuleError: a file-backed module has no backing file
 * - UnsupportedConstructError: a module declaration that cannot be seen statically
 * - ConfigError: invalid rc file, environment value or CLI option
 */

export type ErrorCode =
  | 'METADATA_ERROR'
  | 'NOT_FOUND'
  | 'PARSE_ERROR'
  | 'UNRESOLVED_MODULE'
  | 'UNSUPPORTED_CONSTRUCT'
  | 'CONFIG_ERROR';

export interface ErrorContext {
  filePath?: string;
  line?: number;
  column?: number;
  module?: string;
  [key: string]: unknown;
}

export interface TargetFilesErrorJSON {
  code: ErrorCode;
  message: string;
  context: ErrorContext;
  suggestion?: string;
}

export abstract class TargetFilesError extends Error {
  abstract readonly code: ErrorCode;
  readonly context: ErrorContext;
  readonly suggestion?: string;

  constructor(message: string, context: ErrorContext = {}, suggestion?: string) {
    super(message);
    this.name = this.constructor.name;
    this.context = context;
    this.suggestion = suggestion;

    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): TargetFilesErrorJSON {
    return {
      code: this.code,
      message: this.message,
      context: this.context,
      suggestion: this.suggestion,
    };
  }
}

export class MetadataError extends TargetFilesError {
  readonly code = 'METADATA_ERROR' as const;
}

export class NotFoundError extends TargetFilesError {
  readonly code = 'NOT_FOUND' as const;
}

export class ParseError extends TargetFilesError {
  readonly code = 'PARSE_ERROR' as const;
}

export class UnresolvedModuleError extends TargetFilesError {
  readonly code = 'UNRESOLVED_MODULE' as const;
}

export class UnsupportedConstructError extends TargetFilesError {
  readonly code = 'UNSUPPORTED_CONSTRUCT' as const;
}

export class ConfigError extends TargetFilesError {
  readonly code = 'CONFIG_ERROR' as const;
}

export function isTargetFilesError(error: unknown): error is TargetFilesError {
  return error instanceof TargetFilesError;
}
