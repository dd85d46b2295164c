/**
 * nestconf - Nested configuration with delimited paths and layered defaults.
 */

// Store
export { ConfigStore } from './config.js';
export type { ConfigStoreOptions } from './config.js';

// Paths
export {
  DEFAULT_DELIMITER,
  ParsedPath,
  assertDelimiter,
  splitPath,
  parsePath,
  formatPath,
  toParsedPath,
  getPath,
  setPath,
  hasPath,
  deletePath,
  isMapping,
  isNestedValue,
  describeNode,
} from './path.js';
export type { ResolvablePath } from './path.js';

// Merge
export { deepCopy, mergeMappings } from './merge.js';

// Types
export type { NestedScalar, NestedValue, NestedMapping, PathSegment, PathLike } from './types.js';

// Loader
export { ConfigLoader, loadConfigFile, YamlParser, JsonParser } from './loader/index.js';
export type { ConfigLoaderOptions, LoadOptions, DocumentParser } from './loader/index.js';

// Errors
export {
  ConfigurationError,
  InvalidPathError,
  PathNotFoundError,
  PathTypeError,
  ConfigKeyError,
  ConfigLoadError,
  ErrorCodes,
} from './errors.js';
export type { ErrorOptions, ErrorCode, ConfigLoadReason } from './errors.js';

// Observability
export { Logger } from './observability/logger.js';
export type { LoggerOptions, LogLevel, LogFormat, WritableOutput } from './observability/logger.js';

export const VERSION = '0.1.0';
