/**
 * Error hierarchy for nestconf.
 */

export interface ErrorOptions {
  cause?: Error;
  suggestion?: string | null;
}

export class ConfigurationError extends Error {
  readonly code: string;
  readonly details: Record<string, unknown>;
  override readonly cause?: Error;
  readonly timestamp: string;
  readonly suggestion: string | null;

  constructor(
    code: string,
    message: string,
    details?: Record<string, unknown>,
    cause?: Error,
    suggestion?: string | null,
  ) {
    super(message, cause ? { cause } : undefined);
    this.name = 'ConfigurationError';
    this.code = code;
    this.details = details ?? {};
    this.cause = cause;
    this.timestamp = new Date().toISOString();
    this.suggestion = suggestion ?? null;
  }

  override toString(): string {
    return `[${this.code}] ${this.message}`;
  }

  toJSON(): Record<string, unknown> {
    const obj: Record<string, unknown> = {
      code: this.code,
      message: this.message,
    };
    if (Object.keys(this.details).length > 0) {
      obj.details = this.details;
    }
    if (this.cause !== undefined) {
      obj.cause = String(this.cause);
    }
    obj.timestamp = this.timestamp;
    if (this.suggestion !== null) {
      obj.suggestion = this.suggestion;
    }
    return obj;
  }
}

export class InvalidPathError extends ConfigurationError {
  constructor(path: string, reason: string, options?: ErrorOptions) {
    super(
      'INVALID_PATH',
      `Invalid path '${path}': ${reason}`,
      { path, reason },
      options?.cause,
      options?.suggestion,
    );
    this.name = 'InvalidPathError';
  }

  get path(): string {
    return String(this.details['path']);
  }
}

export class PathNotFoundError extends ConfigurationError {
  constructor(path: string, segment: string, options?: ErrorOptions) {
    super(
      'PATH_NOT_FOUND',
      `Path '${path}' not found: no entry '${segment}'`,
      { path, segment },
      options?.cause,
      options?.suggestion,
    );
    this.name = 'PathNotFoundError';
  }

  get path(): string {
    return String(this.details['path']);
  }

  get segment(): string {
    return String(this.details['segment']);
  }
}

export class PathTypeError extends ConfigurationError {
  constructor(path: string, segment: string, expected: string, actual: string, options?: ErrorOptions) {
    super(
      'PATH_TYPE_MISMATCH',
      `Cannot resolve '${segment}' in path '${path}': expected ${expected}, found ${actual}`,
      { path, segment, expected, actual },
      options?.cause,
      options?.suggestion,
    );
    this.name = 'PathTypeError';
  }

  get path(): string {
    return String(this.details['path']);
  }

  get segment(): string {
    return String(this.details['segment']);
  }
}

export class ConfigKeyError extends ConfigurationError {
  constructor(path: string, options?: ErrorOptions) {
    super(
      'CONFIG_KEY_NOT_FOUND',
      `Configuration key not found: ${path}`,
      { path },
      options?.cause,
      options?.suggestion ?? 'Set the key in the configuration or its defaults, or pass a fallback value.',
    );
    this.name = 'ConfigKeyError';
  }

  get path(): string {
    return String(this.details['path']);
  }
}

export type ConfigLoadReason =
  | 'not_found'
  | 'read_failed'
  | 'parse_failed'
  | 'invalid_document'
  | 'unsupported_format';

export class ConfigLoadError extends ConfigurationError {
  readonly reason: ConfigLoadReason;

  constructor(filePath: string, reason: ConfigLoadReason, message: string, options?: ErrorOptions) {
    super(
      'CONFIG_LOAD_FAILED',
      `Cannot load configuration file ${filePath}: ${message}`,
      { filePath, reason },
      options?.cause,
      options?.suggestion,
    );
    this.name = 'ConfigLoadError';
    this.reason = reason;
  }

  get filePath(): string {
    return String(this.details['filePath']);
  }
}

export const ErrorCodes = Object.freeze({
  INVALID_PATH: 'INVALID_PATH',
  PATH_NOT_FOUND: 'PATH_NOT_FOUND',
  PATH_TYPE_MISMATCH: 'PATH_TYPE_MISMATCH',
  CONFIG_KEY_NOT_FOUND: 'CONFIG_KEY_NOT_FOUND',
  CONFIG_LOAD_FAILED: 'CONFIG_LOAD_FAILED',
} as const);

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
