/**
 * ConfigLoader: reads a configuration file and hands back a nested mapping.
 *
 * The parser is picked by an explicit format name or by the file
 * extension. An empty document loads as an empty mapping.
 */

import { readFileSync } from 'node:fs';
import { extname, resolve } from 'node:path';
import { ConfigLoadError } from '../errors.js';
import { Logger } from '../observability/logger.js';
import { isMapping, isNestedValue } from '../path.js';
import type { NestedMapping } from '../types.js';
import { JsonParser, YamlParser } from './parsers.js';
import type { DocumentParser } from './types.js';

export interface ConfigLoaderOptions {
  parsers?: DocumentParser[];
  logger?: Logger;
}

export class ConfigLoader {
  private _logger: Logger;
  private _byFormat: Map<string, DocumentParser> = new Map();
  private _byExtension: Map<string, DocumentParser> = new Map();

  constructor(options?: ConfigLoaderOptions) {
    this._logger = options?.logger ?? new Logger({ name: 'nestconf.loader' });
    for (const parser of options?.parsers ?? [new YamlParser(), new JsonParser()]) {
      this.register(parser);
    }
  }

  register(parser: DocumentParser): this {
    this._byFormat.set(parser.format.toLowerCase(), parser);
    for (const ext of parser.extensions) {
      this._byExtension.set(ext.toLowerCase(), parser);
    }
    return this;
  }

  get formats(): string[] {
    return [...this._byFormat.keys()];
  }

  parserFor(filePath: string, format?: string | null): DocumentParser {
    if (format != null) {
      const parser = this._byFormat.get(format.toLowerCase());
      if (!parser) {
        throw new ConfigLoadError(filePath, 'unsupported_format', `unknown format '${format}'`, {
          suggestion: `Use one of: ${this.formats.join(', ')}`,
        });
      }
      return parser;
    }
    const ext = extname(filePath).toLowerCase();
    const parser = this._byExtension.get(ext);
    if (!parser) {
      throw new ConfigLoadError(filePath, 'unsupported_format', `no parser for extension '${ext}'`, {
        suggestion: 'Pass an explicit format',
      });
    }
    return parser;
  }

  load(filePath: string, format?: string | null): NestedMapping {
    const fullPath = resolve(filePath);
    this._logger.info('Reading configuration', { file: fullPath });

    try {
      const parser = this.parserFor(filePath, format);
      const data = parser.parse(this._read(filePath, fullPath), fullPath);
      const mapping = this._toMapping(filePath, data);
      this._logger.info('Finished reading configuration', { file: fullPath, format: parser.format });
      return mapping;
    } catch (e) {
      if (e instanceof ConfigLoadError) {
        this._logger.error(e.message, { file: fullPath, reason: e.reason });
        throw e;
      }
      const err = new ConfigLoadError(filePath, 'parse_failed', e instanceof Error ? e.message : String(e), {
        cause: e instanceof Error ? e : undefined,
      });
      this._logger.error(err.message, { file: fullPath, reason: err.reason });
      throw err;
    }
  }

  private _read(filePath: string, fullPath: string): string {
    try {
      return readFileSync(fullPath, 'utf-8');
    } catch (e) {
      if (e instanceof Error && 'code' in e && e.code === 'ENOENT') {
        throw new ConfigLoadError(filePath, 'not_found', 'file not found', { cause: e });
      }
      throw new ConfigLoadError(filePath, 'read_failed', String(e), {
        cause: e instanceof Error ? e : undefined,
      });
    }
  }

  private _toMapping(filePath: string, data: unknown): NestedMapping {
    if (data === null || data === undefined) {
      return {};
    }
    if (!isMapping(data)) {
      throw new ConfigLoadError(filePath, 'invalid_document', 'top-level value must be a mapping');
    }
    if (!isNestedValue(data)) {
      throw new ConfigLoadError(filePath, 'invalid_document', 'document holds values other than mappings, sequences and scalars');
    }
    return data;
  }
}

export interface LoadOptions {
  format?: string | null;
  logger?: Logger;
  loader?: ConfigLoader;
}

export function loadConfigFile(filePath: string, options?: LoadOptions): NestedMapping {
  const loader = options?.loader ?? new ConfigLoader({ logger: options?.logger });
  return loader.load(filePath, options?.format);
}
