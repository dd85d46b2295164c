/**
 * Layered configuration store with delimited-path access.
 *
 * Reads fall back from the user values to the defaults, and from there to a
 * caller-supplied fallback. Writes only ever touch the user values.
 */

import { ConfigKeyError, PathNotFoundError } from './errors.js';
import { loadConfigFile } from './loader/loader.js';
import type { LoadOptions } from './loader/loader.js';
import { deepCopy, mergeMappings } from './merge.js';
import { DEFAULT_DELIMITER, assertDelimiter, deletePath, getPath, hasPath, setPath, toParsedPath } from './path.js';
import type { ParsedPath } from './path.js';
import type { NestedMapping, NestedValue, PathLike } from './types.js';

export interface ConfigStoreOptions {
  /** Single character separating path segments. Defaults to ".". */
  delimiter?: string;
}

export class ConfigStore {
  private readonly _values: NestedMapping;
  private readonly _defaults: NestedMapping;
  private readonly _delimiter: string;

  constructor(values?: NestedMapping | null, defaults?: NestedMapping | null, options?: ConfigStoreOptions) {
    this._delimiter = options?.delimiter ?? DEFAULT_DELIMITER;
    assertDelimiter(this._delimiter);
    this._values = deepCopy<NestedMapping>(values ?? {});
    this._defaults = deepCopy<NestedMapping>(defaults ?? {});
  }

  /**
   * Load the user values, and optionally the defaults, from files.
   * A `ConfigLoadError` from either file is rethrown unchanged.
   */
  static fromFile(
    path: string,
    defaultsPath?: string | null,
    options?: ConfigStoreOptions & LoadOptions,
  ): ConfigStore {
    const values = loadConfigFile(path, options);
    const defaults = defaultsPath != null ? loadConfigFile(defaultsPath, options) : null;
    return new ConfigStore(values, defaults, options);
  }

  get delimiter(): string {
    return this._delimiter;
  }

  /** Copy of the user values, without defaults applied. */
  get values(): NestedMapping {
    return deepCopy(this._values);
  }

  /** Copy of the defaults. */
  get defaults(): NestedMapping {
    return deepCopy(this._defaults);
  }

  get(path: PathLike): NestedValue;
  get<T>(path: PathLike, defaultValue: T): NestedValue | T;
  get<T>(path: PathLike, ...fallback: [] | [T]): NestedValue | T {
    const parsed = this._parse(path);
    for (const layer of [this._values, this._defaults]) {
      try {
        return deepCopy(getPath(layer, parsed));
      } catch (e) {
        if (!(e instanceof PathNotFoundError)) throw e;
      }
    }
    if (fallback.length === 1) return fallback[0];
    throw new ConfigKeyError(parsed.text);
  }

  set(path: PathLike, value: NestedValue): this {
    setPath(this._values, this._parse(path), value);
    return this;
  }

  has(path: PathLike): boolean {
    const parsed = this._parse(path);
    return hasPath(this._values, parsed) || hasPath(this._defaults, parsed);
  }

  /**
   * Remove `path` from the user values and return the removed value. The
   * defaults are untouched, so a default at the same path becomes visible.
   */
  delete(path: PathLike): NestedValue {
    return deletePath(this._values, this._parse(path));
  }

  /** Fully merged, independent copy of the values over the defaults. */
  toMapping(): NestedMapping {
    return mergeMappings(this._defaults, this._values);
  }

  private _parse(path: PathLike): ParsedPath {
    return toParsedPath(path, this._delimiter);
  }
}
