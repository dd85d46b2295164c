/**
 * Path resolution over nested mappings and sequences.
 *
 * A path is split into segments on a single delimiter character. While
 * walking, a segment is a key when the current node is a mapping and an
 * integer index when the current node is a sequence; a numeric-looking key
 * such as "0" is never coerced into an index on a mapping.
 */

import { InvalidPathError, PathNotFoundError, PathTypeError } from './errors.js';
import type { NestedMapping, NestedValue, PathLike, PathSegment } from './types.js';

export const DEFAULT_DELIMITER = '.';

const INDEX_PATTERN = /^\d+$/;

/** A path string split once, keeping the original text for error messages. */
export class ParsedPath {
  readonly segments: readonly string[];
  readonly text: string;

  constructor(segments: readonly string[], text: string) {
    this.segments = segments;
    this.text = text;
  }
}

export type ResolvablePath = PathLike | ParsedPath;

type Lookup = { found: true; value: NestedValue } | { found: false; segment: string };

export function assertDelimiter(delimiter: string, path: string = ''): void {
  if (delimiter.length !== 1) {
    throw new InvalidPathError(path, `delimiter must be a single character, got '${delimiter}'`);
  }
}

export function splitPath(path: string, delimiter: string = DEFAULT_DELIMITER): string[] {
  assertDelimiter(delimiter, path);
  if (path.length === 0) {
    throw new InvalidPathError(path, 'path is empty');
  }
  const segments = path.split(delimiter);
  if (segments[0] === '') {
    throw new InvalidPathError(path, `leading '${delimiter}'`);
  }
  if (segments[segments.length - 1] === '') {
    throw new InvalidPathError(path, `trailing '${delimiter}'`);
  }
  if (segments.includes('')) {
    throw new InvalidPathError(path, `consecutive '${delimiter}'`);
  }
  return segments;
}

export function parsePath(path: string, delimiter: string = DEFAULT_DELIMITER): ParsedPath {
  return new ParsedPath(splitPath(path, delimiter), path);
}

export function formatPath(segments: readonly PathSegment[], delimiter: string = DEFAULT_DELIMITER): string {
  return segments.map(String).join(delimiter);
}

export function isMapping(value: unknown): value is NestedMapping {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isNestedValue(value: unknown): value is NestedValue {
  if (value === null) return true;
  const kind = typeof value;
  if (kind === 'string' || kind === 'number' || kind === 'boolean') return true;
  if (Array.isArray(value)) return value.every(isNestedValue);
  if (!isMapping(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  if (proto !== Object.prototype && proto !== null) return false;
  return Object.values(value).every(isNestedValue);
}

export function describeNode(value: NestedValue | undefined): string {
  if (value === undefined) return 'nothing';
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'sequence';
  if (isMapping(value)) return 'mapping';
  return typeof value;
}

/**
 * Turn any accepted path form into a {@link ParsedPath}. Strings are split on
 * `delimiter`; segment arrays are taken as they are.
 */
export function toParsedPath(path: ResolvablePath, delimiter: string = DEFAULT_DELIMITER): ParsedPath {
  if (path instanceof ParsedPath) return path;
  if (typeof path === 'string') return parsePath(path, delimiter);
  if (path.length === 0) {
    throw new InvalidPathError('', 'path is empty');
  }
  return new ParsedPath(path.map(String), formatPath(path, delimiter));
}

function hasKey(node: NestedMapping, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(node, key);
}

function assignKey(node: NestedMapping, key: string, value: NestedValue): void {
  if (key === '__proto__') {
    Object.defineProperty(node, key, { value, writable: true, enumerable: true, configurable: true });
  } else {
    node[key] = value;
  }
}

function toIndex(segment: string, path: ParsedPath): number {
  if (!INDEX_PATTERN.test(segment)) {
    throw new PathTypeError(path.text, segment, 'an integer index into a sequence', `key '${segment}'`);
  }
  return Number(segment);
}

function notAContainer(segment: string, node: NestedValue, path: ParsedPath): PathTypeError {
  return new PathTypeError(path.text, segment, 'a mapping or sequence', describeNode(node));
}

function child(node: NestedValue, segment: string, path: ParsedPath): Lookup {
  if (isMapping(node)) {
    return hasKey(node, segment) ? { found: true, value: node[segment] } : { found: false, segment };
  }
  if (Array.isArray(node)) {
    const index = toIndex(segment, path);
    return index < node.length ? { found: true, value: node[index] } : { found: false, segment };
  }
  throw notAContainer(segment, node, path);
}

function walk(structure: NestedValue, segments: readonly string[], path: ParsedPath): Lookup {
  let current = structure;
  for (const segment of segments) {
    const next = child(current, segment, path);
    if (!next.found) return next;
    current = next.value;
  }
  return { found: true, value: current };
}

export function getPath(structure: NestedValue, path: ResolvablePath): NestedValue;
export function getPath<T>(structure: NestedValue, path: ResolvablePath, defaultValue: T): NestedValue | T;
export function getPath<T>(structure: NestedValue, path: ResolvablePath, ...fallback: [] | [T]): NestedValue | T {
  const parsed = toParsedPath(path);
  const result = walk(structure, parsed.segments, parsed);
  if (result.found) return result.value;
  if (fallback.length === 1) return fallback[0];
  throw new PathNotFoundError(parsed.text, result.segment);
}

/**
 * Write `value` at `path`, creating empty mappings for missing keys on the
 * way. Sequences are never grown: an index past the end is a type error.
 * Mutates `structure` in place and returns it.
 */
export function setPath<S extends NestedValue>(structure: S, path: ResolvablePath, value: NestedValue): S {
  const parsed = toParsedPath(path);
  const segments = parsed.segments;
  let current: NestedValue = structure;

  for (const segment of segments.slice(0, -1)) {
    if (isMapping(current)) {
      if (!hasKey(current, segment)) {
        assignKey(current, segment, {});
      }
      current = current[segment];
    } else if (Array.isArray(current)) {
      const index = toIndex(segment, parsed);
      if (index >= current.length) {
        throw new PathTypeError(parsed.text, segment, `an index below ${current.length}`, 'a missing sequence slot');
      }
      current = current[index];
    } else {
      throw notAContainer(segment, current, parsed);
    }
  }

  const last = segments[segments.length - 1];
  if (isMapping(current)) {
    assignKey(current, last, value);
  } else if (Array.isArray(current)) {
    const index = toIndex(last, parsed);
    if (index >= current.length) {
      throw new PathTypeError(parsed.text, last, `an index below ${current.length}`, 'a missing sequence slot');
    }
    current[index] = value;
  } else {
    throw notAContainer(last, current, parsed);
  }
  return structure;
}

export function hasPath(structure: NestedValue, path: ResolvablePath): boolean {
  const parsed = toParsedPath(path);
  try {
    return walk(structure, parsed.segments, parsed).found;
  } catch (e) {
    if (e instanceof PathTypeError) return false;
    throw e;
  }
}

/**
 * Remove the entry at `path` and return it. Removing a sequence element
 * shifts the elements after it down by one.
 */
export function deletePath(structure: NestedValue, path: ResolvablePath): NestedValue {
  const parsed = toParsedPath(path);
  const segments = parsed.segments;
  const last = segments[segments.length - 1];

  const parent = walk(structure, segments.slice(0, -1), parsed);
  if (!parent.found) {
    throw new PathNotFoundError(parsed.text, parent.segment);
  }

  const container = parent.value;
  if (isMapping(container)) {
    if (!hasKey(container, last)) {
      throw new PathNotFoundError(parsed.text, last);
    }
    const removed = container[last];
    delete container[last];
    return removed;
  }
  if (Array.isArray(container)) {
    const index = toIndex(last, parsed);
    if (index >= container.length) {
      throw new PathNotFoundError(parsed.text, last);
    }
    return container.splice(index, 1)[0];
  }
  throw notAContainer(last, container, parsed);
}
