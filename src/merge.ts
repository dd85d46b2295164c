/**
 * Deep copy and defaults overlay for nested structures.
 */

import { isMapping } from './path.js';
import type { NestedMapping, NestedValue } from './types.js';

function define(target: NestedMapping, key: string, value: NestedValue): void {
  Object.defineProperty(target, key, { value, writable: true, enumerable: true, configurable: true });
}

export function deepCopy<T extends NestedValue>(value: T): T;
export function deepCopy(value: NestedValue): NestedValue {
  if (Array.isArray(value)) {
    return value.map((item) => deepCopy(item));
  }
  if (isMapping(value)) {
    const copy: NestedMapping = {};
    for (const [key, item] of Object.entries(value)) {
      define(copy, key, deepCopy(item));
    }
    return copy;
  }
  return value;
}

/**
 * Overlay `values` on `defaults` and return a new, independent mapping.
 *
 * Mappings present on both sides merge key by key. Any other pair of nodes
 * resolves to the `values` side as a whole, so a sequence in `values`
 * replaces the default sequence rather than merging element-wise.
 */
export function mergeMappings(defaults: NestedMapping, values: NestedMapping): NestedMapping {
  const merged = deepCopy(defaults);
  for (const [key, override] of Object.entries(values)) {
    const base = Object.prototype.hasOwnProperty.call(merged, key) ? merged[key] : undefined;
    if (isMapping(base) && isMapping(override)) {
      define(merged, key, mergeMappings(base, override));
    } else {
      define(merged, key, deepCopy(override));
    }
  }
  return merged;
}
