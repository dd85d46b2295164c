/**
 * Shapes of the values a configuration document parses into.
 */

export type NestedScalar = string | number | boolean | null;

export type NestedValue = NestedScalar | NestedValue[] | NestedMapping;

export interface NestedMapping {
  [key: string]: NestedValue;
}

/** A mapping key, or a sequence index once the walk reaches a sequence. */
export type PathSegment = string | number;

/** A delimited path string, or a path already split into segments. */
export type PathLike = string | readonly PathSegment[];
