import type { SymlinkStatus } from "./status";

/** One clause of an entry's label gate, satisfied by any of its labels. */
export interface LabelRequirement {
  anyOf: readonly string[];
}

export interface Entry {
  group: string;
  /** Position of the declaration inside its group. */
  index: number;
  /** Relative to the repository root. */
  source: string;
  /** Absolute, or starting with the `~` home shorthand. */
  target: string;
  requirements: readonly LabelRequirement[];
}

/**
 * An entry bound to absolute paths. Two operations are the same slot when
 * their target paths are equal, whatever their source or entry.
 */
export interface Operation {
  entry: Entry;
  sourcePath: string;
  targetPath: string;
}

export interface SymlinkResult {
  operation: Operation;
  status: SymlinkStatus;
}

export type LinkResolution =
  | { kind: "resolved"; path: string }
  | { kind: "out-of-scope"; path: string }
  | { kind: "broken"; reason: string };

/** Group name to one declaration or a list of them, before validation. */
export type DeclarationDocument = Record<string, unknown>;

export interface DuplicateTarget {
  targetPath: string;
  kept: Entry;
  dropped: Entry;
}
