import os from "os";
import { entryMatches } from "./labels";
import { expandHome, resolveFromRoot } from "./paths";
import type { DuplicateTarget, Entry, Operation } from "./types";

export interface PlanOptions {
  entries: readonly Entry[];
  repoRoot: string;
  labels: readonly string[];
  homeDir?: string;
}

export interface OperationPlan {
  /** One operation per parsed entry, duplicate targets included. */
  declared: Operation[];
  /** Every declared operation, one per target path, in declaration order. */
  operations: Operation[];
  /** Operations whose entry matches the active labels, in declaration order. */
  active: Operation[];
  /** Declared but not active, ordered by target path. */
  obsolete: Operation[];
  duplicates: DuplicateTarget[];
}

/** Sources resolve against the repository root, targets against the home directory. */
export function resolveOperation(entry: Entry, repoRoot: string, homeDir: string = os.homedir()): Operation {
  return {
    entry,
    sourcePath: resolveFromRoot(repoRoot, entry.source),
    targetPath: resolveFromRoot(homeDir, expandHome(entry.target, homeDir))
  };
}

/**
 * Indexes operations by target path. The target path is the identity of an
 * operation: the first declaration of a path keeps the slot.
 */
export function indexByTarget(
  operations: readonly Operation[],
  duplicates?: DuplicateTarget[]
): Map<string, Operation> {
  const index = new Map<string, Operation>();
  for (const operation of operations) {
    const existing = index.get(operation.targetPath);
    if (existing) {
      duplicates?.push({
        targetPath: operation.targetPath,
        kept: existing.entry,
        dropped: operation.entry
      });
      continue;
    }
    index.set(operation.targetPath, operation);
  }
  return index;
}

export function planOperations(options: PlanOptions): OperationPlan {
  const { entries, repoRoot, labels, homeDir } = options;
  const activeLabels = new Set(labels);
  const resolved = entries.map((entry) => resolveOperation(entry, repoRoot, homeDir));

  const duplicates: DuplicateTarget[] = [];
  const all = indexByTarget(resolved, duplicates);
  const active = indexByTarget(resolved.filter((operation) => entryMatches(operation.entry, activeLabels)));

  const obsolete = [...all.keys()]
    .filter((targetPath) => !active.has(targetPath))
    .sort()
    .map((targetPath) => all.get(targetPath))
    .filter((operation): operation is Operation => operation !== undefined);

  return {
    declared: resolved,
    operations: [...all.values()],
    active: [...active.values()],
    obsolete,
    duplicates
  };
}

export interface EntryListing {
  operation: Operation;
  active: boolean;
}

/** Every parsed entry with whether the active labels select it. */
export function listEntries(plan: Pick<OperationPlan, "declared">, labels: readonly string[]): EntryListing[] {
  const activeLabels = new Set(labels);
  return plan.declared.map((operation) => ({
    operation,
    active: entryMatches(operation.entry, activeLabels)
  }));
}
