import { readDeclarations, readLabels } from "./config";
import { parseEntries } from "./entries";
import type { EntryParseError } from "./errors";
import { reconcile } from "./executor";
import { planOperations } from "./planner";
import type { OperationPlan } from "./planner";
import type { SymlinkResult } from "./types";

export interface InstallOptions {
  repoRoot: string;
  dryRun: boolean;
  homeDir?: string;
  /** Called once the plan is built, before anything is touched. */
  onPlan?: (loaded: LoadedPlan) => void;
  onResult?: (result: SymlinkResult) => void;
}

export interface InstallReport {
  labels: string[];
  plan: OperationPlan;
  results: SymlinkResult[];
  errors: EntryParseError[];
}

export interface LoadedPlan {
  labels: string[];
  plan: OperationPlan;
  errors: EntryParseError[];
}

/**
 * Reads both documents from the repository root and plans every operation.
 * Fails before planning when the declarations are missing.
 */
export async function loadPlan(repoRoot: string, homeDir?: string): Promise<LoadedPlan> {
  const document = await readDeclarations(repoRoot);
  const labels = await readLabels(repoRoot);
  const { entries, errors } = parseEntries(document);
  const plan = planOperations({ entries, repoRoot, labels, homeDir });
  return { labels, plan, errors };
}

export async function runInstall(options: InstallOptions): Promise<InstallReport> {
  const loaded = await loadPlan(options.repoRoot, options.homeDir);
  options.onPlan?.(loaded);
  const { labels, plan, errors } = loaded;
  const results = await reconcile(plan, {
    repoRoot: options.repoRoot,
    dryRun: options.dryRun,
    onResult: options.onResult
  });
  return { labels, plan, results, errors };
}
