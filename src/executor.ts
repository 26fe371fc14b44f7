import fs from "fs/promises";
import path from "path";
import { ExitCodes, HomeError } from "./errors";
import {
  describeError,
  ensureDir,
  fileExists,
  isSymlink,
  pathExists,
  resolveLenient,
  resolveLink
} from "./filesystem";
import type { OperationPlan } from "./planner";
import { SymlinkStatus, statusFor } from "./status";
import type { Operation, SymlinkResult } from "./types";

export interface ExecutorOptions {
  repoRoot: string;
  dryRun: boolean;
  onResult?: (result: SymlinkResult) => void;
}

export interface ExecutionContext {
  /** Repository root with its own symlinks resolved. */
  managedRoot: string;
  dryRun: boolean;
}

export type InstallDecision =
  | { action: "keep"; status: SymlinkStatus }
  | { action: "create" }
  | { action: "override" };

export type RemovalDecision = { action: "keep" } | { action: "remove" };

export async function createContext(repoRoot: string, dryRun: boolean): Promise<ExecutionContext> {
  return { managedRoot: await resolveLenient(repoRoot), dryRun };
}

/**
 * Inspects the live filesystem and decides what installing `operation`
 * takes. Never mutates anything, so real and dry runs share it.
 */
export async function decideInstall(
  operation: Operation,
  context: ExecutionContext
): Promise<InstallDecision> {
  if (!(await pathExists(operation.sourcePath))) {
    return { action: "keep", status: SymlinkStatus.SkippedSourceMissing };
  }

  if (await isSymlink(operation.targetPath)) {
    const existing = await resolveLink(operation.targetPath, context.managedRoot);
    const source = await resolveLink(operation.sourcePath, context.managedRoot);
    if (existing.kind === "broken" || source.kind === "broken") {
      return { action: "keep", status: SymlinkStatus.AlreadyLinked };
    }
    if (existing.path === source.path) {
      return { action: "keep", status: SymlinkStatus.AlreadyLinked };
    }
    // A stale link into the repository is ours to repoint.
    if (existing.kind === "resolved") {
      return { action: "override" };
    }
    // Links the user made elsewhere are left alone.
    return { action: "keep", status: SymlinkStatus.AlreadyLinked };
  }

  if (await fileExists(operation.targetPath)) {
    return { action: "keep", status: SymlinkStatus.SkippedForeignFile };
  }

  return { action: "create" };
}

/** Only a link resolving to the operation's own source may be removed. */
export async function decideRemoval(
  operation: Operation,
  context: ExecutionContext
): Promise<RemovalDecision> {
  if (!(await isSymlink(operation.targetPath))) {
    return { action: "keep" };
  }
  const existing = await resolveLink(operation.targetPath, context.managedRoot);
  const source = await resolveLink(operation.sourcePath, context.managedRoot);
  if (existing.kind === "broken" || source.kind === "broken") {
    return { action: "keep" };
  }
  return existing.path === source.path ? { action: "remove" } : { action: "keep" };
}

async function mutate(operation: Operation, verb: string, change: () => Promise<void>): Promise<void> {
  try {
    await change();
  } catch (error) {
    throw new HomeError(
      `Failed to ${verb} ${operation.targetPath} (${describeError(error)})`,
      ExitCodes.Filesystem
    );
  }
}

/** Sibling name the replacement link is built under before it is renamed into place. */
export function replacementPath(targetPath: string): string {
  return path.join(path.dirname(targetPath), `.${path.basename(targetPath)}.dothome-new`);
}

/**
 * Swaps the link at the target for one pointing at the source. The rename is
 * atomic, so on failure the old link is still in place.
 */
async function replaceLink(operation: Operation): Promise<void> {
  const staging = replacementPath(operation.targetPath);
  await fs.rm(staging, { force: true });
  await fs.symlink(operation.sourcePath, staging);
  try {
    await fs.rename(staging, operation.targetPath);
  } catch (error) {
    await fs.rm(staging, { force: true });
    throw error;
  }
}

export async function applyInstall(
  operation: Operation,
  context: ExecutionContext
): Promise<SymlinkResult> {
  const decision = await decideInstall(operation, context);

  switch (decision.action) {
    case "keep":
      return { operation, status: decision.status };
    case "create":
      if (!context.dryRun) {
        await mutate(operation, "create", async () => {
          await ensureDir(path.dirname(operation.targetPath));
          await fs.symlink(operation.sourcePath, operation.targetPath);
        });
      }
      return { operation, status: statusFor("Created", context.dryRun) };
    case "override":
      if (!context.dryRun) {
        await mutate(operation, "override", async () => {
          await replaceLink(operation);
        });
      }
      return { operation, status: statusFor("Overridden", context.dryRun) };
  }
}

export async function applyRemoval(
  operation: Operation,
  context: ExecutionContext
): Promise<SymlinkResult | null> {
  const decision = await decideRemoval(operation, context);
  if (decision.action === "keep") {
    return null;
  }
  if (!context.dryRun) {
    await mutate(operation, "remove", async () => {
      await fs.unlink(operation.targetPath);
    });
  }
  return { operation, status: statusFor("Removed", context.dryRun) };
}

/**
 * Installs every active operation, then removes the links left behind by
 * obsolete ones. Operations run one after another against live state; two
 * concurrent runs over the same targets are not guarded against.
 */
export async function reconcile(
  plan: Pick<OperationPlan, "active" | "obsolete">,
  options: ExecutorOptions
): Promise<SymlinkResult[]> {
  const context = await createContext(options.repoRoot, options.dryRun);
  const results: SymlinkResult[] = [];

  for (const operation of plan.active) {
    const result = await applyInstall(operation, context);
    results.push(result);
    options.onResult?.(result);
  }

  for (const operation of plan.obsolete) {
    const result = await applyRemoval(operation, context);
    if (result) {
      results.push(result);
      options.onResult?.(result);
    }
  }

  return results;
}
