import fs from "fs/promises";
import path from "path";
import { isErrnoException } from "./errors";
import { isWithin } from "./paths";
import type { LinkResolution } from "./types";

const MAX_LINK_HOPS = 40;

export async function ensureDir(target: string): Promise<void> {
  await fs.mkdir(target, { recursive: true });
}

/** Whether anything, a dangling symlink included, occupies `target`. */
export async function fileExists(target: string): Promise<boolean> {
  try {
    await fs.lstat(target);
    return true;
  } catch (error) {
    if (isErrnoException(error) && (error.code === "ENOENT" || error.code === "ENOTDIR")) {
      return false;
    }
    throw error;
  }
}

/** Whether `target` exists once symlinks are followed. */
export async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.stat(target);
    return true;
  } catch (error) {
    if (isErrnoException(error) && (error.code === "ENOENT" || error.code === "ENOTDIR" || error.code === "ELOOP")) {
      return false;
    }
    throw error;
  }
}

export async function isSymlink(target: string): Promise<boolean> {
  try {
    const stat = await fs.lstat(target);
    return stat.isSymbolicLink();
  } catch (error) {
    if (isErrnoException(error) && (error.code === "ENOENT" || error.code === "ENOTDIR")) {
      return false;
    }
    throw error;
  }
}

/**
 * Resolves every symlink in `target`. Where the chain ends at a missing path,
 * the part that could be resolved is kept and the missing remainder appended,
 * so a dangling link still yields the path it points at.
 */
export async function resolveLenient(target: string, hops = 0): Promise<string> {
  if (hops > MAX_LINK_HOPS) {
    throw new Error(`Too many levels of symbolic links: ${target}`);
  }
  const absolute = path.resolve(target);
  try {
    return await fs.realpath(absolute);
  } catch (error) {
    if (!isErrnoException(error) || error.code !== "ENOENT") {
      throw error;
    }
  }

  const parent = path.dirname(absolute);
  if (parent === absolute) {
    return absolute;
  }
  const resolvedParent = await resolveLenient(parent, hops + 1);
  const candidate = path.join(resolvedParent, path.basename(absolute));
  if (await isSymlink(candidate)) {
    const link = await fs.readlink(candidate);
    return await resolveLenient(path.resolve(resolvedParent, link), hops + 1);
  }
  return candidate;
}

/**
 * Resolves the symlink at `target` and places the result relative to the
 * managed root. Failure to resolve is reported, not thrown.
 */
export async function resolveLink(target: string, managedRoot: string): Promise<LinkResolution> {
  let resolved: string;
  try {
    resolved = await resolveLenient(target);
  } catch (error) {
    return { kind: "broken", reason: describeError(error) };
  }
  if (isWithin(managedRoot, resolved)) {
    return { kind: "resolved", path: resolved };
  }
  return { kind: "out-of-scope", path: resolved };
}

export function describeError(error: unknown): string {
  if (isErrnoException(error) && error.code) {
    const message = error instanceof Error ? error.message : String(error);
    return `${error.code}: ${message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
