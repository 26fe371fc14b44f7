export const SymlinkStatus = {
  AlreadyLinked: { tag: "AlreadyLinked", label: "Exists" },
  Created: { tag: "Created", label: "Created" },
  CreatedDryRun: { tag: "CreatedDryRun", label: "Created (Not executed)" },
  Overridden: { tag: "Overridden", label: "Overridden" },
  OverriddenDryRun: { tag: "OverriddenDryRun", label: "Overridden (Not executed)" },
  SkippedSourceMissing: { tag: "SkippedSourceMissing", label: "Skipped (source not found)" },
  SkippedForeignFile: { tag: "SkippedForeignFile", label: "Skipped (not a symlink)" },
  Removed: { tag: "Removed", label: "Removed" },
  RemovedDryRun: { tag: "RemovedDryRun", label: "Removed (Not executed)" }
} as const;

export type SymlinkStatusTag = keyof typeof SymlinkStatus;

export type SymlinkStatus = (typeof SymlinkStatus)[SymlinkStatusTag];

/** Statuses that report a mutation, real or simulated. */
export type MutatingStatusTag = "Created" | "Overridden" | "Removed";

const DRY_RUN_COUNTERPARTS: Record<MutatingStatusTag, SymlinkStatusTag> = {
  Created: "CreatedDryRun",
  Overridden: "OverriddenDryRun",
  Removed: "RemovedDryRun"
};

export function statusFor(tag: MutatingStatusTag, dryRun: boolean): SymlinkStatus {
  return SymlinkStatus[dryRun ? DRY_RUN_COUNTERPARTS[tag] : tag];
}

/**
 * Maps a real-run tag to the tag a dry run reports for the same decision.
 * Tags without a mutation are their own counterpart.
 */
export function toDryRun(tag: SymlinkStatusTag): SymlinkStatusTag {
  if (tag === "Created" || tag === "Overridden" || tag === "Removed") {
    return DRY_RUN_COUNTERPARTS[tag];
  }
  return tag;
}

export function isChange(tag: SymlinkStatusTag): boolean {
  return tag !== "AlreadyLinked" && !isSkip(tag);
}

export function isSkip(tag: SymlinkStatusTag): boolean {
  return tag === "SkippedSourceMissing" || tag === "SkippedForeignFile";
}
