export { runInstall, loadPlan } from "./install";
export type { InstallOptions, InstallReport, LoadedPlan } from "./install";
export { parseEntries, parseEntry, parseRequirement } from "./entries";
export { entryMatches, requirementMatches } from "./labels";
export { planOperations, resolveOperation, indexByTarget, listEntries } from "./planner";
export type { OperationPlan, EntryListing } from "./planner";
export { reconcile, applyInstall, applyRemoval, decideInstall, decideRemoval } from "./executor";
export { SymlinkStatus, toDryRun } from "./status";
export type { SymlinkStatusTag } from "./status";
export { readDeclarations, readLabels } from "./config";
export * from "./errors";
export type * from "./types";
