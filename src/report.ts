import chalk from "chalk";
import { isChange, isSkip } from "./status";
import type { SymlinkStatusTag } from "./status";
import type { EntryParseError } from "./errors";
import type { EntryListing } from "./planner";
import type { DuplicateTarget, SymlinkResult } from "./types";

type Colorizer = (text: string) => string;

export interface ReportSummary {
  planned: number;
  changed: number;
  skipped: number;
}

function statusColor(tag: SymlinkStatusTag, palette: chalk.Chalk): Colorizer {
  switch (tag) {
    case "AlreadyLinked":
      return palette.gray;
    case "Created":
    case "CreatedDryRun":
    case "Overridden":
    case "OverriddenDryRun":
      return palette.green;
    case "SkippedSourceMissing":
      return palette.red;
    case "SkippedForeignFile":
    case "Removed":
    case "RemovedDryRun":
      return palette.yellow;
  }
}

export function formatResult(result: SymlinkResult, palette: chalk.Chalk = chalk): string {
  const { operation, status } = result;
  const group = `[${palette.cyan(operation.entry.group)}]`;
  if (status.tag === "SkippedSourceMissing") {
    return `${group} ${palette.red("Source not found")} -> ${operation.sourcePath}`;
  }
  const color = statusColor(status.tag, palette);
  return `${group} ${color(status.label)} -> ${operation.targetPath}`;
}

export function formatParseError(error: EntryParseError): string {
  return `Skipping declaration ${error.message}`;
}

export function formatDuplicate(duplicate: DuplicateTarget): string {
  const { kept, dropped, targetPath } = duplicate;
  return (
    `Duplicate target ${targetPath}: [${dropped.group}#${dropped.index}] ignored, ` +
    `[${kept.group}#${kept.index}] kept`
  );
}

export function formatListing(listing: EntryListing): string {
  const { operation, active } = listing;
  const { group, index } = operation.entry;
  return `${active ? "active" : "inactive"}: [${group}#${index}] ${operation.targetPath}`;
}

export function summarize(results: readonly SymlinkResult[], planned: number): ReportSummary {
  return {
    planned,
    changed: results.filter((result) => isChange(result.status.tag)).length,
    skipped: results.filter((result) => isSkip(result.status.tag)).length
  };
}

export function formatSummary(summary: ReportSummary): string[] {
  return [
    `Planned: ${summary.planned}`,
    `Changed: ${summary.changed}`,
    `Skipped: ${summary.skipped}`
  ];
}
