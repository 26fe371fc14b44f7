#!/usr/bin/env node
import { parseArgs } from "./args";
import { DEFAULT_ROOT, ROOT_ENV_VAR } from "./config";
import { HomeError, ExitCodes } from "./errors";
import { loadPlan, runInstall } from "./install";
import { resolvePath } from "./paths";
import { listEntries } from "./planner";
import {
  formatDuplicate,
  formatListing,
  formatParseError,
  formatResult,
  formatSummary,
  summarize
} from "./report";

function printHelp(): void {
  const lines = [
    "dothome <command> [options]",
    "",
    "Commands:",
    "  install     Create symlinks from home.yml (filtered by labels in config.yml)",
    "  list        List declared entries and whether they are active",
    "  doctor      Validate home.yml",
    "",
    "Options:",
    `  --root <path>  Repository root (default: $${ROOT_ENV_VAR} or ${DEFAULT_ROOT})`,
    "  --dry-run      Show actions without executing them",
    "  --strict       Fail when a declaration cannot be parsed (default: skip it)",
    "  -h, --help     Show help",
    "",
    "Run one instance at a time: concurrent runs over the same targets race."
  ];
  console.log(lines.join("\n"));
}

function resolveRepoRoot(explicit?: string): string {
  if (explicit && explicit.length > 0) {
    return resolvePath(explicit, process.env);
  }
  const envRoot = process.env[ROOT_ENV_VAR];
  if (envRoot && envRoot.length > 0) {
    return resolvePath(envRoot, process.env);
  }
  return resolvePath(DEFAULT_ROOT, process.env);
}

async function run(): Promise<void> {
  const args = parseArgs(process.argv);
  if (args.unknown) {
    throw new HomeError(`Unknown command: ${args.unknown}`, ExitCodes.Usage);
  }
  if (args.help || !args.command) {
    printHelp();
    return;
  }

  const repoRoot = resolveRepoRoot(args.root);

  switch (args.command) {
    case "install": {
      const report = await runInstall({
        repoRoot,
        dryRun: args.dryRun,
        onPlan: ({ plan, errors }) => {
          errors.forEach((error) => console.warn(formatParseError(error)));
          plan.duplicates.forEach((duplicate) => console.warn(formatDuplicate(duplicate)));
        },
        onResult: (result) => console.log(formatResult(result))
      });
      const summary = summarize(report.results, report.plan.active.length);
      formatSummary(summary).forEach((line) => console.log(line));
      if (args.strict && report.errors.length > 0) {
        process.exitCode = ExitCodes.Validation;
      }
      return;
    }
    case "list": {
      const { labels, plan } = await loadPlan(repoRoot);
      listEntries(plan, labels).forEach((listing) => console.log(formatListing(listing)));
      return;
    }
    case "doctor": {
      const { plan, errors } = await loadPlan(repoRoot);
      errors.forEach((error) => console.error(error.message));
      plan.duplicates.forEach((duplicate) => console.error(formatDuplicate(duplicate)));
      if (errors.length > 0 || plan.duplicates.length > 0) {
        process.exitCode = ExitCodes.Validation;
        return;
      }
      console.log("Declarations OK");
      return;
    }
  }
}

run().catch((error: unknown) => {
  if (error instanceof HomeError) {
    console.error(error.message);
    process.exit(error.code);
  }
  if (error instanceof Error) {
    console.error(error.message);
  } else {
    console.error("Unexpected error");
  }
  process.exit(ExitCodes.Failure);
});
