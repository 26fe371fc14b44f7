import { HomeError, ExitCodes } from "./errors";

export type Command = "install" | "list" | "doctor";

const COMMANDS: readonly Command[] = ["install", "list", "doctor"];

export interface ParsedArgs {
  command: Command | null;
  unknown?: string;
  root?: string;
  dryRun: boolean;
  strict: boolean;
  help: boolean;
}

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

export function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  const result: ParsedArgs = {
    command: null,
    dryRun: false,
    strict: false,
    help: false
  };

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (!result.command && !result.unknown && !arg.startsWith("-")) {
      if (isCommand(arg)) {
        result.command = arg;
      } else {
        result.unknown = arg;
      }
      continue;
    }
    if (arg === "--root") {
      const value = args[i + 1];
      if (value === undefined || value.length === 0 || value.startsWith("-")) {
        throw new HomeError("Option --root requires a path", ExitCodes.Usage);
      }
      result.root = value;
      i += 1;
      continue;
    }
    if (arg === "--dry-run") {
      result.dryRun = true;
      continue;
    }
    if (arg === "--strict") {
      result.strict = true;
      continue;
    }
    if (arg === "--help" || arg === "-h") {
      result.help = true;
      continue;
    }
    throw new HomeError(`Unknown option: ${arg}`, ExitCodes.Usage);
  }

  return result;
}
