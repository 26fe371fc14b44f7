export class HomeError extends Error {
  public readonly code: number;

  constructor(message: string, code: number) {
    super(message);
    this.name = "HomeError";
    this.code = code;
  }
}

export const ExitCodes = {
  Success: 0,
  Failure: 1,
  Usage: 2,
  Validation: 3,
  Conflict: 4,
  Filesystem: 5
} as const;

/**
 * A declaration that could not be turned into an entry. Scoped to one
 * declaration: the rest of the document still parses.
 */
export class EntryParseError extends HomeError {
  public readonly group: string;
  public readonly index: number;

  constructor(group: string, index: number, message: string) {
    super(`[${group}#${index}] ${message}`, ExitCodes.Validation);
    this.name = "EntryParseError";
    this.group = group;
    this.index = index;
  }
}

export class MissingTargetError extends EntryParseError {
  constructor(group: string, index: number) {
    super(group, index, "Missing required string field: target");
    this.name = "MissingTargetError";
  }
}

export class InvalidRequirementError extends EntryParseError {
  public readonly value: unknown;

  constructor(group: string, index: number, value: unknown) {
    super(group, index, `Invalid label requirement: ${JSON.stringify(value) ?? String(value)}`);
    this.name = "InvalidRequirementError";
    this.value = value;
  }
}

export class InvalidEntryError extends EntryParseError {
  constructor(group: string, index: number, reason: string) {
    super(group, index, reason);
    this.name = "InvalidEntryError";
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === "object" && error !== null && "code" in error;
}
