import path from "path";
import {
  EntryParseError,
  InvalidEntryError,
  InvalidRequirementError,
  MissingTargetError
} from "./errors";
import type { DeclarationDocument, Entry, LabelRequirement } from "./types";

export const DEFAULT_SOURCE_DIR = "config";

export interface ParsedEntries {
  entries: Entry[];
  errors: EntryParseError[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function defaultSource(group: string): string {
  return path.posix.join(DEFAULT_SOURCE_DIR, group);
}

export function parseRequirement(group: string, index: number, value: unknown): LabelRequirement {
  if (typeof value === "string") {
    return { anyOf: [value] };
  }
  if (Array.isArray(value) && value.every((label): label is string => typeof label === "string")) {
    return { anyOf: [...value] };
  }
  throw new InvalidRequirementError(group, index, value);
}

export function parseEntry(
  group: string,
  index: number,
  declaration: Record<string, unknown>
): Entry {
  const { target, source, labels } = declaration;
  if (typeof target !== "string" || target.length === 0) {
    throw new MissingTargetError(group, index);
  }
  if (source !== undefined && typeof source !== "string") {
    throw new InvalidEntryError(group, index, "Field source must be a string");
  }

  let requirements: LabelRequirement[] = [];
  if (labels !== undefined && labels !== null) {
    if (!Array.isArray(labels)) {
      throw new InvalidRequirementError(group, index, labels);
    }
    requirements = labels.map((value: unknown) => parseRequirement(group, index, value));
  }

  return {
    group,
    index,
    source: source ?? defaultSource(group),
    target,
    requirements
  };
}

/**
 * Turns the declaration document into entries. A group holds one declaration
 * or a list of them. Malformed declarations are collected as errors and
 * left out; they do not stop the rest of the document from parsing.
 */
export function parseEntries(document: DeclarationDocument): ParsedEntries {
  const entries: Entry[] = [];
  const errors: EntryParseError[] = [];

  for (const [group, value] of Object.entries(document)) {
    let declarations: unknown[];
    if (Array.isArray(value)) {
      declarations = value;
    } else if (isRecord(value)) {
      declarations = [value];
    } else {
      errors.push(new InvalidEntryError(group, 0, "Group must be a declaration or a list of declarations"));
      continue;
    }

    declarations.forEach((declaration, index) => {
      if (!isRecord(declaration)) {
        errors.push(new InvalidEntryError(group, index, "Declaration must be a mapping"));
        return;
      }
      try {
        entries.push(parseEntry(group, index, declaration));
      } catch (error) {
        if (error instanceof EntryParseError) {
          errors.push(error);
          return;
        }
        throw error;
      }
    });
  }

  return { entries, errors };
}
