import fs from "fs/promises";
import path from "path";
import { parse, YAMLParseError } from "yaml";
import { HomeError, ExitCodes, isErrnoException } from "./errors";
import type { DeclarationDocument } from "./types";

export const DECLARATIONS_FILE = "home.yml";
export const LABELS_FILE = "config.yml";
export const DEFAULT_ROOT = "~/.home";
export const ROOT_ENV_VAR = "DOTHOME_ROOT";

export function getDeclarationsPath(root: string): string {
  return path.join(root, DECLARATIONS_FILE);
}

export function getLabelsPath(root: string): string {
  return path.join(root, LABELS_FILE);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function formatYamlError(error: unknown, filePath: string): HomeError {
  if (error instanceof YAMLParseError) {
    const linePos = error.linePos?.[0];
    const location = linePos ? ` (line ${linePos.line}, col ${linePos.col})` : "";
    return new HomeError(`Invalid YAML in ${filePath}${location}: ${error.message}`, ExitCodes.Validation);
  }
  if (error instanceof Error) {
    return new HomeError(`Invalid YAML in ${filePath}: ${error.message}`, ExitCodes.Validation);
  }
  return new HomeError(`Invalid YAML in ${filePath}`, ExitCodes.Validation);
}

/**
 * Reads the group declarations. A missing or malformed document stops the
 * run before any operation is attempted.
 */
export async function readDeclarations(root: string): Promise<DeclarationDocument> {
  const filePath = getDeclarationsPath(root);
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      throw new HomeError(`Missing declarations: ${filePath}`, ExitCodes.Validation);
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = parse(raw, { prettyErrors: true });
  } catch (error) {
    throw formatYamlError(error, filePath);
  }

  // An empty file declares nothing.
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new HomeError(`Invalid declarations format in ${filePath}`, ExitCodes.Validation);
  }
  return parsed;
}

/**
 * Reads the active labels. Never fails: a missing, unreadable or malformed
 * document means no labels are active.
 */
export async function readLabels(root: string): Promise<string[]> {
  let parsed: unknown;
  try {
    const raw = await fs.readFile(getLabelsPath(root), "utf8");
    parsed = parse(raw);
  } catch (_error) {
    return [];
  }
  if (!isRecord(parsed) || !Array.isArray(parsed.labels)) {
    return [];
  }
  return parsed.labels.filter((label): label is string => typeof label === "string");
}
