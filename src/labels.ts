import type { Entry, LabelRequirement } from "./types";

export function requirementMatches(
  requirement: LabelRequirement,
  activeLabels: ReadonlySet<string>
): boolean {
  return requirement.anyOf.some((label) => activeLabels.has(label));
}

/** Every requirement must hold; an entry without requirements always matches. */
export function entryMatches(entry: Entry, activeLabels: ReadonlySet<string>): boolean {
  return entry.requirements.every((requirement) => requirementMatches(requirement, activeLabels));
}
