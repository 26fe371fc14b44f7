import test from "node:test";
import assert from "node:assert/strict";
import { entryMatches, requirementMatches } from "../src/labels";
import type { Entry, LabelRequirement } from "../src/types";

function entryWith(requirements: LabelRequirement[]): Entry {
  return { group: "sample", index: 0, source: "config/sample", target: "~/.sample", requirements };
}

void test("a requirement is satisfied by any one of its labels", () => {
  const requirement = { anyOf: ["a", "b"] };
  assert.equal(requirementMatches(requirement, new Set(["b"])), true);
  assert.equal(requirementMatches(requirement, new Set(["a", "b"])), true);
  assert.equal(requirementMatches(requirement, new Set(["c"])), false);
  assert.equal(requirementMatches(requirement, new Set()), false);
});

void test("an empty requirement never matches", () => {
  assert.equal(requirementMatches({ anyOf: [] }, new Set(["a"])), false);
});

void test("an entry without requirements always matches", () => {
  assert.equal(entryMatches(entryWith([]), new Set()), true);
  assert.equal(entryMatches(entryWith([]), new Set(["work"])), true);
});

void test("requirements combine with AND, labels inside one with OR", () => {
  const entry = entryWith([{ anyOf: ["a", "b"] }, { anyOf: ["c"] }]);

  assert.equal(entryMatches(entry, new Set(["b", "c"])), true);
  assert.equal(entryMatches(entry, new Set(["a", "c"])), true);
  assert.equal(entryMatches(entry, new Set(["b"])), false);
  assert.equal(entryMatches(entry, new Set(["c"])), false);
  assert.equal(entryMatches(entry, new Set(["d", "c"])), false);
});
