/**
 * Value sets: named bundles of units, looked up by label.
 */

import { DuplicateNameError } from "./errors.js";
import type { ReferenceInterpolator } from "./interpolator.js";
import type { RawValueSet } from "./schema.js";
import type { ConceptTraversal } from "./traversal.js";
import type { SemanticUnit } from "./types.js";

export interface RuntimeValueSet {
  readonly name: string;
  readonly notes?: string;
  /** Member units by name, in declared order */
  readonly members: ReadonlyMap<string, SemanticUnit>;
  /** Flattened concept ids of all members */
  conceptIds(): readonly number[];
  /** Concept id for a label, if any member carries it */
  lookup(label: string): number | undefined;
  labels(): readonly string[];
}

/**
 * Labels a unit contributes, in traversal order. Concepts contribute their
 * label and their unit name; enumerations their member labels; groups
 * whatever their members contribute.
 */
function collectLabels(unit: SemanticUnit, into: Map<string, number>): void {
  const add = (label: string | undefined, conceptId: number): void => {
    if (label !== undefined && !into.has(label)) {
      into.set(label, conceptId);
    }
  };

  switch (unit.kind) {
    case "concept":
      add(unit.label, unit.conceptId);
      add(unit.name, unit.conceptId);
      return;
    case "enum":
      for (const member of unit.members) {
        add(member.label, member.conceptId);
      }
      return;
    case "group":
      for (const member of unit.members) {
        collectLabels(member, into);
      }
      return;
  }
}

export function compileValueSet(
  raw: RawValueSet,
  interpolator: ReferenceInterpolator,
  traversal: ConceptTraversal
): RuntimeValueSet {
  const members = new Map<string, SemanticUnit>();
  for (const name of raw.members) {
    members.set(name, interpolator.resolveName(name, raw.name));
  }

  const labelIndex = new Map<string, number>();
  const ids = new Set<number>();
  for (const unit of members.values()) {
    collectLabels(unit, labelIndex);
    for (const id of traversal.conceptIds(unit)) {
      ids.add(id);
    }
  }

  const conceptIds = Object.freeze([...ids]);
  const labels = Object.freeze([...labelIndex.keys()]);

  return Object.freeze({
    name: raw.name,
    notes: raw.notes,
    members,
    conceptIds: () => conceptIds,
    lookup: (label: string) => labelIndex.get(label),
    labels: () => labels,
  });
}

/**
 * @throws DuplicateNameError when a value-set name repeats
 * @throws UnresolvedReferenceError when a member names no unit
 */
export function compileValueSets(
  raws: Iterable<RawValueSet>,
  interpolator: ReferenceInterpolator,
  traversal: ConceptTraversal
): RuntimeValueSet[] {
  const compiled = new Map<string, RuntimeValueSet>();
  for (const raw of raws) {
    if (compiled.has(raw.name)) {
      throw new DuplicateNameError(raw.name, "value set");
    }
    compiled.set(raw.name, compileValueSet(raw, interpolator, traversal));
  }
  return [...compiled.values()];
}
