/**
 * Concept traversal over the resolved graph.
 *
 * Flattening and ancestor closures are memoized by object identity. Since
 * shared subgroups are the same object wherever they appear, each is walked
 * once per traversal instance no matter how many templates include it.
 */

import type { ConceptUnit, GroupUnit, SemanticUnit } from "./types.js";

export class ConceptTraversal {
  private readonly flattened = new WeakMap<GroupUnit, readonly number[]>();
  private readonly ancestorClosures = new WeakMap<ConceptUnit, readonly number[]>();

  /**
   * Concept ids a unit stands for, in first-seen order without repeats:
   * a concept its own id, an enumeration every member id, a group the
   * flattened ids of its members.
   */
  conceptIds(unit: SemanticUnit): readonly number[] {
    switch (unit.kind) {
      case "concept":
        return [unit.conceptId];
      case "enum":
        return unique(unit.members.map((member) => member.conceptId));
      case "group":
        return this.flattenGroup(unit);
    }
  }

  /**
   * Reflexive ancestor closure: the concept itself, then its parents depth
   * first in declared order.
   */
  ancestors(concept: ConceptUnit): readonly number[] {
    const cached = this.ancestorClosures.get(concept);
    if (cached !== undefined) {
      return cached;
    }

    const ids = new Set<number>([concept.conceptId]);
    for (const parent of concept.parents) {
      for (const id of this.ancestors(parent)) {
        ids.add(id);
      }
    }

    const closure = Object.freeze([...ids]);
    this.ancestorClosures.set(concept, closure);
    return closure;
  }

  /** Every concept object reachable from a unit, parents included. */
  collectConcepts(unit: SemanticUnit, into: Set<ConceptUnit> = new Set()): Set<ConceptUnit> {
    switch (unit.kind) {
      case "concept":
        if (!into.has(unit)) {
          into.add(unit);
          for (const parent of unit.parents) {
            this.collectConcepts(parent, into);
          }
        }
        break;
      case "group":
        for (const member of unit.members) {
          this.collectConcepts(member, into);
        }
        break;
      case "enum":
        break;
    }
    return into;
  }

  private flattenGroup(group: GroupUnit): readonly number[] {
    const cached = this.flattened.get(group);
    if (cached !== undefined) {
      return cached;
    }

    const ids = new Set<number>();
    for (const member of group.members) {
      for (const id of this.conceptIds(member)) {
        ids.add(id);
      }
    }

    const result = Object.freeze([...ids]);
    this.flattened.set(group, result);
    return result;
  }
}

function unique(ids: readonly number[]): readonly number[] {
  return Object.freeze([...new Set(ids)]);
}
