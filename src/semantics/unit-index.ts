/**
 * Name index over raw semantic units.
 *
 * Concepts, enumerations and groups share one namespace. The index is built
 * in a single pass and places no ordering restriction on definitions: a unit
 * may reference one defined later, or in another source. Records are stored
 * as given; nothing is copied or mutated.
 */

import { DuplicateNameError } from "./errors.js";
import type { NamedRawUnit } from "./schema.js";

/**
 * Units from one origin. A parsed DefinitionSet satisfies this shape.
 */
export interface UnitSource {
  /** Label used in error messages (usually a file path) */
  readonly source?: string;
  readonly units: readonly NamedRawUnit[];
}

interface IndexEntry {
  readonly record: NamedRawUnit;
  readonly source?: string;
}

export class UnitIndex {
  private constructor(private readonly entries: ReadonlyMap<string, IndexEntry>) {}

  /**
   * @throws DuplicateNameError when two records share a name
   */
  static build(sources: Iterable<UnitSource>): UnitIndex {
    const entries = new Map<string, IndexEntry>();

    for (const { source, units } of sources) {
      for (const record of units) {
        const existing = entries.get(record.name);
        if (existing !== undefined) {
          const origins = [existing.source, source].filter(
            (label): label is string => label !== undefined
          );
          throw new DuplicateNameError(record.name, "unit", origins);
        }
        entries.set(record.name, { record, source });
      }
    }

    return new UnitIndex(entries);
  }

  get size(): number {
    return this.entries.size;
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  get(name: string): NamedRawUnit | undefined {
    return this.entries.get(name)?.record;
  }

  /** Source label a unit was defined in, if it had one. */
  sourceOf(name: string): string | undefined {
    return this.entries.get(name)?.source;
  }

  /** Names in definition order. */
  names(): string[] {
    return [...this.entries.keys()];
  }
}

/**
 * Build a unit index from one or more sources.
 *
 * @example
 *   const index = buildUnitIndex([{ source: "staging.json", units }]);
 */
export function buildUnitIndex(sources: Iterable<UnitSource>): UnitIndex {
  return UnitIndex.build(sources);
}
