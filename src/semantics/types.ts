/**
 * Resolved object graph.
 *
 * Everything here is produced by the interpolator or the profile merger and
 * deep-frozen before it is handed out. References are direct object links,
 * and a unit referenced by name from several places is the same object in
 * each of them.
 */

export interface ConceptUnit {
  readonly kind: "concept";
  readonly name?: string;
  readonly conceptId: number;
  readonly label?: string;
  /** Direct parents, in declared order */
  readonly parents: readonly ConceptUnit[];
  readonly notes?: string;
}

export interface EnumMember {
  readonly label: string;
  readonly conceptId: number;
}

export interface EnumUnit {
  readonly kind: "enum";
  readonly name?: string;
  readonly members: readonly EnumMember[];
  readonly notes?: string;
}

export interface GroupUnit {
  readonly kind: "group";
  readonly name?: string;
  readonly role?: string;
  /** May contain other groups; the graph is acyclic */
  readonly members: readonly SemanticUnit[];
  readonly notes?: string;
}

export type SemanticUnit = ConceptUnit | EnumUnit | GroupUnit;

export type UnitKind = SemanticUnit["kind"];

export const UNIT_KINDS: readonly UnitKind[] = ["concept", "enum", "group"];

export interface CdmProfile {
  readonly name: string;
  readonly cdmTable: string;
  readonly conceptSlot: string;
  readonly valueSlot?: string;
  readonly dateSlot: string;
  readonly notes?: string;
}

/**
 * A template whose concept references are linked but whose profile is
 * still a name.
 */
export interface InterpolatedTemplate {
  readonly name: string;
  readonly role: string;
  readonly entityConcept: SemanticUnit;
  readonly valueConcept?: SemanticUnit;
  readonly cdmProfile: string;
  readonly notes?: string;
}

export interface Template extends Omit<InterpolatedTemplate, "cdmProfile"> {
  /** Shared with every other template naming the same profile */
  readonly cdmProfile: CdmProfile;
}

export interface RegistryGroup<T = Template> {
  readonly name: string;
  readonly role?: string;
  /** Declared order */
  readonly members: readonly T[];
  readonly notes?: string;
}

export interface RegistryFragment<T = Template> {
  readonly name?: string;
  readonly groups: readonly RegistryGroup<T>[];
  /** Every template of the fragment, each exactly once */
  readonly templates: readonly T[];
}

export type InterpolatedFragment = RegistryFragment<InterpolatedTemplate>;

/** Role of the unit groups that hold "unknown" concepts. */
export const UNKNOWN_ROLE = "unknown";

export const UNKNOWN_REASONS = [
  "missing",
  "not_recorded",
  "not_applicable",
  "ambiguous",
  "mapping_failed",
  "default_value",
] as const;

export type UnknownReason = (typeof UNKNOWN_REASONS)[number];

/** A concept standing in for a value that could not be given. */
export interface UnknownValue {
  readonly conceptId: number;
  readonly label: string;
  readonly reason?: UnknownReason;
}

/** Values a compiled row may carry. */
export type RowValue = number | string | null;

/**
 * Recursively freeze an object graph. Already-frozen nodes are skipped, so
 * shared subgraphs are walked once.
 */
export function deepFreeze<T>(value: T): T {
  if (value === null || typeof value !== "object" || Object.isFrozen(value)) {
    return value;
  }
  Object.freeze(value);
  const children: unknown[] = Object.values(value);
  for (const child of children) {
    deepFreeze(child);
  }
  return value;
}
