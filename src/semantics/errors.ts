/**
 * Error taxonomy for registry resolution.
 *
 * Every error here is structural: it points at a definition that has to be
 * fixed. None of them is transient, so none is ever retried.
 */

export type SemanticErrorCode =
  | "duplicate_name"
  | "unresolved_reference"
  | "cyclic_reference"
  | "reference_kind"
  | "unknown_profile"
  | "duplicate_template_name"
  | "value_slot_not_supported"
  | "row_field_conflict"
  | "concept_not_allowed"
  | "no_unknown_concept";

/** Namespaces that names are unique within. */
export type Namespace = "unit" | "profile" | "template" | "registry group" | "value set";

function annotate(label: string, value: string | undefined): string {
  return value !== undefined ? ` (${label} ${value})` : "";
}

export abstract class SemanticRegistryError extends Error {
  abstract readonly code: SemanticErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }

  /**
   * Format for display.
   */
  format(): string {
    return `[${this.code}] ${this.message}`;
  }
}

export class DuplicateNameError extends SemanticRegistryError {
  readonly code = "duplicate_name";

  constructor(
    public readonly duplicateName: string,
    public readonly namespace: Namespace = "unit",
    public readonly sources: readonly string[] = []
  ) {
    super(
      `Duplicate ${namespace} name "${duplicateName}"` +
        annotate("defined in", sources.length > 0 ? sources.join(" and ") : undefined)
    );
  }
}

export class UnresolvedReferenceError extends SemanticRegistryError {
  readonly code = "unresolved_reference";

  constructor(
    public readonly reference: string,
    public readonly namespace: Namespace = "unit",
    public readonly referencedFrom?: string
  ) {
    super(
      `Unresolved ${namespace} reference "${reference}"` +
        annotate("referenced from", referencedFrom && `"${referencedFrom}"`)
    );
  }
}

export class CyclicReferenceError extends SemanticRegistryError {
  readonly code = "cyclic_reference";

  /**
   * @param cycle - Names along the cycle; first and last entries are the same
   */
  constructor(public readonly cycle: readonly string[]) {
    super(`Cyclic reference: ${cycle.join(" → ")}`);
  }
}

export class ReferenceKindError extends SemanticRegistryError {
  readonly code = "reference_kind";

  constructor(
    public readonly reference: string,
    public readonly expected: string,
    public readonly actual: string
  ) {
    super(`Reference "${reference}" must be a ${expected}, got ${actual}`);
  }
}

export class UnknownProfileError extends SemanticRegistryError {
  readonly code = "unknown_profile";

  constructor(
    public readonly profileName: string,
    public readonly templateName?: string
  ) {
    super(
      `Unknown cdm_profile "${profileName}"` +
        annotate("used by template", templateName && `"${templateName}"`)
    );
  }
}

export class DuplicateTemplateNameError extends SemanticRegistryError {
  readonly code = "duplicate_template_name";

  constructor(
    public readonly templateName: string,
    public readonly fragments: readonly string[] = []
  ) {
    super(
      `Duplicate template name "${templateName}"` +
        annotate("in fragments", fragments.length > 0 ? fragments.join(" and ") : undefined)
    );
  }
}

export class ValueSlotNotSupportedError extends SemanticRegistryError {
  readonly code = "value_slot_not_supported";

  constructor(
    public readonly templateName: string,
    public readonly profileName: string
  ) {
    super(
      `Template "${templateName}" carries a value but profile "${profileName}" has no value_slot`
    );
  }
}

export class RowFieldConflictError extends SemanticRegistryError {
  readonly code = "row_field_conflict";

  constructor(
    public readonly templateName: string,
    public readonly field: string,
    public readonly column: string = field
  ) {
    super(
      field === column
        ? `Identity field "${field}" collides with a column of template "${templateName}"`
        : `Identity field "${field}" writes column "${column}", which collides with a column of template "${templateName}"`
    );
  }
}

export class ConceptNotAllowedError extends SemanticRegistryError {
  readonly code = "concept_not_allowed";

  constructor(
    public readonly templateName: string,
    public readonly conceptId: number,
    public readonly slot: "entity" | "value"
  ) {
    super(`Concept ${conceptId} is not an allowed ${slot} concept for template "${templateName}"`);
  }
}

export class NoUnknownConceptError extends SemanticRegistryError {
  readonly code = "no_unknown_concept";

  constructor(public readonly role: string) {
    super(`No concepts registered under the "${role}" role`);
  }
}
