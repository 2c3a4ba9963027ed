/**
 * Runtime templates and row compilation.
 *
 * A runtime template pairs a resolved template with the concept id sets its
 * entity and value concepts expand to. Rows are compiled against it: the
 * template decides the table and the concept/value/date columns, the caller
 * supplies the concept id, the value and the identity fields.
 */

import {
  ConceptNotAllowedError,
  RowFieldConflictError,
  ValueSlotNotSupportedError,
} from "./errors.js";
import type { ConceptTraversal } from "./traversal.js";
import type { CdmProfile, RowValue, SemanticUnit, Template } from "./types.js";
import { DEFAULT_ENGINE_OPTIONS, type EngineOptions } from "../config/engine/index.js";

export interface RuntimeTemplate {
  readonly name: string;
  readonly role: string;
  readonly template: Template;
  readonly cdmProfile: CdmProfile;
  readonly entityConcept: SemanticUnit;
  readonly valueConcept?: SemanticUnit;
  /** Flattened entity concept ids, first-seen order */
  readonly entityConceptIds: ReadonlySet<number>;
  /** Flattened value concept ids; absent when the template has no value concept */
  readonly valueConceptIds?: ReadonlySet<number>;
  readonly notes?: string;
}

export interface RowRequest {
  readonly conceptId: number;
  /** `undefined` means no value; `null` is written as a value */
  readonly value?: RowValue;
  /** Extra fields in output order; `date` goes to the profile's date slot */
  readonly identity?: Readonly<Record<string, RowValue>>;
}

export interface CompiledRow {
  readonly table: string;
  readonly row: Readonly<Record<string, RowValue>>;
}

export type RowOptions = Partial<Pick<EngineOptions, "strictConcepts" | "dateField">>;

export function createRuntimeTemplate(
  template: Template,
  traversal: ConceptTraversal
): RuntimeTemplate {
  const { valueConcept } = template;

  return Object.freeze({
    name: template.name,
    role: template.role,
    template,
    cdmProfile: template.cdmProfile,
    entityConcept: template.entityConcept,
    valueConcept,
    entityConceptIds: new Set(traversal.conceptIds(template.entityConcept)),
    valueConceptIds:
      valueConcept === undefined ? undefined : new Set(traversal.conceptIds(valueConcept)),
    notes: template.notes,
  });
}

/** Whether a concept id is one the template's entity concept expands to. */
export function allowsConcept(template: RuntimeTemplate, conceptId: number): boolean {
  return template.entityConceptIds.has(conceptId);
}

/**
 * Whether a concept id is an admissible value. Templates without a value
 * concept admit nothing.
 */
export function allowsValue(template: RuntimeTemplate, conceptId: number): boolean {
  return template.valueConceptIds?.has(conceptId) ?? false;
}

/**
 * Compile one CDM row.
 *
 * Field order: concept slot, value slot (when a value is given), then the
 * identity fields in the order supplied.
 *
 * @throws ValueSlotNotSupportedError when a value is given but the profile has no value slot
 * @throws RowFieldConflictError when an identity field targets a column already written,
 *   such as a slot or the date slot reached through the date field
 * @throws ConceptNotAllowedError under `strictConcepts`, for ids outside the template's sets
 *
 * @example
 *   compileRow(postcode, {
 *     conceptId: 4083591,
 *     value: "2031",
 *     identity: { person_id: 123, date: "2024-01-01" },
 *   });
 *   // → { table: "observation", row: { observation_concept_id: 4083591,
 *   //     value_as_string: "2031", person_id: 123, observation_date: "2024-01-01" } }
 */
export function compileRow(
  template: RuntimeTemplate,
  request: RowRequest,
  options: RowOptions = {}
): CompiledRow {
  const strictConcepts = options.strictConcepts ?? DEFAULT_ENGINE_OPTIONS.strictConcepts;
  const dateField = options.dateField ?? DEFAULT_ENGINE_OPTIONS.dateField;
  const profile = template.cdmProfile;
  const { conceptId, value } = request;

  if (strictConcepts && !allowsConcept(template, conceptId)) {
    throw new ConceptNotAllowedError(template.name, conceptId, "entity");
  }

  // A Map keeps own keys such as "__proto__" that plain assignment would drop.
  const columns = new Map<string, RowValue>();
  columns.set(profile.conceptSlot, conceptId);

  if (value !== undefined) {
    if (profile.valueSlot === undefined) {
      throw new ValueSlotNotSupportedError(template.name, profile.name);
    }
    if (
      strictConcepts &&
      typeof value === "number" &&
      template.valueConceptIds !== undefined &&
      !template.valueConceptIds.has(value)
    ) {
      throw new ConceptNotAllowedError(template.name, value, "value");
    }
    columns.set(profile.valueSlot, value);
  }

  for (const [field, fieldValue] of Object.entries(request.identity ?? {})) {
    const column = field === dateField ? profile.dateSlot : field;
    if (columns.has(column) || column === profile.valueSlot) {
      throw new RowFieldConflictError(template.name, field, column);
    }
    columns.set(column, fieldValue);
  }

  const row: Record<string, RowValue> = Object.fromEntries(columns);
  return Object.freeze({ table: profile.cdmTable, row: Object.freeze(row) });
}
