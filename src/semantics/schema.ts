/**
 * Definition schema: raw records as authored.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * WIRE FORMAT
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Definitions arrive as parsed records with snake_case fields and string
 * cross-references:
 *
 *   units       Concepts, enumerations and groups sharing ONE namespace
 *   profiles    CDM row shapes (table + concept/value/date columns)
 *   fragments   Registry groups of templates binding units to profiles
 *   value_sets  Named bundles of units
 *
 * A semantic unit carries a `class_uri` tag ("OmopConcept", "OmopEnum",
 * "OmopGroup"). The tag is turned into a closed discriminated union here, at
 * parse time, so nothing downstream inspects types at runtime. Inline unit
 * records may omit the tag; it is inferred from their shape:
 *
 *   concept_id    → OmopConcept
 *   enum_members  → OmopEnum
 *   members       → OmopGroup
 *
 * A reference is either a unit name or an inline unit record. After
 * resolution (see interpolator.ts) references become linked objects.
 * ═══════════════════════════════════════════════════════════════════════════
 */

import { z } from "zod";
import type { SemanticUnit } from "./types.js";

export const CLASS_URIS = ["OmopConcept", "OmopEnum", "OmopGroup"] as const;
export type ClassUri = (typeof CLASS_URIS)[number];

// ============================================================
// Raw record types
// ============================================================

/**
 * A reference to a semantic unit. Already-resolved units are accepted too,
 * so partially linked structures can be fed straight to the interpolator.
 */
export type RawUnitRef = string | RawSemanticUnit | SemanticUnit;

export interface RawConcept {
  class_uri: "OmopConcept";
  name?: string;
  concept_id: number;
  label?: string;
  parent_concepts?: RawUnitRef[];
  notes?: string;
}

export interface RawEnumMember {
  label: string;
  concept_id: number;
}

export interface RawEnum {
  class_uri: "OmopEnum";
  name?: string;
  enum_members: RawEnumMember[];
  notes?: string;
}

export interface RawGroup {
  class_uri: "OmopGroup";
  name?: string;
  role?: string;
  members: RawUnitRef[];
  notes?: string;
}

export type RawSemanticUnit = RawConcept | RawEnum | RawGroup;

/** A unit that can be indexed: it has a name. */
export type NamedRawUnit = RawSemanticUnit & { name: string };

// ============================================================
// Primitive schemas
// ============================================================

export const NameSchema = z.string().trim().min(1, "Name must not be empty");

export const ConceptIdSchema = z
  .number()
  .int("concept_id must be an integer")
  .nonnegative("concept_id must not be negative");

/**
 * Column names are opaque to the engine; only their shape is checked.
 */
export const ColumnSchema = z
  .string()
  .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, "Column names must be plain identifiers");

// ============================================================
// Semantic units
// ============================================================

export const UnitRefSchema: z.ZodType<RawUnitRef, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.union([NameSchema, SemanticUnitSchema])
);

export const ConceptSchema = z
  .object({
    class_uri: z.literal("OmopConcept"),
    name: NameSchema.optional(),
    concept_id: ConceptIdSchema,
    label: z.string().optional(),
    parent_concepts: z.array(UnitRefSchema).default([]),
    notes: z.string().optional(),
  })
  .strict();

export const EnumMemberSchema = z
  .object({
    label: z.string().min(1),
    concept_id: ConceptIdSchema,
  })
  .strict();

export const EnumSchema = z
  .object({
    class_uri: z.literal("OmopEnum"),
    name: NameSchema.optional(),
    enum_members: z.array(EnumMemberSchema).min(1, "Enumerations need at least one member"),
    notes: z.string().optional(),
  })
  .strict();

export const GroupSchema = z
  .object({
    class_uri: z.literal("OmopGroup"),
    name: NameSchema.optional(),
    role: z.string().min(1).optional(),
    members: z.array(UnitRefSchema),
    notes: z.string().optional(),
  })
  .strict();

/**
 * Add a `class_uri` to untagged inline records based on their shape.
 * Tagged records and non-objects pass through unchanged.
 */
export function inferClassUri(value: unknown): unknown {
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    return value;
  }
  if ("class_uri" in value) {
    return value;
  }
  if ("concept_id" in value) {
    return { class_uri: "OmopConcept", ...value };
  }
  if ("enum_members" in value) {
    return { class_uri: "OmopEnum", ...value };
  }
  if ("members" in value) {
    return { class_uri: "OmopGroup", ...value };
  }
  return value;
}

export const SemanticUnitSchema: z.ZodType<RawSemanticUnit, z.ZodTypeDef, unknown> =
  z.preprocess(
    inferClassUri,
    z.discriminatedUnion("class_uri", [ConceptSchema, EnumSchema, GroupSchema])
  );

export const NamedUnitSchema = SemanticUnitSchema.refine(
  (unit): unit is NamedRawUnit => typeof unit.name === "string",
  { message: "Units in the definition namespace need a name" }
);

// ============================================================
// Profiles, templates and fragments
// ============================================================

export const CdmProfileSchema = z
  .object({
    name: NameSchema,
    cdm_table: ColumnSchema,
    concept_slot: ColumnSchema,
    /** Absent or null: the profile writes only the concept slot */
    value_slot: ColumnSchema.nullable().optional(),
    /** Defaults to `<cdm_table><defaultDateSuffix>` */
    date_slot: ColumnSchema.optional(),
    notes: z.string().optional(),
  })
  .strict();

export type RawCdmProfile = z.infer<typeof CdmProfileSchema>;

export const TemplateSchema = z
  .object({
    name: NameSchema,
    role: z.string().min(1),
    entity_concept: UnitRefSchema,
    value_concept: UnitRefSchema.optional(),
    cdm_profile: NameSchema,
    notes: z.string().optional(),
  })
  .strict();

export type RawTemplate = z.infer<typeof TemplateSchema>;

export const RegistryGroupSchema = z
  .object({
    name: NameSchema,
    role: z.string().min(1).optional(),
    /** Inline templates, or names of templates in the fragment's `templates` */
    registry_members: z.array(z.union([NameSchema, TemplateSchema])).default([]),
    notes: z.string().optional(),
  })
  .strict();

export type RawRegistryGroup = z.infer<typeof RegistryGroupSchema>;

export const RegistryFragmentSchema = z
  .object({
    name: NameSchema.optional(),
    groups: z.array(RegistryGroupSchema).default([]),
    templates: z.array(TemplateSchema).default([]),
  })
  .strict();

export type RawRegistryFragment = z.infer<typeof RegistryFragmentSchema>;

export const ValueSetSchema = z
  .object({
    name: NameSchema,
    members: z.array(NameSchema).min(1, "Value sets need at least one member"),
    notes: z.string().optional(),
  })
  .strict();

export type RawValueSet = z.infer<typeof ValueSetSchema>;

// ============================================================
// Definition set
// ============================================================

export const DefinitionSetSchema = z
  .object({
    /** Where the set came from (file path, module name); used in errors */
    source: z.string().optional(),
    units: z.array(NamedUnitSchema).default([]),
    profiles: z.array(CdmProfileSchema).default([]),
    fragments: z.array(RegistryFragmentSchema).default([]),
    value_sets: z.array(ValueSetSchema).default([]),
  })
  .strict();

export type DefinitionSet = z.infer<typeof DefinitionSetSchema>;
