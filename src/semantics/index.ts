/**
 * Semantic registry module.
 *
 * Usage:
 *   import { parseDefinitionSetOrThrow, buildRegistry } from "./semantics/index.js";
 *
 *   const definitions = parseDefinitionSetOrThrow(json, "staging.json");
 *   const registry = buildRegistry(definitions);
 *
 *   registry.groupMembers("TStage");
 *   registry.compileRow("postcode", { conceptId: 4083591, value: "2031" });
 */

// Errors
export {
  SemanticRegistryError,
  DuplicateNameError,
  UnresolvedReferenceError,
  CyclicReferenceError,
  ReferenceKindError,
  UnknownProfileError,
  DuplicateTemplateNameError,
  ValueSlotNotSupportedError,
  RowFieldConflictError,
  ConceptNotAllowedError,
  NoUnknownConceptError,
  type SemanticErrorCode,
  type Namespace,
} from "./errors.js";

// Schema (raw records)
export {
  CLASS_URIS,
  DefinitionSetSchema,
  SemanticUnitSchema,
  CdmProfileSchema,
  TemplateSchema,
  RegistryGroupSchema,
  RegistryFragmentSchema,
  ValueSetSchema,
  inferClassUri,
  type ClassUri,
  type DefinitionSet,
  type RawUnitRef,
  type RawConcept,
  type RawEnum,
  type RawEnumMember,
  type RawGroup,
  type RawSemanticUnit,
  type NamedRawUnit,
  type RawCdmProfile,
  type RawTemplate,
  type RawRegistryGroup,
  type RawRegistryFragment,
  type RawValueSet,
} from "./schema.js";

// Resolved objects
export {
  UNIT_KINDS,
  UNKNOWN_ROLE,
  UNKNOWN_REASONS,
  deepFreeze,
  type ConceptUnit,
  type EnumUnit,
  type EnumMember,
  type GroupUnit,
  type SemanticUnit,
  type UnitKind,
  type CdmProfile,
  type InterpolatedTemplate,
  type Template,
  type RegistryGroup,
  type RegistryFragment,
  type InterpolatedFragment,
  type RowValue,
  type UnknownReason,
  type UnknownValue,
} from "./types.js";

// Stages
export { UnitIndex, buildUnitIndex, type UnitSource } from "./unit-index.js";
export { ReferenceInterpolator } from "./interpolator.js";
export {
  indexProfiles,
  mergeProfiles,
  attachProfile,
  toCdmProfile,
  type ProfileSet,
  type ProfileSource,
} from "./profiles.js";
export { ConceptTraversal } from "./traversal.js";
export {
  createRuntimeTemplate,
  compileRow,
  allowsConcept,
  allowsValue,
  type RuntimeTemplate,
  type RowRequest,
  type CompiledRow,
  type RowOptions,
} from "./runtime-template.js";
export { compileValueSet, compileValueSets, type RuntimeValueSet } from "./value-sets.js";
export {
  RuntimeRegistry,
  RegistryCompiler,
  type TemplateFilter,
  type RuntimeRegistryGroup,
  type RegistryMetadata,
  type RegistryStats,
  type RegistryInput,
  type CompilerContext,
} from "./registry.js";

// Pipeline
export {
  parseDefinitionSet,
  parseDefinitionSetOrThrow,
  mergeDefinitionSets,
  buildRegistry,
  createRegistryHandle,
  DefinitionValidationError,
  type DefinitionIssue,
  type DefinitionParseResult,
  type BuildOptions,
  type RegistryHandle,
} from "./loader.js";
