/**
 * Definition loader and registry build pipeline.
 *
 * Responsible for:
 * - Validating raw definition records against the schema
 * - Merging definition sets from several sources
 * - Running the build: index → interpolate → merge profiles → compile
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * BUILD STAGES
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * 1. INDEX        Unit names across all sets (duplicates fail)
 * 2. INTERPOLATE  Every unit, template and registry-group member linked
 * 3. MERGE        Profile names replaced by shared profile objects
 * 4. VALUE SETS   Member names linked, labels indexed
 * 5. COMPILE      Cross-fragment uniqueness checked, indexes built
 *
 * The first error stops the build. Nothing partial is returned.
 * ═══════════════════════════════════════════════════════════════════════════
 */

import type { ZodIssue } from "zod";
import { ReferenceInterpolator } from "./interpolator.js";
import { indexProfiles, mergeProfiles } from "./profiles.js";
import { RegistryCompiler, type RuntimeRegistry } from "./registry.js";
import { DefinitionSetSchema, type DefinitionSet } from "./schema.js";
import { ConceptTraversal } from "./traversal.js";
import { buildUnitIndex } from "./unit-index.js";
import { compileValueSets } from "./value-sets.js";
import { DEFAULT_ENGINE_OPTIONS, type EngineOptions } from "../config/engine/index.js";
import { createSilentLogger, generateBuildId, type Logger } from "../logging/index.js";

/**
 * Individual definition validation issue.
 */
export interface DefinitionIssue {
  /** Source label of the set, if known */
  source?: string;
  /** Dotted path to the invalid field */
  path: string;
  message: string;
  /** Zod error code */
  code: string;
}

/**
 * Validation error for definition sets.
 */
export class DefinitionValidationError extends Error {
  public readonly issues: DefinitionIssue[];

  constructor(message: string, issues: DefinitionIssue[]) {
    super(message);
    this.name = "DefinitionValidationError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["Definition validation failed:"];
    for (const issue of this.issues) {
      const location = issue.source !== undefined ? `[${issue.source}] ` : "";
      lines.push(`  - ${location}${issue.path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

export type DefinitionParseResult =
  | { success: true; definitions: DefinitionSet }
  | { success: false; errors: DefinitionIssue[] };

function toIssues(zodIssues: ZodIssue[], source: string | undefined): DefinitionIssue[] {
  return zodIssues.map((issue) => ({
    source,
    path: issue.path.length > 0 ? issue.path.join(".") : "(root)",
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Validate a raw definition set.
 *
 * @param source - Label recorded on the set and on any issues; overrides a
 *   `source` already present in the input
 */
export function parseDefinitionSet(input: unknown, source?: string): DefinitionParseResult {
  const result = DefinitionSetSchema.safeParse(input);

  if (!result.success) {
    return { success: false, errors: toIssues(result.error.issues, source) };
  }

  const definitions =
    source !== undefined ? { ...result.data, source } : result.data;
  return { success: true, definitions };
}

/**
 * @throws DefinitionValidationError if validation fails
 */
export function parseDefinitionSetOrThrow(input: unknown, source?: string): DefinitionSet {
  const result = parseDefinitionSet(input, source);

  if (!result.success) {
    throw new DefinitionValidationError(
      `Invalid definitions${source !== undefined ? ` in ${source}` : ""}: ` +
        `${result.errors.length} validation error(s)`,
      result.errors
    );
  }

  return result.definitions;
}

/**
 * Concatenate definition sets into one. Source labels are joined; use
 * buildRegistry with the separate sets to keep per-source error messages.
 */
export function mergeDefinitionSets(sets: readonly DefinitionSet[]): DefinitionSet {
  const sources = sets
    .map((set) => set.source)
    .filter((source): source is string => source !== undefined);

  return {
    source: sources.length > 0 ? sources.join(", ") : undefined,
    units: sets.flatMap((set) => set.units),
    profiles: sets.flatMap((set) => set.profiles),
    fragments: sets.flatMap((set) => set.fragments),
    value_sets: sets.flatMap((set) => set.value_sets),
  };
}

export interface BuildOptions {
  /** Validated engine options (see loadEngineOptions) */
  options?: Readonly<EngineOptions>;
  logger?: Logger;
}

function isSetList(
  definitions: DefinitionSet | readonly DefinitionSet[]
): definitions is readonly DefinitionSet[] {
  return Array.isArray(definitions);
}

/**
 * Build a runtime registry from parsed definitions.
 *
 * @throws SemanticRegistryError subclasses for structural problems
 *
 * @example
 *   const definitions = parseDefinitionSetOrThrow(json, "staging.json");
 *   const registry = buildRegistry(definitions, { options: loadEngineOptions() });
 */
export function buildRegistry(
  definitions: DefinitionSet | readonly DefinitionSet[],
  build: BuildOptions = {}
): RuntimeRegistry {
  const sets = isSetList(definitions) ? definitions : [definitions];
  const options = build.options ?? DEFAULT_ENGINE_OPTIONS;
  const buildId = generateBuildId();
  const logger = (build.logger ?? createSilentLogger()).child("build");

  const index = buildUnitIndex(sets);
  logger.debug("Indexed units", { buildId, units: index.size });

  const interpolator = new ReferenceInterpolator(index, logger.child("interpolate"));
  const units = interpolator.resolveAll();

  const profiles = indexProfiles(sets, options);
  const fragments = sets.flatMap((set) =>
    set.fragments.map((fragment, position) =>
      mergeProfiles(
        interpolator.resolveFragment(fragment, `${set.source ?? "definitions"}#${position}`),
        profiles
      )
    )
  );
  logger.debug("Merged profiles", {
    buildId,
    profiles: profiles.size,
    fragments: fragments.length,
  });

  const traversal = new ConceptTraversal();
  const valueSets = compileValueSets(
    sets.flatMap((set) => set.value_sets),
    interpolator,
    traversal
  );

  const registry = new RegistryCompiler({ options, logger, traversal, buildId })
    .addUnits(units)
    .addFragments(fragments)
    .addValueSets(valueSets)
    .compile();

  const stats = registry.getStats();
  logger.info("Registry built", {
    buildId,
    templates: stats.totalTemplates,
    units: stats.totalUnits,
    registryGroups: stats.totalRegistryGroups,
    valueSets: stats.totalValueSets,
  });

  return registry;
}

/**
 * Lazily built registry owned by the caller.
 */
export interface RegistryHandle {
  /** Build on first call; later calls return the same registry. */
  get(): RuntimeRegistry;
  readonly built: boolean;
}

/**
 * Wrap a build so it runs on first use. A failed build is not cached;
 * the next `get()` tries again.
 *
 * @example
 *   const registry = createRegistryHandle(() => buildRegistry(definitions));
 *   registry.get().byRole("staging");
 */
export function createRegistryHandle(build: () => RuntimeRegistry): RegistryHandle {
  let registry: RuntimeRegistry | undefined;

  return {
    get(): RuntimeRegistry {
      if (registry === undefined) {
        registry = build();
      }
      return registry;
    },
    get built(): boolean {
      return registry !== undefined;
    },
  };
}
