/**
 * Runtime registry with deterministic indexing.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * COMPILED, IMMUTABLE LOOKUP STRUCTURE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * The RegistryCompiler collects profile-merged fragments, resolved units and
 * value sets, checks that template and registry-group names are unique, and
 * compiles a RuntimeRegistry. The registry provides:
 *
 * 1. INDEXES over runtime templates:
 *    - name                 → template
 *    - concept id           → templates whose entity concept expands to it
 *    - role                 → templates
 *    - registry group       → templates in declared order
 *    - profile name         → templates
 *
 * 2. CONCEPT QUERIES: flattened group members and the groups a concept
 *    belongs to, labels, ancestor and descendant closures over parent links,
 *    admission checks, and the concepts of "unknown" role groups.
 *
 * 3. ROW COMPILATION under the build's engine options.
 *
 * 4. DETERMINISM: templates are sorted by name, so the same definitions give
 *    the same indexes regardless of the order fragments were added in.
 *
 * A registry is never modified. Rebuilding produces a new one; swapping
 * registries is up to the caller.
 * ═══════════════════════════════════════════════════════════════════════════
 */

import {
  DuplicateNameError,
  DuplicateTemplateNameError,
  NoUnknownConceptError,
  ReferenceKindError,
  UnresolvedReferenceError,
} from "./errors.js";
import {
  allowsConcept,
  allowsValue,
  compileRow,
  createRuntimeTemplate,
  type CompiledRow,
  type RowRequest,
  type RuntimeTemplate,
} from "./runtime-template.js";
import { ConceptTraversal } from "./traversal.js";
import {
  UNIT_KINDS,
  UNKNOWN_ROLE,
  type CdmProfile,
  type ConceptUnit,
  type GroupUnit,
  type RegistryFragment,
  type RegistryGroup,
  type SemanticUnit,
  type Template,
  type UnitKind,
  type UnknownReason,
  type UnknownValue,
} from "./types.js";
import type { RuntimeValueSet } from "./value-sets.js";
import { DEFAULT_ENGINE_OPTIONS, type EngineOptions } from "../config/engine/index.js";
import { createSilentLogger, generateBuildId, type Logger } from "../logging/index.js";

/**
 * Template filter options. All filters are AND-combined.
 */
export interface TemplateFilter {
  role?: string;
  /** Profile name */
  profile?: string;
  cdmTable?: string;
  /** Entity concept set contains this id */
  conceptId?: number;
  registryGroup?: string;
  /** Partial match on template name, case-insensitive */
  nameContains?: string;
}

export interface RuntimeRegistryGroup {
  readonly name: string;
  readonly role?: string;
  readonly templates: readonly RuntimeTemplate[];
  readonly notes?: string;
}

export interface RegistryMetadata {
  readonly buildId: string;
  readonly createdAt: string;
  readonly fragmentCount: number;
}

export interface RegistryStats {
  totalTemplates: number;
  totalUnits: number;
  totalRegistryGroups: number;
  totalProfiles: number;
  totalValueSets: number;
  byRole: Record<string, number>;
  byUnitKind: Record<UnitKind, number>;
  uniqueConceptIds: number;
}

export interface RegistryInput {
  readonly templates: readonly Template[];
  readonly groups: readonly RegistryGroup[];
  readonly units: ReadonlyMap<string, SemanticUnit>;
  readonly valueSets: readonly RuntimeValueSet[];
  readonly options: Readonly<EngineOptions>;
  readonly traversal: ConceptTraversal;
  readonly metadata: RegistryMetadata;
}

function byName<T extends { readonly name: string }>(a: T, b: T): number {
  return a.name.localeCompare(b.name);
}

function pushTo<K, V>(index: Map<K, V[]>, key: K, value: V): void {
  const list = index.get(key);
  if (list === undefined) {
    index.set(key, [value]);
  } else {
    list.push(value);
  }
}

function freezeIndex<K, V>(index: Map<K, V[]>): ReadonlyMap<K, readonly V[]> {
  for (const list of index.values()) {
    Object.freeze(list);
  }
  return index;
}

const EMPTY: readonly RuntimeTemplate[] = Object.freeze([]);
const NONE: readonly never[] = Object.freeze([]);

interface LabelIndex {
  /** Lower-cased label → concept id, first seen wins */
  readonly byLabel: ReadonlyMap<string, number>;
  readonly byId: ReadonlyMap<number, string>;
}

/**
 * Immutable registry of runtime templates.
 *
 * @example
 *   const registry = buildRegistry(definitions);
 *
 *   registry.byRole("staging");
 *   registry.templatesForConcept(4083591);
 *   registry.compileRow("postcode", {
 *     conceptId: 4083591,
 *     value: "2031",
 *     identity: { person_id: 123, date: "2024-01-01" },
 *   });
 */
export class RuntimeRegistry {
  /**
   * All templates, sorted by name.
   */
  private readonly _templates: readonly RuntimeTemplate[];

  private readonly _byName: ReadonlyMap<string, RuntimeTemplate>;
  private readonly _byConceptId: ReadonlyMap<number, readonly RuntimeTemplate[]>;
  private readonly _byRole: ReadonlyMap<string, readonly RuntimeTemplate[]>;
  private readonly _byProfile: ReadonlyMap<string, readonly RuntimeTemplate[]>;
  private readonly _byRegistryGroup: ReadonlyMap<string, RuntimeRegistryGroup>;

  /** Units by name, sorted by name */
  private readonly _units: ReadonlyMap<string, SemanticUnit>;
  /** Every concept object reachable from units and templates, by id */
  private readonly _conceptsById: ReadonlyMap<number, readonly ConceptUnit[]>;
  /** Concept id → ids of direct children */
  private readonly _children: ReadonlyMap<number, readonly number[]>;
  /** Concept id → names of the unit groups it flattens into, sorted */
  private readonly _groupsByMember: ReadonlyMap<number, readonly string[]>;
  private readonly _groupsByRole: ReadonlyMap<string, readonly GroupUnit[]>;
  private readonly _labels: LabelIndex;
  /** Ids of the "unknown" role groups, ascending */
  private readonly _unknowns: readonly number[];
  private readonly _valueSets: ReadonlyMap<string, RuntimeValueSet>;
  private readonly _profiles: readonly CdmProfile[];

  private readonly options: Readonly<EngineOptions>;
  private readonly traversal: ConceptTraversal;

  readonly metadata: RegistryMetadata;

  private constructor(input: RegistryInput) {
    this.options = input.options;
    this.traversal = input.traversal;
    this.metadata = Object.freeze({ ...input.metadata });

    const runtimeByTemplate = new Map<Template, RuntimeTemplate>();
    for (const template of input.templates) {
      runtimeByTemplate.set(template, createRuntimeTemplate(template, this.traversal));
    }

    this._templates = Object.freeze([...runtimeByTemplate.values()].sort(byName));

    this._byName = this.buildNameIndex(this._templates);
    this._byConceptId = this.buildConceptIndex(this._templates);
    this._byRole = this.buildRoleIndex(this._templates);
    this._byProfile = this.buildProfileIndex(this._templates);
    this._byRegistryGroup = this.buildRegistryGroupIndex(input.groups, runtimeByTemplate);

    this._units = new Map([...input.units].sort(([a], [b]) => a.localeCompare(b)));
    this._conceptsById = this.buildConceptUnitIndex(this._units, this._templates);
    this._children = this.buildChildIndex(this._conceptsById);
    this._groupsByMember = this.buildGroupMemberIndex(this._units);
    this._groupsByRole = this.buildGroupRoleIndex(this._units);
    this._labels = this.buildLabelIndex(this._units, this._conceptsById);
    this._unknowns = Object.freeze(
      [
        ...new Set(
          (this._groupsByRole.get(UNKNOWN_ROLE) ?? []).flatMap((group) =>
            this.traversal.conceptIds(group)
          )
        ),
      ].sort((a, b) => a - b)
    );
    this._valueSets = new Map(
      [...input.valueSets].sort(byName).map((valueSet) => [valueSet.name, valueSet])
    );
    this._profiles = Object.freeze(
      [...new Set(this._templates.map((t) => t.cdmProfile))].sort(byName)
    );
  }

  /**
   * Create a registry from checked input. Use RegistryCompiler unless the
   * input is already known to be consistent.
   */
  static create(input: RegistryInput): RuntimeRegistry {
    return new RuntimeRegistry(input);
  }

  // ============================================================
  // Index Builders (private)
  // ============================================================

  private buildNameIndex(
    templates: readonly RuntimeTemplate[]
  ): ReadonlyMap<string, RuntimeTemplate> {
    const index = new Map<string, RuntimeTemplate>();
    for (const template of templates) {
      index.set(template.name, template);
    }
    return index;
  }

  private buildConceptIndex(
    templates: readonly RuntimeTemplate[]
  ): ReadonlyMap<number, readonly RuntimeTemplate[]> {
    const index = new Map<number, RuntimeTemplate[]>();
    for (const template of templates) {
      for (const id of template.entityConceptIds) {
        pushTo(index, id, template);
      }
    }
    return freezeIndex(index);
  }

  private buildRoleIndex(
    templates: readonly RuntimeTemplate[]
  ): ReadonlyMap<string, readonly RuntimeTemplate[]> {
    const index = new Map<string, RuntimeTemplate[]>();
    for (const template of templates) {
      pushTo(index, template.role, template);
    }
    return freezeIndex(index);
  }

  private buildProfileIndex(
    templates: readonly RuntimeTemplate[]
  ): ReadonlyMap<string, readonly RuntimeTemplate[]> {
    const index = new Map<string, RuntimeTemplate[]>();
    for (const template of templates) {
      pushTo(index, template.cdmProfile.name, template);
    }
    return freezeIndex(index);
  }

  private buildRegistryGroupIndex(
    groups: readonly RegistryGroup[],
    runtimeByTemplate: ReadonlyMap<Template, RuntimeTemplate>
  ): ReadonlyMap<string, RuntimeRegistryGroup> {
    const index = new Map<string, RuntimeRegistryGroup>();
    for (const group of [...groups].sort(byName)) {
      const templates = group.members.map((member) => {
        const runtime = runtimeByTemplate.get(member);
        if (runtime === undefined) {
          throw new UnresolvedReferenceError(member.name, "template", group.name);
        }
        return runtime;
      });
      index.set(
        group.name,
        Object.freeze({
          name: group.name,
          role: group.role,
          templates: Object.freeze(templates),
          notes: group.notes,
        })
      );
    }
    return index;
  }

  private buildConceptUnitIndex(
    units: ReadonlyMap<string, SemanticUnit>,
    templates: readonly RuntimeTemplate[]
  ): ReadonlyMap<number, readonly ConceptUnit[]> {
    const concepts = new Set<ConceptUnit>();
    for (const unit of units.values()) {
      this.traversal.collectConcepts(unit, concepts);
    }
    for (const template of templates) {
      this.traversal.collectConcepts(template.entityConcept, concepts);
      if (template.valueConcept !== undefined) {
        this.traversal.collectConcepts(template.valueConcept, concepts);
      }
    }

    const index = new Map<number, ConceptUnit[]>();
    for (const concept of concepts) {
      pushTo(index, concept.conceptId, concept);
    }
    return freezeIndex(index);
  }

  private buildChildIndex(
    conceptsById: ReadonlyMap<number, readonly ConceptUnit[]>
  ): ReadonlyMap<number, readonly number[]> {
    const index = new Map<number, Set<number>>();
    for (const concepts of conceptsById.values()) {
      for (const concept of concepts) {
        for (const parent of concept.parents) {
          const children = index.get(parent.conceptId) ?? new Set<number>();
          children.add(concept.conceptId);
          index.set(parent.conceptId, children);
        }
      }
    }

    const result = new Map<number, readonly number[]>();
    for (const [id, children] of index) {
      result.set(id, Object.freeze([...children]));
    }
    return result;
  }

  private buildGroupMemberIndex(
    units: ReadonlyMap<string, SemanticUnit>
  ): ReadonlyMap<number, readonly string[]> {
    const index = new Map<number, string[]>();
    for (const [name, unit] of units) {
      if (unit.kind !== "group") {
        continue;
      }
      for (const id of this.traversal.conceptIds(unit)) {
        pushTo(index, id, name);
      }
    }
    return freezeIndex(index);
  }

  private buildGroupRoleIndex(
    units: ReadonlyMap<string, SemanticUnit>
  ): ReadonlyMap<string, readonly GroupUnit[]> {
    const index = new Map<string, GroupUnit[]>();
    for (const unit of units.values()) {
      if (unit.kind === "group" && unit.role !== undefined) {
        pushTo(index, unit.role, unit);
      }
    }
    return freezeIndex(index);
  }

  private buildLabelIndex(
    units: ReadonlyMap<string, SemanticUnit>,
    conceptsById: ReadonlyMap<number, readonly ConceptUnit[]>
  ): LabelIndex {
    const byLabel = new Map<string, number>();
    const byId = new Map<number, string>();
    const add = (label: string, conceptId: number): void => {
      const key = label.toLowerCase();
      if (!byLabel.has(key)) {
        byLabel.set(key, conceptId);
      }
      if (!byId.has(conceptId)) {
        byId.set(conceptId, label);
      }
    };

    for (const [id, concepts] of conceptsById) {
      for (const concept of concepts) {
        if (concept.label !== undefined) {
          add(concept.label, id);
        }
      }
    }
    for (const unit of units.values()) {
      if (unit.kind === "enum") {
        for (const member of unit.members) {
          add(member.label, member.conceptId);
        }
      }
    }
    return { byLabel, byId };
  }

  // ============================================================
  // Templates
  // ============================================================

  /** All templates, sorted by name. */
  get templates(): readonly RuntimeTemplate[] {
    return this._templates;
  }

  get size(): number {
    return this._templates.length;
  }

  getTemplate(name: string): RuntimeTemplate | undefined {
    return this._byName.get(name);
  }

  /**
   * @throws UnresolvedReferenceError when no template has this name
   */
  requireTemplate(name: string): RuntimeTemplate {
    const template = this._byName.get(name);
    if (template === undefined) {
      throw new UnresolvedReferenceError(name, "template");
    }
    return template;
  }

  hasTemplate(name: string): boolean {
    return this._byName.has(name);
  }

  byRole(role: string): readonly RuntimeTemplate[] {
    return this._byRole.get(role) ?? EMPTY;
  }

  /** Roles in use, sorted. */
  roles(): string[] {
    return [...this._byRole.keys()].sort();
  }

  templatesForConcept(conceptId: number): readonly RuntimeTemplate[] {
    return this._byConceptId.get(conceptId) ?? EMPTY;
  }

  templatesForProfile(profileName: string): readonly RuntimeTemplate[] {
    return this._byProfile.get(profileName) ?? EMPTY;
  }

  /** Profiles used by at least one template, sorted by name. */
  profiles(): readonly CdmProfile[] {
    return this._profiles;
  }

  groupTemplates(registryGroup: string): readonly RuntimeTemplate[] {
    return this._byRegistryGroup.get(registryGroup)?.templates ?? EMPTY;
  }

  getRegistryGroup(name: string): RuntimeRegistryGroup | undefined {
    return this._byRegistryGroup.get(name);
  }

  /** Registry groups, sorted by name. */
  registryGroups(): RuntimeRegistryGroup[] {
    return [...this._byRegistryGroup.values()];
  }

  /**
   * Filter templates by multiple criteria.
   */
  filter(filter: TemplateFilter): RuntimeTemplate[] {
    let candidates: readonly RuntimeTemplate[] = this._templates;

    if (filter.registryGroup !== undefined) {
      candidates = this.groupTemplates(filter.registryGroup);
    } else if (filter.conceptId !== undefined) {
      candidates = this.templatesForConcept(filter.conceptId);
    } else if (filter.role !== undefined) {
      candidates = this.byRole(filter.role);
    }

    const needle = filter.nameContains?.toLowerCase();

    return candidates.filter((template) => {
      if (filter.role !== undefined && template.role !== filter.role) {
        return false;
      }
      if (filter.profile !== undefined && template.cdmProfile.name !== filter.profile) {
        return false;
      }
      if (filter.cdmTable !== undefined && template.cdmProfile.cdmTable !== filter.cdmTable) {
        return false;
      }
      if (filter.conceptId !== undefined && !template.entityConceptIds.has(filter.conceptId)) {
        return false;
      }
      if (needle !== undefined && !template.name.toLowerCase().includes(needle)) {
        return false;
      }
      return true;
    });
  }

  // ============================================================
  // Units and concepts
  // ============================================================

  unit(name: string): SemanticUnit | undefined {
    return this._units.get(name);
  }

  /** Unit names, sorted. */
  unitNames(): string[] {
    return [...this._units.keys()];
  }

  /**
   * Flattened concept ids of any named unit.
   *
   * @throws UnresolvedReferenceError when no unit has this name
   */
  conceptIdsOf(name: string): readonly number[] {
    const unit = this._units.get(name);
    if (unit === undefined) {
      throw new UnresolvedReferenceError(name, "unit");
    }
    return this.traversal.conceptIds(unit);
  }

  /**
   * Ordered, de-duplicated leaf concept ids of a named group.
   *
   * @throws UnresolvedReferenceError when no unit has this name
   * @throws ReferenceKindError when the unit is not a group
   */
  groupMembers(name: string): readonly number[] {
    const unit = this._units.get(name);
    if (unit === undefined) {
      throw new UnresolvedReferenceError(name, "unit");
    }
    if (unit.kind !== "group") {
      throw new ReferenceKindError(name, "group", unit.kind);
    }
    return this.traversal.conceptIds(unit);
  }

  /** Concept objects carrying an id (inline duplicates included). */
  conceptsWithId(conceptId: number): readonly ConceptUnit[] {
    return this._conceptsById.get(conceptId) ?? [];
  }

  /**
   * Reflexive ancestor closure: the id itself, then parents depth first.
   * Empty for ids no concept in the registry carries.
   */
  ancestorsOf(conceptId: number): readonly number[] {
    const ids = new Set<number>();
    for (const concept of this.conceptsWithId(conceptId)) {
      for (const id of this.traversal.ancestors(concept)) {
        ids.add(id);
      }
    }
    return [...ids];
  }

  /** Every concept below an id through parent links, sorted ascending. */
  descendantsOf(conceptId: number): readonly number[] {
    const seen = new Set<number>();
    const pending = [...(this._children.get(conceptId) ?? [])];

    for (let id = pending.pop(); id !== undefined; id = pending.pop()) {
      if (id === conceptId || seen.has(id)) {
        continue;
      }
      seen.add(id);
      pending.push(...(this._children.get(id) ?? []));
    }

    return [...seen].sort((a, b) => a - b);
  }

  /** Direct parent ids, in declared order. Empty for unknown ids. */
  parentsOf(conceptId: number): readonly number[] {
    const ids = new Set<number>();
    for (const concept of this.conceptsWithId(conceptId)) {
      for (const parent of concept.parents) {
        ids.add(parent.conceptId);
      }
    }
    return [...ids];
  }

  /** Label of a concept or enum member, if one carries this id. */
  labelOf(conceptId: number): string | undefined {
    return this._labels.byId.get(conceptId);
  }

  /** Concept id for a label, case-insensitive. */
  conceptIdForLabel(label: string): number | undefined {
    return this._labels.byLabel.get(label.toLowerCase());
  }

  // ============================================================
  // Group membership
  // ============================================================

  /** Names of the unit groups a concept id flattens into, sorted. */
  groupsFor(conceptId: number): readonly string[] {
    return this._groupsByMember.get(conceptId) ?? NONE;
  }

  inGroup(conceptId: number, group: string): boolean {
    return this.groupsFor(conceptId).includes(group);
  }

  /** Named unit groups declaring a role, sorted by name. */
  groupsByRole(role: string): readonly GroupUnit[] {
    return this._groupsByRole.get(role) ?? NONE;
  }

  // ============================================================
  // Unknowns
  // ============================================================

  /** Concept ids of every "unknown" role group, ascending. */
  unknowns(): readonly number[] {
    return this._unknowns;
  }

  /** Absent ids count as unknown. */
  isUnknown(conceptId: number | null | undefined): boolean {
    return conceptId === undefined || conceptId === null || this._unknowns.includes(conceptId);
  }

  /**
   * The unknown concept whose label matches a hint, else the lowest unknown id.
   *
   * @throws NoUnknownConceptError when no group has the "unknown" role
   */
  defaultUnknown(labelHint = "default unknown"): number {
    const match = this.conceptIdForLabel(labelHint);
    if (match !== undefined && this.isUnknown(match)) {
      return match;
    }
    const [fallback] = this._unknowns;
    if (fallback === undefined) {
      throw new NoUnknownConceptError(UNKNOWN_ROLE);
    }
    return fallback;
  }

  /**
   * Describe the default unknown for a hint.
   *
   * @throws NoUnknownConceptError when no group has the "unknown" role
   */
  unknownValue(labelHint?: string, reason?: UnknownReason): UnknownValue {
    const conceptId = this.defaultUnknown(labelHint);
    return Object.freeze({
      conceptId,
      label: this.labelOf(conceptId) ?? String(conceptId),
      reason,
    });
  }

  // ============================================================
  // Admission and rows
  // ============================================================

  allowsConcept(templateName: string, conceptId: number): boolean {
    return allowsConcept(this.requireTemplate(templateName), conceptId);
  }

  allowsValue(templateName: string, conceptId: number): boolean {
    return allowsValue(this.requireTemplate(templateName), conceptId);
  }

  /**
   * Compile a row with this registry's engine options.
   */
  compileRow(template: string | RuntimeTemplate, request: RowRequest): CompiledRow {
    const runtime = typeof template === "string" ? this.requireTemplate(template) : template;
    return compileRow(runtime, request, this.options);
  }

  /**
   * Compile one row per template of a role, all sharing a request.
   * Templates that do not admit the concept id are skipped.
   */
  compileRole(role: string, request: RowRequest): CompiledRow[] {
    return this.byRole(role)
      .filter((template) => allowsConcept(template, request.conceptId))
      .map((template) => compileRow(template, request, this.options));
  }

  // ============================================================
  // Value sets
  // ============================================================

  valueSet(name: string): RuntimeValueSet | undefined {
    return this._valueSets.get(name);
  }

  /** Value sets, sorted by name. */
  valueSets(): RuntimeValueSet[] {
    return [...this._valueSets.values()];
  }

  // ============================================================
  // Statistics
  // ============================================================

  getStats(): RegistryStats {
    const byRole: Record<string, number> = {};
    for (const [role, templates] of this._byRole) {
      byRole[role] = templates.length;
    }

    const byUnitKind = Object.fromEntries(UNIT_KINDS.map((kind) => [kind, 0]));
    for (const unit of this._units.values()) {
      byUnitKind[unit.kind] = (byUnitKind[unit.kind] ?? 0) + 1;
    }

    return {
      totalTemplates: this._templates.length,
      totalUnits: this._units.size,
      totalRegistryGroups: this._byRegistryGroup.size,
      totalProfiles: this._profiles.length,
      totalValueSets: this._valueSets.size,
      byRole,
      byUnitKind: {
        concept: byUnitKind.concept ?? 0,
        enum: byUnitKind.enum ?? 0,
        group: byUnitKind.group ?? 0,
      },
      uniqueConceptIds: this._byConceptId.size,
    };
  }
}

// ============================================================
// Compiler
// ============================================================

export interface CompilerContext {
  options?: Readonly<EngineOptions>;
  logger?: Logger;
  /** Shared with value-set compilation so flattening is memoized once */
  traversal?: ConceptTraversal;
  buildId?: string;
}

interface Registered<T> {
  readonly value: T;
  readonly fragment: string;
}

/**
 * Collects fragments and checks cross-fragment uniqueness.
 *
 * @example
 *   const registry = new RegistryCompiler({ options })
 *     .addUnits(units)
 *     .addFragments(fragments)
 *     .compile();
 */
export class RegistryCompiler {
  private readonly templates = new Map<string, Registered<Template>>();
  private readonly groups = new Map<string, Registered<RegistryGroup>>();
  private readonly units = new Map<string, SemanticUnit>();
  private readonly valueSets = new Map<string, RuntimeValueSet>();
  private fragmentCount = 0;

  private readonly options: Readonly<EngineOptions>;
  private readonly logger: Logger;
  private readonly traversal: ConceptTraversal;
  private readonly buildId: string;

  constructor(context: CompilerContext = {}) {
    this.options = context.options ?? DEFAULT_ENGINE_OPTIONS;
    this.logger = context.logger ?? createSilentLogger();
    this.traversal = context.traversal ?? new ConceptTraversal();
    this.buildId = context.buildId ?? generateBuildId();
  }

  /**
   * @throws DuplicateTemplateNameError when a template name is already registered
   * @throws DuplicateNameError when a registry-group name is already registered
   */
  addFragment(fragment: RegistryFragment): this {
    const label = fragment.name ?? `fragment #${this.fragmentCount + 1}`;

    const own = new Set<Template>(fragment.templates);
    for (const group of fragment.groups) {
      for (const member of group.members) {
        own.add(member);
      }
    }

    // Validate the whole fragment before registering any of it.
    const added = new Map<string, Template>();
    for (const template of own) {
      const existing = this.templates.get(template.name);
      if (existing !== undefined && existing.value !== template) {
        throw new DuplicateTemplateNameError(template.name, [existing.fragment, label]);
      }
      if (added.has(template.name)) {
        throw new DuplicateTemplateNameError(template.name, [label]);
      }
      if (existing === undefined) {
        added.set(template.name, template);
      }
    }

    const groupNames = new Set<string>();
    for (const group of fragment.groups) {
      const existing = this.groups.get(group.name);
      if (existing !== undefined) {
        throw new DuplicateNameError(group.name, "registry group", [existing.fragment, label]);
      }
      if (groupNames.has(group.name)) {
        throw new DuplicateNameError(group.name, "registry group", [label]);
      }
      groupNames.add(group.name);
    }

    this.fragmentCount += 1;
    for (const template of added.values()) {
      this.templates.set(template.name, { value: template, fragment: label });
    }
    for (const group of fragment.groups) {
      this.groups.set(group.name, { value: group, fragment: label });
    }

    this.logger.debug("Added fragment", {
      fragment: label,
      templates: own.size,
      groups: fragment.groups.length,
    });
    return this;
  }

  addFragments(fragments: Iterable<RegistryFragment>): this {
    for (const fragment of fragments) {
      this.addFragment(fragment);
    }
    return this;
  }

  /**
   * @throws DuplicateNameError when a name is bound to a different unit
   */
  addUnits(units: Iterable<readonly [string, SemanticUnit]>): this {
    for (const [name, unit] of units) {
      const existing = this.units.get(name);
      if (existing !== undefined && existing !== unit) {
        throw new DuplicateNameError(name, "unit");
      }
      this.units.set(name, unit);
    }
    return this;
  }

  /**
   * @throws DuplicateNameError when a value-set name repeats
   */
  addValueSets(valueSets: Iterable<RuntimeValueSet>): this {
    for (const valueSet of valueSets) {
      if (this.valueSets.has(valueSet.name)) {
        throw new DuplicateNameError(valueSet.name, "value set");
      }
      this.valueSets.set(valueSet.name, valueSet);
    }
    return this;
  }

  compile(): RuntimeRegistry {
    const registry = RuntimeRegistry.create({
      templates: [...this.templates.values()].map((entry) => entry.value),
      groups: [...this.groups.values()].map((entry) => entry.value),
      units: this.units,
      valueSets: [...this.valueSets.values()],
      options: this.options,
      traversal: this.traversal,
      metadata: {
        buildId: this.buildId,
        createdAt: new Date().toISOString(),
        fragmentCount: this.fragmentCount,
      },
    });

    this.logger.debug("Compiled registry", {
      buildId: this.buildId,
      templates: registry.size,
      registryGroups: registry.registryGroups().length,
    });
    return registry;
  }
}
