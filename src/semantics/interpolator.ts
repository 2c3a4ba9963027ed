/**
 * Reference interpolation.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * NAMES → LINKED OBJECTS
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Raw records refer to each other by name. The interpolator replaces every
 * name with the resolved object it denotes, depth first, and memoizes the
 * result so that two references to one name receive the same object.
 *
 * Each named unit lives in an arena slot that moves through three states:
 *
 *   raw  ──▶  resolving  ──▶  resolved
 *
 * Reaching a slot that is still `resolving` means the definitions contain a
 * cycle; the path walked so far is reported (A → B → A). When a resolution
 * fails, slots touched on the way revert to `raw`, so the interpolator can
 * still be used for other names.
 *
 * Inline records are memoized by object identity. Units that already carry
 * a `kind` are resolved objects and pass through unchanged.
 * ═══════════════════════════════════════════════════════════════════════════
 */

import {
  CyclicReferenceError,
  DuplicateTemplateNameError,
  ReferenceKindError,
  UnresolvedReferenceError,
} from "./errors.js";
import type {
  NamedRawUnit,
  RawRegistryFragment,
  RawRegistryGroup,
  RawSemanticUnit,
  RawTemplate,
  RawUnitRef,
} from "./schema.js";
import {
  deepFreeze,
  type ConceptUnit,
  type InterpolatedFragment,
  type InterpolatedTemplate,
  type RegistryGroup,
  type SemanticUnit,
} from "./types.js";
import type { UnitIndex } from "./unit-index.js";
import { createSilentLogger, type Logger } from "../logging/index.js";

type ArenaSlot =
  | { readonly state: "raw"; readonly record: NamedRawUnit }
  | { readonly state: "resolving" }
  | { readonly state: "resolved"; readonly unit: SemanticUnit };

const INLINE_LABEL = "<inline>";

function isResolved(ref: RawSemanticUnit | SemanticUnit): ref is SemanticUnit {
  return "kind" in ref;
}

function describeRef(ref: RawUnitRef): string {
  return typeof ref === "string" ? ref : (ref.name ?? INLINE_LABEL);
}

export class ReferenceInterpolator {
  private readonly arena = new Map<string, ArenaSlot>();
  private readonly inline = new WeakMap<RawSemanticUnit, SemanticUnit>();
  private readonly inlineInProgress = new WeakSet<RawSemanticUnit>();
  /** Names currently being resolved, outermost first */
  private readonly path: string[] = [];

  constructor(
    private readonly index: UnitIndex,
    private readonly logger: Logger = createSilentLogger()
  ) {
    for (const name of index.names()) {
      const record = index.get(name);
      if (record !== undefined) {
        this.arena.set(name, { state: "raw", record });
      }
    }
  }

  // ============================================================
  // Units
  // ============================================================

  /**
   * Resolve a reference of any form.
   *
   * @param referencedFrom - Name of the referring record, for error messages
   */
  resolve(ref: RawUnitRef, referencedFrom?: string): SemanticUnit {
    if (typeof ref === "string") {
      return this.resolveName(ref, referencedFrom);
    }
    if (isResolved(ref)) {
      return ref;
    }
    return this.resolveInline(ref, referencedFrom);
  }

  /**
   * @throws UnresolvedReferenceError when no unit has this name
   * @throws CyclicReferenceError when the name is reached while resolving itself
   */
  resolveName(name: string, referencedFrom?: string): SemanticUnit {
    const slot = this.arena.get(name);

    if (slot === undefined) {
      throw new UnresolvedReferenceError(name, "unit", referencedFrom);
    }

    switch (slot.state) {
      case "resolved":
        return slot.unit;

      case "resolving": {
        const start = this.path.indexOf(name);
        throw new CyclicReferenceError([...this.path.slice(start), name]);
      }

      case "raw": {
        this.arena.set(name, { state: "resolving" });
        this.path.push(name);
        try {
          const unit = this.build(slot.record, name);
          this.arena.set(name, { state: "resolved", unit });
          this.logger.debug("Resolved unit", { name, kind: unit.kind });
          return unit;
        } catch (err) {
          this.arena.set(name, slot);
          throw err;
        } finally {
          this.path.pop();
        }
      }
    }
  }

  /**
   * Resolve a reference that must denote a concept (parent links,
   * for instance).
   *
   * @throws ReferenceKindError when it denotes an enumeration or a group
   */
  resolveConcept(ref: RawUnitRef, referencedFrom?: string): ConceptUnit {
    const unit = this.resolve(ref, referencedFrom);
    if (unit.kind !== "concept") {
      throw new ReferenceKindError(describeRef(ref), "concept", unit.kind);
    }
    return unit;
  }

  /**
   * Resolve every indexed unit, surfacing errors in units that nothing
   * else references.
   */
  resolveAll(): ReadonlyMap<string, SemanticUnit> {
    const resolved = new Map<string, SemanticUnit>();
    for (const name of this.index.names()) {
      resolved.set(name, this.resolveName(name));
    }
    return resolved;
  }

  /** Whether a name has reached the `resolved` state. */
  isResolved(name: string): boolean {
    return this.arena.get(name)?.state === "resolved";
  }

  private resolveInline(record: RawSemanticUnit, referencedFrom?: string): SemanticUnit {
    const cached = this.inline.get(record);
    if (cached !== undefined) {
      return cached;
    }
    if (this.inlineInProgress.has(record)) {
      throw new CyclicReferenceError([...this.path, record.name ?? INLINE_LABEL]);
    }

    this.inlineInProgress.add(record);
    try {
      const unit = this.build(record, record.name ?? referencedFrom);
      this.inline.set(record, unit);
      return unit;
    } finally {
      this.inlineInProgress.delete(record);
    }
  }

  private build(record: RawSemanticUnit, label: string | undefined): SemanticUnit {
    switch (record.class_uri) {
      case "OmopConcept":
        return deepFreeze<ConceptUnit>({
          kind: "concept",
          name: record.name,
          conceptId: record.concept_id,
          label: record.label,
          parents: (record.parent_concepts ?? []).map((parent) =>
            this.resolveConcept(parent, label)
          ),
          notes: record.notes,
        });

      case "OmopEnum":
        return deepFreeze<SemanticUnit>({
          kind: "enum",
          name: record.name,
          members: record.enum_members.map((member) => ({
            label: member.label,
            conceptId: member.concept_id,
          })),
          notes: record.notes,
        });

      case "OmopGroup":
        return deepFreeze<SemanticUnit>({
          kind: "group",
          name: record.name,
          role: record.role,
          members: record.members.map((member) => this.resolve(member, label)),
          notes: record.notes,
        });
    }
  }

  // ============================================================
  // Templates and fragments
  // ============================================================

  /**
   * Link a template's concept references. The profile stays a name until
   * the profile merger runs.
   */
  resolveTemplate(raw: RawTemplate): InterpolatedTemplate {
    return deepFreeze<InterpolatedTemplate>({
      name: raw.name,
      role: raw.role,
      entityConcept: this.resolve(raw.entity_concept, raw.name),
      valueConcept:
        raw.value_concept === undefined ? undefined : this.resolve(raw.value_concept, raw.name),
      cdmProfile: raw.cdm_profile,
      notes: raw.notes,
    });
  }

  /**
   * Resolve a fragment. Named registry members refer to templates of the
   * same fragment; inline members are resolved in place.
   *
   * @param label - Fallback fragment name for error messages
   * @throws DuplicateTemplateNameError when the fragment defines a name twice
   */
  resolveFragment(raw: RawRegistryFragment, label?: string): InterpolatedFragment {
    const fragmentName = raw.name ?? label;
    const templates = new Map<string, InterpolatedTemplate>();

    const register = (template: RawTemplate): InterpolatedTemplate => {
      if (templates.has(template.name)) {
        throw new DuplicateTemplateNameError(
          template.name,
          fragmentName !== undefined ? [fragmentName] : []
        );
      }
      const resolved = this.resolveTemplate(template);
      templates.set(template.name, resolved);
      return resolved;
    };

    for (const template of raw.templates ?? []) {
      register(template);
    }

    const groups = (raw.groups ?? []).map((group) =>
      this.resolveGroupMembers(group, templates, register)
    );

    return deepFreeze<InterpolatedFragment>({
      name: fragmentName,
      groups,
      templates: [...templates.values()],
    });
  }

  private resolveGroupMembers(
    group: RawRegistryGroup,
    local: ReadonlyMap<string, InterpolatedTemplate>,
    register: (template: RawTemplate) => InterpolatedTemplate
  ): RegistryGroup<InterpolatedTemplate> {
    const members = (group.registry_members ?? []).map((member) => {
      if (typeof member !== "string") {
        return register(member);
      }
      const template = local.get(member);
      if (template === undefined) {
        throw new UnresolvedReferenceError(member, "template", group.name);
      }
      return template;
    });

    return {
      name: group.name,
      role: group.role,
      members,
      notes: group.notes,
    };
  }
}
