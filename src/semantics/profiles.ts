/**
 * CDM profiles: shared row shapes.
 *
 * Profiles are built once per build and shared by reference. Every template
 * naming a profile ends up holding the same frozen object, so the profile
 * of a template can be compared by identity.
 */

import { DuplicateNameError, UnknownProfileError, ValueSlotNotSupportedError } from "./errors.js";
import type { RawCdmProfile } from "./schema.js";
import type {
  CdmProfile,
  InterpolatedFragment,
  InterpolatedTemplate,
  RegistryFragment,
  Template,
} from "./types.js";
import { DEFAULT_ENGINE_OPTIONS, type EngineOptions } from "../config/engine/index.js";

export type ProfileSet = ReadonlyMap<string, CdmProfile>;

export interface ProfileSource {
  readonly source?: string;
  readonly profiles: readonly RawCdmProfile[];
}

type ProfileOptions = Pick<EngineOptions, "defaultDateSuffix">;

/**
 * Build the resolved form of one profile. A missing `date_slot` is derived
 * from the table name.
 */
export function toCdmProfile(
  raw: RawCdmProfile,
  options: ProfileOptions = DEFAULT_ENGINE_OPTIONS
): CdmProfile {
  return Object.freeze({
    name: raw.name,
    cdmTable: raw.cdm_table,
    conceptSlot: raw.concept_slot,
    valueSlot: raw.value_slot ?? undefined,
    dateSlot: raw.date_slot ?? `${raw.cdm_table}${options.defaultDateSuffix}`,
    notes: raw.notes,
  });
}

/**
 * Index profiles by name.
 *
 * @throws DuplicateNameError when a profile name repeats
 */
export function indexProfiles(
  sources: Iterable<ProfileSource>,
  options: ProfileOptions = DEFAULT_ENGINE_OPTIONS
): ProfileSet {
  const profiles = new Map<string, CdmProfile>();
  const origins = new Map<string, string | undefined>();

  for (const { source, profiles: raws } of sources) {
    for (const raw of raws) {
      if (profiles.has(raw.name)) {
        const labels = [origins.get(raw.name), source].filter(
          (label): label is string => label !== undefined
        );
        throw new DuplicateNameError(raw.name, "profile", labels);
      }
      profiles.set(raw.name, toCdmProfile(raw, options));
      origins.set(raw.name, source);
    }
  }

  return profiles;
}

/**
 * Attach the shared profile to one template.
 *
 * @throws UnknownProfileError when the profile is not defined
 * @throws ValueSlotNotSupportedError when the template has a value concept
 *   but the profile has nowhere to write a value
 */
export function attachProfile(template: InterpolatedTemplate, profiles: ProfileSet): Template {
  const profile = profiles.get(template.cdmProfile);
  if (profile === undefined) {
    throw new UnknownProfileError(template.cdmProfile, template.name);
  }
  if (template.valueConcept !== undefined && profile.valueSlot === undefined) {
    throw new ValueSlotNotSupportedError(template.name, profile.name);
  }
  return Object.freeze({ ...template, cdmProfile: profile });
}

/**
 * Replace profile names with profile objects throughout a fragment.
 * A template listed in several groups maps to one merged template.
 */
export function mergeProfiles(
  fragment: InterpolatedFragment,
  profiles: ProfileSet
): RegistryFragment {
  const merged = new Map<InterpolatedTemplate, Template>();

  const merge = (template: InterpolatedTemplate): Template => {
    let result = merged.get(template);
    if (result === undefined) {
      result = attachProfile(template, profiles);
      merged.set(template, result);
    }
    return result;
  };

  const templates = Object.freeze(fragment.templates.map(merge));
  const groups = Object.freeze(
    fragment.groups.map((group) =>
      Object.freeze({ ...group, members: Object.freeze(group.members.map(merge)) })
    )
  );

  return Object.freeze({ name: fragment.name, groups, templates });
}
