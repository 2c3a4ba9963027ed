/**
 * Profile Merger Tests
 *
 * Run with: npx tsx src/semantics/profiles.test.ts
 */

import { describe, test } from "node:test";
import { strict as assert } from "node:assert";
import { indexProfiles, mergeProfiles, toCdmProfile } from "./profiles.js";
import {
  DuplicateNameError,
  UnknownProfileError,
  ValueSlotNotSupportedError,
} from "./errors.js";
import type { RawCdmProfile } from "./schema.js";
import type { ConceptUnit, InterpolatedFragment, InterpolatedTemplate } from "./types.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

const OBSERVATION_STRING: RawCdmProfile = {
  name: "observation_string",
  cdm_table: "observation",
  concept_slot: "observation_concept_id",
  value_slot: "value_as_string",
};

const CONDITION_CONCEPT: RawCdmProfile = {
  name: "condition_concept",
  cdm_table: "condition_occurrence",
  concept_slot: "condition_concept_id",
  value_slot: null,
  date_slot: "condition_start_date",
};

const POSTCODE: ConceptUnit = Object.freeze({
  kind: "concept",
  name: "Postcode",
  conceptId: 4083591,
  parents: [],
});

function interpolated(overrides: Partial<InterpolatedTemplate> = {}): InterpolatedTemplate {
  return { name: "postcode", role: "demographic", entityConcept: POSTCODE, cdmProfile: "observation_string", ...overrides };
}

// ═══════════════════════════════════════════════════════════════════════════
// PROFILE INDEX
// ═══════════════════════════════════════════════════════════════════════════

describe("toCdmProfile", () => {
  test("derives the date slot from the table name", () => {
    const profile = toCdmProfile(OBSERVATION_STRING);

    assert.equal(profile.dateSlot, "observation_date");
    assert.equal(profile.valueSlot, "value_as_string");
    assert.ok(Object.isFrozen(profile));
  });

  test("keeps an explicit date slot and maps a null value slot to undefined", () => {
    const profile = toCdmProfile(CONDITION_CONCEPT);

    assert.equal(profile.dateSlot, "condition_start_date");
    assert.equal(profile.valueSlot, undefined);
  });

  test("honors a configured date suffix", () => {
    assert.equal(toCdmProfile(OBSERVATION_STRING, { defaultDateSuffix: "_datetime" }).dateSlot, "observation_datetime");
  });
});

describe("indexProfiles", () => {
  test("rejects repeated profile names", () => {
    assert.throws(
      () =>
        indexProfiles([
          { source: "a.json", profiles: [OBSERVATION_STRING] },
          { source: "b.json", profiles: [OBSERVATION_STRING] },
        ]),
      (err: unknown) => {
        assert.ok(err instanceof DuplicateNameError);
        assert.equal(err.namespace, "profile");
        assert.equal(err.message, 'Duplicate profile name "observation_string" (defined in a.json and b.json)');
        return true;
      }
    );
  });

  test("does not mutate the raw profiles", () => {
    indexProfiles([{ profiles: [OBSERVATION_STRING] }]);
    assert.equal(OBSERVATION_STRING.date_slot, undefined);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// MERGE
// ═══════════════════════════════════════════════════════════════════════════

describe("mergeProfiles", () => {
  const profiles = indexProfiles([{ profiles: [OBSERVATION_STRING, CONDITION_CONCEPT] }]);

  test("gives every template the shared profile instance", () => {
    const first = interpolated();
    const second = interpolated({ name: "postcode_alt" });
    const fragment: InterpolatedFragment = { groups: [], templates: [first, second] };

    const merged = mergeProfiles(fragment, profiles);

    assert.equal(merged.templates[0]?.cdmProfile, profiles.get("observation_string"));
    assert.equal(merged.templates[0]?.cdmProfile, merged.templates[1]?.cdmProfile);
    assert.equal(first.cdmProfile, "observation_string");
  });

  test("keeps template identity across groups", () => {
    const shared = interpolated();
    const fragment: InterpolatedFragment = {
      name: "demographics",
      templates: [shared],
      groups: [
        { name: "person", members: [shared] },
        { name: "address", role: "location", members: [shared] },
      ],
    };

    const merged = mergeProfiles(fragment, profiles);

    assert.equal(merged.groups[0]?.members[0], merged.templates[0]);
    assert.equal(merged.groups[1]?.members[0], merged.templates[0]);
    assert.equal(merged.groups[1]?.role, "location");
  });

  test("fails on an unknown profile name", () => {
    const fragment: InterpolatedFragment = {
      groups: [],
      templates: [interpolated({ cdmProfile: "procedure_concept" })],
    };

    assert.throws(
      () => mergeProfiles(fragment, profiles),
      (err: unknown) => {
        assert.ok(err instanceof UnknownProfileError);
        assert.equal(err.message, 'Unknown cdm_profile "procedure_concept" (used by template "postcode")');
        return true;
      }
    );
  });

  test("rejects a value concept against a profile without a value slot", () => {
    const fragment: InterpolatedFragment = {
      groups: [],
      templates: [
        interpolated({ name: "diagnosis", cdmProfile: "condition_concept", valueConcept: POSTCODE }),
      ],
    };

    assert.throws(() => mergeProfiles(fragment, profiles), ValueSlotNotSupportedError);
  });
});
