/**
 * Definition Loader and Build Pipeline Tests
 *
 * Run with: npx tsx src/semantics/loader.test.ts
 *
 * These tests verify:
 *   1. Valid definitions parse; invalid ones fail with structured issues
 *   2. Builds span several definition sets
 *   3. Structural errors stop the build
 *   4. Registry handles build lazily, once
 */

import { describe, test } from "node:test";
import { strict as assert } from "node:assert";
import {
  buildRegistry,
  createRegistryHandle,
  DefinitionValidationError,
  mergeDefinitionSets,
  parseDefinitionSet,
  parseDefinitionSetOrThrow,
} from "./loader.js";
import {
  CyclicReferenceError,
  DuplicateNameError,
  UnresolvedReferenceError,
  ValueSlotNotSupportedError,
} from "./errors.js";
import { createLogger, type LogLevel } from "../logging/index.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Concepts and profiles from one source...
 */
const VOCABULARY = {
  units: [
    { class_uri: "OmopConcept", name: "Postcode", concept_id: 4083591, label: "Postcode" },
    { class_uri: "OmopConcept", name: "T1", concept_id: 1634213 },
    { class_uri: "OmopConcept", name: "T2", concept_id: 1635564 },
    { class_uri: "OmopGroup", name: "TStage", members: ["T1", "T2"] },
  ],
  profiles: [
    {
      name: "observation_string",
      cdm_table: "observation",
      concept_slot: "observation_concept_id",
      value_slot: "value_as_string",
    },
    {
      name: "condition_concept",
      cdm_table: "condition_occurrence",
      concept_slot: "condition_concept_id",
      value_slot: null,
    },
  ],
};

/**
 * ...and templates from another.
 */
const TEMPLATES = {
  fragments: [
    {
      templates: [
        { name: "postcode", role: "demographic", entity_concept: "Postcode", cdm_profile: "observation_string" },
        { name: "postcode_free_text", role: "demographic", entity_concept: "Postcode", cdm_profile: "observation_string" },
        { name: "t_stage", role: "staging", entity_concept: "TStage", cdm_profile: "condition_concept" },
      ],
      groups: [{ name: "all", registry_members: ["postcode", "t_stage"] }],
    },
  ],
  value_sets: [{ name: "stages", members: ["T1", "T2"] }],
};

function sets() {
  return [
    parseDefinitionSetOrThrow(VOCABULARY, "vocabulary.json"),
    parseDefinitionSetOrThrow(TEMPLATES, "templates.json"),
  ];
}

// ═══════════════════════════════════════════════════════════════════════════
// PARSING
// ═══════════════════════════════════════════════════════════════════════════

describe("parseDefinitionSet", () => {
  test("accepts valid definitions and records the source", () => {
    const result = parseDefinitionSet(VOCABULARY, "vocabulary.json");

    assert.ok(result.success);
    assert.equal(result.definitions.source, "vocabulary.json");
    assert.equal(result.definitions.units.length, 4);
    assert.deepEqual(result.definitions.fragments, []);
  });

  test("reports issues with paths", () => {
    const result = parseDefinitionSet(
      { units: [{ class_uri: "OmopConcept", name: "Bad", concept_id: "x" }] },
      "bad.json"
    );

    assert.equal(result.success, false);
    if (!result.success) {
      assert.equal(result.errors.length, 1);
      assert.equal(result.errors[0]?.path, "units.0.concept_id");
      assert.equal(result.errors[0]?.source, "bad.json");
      assert.equal(result.errors[0]?.code, "invalid_type");
    }
  });

  test("uses (root) for whole-input issues", () => {
    const result = parseDefinitionSet("not an object");

    assert.equal(result.success, false);
    if (!result.success) {
      assert.equal(result.errors[0]?.path, "(root)");
    }
  });
});

describe("parseDefinitionSetOrThrow", () => {
  test("throws a formatted validation error", () => {
    assert.throws(
      () => parseDefinitionSetOrThrow({ profiles: [{ name: "p" }], extra: true }, "broken.json"),
      (err: unknown) => {
        assert.ok(err instanceof DefinitionValidationError);
        assert.match(err.message, /^Invalid definitions in broken\.json: \d+ validation error\(s\)$/);
        const lines = err.format().split("\n");
        assert.equal(lines[0], "Definition validation failed:");
        assert.ok(lines.includes("  - [broken.json] profiles.0.cdm_table: Required"));
        return true;
      }
    );
  });
});

describe("mergeDefinitionSets", () => {
  test("concatenates every list and joins sources", () => {
    const merged = mergeDefinitionSets(sets());

    assert.equal(merged.source, "vocabulary.json, templates.json");
    assert.equal(merged.units.length, 4);
    assert.equal(merged.profiles.length, 2);
    assert.equal(merged.fragments.length, 1);
    assert.equal(merged.value_sets.length, 1);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// BUILD
// ═══════════════════════════════════════════════════════════════════════════

describe("buildRegistry", () => {
  test("builds across definition sets", () => {
    const registry = buildRegistry(sets());

    assert.deepEqual(
      registry.templates.map((t) => t.name),
      ["postcode", "postcode_free_text", "t_stage"]
    );
    assert.deepEqual(registry.valueSet("stages")?.conceptIds(), [1634213, 1635564]);
  });

  test("merged and separate sets build the same indexes", () => {
    const separate = buildRegistry(sets());
    const merged = buildRegistry(mergeDefinitionSets(sets()));
    const reversed = buildRegistry([...sets()].reverse());

    for (const other of [merged, reversed]) {
      assert.deepEqual(
        other.templates.map((t) => t.name),
        separate.templates.map((t) => t.name)
      );
      assert.deepEqual(other.roles(), separate.roles());
      assert.deepEqual(
        other.templatesForConcept(1635564).map((t) => t.name),
        separate.templatesForConcept(1635564).map((t) => t.name)
      );
    }
  });

  test("templates sharing a profile name share the profile object", () => {
    const registry = buildRegistry(sets());

    assert.equal(
      registry.getTemplate("postcode")?.cdmProfile,
      registry.getTemplate("postcode_free_text")?.cdmProfile
    );
  });

  test("logs a summary at info level", () => {
    const entries: Array<[LogLevel, string]> = [];
    const logger = createLogger({
      console: false,
      scope: "test",
      sink: (level, entry) => entries.push([level, entry]),
    });

    const registry = buildRegistry(sets(), { logger });

    const info = entries.filter(([level]) => level === "info");
    assert.equal(info.length, 1);
    assert.match(info[0]?.[1] ?? "", /\[INFO \] \[test:build\] Registry built /);
    assert.ok(info[0]?.[1].includes(`"buildId":"${registry.metadata.buildId}"`));
  });

  test("reports units missing from every source", () => {
    const broken = parseDefinitionSetOrThrow({
      units: [{ class_uri: "OmopGroup", name: "NStage", members: ["N1"] }],
    });

    assert.throws(
      () => buildRegistry([...sets(), broken]),
      (err: unknown) => {
        assert.ok(err instanceof UnresolvedReferenceError);
        assert.equal(err.reference, "N1");
        return true;
      }
    );
  });

  test("reports duplicate unit names across sources", () => {
    assert.throws(
      () => buildRegistry([...sets(), parseDefinitionSetOrThrow(VOCABULARY, "copy.json")]),
      {
        name: "DuplicateNameError",
        message: 'Duplicate unit name "Postcode" (defined in vocabulary.json and copy.json)',
      }
    );
  });

  test("reports cycles", () => {
    const cyclic = parseDefinitionSetOrThrow({
      units: [
        { class_uri: "OmopGroup", name: "A", members: ["B"] },
        { class_uri: "OmopGroup", name: "B", members: ["A"] },
      ],
    });

    assert.throws(() => buildRegistry(cyclic), CyclicReferenceError);
  });

  test("rejects a value concept against a profile without a value slot", () => {
    const invalid = parseDefinitionSetOrThrow({
      fragments: [
        {
          templates: [
            {
              name: "stage_value",
              role: "staging",
              entity_concept: "T1",
              value_concept: "T2",
              cdm_profile: "condition_concept",
            },
          ],
        },
      ],
    });

    assert.throws(
      () => buildRegistry([parseDefinitionSetOrThrow(VOCABULARY), invalid]),
      ValueSlotNotSupportedError
    );
  });

  test("rejects duplicate value-set names across sources", () => {
    const extra = parseDefinitionSetOrThrow({ value_sets: [{ name: "stages", members: ["T1"] }] });

    assert.throws(() => buildRegistry([...sets(), extra]), DuplicateNameError);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// HANDLE
// ═══════════════════════════════════════════════════════════════════════════

describe("createRegistryHandle", () => {
  test("builds on first use and reuses the result", () => {
    let builds = 0;
    const handle = createRegistryHandle(() => {
      builds += 1;
      return buildRegistry(sets());
    });

    assert.equal(handle.built, false);
    assert.equal(builds, 0);

    const first = handle.get();
    assert.equal(handle.get(), first);
    assert.equal(handle.built, true);
    assert.equal(builds, 1);
  });

  test("retries after a failed build", () => {
    let attempts = 0;
    const handle = createRegistryHandle(() => {
      attempts += 1;
      if (attempts === 1) {
        throw new Error("definitions unavailable");
      }
      return buildRegistry(sets());
    });

    assert.throws(() => handle.get(), { message: "definitions unavailable" });
    assert.equal(handle.built, false);
    assert.equal(handle.get().size, 3);
  });
});
