/**
 * Unit Index Tests
 *
 * Run with: npx tsx src/semantics/unit-index.test.ts
 */

import { describe, test } from "node:test";
import { strict as assert } from "node:assert";
import { buildUnitIndex } from "./unit-index.js";
import { DuplicateNameError } from "./errors.js";
import type { NamedRawUnit } from "./schema.js";

const T1: NamedRawUnit = { class_uri: "OmopConcept", name: "T1", concept_id: 1634213 };
const T2: NamedRawUnit = { class_uri: "OmopConcept", name: "T2", concept_id: 1635564 };
const T_STAGE: NamedRawUnit = { class_uri: "OmopGroup", name: "TStage", members: ["T1", "T2"] };

describe("buildUnitIndex", () => {
  test("indexes units by name in definition order", () => {
    const index = buildUnitIndex([{ units: [T_STAGE, T1, T2] }]);

    assert.equal(index.size, 3);
    assert.deepEqual(index.names(), ["TStage", "T1", "T2"]);
    assert.equal(index.get("T1"), T1);
    assert.equal(index.has("T3"), false);
    assert.equal(index.get("T3"), undefined);
  });

  test("allows forward references and spans sources", () => {
    const index = buildUnitIndex([
      { source: "groups.json", units: [T_STAGE] },
      { source: "concepts.json", units: [T1, T2] },
    ]);

    assert.equal(index.sourceOf("TStage"), "groups.json");
    assert.equal(index.sourceOf("T2"), "concepts.json");
  });

  test("does not copy or mutate records", () => {
    const units = [T1];
    const index = buildUnitIndex([{ units }]);

    assert.equal(index.get("T1"), T1);
    assert.deepEqual(T1, { class_uri: "OmopConcept", name: "T1", concept_id: 1634213 });
  });

  test("rejects a name shared by a concept and a group", () => {
    const clash: NamedRawUnit = { class_uri: "OmopGroup", name: "T1", members: [] };

    assert.throws(
      () => buildUnitIndex([{ source: "a.json", units: [T1] }, { source: "b.json", units: [clash] }]),
      (err: unknown) => {
        assert.ok(err instanceof DuplicateNameError);
        assert.equal(err.duplicateName, "T1");
        assert.deepEqual(err.sources, ["a.json", "b.json"]);
        assert.equal(err.message, 'Duplicate unit name "T1" (defined in a.json and b.json)');
        return true;
      }
    );
  });

  test("reports duplicates without sources", () => {
    assert.throws(() => buildUnitIndex([{ units: [T1, T1] }]), {
      name: "DuplicateNameError",
      message: 'Duplicate unit name "T1"',
    });
  });
});
