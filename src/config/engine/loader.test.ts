/**
 * Engine Options and App Config Tests
 *
 * Run with: npx tsx src/config/engine/loader.test.ts
 */

import { describe, test } from "node:test";
import { strict as assert } from "node:assert";
import { EngineConfigError, loadEngineOptions } from "./loader.js";
import { DEFAULT_ENGINE_OPTIONS } from "./defaults.js";
import { ConfigError, loadAppConfig, validateConfig } from "../index.js";

describe("loadEngineOptions", () => {
  test("returns frozen defaults", () => {
    const options = loadEngineOptions();

    assert.deepEqual(options, DEFAULT_ENGINE_OPTIONS);
    assert.ok(Object.isFrozen(options));
  });

  test("merges overrides onto the defaults", () => {
    const options = loadEngineOptions({ strictConcepts: true });

    assert.equal(options.strictConcepts, true);
    assert.equal(options.dateField, "date");
    assert.equal(options.defaultDateSuffix, "_date");
  });

  test("rejects unknown keys and bad values", () => {
    assert.throws(
      () => loadEngineOptions({ defaultDateSuffix: "-Date", colour: "blue" }),
      (err: unknown) => {
        assert.ok(err instanceof EngineConfigError);
        assert.equal(err.message, "Invalid engine options: 2 validation error(s)");
        const lines = err.format().split("\n");
        assert.equal(lines[0], "Engine options validation failed:");
        assert.ok(lines.includes("  - defaultDateSuffix: Date suffix must be a lowercase column fragment"));
        return true;
      }
    );
  });

  test("reports non-object input at the root", () => {
    assert.throws(
      () => loadEngineOptions("strict"),
      (err: unknown) => {
        assert.ok(err instanceof EngineConfigError);
        assert.equal(err.issues[0]?.path.length, 0);
        assert.match(err.format(), /  - \(root\): /);
        return true;
      }
    );
  });
});

describe("loadAppConfig", () => {
  test("applies defaults for an empty environment", () => {
    const config = loadAppConfig({});

    assert.deepEqual(config, {
      env: "development",
      logLevel: "info",
      appName: "cdm-semantics",
      strictConcepts: false,
    });
    assert.doesNotThrow(() => validateConfig(config));
  });

  test("reads values from the environment", () => {
    const config = loadAppConfig({
      NODE_ENV: "test",
      LOG_LEVEL: "debug",
      APP_NAME: "staging-loader",
      SEMANTICS_STRICT_CONCEPTS: "yes",
    });

    assert.equal(config.env, "test");
    assert.equal(config.logLevel, "debug");
    assert.equal(config.appName, "staging-loader");
    assert.equal(config.strictConcepts, true);
  });

  test("rejects an unknown log level", () => {
    assert.throws(() => loadAppConfig({ LOG_LEVEL: "verbose" }), {
      name: "ConfigError",
      message: "Invalid LOG_LEVEL: verbose. Must be debug, info, warn, error.",
    });
  });

  test("validateConfig rejects an unknown environment", () => {
    const config = loadAppConfig({ NODE_ENV: "staging" });

    assert.throws(() => validateConfig(config), ConfigError);
  });
});
