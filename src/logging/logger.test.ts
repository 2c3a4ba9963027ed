/**
 * Logger Tests
 *
 * Run with: npx tsx src/logging/logger.test.ts
 */

import { describe, test } from "node:test";
import { strict as assert } from "node:assert";
import { createLogger, formatLogEntry, type LogLevel } from "./logger.js";
import { generateBuildId } from "./build-id.js";

const NOW = new Date("2024-01-15T10:30:00.000Z");

describe("formatLogEntry", () => {
  test("prints timestamp, padded level, scope and message", () => {
    assert.equal(
      formatLogEntry("info", "semantics", "Registry built", undefined, NOW),
      "[2024-01-15T10:30:00.000Z] [INFO ] [semantics] Registry built"
    );
  });

  test("appends non-empty context as JSON", () => {
    assert.equal(
      formatLogEntry("debug", "build", "Indexed units", { units: 3 }, NOW),
      '[2024-01-15T10:30:00.000Z] [DEBUG] [build] Indexed units {"units":3}'
    );
    assert.equal(
      formatLogEntry("warn", "build", "Empty", {}, NOW),
      "[2024-01-15T10:30:00.000Z] [WARN ] [build] Empty"
    );
  });
});

describe("createLogger", () => {
  function capture(level: LogLevel): { entries: string[]; levels: LogLevel[]; log: ReturnType<typeof createLogger> } {
    const entries: string[] = [];
    const levels: LogLevel[] = [];
    const log = createLogger({
      level,
      console: false,
      scope: "app",
      sink: (entryLevel, entry) => {
        levels.push(entryLevel);
        entries.push(entry);
      },
    });
    return { entries, levels, log };
  }

  test("drops entries below the minimum level", () => {
    const { levels, log } = capture("warn");

    log.debug("a");
    log.info("b");
    log.warn("c");
    log.error("d");

    assert.deepEqual(levels, ["warn", "error"]);
  });

  test("child loggers nest their scope and keep the sink", () => {
    const { entries, log } = capture("info");

    log.child("build").child("interpolate").info("Resolved");

    assert.equal(entries.length, 1);
    assert.match(entries[0] ?? "", / \[app:build:interpolate\] Resolved$/);
  });
});

describe("generateBuildId", () => {
  test("prefixes the UTC date to a random suffix", () => {
    const id = generateBuildId(NOW);

    assert.match(id, /^20240115-[0-9a-f]{6}$/);
    assert.notEqual(generateBuildId(NOW), generateBuildId(NOW));
  });
});
