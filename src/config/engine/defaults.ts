/**
 * Default engine options.
 *
 * Lenient about concept membership, so rows can carry concept ids the
 * definitions only anchor (e.g. descendants of a group's members).
 */

import type { EngineOptions } from "./schema.js";

export const DEFAULT_ENGINE_OPTIONS: EngineOptions = {
  strictConcepts: false,
  dateField: "date",
  defaultDateSuffix: "_date",
};
