/**
 * Engine options module.
 *
 * Usage:
 *   import { loadEngineOptions } from "./config/engine/index.js";
 *
 *   const options = loadEngineOptions();                         // defaults
 *   const strict = loadEngineOptions({ strictConcepts: true });  // override
 */

export type { EngineOptions } from "./schema.js";
export { EngineOptionsSchema } from "./schema.js";
export {
  loadEngineOptions,
  EngineConfigError,
  type EngineConfigIssue,
} from "./loader.js";
export { DEFAULT_ENGINE_OPTIONS } from "./defaults.js";
