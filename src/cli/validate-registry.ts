#!/usr/bin/env node
/**
 * CLI command to validate semantic definitions by building a registry.
 *
 * Validates:
 * - Application configuration (environment)
 * - Each definition file against the schema
 * - The full build: names, references, cycles, profiles
 *
 * Reports:
 * - Templates by role
 * - Registry groups and their members
 * - Profiles in use
 *
 * Usage:
 *   npx tsx src/cli/validate-registry.ts [options]
 *   npm run validate-registry
 *
 * Options:
 *   --definitions <path>  Definition JSON file; repeat for several
 *                         (default: definitions/sample-definitions.json)
 *   --strict-concepts     Build with strict concept admission
 *   --verbose             Show templates of each registry group
 *   --json                Output the report as JSON (for CI parsing)
 *   -h, --help            Show help
 *
 * Exit codes:
 *   0 - Registry built
 *   1 - Configuration, schema or build failure
 */

import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { parseArgs } from "node:util";

import {
  ConfigError,
  loadAppConfig,
  loadEngineOptions,
  validateConfig,
  type AppConfig,
} from "../config/index.js";
import {
  buildRegistry,
  DefinitionValidationError,
  parseDefinitionSet,
  SemanticRegistryError,
  type DefinitionSet,
  type RuntimeRegistry,
} from "../semantics/index.js";
import { createLogger, createSilentLogger, type Logger } from "../logging/index.js";

// ============================================================
// Types
// ============================================================

export interface StepResult {
  success: boolean;
  component: string;
  message: string;
  details?: string[];
}

export interface RegistrySummary {
  buildId: string;
  templates: number;
  units: number;
  valueSets: number;
  roles: Array<{ role: string; templates: string[] }>;
  registryGroups: Array<{ name: string; role?: string; templates: string[] }>;
  profiles: Array<{ name: string; cdmTable: string; templates: number }>;
}

export interface ValidationReport {
  timestamp: string;
  steps: StepResult[];
  registry?: RegistrySummary;
  summary: {
    stepsPassed: number;
    stepsFailed: number;
    stepsTotal: number;
  };
}

export interface ValidationOptions {
  strictConcepts?: boolean;
  logger?: Logger;
}

// ============================================================
// Steps
// ============================================================

function describeError(err: unknown): string[] {
  if (err instanceof DefinitionValidationError) {
    return err.issues.map((issue) => `${issue.path}: ${issue.message}`);
  }
  if (err instanceof SemanticRegistryError) {
    return [err.format()];
  }
  return [err instanceof Error ? err.message : String(err)];
}

/**
 * Read and validate one definition file.
 */
export function loadDefinitionFile(path: string): {
  step: StepResult;
  definitions?: DefinitionSet;
} {
  const component = `Definitions (${path})`;

  if (!existsSync(path)) {
    return { step: { success: false, component, message: "File not found" } };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    return {
      step: {
        success: false,
        component,
        message: "Invalid JSON",
        details: [err instanceof Error ? err.message : String(err)],
      },
    };
  }

  const result = parseDefinitionSet(raw, path);
  if (!result.success) {
    return {
      step: {
        success: false,
        component,
        message: `${result.errors.length} schema error(s)`,
        details: result.errors.map((issue) => `${issue.path}: ${issue.message}`),
      },
    };
  }

  const { units, profiles, fragments, value_sets } = result.definitions;
  return {
    step: {
      success: true,
      component,
      message:
        `${units.length} unit(s), ${profiles.length} profile(s), ` +
        `${fragments.length} fragment(s), ${value_sets.length} value set(s)`,
    },
    definitions: result.definitions,
  };
}

/**
 * Condense a registry into the report's summary section.
 */
export function summarizeRegistry(registry: RuntimeRegistry): RegistrySummary {
  const stats = registry.getStats();

  return {
    buildId: registry.metadata.buildId,
    templates: stats.totalTemplates,
    units: stats.totalUnits,
    valueSets: stats.totalValueSets,
    roles: registry.roles().map((role) => ({
      role,
      templates: registry.byRole(role).map((t) => t.name),
    })),
    registryGroups: registry.registryGroups().map((group) => ({
      name: group.name,
      role: group.role,
      templates: group.templates.map((t) => t.name),
    })),
    profiles: registry.profiles().map((profile) => ({
      name: profile.name,
      cdmTable: profile.cdmTable,
      templates: registry.templatesForProfile(profile.name).length,
    })),
  };
}

/**
 * Validate definition files and build the registry. Stops at the first
 * failed step.
 */
export function runValidation(
  paths: readonly string[],
  options: ValidationOptions = {}
): ValidationReport {
  const steps: StepResult[] = [];
  const sets: DefinitionSet[] = [];
  let registry: RegistrySummary | undefined;

  const finish = (): ValidationReport => {
    const stepsFailed = steps.filter((step) => !step.success).length;
    return {
      timestamp: new Date().toISOString(),
      steps,
      registry,
      summary: {
        stepsPassed: steps.length - stepsFailed,
        stepsFailed,
        stepsTotal: steps.length,
      },
    };
  };

  if (paths.length === 0) {
    steps.push({ success: false, component: "Definitions", message: "No definition files given" });
    return finish();
  }

  for (const path of paths) {
    const loaded = loadDefinitionFile(path);
    steps.push(loaded.step);
    if (loaded.definitions === undefined) {
      return finish();
    }
    sets.push(loaded.definitions);
  }

  try {
    const built = buildRegistry(sets, {
      options: loadEngineOptions({ strictConcepts: options.strictConcepts ?? false }),
      logger: options.logger ?? createSilentLogger(),
    });
    registry = summarizeRegistry(built);
    steps.push({
      success: true,
      component: "Registry",
      message:
        `${registry.templates} template(s), ${registry.registryGroups.length} registry group(s), ` +
        `${registry.units} unit(s)`,
    });
  } catch (err) {
    steps.push({
      success: false,
      component: "Registry",
      message: "Build failed",
      details: describeError(err),
    });
  }

  return finish();
}

// ============================================================
// CLI Parsing
// ============================================================

function parseCliArgs() {
  const { values } = parseArgs({
    options: {
      definitions: {
        type: "string",
        multiple: true,
        default: ["definitions/sample-definitions.json"],
      },
      "strict-concepts": { type: "boolean", default: false },
      verbose: { type: "boolean", default: false },
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    console.log(`
Usage: validate-registry [options]

Options:
  --definitions <path>  Definition JSON file; repeat for several
                        (default: definitions/sample-definitions.json)
  --strict-concepts     Build with strict concept admission
  --verbose             Show templates of each registry group
  --json                Output the report as JSON (for CI parsing)
  -h, --help            Show this help message
`);
    process.exit(0);
  }

  return values;
}

// ============================================================
// Output Formatting
// ============================================================

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  red: "\x1b[31m",
  cyan: "\x1b[36m",
};

const useColors = process.stdout.isTTY && !process.env.NO_COLOR;

function c(color: keyof typeof COLORS, text: string): string {
  return useColors ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

function printStep(step: StepResult): void {
  const mark = step.success ? c("green", "✓") : c("red", "✗");
  console.log(`${mark} ${c("bold", step.component)}: ${step.message}`);
  for (const detail of step.details ?? []) {
    console.log(`    ${c("red", "•")} ${detail}`);
  }
}

function printSummary(summary: RegistrySummary, verbose: boolean): void {
  console.log("");
  console.log(c("cyan", `Build ${summary.buildId}`));

  console.log(c("bold", "Roles:"));
  for (const { role, templates } of summary.roles) {
    console.log(`  ${c("dim", "•")} ${role}: ${templates.length} template(s)`);
  }

  console.log(c("bold", "Registry groups:"));
  for (const group of summary.registryGroups) {
    const role = group.role !== undefined ? ` [${group.role}]` : "";
    console.log(`  ${c("dim", "•")} ${group.name}${role}: ${group.templates.length} template(s)`);
    if (verbose) {
      for (const name of group.templates) {
        console.log(`      ${name}`);
      }
    }
  }

  console.log(c("bold", "Profiles:"));
  for (const profile of summary.profiles) {
    console.log(
      `  ${c("dim", "•")} ${profile.name} → ${profile.cdmTable}: ${profile.templates} template(s)`
    );
  }
}

function printFooter(report: ValidationReport): void {
  const { stepsPassed, stepsFailed } = report.summary;
  console.log("");
  console.log("─".repeat(60));
  if (stepsFailed === 0) {
    console.log(c("green", `✓ All validations passed (${stepsPassed}/${stepsPassed})`));
  } else {
    console.log(c("red", `✗ Validation failed: ${stepsFailed} error(s)`));
  }
  console.log("─".repeat(60));
  console.log("");
}

// ============================================================
// Main
// ============================================================

async function main(): Promise<void> {
  const args = parseCliArgs();

  let config: AppConfig;
  try {
    config = loadAppConfig();
    validateConfig(config);
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(c("red", `Configuration error: ${err.message}`));
      process.exit(1);
    }
    throw err;
  }

  const logger = args.verbose
    ? createLogger({ level: config.logLevel, scope: config.appName })
    : createSilentLogger();

  const report = runValidation(
    args.definitions.map((path) => resolve(path)),
    { strictConcepts: args["strict-concepts"] || config.strictConcepts, logger }
  );

  if (args.json) {
    console.log(JSON.stringify(report, null, 2));
  } else {
    console.log("");
    console.log(c("bold", "═".repeat(60)));
    console.log(c("bold", " Semantic Registry Validation"));
    console.log(c("bold", "═".repeat(60)));
    console.log("");
    for (const step of report.steps) {
      printStep(step);
    }
    if (report.registry !== undefined) {
      printSummary(report.registry, args.verbose);
    }
    printFooter(report);
  }

  process.exit(report.summary.stepsFailed > 0 ? 1 : 0);
}

const isDirectExecution =
  process.argv[1] !== undefined &&
  (process.argv[1].endsWith("validate-registry.ts") ||
    process.argv[1].endsWith("validate-registry.js"));

if (isDirectExecution) {
  main().catch((err) => {
    console.error("Unexpected error:", err);
    process.exit(1);
  });
}
