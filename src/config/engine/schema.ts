/**
 * Engine options schema.
 *
 * Options are validated once, frozen, and handed to the build explicitly.
 * A registry built under one set of options never observes another.
 */

import { z } from "zod";

export const EngineOptionsSchema = z
  .object({
    /**
     * Reject row compilation for concept ids outside a template's
     * entity concept set (and numeric values outside its value concept set).
     */
    strictConcepts: z
      .boolean()
      .describe("Whether compileRow checks concept ids against the template's concept sets"),

    /** Identity field that is routed to the profile's date slot */
    dateField: z
      .string()
      .min(1)
      .describe("Caller identity field written to the profile's date column"),

    /** Suffix used to derive a date column when a profile declares none */
    defaultDateSuffix: z
      .string()
      .min(1)
      .regex(/^[a-z0-9_]+$/, "Date suffix must be a lowercase column fragment")
      .describe("Appended to cdm_table when a profile has no date_slot"),
  })
  .strict();

export type EngineOptions = z.infer<typeof EngineOptionsSchema>;
