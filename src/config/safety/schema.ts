/**
 * Safety table schema.
 *
 * The safety table is the only configuration the gate consults at
 * validation time: for every language and document kind, the mandatory
 * disclaimer and the ordered list of forbidden phrases.
 *
 * Languages and kinds are keyed by plain strings at this level so the
 * loader can report unknown and missing entries by path instead of
 * failing on the first unexpected key.
 */

import { z } from "zod";
import type { DocumentKind, Language } from "./enums.js";

/**
 * Rules for one (language, kind) pair.
 */
export const SafetyEntrySchema = z
  .object({
    /**
     * Sentence that must appear verbatim in the document's disclaimer field.
     */
    disclaimer: z.string().describe("Mandatory disclaimer, compared exactly"),

    /**
     * Phrases that must never appear in any free-text field.
     * Order matters: the first phrase that matches is the one reported.
     */
    forbiddenPhrases: z
      .array(z.string())
      .describe("Forbidden phrases in match-priority order"),
  })
  .strict();

export type SafetyEntry = z.infer<typeof SafetyEntrySchema>;

/**
 * Raw safety table as stored on disk.
 */
export const SafetyTableFileSchema = z
  .object({
    /**
     * Table version, recorded in audit logs.
     */
    version: z.string().regex(/^\d+\.\d+\.\d+$/, "version must be semver (x.y.z)"),

    name: z.string().min(1).optional(),

    languages: z.record(z.string(), z.record(z.string(), SafetyEntrySchema)),
  })
  .strict();

export type SafetyTableFile = z.infer<typeof SafetyTableFileSchema>;

/**
 * Validated, fully populated safety table.
 * Every Language x DocumentKind pair is present.
 */
export interface SafetyTable {
  readonly version: string;
  readonly name?: string;
  readonly entries: Readonly<Record<Language, Readonly<Record<DocumentKind, SafetyEntry>>>>;
}
