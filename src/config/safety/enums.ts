/**
 * Domain enumerations for the safety gate.
 *
 * These are closed sets. Adding a language or document kind is a
 * compile-time exhaustiveness failure until every switch over the union
 * handles it, and a startup failure until the safety table covers it.
 */

import { z } from "zod";

/**
 * Languages a candidate document may be declared in.
 *
 * Three of the four are diacritic-bearing Romance languages, which is why
 * phrase matching folds diacritics before comparing.
 */
export const Language = z.enum(["en", "es", "fr", "pt"]);
export type Language = z.infer<typeof Language>;

export const LANGUAGE_DISPLAY_NAMES: Readonly<Record<Language, string>> = {
  en: "English",
  es: "Español",
  fr: "Français",
  pt: "Português",
};

/**
 * Artifact types produced by the inference collaborator.
 *
 * Each kind owns its schema, its disclaimer and its forbidden vocabulary:
 *   - imaging_findings: descriptive summary of visible image features
 *   - lab_results:      transcription of values from a photographed report
 *   - soap_note:        structured clinical note (S/O/A/P sections)
 */
export const DocumentKind = z.enum(["imaging_findings", "lab_results", "soap_note"]);
export type DocumentKind = z.infer<typeof DocumentKind>;

/**
 * Review lifecycle of a validated document. Strictly forward-moving.
 */
export const ReviewStatus = z.enum(["pending_review", "reviewed", "signed"]);
export type ReviewStatus = z.infer<typeof ReviewStatus>;

/**
 * Exhaustiveness guard for switches over the unions above.
 */
export function assertNever(value: never, what: string): never {
  throw new Error(`Unhandled ${what}: ${String(value)}`);
}
