/**
 * Safety table configuration module.
 *
 * Provides the validated, immutable table of disclaimers and forbidden
 * phrases for every supported language and document kind.
 *
 * Usage:
 *   import { loadSafetyTableFile, DEFAULT_SAFETY_TABLE_PATH } from "./config/safety/index.js";
 *
 *   const table = loadSafetyTableFile(DEFAULT_SAFETY_TABLE_PATH);
 *   table.entries.en.imaging_findings.disclaimer;
 */

// Domain enums
export {
  Language,
  DocumentKind,
  ReviewStatus,
  LANGUAGE_DISPLAY_NAMES,
  assertNever,
} from "./enums.js";

// Schema types
export type { SafetyEntry, SafetyTable, SafetyTableFile } from "./schema.js";
export { SafetyEntrySchema, SafetyTableFileSchema } from "./schema.js";

// Loader and validation
export {
  loadSafetyTable,
  loadSafetyTableFile,
  validateSafetyTable,
  SafetyConfigError,
  type SafetyConfigIssue,
} from "./loader.js";

// Defaults
export { DEFAULT_SAFETY_TABLE_PATH } from "./defaults.js";
