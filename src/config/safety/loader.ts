/**
 * Safety table loader and validator.
 *
 * Responsible for:
 * - Validating the raw table against the schema
 * - Checking completeness: every language has a disclaimer and a phrase
 *   list for every document kind
 * - Rejecting phrases that cannot be matched (empty after normalization)
 *   or that are duplicated within one list
 * - Freezing the result so it can be shared without coordination
 *
 * A missing entry is a configuration error raised at startup, never at
 * validation time.
 */

import { readFileSync } from "node:fs";
import type { ZodIssue } from "zod";
import { deepFreeze } from "../../utils/deep-freeze.js";
import { normalize } from "../../normalization/normalizer.js";
import { DocumentKind, Language } from "./enums.js";
import {
  SafetyTableFileSchema,
  type SafetyEntry,
  type SafetyTable,
  type SafetyTableFile,
} from "./schema.js";

/**
 * Structured validation error for the safety table.
 */
export class SafetyConfigError extends Error {
  public readonly issues: SafetyConfigIssue[];

  constructor(message: string, issues: SafetyConfigIssue[]) {
    super(message);
    this.name = "SafetyConfigError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["Safety table validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

export interface SafetyConfigIssue {
  /** Path to the invalid entry */
  path: (string | number)[];
  message: string;
  /** Zod error code, or one of the completeness codes below */
  code: string;
}

function formatZodIssues(zodIssues: ZodIssue[]): SafetyConfigIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Check the rules of a single list that zod cannot express.
 */
function checkEntry(entry: SafetyEntry, path: string[]): SafetyConfigIssue[] {
  const issues: SafetyConfigIssue[] = [];

  if (entry.disclaimer.trim().length === 0) {
    issues.push({
      path: [...path, "disclaimer"],
      message: "disclaimer must not be blank",
      code: "blank_disclaimer",
    });
  }

  if (entry.forbiddenPhrases.length === 0) {
    issues.push({
      path: [...path, "forbiddenPhrases"],
      message: "forbidden phrase list must not be empty",
      code: "empty_phrase_list",
    });
  }

  const seen = new Map<string, number>();
  entry.forbiddenPhrases.forEach((phrase, index) => {
    const { collapsed } = normalize(phrase);
    if (collapsed.length === 0) {
      // An empty collapsed form is a substring of every field.
      issues.push({
        path: [...path, "forbiddenPhrases", index],
        message: `phrase "${phrase}" has no letters or digits`,
        code: "unmatchable_phrase",
      });
      return;
    }
    const first = seen.get(collapsed);
    if (first !== undefined) {
      issues.push({
        path: [...path, "forbiddenPhrases", index],
        message: `phrase "${phrase}" duplicates entry ${first} after normalization`,
        code: "duplicate_phrase",
      });
      return;
    }
    seen.set(collapsed, index);
  });

  return issues;
}

/**
 * Check that the table covers exactly the supported languages and kinds,
 * and build the typed table when it does.
 */
function checkCompleteness(file: SafetyTableFile): {
  issues: SafetyConfigIssue[];
  table?: SafetyTable;
} {
  const issues: SafetyConfigIssue[] = [];

  for (const [languageKey, kinds] of Object.entries(file.languages)) {
    if (!Language.safeParse(languageKey).success) {
      issues.push({
        path: ["languages", languageKey],
        message: `unsupported language "${languageKey}" (expected one of ${Language.options.join(", ")})`,
        code: "unknown_language",
      });
      continue;
    }
    for (const kindKey of Object.keys(kinds)) {
      if (!DocumentKind.safeParse(kindKey).success) {
        issues.push({
          path: ["languages", languageKey, kindKey],
          message: `unsupported document kind "${kindKey}" (expected one of ${DocumentKind.options.join(", ")})`,
          code: "unknown_kind",
        });
      }
    }
  }

  for (const language of Language.options) {
    const kinds = file.languages[language];
    if (!kinds) {
      issues.push({
        path: ["languages", language],
        message: `language "${language}" has no entries`,
        code: "missing_language",
      });
      continue;
    }
    for (const kind of DocumentKind.options) {
      const entry = kinds[kind];
      if (!entry) {
        issues.push({
          path: ["languages", language, kind],
          message: `document kind "${kind}" has no entry for language "${language}"`,
          code: "missing_kind",
        });
        continue;
      }
      issues.push(...checkEntry(entry, ["languages", language, kind]));
    }
  }

  if (issues.length > 0) {
    return { issues };
  }

  const en = pickKinds(file.languages["en"]);
  const es = pickKinds(file.languages["es"]);
  const fr = pickKinds(file.languages["fr"]);
  const pt = pickKinds(file.languages["pt"]);
  if (!en || !es || !fr || !pt) {
    return {
      issues: [{ path: ["languages"], message: "table is incomplete", code: "missing_language" }],
    };
  }

  return {
    issues,
    table: {
      version: file.version,
      ...(file.name !== undefined ? { name: file.name } : {}),
      entries: { en, es, fr, pt },
    },
  };
}

function pickKinds(
  kinds: Record<string, SafetyEntry> | undefined
): Record<DocumentKind, SafetyEntry> | null {
  const imaging = kinds?.["imaging_findings"];
  const labs = kinds?.["lab_results"];
  const notes = kinds?.["soap_note"];
  if (!imaging || !labs || !notes) {
    return null;
  }
  return { imaging_findings: imaging, lab_results: labs, soap_note: notes };
}

/**
 * Validate safety table input without throwing.
 */
export function validateSafetyTable(input: unknown): {
  success: boolean;
  table?: SafetyTable;
  errors?: SafetyConfigIssue[];
} {
  const result = SafetyTableFileSchema.safeParse(input);
  if (!result.success) {
    return { success: false, errors: formatZodIssues(result.error.issues) };
  }

  const { issues, table } = checkCompleteness(result.data);
  if (!table) {
    return { success: false, errors: issues };
  }

  return { success: true, table };
}

/**
 * Validate and load the safety table.
 *
 * @param input - Raw table object (already parsed from JSON)
 * @returns Validated, complete, deep-frozen table
 * @throws SafetyConfigError if validation fails
 */
export function loadSafetyTable(input: unknown): SafetyTable {
  const result = validateSafetyTable(input);

  if (!result.success || !result.table) {
    const issues = result.errors ?? [];
    throw new SafetyConfigError(
      `Invalid safety table: ${issues.length} validation error(s)`,
      issues
    );
  }

  return deepFreeze(result.table);
}

/**
 * Read, parse and load a safety table file.
 *
 * @throws SafetyConfigError if the file cannot be read, is not JSON, or is invalid
 */
export function loadSafetyTableFile(path: string): SafetyTable {
  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SafetyConfigError(`Cannot read safety table at ${path}`, [
      { path: [], message: reason, code: "unreadable_file" },
    ]);
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SafetyConfigError(`Safety table at ${path} is not valid JSON`, [
      { path: [], message: reason, code: "invalid_json" },
    ]);
  }

  return loadSafetyTable(data);
}
