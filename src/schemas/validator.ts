/**
 * Structural validation of candidate documents.
 *
 * Order of checks, cheapest and most common failure first:
 *   1. Decode: the raw text must be a JSON object       -> MalformedInput
 *   2. Required fields present                           -> SchemaViolation
 *   3. No key outside the kind's allow-list (any depth)  -> SchemaViolation
 *   4. Value types, enumerations and lengths             -> SchemaViolation
 *
 * Zod reports every issue at once; ranking them gives the order above and
 * the first issue of the best rank is reported.
 */

import type { ZodIssue } from "zod";
import { assertNever, type DocumentKind } from "../config/safety/enums.js";
import {
  malformedInput,
  schemaViolation,
  type MalformedInput,
  type SchemaViolation,
} from "../errors/validation-error.js";
import { err, ok, type Result } from "../types/result.js";
import { ImagingFindingsSchema, type ImagingFindings } from "./imaging-findings.js";
import { LabResultsSchema, type LabResults } from "./lab-results.js";
import { SoapNoteSchema, type SoapNote } from "./soap-note.js";

/**
 * Schema-conformant payload, tagged by document kind.
 */
export type StructuredPayload =
  | { readonly kind: "imaging_findings"; readonly data: ImagingFindings }
  | { readonly kind: "lab_results"; readonly data: LabResults }
  | { readonly kind: "soap_note"; readonly data: SoapNote };

export type SchemaResult = Result<StructuredPayload, MalformedInput | SchemaViolation>;

const RANK_MISSING = 0;
const RANK_UNRECOGNIZED = 1;
const RANK_OTHER = 2;

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function describeJsonValue(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "an array";
  return `a ${typeof value}`;
}

function decode(raw: string): Result<Record<string, unknown>, MalformedInput> {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof SyntaxError ? error.message : String(error);
    return err(malformedInput(`invalid JSON: ${reason}`));
  }

  if (!isJsonObject(value)) {
    return err(malformedInput(`expected a JSON object, got ${describeJsonValue(value)}`));
  }

  return ok(value);
}

function isMissingField(issue: ZodIssue): boolean {
  switch (issue.code) {
    case "invalid_type":
      return issue.received === "undefined";
    case "invalid_union":
      // A union member reports its own invalid_type for an absent value.
      return issue.unionErrors.every((unionError) => unionError.issues.every(isMissingField));
    default:
      return false;
  }
}

function rankOf(issue: ZodIssue): number {
  if (isMissingField(issue)) return RANK_MISSING;
  if (issue.code === "unrecognized_keys") return RANK_UNRECOGNIZED;
  return RANK_OTHER;
}

function toViolation(issue: ZodIssue): SchemaViolation {
  const path = issue.path.map(String);

  if (issue.code === "unrecognized_keys") {
    const key = issue.keys[0] ?? "";
    return schemaViolation([...path, key].join("."), "unrecognized field");
  }

  const field = path.length > 0 ? path.join(".") : "(root)";
  if (isMissingField(issue)) {
    return schemaViolation(field, "required field is missing");
  }
  return schemaViolation(field, issue.message);
}

/**
 * Pick the issue to report: lowest rank, then earliest.
 */
export function firstViolation(issues: readonly ZodIssue[]): SchemaViolation {
  let best: ZodIssue | undefined;
  for (const issue of issues) {
    if (best === undefined || rankOf(issue) < rankOf(best)) {
      best = issue;
    }
  }
  if (best === undefined) {
    return schemaViolation("(root)", "document does not match the schema");
  }
  return toViolation(best);
}

/**
 * Decode raw model output and validate it against the closed schema of
 * the declared document kind.
 */
export function validateSchema(raw: string, kind: DocumentKind): SchemaResult {
  const decoded = decode(raw);
  if (!decoded.ok) {
    return decoded;
  }

  switch (kind) {
    case "imaging_findings": {
      const parsed = ImagingFindingsSchema.safeParse(decoded.value);
      return parsed.success
        ? ok({ kind, data: parsed.data })
        : err(firstViolation(parsed.error.issues));
    }
    case "lab_results": {
      const parsed = LabResultsSchema.safeParse(decoded.value);
      return parsed.success
        ? ok({ kind, data: parsed.data })
        : err(firstViolation(parsed.error.issues));
    }
    case "soap_note": {
      const parsed = SoapNoteSchema.safeParse(decoded.value);
      return parsed.success
        ? ok({ kind, data: parsed.data })
        : err(firstViolation(parsed.error.issues));
    }
    default:
      return assertNever(kind, "document kind");
  }
}
