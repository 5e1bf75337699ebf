/**
 * Validation error taxonomy.
 *
 * Exactly one variant per failure; the pipeline stops at the first one.
 * These are returned, never thrown.
 */

export type ValidationError =
  | MalformedInput
  | SchemaViolation
  | MissingOrMismatchedDisclaimer
  | ForbiddenPhraseDetected;

export type ValidationErrorKind = ValidationError["kind"];

/** Raw text did not decode to a JSON object, or the declared tags are unknown */
export interface MalformedInput {
  readonly kind: "malformed_input";
  readonly reason: string;
}

/** Missing required field, unrecognized key, or wrong value type */
export interface SchemaViolation {
  readonly kind: "schema_violation";
  /** Dotted path, e.g. "test_categories.0.tests.1.value" */
  readonly field: string;
  readonly reason: string;
}

export interface MissingOrMismatchedDisclaimer {
  readonly kind: "missing_or_mismatched_disclaimer";
  readonly field: string;
  readonly presence: "missing" | "mismatch";
}

export interface ForbiddenPhraseDetected {
  readonly kind: "forbidden_phrase_detected";
  readonly field: string;
  /** Phrase as written in the safety table */
  readonly matchedPhrase: string;
}

/**
 * Severity levels for rendering.
 * - error:    structural or disclaimer failure
 * - critical: unsafe content was produced
 */
export type ValidationSeverity = "error" | "critical";

export function malformedInput(reason: string): MalformedInput {
  return { kind: "malformed_input", reason };
}

export function schemaViolation(field: string, reason: string): SchemaViolation {
  return { kind: "schema_violation", field, reason };
}

export function disclaimerFailure(
  field: string,
  presence: "missing" | "mismatch"
): MissingOrMismatchedDisclaimer {
  return { kind: "missing_or_mismatched_disclaimer", field, presence };
}

export function forbiddenPhrase(field: string, matchedPhrase: string): ForbiddenPhraseDetected {
  return { kind: "forbidden_phrase_detected", field, matchedPhrase };
}

export function severityOf(error: ValidationError): ValidationSeverity {
  switch (error.kind) {
    case "malformed_input":
    case "schema_violation":
    case "missing_or_mismatched_disclaimer":
      return "error";
    case "forbidden_phrase_detected":
      return "critical";
  }
}
