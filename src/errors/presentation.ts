/**
 * Rendering of validation errors for the UI and the audit log.
 *
 * In a production deployment every variant collapses to one generic
 * message: the field and phrase of a rejection must never reach an end
 * user, or the forbidden vocabulary leaks as a hint for circumvention.
 * The detailed variant goes to the audit log only.
 */

import { severityOf, type ValidationError, type ValidationSeverity } from "./validation-error.js";

/**
 * How much of a validation error may be shown.
 * - detailed: development; variant, field and phrase
 * - generic:  production; one message for every variant
 */
export type ErrorDisclosure = "detailed" | "generic";

export const ERROR_DISCLOSURES: readonly ErrorDisclosure[] = ["detailed", "generic"];

export const MANUAL_DOCUMENTATION_MESSAGE =
  "Could not produce a compliant document. Please document manually.";

export interface ValidationErrorView {
  /** Variant name, or "document_not_compliant" when disclosure is generic */
  readonly code: string;
  readonly severity: ValidationSeverity;
  readonly message: string;
}

export function describeValidationError(error: ValidationError): string {
  switch (error.kind) {
    case "malformed_input":
      return `Output is not a valid structured document: ${error.reason}`;
    case "schema_violation":
      return `Field '${error.field}' violates the document schema: ${error.reason}`;
    case "missing_or_mismatched_disclaimer":
      return error.presence === "missing"
        ? `Required limitations statement is missing from '${error.field}'`
        : `Limitations statement in '${error.field}' does not match the required text`;
    case "forbidden_phrase_detected":
      return `Forbidden phrase '${error.matchedPhrase}' detected in '${error.field}'`;
  }
}

export function presentValidationError(
  error: ValidationError,
  disclosure: ErrorDisclosure
): ValidationErrorView {
  if (disclosure === "generic") {
    return {
      code: "document_not_compliant",
      severity: "error",
      message: MANUAL_DOCUMENTATION_MESSAGE,
    };
  }

  return {
    code: error.kind,
    severity: severityOf(error),
    message: describeValidationError(error),
  };
}

/**
 * Detailed record of a rejection, written to the audit log.
 */
export interface ValidationAuditRecord {
  readonly traceId: string;
  /** Declared tags, as received; may be unknown for malformed input */
  readonly kind: string;
  readonly language: string;
  readonly outcome: "rejected";
  readonly error: ValidationError;
  readonly severity: ValidationSeverity;
  readonly rejectedAt: string;
}

export function toAuditRecord(
  error: ValidationError,
  candidate: { readonly kind: string; readonly language: string },
  traceId: string,
  at: Date
): ValidationAuditRecord {
  return {
    traceId,
    kind: candidate.kind,
    language: candidate.language,
    outcome: "rejected",
    error,
    severity: severityOf(error),
    rejectedAt: at.toISOString(),
  };
}
