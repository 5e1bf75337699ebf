/**
 * Disclaimer registry.
 *
 * The one check in the pipeline that is deliberately not fuzzy: the
 * disclaimer must appear character-for-character in the document's
 * designated field, in the document's declared language. Only leading and
 * trailing whitespace of the candidate is ignored. A paraphrase, a
 * truncation or a translation is a failure.
 */

import type { DocumentKind, Language } from "../config/safety/enums.js";
import type { SafetyTable } from "../config/safety/schema.js";

/**
 * Field that carries the disclaimer, per document kind.
 * This field is checked here and excluded from phrase scanning.
 */
export const DISCLAIMER_FIELD = {
  imaging_findings: "limitations",
  lab_results: "limitations",
  soap_note: "limitations",
} as const satisfies Readonly<Record<DocumentKind, string>>;

export type DisclaimerField = (typeof DISCLAIMER_FIELD)[DocumentKind];

export class DisclaimerRegistry {
  private readonly table: SafetyTable;

  constructor(table: SafetyTable) {
    this.table = table;
    Object.freeze(this);
  }

  /**
   * The disclaimer a document of this language and kind must carry.
   * Infallible: a loaded table covers every pair.
   */
  requiredDisclaimer(language: Language, kind: DocumentKind): string {
    return this.table.entries[language][kind].disclaimer;
  }

  /**
   * Whether the candidate field carries the required disclaimer exactly.
   */
  matches(candidate: string | undefined, language: Language, kind: DocumentKind): boolean {
    if (candidate === undefined) {
      return false;
    }
    return candidate.trim() === this.requiredDisclaimer(language, kind);
  }
}
