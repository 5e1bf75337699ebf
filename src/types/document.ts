/**
 * Document shapes flowing into and out of the validation pipeline.
 */

import type { DocumentKind, Language } from "../config/safety/enums.js";

/**
 * Input unit produced by the inference collaborator.
 * Never mutated; discarded after validation.
 */
export interface CandidateDocument {
  /** Raw model output, expected to decode to a JSON object */
  readonly raw: string;
  readonly kind: DocumentKind;
  readonly language: Language;
}

/**
 * Two matching-friendly views of a piece of text.
 * See normalization/normalizer.ts.
 */
export interface NormalizedText {
  readonly spaced: string;
  readonly collapsed: string;
}

/**
 * A candidate whose declared tags have not been checked yet, as read from
 * a file or a command line. The pipeline rejects unknown tags as malformed.
 */
export interface UncheckedCandidate {
  readonly raw: string;
  readonly kind: string;
  readonly language: string;
}
