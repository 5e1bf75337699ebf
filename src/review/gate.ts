/**
 * Review gate.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * HUMAN REVIEW BEFORE PERSISTENCE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Tracks every validated document through a strictly forward-moving
 * lifecycle:
 *
 *   pending_review ──acknowledge──▶ reviewed ──sign──▶ signed
 *
 * - No step may be skipped: signing a pending document is refused.
 * - No step may be repeated or undone.
 * - A signed entry is terminal. Corrections are separate addendum records
 *   linked by document id; the signed entry is never edited.
 *
 * Each entry carries a version that increases on every transition. Callers
 * that read an entry and act on it later pass the version they saw; if
 * another action got there first the transition is refused. The check and
 * the write happen in one synchronous step, so two actions on the same
 * document can never both succeed.
 */

import { randomUUID } from "node:crypto";
import type { DocumentKind, Language, ReviewStatus } from "../config/safety/enums.js";
import { createSilentLogger, type Logger } from "../logging/index.js";
import { ValidatedDocument } from "../pipeline/pipeline.js";
import { err, ok, type Result } from "../types/result.js";

/**
 * Immutable snapshot of one document's review state.
 */
export interface ReviewEntry {
  readonly documentId: string;
  readonly kind: DocumentKind;
  readonly language: Language;
  readonly status: ReviewStatus;
  /** Starts at 1; incremented by every transition */
  readonly version: number;
  readonly admittedAt: string;
  readonly reviewedBy?: string;
  readonly reviewedAt?: string;
  readonly signedBy?: string;
  readonly signedAt?: string;
}

/**
 * Correction or supplement attached to a signed document.
 */
export interface Addendum {
  readonly id: string;
  readonly documentId: string;
  readonly author: string;
  readonly text: string;
  /** Path of the corrected field, e.g. "objective.vital_signs.spo2_percent" */
  readonly correctionOf?: string;
  readonly createdAt: string;
}

export interface AddendumInput {
  author: string;
  text: string;
  correctionOf?: string;
}

export type ReviewGateErrorCode =
  | "not_validated"
  | "already_admitted"
  | "unknown_document"
  | "invalid_actor"
  | "version_conflict"
  | "acknowledgement_required"
  | "already_reviewed"
  | "already_signed"
  | "not_signed"
  | "empty_addendum";

export interface ReviewGateError {
  readonly code: ReviewGateErrorCode;
  readonly documentId: string;
  readonly message: string;
}

export interface ReviewGateStats {
  total: number;
  byStatus: Record<ReviewStatus, number>;
  addenda: number;
}

export interface ReviewGateOptions {
  logger?: Logger;
  clock?: () => Date;
  idGenerator?: () => string;
}

function gateError(
  code: ReviewGateErrorCode,
  documentId: string,
  message: string
): { readonly ok: false; readonly error: ReviewGateError } {
  return err({ code, documentId, message });
}

/**
 * In-memory review state for validated documents.
 *
 * @example
 *   const gate = new ReviewGate();
 *   gate.admit(document);
 *   gate.acknowledge(document.id, "Dr. Reviewer");
 *   gate.sign(document.id, "Dr. Reviewer");
 *   gate.canPersist(document.id); // => true
 */
export class ReviewGate {
  private readonly entries = new Map<string, ReviewEntry>();
  private readonly addendaByDocument = new Map<string, readonly Addendum[]>();
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly idGenerator: () => string;

  constructor(options: ReviewGateOptions = {}) {
    this.logger = options.logger ?? createSilentLogger();
    this.clock = options.clock ?? (() => new Date());
    this.idGenerator = options.idGenerator ?? randomUUID;
  }

  // ============================================================
  // Lifecycle
  // ============================================================

  /**
   * Register a validated document at pending_review. Anything the pipeline
   * did not construct is refused, whatever its shape.
   */
  admit(document: ValidatedDocument): Result<ReviewEntry, ReviewGateError> {
    // Read before the check: a refused value narrows to never.
    const claimedId = String(document.id);
    if (!ValidatedDocument.isIssued(document)) {
      this.logger.warn("Refused document not issued by the pipeline", { documentId: claimedId });
      return gateError(
        "not_validated",
        claimedId,
        "Only documents produced by the validation pipeline can be admitted"
      );
    }
    if (this.entries.has(document.id)) {
      return gateError("already_admitted", document.id, "Document is already under review");
    }

    const entry: ReviewEntry = Object.freeze({
      documentId: document.id,
      kind: document.kind,
      language: document.language,
      status: document.reviewStatus,
      version: 1,
      admittedAt: this.clock().toISOString(),
    });
    this.entries.set(entry.documentId, entry);
    this.logger.info("Document admitted for review", {
      documentId: entry.documentId,
      kind: entry.kind,
      traceId: document.traceId,
    });
    return ok(entry);
  }

  /**
   * Record the human acknowledgement: pending_review -> reviewed.
   */
  acknowledge(
    documentId: string,
    reviewer: string,
    expectedVersion?: number
  ): Result<ReviewEntry, ReviewGateError> {
    const current = this.precheck(documentId, reviewer, expectedVersion);
    if (!current.ok) {
      return current;
    }

    switch (current.value.status) {
      case "pending_review":
        return this.commit({
          ...current.value,
          status: "reviewed",
          version: current.value.version + 1,
          reviewedBy: reviewer.trim(),
          reviewedAt: this.clock().toISOString(),
        });
      case "reviewed":
        return gateError("already_reviewed", documentId, "Document has already been acknowledged");
      case "signed":
        return gateError("already_signed", documentId, "Signed documents cannot change");
    }
  }

  /**
   * Finalize an acknowledged document: reviewed -> signed.
   */
  sign(
    documentId: string,
    signer: string,
    expectedVersion?: number
  ): Result<ReviewEntry, ReviewGateError> {
    const current = this.precheck(documentId, signer, expectedVersion);
    if (!current.ok) {
      return current;
    }

    switch (current.value.status) {
      case "pending_review":
        return gateError(
          "acknowledgement_required",
          documentId,
          "Document must be acknowledged by a reviewer before signing"
        );
      case "reviewed":
        return this.commit({
          ...current.value,
          status: "signed",
          version: current.value.version + 1,
          signedBy: signer.trim(),
          signedAt: this.clock().toISOString(),
        });
      case "signed":
        return gateError("already_signed", documentId, "Signed documents cannot change");
    }
  }

  // ============================================================
  // Addenda
  // ============================================================

  /**
   * Attach a correction to a signed document. The signed entry is untouched.
   */
  addAddendum(documentId: string, input: AddendumInput): Result<Addendum, ReviewGateError> {
    const entry = this.entries.get(documentId);
    if (entry === undefined) {
      return gateError("unknown_document", documentId, "No document with this id is under review");
    }
    if (input.author.trim() === "") {
      return gateError("invalid_actor", documentId, "Addendum author must not be blank");
    }
    if (entry.status !== "signed") {
      return gateError("not_signed", documentId, "Addenda can only be added to signed documents");
    }
    if (input.text.trim() === "") {
      return gateError("empty_addendum", documentId, "Addendum text must not be blank");
    }

    const addendum: Addendum = Object.freeze({
      id: this.idGenerator(),
      documentId,
      author: input.author.trim(),
      text: input.text,
      ...(input.correctionOf !== undefined ? { correctionOf: input.correctionOf } : {}),
      createdAt: this.clock().toISOString(),
    });
    const existing = this.addendaByDocument.get(documentId) ?? [];
    this.addendaByDocument.set(documentId, Object.freeze([...existing, addendum]));

    this.logger.info("Addendum recorded", { documentId, addendumId: addendum.id });
    return ok(addendum);
  }

  /**
   * Addenda of a document, oldest first.
   */
  addenda(documentId: string): readonly Addendum[] {
    return this.addendaByDocument.get(documentId) ?? [];
  }

  // ============================================================
  // Queries
  // ============================================================

  get(documentId: string): ReviewEntry | undefined {
    return this.entries.get(documentId);
  }

  /**
   * Only signed documents may be handed to persistence.
   */
  canPersist(documentId: string): boolean {
    return this.entries.get(documentId)?.status === "signed";
  }

  stats(): ReviewGateStats {
    const byStatus: Record<ReviewStatus, number> = {
      pending_review: 0,
      reviewed: 0,
      signed: 0,
    };
    for (const entry of this.entries.values()) {
      byStatus[entry.status]++;
    }

    let addenda = 0;
    for (const list of this.addendaByDocument.values()) {
      addenda += list.length;
    }

    return { total: this.entries.size, byStatus, addenda };
  }

  // ============================================================
  // Internals
  // ============================================================

  private precheck(
    documentId: string,
    actor: string,
    expectedVersion: number | undefined
  ): Result<ReviewEntry, ReviewGateError> {
    const entry = this.entries.get(documentId);
    if (entry === undefined) {
      return gateError("unknown_document", documentId, "No document with this id is under review");
    }
    if (actor.trim() === "") {
      return gateError("invalid_actor", documentId, "Reviewer name must not be blank");
    }
    if (expectedVersion !== undefined && expectedVersion !== entry.version) {
      return gateError(
        "version_conflict",
        documentId,
        `Expected version ${expectedVersion}, found ${entry.version}`
      );
    }
    return ok(entry);
  }

  private commit(next: ReviewEntry): Result<ReviewEntry, ReviewGateError> {
    const entry = Object.freeze(next);
    this.entries.set(entry.documentId, entry);
    this.logger.info("Review status changed", {
      documentId: entry.documentId,
      status: entry.status,
      version: entry.version,
    });
    return ok(entry);
  }
}
