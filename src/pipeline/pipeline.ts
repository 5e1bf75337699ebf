/**
 * Validation pipeline.
 *
 * The single entry point through which every AI-generated document must
 * pass before a clinician can see it. Checks run in a fixed order and the
 * first failure wins:
 *
 *   0. Declared language and kind are supported   -> MalformedInput
 *   1. Structure against the kind's closed schema -> MalformedInput / SchemaViolation
 *   2. Exact disclaimer in the designated field   -> MissingOrMismatchedDisclaimer
 *   3. Every free-text field free of forbidden
 *      phrases, after normalization               -> ForbiddenPhraseDetected
 *
 * Expected failures are returned, never thrown. Validation is synchronous,
 * does no I/O, and holds no per-call state, so one pipeline can serve any
 * number of callers.
 */

import { randomUUID } from "node:crypto";
import { DocumentKind, Language } from "../config/safety/enums.js";
import type { SafetyTable } from "../config/safety/schema.js";
import { DISCLAIMER_FIELD, DisclaimerRegistry } from "../disclaimers/registry.js";
import { toAuditRecord } from "../errors/presentation.js";
import {
  disclaimerFailure,
  forbiddenPhrase,
  malformedInput,
  type ValidationError,
} from "../errors/validation-error.js";
import { createSilentLogger, generateTraceId, type Logger } from "../logging/index.js";
import { normalize } from "../normalization/normalizer.js";
import { ForbiddenPhraseIndex } from "../phrases/phrase-index.js";
import { validateSchema, type StructuredPayload } from "../schemas/validator.js";
import type { UncheckedCandidate } from "../types/document.js";
import { err, ok, type Result } from "../types/result.js";
import { deepFreeze } from "../utils/deep-freeze.js";
import { freeTextFields } from "./free-text.js";

/**
 * Compiled, immutable lookup structures shared by every validation.
 */
export interface SafetyContext {
  readonly phrases: ForbiddenPhraseIndex;
  readonly disclaimers: DisclaimerRegistry;
}

export function createSafetyContext(table: SafetyTable): SafetyContext {
  return Object.freeze({
    phrases: ForbiddenPhraseIndex.fromTable(table),
    disclaimers: new DisclaimerRegistry(table),
  });
}

export interface ValidationPipelineOptions {
  /** Receives one entry per validation; silent by default */
  logger?: Logger;
  /** Source of the validation timestamp */
  clock?: () => Date;
  /** Source of document ids */
  idGenerator?: () => string;
}

const CONSTRUCTION_TOKEN: unique symbol = Symbol("ValidatedDocument");

interface ValidatedDocumentFields {
  readonly id: string;
  readonly language: Language;
  readonly payload: StructuredPayload;
  readonly validatedAt: string;
  readonly traceId: string;
}

/**
 * A document that passed every check.
 *
 * Only this module can construct one, so holding a ValidatedDocument is
 * proof that validation happened. The private field makes the type nominal:
 * an object literal of the same shape is not assignable to it, and
 * isIssued() tells a real instance from one that only borrows the prototype.
 * The payload is deeply frozen.
 */
export class ValidatedDocument {
  readonly #issued = true;
  readonly id: string;
  readonly kind: DocumentKind;
  readonly language: Language;
  readonly payload: StructuredPayload;
  readonly reviewStatus = "pending_review" as const;
  /** ISO-8601 timestamp */
  readonly validatedAt: string;
  /** Correlates this document with the pipeline's log entry */
  readonly traceId: string;

  constructor(token: typeof CONSTRUCTION_TOKEN, fields: ValidatedDocumentFields) {
    if (token !== CONSTRUCTION_TOKEN) {
      throw new TypeError("ValidatedDocument can only be created by ValidationPipeline");
    }
    this.id = fields.id;
    this.kind = fields.payload.kind;
    this.language = fields.language;
    this.payload = deepFreeze(fields.payload);
    this.validatedAt = fields.validatedAt;
    this.traceId = fields.traceId;
    Object.freeze(this);
  }

  /**
   * True only for documents constructed by the pipeline.
   */
  static isIssued(value: unknown): value is ValidatedDocument {
    return typeof value === "object" && value !== null && #issued in value && value.#issued;
  }
}

interface CheckedDocument {
  readonly language: Language;
  readonly payload: StructuredPayload;
}

export class ValidationPipeline {
  private readonly context: SafetyContext;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly idGenerator: () => string;

  constructor(context: SafetyContext, options: ValidationPipelineOptions = {}) {
    this.context = context;
    this.logger = options.logger ?? createSilentLogger();
    this.clock = options.clock ?? (() => new Date());
    this.idGenerator = options.idGenerator ?? randomUUID;
    Object.freeze(this);
  }

  static fromTable(table: SafetyTable, options: ValidationPipelineOptions = {}): ValidationPipeline {
    return new ValidationPipeline(createSafetyContext(table), options);
  }

  /**
   * Validate one candidate document.
   */
  validate(candidate: UncheckedCandidate): Result<ValidatedDocument, ValidationError> {
    const now = this.clock();
    const traceId = generateTraceId(now);

    const checked = this.check(candidate, traceId);
    if (!checked.ok) {
      this.logger.warn("Document rejected", {
        audit: toAuditRecord(checked.error, candidate, traceId, now),
      });
      return checked;
    }

    const document = new ValidatedDocument(CONSTRUCTION_TOKEN, {
      id: this.idGenerator(),
      language: checked.value.language,
      payload: checked.value.payload,
      validatedAt: now.toISOString(),
      traceId,
    });

    this.logger.info("Document validated", {
      traceId,
      documentId: document.id,
      kind: document.kind,
      language: document.language,
    });

    return ok(document);
  }

  private check(
    candidate: UncheckedCandidate,
    traceId: string
  ): Result<CheckedDocument, ValidationError> {
    const language = Language.safeParse(candidate.language);
    if (!language.success) {
      return err(malformedInput(`unsupported language '${candidate.language}'`));
    }
    const kind = DocumentKind.safeParse(candidate.kind);
    if (!kind.success) {
      return err(malformedInput(`unsupported document kind '${candidate.kind}'`));
    }

    const schema = validateSchema(candidate.raw, kind.data);
    if (!schema.ok) {
      return schema;
    }
    const payload = schema.value;

    const disclaimerField = DISCLAIMER_FIELD[payload.kind];
    const disclaimer = payload.data[disclaimerField];
    if (!this.context.disclaimers.matches(disclaimer, language.data, payload.kind)) {
      const presence = disclaimer === undefined || disclaimer.trim() === "" ? "missing" : "mismatch";
      return err(disclaimerFailure(disclaimerField, presence));
    }

    for (const { field, text } of freeTextFields(payload)) {
      const match = this.context.phrases.contains(normalize(text), language.data, payload.kind);
      if (match !== null) {
        this.logger.debug("Forbidden phrase matched", { traceId, field, form: match.form });
        return err(forbiddenPhrase(field, match.phrase));
      }
    }

    return ok({ language: language.data, payload });
  }
}
