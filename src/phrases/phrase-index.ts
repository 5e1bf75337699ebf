/**
 * Forbidden phrase index.
 *
 * Compiled once from the safety table: every phrase is normalized up front
 * and stored per (language, kind) in table order. Lookups do no I/O and
 * allocate nothing beyond the returned match.
 *
 * A phrase matches a field when either
 *   - its spaced form occurs in the field's spaced form on word
 *     boundaries, or
 *   - its collapsed form is a substring of the field's collapsed form.
 *
 * Matching is substring-based on purpose: "evidence of early pneumonia"
 * must be caught. Lists are never consulted across kinds or languages.
 */

import { DocumentKind, Language } from "../config/safety/enums.js";
import type { SafetyTable } from "../config/safety/schema.js";
import { normalize } from "../normalization/normalizer.js";
import type { NormalizedText } from "../types/index.js";

/**
 * Composite key for the per-list index.
 * Format: "{language}:{kind}"
 */
export type PhraseListKey = `${Language}:${DocumentKind}`;

export function makePhraseListKey(language: Language, kind: DocumentKind): PhraseListKey {
  return `${language}:${kind}`;
}

export interface CompiledPhrase {
  /** Phrase as written in the table, reported on a match */
  readonly phrase: string;
  readonly normalized: NormalizedText;
}

export interface PhraseMatch {
  readonly phrase: string;
  /** Which view produced the match; recorded in audit logs */
  readonly form: "spaced" | "collapsed";
}

/**
 * Immutable per-(language, kind) index of compiled forbidden phrases.
 *
 * @example
 *   const index = ForbiddenPhraseIndex.fromTable(table);
 *   index.contains(normalize("findings consistent with p.neumon.ia"), "en", "imaging_findings");
 *   // => { phrase: "pneumonia", form: "collapsed" }
 */
export class ForbiddenPhraseIndex {
  private readonly lists: ReadonlyMap<PhraseListKey, readonly CompiledPhrase[]>;

  /** Total number of compiled phrases across all lists */
  readonly size: number;

  private constructor(lists: Map<PhraseListKey, readonly CompiledPhrase[]>) {
    this.lists = lists;
    let size = 0;
    for (const list of lists.values()) {
      size += list.length;
    }
    this.size = size;
    Object.freeze(this);
  }

  static fromTable(table: SafetyTable): ForbiddenPhraseIndex {
    const lists = new Map<PhraseListKey, readonly CompiledPhrase[]>();

    for (const language of Language.options) {
      for (const kind of DocumentKind.options) {
        const compiled = table.entries[language][kind].forbiddenPhrases.map((phrase) =>
          Object.freeze({ phrase, normalized: normalize(phrase) })
        );
        lists.set(makePhraseListKey(language, kind), Object.freeze(compiled));
      }
    }

    return new ForbiddenPhraseIndex(lists);
  }

  /**
   * Find the first forbidden phrase present in a normalized field.
   *
   * @returns The matched phrase, or null if the field is clean
   */
  contains(
    field: NormalizedText,
    language: Language,
    kind: DocumentKind
  ): PhraseMatch | null {
    const spacedField = ` ${field.spaced} `;

    for (const { phrase, normalized } of this.compiled(language, kind)) {
      if (spacedField.includes(` ${normalized.spaced} `)) {
        return { phrase, form: "spaced" };
      }
      if (field.collapsed.includes(normalized.collapsed)) {
        return { phrase, form: "collapsed" };
      }
    }

    return null;
  }

  /**
   * Phrases for one list, as written in the table.
   */
  phrasesFor(language: Language, kind: DocumentKind): readonly string[] {
    return this.compiled(language, kind).map((entry) => entry.phrase);
  }

  private compiled(language: Language, kind: DocumentKind): readonly CompiledPhrase[] {
    return this.lists.get(makePhraseListKey(language, kind)) ?? [];
  }
}
