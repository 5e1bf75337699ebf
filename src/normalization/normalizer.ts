/**
 * Text normalization for forbidden phrase matching.
 *
 * Raw model output is canonicalized into two views:
 *
 *   spaced    - "Pneumon.ia  noted" -> "pneumon ia noted"
 *               Runs of anything that is not a letter or digit become a
 *               single space. Catches punctuation injected between words.
 *
 *   collapsed - "P n e u m o n i a" -> "pneumonia"
 *               The spaced view with every space removed. Catches spacing
 *               and punctuation injected inside a word.
 *
 * Compatibility decomposition runs before case folding, since it can yield
 * capitals (mathematical bold "𝐏", squared "🄿", "ℙ"). Diacritics are then
 * stripped, so "Neumonía", "NEUMONIA", full-width "ＮＥＵＭＯＮＩＡ" and
 * "𝐏𝐍𝐄𝐔𝐌𝐎𝐍𝐈𝐀" normalize identically.
 */

import type { NormalizedText } from "../types/index.js";

const COMBINING_MARKS = /\p{M}+/gu;
const NON_ALPHANUMERIC_RUN = /[^\p{L}\p{N}]+/gu;

/**
 * Normalize raw text. Total: every string, including "", has a normalization.
 */
export function normalize(raw: string): NormalizedText {
  // Lowercasing can itself emit combining marks ("İ" -> "i̇"): decompose again.
  const folded = raw
    .normalize("NFKD")
    .toLowerCase()
    .normalize("NFKD")
    .replace(COMBINING_MARKS, "");
  const spaced = folded.replace(NON_ALPHANUMERIC_RUN, " ").trim();
  const collapsed = spaced.replace(/ /g, "");

  return Object.freeze({ spaced, collapsed });
}
