/**
 * Shared type foundations for the safety gate.
 */

export * from "./result.js";
export * from "./document.js";
