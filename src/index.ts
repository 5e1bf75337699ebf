/**
 * Safety gate for AI-generated clinical documents.
 *
 *   const app = bootstrap();
 *   const result = app.pipeline.validate({ raw, kind: "lab_results", language: "en" });
 *   if (result.ok) app.gate.admit(result.value);
 */

export { bootstrap, type App, type BootstrapOptions } from "./bootstrap.js";
export * from "./config/index.js";
export * from "./disclaimers/registry.js";
export * from "./errors/index.js";
export * from "./logging/index.js";
export { normalize } from "./normalization/normalizer.js";
export * from "./phrases/phrase-index.js";
export * from "./pipeline/index.js";
export * from "./review/index.js";
export * from "./schemas/index.js";
export * from "./types/index.js";
