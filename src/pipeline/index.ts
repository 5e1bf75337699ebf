/**
 * Validation pipeline module.
 */

export {
  createSafetyContext,
  ValidatedDocument,
  ValidationPipeline,
  type SafetyContext,
  type ValidationPipelineOptions,
} from "./pipeline.js";
export { freeTextFields, type FreeTextField } from "./free-text.js";
