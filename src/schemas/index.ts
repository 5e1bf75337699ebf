/**
 * Document schemas and structural validation.
 */

export { validateSchema, firstViolation } from "./validator.js";
export type { StructuredPayload, SchemaResult } from "./validator.js";
export { NonBlankText, TextList } from "./common.js";
export {
  AnatomicalRegion,
  AnatomicalObservationsSchema,
  ImagingFindingsSchema,
  type AnatomicalObservations,
  type ImagingFindings,
} from "./imaging-findings.js";
export {
  LabTestSchema,
  LabCategorySchema,
  LabResultsSchema,
  type LabTest,
  type LabCategory,
  type LabResults,
} from "./lab-results.js";
export {
  SubjectiveSchema,
  VitalSignsSchema,
  ObjectiveSchema,
  AssessmentSchema,
  PlanSchema,
  NoteMetadataSchema,
  SoapNoteSchema,
  type SoapNote,
} from "./soap-note.js";
