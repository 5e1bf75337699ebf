/**
 * SOAP note schema (Subjective, Objective, Assessment, Plan).
 *
 * Assessment and Plan are the highest-risk sections for diagnostic and
 * prescriptive language; they are scanned like every other text field.
 */

import { z } from "zod";
import { NonBlankText, TextList } from "./common.js";

export const SubjectiveSchema = z
  .object({
    chief_complaint: NonBlankText,
    history_of_present_illness: z.string().optional(),
    past_medical_history: TextList.optional(),
    medications: TextList.optional(),
    allergies: TextList.optional(),
  })
  .strict();

export const VitalSignsSchema = z
  .object({
    /** Degrees Celsius */
    temperature: z.number().optional(),
    heart_rate: z.number().nonnegative().optional(),
    respiratory_rate: z.number().nonnegative().optional(),
    systolic_bp: z.number().int().nonnegative().optional(),
    diastolic_bp: z.number().int().nonnegative().optional(),
    /** Percent */
    oxygen_saturation: z.number().int().min(0).max(100).optional(),
    recorded_at: z.string().optional(),
  })
  .strict();

export const ObjectiveSchema = z
  .object({
    vital_signs: VitalSignsSchema.optional(),
    physical_exam_findings: TextList.optional(),
    diagnostic_results: TextList.optional(),
  })
  .strict();

export const AssessmentSchema = z
  .object({
    clinical_impression: NonBlankText,
    differential_considerations: TextList.optional(),
    problem_list: TextList.optional(),
  })
  .strict();

export const PlanSchema = z
  .object({
    interventions: TextList.optional(),
    follow_up: TextList.optional(),
    patient_education: TextList.optional(),
    referrals: TextList.optional(),
  })
  .strict();

export const NoteMetadataSchema = z
  .object({
    model_version: z.string().optional(),
    prompt_template: z.string().optional(),
    generation_time_ms: z.number().nonnegative().optional(),
  })
  .strict();

export const SoapNoteSchema = z
  .object({
    patient_identifier: z.string().optional(),
    generated_at: z.string().optional(),
    subjective: SubjectiveSchema,
    objective: ObjectiveSchema,
    assessment: AssessmentSchema,
    plan: PlanSchema,
    metadata: NoteMetadataSchema.optional(),
    limitations: z.string().optional(),
  })
  .strict();

export type SoapNote = z.infer<typeof SoapNoteSchema>;
