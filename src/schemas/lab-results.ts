/**
 * Lab results extraction schema.
 *
 * A transcription of the values visible on a photographed report, grouped
 * by test category. Values are transcribed, never interpreted.
 */

import { z } from "zod";
import { NonBlankText } from "./common.js";

export const LabTestSchema = z
  .object({
    test_name: NonBlankText,
    /** As printed; numeric output from the model is accepted too */
    value: z.union([z.string(), z.number()]),
    unit: z.string().optional(),
    reference_range: z.string().optional(),
    method: z.string().optional(),
  })
  .strict();

export type LabTest = z.infer<typeof LabTestSchema>;

export const LabCategorySchema = z
  .object({
    category: NonBlankText,
    tests: z.array(LabTestSchema).min(1, "at least one test result is required"),
  })
  .strict();

export type LabCategory = z.infer<typeof LabCategorySchema>;

export const LabResultsSchema = z
  .object({
    document_type: NonBlankText,
    document_date: z.string().optional(),
    laboratory_name: z.string().optional(),
    patient_identifier: z.string().optional(),
    ordering_provider: z.string().optional(),
    test_categories: z.array(LabCategorySchema).min(1, "no test results were extracted"),
    notes: z.string().optional(),
    limitations: z.string().optional(),
  })
  .strict();

export type LabResults = z.infer<typeof LabResultsSchema>;
