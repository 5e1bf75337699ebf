/**
 * Shared test fixtures.
 *
 * Documents here are well-formed and free of every forbidden phrase in
 * every list, so a single base document can be validated in any language
 * by swapping its limitations statement.
 */

import { DocumentKind, Language } from "../config/safety/enums.js";
import { DEFAULT_SAFETY_TABLE_PATH } from "../config/safety/defaults.js";
import { loadSafetyTableFile } from "../config/safety/loader.js";
import type { SafetyTable } from "../config/safety/schema.js";
import type { ImagingFindings } from "../schemas/imaging-findings.js";
import type { LabResults } from "../schemas/lab-results.js";
import type { SoapNote } from "../schemas/soap-note.js";
import type { CandidateDocument } from "../types/document.js";

let cachedTable: SafetyTable | undefined;

/**
 * The shipped safety table, loaded once per test file.
 */
export function shippedTable(): SafetyTable {
  cachedTable ??= loadSafetyTableFile(DEFAULT_SAFETY_TABLE_PATH);
  return cachedTable;
}

/**
 * Raw table input covering every pair, for loader and index tests.
 * Disclaimers read "Test disclaimer for {language} {kind}."
 */
export function tableInput(
  phrases: (language: Language, kind: DocumentKind) => string[] = () => ["forbidden"]
): { version: string; languages: Record<string, Record<string, unknown>> } {
  const languages: Record<string, Record<string, unknown>> = {};
  for (const language of Language.options) {
    const kinds: Record<string, unknown> = {};
    for (const kind of DocumentKind.options) {
      kinds[kind] = {
        disclaimer: `Test disclaimer for ${language} ${kind}.`,
        forbiddenPhrases: phrases(language, kind),
      };
    }
    languages[language] = kinds;
  }
  return { version: "1.0.0", languages };
}

export function disclaimerFor(language: Language, kind: DocumentKind): string {
  return shippedTable().entries[language][kind].disclaimer;
}

export function imagingFindings(language: Language = "en"): ImagingFindings {
  return {
    image_type: "Chest X-ray, frontal view",
    image_quality: "Adequate exposure and positioning",
    anatomical_observations: {
      lungs: ["Lung fields appear clear bilaterally"],
      heart: ["Cardiac outline is visible"],
      bones: ["Ribs and clavicles are visible"],
    },
    comparison_with_prior: "No prior image available",
    areas_highlighted: "None",
    limitations: disclaimerFor(language, "imaging_findings"),
  };
}

export function labResults(language: Language = "en"): LabResults {
  return {
    document_type: "Complete blood count report",
    document_date: "2024-03-14",
    laboratory_name: "Sample Laboratory",
    patient_identifier: "PT-0001",
    test_categories: [
      {
        category: "Hematology",
        tests: [
          { test_name: "Hemoglobin", value: "13.5", unit: "g/dL", reference_range: "12.0-16.0" },
          { test_name: "Platelets", value: 250, unit: "10^3/uL" },
        ],
      },
    ],
    notes: "Values transcribed as printed",
    limitations: disclaimerFor(language, "lab_results"),
  };
}

export function soapNote(language: Language = "en"): SoapNote {
  return {
    patient_identifier: "PT-0001",
    generated_at: "2024-03-14T09:30:00Z",
    subjective: {
      chief_complaint: "Cough for three days",
      history_of_present_illness: "Patient reports a dry cough since Monday",
      allergies: ["No known allergies"],
    },
    objective: {
      vital_signs: {
        temperature: 37.2,
        heart_rate: 88,
        systolic_bp: 120,
        diastolic_bp: 80,
        oxygen_saturation: 97,
      },
      physical_exam_findings: ["Breath sounds audible in all lung fields"],
    },
    assessment: {
      clinical_impression: "Cough reported by patient; observations documented above",
    },
    plan: {
      follow_up: ["Clinician to review at next visit"],
    },
    metadata: {
      model_version: "model-test-1",
      generation_time_ms: 1200,
    },
    limitations: disclaimerFor(language, "soap_note"),
  };
}

export function baseDocument(kind: DocumentKind, language: Language = "en"): object {
  switch (kind) {
    case "imaging_findings":
      return imagingFindings(language);
    case "lab_results":
      return labResults(language);
    case "soap_note":
      return soapNote(language);
  }
}

export function candidate(
  document: object,
  kind: DocumentKind,
  language: Language = "en"
): CandidateDocument {
  return { raw: JSON.stringify(document), kind, language };
}
