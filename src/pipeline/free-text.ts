/**
 * Free-text field enumeration.
 *
 * Every string-valued field of each schema, except the disclaimer field,
 * listed explicitly per document kind in schema order. Nothing here walks
 * unknown keys: the closed schemas guarantee there are none, and this list
 * is the scanning obligation of every field that can exist.
 *
 * A list contributes each element under its index, then (with two or more
 * elements) the elements joined by a space under the list's own path, so a
 * phrase split across elements ("pneu", "monia") is still caught.
 */

import { assertNever } from "../config/safety/enums.js";
import type { ImagingFindings } from "../schemas/imaging-findings.js";
import { AnatomicalRegion } from "../schemas/imaging-findings.js";
import type { LabResults } from "../schemas/lab-results.js";
import type { SoapNote } from "../schemas/soap-note.js";
import type { StructuredPayload } from "../schemas/validator.js";

export interface FreeTextField {
  /** Dotted path, matching the paths used in schema violations */
  readonly field: string;
  readonly text: string;
}

interface FieldCollector {
  readonly fields: FreeTextField[];
  add(field: string, value: string | undefined): void;
  addList(field: string, values: readonly string[] | undefined): void;
}

function collector(): FieldCollector {
  const fields: FreeTextField[] = [];
  const add = (field: string, value: string | undefined): void => {
    if (value !== undefined) {
      fields.push({ field, text: value });
    }
  };
  return {
    fields,
    add,
    addList: (field, values) => {
      if (values === undefined) return;
      values.forEach((value, index) => add(`${field}.${index}`, value));
      if (values.length > 1) {
        add(field, values.join(" "));
      }
    },
  };
}

function imagingFields(data: ImagingFindings): FreeTextField[] {
  const { fields, add, addList } = collector();

  add("image_type", data.image_type);
  add("image_quality", data.image_quality);
  for (const region of AnatomicalRegion.options) {
    addList(`anatomical_observations.${region}`, data.anatomical_observations[region]);
  }
  add("comparison_with_prior", data.comparison_with_prior);
  add("areas_highlighted", data.areas_highlighted);

  return fields;
}

function labFields(data: LabResults): FreeTextField[] {
  const { fields, add } = collector();

  add("document_type", data.document_type);
  add("document_date", data.document_date);
  add("laboratory_name", data.laboratory_name);
  add("patient_identifier", data.patient_identifier);
  add("ordering_provider", data.ordering_provider);

  data.test_categories.forEach((category, c) => {
    const categoryPath = `test_categories.${c}`;
    add(`${categoryPath}.category`, category.category);
    category.tests.forEach((test, t) => {
      const testPath = `${categoryPath}.tests.${t}`;
      add(`${testPath}.test_name`, test.test_name);
      if (typeof test.value === "string") {
        add(`${testPath}.value`, test.value);
      }
      add(`${testPath}.unit`, test.unit);
      add(`${testPath}.reference_range`, test.reference_range);
      add(`${testPath}.method`, test.method);
    });
  });

  add("notes", data.notes);

  return fields;
}

function soapFields(data: SoapNote): FreeTextField[] {
  const { fields, add, addList } = collector();
  const { subjective, objective, assessment, plan, metadata } = data;

  add("patient_identifier", data.patient_identifier);
  add("generated_at", data.generated_at);

  add("subjective.chief_complaint", subjective.chief_complaint);
  add("subjective.history_of_present_illness", subjective.history_of_present_illness);
  addList("subjective.past_medical_history", subjective.past_medical_history);
  addList("subjective.medications", subjective.medications);
  addList("subjective.allergies", subjective.allergies);

  add("objective.vital_signs.recorded_at", objective.vital_signs?.recorded_at);
  addList("objective.physical_exam_findings", objective.physical_exam_findings);
  addList("objective.diagnostic_results", objective.diagnostic_results);

  add("assessment.clinical_impression", assessment.clinical_impression);
  addList("assessment.differential_considerations", assessment.differential_considerations);
  addList("assessment.problem_list", assessment.problem_list);

  addList("plan.interventions", plan.interventions);
  addList("plan.follow_up", plan.follow_up);
  addList("plan.patient_education", plan.patient_education);
  addList("plan.referrals", plan.referrals);

  add("metadata.model_version", metadata?.model_version);
  add("metadata.prompt_template", metadata?.prompt_template);

  return fields;
}

/**
 * Every free-text field of a schema-conformant payload, in scan order.
 */
export function freeTextFields(payload: StructuredPayload): FreeTextField[] {
  switch (payload.kind) {
    case "imaging_findings":
      return imagingFields(payload.data);
    case "lab_results":
      return labFields(payload.data);
    case "soap_note":
      return soapFields(payload.data);
    default:
      return assertNever(payload, "payload kind");
  }
}
