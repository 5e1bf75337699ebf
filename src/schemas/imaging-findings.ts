/**
 * Imaging findings schema.
 *
 * A descriptive summary of visible image features. Every object is closed:
 * a key outside the allow-list is rejected, because a silently dropped key
 * is a field that never gets scanned.
 */

import { z } from "zod";
import { NonBlankText } from "./common.js";

/**
 * Anatomical regions a summary may describe.
 * Keys are identifiers and stay in English whatever the document language;
 * the observations themselves are localized.
 */
export const AnatomicalRegion = z.enum([
  "lungs",
  "pleura",
  "heart",
  "mediastinum",
  "cardiomediastinal_silhouette",
  "airways",
  "diaphragm",
  "bones",
  "soft_tissues",
  "abdomen",
  "lines_and_tubes",
]);
export type AnatomicalRegion = z.infer<typeof AnatomicalRegion>;

const ObservationList = z.array(NonBlankText);

const regionShape = {
  lungs: ObservationList.optional(),
  pleura: ObservationList.optional(),
  heart: ObservationList.optional(),
  mediastinum: ObservationList.optional(),
  cardiomediastinal_silhouette: ObservationList.optional(),
  airways: ObservationList.optional(),
  diaphragm: ObservationList.optional(),
  bones: ObservationList.optional(),
  soft_tissues: ObservationList.optional(),
  abdomen: ObservationList.optional(),
  lines_and_tubes: ObservationList.optional(),
} satisfies Record<AnatomicalRegion, z.ZodOptional<typeof ObservationList>>;

export const AnatomicalObservationsSchema = z
  .object(regionShape)
  .strict()
  .refine((regions) => Object.values(regions).some((list) => list !== undefined), {
    message: "at least one anatomical region must be described",
  });

export type AnatomicalObservations = z.infer<typeof AnatomicalObservationsSchema>;

export const ImagingFindingsSchema = z
  .object({
    image_type: NonBlankText,
    image_quality: NonBlankText,
    anatomical_observations: AnatomicalObservationsSchema,
    comparison_with_prior: z.string(),
    areas_highlighted: z.string(),
    limitations: z.string().optional(),
  })
  .strict();

export type ImagingFindings = z.infer<typeof ImagingFindingsSchema>;
