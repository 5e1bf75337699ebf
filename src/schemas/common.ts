/**
 * Building blocks shared by the document schemas.
 */

import { z } from "zod";

/**
 * String with at least one non-whitespace character.
 */
export const NonBlankText = z
  .string()
  .refine((value) => value.trim().length > 0, { message: "must not be blank" });

export const TextList = z.array(z.string());
