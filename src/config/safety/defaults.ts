/**
 * Default location of the versioned safety table.
 */

import { fileURLToPath } from "node:url";

/**
 * config/safety-table.json at the repository root, resolved from this
 * module so it works from src/ under tsx and from dist/ after a build.
 */
export const DEFAULT_SAFETY_TABLE_PATH: string = fileURLToPath(
  new URL("../../../config/safety-table.json", import.meta.url)
);
