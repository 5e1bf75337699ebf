#!/usr/bin/env node
/**
 * CLI command to run one model output through the safety gate.
 *
 * Reads a candidate document from a file, validates it against the safety
 * table, and reports either the admitted document or the rejection. The
 * rejection is rendered according to the configured error disclosure, so
 * production output never names a field or a forbidden phrase.
 *
 * Usage:
 *   npx tsx src/cli/validate-document.ts --kind <kind> --language <lang> --file <path>
 *   npm run validate-document -- --kind lab_results --language en --file out.json
 *
 * Options:
 *   --kind <kind>          imaging_findings | lab_results | soap_note
 *   --language <lang>      en | es | fr | pt
 *   --file <path>          File containing the raw model output
 *   --table <path>         Safety table JSON (default: SAFETY_TABLE_PATH or config/safety-table.json)
 *   --disclosure <mode>    detailed | generic (default: from ERROR_DISCLOSURE)
 *   --json                 Output the result as JSON
 *   -h, --help             Show help
 *
 * Exit codes:
 *   0 - Document validated and admitted for review
 *   1 - Document rejected
 *   2 - Usage or configuration error
 */

import { readFileSync } from "node:fs";
import { parseArgs } from "node:util";

import { bootstrap, type App, type BootstrapOptions } from "../bootstrap.js";
import {
  ConfigError,
  LANGUAGE_DISPLAY_NAMES,
  SafetyConfigError,
  type EnvSource,
} from "../config/index.js";
import {
  ERROR_DISCLOSURES,
  presentValidationError,
  type ErrorDisclosure,
} from "../errors/index.js";

// ============================================================
// Types
// ============================================================

export type ExitCode = 0 | 1 | 2;

export interface CliResult {
  exitCode: ExitCode;
  /** Lines for stdout, in order */
  lines: string[];
}

export interface CliDeps {
  env?: EnvSource;
  readFile?: (path: string) => string;
  logger?: BootstrapOptions["logger"];
}

interface CliArgs {
  kind: string;
  language: string;
  file: string;
  table?: string;
  disclosure?: ErrorDisclosure;
  json: boolean;
}

export const HELP_TEXT = `
Usage: validate-document --kind <kind> --language <lang> --file <path> [options]

Options:
  --kind <kind>          imaging_findings | lab_results | soap_note
  --language <lang>      en | es | fr | pt
  --file <path>          File containing the raw model output
  --table <path>         Safety table JSON (default: SAFETY_TABLE_PATH or config/safety-table.json)
  --disclosure <mode>    detailed | generic (default: from ERROR_DISCLOSURE)
  --json                 Output the result as JSON
  -h, --help             Show this help message
`;

function usageError(message: string): CliResult {
  return { exitCode: 2, lines: [`Error: ${message}`, "Run with --help for usage."] };
}

// ============================================================
// CLI Parsing
// ============================================================

function readArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      kind: { type: "string" },
      language: { type: "string" },
      file: { type: "string" },
      table: { type: "string" },
      disclosure: { type: "string" },
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  }).values;
}

function parseCliArgs(argv: string[]): CliArgs | CliResult {
  let values: ReturnType<typeof readArgs>;
  try {
    values = readArgs(argv);
  } catch (err) {
    return usageError(err instanceof Error ? err.message : String(err));
  }

  if (values.help) {
    return { exitCode: 0, lines: [HELP_TEXT] };
  }

  const { kind, language, file } = values;
  if (kind === undefined) return usageError("missing required option --kind");
  if (language === undefined) return usageError("missing required option --language");
  if (file === undefined) return usageError("missing required option --file");

  let disclosure: ErrorDisclosure | undefined;
  const requested = values.disclosure;
  if (requested !== undefined) {
    disclosure = ERROR_DISCLOSURES.find((mode) => mode === requested);
    if (disclosure === undefined) {
      return usageError(`--disclosure must be ${ERROR_DISCLOSURES.join(" or ")}`);
    }
  }

  return {
    kind,
    language,
    file,
    ...(values.table !== undefined ? { table: values.table } : {}),
    ...(disclosure !== undefined ? { disclosure } : {}),
    json: values.json === true,
  };
}

function isCliResult(value: CliArgs | CliResult): value is CliResult {
  return "exitCode" in value;
}

// ============================================================
// Command
// ============================================================

/**
 * Run the command without touching the process; main() prints the lines.
 */
export function runValidateDocument(argv: string[], deps: CliDeps = {}): CliResult {
  const args = parseCliArgs(argv);
  if (isCliResult(args)) {
    return args;
  }

  let app: App;
  try {
    app = bootstrap({
      ...(deps.env !== undefined ? { env: deps.env } : {}),
      ...(deps.logger !== undefined ? { logger: deps.logger } : {}),
      ...(args.table !== undefined ? { tablePath: args.table } : {}),
    });
  } catch (err) {
    if (err instanceof SafetyConfigError) {
      return { exitCode: 2, lines: [err.format()] };
    }
    if (err instanceof ConfigError) {
      return { exitCode: 2, lines: [`Configuration error: ${err.message}`] };
    }
    throw err;
  }

  if (app.config.env === "production" && args.disclosure === "detailed") {
    return usageError("--disclosure detailed is not allowed in production");
  }
  const disclosure = args.disclosure ?? app.config.errorDisclosure;

  const readFile = deps.readFile ?? ((path: string) => readFileSync(path, "utf-8"));
  let raw: string;
  try {
    raw = readFile(args.file);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return { exitCode: 2, lines: [`Error: cannot read ${args.file}: ${reason}`] };
  }

  const result = app.pipeline.validate({ raw, kind: args.kind, language: args.language });

  if (!result.ok) {
    const view = presentValidationError(result.error, disclosure);
    if (args.json) {
      return {
        exitCode: 1,
        lines: [JSON.stringify({ status: "rejected", ...view }, null, 2)],
      };
    }
    return {
      exitCode: 1,
      lines: [`✗ Rejected [${view.code}] ${view.message}`, `  Severity: ${view.severity}`],
    };
  }

  const document = result.value;
  const admitted = app.gate.admit(document);
  if (!admitted.ok) {
    return { exitCode: 2, lines: [`Error: ${admitted.error.message}`] };
  }

  const report = {
    status: "validated",
    documentId: document.id,
    kind: document.kind,
    language: document.language,
    reviewStatus: admitted.value.status,
    traceId: document.traceId,
  };

  if (args.json) {
    return { exitCode: 0, lines: [JSON.stringify(report, null, 2)] };
  }
  return {
    exitCode: 0,
    lines: [
      `✓ Validated ${report.kind} (${LANGUAGE_DISPLAY_NAMES[document.language]})`,
      `  Document: ${report.documentId}`,
      `  Review status: ${report.reviewStatus}`,
      `  Trace: ${report.traceId}`,
    ],
  };
}

// ============================================================
// Main
// ============================================================

function main(): void {
  const result = runValidateDocument(process.argv.slice(2));
  for (const line of result.lines) {
    console.log(line);
  }
  process.exitCode = result.exitCode;
}

// Only run when executed directly (not imported by tests)
const isDirectExecution = process.argv[1] &&
  (process.argv[1].endsWith("validate-document.ts") ||
   process.argv[1].endsWith("validate-document.js"));

if (isDirectExecution) {
  try {
    main();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`Error: ${message}`);
    process.exit(2);
  }
}
