/**
 * validate-document CLI tests.
 *
 * Run: node --import tsx src/cli/validate-document.test.ts
 *
 * Drives runValidateDocument directly with an in-memory file reader and a
 * silent logger; nothing is printed by the command and no process exits.
 */

import { strict as assert } from "node:assert";

import type { EnvSource } from "../config/index.js";
import { labResults } from "../testing/fixtures.js";
import { HELP_TEXT, runValidateDocument, type CliResult } from "./validate-document.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void): void {
  try {
    fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

const FILES: Record<string, string> = {
  "clean.json": JSON.stringify(labResults()),
  "flagged.json": JSON.stringify({ ...labResults(), notes: "abnormal pattern" }),
  "no-disclaimer.json": JSON.stringify({ ...labResults(), limitations: undefined }),
};

function run(argv: string[], env: EnvSource = {}): CliResult {
  return runValidateDocument(argv, {
    env,
    logger: { console: false, file: false },
    readFile: (path) => {
      const content = FILES[path];
      if (content === undefined) throw new Error("no such file");
      return content;
    },
  });
}

function labArgs(file: string, ...extra: string[]): string[] {
  return ["--kind", "lab_results", "--language", "en", "--file", file, ...extra];
}

// ═══════════════════════════════════════════════════════════════════════════
// TESTS
// ═══════════════════════════════════════════════════════════════════════════

section("Usage");

test("--help prints usage and exits 0", () => {
  assert.deepEqual(run(["--help"]), { exitCode: 0, lines: [HELP_TEXT] });
});

test("missing --kind is a usage error", () => {
  assert.deepEqual(run(["--language", "en", "--file", "clean.json"]), {
    exitCode: 2,
    lines: ["Error: missing required option --kind", "Run with --help for usage."],
  });
});

test("unknown option is a usage error", () => {
  const result = run([...labArgs("clean.json"), "--verbose"]);
  assert.equal(result.exitCode, 2);
  assert.ok(result.lines[0]?.startsWith("Error: "));
});

test("unknown disclosure mode is a usage error", () => {
  assert.deepEqual(run(labArgs("clean.json", "--disclosure", "full")), {
    exitCode: 2,
    lines: ["Error: --disclosure must be detailed or generic", "Run with --help for usage."],
  });
});

test("unreadable input file exits 2", () => {
  assert.deepEqual(run(labArgs("absent.json")), {
    exitCode: 2,
    lines: ["Error: cannot read absent.json: no such file"],
  });
});

section("Configuration");

test("invalid environment exits 2", () => {
  assert.deepEqual(run(labArgs("clean.json"), { LOG_LEVEL: "loud" }), {
    exitCode: 2,
    lines: ["Configuration error: Invalid LOG_LEVEL: loud. Must be debug, info, warn, error."],
  });
});

test("unreadable safety table exits 2", () => {
  const result = run(labArgs("clean.json", "--table", "/nonexistent/safety-table.json"));
  assert.equal(result.exitCode, 2);
  assert.ok(result.lines[0]?.startsWith("Safety table validation failed:\n  - (root): "));
});

test("detailed disclosure is refused in production", () => {
  assert.deepEqual(
    run(labArgs("clean.json", "--disclosure", "detailed"), { NODE_ENV: "production" }),
    {
      exitCode: 2,
      lines: [
        "Error: --disclosure detailed is not allowed in production",
        "Run with --help for usage.",
      ],
    }
  );
});

section("Validation");

test("clean document is admitted for review", () => {
  const result = run(labArgs("clean.json"));
  assert.equal(result.exitCode, 0);
  assert.equal(result.lines[0], "✓ Validated lab_results (English)");
  assert.ok(result.lines[1]?.startsWith("  Document: "));
  assert.equal(result.lines[2], "  Review status: pending_review");
  assert.match(result.lines[3] ?? "", /^ {2}Trace: \d{8}-[0-9a-f]{6}$/);
});

test("rejection is detailed outside production", () => {
  assert.deepEqual(run(labArgs("flagged.json")), {
    exitCode: 1,
    lines: [
      "✗ Rejected [forbidden_phrase_detected] Forbidden phrase 'abnormal' detected in 'notes'",
      "  Severity: critical",
    ],
  });
});

test("rejection is generic in production", () => {
  assert.deepEqual(run(labArgs("flagged.json"), { NODE_ENV: "production" }), {
    exitCode: 1,
    lines: [
      "✗ Rejected [document_not_compliant] Could not produce a compliant document. Please document manually.",
      "  Severity: error",
    ],
  });
});

test("--disclosure generic applies in development", () => {
  const result = run(labArgs("flagged.json", "--disclosure", "generic"));
  assert.equal(result.exitCode, 1);
  assert.equal(
    result.lines[0],
    "✗ Rejected [document_not_compliant] Could not produce a compliant document. Please document manually."
  );
});

test("unsupported language is rejected as malformed", () => {
  const result = run(["--kind", "lab_results", "--language", "de", "--file", "clean.json"]);
  assert.deepEqual(result, {
    exitCode: 1,
    lines: [
      "✗ Rejected [malformed_input] Output is not a valid structured document: unsupported language 'de'",
      "  Severity: error",
    ],
  });
});

section("JSON output");

test("accepted document as JSON", () => {
  const result = run(labArgs("clean.json", "--json"));
  assert.equal(result.exitCode, 0);
  const report: unknown = JSON.parse(result.lines[0] ?? "");
  assert.ok(typeof report === "object" && report !== null);
  assert.equal(Reflect.get(report, "status"), "validated");
  assert.equal(Reflect.get(report, "kind"), "lab_results");
  assert.equal(Reflect.get(report, "reviewStatus"), "pending_review");
});

test("rejected document as JSON", () => {
  const result = run(labArgs("no-disclaimer.json", "--json"));
  assert.equal(result.exitCode, 1);
  assert.deepEqual(JSON.parse(result.lines[0] ?? ""), {
    status: "rejected",
    code: "missing_or_mismatched_disclaimer",
    severity: "error",
    message: "Required limitations statement is missing from 'limitations'",
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// SUMMARY
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n═══════════════════════════════════════════════`);
console.log(`  Results: ${passed} passed, ${failed} failed`);
console.log(`═══════════════════════════════════════════════\n`);

if (failed > 0) {
  process.exit(1);
}
