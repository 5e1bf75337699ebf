/**
 * Safety table loader tests.
 *
 * Run: node --import tsx src/config/safety/loader.test.ts
 */

import { strict as assert } from "node:assert";
import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { shippedTable, tableInput } from "../../testing/fixtures.js";
import {
  loadSafetyTable,
  loadSafetyTableFile,
  SafetyConfigError,
  validateSafetyTable,
  type SafetyConfigIssue,
} from "./loader.js";

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

function issuesOf(input: unknown): SafetyConfigIssue[] {
  const result = validateSafetyTable(input);
  assert.equal(result.success, false, "expected the table to be rejected");
  return result.errors ?? [];
}

function codes(input: unknown): string[] {
  return issuesOf(input).map((issue) => issue.code);
}

const TEMP_DIR = join(tmpdir(), `safety-table-test-${Date.now()}`);

// ═══════════════════════════════════════════════════════════════════════════
// TESTS
// ═══════════════════════════════════════════════════════════════════════════

section("Shipped table");

test("shipped table loads", () => {
  const table = shippedTable();
  assert.equal(table.version, "1.0.0");
  assert.equal(table.name, "Clinical output safety table");
});

test("shipped table is deeply frozen", () => {
  const table = shippedTable();
  assert.ok(Object.isFrozen(table));
  assert.ok(Object.isFrozen(table.entries.en));
  assert.ok(Object.isFrozen(table.entries.en.lab_results.forbiddenPhrases));
});

test("shipped lists keep disease names ahead of diagnostic wording", () => {
  const phrases = shippedTable().entries.en.imaging_findings.forbiddenPhrases;
  assert.ok(phrases.indexOf("pneumonia") < phrases.indexOf("consistent with"));
});

section("Completeness");

test("complete table validates", () => {
  const result = validateSafetyTable(tableInput());
  assert.equal(result.success, true);
  assert.equal(result.table?.entries.fr.soap_note.disclaimer, "Test disclaimer for fr soap_note.");
});

test("missing language is reported by path", () => {
  const input = tableInput();
  delete input.languages["pt"];
  assert.deepEqual(issuesOf(input), [
    { path: ["languages", "pt"], message: 'language "pt" has no entries', code: "missing_language" },
  ]);
});

test("missing kind is reported by path", () => {
  const input = tableInput();
  const { soap_note: _omitted, ...kinds } = input.languages["es"] ?? {};
  input.languages["es"] = kinds;
  assert.deepEqual(issuesOf(input), [
    {
      path: ["languages", "es", "soap_note"],
      message: 'document kind "soap_note" has no entry for language "es"',
      code: "missing_kind",
    },
  ]);
});

test("unsupported language is rejected", () => {
  const input = tableInput();
  input.languages["de"] = input.languages["en"] ?? {};
  assert.deepEqual(codes(input), ["unknown_language"]);
});

test("unsupported kind is rejected", () => {
  const input = tableInput();
  input.languages["en"] = {
    ...input.languages["en"],
    discharge_summary: { disclaimer: "x", forbiddenPhrases: ["y"] },
  };
  assert.deepEqual(codes(input), ["unknown_kind"]);
});

section("List rules");

test("blank disclaimer is rejected", () => {
  const input = tableInput();
  input.languages["en"] = {
    ...input.languages["en"],
    lab_results: { disclaimer: "   ", forbiddenPhrases: ["abnormal"] },
  };
  assert.deepEqual(issuesOf(input), [
    {
      path: ["languages", "en", "lab_results", "disclaimer"],
      message: "disclaimer must not be blank",
      code: "blank_disclaimer",
    },
  ]);
});

test("empty phrase list is rejected", () => {
  const input = tableInput((language, kind) =>
    language === "fr" && kind === "lab_results" ? [] : ["forbidden"]
  );
  assert.deepEqual(issuesOf(input), [
    {
      path: ["languages", "fr", "lab_results", "forbiddenPhrases"],
      message: "forbidden phrase list must not be empty",
      code: "empty_phrase_list",
    },
  ]);
});

test("phrase without letters or digits is rejected", () => {
  const input = tableInput((language, kind) =>
    language === "en" && kind === "soap_note" ? ["ok", "--"] : ["forbidden"]
  );
  assert.deepEqual(issuesOf(input), [
    {
      path: ["languages", "en", "soap_note", "forbiddenPhrases", 1],
      message: 'phrase "--" has no letters or digits',
      code: "unmatchable_phrase",
    },
  ]);
});

test("phrases equal after normalization are duplicates", () => {
  const input = tableInput((language, kind) =>
    language === "es" && kind === "imaging_findings" ? ["neumonía", "NEUMONIA"] : ["forbidden"]
  );
  assert.deepEqual(issuesOf(input), [
    {
      path: ["languages", "es", "imaging_findings", "forbiddenPhrases", 1],
      message: 'phrase "NEUMONIA" duplicates entry 0 after normalization',
      code: "duplicate_phrase",
    },
  ]);
});

section("File format");

test("version must be semver", () => {
  const issues = issuesOf({ ...tableInput(), version: "1.0" });
  assert.equal(issues.length, 1);
  assert.deepEqual(issues[0]?.path, ["version"]);
  assert.equal(issues[0]?.message, "version must be semver (x.y.z)");
});

test("unknown top-level key is rejected", () => {
  assert.deepEqual(codes({ ...tableInput(), overrides: {} }), ["unrecognized_keys"]);
});

test("entry with an unknown key is rejected", () => {
  const input = tableInput();
  input.languages["en"] = {
    ...input.languages["en"],
    lab_results: { disclaimer: "x", forbiddenPhrases: ["y"], allowedPhrases: [] },
  };
  assert.deepEqual(codes(input), ["unrecognized_keys"]);
});

section("Loading");

test("loadSafetyTable throws a formatted SafetyConfigError", () => {
  const input = tableInput();
  delete input.languages["pt"];
  assert.throws(
    () => loadSafetyTable(input),
    (err: unknown) => {
      assert.ok(err instanceof SafetyConfigError);
      assert.equal(err.message, "Invalid safety table: 1 validation error(s)");
      assert.equal(
        err.format(),
        'Safety table validation failed:\n  - languages.pt: language "pt" has no entries'
      );
      return true;
    }
  );
});

test("unreadable file is a configuration error", () => {
  assert.throws(
    () => loadSafetyTableFile(join(TEMP_DIR, "missing.json")),
    (err: unknown) => err instanceof SafetyConfigError && err.issues[0]?.code === "unreadable_file"
  );
});

test("file that is not JSON is a configuration error", () => {
  mkdirSync(TEMP_DIR, { recursive: true });
  const path = join(TEMP_DIR, "broken.json");
  writeFileSync(path, "{ version: 1");
  assert.throws(
    () => loadSafetyTableFile(path),
    (err: unknown) => err instanceof SafetyConfigError && err.issues[0]?.code === "invalid_json"
  );
});

test("valid file loads", () => {
  mkdirSync(TEMP_DIR, { recursive: true });
  const path = join(TEMP_DIR, "table.json");
  writeFileSync(path, JSON.stringify(tableInput()));
  assert.equal(loadSafetyTableFile(path).entries.pt.imaging_findings.forbiddenPhrases[0], "forbidden");
});

// ═══════════════════════════════════════════════════════════════════════════
// CLEANUP & SUMMARY
// ═══════════════════════════════════════════════════════════════════════════

rmSync(TEMP_DIR, { recursive: true, force: true });

console.log(`\n═══════════════════════════════════════════════`);
console.log(`  Results: ${passed} passed, ${failed} failed`);
console.log(`═══════════════════════════════════════════════\n`);

if (failed > 0) {
  process.exit(1);
}
