/**
 * Tests for the logger and run IDs.
 *
 * Run: node --import tsx src/logging/logger.test.ts
 */

import { strict as assert } from "node:assert";
import { readFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import {
  createLogger,
  formatLogEntry,
  generateRunId,
  getRunId,
  initRunId,
  type LogLevel,
} from "./index.js";

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

function captureLogger(level: LogLevel = "debug") {
  const captured: Array<{ level: LogLevel; entry: string }> = [];
  const logger = createLogger({
    level,
    console: false,
    file: false,
    sink: (entryLevel, entry) => captured.push({ level: entryLevel, entry }),
  });
  return { logger, captured };
}

const TIMESTAMP = new Date("2025-03-01T10:00:00.000Z");

// ═══════════════════════════════════════════════════════════════════════════
// RUN IDS
// ═══════════════════════════════════════════════════════════════════════════

section("Run IDs");

test("entries before a run is started say so", () => {
  assert.equal(getRunId(), null);
  assert.equal(
    formatLogEntry("info", "hello", undefined, TIMESTAMP),
    "[2025-03-01T10:00:00.000Z] [INFO ] [no-run-id] hello"
  );
});

test("run IDs carry the UTC date and six hex digits", () => {
  const id = generateRunId(TIMESTAMP);
  assert.ok(/^20250301-[0-9a-f]{6}$/.test(id), id);
});

test("initRunId sets the current run ID", () => {
  const id = initRunId();
  assert.equal(getRunId(), id);
  assert.ok(formatLogEntry("warn", "x", undefined, TIMESTAMP).includes(`[WARN ] [${id}] x`));
});

// ═══════════════════════════════════════════════════════════════════════════
// FORMATTING AND FILTERING
// ═══════════════════════════════════════════════════════════════════════════

section("Formatting and Filtering");

test("context is appended as JSON", () => {
  const entry = formatLogEntry("error", "failed", { file: "a.json", count: 2 }, TIMESTAMP);
  assert.ok(entry.endsWith(' failed {"file":"a.json","count":2}'));
});

test("an empty context adds nothing", () => {
  assert.ok(formatLogEntry("debug", "quiet", {}, TIMESTAMP).endsWith("] quiet"));
});

test("entries below the level are dropped", () => {
  const { logger, captured } = captureLogger("warn");
  logger.debug("d");
  logger.info("i");
  logger.warn("w");
  logger.error("e");
  assert.deepEqual(
    captured.map(({ level }) => level),
    ["warn", "error"]
  );
});

test("child loggers merge their bindings", () => {
  const { logger, captured } = captureLogger();
  logger.child({ pipeline: "oral" }).child({ step: "load" }).info("loaded", { file: "a.json" });
  assert.ok(captured[0]?.entry.endsWith(' loaded {"pipeline":"oral","step":"load","file":"a.json"}'));
});

test("entry context wins over bindings", () => {
  const { logger, captured } = captureLogger();
  logger.child({ pipeline: "oral" }).info("x", { pipeline: "written" });
  assert.ok(captured[0]?.entry.endsWith(' x {"pipeline":"written"}'));
});

test("file output appends one line per entry", () => {
  const logDir = join(tmpdir(), `topic-logger-test-${Date.now()}`);
  const logger = createLogger({ logDir, logFile: "test.log", console: false, file: true });
  logger.info("first");
  logger.warn("second");
  const lines = readFileSync(join(logDir, "test.log"), "utf-8").trimEnd().split("\n");
  assert.equal(lines.length, 2);
  assert.ok(lines[0]?.endsWith("] first"));
  assert.ok(lines[1]?.includes("[WARN ]"));
  rmSync(logDir, { recursive: true, force: true });
});

// ═══════════════════════════════════════════════════════════════════════════
// Summary
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n${"═".repeat(60)}`);
console.log(`  ${passed} passed, ${failed} failed, ${passed + failed} total`);
console.log(`${"═".repeat(60)}\n`);

if (failed > 0) {
  process.exit(1);
}
