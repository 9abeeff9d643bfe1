/**
 * Logger tests.
 *
 * Run: node --import tsx src/logging/logger.test.ts
 */

import { strict as assert } from "node:assert";
import { createLogger, formatLogEntry, silentLogger, type LogSink } from "./index.js";

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

const NOW = new Date("2024-01-02T03:04:05.000Z");

// ═══════════════════════════════════════════════════════════════════════════
// FORMAT
// ═══════════════════════════════════════════════════════════════════════════

section("Entry Format");

test("entries carry timestamp, padded level, and name", () => {
  assert.equal(
    formatLogEntry("info", "templates", "Template set built", undefined, NOW),
    "[2024-01-02T03:04:05.000Z] [INFO ] [templates] Template set built"
  );
});

test("context is appended as JSON", () => {
  assert.equal(
    formatLogEntry("warn", "templates", "Reload failed", { template: "a.html", generation: 2 }, NOW),
    '[2024-01-02T03:04:05.000Z] [WARN ] [templates] Reload failed {"template":"a.html","generation":2}'
  );
});

test("empty context adds nothing", () => {
  assert.equal(
    formatLogEntry("error", "cli", "Failed", {}, NOW),
    "[2024-01-02T03:04:05.000Z] [ERROR] [cli] Failed"
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// LOGGER
// ═══════════════════════════════════════════════════════════════════════════

section("Logger");

function collect(): { lines: string[]; sink: LogSink } {
  const lines: string[] = [];
  return { lines, sink: (level, line) => lines.push(`${level}|${line}`) };
}

test("entries below the minimum level are dropped", () => {
  const { lines, sink } = collect();
  const logger = createLogger({ level: "warn", name: "watcher", sink, now: () => NOW });

  logger.debug("ignored");
  logger.info("ignored too");
  logger.warn("careful");
  logger.error("broken", { code: 1 });

  assert.deepEqual(lines, [
    "warn|[2024-01-02T03:04:05.000Z] [WARN ] [watcher] careful",
    'error|[2024-01-02T03:04:05.000Z] [ERROR] [watcher] broken {"code":1}',
  ]);
});

test("defaults to info level and the name app", () => {
  const { lines, sink } = collect();
  const logger = createLogger({ sink, now: () => NOW });
  logger.debug("hidden");
  logger.info("shown");
  assert.deepEqual(lines, ["info|[2024-01-02T03:04:05.000Z] [INFO ] [app] shown"]);
});

test("the silent logger accepts every level", () => {
  silentLogger.debug("a");
  silentLogger.info("b", { n: 1 });
  silentLogger.warn("c");
  silentLogger.error("d");
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
