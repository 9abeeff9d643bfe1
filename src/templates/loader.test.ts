/**
 * Template tree loader tests.
 *
 * Run: node --import tsx src/templates/loader.test.ts
 *
 * Tests cover:
 *   1. Pattern validation — malformed globs are rejected up front
 *   2. Traversal — base-name matching, ordering, de-duplication
 *   3. Build — member naming, snapshots, cross-file includes
 *   4. Symbolic links — linked files are members, linked directories are not
 *   5. Failures — missing root, unreadable files and directories, empty
 *      result, syntax errors
 */

import { strict as assert } from "node:assert";
import { chmodSync, mkdirSync, mkdtempSync, rmSync, symlinkSync, utimesSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { tmpdir } from "node:os";

import { buildTemplateSet, compilePattern, findTemplateFiles } from "./loader.js";
import {
  EmptyResultError,
  PatternError,
  TemplateIOError,
  TemplateSyntaxError,
  TraversalError,
} from "./errors.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

async function test(name: string, fn: () => void | Promise<void>): Promise<void> {
  try {
    await fn();
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

const TEST_DIR = mkdtempSync(join(tmpdir(), "template-loader-test-"));
let treeCount = 0;

/** Create a fresh directory holding the given files (relative path → contents). */
function makeTree(files: Record<string, string>): string {
  const root = join(TEST_DIR, `tree-${++treeCount}`);
  mkdirSync(root, { recursive: true });
  for (const [path, contents] of Object.entries(files)) {
    const full = join(root, path);
    mkdirSync(dirname(full), { recursive: true });
    writeFileSync(full, contents);
  }
  return root;
}

// ═══════════════════════════════════════════════════════════════════════════
// PATTERNS
// ═══════════════════════════════════════════════════════════════════════════

section("Patterns");

for (const [pattern, reason] of [
  ["", "pattern is empty"],
  ["s/*.html", "cannot contain \"/\""],
  ["[abc", "unterminated character class"],
  ["a[]", "unterminated character class"],
  ["abc\\", "trailing escape character"],
] as const) {
  await test(`rejects ${JSON.stringify(pattern)}`, () => {
    assert.throws(
      () => compilePattern(pattern),
      (err: unknown) => {
        assert.ok(err instanceof PatternError);
        assert.equal(err.pattern, pattern);
        assert.ok(err.message.includes(reason), err.message);
        return true;
      }
    );
  });
}

await test("accepts character classes, braces and escapes", () => {
  assert.equal(compilePattern("[ab].html").match("b.html"), true);
  assert.equal(compilePattern("[!a].html").match("a.html"), false);
  assert.equal(compilePattern("{a,b}.css").match("b.css"), true);
  assert.equal(compilePattern("\\*.txt").match("*.txt"), true);
});

await test("'*' matches names starting with a dot", () => {
  assert.equal(compilePattern("*.html").match(".partial.html"), true);
});

// ═══════════════════════════════════════════════════════════════════════════
// TRAVERSAL
// ═══════════════════════════════════════════════════════════════════════════

section("Traversal");

await test("matches base names at every depth, in sorted depth-first order", async () => {
  const root = makeTree({
    "a.html": "a",
    "foo.bar": "ignored",
    "s/b.html": "b",
    "s/c.css": "ignored",
    ".hidden.html": "h",
    "z/deep/x.html": "x",
  });
  const files = await findTemplateFiles(root, ["*.html", "*.blah"]);
  assert.deepEqual(files, [".hidden.html", "a.html", "s/b.html", "z/deep/x.html"]);
});

await test("a file matching several patterns is listed once", async () => {
  const root = makeTree({ "a.html": "a", "b.css": "b" });
  const files = await findTemplateFiles(root, ["*.html", "a.*", "*"]);
  assert.deepEqual(files, ["a.html", "b.css"]);
});

await test("directories whose name matches are not templates", async () => {
  const root = makeTree({ "dir.html/inner.txt": "x", "real.html": "r" });
  const files = await findTemplateFiles(root, ["*.html"]);
  assert.deepEqual(files, ["real.html"]);
});

await test("a malformed pattern fails before traversal", async () => {
  await assert.rejects(findTemplateFiles(join(TEST_DIR, "does-not-exist"), ["["]), PatternError);
});

// ═══════════════════════════════════════════════════════════════════════════
// BUILD
// ═══════════════════════════════════════════════════════════════════════════

section("Build");

await test("compiles every match, named by relative path", async () => {
  const root = makeTree({
    "a.html": 'A({{template "s/b.html"}})',
    "s/b.html": "B()",
    "foo.bar": "What!?",
  });
  const { set } = await buildTemplateSet(root, ["*.html", "*.blah"]);
  assert.deepEqual(set.names(), ["a.html", "s/b.html"]);
  assert.equal(set.lookup("a.html")?.render(), "A(B())");
});

await test("snapshot records each file's modification time", async () => {
  const root = makeTree({ "a.html": "a", "s/b.html": "b" });
  utimesSync(join(root, "a.html"), 1_700_000_000, 1_700_000_000);
  utimesSync(join(root, "s/b.html"), 1_700_000_500, 1_700_000_500);
  const { snapshot } = await buildTemplateSet(root, ["*.html"]);
  assert.deepEqual(
    [...snapshot],
    [
      ["a.html", 1_700_000_000_000_000_000n],
      ["s/b.html", 1_700_000_500_000_000_000n],
    ]
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// SYMBOLIC LINKS
// ═══════════════════════════════════════════════════════════════════════════

section("Symbolic Links");

await test("a linked file is a member under the link's name", async () => {
  const shared = makeTree({ "footer.html": "F({{year}})" });
  const root = makeTree({ "a.html": 'A({{template "footer.html"}})' });
  symlinkSync(join(shared, "footer.html"), join(root, "footer.html"));

  const { set, snapshot } = await buildTemplateSet(root, ["*.html"]);
  assert.deepEqual(set.names(), ["a.html", "footer.html"]);
  assert.deepEqual([...snapshot.keys()], ["a.html", "footer.html"]);
  assert.equal(set.lookup("a.html")?.render({ year: 2024 }), "A(F(2024))");
});

await test("linked directories are not descended into", async () => {
  const shared = makeTree({ "x.html": "x" });
  const root = makeTree({ "a.html": "a" });
  symlinkSync(shared, join(root, "linked"));
  symlinkSync(shared, join(root, "linked.html"));

  assert.deepEqual(await findTemplateFiles(root, ["*.html"]), ["a.html"]);
});

await test("a dangling link is listed, then fails the build", async () => {
  const root = makeTree({ "a.html": "a" });
  const link = join(root, "gone.html");
  symlinkSync(join(TEST_DIR, "nowhere.html"), link);

  assert.deepEqual(await findTemplateFiles(root, ["*.html"]), ["a.html", "gone.html"]);
  await assert.rejects(buildTemplateSet(root, ["*.html"]), (err: unknown) => {
    assert.ok(err instanceof TemplateIOError);
    assert.equal(err.path, link);
    assert.equal(err.templateName, undefined);
    assert.ok(err.message.startsWith(`failed to access template file "${link}": `), err.message);
    return true;
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// FAILURES
// ═══════════════════════════════════════════════════════════════════════════

section("Failures");

await test("missing root is a traversal error", async () => {
  const missing = join(TEST_DIR, "nope");
  await assert.rejects(buildTemplateSet(missing, ["*.html"]), (err: unknown) => {
    assert.ok(err instanceof TraversalError);
    assert.equal(err.root, missing);
    assert.ok(err.message.startsWith(`Failed to traverse root="${missing}"`), err.message);
    return true;
  });
});

await test("a root that is a file is a traversal error", async () => {
  const root = makeTree({ "file.html": "x" });
  await assert.rejects(buildTemplateSet(join(root, "file.html"), ["*.html"]), TraversalError);
});

await test("an unreadable subdirectory is a traversal error naming it", async () => {
  // Permission bits do not restrict root, so only unprivileged runs can fail readdir.
  if (process.getuid?.() === 0) return;
  const root = makeTree({ "a.html": "a", "locked/b.html": "b" });
  const locked = join(root, "locked");
  chmodSync(locked, 0o000);
  try {
    await assert.rejects(buildTemplateSet(root, ["*.html"]), (err: unknown) => {
      assert.ok(err instanceof TraversalError);
      assert.equal(err.root, root);
      assert.equal(err.path, locked);
      return true;
    });
  } finally {
    chmodSync(locked, 0o755);
  }
});

await test("traversal errors below the root name the directory", () => {
  const err = new TraversalError("/views", "/views/locked", new Error("EACCES: permission denied"));
  assert.equal(
    err.message,
    'Failed to traverse root="/views" while searching for template files (at "/views/locked"): EACCES: permission denied'
  );
});

await test("zero matches is an empty-result error", async () => {
  const root = makeTree({ "a.html": "a" });
  await assert.rejects(buildTemplateSet(root, ["*.txt"]), (err: unknown) => {
    assert.ok(err instanceof EmptyResultError);
    assert.equal(err.message, `Zero templates found under "${root}" with patterns ["*.txt"]`);
    return true;
  });
});

await test("a syntax error names the offending file", async () => {
  const root = makeTree({ "a.html": "ok", "s/b.html": "line\n{{#if x}}" });
  await assert.rejects(buildTemplateSet(root, ["*.html"]), (err: unknown) => {
    assert.ok(err instanceof TemplateSyntaxError);
    assert.equal(err.templateName, "s/b.html");
    assert.equal(err.line, 2);
    return true;
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// Cleanup
// ═══════════════════════════════════════════════════════════════════════════

rmSync(TEST_DIR, { recursive: true, force: true });

// ═══════════════════════════════════════════════════════════════════════════
// Summary
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n${"═".repeat(60)}`);
console.log(`  ${passed} passed, ${failed} failed, ${passed + failed} total`);
console.log(`${"═".repeat(60)}\n`);

if (failed > 0) {
  process.exit(1);
}
