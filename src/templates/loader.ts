/**
 * Template tree loader.
 *
 * Walks a root directory, keeps every file (or link to one) whose base name matches
 * one of the configured glob patterns, and compiles all of them into one
 * TemplateSet.  Each member is named by its path relative to the root
 * (always `/`-separated), which is also the name other templates use to
 * include it:
 *
 *   views/
 *     a.html        → "a.html"
 *     s/b.html      → "s/b.html"   ({{template "s/b.html"}})
 *
 * USAGE:
 *
 *   const { set, snapshot } = await buildTemplateSet("views", ["*.html", "*.css"]);
 *   set.lookup("a.html")?.render({ title: "Home" });
 *
 * The returned snapshot maps every member name to the modification time
 * (ns since epoch, as a bigint) read just before the file's contents, which
 * is what the collection compares against to decide whether a rebuild is
 * needed.
 */

import type { Dirent } from "node:fs";
import { readdir, readFile, stat } from "node:fs/promises";
import { join, resolve } from "node:path";
import { Minimatch } from "minimatch";

import {
  EmptyResultError,
  PatternError,
  TemplateIOError,
  TraversalError,
} from "./errors.js";
import { parseTemplate, type ParsedTemplate } from "./syntax.js";
import { TemplateSet } from "./template-set.js";

export interface BuildResult {
  readonly set: TemplateSet;
  /** Member name → mtime (ns) observed when the file was read. */
  readonly snapshot: ReadonlyMap<string, bigint>;
}

// ---------------------------------------------------------------------------
// Patterns
// ---------------------------------------------------------------------------

/**
 * Check that a pattern is a well-formed base-name glob and compile it.
 *
 * Patterns are matched against a file's base name only, so a pattern that
 * contains "/" could never match and is rejected.  Dot files are matched by
 * "*"; negation ("!") and comments ("#") are not interpreted.
 *
 * @throws PatternError
 */
export function compilePattern(pattern: string): Minimatch {
  if (pattern === "") {
    throw new PatternError(pattern, "pattern is empty");
  }
  if (pattern.includes("/")) {
    throw new PatternError(pattern, "patterns match base names only and cannot contain \"/\"");
  }

  let inClass = false;
  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern[i];
    if (ch === "\\") {
      if (i === pattern.length - 1) {
        throw new PatternError(pattern, "trailing escape character");
      }
      i++;
    } else if (ch === "[" && !inClass) {
      inClass = true;
      // A "]" right after "[" or "[!" / "[^" is a literal member of the class.
      if (pattern[i + 1] === "!" || pattern[i + 1] === "^") i++;
      if (pattern[i + 1] === "]") i++;
    } else if (ch === "]" && inClass) {
      inClass = false;
    }
  }
  if (inClass) {
    throw new PatternError(pattern, "unterminated character class \"[\"");
  }

  return new Minimatch(pattern, { dot: true, nonegate: true, nocomment: true });
}

// ---------------------------------------------------------------------------
// Traversal
// ---------------------------------------------------------------------------

async function pointsToDirectory(linkPath: string): Promise<boolean> {
  try {
    return (await stat(linkPath)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * List the files under `root` whose base name matches one of `patterns`.
 *
 * Directories are visited depth-first with entries in code-unit order of
 * their names.  A matching symbolic link is listed unless it points to a
 * directory; linked directories are never descended into.  A file matching
 * several patterns is listed once.
 *
 * @returns Relative, `/`-separated paths in traversal order
 * @throws PatternError   if a pattern is malformed
 * @throws TraversalError if the root or a subdirectory cannot be read
 */
export async function findTemplateFiles(
  root: string,
  patterns: readonly string[]
): Promise<string[]> {
  const matchers = patterns.map(compilePattern);
  const absoluteRoot = resolve(root);
  const files: string[] = [];

  async function walk(relativeDir: string): Promise<void> {
    const dir = relativeDir === "" ? absoluteRoot : join(absoluteRoot, relativeDir);
    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (err) {
      throw new TraversalError(absoluteRoot, dir, err);
    }
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const relativePath = relativeDir === "" ? entry.name : `${relativeDir}/${entry.name}`;
      if (entry.isDirectory()) {
        await walk(relativePath);
        continue;
      }
      if (!matchers.some((m) => m.match(entry.name))) {
        continue;
      }
      if (entry.isFile()) {
        files.push(relativePath);
      } else if (entry.isSymbolicLink() && !(await pointsToDirectory(join(dir, entry.name)))) {
        // Kept even when dangling, so the build reports it as unreadable.
        files.push(relativePath);
      }
    }
  }

  await walk("");
  return files;
}

// ---------------------------------------------------------------------------
// Build
// ---------------------------------------------------------------------------

/**
 * Find, read and compile every matching template under `root`.
 *
 * Any failure aborts the build; no partial set is ever returned.
 *
 * @throws PatternError        if a pattern is malformed
 * @throws TraversalError      if the tree cannot be walked
 * @throws TemplateIOError     if a matched file cannot be stat'ed or read
 * @throws TemplateSyntaxError if a matched file does not compile
 * @throws EmptyResultError    if nothing matched
 */
export async function buildTemplateSet(
  root: string,
  patterns: readonly string[]
): Promise<BuildResult> {
  const absoluteRoot = resolve(root);
  const files = await findTemplateFiles(absoluteRoot, patterns);

  if (files.length === 0) {
    throw new EmptyResultError(absoluteRoot, patterns);
  }

  const parsed: ParsedTemplate[] = [];
  const snapshot = new Map<string, bigint>();

  for (const name of files) {
    const filePath = join(absoluteRoot, name);
    let modTime: bigint;
    let source: string;
    try {
      modTime = (await stat(filePath, { bigint: true })).mtimeNs;
      source = await readFile(filePath, "utf-8");
    } catch (err) {
      throw new TemplateIOError(filePath, undefined, err);
    }
    parsed.push(parseTemplate(source, name));
    snapshot.set(name, modTime);
  }

  return { set: new TemplateSet(parsed), snapshot };
}
