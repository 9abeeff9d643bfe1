#!/usr/bin/env node
/**
 * CLI tool to list and render templates from a template tree.
 *
 * Builds a static collection from the configured root, then prints either
 * the rendered template or the names of all templates in the set.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * USAGE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   npm run render-template -- --root views --pattern "*.html" a.html
 *   npm run render-template -- --data page.json nav/login.html
 *   npm run render-template -- --list
 *
 * Options:
 *   --root <dir>        Template root (default: TEMPLATES_ROOT or "templates")
 *   --pattern <glob>    Base-name pattern, repeatable (default: TEMPLATES_PATTERNS or "*.html")
 *   --data <file>       JSON file used as the data context (default: {})
 *   --list              Print template names instead of rendering
 *   --escape-html       HTML-escape substituted values
 *   --lenient           Render missing variables as empty strings
 *   --json              Output as JSON (includes version and fingerprint)
 *   -h, --help          Show help
 *
 * Exit codes:
 *   0 - Success
 *   1 - Error (bad options, unreadable tree, unknown template, render failure)
 */

import { readFile } from "node:fs/promises";
import { parseArgs } from "node:util";
import { config as loadDotenv } from "dotenv";

import { ConfigError, loadAppConfig, type EnvSource } from "../config/index.js";
import { createLogger } from "../logging/index.js";
import { TemplateCollection } from "../templates/index.js";

// ============================================================
// Types
// ============================================================

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  /** Environment to read configuration from (default: process.env) */
  env?: EnvSource;
}

const USAGE = `
Usage: render-template [options] <name>
       render-template --list [options]

Options:
  --root <dir>        Template root (default: TEMPLATES_ROOT or "templates")
  --pattern <glob>    Base-name pattern, repeatable (default: TEMPLATES_PATTERNS or "*.html")
  --data <file>       JSON file used as the data context (default: {})
  --list              Print template names instead of rendering
  --escape-html       HTML-escape substituted values
  --lenient           Render missing variables as empty strings
  --json              Output as JSON (includes version and fingerprint)
  -h, --help          Show this help message

Exit codes:
  0 - Success
  1 - Error
`;

// ============================================================
// CLI Parsing
// ============================================================

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      root: { type: "string" },
      pattern: { type: "string", multiple: true },
      data: { type: "string" },
      list: { type: "boolean", default: false },
      "escape-html": { type: "boolean", default: false },
      lenient: { type: "boolean", default: false },
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });
}

async function readDataFile(path: string): Promise<unknown> {
  const text = await readFile(path, "utf-8");
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new Error(
      `Data file "${path}" is not valid JSON: ${err instanceof Error ? err.message : String(err)}`
    );
  }
}

// ============================================================
// Run
// ============================================================

/**
 * Execute the CLI against `argv` (without the node/script prefix).
 *
 * @returns The process exit code
 */
export async function run(argv: string[], io: CliIO): Promise<number> {
  try {
    const { values, positionals } = parseCliArgs(argv);

    if (values.help) {
      io.stdout(USAGE.trimStart());
      return 0;
    }

    const config = loadAppConfig(io.env ?? process.env);
    const root = values.root ?? config.templates.root;
    const patterns =
      values.pattern && values.pattern.length > 0 ? values.pattern : [...config.templates.patterns];

    // Diagnostics go to stderr so stdout carries only the requested output.
    const logger = createLogger({
      name: "render-template",
      level: config.logLevel,
      sink: (_level, line) => io.stderr(`${line}\n`),
    });
    const collection = await TemplateCollection.create({ root, patterns, dynamic: false }, logger);

    if (values.list) {
      const names = collection.templateSet().names();
      if (values.json) {
        io.stdout(
          JSON.stringify(
            { root: collection.root, fingerprint: collection.templateSet().fingerprint, names },
            null,
            2
          ) + "\n"
        );
      } else {
        io.stdout(names.map((n) => `${n}\n`).join(""));
      }
      return 0;
    }

    const name = positionals[0];
    if (name === undefined) {
      io.stderr("Error: a template name is required\n");
      io.stderr("  Usage: render-template [options] <name>\n");
      return 1;
    }

    const data = values.data !== undefined ? await readDataFile(values.data) : {};
    const template = await collection.get(name);
    const output = template.render(data, {
      strict: !values.lenient,
      escape: values["escape-html"] ? "html" : "none",
    });

    if (values.json) {
      io.stdout(
        JSON.stringify(
          {
            name: template.name,
            version: template.version,
            fingerprint: collection.templateSet().fingerprint,
            output,
          },
          null,
          2
        ) + "\n"
      );
    } else {
      io.stdout(output);
    }
    return 0;
  } catch (err) {
    const message =
      err instanceof ConfigError
        ? err.format()
        : err instanceof Error
          ? err.message
          : String(err);
    io.stderr(`Error: ${message}\n`);
    return 1;
  }
}

// ============================================================
// Main
// ============================================================

async function main(): Promise<void> {
  loadDotenv();
  process.exitCode = await run(process.argv.slice(2), {
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
  });
}

// Only run when executed directly (not imported by tests)
const isDirectExecution = process.argv[1] &&
  (process.argv[1].endsWith("render-template.ts") ||
   process.argv[1].endsWith("render-template.js") ||
   process.argv[1].endsWith("render-template"));

if (isDirectExecution) {
  main().catch((err: unknown) => {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`Error: ${message}`);
    process.exit(1);
  });
}
