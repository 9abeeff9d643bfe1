/**
 * Configuration loader and validator.
 *
 * Responsible for:
 * - Validating collection options and environment-derived configuration
 * - Producing structured error messages (ConfigError.issues)
 * - Freezing validated configuration to enforce immutability
 */

import type { ZodIssue } from "zod";
import {
  ConfigError,
  optionalEnv,
  optionalEnvBool,
  optionalEnvList,
  type ConfigValidationIssue,
  type EnvSource,
} from "./env.js";
import {
  AppConfigSchema,
  CollectionOptionsSchema,
  type AppConfig,
  type ResolvedCollectionOptions,
} from "./schema.js";

/** Defaults used when the environment does not say otherwise. */
export const CONFIG_DEFAULTS = {
  logLevel: "info",
  templatesRoot: "templates",
  templatesPatterns: ["*.html"],
  templatesDynamic: false,
} as const;

/**
 * Convert Zod issues to our structured format.
 */
function formatZodIssues(zodIssues: ZodIssue[]): ConfigValidationIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Deep freeze an object to enforce runtime immutability.
 */
function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const value of Object.values(obj)) {
    if (value && typeof value === "object" && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

/**
 * Validate collection options.
 *
 * @param input - Raw options (e.g. `{ root, patterns, dynamic }`)
 * @returns Validated, defaulted and frozen options
 * @throws ConfigError if validation fails
 */
export function parseCollectionOptions(input: unknown): Readonly<ResolvedCollectionOptions> {
  const result = CollectionOptionsSchema.safeParse(input);

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new ConfigError(
      `Invalid template collection options: ${issues.length} validation error(s)`,
      issues
    );
  }

  return deepFreeze(result.data);
}

/**
 * Load and validate application configuration from environment variables.
 *
 * Recognized variables: LOG_LEVEL, TEMPLATES_ROOT,
 * TEMPLATES_PATTERNS (comma-separated) and TEMPLATES_DYNAMIC.
 *
 * @throws ConfigError if any value is malformed
 */
export function loadAppConfig(source: EnvSource = process.env): Readonly<AppConfig> {
  const raw = {
    logLevel: optionalEnv("LOG_LEVEL", CONFIG_DEFAULTS.logLevel, source),
    templates: {
      root: optionalEnv("TEMPLATES_ROOT", CONFIG_DEFAULTS.templatesRoot, source),
      patterns: optionalEnvList("TEMPLATES_PATTERNS", CONFIG_DEFAULTS.templatesPatterns, source),
      dynamic: optionalEnvBool("TEMPLATES_DYNAMIC", CONFIG_DEFAULTS.templatesDynamic, source),
    },
  };

  const result = AppConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new ConfigError(
      `Invalid configuration: ${issues.length} validation error(s)`,
      issues
    );
  }

  return deepFreeze(result.data);
}
