/**
 * Configuration schema definitions.
 *
 * Collection options are validated once, when a collection is created, and
 * then treated as read-only: root, patterns and mode never change for the
 * lifetime of a collection.
 */

import { z } from "zod";

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

/**
 * Options accepted by `TemplateCollection.create()`.
 */
export const CollectionOptionsSchema = z
  .object({
    /** Directory searched (recursively) for template files */
    root: z.string().min(1, "root must be a non-empty path"),

    /**
     * Glob patterns matched against each file's base name, in order.
     * Pattern syntax is checked by the loader, which reports PatternError.
     */
    patterns: z
      .array(z.string())
      .min(1, "at least one file pattern is required"),

    /** Re-check files on every lookup and reload when any changed */
    dynamic: z.boolean().default(false),
  })
  .strict();

/**
 * Application configuration assembled from the environment.
 */
export const AppConfigSchema = z
  .object({
    logLevel: LogLevelSchema,
    templates: CollectionOptionsSchema,
  })
  .strict();

export type CollectionOptions = z.input<typeof CollectionOptionsSchema>;
export type ResolvedCollectionOptions = z.output<typeof CollectionOptionsSchema>;
export type AppConfig = z.output<typeof AppConfigSchema>;
