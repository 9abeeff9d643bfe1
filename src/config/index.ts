/**
 * Configuration module.
 *
 * Usage:
 *   import { loadAppConfig, parseCollectionOptions } from "./config/index.js";
 *
 *   // From the environment (LOG_LEVEL, TEMPLATES_*)
 *   const config = loadAppConfig();
 *
 *   // Explicit collection options
 *   const options = parseCollectionOptions({ root: "views", patterns: ["*.html"] });
 */

export {
  ConfigError,
  requireEnv,
  optionalEnv,
  optionalEnvBool,
  optionalEnvList,
  type ConfigValidationIssue,
  type EnvSource,
} from "./env.js";

export {
  LogLevelSchema,
  CollectionOptionsSchema,
  AppConfigSchema,
  type CollectionOptions,
  type ResolvedCollectionOptions,
  type AppConfig,
} from "./schema.js";

export {
  CONFIG_DEFAULTS,
  parseCollectionOptions,
  loadAppConfig,
} from "./loader.js";
