/**
 * Template collections: load a directory tree of templates, serve them by
 * name, and optionally rebuild the set when files change on disk.
 */

export * from "./templates/index.js";
export * from "./config/index.js";
export * from "./logging/index.js";
