/**
 * Template loading, monitoring and rendering.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * USAGE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * ```typescript
 * import { TemplateCollection } from "./templates/index.js";
 *
 * const templates = await TemplateCollection.create({
 *   root: "views",
 *   patterns: ["*.html"],
 *   dynamic: true,  // re-check files on every get(); development only
 * });
 *
 * const html = (await templates.get("a.html")).render({ title: "Home" });
 * ```
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * SYNTAX
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   Variable:    {{path.to.value}}
 *   Include:     {{template "relative/path.html"}}
 *   Truthy:      {{#if path}}body{{/if}}
 *   Equality:    {{#if path == "value"}}body{{/if}}
 *   Inequality:  {{#if path != "value"}}body{{/if}}
 *
 * See syntax.ts for the full rules.
 */

// Collection
export { TemplateCollection } from "./collection.js";

// Loader
export {
  buildTemplateSet,
  findTemplateFiles,
  compilePattern,
  type BuildResult,
} from "./loader.js";

// Compiled sets
export { TemplateSet, CompiledTemplate } from "./template-set.js";

// Parsing
export {
  parseTemplate,
  type ParsedTemplate,
  type TemplateNode,
  type Condition,
  type ConditionalOperator,
} from "./syntax.js";

// Rendering
export {
  renderTemplate,
  resolvePath,
  formatValue,
  isTruthy,
  evaluateCondition,
  escapeHtml,
  MAX_INCLUDE_DEPTH,
  type RenderOptions,
  type EscapeMode,
  type RenderableTemplate,
  type IncludeResolver,
} from "./renderer.js";

// Locking
export { Mutex } from "./lock.js";

// Errors
export {
  TemplateError,
  TraversalError,
  PatternError,
  TemplateIOError,
  TemplateSyntaxError,
  EmptyResultError,
  TemplateNotFoundError,
  TemplateReloadError,
  TemplateRenderError,
  type NotFoundReason,
} from "./errors.js";
