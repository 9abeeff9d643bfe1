/**
 * Template renderer.
 *
 * Walks a parsed node tree against a data context and produces the output
 * text.  Rendering is purely mechanical: values are looked up by dotted
 * path, conditional blocks are included or dropped, and includes are
 * resolved by name through the caller-supplied resolver (the template's own
 * set).
 *
 * Processing rules:
 *
 *   1. `{{path}}` — the value at `path` is formatted and substituted.  A
 *      missing (undefined or null) value is an error in strict mode and the
 *      empty string otherwise.
 *   2. `{{#if …}}` — see `evaluateCondition()`.  Variables inside an excluded
 *      block are never looked up, so they cannot be "missing".
 *   3. `{{template "name"}}` — the named member is rendered with the same
 *      data and options.  Unknown names and runaway include chains are
 *      errors.
 */

import { TemplateRenderError } from "./errors.js";
import type { Condition, TemplateNode } from "./syntax.js";

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export type EscapeMode = "none" | "html";

export interface RenderOptions {
  /**
   * When true (default), rendering fails if a substituted variable has no
   * value in the data.  Set to false to render missing values as "".
   */
  strict?: boolean;

  /**
   * How substituted values are escaped.  "html" escapes & < > " and ';
   * literal template text is never escaped.  Default: "none".
   */
  escape?: EscapeMode;
}

/** Anything the renderer can walk. */
export interface RenderableTemplate {
  readonly name: string;
  readonly nodes: readonly TemplateNode[];
}

export type IncludeResolver = (name: string) => RenderableTemplate | undefined;

/** Include chains deeper than this are treated as cycles. */
export const MAX_INCLUDE_DEPTH = 32;

// ---------------------------------------------------------------------------
// Values
// ---------------------------------------------------------------------------

/**
 * Look up a dotted path in the data context.
 *
 * Plain objects are searched by own property, Maps by key.  Returns
 * undefined as soon as a segment cannot be followed.
 */
export function resolvePath(data: unknown, path: string): unknown {
  let current: unknown = data;
  for (const segment of path.split(".")) {
    if (current instanceof Map) {
      current = current.get(segment);
    } else if (typeof current === "object" && current !== null && Object.hasOwn(current, segment)) {
      current = Reflect.get(current, segment);
    } else {
      return undefined;
    }
  }
  return current;
}

/**
 * Format a value for substitution.
 *
 * Strings pass through; arrays are comma-joined; other objects become JSON.
 * Throws on values JSON cannot encode, such as circular objects.
 */
export function formatValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (
    typeof value === "number" ||
    typeof value === "boolean" ||
    typeof value === "bigint"
  ) {
    return String(value);
  }
  if (Array.isArray(value)) {
    return value.map(formatValue).join(", ");
  }
  if (value === undefined || value === null) return "";
  return JSON.stringify(value) ?? "";
}

/**
 * Truthiness used by `{{#if path}}`: undefined, null, false, 0, "" and empty
 * arrays are false.
 */
export function isTruthy(value: unknown): boolean {
  if (Array.isArray(value)) return value.length > 0;
  return Boolean(value);
}

/**
 * Evaluate a condition against the data context.
 *
 * Rules:
 *   - truthy: see isTruthy()
 *   - ==: the formatted value equals the literal; a missing value never matches
 *   - !=: the formatted value differs from the literal; a missing value always
 *     differs
 */
export function evaluateCondition(condition: Condition, data: unknown): boolean {
  const value = resolvePath(data, condition.variable);
  const missing = value === undefined || value === null;

  switch (condition.operator) {
    case "truthy":
      return isTruthy(value);

    case "==":
      return !missing && formatValue(value) === condition.value;

    case "!=":
      return missing || formatValue(value) !== condition.value;
  }
}

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&#34;",
  "'": "&#39;",
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

// ---------------------------------------------------------------------------
// Renderer
// ---------------------------------------------------------------------------

/**
 * Render a template against a data context.
 *
 * @param template - The template to render
 * @param data     - The data context `{{path}}` lookups run against
 * @param resolve  - Finds included templates by name
 * @param options  - Strictness and escaping
 * @throws TemplateRenderError if a variable is missing (strict mode), an
 *         include names an unknown template, or includes nest too deeply
 */
export function renderTemplate(
  template: RenderableTemplate,
  data: unknown,
  resolve: IncludeResolver,
  options: RenderOptions = {},
  depth = 0
): string {
  const { strict = true, escape = "none" } = options;
  const missing = new Set<string>();
  const out: string[] = [];

  const walk = (nodes: readonly TemplateNode[]): void => {
    for (const node of nodes) {
      switch (node.kind) {
        case "text":
          out.push(node.text);
          break;

        case "variable": {
          const value = resolvePath(data, node.path);
          if (value === undefined || value === null) {
            missing.add(node.path);
            break;
          }
          let text: string;
          try {
            text = formatValue(value);
          } catch (err) {
            throw new TemplateRenderError(
              template.name,
              [],
              `Template "${template.name}" (line ${node.line}) cannot format the value of "${node.path}": ${err instanceof Error ? err.message : String(err)}`,
              err
            );
          }
          out.push(escape === "html" ? escapeHtml(text) : text);
          break;
        }

        case "if":
          if (evaluateCondition(node.condition, data)) {
            walk(node.body);
          }
          break;

        case "include": {
          const target = resolve(node.name);
          if (!target) {
            throw new TemplateRenderError(
              template.name,
              [],
              `Template "${template.name}" (line ${node.line}) includes "${node.name}", which is not defined in its set`
            );
          }
          if (depth + 1 > MAX_INCLUDE_DEPTH) {
            throw new TemplateRenderError(
              template.name,
              [],
              `Template "${template.name}" (line ${node.line}) exceeded the maximum include depth of ${MAX_INCLUDE_DEPTH} while including "${node.name}"`
            );
          }
          out.push(renderTemplate(target, data, resolve, options, depth + 1));
          break;
        }
      }
    }
  };

  walk(template.nodes);

  if (strict && missing.size > 0) {
    throw new TemplateRenderError(template.name, [...missing].sort());
  }

  return out.join("");
}
