/**
 * Template parsing.
 *
 * A template is plain text (HTML, CSS, JS, Markdown, ...) containing
 * double-brace tags.  This module turns the source into an immutable node
 * tree and records which variables and which other templates it uses, so
 * problems are reported when the set is built rather than when a page is
 * served.
 *
 * TEMPLATE FORMAT:
 *
 *   VARIABLE SUBSTITUTION:
 *     {{user.name}}                 — value at a dotted path of the data
 *     {{ items.0 }}                 — whitespace inside braces is trimmed
 *
 *   INCLUDES:
 *     {{template "nav/menu.html"}}  — render another member of the same set
 *
 *   CONDITIONAL BLOCKS:
 *     {{#if user}}…{{/if}}                  — truthy check
 *     {{#if user.role == "admin"}}…{{/if}}  — equality against a literal
 *     {{#if page.kind != "draft"}}…{{/if}}  — inequality against a literal
 *
 * Rules:
 *   - Conditional blocks may nest; each {{#if}} needs its own {{/if}}
 *   - Include names are the template names of the set (paths relative to the
 *     collection root, `/`-separated)
 *   - Any other tag is a syntax error
 */

import { TemplateSyntaxError } from "./errors.js";

// ---------------------------------------------------------------------------
// Node tree
// ---------------------------------------------------------------------------

/** Supported conditional operators. */
export type ConditionalOperator = "==" | "!=" | "truthy";

export interface Condition {
  /** The data path being tested. */
  readonly variable: string;
  readonly operator: ConditionalOperator;
  /** The literal for == / != comparisons. */
  readonly value?: string;
}

export type TemplateNode =
  | { readonly kind: "text"; readonly text: string }
  | { readonly kind: "variable"; readonly path: string; readonly line: number }
  | { readonly kind: "include"; readonly name: string; readonly line: number }
  | {
      readonly kind: "if";
      readonly condition: Condition;
      readonly body: readonly TemplateNode[];
      readonly line: number;
    };

/**
 * A parsed template: its source, node tree, and what it refers to.
 */
export interface ParsedTemplate {
  readonly name: string;
  readonly source: string;
  readonly nodes: readonly TemplateNode[];
  /** Unique data paths used by placeholders and conditions, sorted. */
  readonly variables: readonly string[];
  /** Unique template names pulled in with {{template "…"}}, sorted. */
  readonly references: readonly string[];
}

// ---------------------------------------------------------------------------
// Regex
// ---------------------------------------------------------------------------

/** Matches one `{{…}}` tag; group 1 is the raw tag body. */
const TAG_RE = /\{\{([\s\S]*?)\}\}/g;

const PATH = "[a-zA-Z_][a-zA-Z0-9_]*(?:\\.[a-zA-Z0-9_]+)*";

const VARIABLE_RE = new RegExp(`^${PATH}$`);

/**
 * Groups:
 *   1: variable path
 *   2: operator (== or !=), optional
 *   3: comparison literal (inside quotes), optional
 */
const IF_RE = new RegExp(`^#if\\s+(${PATH})\\s*(?:(==|!=)\\s*"([^"]*)")?$`);

const INCLUDE_RE = /^template\s+"([^"]+)"$/;

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

interface OpenBlock {
  readonly condition: Condition;
  readonly line: number;
  readonly body: TemplateNode[];
}

function countNewlines(text: string, from: number, to: number): number {
  let count = 0;
  for (let i = from; i < to; i++) {
    if (text.charCodeAt(i) === 10) count++;
  }
  return count;
}

/**
 * Parse template source into a node tree.
 *
 * @param source - The raw template text
 * @param name   - Template name, used as the member name and in errors
 * @throws TemplateSyntaxError on an unknown, empty or unclosed tag, or on
 *         unbalanced {{#if}}/{{/if}}
 */
export function parseTemplate(source: string, name: string): ParsedTemplate {
  const root: TemplateNode[] = [];
  const stack: OpenBlock[] = [];
  const variables = new Set<string>();
  const references = new Set<string>();

  let line = 1;
  let cursor = 0;
  let match: RegExpExecArray | null;

  const current = (): TemplateNode[] =>
    stack.length > 0 ? stack[stack.length - 1].body : root;

  // `line` is the line on which `text` starts.
  const pushText = (text: string): void => {
    if (text === "") return;
    const open = text.indexOf("{{");
    if (open !== -1) {
      throw new TemplateSyntaxError(
        name,
        line + countNewlines(text, 0, open),
        "unclosed tag (missing \"}}\")"
      );
    }
    current().push({ kind: "text", text });
  };

  TAG_RE.lastIndex = 0;
  while ((match = TAG_RE.exec(source)) !== null) {
    const text = source.slice(cursor, match.index);
    pushText(text);
    line += countNewlines(source, cursor, match.index);
    const tagLine = line;
    line += countNewlines(match[0], 0, match[0].length);
    cursor = match.index + match[0].length;

    const body = match[1].trim();

    if (body === "") {
      throw new TemplateSyntaxError(name, tagLine, "empty tag {{}}");
    }

    const include = INCLUDE_RE.exec(body);
    if (include) {
      references.add(include[1]);
      current().push({ kind: "include", name: include[1], line: tagLine });
      continue;
    }

    if (body.startsWith("#if")) {
      const cond = IF_RE.exec(body);
      if (!cond) {
        throw new TemplateSyntaxError(
          name,
          tagLine,
          `malformed conditional {{${body}}} (expected {{#if path}} or {{#if path == "value"}})`
        );
      }
      const [, variable, operator, value] = cond;
      variables.add(variable);
      const condition: Condition =
        operator === "==" || operator === "!="
          ? { variable, operator, value }
          : { variable, operator: "truthy" };
      stack.push({ condition, line: tagLine, body: [] });
      continue;
    }

    if (body === "/if") {
      const block = stack.pop();
      if (!block) {
        throw new TemplateSyntaxError(name, tagLine, "{{/if}} without a matching {{#if}}");
      }
      current().push({
        kind: "if",
        condition: block.condition,
        body: block.body,
        line: block.line,
      });
      continue;
    }

    if (VARIABLE_RE.test(body)) {
      variables.add(body);
      current().push({ kind: "variable", path: body, line: tagLine });
      continue;
    }

    if (/^template\b/.test(body)) {
      throw new TemplateSyntaxError(
        name,
        tagLine,
        `malformed include {{${body}}} (expected {{template "name"}})`
      );
    }

    throw new TemplateSyntaxError(name, tagLine, `unrecognized tag {{${body}}}`);
  }

  pushText(source.slice(cursor));

  const unclosed = stack.pop();
  if (unclosed) {
    throw new TemplateSyntaxError(
      name,
      unclosed.line,
      `{{#if ${unclosed.condition.variable}}} is never closed with {{/if}}`
    );
  }

  return {
    name,
    source,
    nodes: root,
    variables: [...variables].sort(),
    references: [...references].sort(),
  };
}
