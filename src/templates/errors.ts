/**
 * Template loading, lookup and rendering errors.
 *
 * Every error raised by the templates module extends TemplateError, so
 * callers can catch the whole family with one `instanceof` check and then
 * branch on the concrete class.
 */

export class TemplateError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TemplateError";
  }
}

function quoteList(values: readonly string[]): string {
  return `[${values.map((v) => JSON.stringify(v)).join(", ")}]`;
}

/** The root or one of its subdirectories could not be traversed. */
export class TraversalError extends TemplateError {
  constructor(
    public readonly root: string,
    public readonly path: string,
    cause?: unknown
  ) {
    super(
      `Failed to traverse root="${root}" while searching for template files` +
        (path !== root ? ` (at "${path}")` : "") +
        (cause instanceof Error ? `: ${cause.message}` : ""),
      { cause }
    );
    this.name = "TraversalError";
  }
}

/** A file pattern is not a valid base-name glob. */
export class PatternError extends TemplateError {
  constructor(
    public readonly pattern: string,
    public readonly reason: string
  ) {
    super(`Invalid file pattern ${JSON.stringify(pattern)}: ${reason}`);
    this.name = "PatternError";
  }
}

/** A matched file could not be stat'ed or read. */
export class TemplateIOError extends TemplateError {
  constructor(
    public readonly path: string,
    public readonly templateName?: string,
    cause?: unknown
  ) {
    super(
      (templateName !== undefined ? `get("${templateName}"): ` : "") +
        `failed to access template file "${path}"` +
        (cause instanceof Error ? `: ${cause.message}` : ""),
      { cause }
    );
    this.name = "TemplateIOError";
  }
}

/** Template source could not be compiled. */
export class TemplateSyntaxError extends TemplateError {
  constructor(
    public readonly templateName: string,
    public readonly line: number,
    public readonly detail: string
  ) {
    super(`Syntax error in template "${templateName}" at line ${line}: ${detail}`);
    this.name = "TemplateSyntaxError";
  }
}

/** Traversal finished without a single matching file. */
export class EmptyResultError extends TemplateError {
  constructor(
    public readonly root: string,
    public readonly patterns: readonly string[]
  ) {
    super(`Zero templates found under "${root}" with patterns ${quoteList(patterns)}`);
    this.name = "EmptyResultError";
  }
}

/**
 * Why a lookup failed:
 *   - "unknown": the name was not in the set when the lookup started
 *   - "removed": the name was known, but a reload dropped it
 */
export type NotFoundReason = "unknown" | "removed";

export class TemplateNotFoundError extends TemplateError {
  constructor(
    public readonly templateName: string,
    public readonly root: string,
    public readonly patterns: readonly string[],
    public readonly reason: NotFoundReason = "unknown"
  ) {
    super(
      reason === "removed"
        ? `After reload, template "${templateName}" no longer found in collection in root="${root}", patterns=${quoteList(patterns)}`
        : `Template "${templateName}" not found in collection in root="${root}", patterns=${quoteList(patterns)}`
    );
    this.name = "TemplateNotFoundError";
  }
}

/**
 * A reload triggered by a lookup failed. `cause` holds the build error; the
 * collection keeps serving its previous set.
 */
export class TemplateReloadError extends TemplateError {
  declare readonly cause: TemplateError;

  constructor(
    public readonly templateName: string,
    cause: TemplateError
  ) {
    super(`Reload triggered by template "${templateName}" failed: ${cause.message}`, { cause });
    this.name = "TemplateReloadError";
  }
}

/** Rendering a compiled template failed. */
export class TemplateRenderError extends TemplateError {
  constructor(
    public readonly templateName: string,
    public readonly missingVariables: string[],
    message?: string,
    cause?: unknown
  ) {
    super(
      message ??
        `Cannot render template "${templateName}": data is missing ` +
          `value(s) for: ${missingVariables.join(", ")}`,
      { cause }
    );
    this.name = "TemplateRenderError";
  }
}
