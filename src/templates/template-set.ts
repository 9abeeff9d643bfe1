/**
 * Compiled template sets.
 *
 * A TemplateSet is the product of one build: an ordered, immutable group of
 * compiled members that include one another by name.  A set is never edited;
 * picking up changes means building a new one.  Every CompiledTemplate keeps
 * a reference to the set it belongs to, so a handle obtained before a reload
 * keeps rendering the content of its own build.
 */

import { createHash } from "node:crypto";
import type { Writable } from "node:stream";

import { TemplateError } from "./errors.js";
import { renderTemplate, type RenderOptions } from "./renderer.js";
import { parseTemplate, type ParsedTemplate, type TemplateNode } from "./syntax.js";

/** Number of hex characters to use from the SHA-256 digest. */
const HASH_LENGTH = 12;

export class CompiledTemplate {
  /** Short content hash of the source; changes whenever the text changes. */
  readonly version: string;

  constructor(
    private readonly parsed: ParsedTemplate,
    private readonly set: TemplateSet
  ) {
    this.version = createHash("sha256")
      .update(parsed.source, "utf-8")
      .digest("hex")
      .slice(0, HASH_LENGTH);
  }

  get name(): string {
    return this.parsed.name;
  }

  get source(): string {
    return this.parsed.source;
  }

  get nodes(): readonly TemplateNode[] {
    return this.parsed.nodes;
  }

  get variables(): readonly string[] {
    return this.parsed.variables;
  }

  get references(): readonly string[] {
    return this.parsed.references;
  }

  /** The set this template was compiled into. */
  get templateSet(): TemplateSet {
    return this.set;
  }

  /**
   * Render against a data context.
   *
   * @throws TemplateRenderError
   */
  render(data: unknown = {}, options: RenderOptions = {}): string {
    return renderTemplate(this, data, (name) => this.set.lookup(name), options);
  }

  /**
   * Render, then write the output to a stream.  Resolves once the chunk has
   * been handed off; rejects on a render or write error.
   */
  renderTo(stream: Writable, data: unknown = {}, options: RenderOptions = {}): Promise<void> {
    const output = this.render(data, options);
    return new Promise((resolve, reject) => {
      stream.write(output, "utf-8", (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }
}

export class TemplateSet {
  private readonly members: ReadonlyMap<string, CompiledTemplate>;

  /** Short hash over every member's name and source, in build order. */
  readonly fingerprint: string;

  /**
   * @param templates - Parsed members in build order
   * @throws TemplateError if two members share a name
   */
  constructor(templates: readonly ParsedTemplate[]) {
    const members = new Map<string, CompiledTemplate>();
    const hash = createHash("sha256");

    for (const parsed of templates) {
      if (members.has(parsed.name)) {
        throw new TemplateError(`Duplicate template name "${parsed.name}" in template set`);
      }
      members.set(parsed.name, new CompiledTemplate(parsed, this));
      hash.update(parsed.name, "utf-8").update("\0").update(parsed.source, "utf-8").update("\0");
    }

    this.members = members;
    this.fingerprint = hash.digest("hex").slice(0, HASH_LENGTH);
  }

  /**
   * Compile a set directly from `[name, source]` pairs.
   *
   * @throws TemplateSyntaxError if any source fails to parse
   */
  static fromSources(sources: Iterable<readonly [string, string]>): TemplateSet {
    const parsed: ParsedTemplate[] = [];
    for (const [name, source] of sources) {
      parsed.push(parseTemplate(source, name));
    }
    return new TemplateSet(parsed);
  }

  get size(): number {
    return this.members.size;
  }

  has(name: string): boolean {
    return this.members.has(name);
  }

  lookup(name: string): CompiledTemplate | undefined {
    return this.members.get(name);
  }

  /** Member names in build order. */
  names(): string[] {
    return [...this.members.keys()];
  }

  templates(): CompiledTemplate[] {
    return [...this.members.values()];
  }
}
