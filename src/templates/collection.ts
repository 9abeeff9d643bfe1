/**
 * Template collection with optional change monitoring.
 *
 * A collection compiles every template under a root directory once, at
 * creation, and then serves members by name.
 *
 *   STATIC (dynamic: false) — the set is never re-checked.  Lookups are
 *   plain map reads with no filesystem access and no locking; use this in
 *   production.
 *
 *   DYNAMIC (dynamic: true) — every lookup stats every tracked file.  If any
 *   file is newer than when it was read, the whole tree is rebuilt before
 *   the lookup returns.  Lookups are serialized so that two callers never
 *   rebuild at the same time and nobody sees a half-replaced set.  Useful
 *   during development; the per-lookup stat calls make it slow.
 *
 * The collection has no view of which templates include which, so any
 * change invalidates the entire set.
 *
 * USAGE:
 *
 *   const config = loadAppConfig();
 *   const templates = await TemplateCollection.create(config.templates);
 *
 *   const page = await templates.get("nav/login.html");
 *   await page.renderTo(res, { user });
 */

import { join, resolve } from "node:path";
import { stat } from "node:fs/promises";

import { parseCollectionOptions, type CollectionOptions } from "../config/index.js";
import { createLogger, type Logger } from "../logging/index.js";
import {
  TemplateError,
  TemplateIOError,
  TemplateNotFoundError,
  TemplateReloadError,
} from "./errors.js";
import { buildTemplateSet, type BuildResult } from "./loader.js";
import { Mutex } from "./lock.js";
import type { RenderOptions } from "./renderer.js";
import type { CompiledTemplate, TemplateSet } from "./template-set.js";

export class TemplateCollection {
  readonly root: string;
  readonly patterns: readonly string[];
  readonly dynamic: boolean;

  /** Set and snapshot are only ever replaced together, as one object. */
  private current: BuildResult;
  private builds = 1;
  private readonly lock = new Mutex();
  private readonly logger: Logger;

  private constructor(
    root: string,
    patterns: readonly string[],
    dynamic: boolean,
    initial: BuildResult,
    logger: Logger
  ) {
    this.root = root;
    this.patterns = patterns;
    this.dynamic = dynamic;
    this.current = initial;
    this.logger = logger;
  }

  /**
   * Build a collection from the templates under `options.root`.
   *
   * Fails (and produces no collection) if the options are invalid, the tree
   * cannot be read, a template does not compile, or nothing matches.
   *
   * @throws ConfigError | PatternError | TraversalError | TemplateIOError |
   *         TemplateSyntaxError | EmptyResultError
   */
  static async create(
    options: CollectionOptions,
    logger: Logger = createLogger({ name: "templates" })
  ): Promise<TemplateCollection> {
    const { root, patterns, dynamic } = parseCollectionOptions(options);
    const absoluteRoot = resolve(root);

    const initial = await buildTemplateSet(absoluteRoot, patterns);
    logger.debug("Template set built", {
      root: absoluteRoot,
      templates: initial.set.size,
      fingerprint: initial.set.fingerprint,
      dynamic,
    });

    return new TemplateCollection(absoluteRoot, patterns, dynamic, initial, logger);
  }

  /**
   * Number of successful builds so far: 1 after creation, plus one per
   * successful reload.
   */
  get generation(): number {
    return this.builds;
  }

  /**
   * The set currently served.  No staleness check is made; go through
   * `get()` for fresh content.
   */
  templateSet(): TemplateSet {
    return this.current.set;
  }

  /**
   * Modification times recorded for the current set.  The same object is
   * returned until the next reload.
   */
  snapshot(): ReadonlyMap<string, bigint> {
    return this.current.snapshot;
  }

  /**
   * Return the named template.
   *
   * In dynamic mode, rebuilds the whole set first if any file changed.
   *
   * @throws TemplateNotFoundError  if the name is unknown ("unknown"), or
   *                                disappeared in a reload ("removed")
   * @throws TemplateIOError        if a tracked file can no longer be stat'ed
   * @throws TemplateReloadError    if the rebuild failed (previous set kept)
   */
  async get(name: string): Promise<CompiledTemplate> {
    if (!this.dynamic) {
      return this.lookup(name);
    }
    return this.lock.runExclusive(() => this.getFresh(name));
  }

  /**
   * Look up and render a template in one step.
   */
  async render(name: string, data: unknown = {}, options: RenderOptions = {}): Promise<string> {
    const template = await this.get(name);
    return template.render(data, options);
  }

  private lookup(name: string): CompiledTemplate {
    const template = this.current.set.lookup(name);
    if (!template) {
      throw new TemplateNotFoundError(name, this.root, this.patterns, "unknown");
    }
    return template;
  }

  /** Runs under the lock. */
  private async getFresh(name: string): Promise<CompiledTemplate> {
    const template = this.lookup(name);

    const changed = await this.findChangedFile(name);
    if (changed === undefined) {
      this.logger.debug("Templates up to date", { template: name });
      return template;
    }

    this.logger.info("Template change detected, reloading set", {
      template: name,
      changed,
      generation: this.builds,
    });

    let next: BuildResult;
    try {
      next = await buildTemplateSet(this.root, this.patterns);
    } catch (err) {
      if (!(err instanceof TemplateError)) throw err;
      this.logger.warn("Template reload failed; keeping previous set", {
        template: name,
        error: err.message,
      });
      throw new TemplateReloadError(name, err);
    }

    this.current = next;
    this.builds++;
    this.logger.info("Template set reloaded", {
      templates: next.set.size,
      fingerprint: next.set.fingerprint,
      generation: this.builds,
    });

    const reloaded = next.set.lookup(name);
    if (!reloaded) {
      throw new TemplateNotFoundError(name, this.root, this.patterns, "removed");
    }
    return reloaded;
  }

  /**
   * Stat every tracked file and return the first one modified after it was
   * read, or undefined if none was.
   */
  private async findChangedFile(name: string): Promise<string | undefined> {
    for (const [path, readAt] of this.current.snapshot) {
      const filePath = join(this.root, path);
      let modTime: bigint;
      try {
        modTime = (await stat(filePath, { bigint: true })).mtimeNs;
      } catch (err) {
        throw new TemplateIOError(filePath, name, err);
      }
      if (modTime > readAt) {
        return path;
      }
    }
    return undefined;
  }
}
