import { readFileSync } from "fs";
import path from "path";

import { glob } from "glob";

import { TemplateLoadError, TemplateNotFoundError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";

const log = logger.child("[templates]");

/**
 * Normalize a template name or relative path to its store key.
 *
 * Keys are case-insensitive, use `/` separators and `_` for spaces, so
 * `{{Lua/Cell Align}}` and `lua\cell_align` resolve to the same entry.
 */
export function normalizeTemplateName(name: string): string {
  return name.trim().toLowerCase().replace(/\\/g, "/").replace(/ /g, "_");
}

/**
 * Source of raw template text, keyed by normalized name
 */
export interface TemplateLoader {
  /**
   * Raw source of a template
   *
   * @throws TemplateNotFoundError when no entry exists
   */
  load(name: string): string;
  /** Every known key, sorted */
  names(): string[];
}

export interface FileSystemLoaderOptions {
  /** File extension, including the dot (default: .wikitext) */
  extension?: string;
  /** Globs, relative to the root, of files that are never templates */
  ignore?: string[];
}

/**
 * Loads templates from a directory tree of wikitext files.
 *
 * The tree is scanned once; template bodies are read on demand.
 */
export class FileSystemTemplateLoader implements TemplateLoader {
  private constructor(
    private readonly root: string,
    private readonly files: ReadonlyMap<string, string>
  ) {}

  static async create(root: string, options: FileSystemLoaderOptions = {}): Promise<FileSystemTemplateLoader> {
    const extension = options.extension ?? ".wikitext";
    const matches = await glob(`**/*${extension}`, {
      cwd: root,
      nodir: true,
      posix: true,
      ignore: options.ignore ?? [],
    });

    const files = new Map<string, string>();
    for (const relative of matches.sort()) {
      const key = normalizeTemplateName(relative.slice(0, -extension.length));
      const existing = files.get(key);
      if (existing !== undefined) {
        log.warn(`Duplicate template key ${key}: ${relative} shadows ${existing}`);
      }
      files.set(key, relative);
    }

    log.debug(`Indexed ${files.size} templates under ${root}`);
    return new FileSystemTemplateLoader(root, files);
  }

  load(name: string): string {
    const key = normalizeTemplateName(name);
    const relative = this.files.get(key);
    if (relative === undefined) {
      throw new TemplateNotFoundError(name, key);
    }

    const filePath = path.join(this.root, relative);
    try {
      return readFileSync(filePath, "utf-8");
    } catch (error) {
      throw new TemplateLoadError(name, filePath, error instanceof Error ? error.message : String(error));
    }
  }

  names(): string[] {
    return [...this.files.keys()].sort();
  }
}

/**
 * In-memory template store, for tests and single-document rendering
 */
export class MemoryTemplateLoader implements TemplateLoader {
  private readonly sources = new Map<string, string>();

  constructor(sources: Record<string, string> = {}) {
    for (const [name, source] of Object.entries(sources)) {
      this.add(name, source);
    }
  }

  add(name: string, source: string): this {
    this.sources.set(normalizeTemplateName(name), source);
    return this;
  }

  load(name: string): string {
    const key = normalizeTemplateName(name);
    const source = this.sources.get(key);
    if (source === undefined) {
      throw new TemplateNotFoundError(name, key);
    }
    return source;
  }

  names(): string[] {
    return [...this.sources.keys()].sort();
  }
}
