import { DEFAULT_GRAMMAR } from "../core/parser/grammar.js";
import { parseWikitext } from "../core/parser/parser.js";
import { fragment } from "../core/nodes/types.js";
import { ParseError } from "../lib/errors.js";

import { normalizeTemplateName } from "./loader.js";

import type { FragmentNode } from "../core/nodes/types.js";
import type { Grammar } from "../core/parser/grammar.js";
import type { TemplateLoader } from "./loader.js";

/**
 * Parse-on-miss cache of template trees, keyed by normalized name.
 *
 * Entries are shared: callers must clone before mutating. A cache belongs
 * to one generation run; build a new one (or `clear()`) for the next.
 */
export class TemplateCache {
  private readonly entries = new Map<string, FragmentNode>();
  private misses = 0;

  constructor(
    private readonly loader: TemplateLoader,
    private readonly grammar: Grammar = DEFAULT_GRAMMAR
  ) {}

  /**
   * Parsed body of a template, loading and parsing it on first use
   *
   * @throws TemplateNotFoundError when the loader has no entry
   * @throws ParseError naming the template when its body does not parse
   */
  get(name: string): FragmentNode {
    const key = normalizeTemplateName(name);
    const cached = this.entries.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const source = this.loader.load(name);
    let parsed: FragmentNode;
    try {
      parsed = fragment(parseWikitext(source, this.grammar));
    } catch (error) {
      if (error instanceof ParseError) {
        throw new ParseError(`Template ${name} (${key}): ${error.message}`, error.text, {
          templateName: name,
          key,
        });
      }
      throw error;
    }

    this.misses++;
    this.entries.set(key, parsed);
    return parsed;
  }

  has(name: string): boolean {
    return this.entries.has(normalizeTemplateName(name));
  }

  get size(): number {
    return this.entries.size;
  }

  /** Number of templates parsed since construction or the last clear */
  get parses(): number {
    return this.misses;
  }

  clear(): void {
    this.entries.clear();
    this.misses = 0;
  }
}
