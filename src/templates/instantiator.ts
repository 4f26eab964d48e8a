/**
 * Template instantiation engine
 *
 * Expands template invocations and parameter placeholders until a tree is
 * fully resolved. Substitution splices raw argument text into the tree, so
 * the result is serialized and re-parsed to pick up markup that only exists
 * after substitution. Trees holding tables skip that roundtrip (it would
 * merge cells) and instead iterate substitution to a fixed point, then
 * re-parse each cell on its own.
 *
 * @example
 * ```typescript
 * const cache = new TemplateCache(new MemoryTemplateLoader({ Greet: "Hello, {{{1|World}}}!" }));
 * const instantiator = new Instantiator(cache);
 * const result = instantiator.instantiate("Greet", [{ name: "1", value: "Ada" }], context);
 * toWikitext(result); // "Hello, Ada!"
 * ```
 */

import { fragment, text } from "../core/nodes/types.js";
import {
  cloneNode,
  containsTable,
  containsUnresolved,
  some,
  visitAndReplace,
} from "../core/nodes/visit.js";
import { DEFAULT_GRAMMAR } from "../core/parser/grammar.js";
import { parseWikitext } from "../core/parser/parser.js";
import { toWikitext } from "../core/parser/serializer.js";
import { ParseError, RecursionLimitError, TemplateCycleError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";

import { describePageContext, resolveMagicWord } from "./context.js";
import { normalizeTemplateName } from "./loader.js";

import type { Node, TableCell, TableNode, TemplateParameter, TemplateParameterUseNode } from "../core/nodes/types.js";
import type { Grammar } from "../core/parser/grammar.js";
import type { TemplateCache } from "./cache.js";
import type { PageContext } from "./context.js";

const log = logger.child("[instantiate]");

/** Text that may hold markup the substitution pass left unparsed in a cell */
const CELL_MARKUP = ["[[", "''", "{{"] as const;

export interface InstantiatorOptions {
  /** Deepest nesting of template expansions and roundtrips (default: 100) */
  maxDepth?: number;
  /** Most substitution passes a table-bearing tree may take to converge (default: 50) */
  maxTableIterations?: number;
}

/**
 * Counters accumulated over the lifetime of an instantiator
 */
export interface InstantiationStats {
  /** Template invocations resolved through the cache */
  templatesExpanded: number;
  /** Invocations answered from an already-parsed cache entry */
  cacheHits: number;
  /** Serialize and re-parse cycles on table-free trees */
  roundtrips: number;
  /** Substitution passes spent converging table-bearing trees */
  tableIterations: number;
  /** Table cells re-parsed and instantiated in isolation */
  cellsReparsed: number;
}

/**
 * Expansion state threaded through recursive calls
 */
interface Frame {
  /** Normalized keys of the templates currently being expanded */
  chain: readonly string[];
  depth: number;
}

export class Instantiator {
  private readonly maxDepth: number;
  private readonly maxTableIterations: number;
  private counters: InstantiationStats = emptyStats();

  constructor(
    private readonly cache: TemplateCache,
    private readonly grammar: Grammar = DEFAULT_GRAMMAR,
    options: InstantiatorOptions = {}
  ) {
    this.maxDepth = options.maxDepth ?? 100;
    this.maxTableIterations = options.maxTableIterations ?? 50;
  }

  /**
   * Fully expand a template (by name) or an already-parsed tree
   *
   * @throws TemplateNotFoundError when a referenced template does not exist
   * @throws ParseError when substituted text no longer parses
   * @throws TemplateCycleError when a template invokes itself
   * @throws RecursionLimitError when expansion exceeds its bounds
   */
  instantiate(target: string | Node, parameters: readonly TemplateParameter[], context: PageContext): Node {
    return this.expand(target, parameters, context, { chain: [], depth: 0 });
  }

  stats(): InstantiationStats {
    return { ...this.counters };
  }

  resetStats(): void {
    this.counters = emptyStats();
  }

  private expand(
    target: string | Node,
    parameters: readonly TemplateParameter[],
    context: PageContext,
    frame: Frame
  ): Node {
    if (typeof target !== "string") {
      return this.resolve(target, parameters, context, frame);
    }

    const magic = resolveMagicWord(target, context);
    if (magic !== undefined) {
      return text(magic);
    }

    const key = normalizeTemplateName(target);
    if (frame.chain.includes(key)) {
      throw new TemplateCycleError([...frame.chain, key]);
    }
    this.checkDepth(frame, context);

    if (this.cache.has(target)) {
      this.counters.cacheHits++;
    }
    const tree = cloneNode(this.cache.get(target));
    this.counters.templatesExpanded++;
    log.debug(`Expanding ${key} for ${describePageContext(context)}`);

    return this.resolve(tree, parameters, context, { chain: [...frame.chain, key], depth: frame.depth + 1 });
  }

  private resolve(
    tree: Node,
    parameters: readonly TemplateParameter[],
    context: PageContext,
    frame: Frame
  ): Node {
    if (!containsUnresolved(tree)) {
      return tree;
    }

    const substituted = this.substitute(tree, parameters, context, frame);

    if (containsTable(substituted)) {
      return this.reparseTableCells(this.converge(substituted, parameters, context, frame), context, frame);
    }

    // Text spliced in by substitution may open new constructs; re-read it as
    // markup. The chain restarts because argument text belongs to the caller.
    const next: Frame = { chain: [], depth: frame.depth + 1 };
    this.checkDepth(next, context);
    this.counters.roundtrips++;
    const reparsed = fragment(this.reparse(toWikitext(substituted)));
    return this.resolve(reparsed, parameters, context, next);
  }

  /**
   * One pass replacing every invocation and placeholder in the tree
   */
  private substitute(
    tree: Node,
    parameters: readonly TemplateParameter[],
    context: PageContext,
    frame: Frame
  ): Node {
    return visitAndReplace(tree, (node) => {
      switch (node.type) {
        case "template": {
          const result = this.expand(node.name, node.parameters, context, frame);
          const only = result.type === "fragment" && result.children.length === 1 ? result.children[0] : undefined;
          return only ?? result;
        }
        case "template-parameter-use":
          return text(lookupParameter(node, parameters, context));
        default:
          return undefined;
      }
    });
  }

  /**
   * Repeat substitution on a table-bearing tree until its serialization stops changing
   */
  private converge(
    tree: Node,
    parameters: readonly TemplateParameter[],
    context: PageContext,
    frame: Frame
  ): Node {
    let current = tree;
    let before = toWikitext(current);

    for (let iteration = 1; ; iteration++) {
      if (iteration > this.maxTableIterations) {
        throw new RecursionLimitError(
          `Table expansion did not converge within ${this.maxTableIterations} passes`,
          { page: describePageContext(context), chain: [...frame.chain] }
        );
      }

      this.counters.tableIterations++;
      current = this.substitute(current, parameters, context, frame);
      const after = toWikitext(current);
      if (after === before) {
        return current;
      }
      before = after;
    }
  }

  /**
   * Re-parse and expand the content of every table cell in isolation, so
   * markup carried in by argument text takes effect without a whole-table
   * roundtrip disturbing row and cell boundaries.
   */
  private reparseTableCells(tree: Node, context: PageContext, frame: Frame): Node {
    return visitAndReplace(tree, (node) => {
      if (node.type !== "table") {
        return undefined;
      }
      const table: TableNode = {
        ...node,
        rows: node.rows.map((row) => ({
          attributes: row.attributes,
          cells: row.cells.map((cell) => this.reparseCell(cell, context, frame)),
        })),
      };
      return table;
    });
  }

  private reparseCell(cell: TableCell, context: PageContext, frame: Frame): TableCell {
    // Markup already parsed at an inner level no longer shows up as text
    const carriesMarkup = cell.content.some((node) =>
      some(node, (n) => n.type === "text" && CELL_MARKUP.some((marker) => n.text.includes(marker)))
    );
    if (!carriesMarkup) {
      return cell;
    }

    const source = toWikitext(cell.content);

    const parsed = this.reparse(source);
    if (parsed.length === 0) {
      return cell;
    }

    this.counters.cellsReparsed++;
    const next: Frame = { chain: [], depth: frame.depth + 1 };
    this.checkDepth(next, context);
    const instantiated = this.resolve(fragment(parsed), [], context, next);
    return {
      ...cell,
      content: instantiated.type === "fragment" ? instantiated.children : [instantiated],
    };
  }

  private reparse(source: string): Node[] {
    try {
      return parseWikitext(source, this.grammar);
    } catch (error) {
      if (error instanceof ParseError) {
        throw new ParseError(`Substituted text no longer parses: ${error.message}`, source, error.context);
      }
      throw error;
    }
  }

  private checkDepth(frame: Frame, context: PageContext): void {
    if (frame.depth > this.maxDepth) {
      throw new RecursionLimitError(`Template expansion exceeded maximum depth of ${this.maxDepth}`, {
        page: describePageContext(context),
        chain: [...frame.chain],
        depth: frame.depth,
      });
    }
  }
}

/**
 * Value for a placeholder: the caller's argument, then the sub-page name for
 * `{{{subpagename}}}`, then the serialized default, then empty text
 */
function lookupParameter(
  node: TemplateParameterUseNode,
  parameters: readonly TemplateParameter[],
  context: PageContext
): string {
  const argument = parameters.find((param) => param.name === node.name);
  if (argument !== undefined) {
    return argument.value;
  }
  if (node.name.toLowerCase() === "subpagename") {
    return context.subPageName;
  }
  if (node.default !== undefined) {
    return toWikitext(node.default);
  }
  return "";
}

function emptyStats(): InstantiationStats {
  return { templatesExpanded: 0, cacheHits: 0, roundtrips: 0, tableIterations: 0, cellsReparsed: 0 };
}
