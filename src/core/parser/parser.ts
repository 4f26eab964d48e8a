/**
 * Wikitext grammar parser
 *
 * Turns MediaWiki-style markup into the node model. Block structure is line
 * based (headings, lists, tables, preformatted runs, paragraph breaks);
 * inline structure covers template calls, parameter placeholders, links,
 * quote emphasis and a configurable set of HTML-like tags.
 *
 * Unclosed inline constructs fall back to literal text. Two inputs are
 * rejected with a ParseError: a table with no closing `|}`, and constructs
 * nested deeper than the grammar's `maxNesting`.
 *
 * @example
 * ```typescript
 * const nodes = parseWikitext("Hello, {{{name|World}}}!");
 * // [text "Hello, ", template-parameter-use "name", text "!"]
 * ```
 */

import { ParseError } from "../../lib/errors.js";
import { text } from "../nodes/types.js";

import { DEFAULT_GRAMMAR, WRAPPER_TAGS } from "./grammar.js";
import {
  findConstructEnd,
  indexOfTopLevel,
  splitLogicalLines,
  splitTopLevel,
} from "./scan.js";

import type {
  ListItem,
  ListNode,
  Node,
  TableCaption,
  TableNode,
  TableRow,
  TemplateParameter,
} from "../nodes/types.js";
import type { Grammar } from "./grammar.js";

/**
 * Nodes produced by an inline rule and the index just past its source
 */
interface InlineMatch {
  nodes: Node[];
  end: number;
}

interface RawCell {
  header: boolean;
  attributes: string;
  lines: string[];
}

interface RawRow {
  attributes: string;
  cells: RawCell[];
}

const TAG_OPEN = /<([a-zA-Z][a-zA-Z0-9]*)((?:\s[^<>]*?)?)\s*(\/?)>/y;
const HEADING = /^(={1,6})(.+?)(={1,6})\s*$/;
const HORIZONTAL_RULE = /^-{4,}\s*$/;
const LIST_LINE = /^[*#]/;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export class WikitextParser {
  private readonly redirectPattern: RegExp;

  constructor(private readonly grammar: Grammar = DEFAULT_GRAMMAR) {
    const keywords = grammar.redirectKeywords.map(escapeRegExp).join("|");
    this.redirectPattern = new RegExp(`^(?:${keywords})\\s*:?\\s*\\[\\[([^\\]|\\n]+)(?:\\|[^\\]]*)?\\]\\]`, "i");
  }

  /**
   * Parse a complete document or template body
   *
   * @throws ParseError for an unterminated table or excessive nesting
   */
  parse(source: string): Node[] {
    const normalized = source.replace(/\r\n?/g, "\n").replace(/<!--[\s\S]*?-->/g, "");
    return this.parseBlocks(normalized, true, 0);
  }

  private checkDepth(depth: number, source: string): void {
    if (depth > this.grammar.maxNesting) {
      throw new ParseError(`Markup nested deeper than ${this.grammar.maxNesting} levels`, source);
    }
  }

  // ---------------------------------------------------------------------------
  // Block level
  // ---------------------------------------------------------------------------

  private parseBlocks(source: string, allowRedirect: boolean, depth: number): Node[] {
    this.checkDepth(depth, source);

    const lines = splitLogicalLines(source, this.grammar.maxNesting);
    const out: Node[] = [];
    let paragraph: string[] = [];
    let pendingBreak = false;
    let seenContent = false;

    const emit = (...nodes: Node[]): void => {
      if (pendingBreak && out.length > 0) {
        out.push({ type: "paragraph-break" });
      }
      pendingBreak = false;
      out.push(...nodes);
    };

    const flushParagraph = (): void => {
      if (paragraph.length === 0) return;
      const nodes = this.parseInline(paragraph.join("\n"), depth);
      paragraph = [];
      if (nodes.length > 0) {
        emit(...nodes);
      }
    };

    let i = 0;
    while (i < lines.length) {
      const line = lines[i] ?? "";
      const trimmed = line.trimStart();

      if (line.trim() === "") {
        flushParagraph();
        pendingBreak = true;
        i++;
        continue;
      }

      const isFirstContent = !seenContent;
      seenContent = true;

      if (allowRedirect && isFirstContent) {
        const target = this.redirectPattern.exec(trimmed)?.[1];
        if (target !== undefined) {
          emit({ type: "redirect", target: target.trim() });
          i++;
          continue;
        }
      }

      if (trimmed.startsWith("{|")) {
        flushParagraph();
        const end = this.findTableEnd(lines, i);
        if (end === -1) {
          throw new ParseError("Unterminated table: missing closing |}", source);
        }
        emit(this.parseTable(lines.slice(i + 1, end), trimmed.slice(2), depth + 1));

        const trailing = (lines[end] ?? "").trimStart().slice(2).trimStart();
        if (trailing.trim() !== "") {
          lines[end] = trailing;
          i = end;
        } else {
          i = end + 1;
        }
        continue;
      }

      const heading = HEADING.exec(line);
      const openMarks = heading?.[1];
      const closeMarks = heading?.[3];
      if (openMarks !== undefined && closeMarks !== undefined) {
        const level = Math.min(openMarks.length, closeMarks.length);
        const body = line.trimEnd();
        const inner = body.slice(level, body.length - level).trim();
        if (inner !== "") {
          flushParagraph();
          emit({ type: "heading", level, children: this.parseInline(inner, depth + 1) });
          i++;
          continue;
        }
      }

      if (HORIZONTAL_RULE.test(line)) {
        flushParagraph();
        emit({ type: "horizontal-divider" });
        i++;
        continue;
      }

      if (LIST_LINE.test(line)) {
        flushParagraph();
        const listLines: string[] = [];
        while (i < lines.length && LIST_LINE.test(lines[i] ?? "")) {
          listLines.push(lines[i] ?? "");
          i++;
        }
        emit(...this.parseLists(listLines, depth + 1));
        continue;
      }

      if (line.startsWith(" ")) {
        flushParagraph();
        const children: Node[] = [];
        while (i < lines.length) {
          const current = lines[i] ?? "";
          if (!current.startsWith(" ") || current.trim() === "" || current.trimStart().startsWith("{|")) {
            break;
          }
          if (children.length > 0) {
            children.push({ type: "newline" });
          }
          children.push(...this.parseInline(current.slice(1), depth + 1));
          i++;
        }
        emit({ type: "preformatted", children });
        continue;
      }

      paragraph.push(line);
      i++;
    }

    flushParagraph();
    return out;
  }

  /**
   * Index of the line closing the table opened at `start`, or -1
   */
  private findTableEnd(lines: string[], start: number): number {
    let depth = 0;
    for (let j = start; j < lines.length; j++) {
      const trimmed = (lines[j] ?? "").trimStart();
      if (trimmed.startsWith("{|")) {
        depth++;
      } else if (trimmed.startsWith("|}")) {
        depth--;
        if (depth === 0) {
          return j;
        }
      }
    }
    return -1;
  }

  private parseLists(lines: string[], depth: number): ListNode[] {
    this.checkDepth(depth, lines.join("\n"));

    const lists: ListNode[] = [];
    let i = 0;

    while (i < lines.length) {
      const marker = (lines[i] ?? "").charAt(0);
      const items: { text: string; nested: string[] }[] = [];

      while (i < lines.length && (lines[i] ?? "").charAt(0) === marker) {
        const rest = (lines[i] ?? "").slice(1);
        const last = items.at(-1);
        if (LIST_LINE.test(rest)) {
          if (last === undefined) {
            items.push({ text: "", nested: [rest] });
          } else {
            last.nested.push(rest);
          }
        } else {
          items.push({ text: rest.trim(), nested: [] });
        }
        i++;
      }

      lists.push({
        type: marker === "#" ? "ordered-list" : "unordered-list",
        items: items.map(
          (item): ListItem => ({
            content: [
              ...this.parseInline(item.text, depth),
              ...(item.nested.length > 0 ? this.parseLists(item.nested, depth + 1) : []),
            ],
          })
        ),
      });
    }

    return lists;
  }

  private parseTable(lines: string[], attributeText: string, depth: number): TableNode {
    this.checkDepth(depth, lines.join("\n"));

    const captions: RawCell[] = [];
    const rows: RawRow[] = [];
    let current: RawCell | undefined;

    const currentRow = (): RawRow => {
      const last = rows.at(-1);
      if (last !== undefined) return last;
      const row: RawRow = { attributes: "", cells: [] };
      rows.push(row);
      return row;
    };

    const addCells = (raw: string, header: boolean): void => {
      const separators = header ? ["!!", "||"] : ["||"];
      for (const part of splitTopLevel(raw, separators, this.grammar.maxNesting)) {
        current = this.splitCell(part, header);
        currentRow().cells.push(current);
      }
    };

    let k = 0;
    while (k < lines.length) {
      const line = lines[k] ?? "";
      const trimmed = line.trimStart();

      if (trimmed.startsWith("{|")) {
        // Nested table: everything up to its matching close belongs to the current cell
        const end = this.findTableEnd(lines, k);
        if (end === -1) {
          throw new ParseError("Unterminated nested table: missing closing |}", lines.join("\n"));
        }
        if (current === undefined) {
          current = { header: false, attributes: "", lines: [] };
          currentRow().cells.push(current);
        }
        current.lines.push(...lines.slice(k, end + 1));
        k = end + 1;
        continue;
      }

      if (trimmed.startsWith("|+")) {
        current = this.splitCell(trimmed.slice(2), false);
        captions.push(current);
      } else if (trimmed.startsWith("|-")) {
        rows.push({ attributes: trimmed.slice(2).replace(/^-+/, "").trim(), cells: [] });
        current = undefined;
      } else if (trimmed.startsWith("!")) {
        addCells(trimmed.slice(1), true);
      } else if (trimmed.startsWith("|")) {
        addCells(trimmed.slice(1), false);
      } else if (current !== undefined) {
        current.lines.push(line);
      } else if (trimmed !== "") {
        current = { header: false, attributes: "", lines: [trimmed] };
        currentRow().cells.push(current);
      }
      k++;
    }

    return {
      type: "table",
      attributes: this.parseInline(attributeText.trim(), depth),
      captions: captions.map(
        (caption): TableCaption => ({
          attributes: this.parseInline(caption.attributes, depth),
          content: this.parseBlocks(caption.lines.join("\n"), false, depth + 1),
        })
      ),
      rows: rows.map(
        (row): TableRow => ({
          attributes: this.parseInline(row.attributes, depth),
          cells: row.cells.map((cell) => ({
            header: cell.header,
            attributes: this.parseInline(cell.attributes, depth),
            content: this.parseBlocks(cell.lines.join("\n"), false, depth + 1),
          })),
        })
      ),
    };
  }

  /**
   * Split `attributes | content` on the first pipe outside any construct
   */
  private splitCell(raw: string, header: boolean): RawCell {
    const pipe = indexOfTopLevel(raw, "|", this.grammar.maxNesting);
    if (pipe === -1) {
      return { header, attributes: "", lines: [raw.trim()] };
    }
    return {
      header,
      attributes: raw.slice(0, pipe).trim(),
      lines: [raw.slice(pipe + 1).trim()],
    };
  }

  // ---------------------------------------------------------------------------
  // Inline level
  // ---------------------------------------------------------------------------

  private parseInline(source: string, depth: number): Node[] {
    this.checkDepth(depth, source);

    const nodes: Node[] = [];
    let buffer = "";

    const append = (matched: Node[]): void => {
      for (const node of matched) {
        if (node.type === "text") {
          buffer += node.text;
        } else {
          if (buffer !== "") {
            nodes.push(text(buffer));
            buffer = "";
          }
          nodes.push(node);
        }
      }
    };

    let i = 0;
    while (i < source.length) {
      const match = this.matchInline(source, i, depth);
      if (match !== undefined) {
        append(match.nodes);
        i = match.end;
      } else {
        buffer += source.charAt(i);
        i++;
      }
    }

    if (buffer !== "") {
      nodes.push(text(buffer));
    }
    return nodes;
  }

  private matchInline(source: string, i: number, depth: number): InlineMatch | undefined {
    const ch = source.charAt(i);
    if (ch === "{") {
      if (source.startsWith("{{{", i)) return this.matchParameterUse(source, i, depth);
      if (source.startsWith("{{", i)) return this.matchTemplate(source, i, depth);
      return undefined;
    }
    if (ch === "[") {
      return source.startsWith("[[", i)
        ? this.matchLink(source, i, depth)
        : this.matchExternalLink(source, i, depth);
    }
    if (ch === "'") return this.matchQuotes(source, i, depth);
    if (ch === "<") return this.matchTag(source, i, depth);
    return undefined;
  }

  private matchParameterUse(source: string, i: number, depth: number): InlineMatch | undefined {
    const end = findConstructEnd(source, i, this.grammar.maxNesting);
    if (end === -1) return undefined;

    const inner = source.slice(i + 3, end - 3);
    const pipe = indexOfTopLevel(inner, "|", this.grammar.maxNesting);
    const name = (pipe === -1 ? inner : inner.slice(0, pipe)).trim();
    if (name === "") return undefined;

    if (pipe === -1) {
      return { nodes: [{ type: "template-parameter-use", name }], end };
    }
    return {
      nodes: [
        {
          type: "template-parameter-use",
          name,
          default: this.parseInline(inner.slice(pipe + 1), depth + 1),
        },
      ],
      end,
    };
  }

  private matchTemplate(source: string, i: number, depth: number): InlineMatch | undefined {
    const end = findConstructEnd(source, i, this.grammar.maxNesting);
    if (end === -1) return undefined;

    const inner = source.slice(i + 2, end - 2);
    const [head = "", ...args] = splitTopLevel(inner, ["|"], this.grammar.maxNesting);
    const name = head.trim();
    if (name === "") return undefined;

    // A name built from placeholders or calls only exists after substitution
    if (/[{}[\]<>]/.test(name)) {
      return {
        nodes: [text("{{"), ...this.parseInline(inner, depth + 1), text("}}")],
        end,
      };
    }

    return {
      nodes: [{ type: "template", name, parameters: this.parseArguments(args) }],
      end,
    };
  }

  private parseArguments(args: string[]): TemplateParameter[] {
    let position = 0;
    return args.map((arg) => {
      const equals = indexOfTopLevel(arg, "=", this.grammar.maxNesting);
      if (equals === -1) {
        position++;
        return { name: String(position), value: arg };
      }
      return { name: arg.slice(0, equals).trim(), value: arg.slice(equals + 1).trim() };
    });
  }

  private matchLink(source: string, i: number, depth: number): InlineMatch | undefined {
    const end = findConstructEnd(source, i, this.grammar.maxNesting);
    if (end === -1) return undefined;

    const inner = source.slice(i + 2, end - 2);
    if (inner.includes("\n")) return undefined;

    if (inner.includes("{{")) {
      return {
        nodes: [text("[["), ...this.parseInline(inner, depth + 1), text("]]")],
        end,
      };
    }

    const pipe = inner.indexOf("|");
    const title = (pipe === -1 ? inner : inner.slice(0, pipe)).trim();
    if (title === "") return undefined;

    const label = pipe === -1 ? title : inner.slice(pipe + 1).trim();
    return { nodes: [{ type: "link", title, text: label }], end };
  }

  private matchExternalLink(source: string, i: number, depth: number): InlineMatch | undefined {
    const close = source.indexOf("]", i + 1);
    if (close === -1) return undefined;

    const inner = source.slice(i + 1, close);
    if (inner.includes("\n")) return undefined;
    if (!this.grammar.protocols.some((protocol) => inner.toLowerCase().startsWith(protocol))) {
      return undefined;
    }

    const end = close + 1;
    if (inner.includes("{{")) {
      return { nodes: [text("["), ...this.parseInline(inner, depth + 1), text("]")], end };
    }

    const space = inner.search(/\s/);
    if (space === -1) {
      return { nodes: [{ type: "ext-link", link: inner }], end };
    }
    const label = inner.slice(space + 1).trim();
    return {
      nodes: [
        label === ""
          ? { type: "ext-link", link: inner.slice(0, space) }
          : { type: "ext-link", link: inner.slice(0, space), text: label },
      ],
      end,
    };
  }

  private matchQuotes(source: string, i: number, depth: number): InlineMatch | undefined {
    let run = 0;
    while (source.charAt(i + run) === "'") run++;
    if (run < 2) return undefined;

    // Apostrophes beyond the longest marker are literal
    if (run === 4 || run > 5) {
      const extra = run === 4 ? 1 : run - 5;
      return { nodes: [text("'".repeat(extra))], end: i + extra };
    }

    // Five quotes open both; the kind whose closing run comes first is the inner one
    const lengths =
      run === 5
        ? [5, ...(nextQuoteRunLength(source, i + 5) === 3 ? [2, 3] : [3, 2])]
        : [3, 2].filter((l) => l <= run);
    for (const length of lengths) {
      const close = findQuoteRun(source, i + length, length);
      if (close === -1) continue;

      const children = this.parseInline(source.slice(i + length, close), depth + 1);
      const end = close + length;
      if (length === 5) {
        return { nodes: [{ type: "bold", children: [{ type: "italic", children }] }], end };
      }
      return { nodes: [{ type: length === 3 ? "bold" : "italic", children }], end };
    }

    return { nodes: [text("'".repeat(run))], end: i + run };
  }

  private matchTag(source: string, i: number, depth: number): InlineMatch | undefined {
    TAG_OPEN.lastIndex = i;
    const open = TAG_OPEN.exec(source);
    const tagName = open?.[1];
    if (open === null || tagName === undefined) return undefined;

    const name = tagName.toLowerCase();
    const attributes = (open[2] ?? "").trim();
    const selfClosing = open[3] === "/";
    const afterOpen = TAG_OPEN.lastIndex;

    if (name === "br") {
      return { nodes: [{ type: "newline" }], end: afterOpen };
    }

    const wrapper = WRAPPER_TAGS[name];
    if (wrapper === undefined && !this.grammar.tags.includes(name)) {
      return undefined;
    }

    let children: Node[] = [];
    let end = afterOpen;
    if (!selfClosing) {
      const close = findClosingTag(source, afterOpen, name);
      if (close === undefined) return undefined;
      children = this.parseInline(source.slice(afterOpen, close.start), depth + 1);
      end = close.end;
    }

    if (wrapper !== undefined) {
      return { nodes: [{ type: wrapper, children }], end };
    }
    return {
      nodes: [
        attributes === ""
          ? { type: "tag", name, children }
          : { type: "tag", name, attributes, children },
      ],
      end,
    };
  }
}

/**
 * Start of the run closing an emphasis of `length` apostrophes on the current
 * line. A run of five closes bold and italic at once: this emphasis takes its
 * leading part unless a run of the other kind is still open inside it.
 */
function findQuoteRun(source: string, from: number, length: number): number {
  const other = length === 3 ? 2 : 3;
  let innerOpen = false;
  let j = from;
  while (j < source.length) {
    const ch = source.charAt(j);
    if (ch === "\n") return -1;
    if (ch === "'") {
      let k = j;
      while (source.charAt(k) === "'") k++;
      const run = k - j;
      if (run === length) return j;
      if (run === 5 && length !== 5) return innerOpen ? j + other : j;
      if (run === other) innerOpen = !innerOpen;
      j = k;
      continue;
    }
    j++;
  }
  return -1;
}

/**
 * Length of the next apostrophe run on the current line, or 0
 */
function nextQuoteRunLength(source: string, from: number): number {
  let j = from;
  while (j < source.length && source.charAt(j) !== "'") {
    if (source.charAt(j) === "\n") return 0;
    j++;
  }
  let k = j;
  while (source.charAt(k) === "'") k++;
  return k - j;
}

/**
 * Matching `</name>` for an already-consumed `<name ...>`, honouring nesting
 */
function findClosingTag(
  source: string,
  from: number,
  name: string
): { start: number; end: number } | undefined {
  const pattern = new RegExp(`<(/?)${name}\\b[^>]*>`, "gi");
  pattern.lastIndex = from;
  let depth = 1;
  let match: RegExpExecArray | null;

  while ((match = pattern.exec(source)) !== null) {
    if (match[1] === "/") {
      depth--;
      if (depth === 0) {
        return { start: match.index, end: pattern.lastIndex };
      }
    } else if (source.charAt(pattern.lastIndex - 2) !== "/") {
      depth++;
    }
  }
  return undefined;
}

/**
 * Parse wikitext with the given grammar
 *
 * @throws ParseError for an unterminated table or excessive nesting
 */
export function parseWikitext(source: string, grammar: Grammar = DEFAULT_GRAMMAR): Node[] {
  return new WikitextParser(grammar).parse(source);
}
