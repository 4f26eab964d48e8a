/**
 * HTML rendering of expanded wikitext trees
 *
 * Text is emitted as-is: wiki sources are trusted and routinely carry
 * inline HTML. Attribute values, URLs and anything still unresolved are
 * escaped.
 */

import { assertNever } from "../core/nodes/types.js";
import { toWikitext } from "../core/parser/serializer.js";

import { pageTitleToRoutePath } from "./routes.js";

import type { ListNode, Node, TableNode } from "../core/nodes/types.js";

export interface HtmlRenderOptions {
  /** Directory internal links resolve into (default: wiki) */
  wikiRoute?: string;
}

const ATTRIBUTE = /([^\s"'=<>/]+)(?:\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s"'=<>`]+)))?/g;
const ATTRIBUTE_NAME = /^[a-zA-Z_:][-a-zA-Z0-9_:.]*$/;

/**
 * Escape HTML special characters
 */
export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#039;");
}

/**
 * Parse an HTML attribute string (`class="a b" colspan=2 hidden`) into
 * name/value pairs. Names that are not valid attribute names are dropped.
 */
export function parseHtmlAttributes(source: string): [string, string][] {
  const attributes: [string, string][] = [];
  for (const match of source.matchAll(ATTRIBUTE)) {
    const name = match[1] ?? "";
    if (!ATTRIBUTE_NAME.test(name)) continue;
    attributes.push([name.toLowerCase(), match[2] ?? match[3] ?? match[4] ?? ""]);
  }
  return attributes;
}

function renderAttributeString(source: string): string {
  return parseHtmlAttributes(source)
    .map(([name, value]) => ` ${name}="${escapeHtml(value)}"`)
    .join("");
}

function renderAttributes(nodes: readonly Node[]): string {
  return renderAttributeString(toWikitext([...nodes]));
}

class HtmlRenderer {
  private readonly wikiRoute: string;

  constructor(options: HtmlRenderOptions) {
    this.wikiRoute = options.wikiRoute ?? "wiki";
  }

  private href(title: string): string {
    return escapeHtml(pageTitleToRoutePath(title, this.wikiRoute).urlPath());
  }

  renderAll(nodes: readonly Node[]): string {
    return nodes.map((node) => this.render(node)).join("");
  }

  render(node: Node): string {
    switch (node.type) {
      case "fragment":
        return this.renderAll(node.children);
      case "text":
        return node.text;
      case "template":
      case "template-parameter-use":
        return escapeHtml(toWikitext(node));
      case "heading":
        return `<h${node.level}>${this.renderAll(node.children)}</h${node.level}>`;
      case "link":
        return `<a href="${this.href(node.title)}">${node.text}</a>`;
      case "ext-link":
        return `<a href="${escapeHtml(node.link)}">${node.text ?? node.link}</a>`;
      case "bold":
        return `<strong>${this.renderAll(node.children)}</strong>`;
      case "italic":
        return `<em>${this.renderAll(node.children)}</em>`;
      case "blockquote":
        return `<blockquote>${this.renderAll(node.children)}</blockquote>`;
      case "superscript":
        return `<sup>${this.renderAll(node.children)}</sup>`;
      case "subscript":
        return `<sub>${this.renderAll(node.children)}</sub>`;
      case "small":
        return `<small>${this.renderAll(node.children)}</small>`;
      case "preformatted":
        return `<pre>${this.renderAll(node.children)}</pre>`;
      case "tag":
        return `<${node.name}${renderAttributeString(node.attributes ?? "")}>${this.renderAll(node.children)}</${node.name}>`;
      case "table":
        return this.renderTable(node);
      case "ordered-list":
      case "unordered-list":
        return this.renderList(node);
      case "redirect":
        return `<a href="${this.href(node.target)}">REDIRECT: ${escapeHtml(node.target)}</a>`;
      case "horizontal-divider":
        return "<hr />";
      case "paragraph-break":
      case "newline":
        return "<br />";
      default:
        return assertNever(node);
    }
  }

  private renderTable(table: TableNode): string {
    const captions = table.captions
      .map((caption) => `<caption${renderAttributes(caption.attributes)}>${this.renderAll(caption.content)}</caption>`)
      .join("");
    const rows = table.rows
      .map((row) => {
        const cells = row.cells
          .map((cell) => {
            const tag = cell.header ? "th" : "td";
            return `<${tag}${renderAttributes(cell.attributes)}>${this.renderAll(cell.content)}</${tag}>`;
          })
          .join("");
        return `<tr${renderAttributes(row.attributes)}>${cells}</tr>`;
      })
      .join("");
    return `<table${renderAttributes(table.attributes)}>${captions}<tbody>${rows}</tbody></table>`;
  }

  private renderList(list: ListNode): string {
    const tag = list.type === "ordered-list" ? "ol" : "ul";
    const items = list.items.map((item) => `<li>${this.renderAll(item.content)}</li>`).join("");
    return `<${tag}>${items}</${tag}>`;
  }
}

/**
 * Render a node, or a sequence of sibling nodes, to an HTML fragment
 */
export function renderHtml(input: Node | Node[], options: HtmlRenderOptions = {}): string {
  const renderer = new HtmlRenderer(options);
  return Array.isArray(input) ? renderer.renderAll(input) : renderer.render(input);
}
