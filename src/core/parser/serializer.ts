/**
 * Wikitext serializer
 *
 * Inverse of the grammar parser: re-parsing the output of `toWikitext`
 * yields a tree with the same resolved content. Block constructs always
 * start on their own line so that text spliced in by template substitution
 * cannot glue a table or list marker onto preceding inline text.
 */

import { assertNever } from "../nodes/types.js";

import type { ListNode, Node, TableNode } from "../nodes/types.js";

const BLOCK_TYPES: ReadonlySet<Node["type"]> = new Set<Node["type"]>([
  "table",
  "heading",
  "ordered-list",
  "unordered-list",
  "horizontal-divider",
  "redirect",
  "preformatted",
]);

function isBlock(node: Node): boolean {
  return BLOCK_TYPES.has(node.type);
}

function startsWithBlock(node: Node): boolean {
  if (node.type === "fragment") {
    const first = node.children[0];
    return first !== undefined && startsWithBlock(first);
  }
  return isBlock(node);
}

function endsWithBlock(node: Node): boolean {
  if (node.type === "fragment") {
    const last = node.children.at(-1);
    return last !== undefined && endsWithBlock(last);
  }
  return isBlock(node);
}

function endLine(out: string): string {
  return out === "" || out.endsWith("\n") ? out : `${out}\n`;
}

function serializeNodes(nodes: readonly Node[]): string {
  let out = "";
  let afterBlock = false;

  for (const node of nodes) {
    if (node.type === "paragraph-break") {
      out = `${endLine(out)}\n`;
      afterBlock = false;
      continue;
    }

    const serialized = serializeNode(node);
    if (serialized === "") continue;

    if (startsWithBlock(node)) {
      out = endLine(out) + serialized;
    } else if (afterBlock) {
      out = endLine(out) + serialized.replace(/^[ \t]+/, "");
    } else {
      out += serialized;
    }
    afterBlock = endsWithBlock(node);
  }

  return out;
}

function withLeadingSpace(value: string): string {
  return value === "" ? "" : ` ${value}`;
}

function serializeCell(marker: string, attributes: readonly Node[], content: readonly Node[]): string {
  const attrs = serializeNodes(attributes);
  const head = attrs === "" ? marker : `${marker} ${attrs} |`;
  const body = serializeNodes(content);
  if (body === "") return head;

  const first = content.find((node) => node.type !== "paragraph-break");
  if (first !== undefined && startsWithBlock(first)) {
    return `${head}\n${body}`;
  }
  return `${head} ${body}`;
}

function serializeTable(table: TableNode): string {
  const lines = [`{|${withLeadingSpace(serializeNodes(table.attributes))}`];

  for (const caption of table.captions) {
    lines.push(serializeCell("|+", caption.attributes, caption.content));
  }
  for (const row of table.rows) {
    lines.push(`|-${withLeadingSpace(serializeNodes(row.attributes))}`);
    for (const cell of row.cells) {
      lines.push(serializeCell(cell.header ? "!" : "|", cell.attributes, cell.content));
    }
  }

  lines.push("|}");
  return lines.join("\n");
}

function serializeList(list: ListNode, prefix: string): string {
  const marker = prefix + (list.type === "ordered-list" ? "#" : "*");

  return list.items
    .map((item) => {
      const inline: Node[] = [];
      const nested: ListNode[] = [];
      for (const node of item.content) {
        if (node.type === "ordered-list" || node.type === "unordered-list") {
          nested.push(node);
        } else {
          inline.push(node);
        }
      }
      return [
        `${marker} ${serializeNodes(inline)}`.trimEnd(),
        ...nested.map((list) => serializeList(list, marker)),
      ].join("\n");
    })
    .join("\n");
}

function wrap(tag: string, children: readonly Node[]): string {
  return `<${tag}>${serializeNodes(children)}</${tag}>`;
}

function serializeNode(node: Node): string {
  switch (node.type) {
    case "fragment":
      return serializeNodes(node.children);
    case "text":
      return node.text;
    case "template": {
      let position = 0;
      const args = node.parameters.map((param) => {
        const positional = param.name === String(position + 1) && !param.value.includes("=");
        if (positional) {
          position++;
          return `|${param.value}`;
        }
        return `|${param.name}=${param.value}`;
      });
      return `{{${node.name}${args.join("")}}}`;
    }
    case "template-parameter-use":
      return node.default === undefined
        ? `{{{${node.name}}}}`
        : `{{{${node.name}|${serializeNodes(node.default)}}}}`;
    case "table":
      return serializeTable(node);
    case "heading": {
      const marks = "=".repeat(node.level);
      return `${marks} ${serializeNodes(node.children)} ${marks}`;
    }
    case "bold":
      return `'''${serializeNodes(node.children)}'''`;
    case "italic":
      return `''${serializeNodes(node.children)}''`;
    case "superscript":
      return wrap("sup", node.children);
    case "subscript":
      return wrap("sub", node.children);
    case "small":
      return wrap("small", node.children);
    case "blockquote":
      return wrap("blockquote", node.children);
    case "preformatted":
      return ` ${node.children
        .map((child) => (child.type === "newline" ? "\n " : serializeNode(child)))
        .join("")}`;
    case "tag":
      return `<${node.name}${withLeadingSpace(node.attributes ?? "")}>${serializeNodes(node.children)}</${node.name}>`;
    case "ordered-list":
    case "unordered-list":
      return serializeList(node, "");
    case "link":
      return node.text === node.title ? `[[${node.title}]]` : `[[${node.title}|${node.text}]]`;
    case "ext-link":
      return node.text === undefined ? `[${node.link}]` : `[${node.link} ${node.text}]`;
    case "redirect":
      return `#REDIRECT [[${node.target}]]`;
    case "horizontal-divider":
      return "----";
    case "paragraph-break":
      return "\n\n";
    case "newline":
      return "<br />";
    default:
      return assertNever(node);
  }
}

/**
 * Serialize a node, or a sequence of sibling nodes, back to wikitext
 */
export function toWikitext(input: Node | Node[]): string {
  return Array.isArray(input) ? serializeNodes(input) : serializeNode(input);
}
