import { assertNever } from "./types.js";

import type { ListItem, Node, TableCaption, TableCell, TableRow } from "./types.js";

/**
 * Read-only, depth-first, pre-order walk over every node in the tree,
 * including table, row, caption and cell attributes and content.
 *
 * Placeholder defaults are not entered: they are raw text until substituted.
 */
export function visit(node: Node, callback: (node: Node) => void): void {
  callback(node);
  for (const child of childNodes(node)) {
    visit(child, callback);
  }
}

/**
 * Depth-first rebuild of the tree.
 *
 * `transform` sees every node before its children. Returning a node replaces
 * it wholesale (the replacement is not walked); returning `undefined` keeps
 * the node and walks into its children.
 */
export function visitAndReplace(node: Node, transform: (node: Node) => Node | undefined): Node {
  const replacement = transform(node);
  if (replacement !== undefined) {
    return replacement;
  }
  return mapChildren(node, (child) => visitAndReplace(child, transform));
}

/**
 * True when any node in the tree matches
 */
export function some(node: Node, predicate: (node: Node) => boolean): boolean {
  if (predicate(node)) {
    return true;
  }
  return childNodes(node).some((child) => some(child, predicate));
}

/**
 * True while the tree still holds template invocations or parameter placeholders
 */
export function containsUnresolved(node: Node): boolean {
  return some(node, (n) => n.type === "template" || n.type === "template-parameter-use");
}

export function containsTable(node: Node): boolean {
  return some(node, (n) => n.type === "table");
}

/**
 * Deep, independent copy of a tree
 */
export function cloneNode<T extends Node>(node: T): T {
  return structuredClone(node);
}

/**
 * Direct children of a node, in document order
 */
export function childNodes(node: Node): Node[] {
  switch (node.type) {
    case "fragment":
    case "heading":
    case "tag":
    case "bold":
    case "italic":
    case "blockquote":
    case "superscript":
    case "subscript":
    case "small":
    case "preformatted":
      return node.children;
    case "table":
      return [
        ...node.attributes,
        ...node.captions.flatMap((caption) => [...caption.attributes, ...caption.content]),
        ...node.rows.flatMap((row) => [
          ...row.attributes,
          ...row.cells.flatMap((cell) => [...cell.attributes, ...cell.content]),
        ]),
      ];
    case "ordered-list":
    case "unordered-list":
      return node.items.flatMap((item) => item.content);
    case "template":
    case "template-parameter-use":
    case "text":
    case "link":
    case "ext-link":
    case "redirect":
    case "horizontal-divider":
    case "paragraph-break":
    case "newline":
      return [];
    default:
      return assertNever(node);
  }
}

/**
 * Rebuild a node with every direct child passed through `fn`
 */
export function mapChildren(node: Node, fn: (child: Node) => Node): Node {
  const mapAll = (nodes: Node[]): Node[] => nodes.map(fn);

  switch (node.type) {
    case "fragment":
    case "heading":
    case "tag":
    case "bold":
    case "italic":
    case "blockquote":
    case "superscript":
    case "subscript":
    case "small":
    case "preformatted":
      return { ...node, children: mapAll(node.children) };
    case "table":
      return {
        ...node,
        attributes: mapAll(node.attributes),
        captions: node.captions.map(
          (caption): TableCaption => ({
            attributes: mapAll(caption.attributes),
            content: mapAll(caption.content),
          })
        ),
        rows: node.rows.map(
          (row): TableRow => ({
            attributes: mapAll(row.attributes),
            cells: row.cells.map(
              (cell): TableCell => ({
                header: cell.header,
                attributes: mapAll(cell.attributes),
                content: mapAll(cell.content),
              })
            ),
          })
        ),
      };
    case "ordered-list":
    case "unordered-list":
      return {
        ...node,
        items: node.items.map((item): ListItem => ({ content: mapAll(item.content) })),
      };
    case "template":
    case "template-parameter-use":
    case "text":
    case "link":
    case "ext-link":
    case "redirect":
    case "horizontal-divider":
    case "paragraph-break":
    case "newline":
      return { ...node };
    default:
      return assertNever(node);
  }
}
