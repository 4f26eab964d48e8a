/**
 * Wikitext node model
 *
 * A closed discriminated union over every construct the grammar parser
 * produces. Only `template`, `template-parameter-use` and the table family
 * carry meaning for template expansion; every other variant is an inert
 * container that expansion passes through.
 */

/**
 * A caller-supplied template argument. `value` is the raw, unparsed text
 * captured at the invocation site. Positional arguments are named "1", "2", ...
 */
export interface TemplateParameter {
  name: string;
  value: string;
}

export interface TableCaption {
  attributes: Node[];
  content: Node[];
}

export interface TableCell {
  /** `!` header cell rather than `|` data cell */
  header: boolean;
  attributes: Node[];
  content: Node[];
}

export interface TableRow {
  attributes: Node[];
  cells: TableCell[];
}

export interface ListItem {
  content: Node[];
}

export interface FragmentNode {
  type: "fragment";
  children: Node[];
}

export interface TemplateNode {
  type: "template";
  name: string;
  parameters: TemplateParameter[];
}

export interface TemplateParameterUseNode {
  type: "template-parameter-use";
  name: string;
  default?: Node[];
}

export interface TextNode {
  type: "text";
  text: string;
}

export interface TableNode {
  type: "table";
  attributes: Node[];
  captions: TableCaption[];
  rows: TableRow[];
}

export interface HeadingNode {
  type: "heading";
  level: number;
  children: Node[];
}

/**
 * Formatting wrappers that differ only by the markup they round-trip to
 */
export type WrapperType =
  | "bold"
  | "italic"
  | "blockquote"
  | "superscript"
  | "subscript"
  | "small"
  | "preformatted";

export interface WrapperNode {
  type: WrapperType;
  children: Node[];
}

/** An HTML-like tag the grammar passes through, e.g. `<span class="x">` */
export interface TagNode {
  type: "tag";
  name: string;
  attributes?: string;
  children: Node[];
}

export interface ListNode {
  type: "ordered-list" | "unordered-list";
  items: ListItem[];
}

/** Internal `[[title|text]]` link */
export interface LinkNode {
  type: "link";
  title: string;
  text: string;
}

/** External `[url text]` link */
export interface ExtLinkNode {
  type: "ext-link";
  link: string;
  text?: string;
}

export interface RedirectNode {
  type: "redirect";
  target: string;
}

export interface LeafNode {
  type: "horizontal-divider" | "paragraph-break" | "newline";
}

export type Node =
  | FragmentNode
  | TemplateNode
  | TemplateParameterUseNode
  | TextNode
  | TableNode
  | HeadingNode
  | WrapperNode
  | TagNode
  | ListNode
  | LinkNode
  | ExtLinkNode
  | RedirectNode
  | LeafNode;

export type NodeType = Node["type"];

/**
 * Exhaustiveness guard for switches over the node union
 */
export function assertNever(value: never): never {
  throw new Error(`Unhandled node: ${JSON.stringify(value)}`);
}

export function fragment(children: Node[]): FragmentNode {
  return { type: "fragment", children };
}

export function text(value: string): TextNode {
  return { type: "text", text: value };
}
