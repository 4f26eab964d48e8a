export {
  assertNever,
  fragment,
  text,
  type Node,
  type NodeType,
  type FragmentNode,
  type TemplateNode,
  type TemplateParameterUseNode,
  type TemplateParameter,
  type TextNode,
  type TableNode,
  type TableRow,
  type TableCell,
  type TableCaption,
  type HeadingNode,
  type WrapperNode,
  type WrapperType,
  type TagNode,
  type ListNode,
  type ListItem,
  type LinkNode,
  type ExtLinkNode,
  type RedirectNode,
  type LeafNode,
} from "./types.js";

export {
  visit,
  visitAndReplace,
  some,
  containsUnresolved,
  containsTable,
  cloneNode,
  childNodes,
  mapChildren,
} from "./visit.js";
