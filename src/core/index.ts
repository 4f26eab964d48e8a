/**
 * Core wikitext engine
 *
 * This module contains:
 * - nodes/  - The wikitext node model and tree traversal
 * - parser/ - Grammar parser and wikitext serializer
 */

export const VERSION = "0.1.0";

// Node model
export {
  assertNever,
  fragment,
  text,
  visit,
  visitAndReplace,
  some,
  containsUnresolved,
  containsTable,
  cloneNode,
  childNodes,
  mapChildren,
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
} from "./nodes/index.js";

// Parser and serializer
export {
  WikitextParser,
  parseWikitext,
  toWikitext,
  GrammarSchema,
  WRAPPER_TAGS,
  DEFAULT_GRAMMAR,
  createGrammar,
  type Grammar,
  type GrammarInput,
} from "./parser/index.js";
