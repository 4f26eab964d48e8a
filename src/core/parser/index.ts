export { WikitextParser, parseWikitext } from "./parser.js";
export { toWikitext } from "./serializer.js";
export {
  GrammarSchema,
  WRAPPER_TAGS,
  DEFAULT_GRAMMAR,
  createGrammar,
  type Grammar,
  type GrammarInput,
} from "./grammar.js";
export {
  constructAt,
  findConstructEnd,
  indexOfTopLevel,
  splitTopLevel,
  splitLogicalLines,
} from "./scan.js";
