/**
 * Template Expansion Module
 *
 * Loads wikitext templates, caches their parsed trees and expands
 * invocations against a page context:
 * - Resolve `{{Name|args}}` through a loader-backed parse cache
 * - Substitute `{{{param|default}}}` placeholders
 * - Answer magic words such as `{{SUBPAGENAME}}` from the page context
 * - Keep table structure intact while expanding templates inside cells
 *
 * @example
 * ```typescript
 * import { FileSystemTemplateLoader, TemplateCache, Instantiator, createPageContext } from "@/templates";
 *
 * const loader = await FileSystemTemplateLoader.create("wiki");
 * const instantiator = new Instantiator(new TemplateCache(loader));
 *
 * const page = instantiator.instantiate("Main Page", [], createPageContext({
 *   inputPath: "wiki/Main_Page.wikitext",
 *   title: "Main Page",
 *   routePath: "/wiki/Main_Page.html",
 *   subPageName: "Main_Page",
 * }));
 * ```
 */

export {
  normalizeTemplateName,
  FileSystemTemplateLoader,
  MemoryTemplateLoader,
  type TemplateLoader,
  type FileSystemLoaderOptions,
} from "./loader.js";

export { TemplateCache } from "./cache.js";

export {
  createPageContext,
  describePageContext,
  resolveMagicWord,
  type PageContext,
} from "./context.js";

export {
  Instantiator,
  type InstantiatorOptions,
  type InstantiationStats,
} from "./instantiator.js";
