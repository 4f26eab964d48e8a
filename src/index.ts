/**
 * wikismith - wikitext template expansion and static wiki generation
 *
 * @packageDocumentation
 */

// Core engine
export * from "./core/index.js";

// Templates
export {
  normalizeTemplateName,
  FileSystemTemplateLoader,
  MemoryTemplateLoader,
  TemplateCache,
  createPageContext,
  describePageContext,
  resolveMagicWord,
  Instantiator,
} from "./templates/index.js";

export type {
  TemplateLoader,
  FileSystemLoaderOptions,
  PageContext,
  InstantiatorOptions,
  InstantiationStats,
} from "./templates/index.js";

// Site generation
export {
  RoutePath,
  pageTitleToRoutePath,
  renderHtml,
  escapeHtml,
  parseHtmlAttributes,
  renderLayout,
  renderRedirect,
  generateSite,
  renderDocument,
} from "./site/index.js";

export type {
  HtmlRenderOptions,
  LayoutOptions,
  NavLink,
  GenerateOptions,
  GeneratedPage,
  GeneratedRedirect,
  DocumentFailure,
  DocumentFormat,
  SiteStats,
  SiteResult,
} from "./site/index.js";

// Library utilities
export {
  // Errors
  WikismithError,
  ValidationError,
  ParseError,
  ConfigError,
  GenerationError,
  TemplateNotFoundError,
  TemplateLoadError,
  TemplateCycleError,
  RecursionLimitError,
  // Result utilities
  ok,
  err,
  unwrap,
  tryCatch,
  tryCatchAsync,
  // Logger
  logger,
  Logger,
} from "./lib/index.js";

export type { Result, LogLevel } from "./lib/index.js";

// Configuration
export {
  SiteConfigSchema,
  CONFIG_FILE_NAME,
  loadConfig,
  parseConfig,
  applyOverrides,
  type SiteConfig,
  type SiteConfigInput,
  type ConfigOverrides,
  type LoadedConfig,
} from "./cli/config.js";
