export { RoutePath, pageTitleToRoutePath } from "./routes.js";
export { renderHtml, escapeHtml, parseHtmlAttributes, type HtmlRenderOptions } from "./html-renderer.js";
export { renderLayout, renderRedirect, type LayoutOptions, type NavLink } from "./layout.js";
export { copyStaticAssets, writeOutputFile, resetOutputDirectory } from "./static-assets.js";
export {
  generateSite,
  describeDocument,
  redirectTarget,
  listDocuments,
  renderDocument,
  type GenerateOptions,
  type GeneratedPage,
  type GeneratedRedirect,
  type DocumentFailure,
  type DocumentInfo,
  type SiteStats,
  type SiteResult,
  type DocumentFormat,
  type RenderDocumentOptions,
} from "./generator.js";
