/**
 * Static site generation
 *
 * Walks the wiki directory, expands every document through a run-scoped
 * template cache and writes one HTML page (plus, optionally, the parsed tree
 * as JSON) per source file. Single-redirect documents become redirect pages.
 */

import { readFile } from "fs/promises";
import path from "path";

import { glob } from "glob";
import { minimatch } from "minimatch";

import { fragment } from "../core/nodes/types.js";
import { DEFAULT_GRAMMAR } from "../core/parser/grammar.js";
import { parseWikitext } from "../core/parser/parser.js";
import { toWikitext } from "../core/parser/serializer.js";
import { GenerationError, WikismithError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { unwrap } from "../lib/result.js";
import { TemplateCache } from "../templates/cache.js";
import { createPageContext } from "../templates/context.js";
import { Instantiator } from "../templates/instantiator.js";
import { FileSystemTemplateLoader } from "../templates/loader.js";

import { renderHtml } from "./html-renderer.js";
import { renderLayout, renderRedirect } from "./layout.js";
import { pageTitleToRoutePath } from "./routes.js";
import { copyStaticAssets, resetOutputDirectory, writeOutputFile } from "./static-assets.js";

import type { Node } from "../core/nodes/types.js";
import type { Grammar } from "../core/parser/grammar.js";
import type { PageContext } from "../templates/context.js";
import type { InstantiationStats } from "../templates/instantiator.js";
import type { NavLink } from "./layout.js";
import type { RoutePath } from "./routes.js";

const log = logger.child("[site]");

export interface GenerateOptions {
  wikiDir: string;
  staticDir: string;
  outputDir: string;
  /** URL directory pages are published under */
  wikiRoute: string;
  siteTitle: string;
  /** Title of the page `<wikiRoute>/index.html` forwards to */
  homePage: string;
  extension: string;
  /** Globs, relative to the wiki directory, of sources that get no page */
  exclude: string[];
  /** Write each parsed document as JSON beside its page */
  emitJson: boolean;
  navLinks: NavLink[];
  stylesheets: string[];
  scripts: string[];
  maxDepth: number;
  maxTableIterations: number;
  /** Record failing documents and continue instead of aborting the run */
  keepGoing?: boolean;
  grammar?: Grammar;
  /** Called before each document is processed */
  onDocument?: (relativePath: string, index: number, total: number) => void;
}

export interface GeneratedPage {
  inputPath: string;
  outputPath: string;
  title: string;
  url: string;
}

export interface GeneratedRedirect {
  inputPath: string;
  outputPath: string;
  target: string;
}

export interface DocumentFailure {
  inputPath: string;
  error: WikismithError;
}

export interface SiteStats extends InstantiationStats {
  templatesParsed: number;
  staticFiles: number;
  durationMs: number;
}

export interface SiteResult {
  pages: GeneratedPage[];
  redirects: GeneratedRedirect[];
  failures: DocumentFailure[];
  stats: SiteStats;
}

/**
 * Facts derived from a source file's path below the wiki directory
 */
export interface DocumentInfo {
  /** "Lua/Test Table" for `Lua/Test_Table.wikitext` */
  title: string;
  /** "Test_Table" for `Lua/Test_Table.wikitext` */
  subPageName: string;
}

export function describeDocument(relativePath: string, extension: string): DocumentInfo {
  const posixPath = relativePath.replace(/\\/g, "/");
  const stem = posixPath.endsWith(extension) ? posixPath.slice(0, -extension.length) : posixPath;
  return {
    title: stem.replace(/_/g, " "),
    subPageName: path.posix.basename(stem),
  };
}

interface DocumentPlacement {
  title: string;
  route: RoutePath;
  context: PageContext;
}

function placeDocument(
  relativePath: string,
  inputPath: string,
  options: Pick<GenerateOptions, "extension" | "wikiRoute">
): DocumentPlacement {
  const { title, subPageName } = describeDocument(relativePath, options.extension);
  const route = pageTitleToRoutePath(title, options.wikiRoute);
  const context = createPageContext({ inputPath, title, routePath: route.urlPath(), subPageName });
  return { title, route, context };
}

/**
 * The redirect target when a document consists of a single redirect
 */
export function redirectTarget(nodes: readonly Node[]): string | undefined {
  const [only, ...rest] = nodes;
  return only?.type === "redirect" && rest.length === 0 ? only.target : undefined;
}

/**
 * Source files that get a page, sorted, relative to the wiki directory
 */
export async function listDocuments(wikiDir: string, extension: string, exclude: string[]): Promise<string[]> {
  const files = await glob(`**/*${extension}`, { cwd: wikiDir, nodir: true, posix: true });
  return files.filter((file) => !exclude.some((pattern) => minimatch(file, pattern))).sort();
}

function toWikismithError(error: unknown, inputPath: string): WikismithError {
  if (error instanceof WikismithError) {
    return error;
  }
  return new GenerationError(`Failed to generate ${inputPath}`, {
    inputPath,
    cause: error instanceof Error ? error.message : String(error),
  });
}

/**
 * Generate the whole site
 *
 * @throws the first document's error unless `keepGoing` is set, and a
 *   GenerationError when the output directory cannot be prepared
 */
export async function generateSite(options: GenerateOptions): Promise<SiteResult> {
  const startTime = performance.now();
  const grammar = options.grammar ?? DEFAULT_GRAMMAR;

  unwrap(await resetOutputDirectory(options.outputDir));
  const staticFiles = unwrap(await copyStaticAssets(options.staticDir, options.outputDir));
  log.debug(`Copied ${staticFiles} static files`);

  const loader = await FileSystemTemplateLoader.create(options.wikiDir, { extension: options.extension });
  const cache = new TemplateCache(loader, grammar);
  const instantiator = new Instantiator(cache, grammar, {
    maxDepth: options.maxDepth,
    maxTableIterations: options.maxTableIterations,
  });

  const documents = await listDocuments(options.wikiDir, options.extension, options.exclude);
  const result: SiteResult = {
    pages: [],
    redirects: [],
    failures: [],
    stats: { ...instantiator.stats(), templatesParsed: 0, staticFiles, durationMs: 0 },
  };

  const generateDocument = async (relativePath: string, inputPath: string): Promise<void> => {
    const source = await readFile(inputPath, "utf-8");
    const nodes = parseWikitext(source, grammar);
    const { title, route, context } = placeDocument(relativePath, inputPath, options);
    const outputPath = route.filePath(options.outputDir);

    if (options.emitJson) {
      unwrap(await writeOutputFile(outputPath.replace(/\.html$/, ".json"), JSON.stringify(nodes, null, 2)));
    }

    const target = redirectTarget(nodes);
    if (target !== undefined) {
      const url = pageTitleToRoutePath(target, options.wikiRoute).urlPath();
      unwrap(await writeOutputFile(outputPath, renderRedirect(url)));
      result.redirects.push({ inputPath, outputPath, target });
      log.debug(`${relativePath} -> redirect to ${target}`);
      return;
    }

    const expanded = instantiator.instantiate(fragment(nodes), [], context);
    const html = renderLayout({
      siteTitle: options.siteTitle,
      pageTitle: title,
      body: renderHtml(expanded, { wikiRoute: options.wikiRoute }),
      homeUrl: `/${options.wikiRoute}`,
      navLinks: options.navLinks,
      stylesheets: options.stylesheets,
      scripts: options.scripts,
    });

    unwrap(await writeOutputFile(outputPath, html));
    result.pages.push({ inputPath, outputPath, title, url: route.urlPath() });
    log.debug(`${relativePath} -> ${outputPath}`);
  };

  for (const [index, relativePath] of documents.entries()) {
    options.onDocument?.(relativePath, index, documents.length);
    const inputPath = path.join(options.wikiDir, relativePath);

    try {
      await generateDocument(relativePath, inputPath);
    } catch (error) {
      const failure = toWikismithError(error, inputPath);
      if (options.keepGoing !== true) {
        throw failure;
      }
      log.error(`${inputPath}: ${failure.message}`);
      result.failures.push({ inputPath, error: failure });
    }
  }

  const homeUrl = pageTitleToRoutePath(options.homePage, options.wikiRoute).urlPath();
  unwrap(
    await writeOutputFile(path.join(options.outputDir, options.wikiRoute, "index.html"), renderRedirect(homeUrl))
  );

  result.stats = {
    ...instantiator.stats(),
    templatesParsed: cache.parses,
    staticFiles,
    durationMs: performance.now() - startTime,
  };
  return result;
}

export type DocumentFormat = "wikitext" | "html" | "json";

export type RenderDocumentOptions = Pick<
  GenerateOptions,
  "wikiDir" | "extension" | "wikiRoute" | "maxDepth" | "maxTableIterations" | "grammar"
>;

/**
 * Expand a single document against the templates of the wiki directory.
 * A file outside the wiki directory is titled after its file name.
 */
export async function renderDocument(
  filePath: string,
  options: RenderDocumentOptions,
  format: DocumentFormat
): Promise<string> {
  const grammar = options.grammar ?? DEFAULT_GRAMMAR;
  const loader = await FileSystemTemplateLoader.create(options.wikiDir, { extension: options.extension });
  const instantiator = new Instantiator(new TemplateCache(loader, grammar), grammar, {
    maxDepth: options.maxDepth,
    maxTableIterations: options.maxTableIterations,
  });

  const nodes = parseWikitext(await readFile(filePath, "utf-8"), grammar);
  const relative = path.relative(options.wikiDir, filePath);
  const inside = relative !== "" && !relative.startsWith("..") && !path.isAbsolute(relative);
  const { context } = placeDocument(inside ? relative : path.basename(filePath), filePath, options);
  const expanded = instantiator.instantiate(fragment(nodes), [], context);

  switch (format) {
    case "wikitext":
      return toWikitext(expanded);
    case "html":
      return renderHtml(expanded, { wikiRoute: options.wikiRoute });
    case "json":
      return JSON.stringify(expanded, null, 2);
  }
}
